/**
 * =============================================================================
 * BATCH WRITER
 * =============================================================================
 *
 * Persists the alternatives of one routing call as one batch:
 * - one uuid batch id and one UTC batch timestamp shared by every row
 * - a single transaction, so readers see the whole batch or none of it
 * =============================================================================
 */

import { v4 as uuidv4 } from 'uuid';
import { DateTime } from 'luxon';
import { ErrorCode, SQLITE_TIMESTAMP_FORMAT, StorageError } from '../../core';
import { logger } from '../../shared/services/logger.service';
import type {
  NewSample,
  SampleMetrics,
  SampleRepository,
} from '../../shared/database/repository.interface';

export interface BatchReceipt {
  batchId: string;
  batchTs: string;
  count: number;
}

export class BatchWriter {
  constructor(
    private readonly samples: SampleRepository,
    private readonly clock: () => Date = () => new Date(),
    private readonly generateId: () => string = () => uuidv4()
  ) {}

  /**
   * Returns null (and writes nothing) for an empty list
   */
  commit(originLabel: string, destLabel: string, metrics: SampleMetrics[]): BatchReceipt | null {
    if (metrics.length === 0) {
      logger.warn(`No samples to commit for ${originLabel} -> ${destLabel}`);
      return null;
    }

    const batchId = this.generateId();
    const batchTs = DateTime.fromJSDate(this.clock()).toUTC().toFormat(SQLITE_TIMESTAMP_FORMAT);

    const rows: NewSample[] = metrics.map(m => ({
      ...m,
      batchId,
      batchTs,
      originLabel,
      destLabel,
    }));

    try {
      this.samples.insertBatch(rows);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new StorageError(
        `Batch ${batchId} rolled back: ${reason}`,
        ErrorCode.STORAGE_WRITE_FAILED,
        { batchId, originLabel, destLabel, count: rows.length }
      );
    }

    logger.info(`💾 Committed batch ${batchId}`, { batchTs, count: rows.length, originLabel, destLabel });

    return { batchId, batchTs, count: rows.length };
  }
}
