/**
 * =============================================================================
 * SAMPLE REPOSITORY - `samples` table
 * =============================================================================
 *
 * Write path: one transaction per batch (insertBatch).
 * Read path: the query contract the dashboard and `report` command use,
 * filtered by route and trailing window, oldest first.
 * =============================================================================
 */

import { DateTime } from 'luxon';
import { ErrorCode, SQLITE_TIMESTAMP_FORMAT } from '../../core';
import { guardStorage, SqliteService } from '../../shared/database/sqlite.service';
import type {
  NewSample,
  SampleQuery,
  SampleRecord,
  SampleRepository,
} from '../../shared/database/repository.interface';
import { isWithin } from './direction.selector';

interface SampleRow {
  id: number;
  created_at: string;
  batch_id: string;
  batch_ts: string;
  origin_label: string;
  dest_label: string;
  description: string;
  meters: number;
  miles: number;
  duration_seconds: number;
  duration_static_minutes: number;
  duration_minutes: number;
}

const SAMPLE_COLUMNS = `id, created_at, batch_id, batch_ts, origin_label, dest_label, description,
  meters, miles, duration_seconds, duration_static_minutes, duration_minutes`;

const INSERT_SAMPLE = `
  INSERT INTO samples (
    batch_id, batch_ts, origin_label, dest_label, description,
    meters, miles, duration_seconds, duration_static_minutes, duration_minutes
  )
  VALUES (
    @batchId, @batchTs, @originLabel, @destLabel, @description,
    @meters, @miles, @durationSeconds, @durationStaticMinutes, @durationMinutes
  )
`;

export class SqliteSampleRepository implements SampleRepository {
  constructor(
    private readonly sqlite: SqliteService,
    private readonly clock: () => Date = () => new Date()
  ) {}

  insertBatch(samples: NewSample[]): void {
    if (samples.length === 0) {
      return;
    }

    guardStorage('samples.insertBatch', ErrorCode.STORAGE_WRITE_FAILED, () =>
      this.sqlite.withTransaction('samples.insertBatch', db => {
        const insert = db.prepare<NewSample>(INSERT_SAMPLE);
        for (const sample of samples) {
          insert.run(sample);
        }
      })
    );
  }

  findByBatchId(batchId: string): SampleRecord[] {
    return guardStorage('samples.findByBatchId', ErrorCode.STORAGE_READ_FAILED, () =>
      this.sqlite.withConnection('samples.findByBatchId', db =>
        db
          .prepare<[string], SampleRow>(`SELECT ${SAMPLE_COLUMNS} FROM samples WHERE batch_id = ? ORDER BY id ASC`)
          .all(batchId)
          .map(toRecord)
      )
    );
  }

  findSamples(query: SampleQuery): SampleRecord[] {
    const cutoff = DateTime.fromJSDate(this.clock())
      .toUTC()
      .minus({ days: query.days })
      .toFormat(SQLITE_TIMESTAMP_FORMAT);

    const rows = guardStorage('samples.findSamples', ErrorCode.STORAGE_READ_FAILED, () =>
      this.sqlite.withConnection('samples.findSamples', db =>
        db
          .prepare<[string, string, string], SampleRow>(
            `SELECT ${SAMPLE_COLUMNS} FROM samples
             WHERE origin_label = ? AND dest_label = ? AND created_at >= ?
             ORDER BY created_at ASC, id ASC`
          )
          .all(query.originLabel, query.destLabel, cutoff)
      )
    );

    let records = rows.map(toRecord);

    const window = query.timeOfDay;
    if (window) {
      records = records.filter(record => {
        const local = DateTime.fromFormat(record.createdAt, SQLITE_TIMESTAMP_FORMAT, { zone: 'utc' })
          .setZone(window.timezone);
        return isWithin({ hour: local.hour, minute: local.minute, second: local.second }, window.start, window.end);
      });
    }

    if (query.limit !== undefined && query.limit > 0) {
      records = records.slice(-query.limit);
    }

    return records;
  }
}

function toRecord(row: SampleRow): SampleRecord {
  return {
    id: row.id,
    createdAt: row.created_at,
    batchId: row.batch_id,
    batchTs: row.batch_ts,
    originLabel: row.origin_label,
    destLabel: row.dest_label,
    description: row.description,
    meters: row.meters,
    miles: row.miles,
    durationSeconds: row.duration_seconds,
    durationStaticMinutes: row.duration_static_minutes,
    durationMinutes: row.duration_minutes,
  };
}
