/**
 * =============================================================================
 * REPOSITORY INTERFACES - Database Abstraction Layer
 * =============================================================================
 *
 * Contracts for the two tables the pipeline touches. The SQLite
 * implementations live next to the modules that own them; tests substitute
 * in-memory implementations of the same interfaces.
 * =============================================================================
 */

import type { TimeOfDay } from '../../core/constants';

// =============================================================================
// LOCATIONS
// =============================================================================

export interface Coordinates {
  lat: number;
  lon: number;
}

export interface LocationRecord {
  id: number;
  label: string;
  address: string;
  lat: number | null;
  lon: number | null;
  createdAt: string;
}

export interface LocationRepository {
  findByLabel(label: string): LocationRecord | null;

  /**
   * Insert, or overwrite address and coordinates of an existing label
   */
  upsert(label: string, address: string, coordinates: Coordinates): void;
}

// =============================================================================
// SAMPLES
// =============================================================================

/**
 * Typed metrics of one route alternative
 */
export interface SampleMetrics {
  description: string;
  meters: number;
  miles: number;
  durationSeconds: number;
  /** "No traffic" duration */
  durationStaticMinutes: number;
  /** Duration with current traffic */
  durationMinutes: number;
}

export interface NewSample extends SampleMetrics {
  batchId: string;
  batchTs: string;
  originLabel: string;
  destLabel: string;
}

export interface SampleRecord extends NewSample {
  id: number;
  createdAt: string;
}

/**
 * Read path used by the report command and downstream consumers
 */
export interface SampleQuery {
  originLabel: string;
  destLabel: string;
  /** Trailing window, counted back from now */
  days: number;
  /** Keep only rows whose local creation time falls inside this window (inclusive) */
  timeOfDay?: {
    start: TimeOfDay;
    end: TimeOfDay;
    timezone: string;
  };
  /** Keep only the most recent N rows (result stays in ascending order) */
  limit?: number;
}

export interface SampleRepository {
  /**
   * Insert every sample in one transaction; all or nothing
   */
  insertBatch(samples: NewSample[]): void;

  findByBatchId(batchId: string): SampleRecord[];

  findSamples(query: SampleQuery): SampleRecord[];
}
