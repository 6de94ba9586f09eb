/**
 * Shared fixtures for the sampler test suites
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { SqliteService } from '../../shared/database/sqlite.service';
import type { HttpResponse } from '../../shared/services/google-maps.service';
import type {
  Coordinates,
  LocationRecord,
  LocationRepository,
  NewSample,
  SampleQuery,
  SampleRecord,
  SampleRepository,
} from '../../shared/database/repository.interface';
import type { RawRoute } from '../../modules/routing/routing.schema';

// =============================================================================
// ENVIRONMENT
// =============================================================================

export const TEST_ENV = {
  GOOGLE_MAPS_API_KEY: 'test-key',
  HOME_LABEL: 'Home',
  HOME_ADDRESS: '1 Elm Street, Springfield',
  WORK_LABEL: 'Work',
  WORK_ADDRESS: '200 Main Street, Springfield',
  LOCAL_TZ: 'America/New_York',
};

// =============================================================================
// SQLITE
// =============================================================================

export interface TempDatabase {
  sqlite: SqliteService;
  dbPath: string;
  cleanup: () => void;
}

/**
 * Migrated database file in a fresh temp directory
 */
export function createTempDatabase(): TempDatabase {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'commute-sampler-'));
  const dbPath = path.join(dir, 'test.db');
  const sqlite = new SqliteService(dbPath);
  sqlite.migrate();

  return {
    sqlite,
    dbPath,
    cleanup: () => fs.rmSync(dir, { recursive: true, force: true }),
  };
}

// =============================================================================
// PROVIDER PAYLOADS
// =============================================================================

export interface RouteFixture {
  description: string;
  meters: number;
  miles: string;
  duration: string;
  staticDuration: string;
  durationText: string;
}

export function rawRoute(overrides: Partial<RouteFixture> = {}): RawRoute {
  const route: RouteFixture = {
    description: 'I-95 N',
    meters: 16093,
    miles: '10.0 mi',
    duration: '1532s',
    staticDuration: '21 mins',
    durationText: '26 mins',
    ...overrides,
  };

  return {
    description: route.description,
    distanceMeters: route.meters,
    duration: route.duration,
    localizedValues: {
      distance: { text: route.miles },
      duration: { text: route.durationText },
      staticDuration: { text: route.staticDuration },
    },
  };
}

export function jsonResponse(body: unknown, status: number = 200): HttpResponse {
  return {
    ok: status >= 200 && status < 300,
    status,
    text: async () => (typeof body === 'string' ? body : JSON.stringify(body)),
  };
}

export function geocodeOk(lat: number, lng: number): HttpResponse {
  return jsonResponse({
    status: 'OK',
    results: [{ formatted_address: 'somewhere', geometry: { location: { lat, lng } } }],
  });
}

// =============================================================================
// IN-MEMORY REPOSITORIES
// =============================================================================

export class InMemoryLocationRepository implements LocationRepository {
  readonly rows = new Map<string, LocationRecord>();
  private nextId = 1;

  findByLabel(label: string): LocationRecord | null {
    return this.rows.get(label) ?? null;
  }

  upsert(label: string, address: string, { lat, lon }: Coordinates): void {
    const existing = this.rows.get(label);
    if (existing) {
      this.rows.set(label, { ...existing, address, lat, lon });
      return;
    }
    this.rows.set(label, {
      id: this.nextId++,
      label,
      address,
      lat,
      lon,
      createdAt: '2026-01-15 08:00:00',
    });
  }
}

/**
 * Stages rows and publishes them only when the whole batch succeeds.
 * `failOnInsert` makes the Nth insert (1-based) throw.
 */
export class InMemorySampleRepository implements SampleRepository {
  readonly rows: SampleRecord[] = [];
  failOnInsert?: number;
  private nextId = 1;

  insertBatch(samples: NewSample[]): void {
    const staged: SampleRecord[] = [];
    samples.forEach((sample, index) => {
      if (this.failOnInsert === index + 1) {
        throw new Error('disk I/O error');
      }
      staged.push({ ...sample, id: this.nextId + index, createdAt: sample.batchTs });
    });
    this.nextId += staged.length;
    this.rows.push(...staged);
  }

  findByBatchId(batchId: string): SampleRecord[] {
    return this.rows.filter(row => row.batchId === batchId);
  }

  findSamples(_query: SampleQuery): SampleRecord[] {
    throw new Error('findSamples is not supported by InMemorySampleRepository; use SqliteSampleRepository');
  }
}
