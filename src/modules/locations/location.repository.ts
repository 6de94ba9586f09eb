/**
 * SQLite-backed coordinate cache (`locations` table)
 */

import { ErrorCode } from '../../core';
import { guardStorage, SqliteService } from '../../shared/database/sqlite.service';
import type {
  Coordinates,
  LocationRecord,
  LocationRepository,
} from '../../shared/database/repository.interface';

interface LocationRow {
  id: number;
  label: string;
  address: string;
  lat: number | null;
  lon: number | null;
  created_at: string;
}

export class SqliteLocationRepository implements LocationRepository {
  constructor(private readonly sqlite: SqliteService) {}

  findByLabel(label: string): LocationRecord | null {
    return guardStorage('locations.findByLabel', ErrorCode.STORAGE_READ_FAILED, () =>
      this.sqlite.withConnection('locations.findByLabel', db => {
        const row = db
          .prepare<[string], LocationRow>(
            'SELECT id, label, address, lat, lon, created_at FROM locations WHERE label = ?'
          )
          .get(label);
        return row ? toRecord(row) : null;
      })
    );
  }

  upsert(label: string, address: string, { lat, lon }: Coordinates): void {
    guardStorage('locations.upsert', ErrorCode.STORAGE_WRITE_FAILED, () =>
      this.sqlite.withConnection('locations.upsert', db => {
        db.prepare(
          `INSERT INTO locations (label, address, lat, lon)
           VALUES (?, ?, ?, ?)
           ON CONFLICT(label) DO UPDATE SET
             address = excluded.address,
             lat = excluded.lat,
             lon = excluded.lon`
        ).run(label, address, lat, lon);
      })
    );
  }
}

function toRecord(row: LocationRow): LocationRecord {
  return {
    id: row.id,
    label: row.label,
    address: row.address,
    lat: row.lat,
    lon: row.lon,
    createdAt: row.created_at,
  };
}
