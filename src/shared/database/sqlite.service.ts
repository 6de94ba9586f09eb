/**
 * =============================================================================
 * SQLITE DATABASE SERVICE
 * =============================================================================
 *
 * Connection scoping for the commute database (better-sqlite3).
 *
 * A connection lives exactly as long as one logical operation: it is opened,
 * handed to the callback and closed in `finally`, on success and failure
 * alike. Nothing stays open between invocations.
 *
 * =============================================================================
 */

import Database from 'better-sqlite3';
import { ErrorCode, StorageError } from '../../core';
import { logger } from '../services/logger.service';
import { ensureSchema } from './schema';

// Operations slower than this are logged at warn level
const SLOW_OPERATION_THRESHOLD_MS = 500;

export type Connection = Database.Database;

export class SqliteService {
  constructor(
    private readonly dbPath: string,
    private readonly options: Database.Options = {}
  ) {}

  /**
   * Run `fn` with a fresh connection and always close it afterwards
   */
  withConnection<T>(operation: string, fn: (db: Connection) => T): T {
    const startedAt = Date.now();
    let db: Connection;

    try {
      db = new Database(this.dbPath, this.options);
    } catch (error) {
      throw new StorageError(
        `Could not open database at ${this.dbPath}`,
        ErrorCode.STORAGE_READ_FAILED,
        { operation, cause: error instanceof Error ? error.message : String(error) }
      );
    }

    try {
      return fn(db);
    } finally {
      db.close();

      const durationMs = Date.now() - startedAt;
      if (durationMs > SLOW_OPERATION_THRESHOLD_MS) {
        logger.warn(`🐢 Slow database operation: ${operation}`, { durationMs });
      } else {
        logger.debug(`🗄️ ${operation} completed`, { durationMs });
      }
    }
  }

  /**
   * Run `fn` inside one transaction on a scoped connection.
   * Any throw rolls the transaction back before the connection closes.
   */
  withTransaction<T>(operation: string, fn: (db: Connection) => T): T {
    return this.withConnection(operation, db => db.transaction(() => fn(db))());
  }

  /**
   * Create tables and indexes if they do not exist yet
   */
  migrate(): void {
    this.withConnection('migrate', db => ensureSchema(db));
  }
}

/**
 * Wrap driver exceptions as StorageError; StorageErrors pass through untouched
 */
export function guardStorage<T>(operation: string, code: ErrorCode, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof StorageError) {
      throw error;
    }
    throw new StorageError(
      `${operation} failed: ${error instanceof Error ? error.message : String(error)}`,
      code,
      { operation }
    );
  }
}
