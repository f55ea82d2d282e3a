import type BetterSqlite3 from 'better-sqlite3';
import type { Logger } from 'pino';

/**
 * Base interface for domain repositories.
 * All repositories have access to the database and logger.
 */
export interface BaseRepository {
  readonly db: BetterSqlite3.Database;
  readonly log: Logger;
}

/**
 * Utility: Get current timestamp in milliseconds
 */
export function now(): number {
  return Date.now();
}

/** Length of generated row ids. */
export const ID_LENGTH = 12;
