/**
 * SQLite database connection
 *
 * Holds the single connection used by the listing cache.
 */

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname, join } from "path";

let db: Database.Database | null = null;

/**
 * Listing cache database path: DB_PATH or data/app.db under the working directory
 */
export function resolveDbPath(env: Record<string, string | undefined> = process.env): string {
  return env.DB_PATH || join(process.cwd(), "data", "app.db");
}

/**
 * Open the connection (idempotent). Creates the parent directory of a file
 * database when missing.
 *
 * @param dbPath - Defaults to resolveDbPath()
 */
export function openDb(dbPath: string = resolveDbPath()): Database.Database {
  if (db) {
    return db;
  }

  if (dbPath !== ":memory:") {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  db = new Database(dbPath);
  db.pragma("journal_mode = WAL");

  return db;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Current connection (must be opened first)
 */
export function getDb(): Database.Database {
  if (!db) {
    throw new Error("Database not opened. Call openDb() first.");
  }
  return db;
}

/**
 * Set database connection for testing purposes only.
 *
 * @internal Test use only - do not use in production code
 */
export function setDbForTesting(testDb: Database.Database | null): void {
  db = testDb;
}
