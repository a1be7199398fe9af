/**
 * Test Database Harness
 *
 * Creates a fresh temporary SQLite database per test, runs the real
 * migrations and injects the connection into the db singleton.
 *
 * Usage:
 *   const harness = createTestDb();
 *   // ... use repos ...
 *   harness.cleanup();
 */

import Database from "better-sqlite3";
import { mkdirSync, rmSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { migrateDb, setDbForTesting } from "@/db";

export interface TestDbHarness {
  db: Database.Database;
  dbPath: string;
  /** Close connection and delete temp files */
  cleanup: () => void;
}

function generateTempDbPath(): string {
  const random = Math.random().toString(36).substring(2, 8);
  const tempDir = join(tmpdir(), "gnss-product-resolver-tests");
  mkdirSync(tempDir, { recursive: true });
  return join(tempDir, `test-${Date.now()}-${random}.db`);
}

/**
 * Create a fresh test database with all migrations applied.
 *
 * IMPORTANT: Always call cleanup() after the test completes.
 */
export function createTestDb(): TestDbHarness {
  const dbPath = generateTempDbPath();
  const db = new Database(dbPath);
  migrateDb(db);

  setDbForTesting(db);

  const cleanup = () => {
    setDbForTesting(null);
    db.close();
    rmSync(dbPath, { force: true });
    rmSync(dbPath + "-wal", { force: true });
    rmSync(dbPath + "-shm", { force: true });
  };

  return { db, dbPath, cleanup };
}
