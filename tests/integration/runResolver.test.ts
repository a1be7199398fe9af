/**
 * Resolver command integration
 *
 * Exit codes for replayed listings, and the cache database lifecycle.
 */

import { describe, it, expect, afterEach, vi } from "vitest";
import Database from "better-sqlite3";
import { mkdirSync, rmSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { runResolver } from "@/resolution";
import { getDb } from "@/db";

const FIXTURE = join(process.cwd(), "tests", "fixtures", "listings", "week_2361.txt");

function tempDbPath(): string {
  const dir = join(tmpdir(), "gnss-product-resolver-tests");
  mkdirSync(dir, { recursive: true });
  const random = Math.random().toString(36).substring(2, 8);
  return join(dir, `resolver-${Date.now()}-${random}.db`);
}

describe("runResolver", () => {
  const created: string[] = [];

  afterEach(() => {
    vi.restoreAllMocks();
    for (const file of created.splice(0)) {
      rmSync(file, { force: true });
      rmSync(file + "-wal", { force: true });
      rmSync(file + "-shm", { force: true });
    }
  });

  it("should return 2 without a window", async () => {
    const printed = vi.spyOn(console, "error").mockImplementation(() => {});

    expect(await runResolver(["2025-04-06_00:00:00"], {})).toBe(2);
    expect(printed).toHaveBeenCalledTimes(1);
  });

  it("should return 0 for a covered window of a replayed listing", async () => {
    const code = await runResolver(
      ["2025-04-06_00:00:00", "2025-04-06_12:00:00", "cod"],
      { LISTING_FILE: FIXTURE },
    );

    expect(code).toBe(0);
  });

  it("should return 1 when nothing covers the window", async () => {
    const code = await runResolver(
      ["2025-04-08_00:00:00", "2025-04-08_00:01:00"],
      { LISTING_FILE: FIXTURE },
    );

    expect(code).toBe(1);
  });

  it("should close the cache database when its migration fails", async () => {
    const dbPath = tempDbPath();
    created.push(dbPath);
    const broken = new Database(dbPath);
    broken.exec("CREATE TABLE schema_migrations (label TEXT)");
    broken.close();

    await expect(
      runResolver(["2025-04-06_00:00:00", "2025-04-06_00:00:00"], {
        DB_PATH: dbPath,
        LISTING_CACHE_ENABLED: "true",
      }),
    ).rejects.toThrow("no such column: version");
    expect(() => getDb()).toThrow("Database not opened. Call openDb() first.");
  });
});
