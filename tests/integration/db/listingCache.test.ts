/**
 * Listing cache integration
 *
 * Runs the real migrations on a temp database and exercises the repo and the
 * read-through provider against it.
 */

import { describe, it, expect, afterEach, beforeEach } from "vitest";
import { existsSync } from "fs";
import type { DateTime } from "luxon";
import { createTestDb, type TestDbHarness } from "../../helpers/testDb";
import { getCachedListing, upsertCachedListing } from "@/db";
import { CachedListingProvider, isSettledAt } from "@/listing";
import type { ListingProvider } from "@/interfaces";
import { utc } from "../../helpers/products";

class CountingProvider implements ListingProvider {
  readonly name = "counting";
  calls = 0;

  async fetchWeek(gpsWeek: number): Promise<string[]> {
    this.calls++;
    return [`listing-${gpsWeek}-${this.calls}`];
  }
}

/**
 * Week directory that keeps receiving files
 */
class GrowingProvider implements ListingProvider {
  readonly name = "growing";
  readonly lines: string[] = [];
  calls = 0;

  async fetchWeek(): Promise<string[]> {
    this.calls++;
    return [...this.lines];
  }
}

describe("Listing cache", () => {
  let harness: TestDbHarness;

  function cachedWeeks(): number[] {
    return harness.db
      .prepare<[], { gps_week: number }>(
        "SELECT gps_week FROM listing_cache ORDER BY gps_week",
      )
      .all()
      .map((row) => row.gps_week);
  }

  beforeEach(() => {
    harness = createTestDb();
  });

  afterEach(() => {
    harness.cleanup();
  });

  describe("repository", () => {
    it("should apply the migrations to a fresh database", () => {
      expect(existsSync(harness.dbPath)).toBe(true);
      const versions = harness.db
        .prepare("SELECT version FROM schema_migrations")
        .all();
      expect(versions).toEqual([{ version: "001_listing_cache.sql" }]);
    });

    it("should store and read back a week", () => {
      upsertCachedListing(2361, ["a", "b"], "2025-04-20T00:00:00.000Z");

      expect(getCachedListing(2361)).toEqual({
        gpsWeek: 2361,
        lines: ["a", "b"],
        fetchedAt: "2025-04-20T00:00:00.000Z",
      });
    });

    it("should replace a stored week", () => {
      upsertCachedListing(2361, ["a"], "2025-04-20T00:00:00.000Z");
      upsertCachedListing(2361, ["b", "c"], "2025-04-21T00:00:00.000Z");

      expect(getCachedListing(2361)?.lines).toEqual(["b", "c"]);
      expect(cachedWeeks()).toEqual([2361]);
    });

    it("should return null for a week never stored", () => {
      expect(getCachedListing(2360)).toBeNull();
    });
  });

  describe("CachedListingProvider", () => {
    // 2025-04-20 starts GPS week 2363; weeks up to 2359 are settled
    const now = () => utc("2025-04-20T00:00");

    it("should serve a settled week from the cache after the first fetch", async () => {
      const inner = new CountingProvider();
      const provider = new CachedListingProvider(inner, { now });

      const first = await provider.fetchWeek(2359);
      const second = await provider.fetchWeek(2359);

      expect(first).toEqual(["listing-2359-1"]);
      expect(second).toEqual(["listing-2359-1"]);
      expect(inner.calls).toBe(1);
      expect(getCachedListing(2359)?.fetchedAt).toBe("2025-04-20T00:00:00.000Z");
    });

    it("should always fetch weeks that are still settling", async () => {
      const inner = new CountingProvider();
      const provider = new CachedListingProvider(inner, { now });

      await provider.fetchWeek(2361);
      const second = await provider.fetchWeek(2361);

      expect(second).toEqual(["listing-2361-2"]);
      expect(inner.calls).toBe(2);
      expect(cachedWeeks()).toEqual([]);
    });

    it("should pick up final products published after the week ended", async () => {
      let current: DateTime = utc("2025-04-13T00:00");
      const inner = new GrowingProvider();
      const provider = new CachedListingProvider(inner, { now: () => current });
      const rapid = "COD0MGXRAP_20250960000_01D_01D_OSB.BIA.gz";
      const final = "COD0MGXFIN_20250960000_01D_01D_OSB.BIA.gz";
      inner.lines.push(rapid);

      expect(await provider.fetchWeek(2361)).toEqual([rapid]);

      inner.lines.push(final);
      current = utc("2025-05-01T00:00");
      expect(await provider.fetchWeek(2361)).toEqual([rapid, final]);

      // 2025-05-11 starts week 2366: week 2361 has settled
      current = utc("2025-05-11T00:00");
      expect(await provider.fetchWeek(2361)).toEqual([rapid, final]);
      inner.lines.push("COD0MGXULT_20250960000_01D_01D_OSB.BIA.gz");
      expect(await provider.fetchWeek(2361)).toEqual([rapid, final]);
      expect(inner.calls).toBe(3);
    });

    it("should refetch a cached listing taken before the week settled", async () => {
      upsertCachedListing(2359, ["early"], "2025-04-06T00:00:00.000Z");
      const inner = new CountingProvider();
      const provider = new CachedListingProvider(inner, { now });

      expect(await provider.fetchWeek(2359)).toEqual(["listing-2359-1"]);
      expect(getCachedListing(2359)).toEqual({
        gpsWeek: 2359,
        lines: ["listing-2359-1"],
        fetchedAt: "2025-04-20T00:00:00.000Z",
      });
    });

    it("should name itself after the wrapped provider", () => {
      const provider = new CachedListingProvider(new CountingProvider(), { now });

      expect(provider.name).toBe("cached:counting");
      expect(provider.isCacheable(2359)).toBe(true);
      expect(provider.isCacheable(2360)).toBe(false);
    });
  });

  describe("isSettledAt", () => {
    it("should require three full weeks after the listed week", () => {
      // 2025-05-04 starts week 2365
      expect(isSettledAt(2361, utc("2025-05-03T23:59"))).toBe(false);
      expect(isSettledAt(2361, utc("2025-05-04T00:00"))).toBe(true);
    });
  });
});
