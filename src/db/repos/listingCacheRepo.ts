/**
 * Listing cache repository
 *
 * Data access layer for the listing_cache table: raw listing lines of one
 * GPS week, as fetched from the archive.
 */

import type { CachedListing, ListingCacheRow } from "@/types";
import { getDb } from "@/db/connection";

function parseLines(linesJson: string, gpsWeek: number): string[] {
  const parsed: unknown = JSON.parse(linesJson);
  if (
    !Array.isArray(parsed) ||
    !parsed.every((line): line is string => typeof line === "string")
  ) {
    throw new Error(`listing_cache row for week ${gpsWeek} is not a string array`);
  }
  return parsed;
}

/**
 * Get the cached listing of a week
 *
 * @returns Cached listing or null if the week was never stored
 */
export function getCachedListing(gpsWeek: number): CachedListing | null {
  const db = getDb();
  const row = db
    .prepare<[number], ListingCacheRow>(
      "SELECT * FROM listing_cache WHERE gps_week = ?",
    )
    .get(gpsWeek);

  if (!row) {
    return null;
  }

  return {
    gpsWeek: row.gps_week,
    lines: parseLines(row.lines_json, row.gps_week),
    fetchedAt: row.fetched_at,
  };
}

/**
 * Insert or replace the listing of a week
 *
 * @param fetchedAt - ISO 8601 timestamp (defaults to now)
 */
export function upsertCachedListing(
  gpsWeek: number,
  lines: readonly string[],
  fetchedAt: string = new Date().toISOString(),
): void {
  const db = getDb();
  db.prepare(
    `
    INSERT INTO listing_cache (gps_week, lines_json, fetched_at)
    VALUES (?, ?, ?)
    ON CONFLICT(gps_week) DO UPDATE SET
      lines_json = excluded.lines_json,
      fetched_at = excluded.fetched_at
  `,
  ).run(gpsWeek, JSON.stringify(lines), fetchedAt);
}
