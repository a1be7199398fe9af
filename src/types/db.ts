/**
 * Database row type definitions
 */

/**
 * listing_cache row (database entity)
 */
export type ListingCacheRow = {
  /** GPS week the listing belongs to */
  gps_week: number;
  /** JSON array of raw listing lines */
  lines_json: string;
  /** When the listing was fetched (ISO 8601 string) */
  fetched_at: string;
};

/**
 * Cached listing as returned by the repository
 */
export type CachedListing = {
  gpsWeek: number;
  lines: string[];
  fetchedAt: string;
};
