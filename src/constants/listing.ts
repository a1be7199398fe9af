/**
 * Listing provider constants
 */

/**
 * Archive directory containing one sub-directory per GPS week
 */
export const DEFAULT_ARCHIVE_BASE_URL =
  "https://cddis.nasa.gov/archive/gnss/products";

/**
 * CSS class carried by file anchors in the archive's directory pages
 */
export const ARCHIVE_ITEM_CLASS = "archiveItemText";

/**
 * Listing fetch timeout (10 seconds)
 */
export const DEFAULT_LISTING_TIMEOUT_MS = 10_000;

/**
 * Attempts per week listing (1 initial + 1 retry)
 */
export const DEFAULT_LISTING_MAX_ATTEMPTS = 2;

/**
 * Weeks fetched at the same time
 */
export const DEFAULT_LISTING_CONCURRENCY = 4;

/**
 * File categories a settled epoch must provide: clocks, biases, orbits
 */
export const DEFAULT_REQUIRED_CATEGORIES = ["CLK", "BIA", "SP3"];

export const LISTING_HEADERS: Record<string, string> = {
  Accept: "text/html",
  "User-Agent": "gnss-product-resolver/0.1",
};

/**
 * Weeks a directory keeps growing after it ends: final products land about
 * two weeks later. Listings are cached only once this many weeks have passed.
 */
export const LISTING_SETTLED_WEEKS = 3;
