/**
 * Calendar constants
 */

/**
 * Start of GPS week 0 (UTC, leap seconds ignored)
 */
export const GPS_EPOCH_ISO = "1980-01-06T00:00:00Z";

export const MS_PER_WEEK = 7 * 24 * 60 * 60 * 1000;

/**
 * Format accepted for window boundaries (e.g., "2025-05-01_00:00:00")
 */
export const WINDOW_BOUNDARY_FORMAT = "yyyy-MM-dd_HH:mm:ss";

/**
 * Format used when writing the end validity next to a filename in listing files
 */
export const LISTING_FILE_TIMESTAMP_FORMAT = "yyyy-MM-dd HH:mm:ss";
