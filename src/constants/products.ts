/**
 * Product filename grammar constants
 *
 * Filenames follow AAA0PPPSSS_YYYYDDDHHMM_DDu_RRu_xxx.CCC[.ext]
 */

/**
 * Product filename pattern, anchored at the start of the filename.
 *
 * Capture groups:
 * 1. analysis center (3 alnum), followed by one ignored padding digit
 * 2. project type (3 letters)
 * 3. solution type (3 letters)
 * 4. end validity YYYYDDDHHMM
 * 5-6. duration value and unit
 * 7-8. sample rate value and unit
 * 9. file category (after three ignored characters and a dot)
 *
 * The category is the alphanumeric run after the dot; whatever follows it (a
 * compression extension such as ".gz", a backup suffix) is ignored.
 */
export const PRODUCT_FILENAME_PATTERN =
  /^([A-Z0-9]{3})[0-9]([A-Z]{3})([A-Z]{3})_(\d{11})_(\d{2})([A-Z])_(\d{2})([A-Z])_[A-Z0-9]{3}\.([A-Z0-9]+)/;

/**
 * Luxon format of the 11-digit end validity field (year, ordinal day, hour, minute)
 */
export const PRODUCT_TIMESTAMP_FORMAT = "yyyyoooHHmm";

/**
 * Padding digit written between analysis center and project type
 */
export const PRODUCT_FILENAME_PADDING = "0";

/**
 * Defaults used when formatting filenames from record fields
 */
export const DEFAULT_DURATION_UNIT = "D";
export const DEFAULT_SAMPLE_RATE = { value: 1, unit: "D" } as const;
export const DEFAULT_CONTENT_TAG = "OSB";

/**
 * Separator used in identity map keys ("COD|MGX|FIN")
 */
export const IDENTITY_KEY_SEPARATOR = "|";
