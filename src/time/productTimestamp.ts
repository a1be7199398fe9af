/**
 * Product filename timestamp decoding
 */

import { DateTime } from "luxon";
import { PRODUCT_TIMESTAMP_FORMAT } from "@/constants";

/**
 * Decode an 11-digit YYYYDDDHHMM end validity field as UTC.
 *
 * Returns null for an impossible ordinal day (000, 366 in a common year),
 * hour or minute.
 */
export function parseProductTimestamp(text: string): DateTime | null {
  if (!/^\d{11}$/.test(text)) {
    return null;
  }

  const parsed = DateTime.fromFormat(text, PRODUCT_TIMESTAMP_FORMAT, {
    zone: "utc",
  });

  return parsed.isValid ? parsed : null;
}

/**
 * Encode an instant as the 11-digit YYYYDDDHHMM field (UTC)
 */
export function formatProductTimestamp(instant: DateTime): string {
  return instant.toUTC().toFormat(PRODUCT_TIMESTAMP_FORMAT);
}
