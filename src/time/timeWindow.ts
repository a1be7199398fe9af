/**
 * Time window parsing
 *
 * Window boundaries arrive as "YYYY-MM-DD_HH:mm:ss" text (UTC) and are
 * rejected before any listing or catalog work when they cannot be read.
 */

import { DateTime } from "luxon";
import type { TimeWindow } from "@/types";
import { WINDOW_BOUNDARY_FORMAT } from "@/constants";

/**
 * Error thrown when a window boundary is empty, unparseable, or the
 * window is inverted.
 */
export class TimeWindowFormatError extends Error {
  constructor(message: string) {
    super(`Invalid time window: ${message}`);
    this.name = "TimeWindowFormatError";
  }
}

/**
 * Parse one window boundary.
 *
 * @param text - Boundary text, e.g. "2025-05-01_00:00:00"
 * @param label - "start" or "end", used in error messages
 * @throws {TimeWindowFormatError} If the text is empty or does not match the format
 */
export function parseWindowBoundary(text: string, label: string): DateTime {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    throw new TimeWindowFormatError(`${label} boundary is empty`);
  }

  const parsed = DateTime.fromFormat(trimmed, WINDOW_BOUNDARY_FORMAT, {
    zone: "utc",
  });
  if (!parsed.isValid) {
    throw new TimeWindowFormatError(
      `${label} boundary "${trimmed}" does not match YYYY-MM-DD_HH:mm:ss (e.g. 2025-05-01_00:00:00)`,
    );
  }

  return parsed;
}

/**
 * Build a window from two instants.
 *
 * A zero-length window (start == end) is accepted.
 *
 * @throws {TimeWindowFormatError} If start is after end
 */
export function createTimeWindow(start: DateTime, end: DateTime): TimeWindow {
  if (start.toMillis() > end.toMillis()) {
    throw new TimeWindowFormatError(
      `start ${start.toISO()} is after end ${end.toISO()}`,
    );
  }
  return { start, end };
}

/**
 * Parse a window from its two boundary strings.
 *
 * @example
 * const window = parseTimeWindow("2025-07-05_00:00:00", "2025-07-05_23:59:30");
 */
export function parseTimeWindow(startText: string, endText: string): TimeWindow {
  const start = parseWindowBoundary(startText, "start");
  const end = parseWindowBoundary(endText, "end");
  return createTimeWindow(start, end);
}
