/**
 * GPS week conversion
 *
 * The product archive is partitioned by GPS week. Leap seconds are ignored:
 * week boundaries are computed on the UTC timeline.
 */

import { DateTime } from "luxon";
import type { TimeWindow } from "@/types";
import { GPS_EPOCH_ISO, MS_PER_WEEK } from "@/constants";

const GPS_EPOCH_MS = DateTime.fromISO(GPS_EPOCH_ISO, { zone: "utc" }).toMillis();

/**
 * GPS week containing the given instant
 */
export function toGpsWeek(instant: DateTime): number {
  return Math.floor((instant.toMillis() - GPS_EPOCH_MS) / MS_PER_WEEK);
}

/**
 * First instant (Sunday 00:00 UTC) of a GPS week
 */
export function fromGpsWeek(gpsWeek: number): DateTime {
  return DateTime.fromMillis(GPS_EPOCH_MS + gpsWeek * MS_PER_WEEK, {
    zone: "utc",
  });
}

/**
 * Every GPS week touched by the window, inclusive of both ends
 */
export function gpsWeekRange(window: TimeWindow): number[] {
  const first = toGpsWeek(window.start);
  const last = toGpsWeek(window.end);
  const weeks: number[] = [];
  for (let week = first; week <= last; week++) {
    weeks.push(week);
  }
  return weeks;
}
