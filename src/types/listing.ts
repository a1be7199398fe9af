/**
 * Listing type definitions
 *
 * Shapes for raw archive listings fetched per GPS week.
 */

/**
 * Outcome of fetching the listing of one GPS week
 */
export type WeekListingResult =
  | {
      status: "ok";
      gpsWeek: number;
      lines: string[];
    }
  | {
      status: "error";
      gpsWeek: number;
      /** Error message for logging/debugging */
      message: string;
    };

/**
 * Concatenated listing of several weeks, in week order
 */
export type WeekListingBatch = {
  /** All lines of all successful weeks */
  lines: string[];
  /** Per-week outcomes, in the order the weeks were requested */
  weeks: WeekListingResult[];
  /** Weeks whose fetch failed */
  failedWeeks: number[];
};

export type FetchWeekListingsOptions = {
  /** Maximum number of weeks fetched at the same time */
  concurrency?: number;
};
