/**
 * ListingProvider interface: source of raw archive listing lines
 *
 * Implementations return one line per archive entry ("<filename> <optional
 * metadata>"). Lines are not filtered; the product catalog drops anything
 * that is not a product filename.
 */

export interface ListingProvider {
  /**
   * Human-readable source name for logging
   */
  readonly name: string;

  /**
   * Fetch the listing of one GPS week
   *
   * @param gpsWeek - Archive week identifier (e.g., 2361)
   * @returns Promise resolving to the raw listing lines
   * @throws On network or storage failure; callers decide how to degrade
   */
  fetchWeek(gpsWeek: number): Promise<string[]>;
}
