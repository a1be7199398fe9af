/**
 * CachedListingProvider: SQLite read-through cache around another provider
 *
 * A week directory keeps receiving files (final products included) for a
 * while after the week ends. Only listings fetched after that settle lag are
 * stored or served from the cache.
 */

import { DateTime } from "luxon";
import type { ListingProvider } from "@/interfaces";
import { getCachedListing, upsertCachedListing } from "@/db";
import { LISTING_SETTLED_WEEKS } from "@/constants";
import { toGpsWeek } from "@/time/gpsWeek";
import * as logger from "@/logger";

export interface CachedListingProviderConfig {
  /** Clock used to decide which weeks are settled (for testing) */
  now?: () => DateTime;
}

/**
 * Whether a listing of gpsWeek taken at `at` can no longer change
 */
export function isSettledAt(gpsWeek: number, at: DateTime): boolean {
  return gpsWeek < toGpsWeek(at) - LISTING_SETTLED_WEEKS;
}

export class CachedListingProvider implements ListingProvider {
  readonly name: string;

  private readonly now: () => DateTime;

  constructor(
    private readonly inner: ListingProvider,
    config?: CachedListingProviderConfig,
  ) {
    this.name = `cached:${inner.name}`;
    this.now = config?.now ?? (() => DateTime.utc());
  }

  isCacheable(gpsWeek: number): boolean {
    return isSettledAt(gpsWeek, this.now());
  }

  async fetchWeek(gpsWeek: number): Promise<string[]> {
    const cacheable = this.isCacheable(gpsWeek);

    if (cacheable) {
      const cached = getCachedListing(gpsWeek);
      const fetchedAt = cached
        ? DateTime.fromISO(cached.fetchedAt, { zone: "utc" })
        : null;
      if (cached && fetchedAt?.isValid && isSettledAt(gpsWeek, fetchedAt)) {
        logger.debug("Listing cache hit", {
          gpsWeek,
          fetchedAt: cached.fetchedAt,
        });
        return cached.lines;
      }
      if (cached) {
        logger.debug("Cached listing predates settling, refetching", {
          gpsWeek,
          fetchedAt: cached.fetchedAt,
        });
      }
    }

    const lines = await this.inner.fetchWeek(gpsWeek);

    if (cacheable) {
      upsertCachedListing(gpsWeek, lines, this.now().toISO() ?? undefined);
      logger.debug("Listing cached", { gpsWeek, lines: lines.length });
    }

    return lines;
  }
}
