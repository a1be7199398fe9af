/**
 * Product resolution pipeline
 *
 * window text → GPS weeks → listing lines → catalog → coverage.
 * The window is validated before any listing is fetched.
 */

import type { ListingProvider } from "@/interfaces";
import type { CoverageResolution, TimeWindow } from "@/types";
import { parseTimeWindow } from "@/time/timeWindow";
import { gpsWeekRange } from "@/time/gpsWeek";
import { fetchWeekListings } from "@/listing/fetchWeekListings";
import { ProductCatalog } from "@/products/productCatalog";
import { resolveCoverage } from "@/coverage/coverageResolver";
import * as logger from "@/logger";

export type ResolveProductsOptions = {
  /** Window start, "YYYY-MM-DD_HH:mm:ss" (UTC) */
  startText: string;
  /** Window end, "YYYY-MM-DD_HH:mm:ss" (UTC) */
  endText: string;
  /** File categories every settled epoch must provide */
  requiredCategories: readonly string[];
  provider: ListingProvider;
  /** Weeks fetched at the same time */
  concurrency?: number;
};

export type ProductResolutionReport = {
  window: TimeWindow;
  /** GPS weeks whose listings were requested */
  weeks: number[];
  /** Weeks whose listing could not be fetched */
  failedWeeks: number[];
  /** Listing lines received */
  lineCount: number;
  /** Records accepted into the catalog */
  catalogSize: number;
  /** Listing lines that were not product filenames */
  rejectedCount: number;
  resolution: CoverageResolution;
};

/**
 * Resolve covering product combinations for a window.
 *
 * @throws {TimeWindowFormatError} If a boundary cannot be parsed or the window is inverted
 */
export async function resolveProducts(
  options: ResolveProductsOptions,
): Promise<ProductResolutionReport> {
  const window = parseTimeWindow(options.startText, options.endText);
  const weeks = gpsWeekRange(window);
  const log = logger.withContext({
    start: window.start.toISO(),
    end: window.end.toISO(),
  });

  log.info("Resolving product coverage", {
    weeks,
    provider: options.provider.name,
    requiredCategories: options.requiredCategories,
  });

  const batch = await fetchWeekListings(options.provider, weeks, {
    concurrency: options.concurrency,
  });
  if (batch.failedWeeks.length > 0) {
    log.warn("Some week listings could not be fetched", {
      failedWeeks: batch.failedWeeks,
    });
  }

  const catalog = ProductCatalog.build(batch.lines);
  if (catalog.rejectedCount > 0) {
    log.debug("Listing lines rejected by the filename parser", {
      rejected: catalog.rejectedCount,
    });
  }

  const resolution = resolveCoverage(
    catalog,
    window,
    options.requiredCategories,
  );

  if (resolution.status === "covered") {
    log.info("Product coverage resolved", {
      centers: [...resolution.coverage.keys()],
      rejectedCandidates: resolution.rejections.length,
    });
  } else {
    log.warn("No valid product combination for the window", {
      reason: resolution.reason,
      catalogSize: resolution.catalogSize,
      rejectedCandidates: resolution.rejections.length,
    });
  }

  return {
    window,
    weeks,
    failedWeeks: batch.failedWeeks,
    lineCount: batch.lines.length,
    catalogSize: catalog.size,
    rejectedCount: catalog.rejectedCount,
    resolution,
  };
}
