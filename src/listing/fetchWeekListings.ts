/**
 * Parallel week listing fetch
 *
 * Fixed-size worker pool keyed by week: worker i fetches weeks i, i + n,
 * i + 2n, ... and returns its own results. Results are merged in requested
 * week order only after every worker has finished.
 */

import type { ListingProvider } from "@/interfaces";
import type {
  FetchWeekListingsOptions,
  WeekListingBatch,
  WeekListingResult,
} from "@/types";
import { DEFAULT_LISTING_CONCURRENCY } from "@/constants";
import * as logger from "@/logger";

type IndexedResult = {
  index: number;
  result: WeekListingResult;
};

/**
 * Fetch one week, turning a provider failure into an "error" result
 */
async function fetchOneWeek(
  provider: ListingProvider,
  gpsWeek: number,
): Promise<WeekListingResult> {
  try {
    const lines = await provider.fetchWeek(gpsWeek);
    return { status: "ok", gpsWeek, lines };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn("Week listing fetch failed", {
      provider: provider.name,
      gpsWeek,
      error: message,
    });
    return { status: "error", gpsWeek, message };
  }
}

async function runWorker(
  provider: ListingProvider,
  weeks: readonly number[],
  workerIndex: number,
  workerCount: number,
): Promise<IndexedResult[]> {
  const results: IndexedResult[] = [];
  for (let index = workerIndex; index < weeks.length; index += workerCount) {
    results.push({ index, result: await fetchOneWeek(provider, weeks[index]) });
  }
  return results;
}

/**
 * Fetch the listings of several weeks and concatenate them in week order.
 *
 * A line already seen earlier in the batch is skipped, so a provider
 * that serves the same listing for every week (a replayed file) counts each
 * line once.
 *
 * A failed week contributes no lines and is reported in failedWeeks.
 *
 * @param weeks - GPS weeks, in the order their lines should be concatenated
 */
export async function fetchWeekListings(
  provider: ListingProvider,
  weeks: readonly number[],
  options: FetchWeekListingsOptions = {},
): Promise<WeekListingBatch> {
  if (weeks.length === 0) {
    return { lines: [], weeks: [], failedWeeks: [] };
  }

  const concurrency = options.concurrency ?? DEFAULT_LISTING_CONCURRENCY;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(
      `concurrency must be a positive integer, got ${concurrency}`,
    );
  }
  const workerCount = Math.min(concurrency, weeks.length);

  const workerOutputs = await Promise.all(
    Array.from({ length: workerCount }, (_, workerIndex) =>
      runWorker(provider, weeks, workerIndex, workerCount),
    ),
  );

  const ordered = workerOutputs
    .flat()
    .sort((a, b) => a.index - b.index)
    .map((entry) => entry.result);

  const lines: string[] = [];
  const seen = new Set<string>();
  const failedWeeks: number[] = [];
  for (const result of ordered) {
    if (result.status === "ok") {
      for (const line of result.lines) {
        if (!seen.has(line)) {
          seen.add(line);
          lines.push(line);
        }
      }
    } else {
      failedWeeks.push(result.gpsWeek);
    }
  }

  logger.debug("Week listings fetched", {
    provider: provider.name,
    weeks: weeks.length,
    workers: workerCount,
    lines: lines.length,
    failedWeeks,
  });

  return { lines, weeks: ordered, failedWeeks };
}
