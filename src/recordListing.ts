/**
 * Listing recorder: writes the archive listing of a window to a flat file
 *
 * Usage:
 *   npm run record-listing -- <start> <end> <outputFile>
 *
 * The file can be replayed later with LISTING_FILE=<outputFile>.
 */

import "dotenv/config";
import { loadAppConfig } from "./config";
import {
  ArchiveListingProvider,
  fetchWeekListings,
  writeListingFile,
} from "./listing";
import { gpsWeekRange, parseTimeWindow } from "./time";
import * as logger from "./logger";

async function main(): Promise<number> {
  const [startText, endText, outputFile] = process.argv.slice(2);
  if (!startText || !endText || !outputFile) {
    console.error("Usage: record-listing <start> <end> <outputFile>");
    return 2;
  }

  const config = loadAppConfig();
  const weeks = gpsWeekRange(parseTimeWindow(startText, endText));
  const provider = new ArchiveListingProvider({
    baseUrl: config.archiveBaseUrl,
    timeoutMs: config.listingTimeoutMs,
    maxAttempts: config.listingMaxAttempts,
  });

  const batch = await fetchWeekListings(provider, weeks, {
    concurrency: config.listingConcurrency,
  });
  const written = await writeListingFile(outputFile, batch.lines);

  logger.info("Listing recorded", {
    outputFile,
    weeks,
    failedWeeks: batch.failedWeeks,
    written,
  });

  return batch.failedWeeks.length > 0 ? 1 : 0;
}

main()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    logger.error("Fatal error", {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exitCode = 1;
  });
