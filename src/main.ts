/**
 * Resolver entrypoint: prints covering product combinations for a window
 *
 * Usage:
 *   npm start -- <start> <end> [analysisCenter]
 *   npm start -- 2025-07-05_00:00:00 2025-07-05_23:59:30 COD
 *
 * Without an analysis center, the preferred combination of every covered
 * center is reported.
 *
 * Environment variables: see src/config/appConfig.ts (LOG_LEVEL, DB_PATH,
 * ARCHIVE_BASE_URL, LISTING_*, REQUIRED_CATEGORIES, PRIORITY_CONFIG_PATH).
 */

import "dotenv/config";
import { runResolver } from "./resolution";
import * as logger from "./logger";

runResolver(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    logger.error("Fatal error", {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exitCode = 1;
  });
