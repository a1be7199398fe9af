/**
 * Resolver command: resolves a window and logs the coverage and the preferred
 * combination of each requested center.
 */

import { loadAppConfig, loadPriorityTable } from "@/config";
import { createListingProvider } from "@/listing/createListingProvider";
import {
  coverageToPlainObject,
  listAnalysisCenters,
  selectOptimalForCenter,
} from "@/coverage";
import { openDb, closeDb, migrateDb, resolveDbPath } from "@/db";
import * as logger from "@/logger";
import { resolveProducts } from "./resolveProducts";

export const RESOLVER_USAGE =
  "Usage: main <start YYYY-MM-DD_HH:mm:ss> <end YYYY-MM-DD_HH:mm:ss> [analysisCenter]";

/**
 * Run the resolver for command-line arguments.
 *
 * The listing cache database is opened (and migrated) only when the cache is
 * enabled and no listing file is replayed; it is closed on every exit path.
 *
 * @param args - `<start> <end> [analysisCenter]`
 * @returns Exit code: 0 covered, 1 no coverage, 2 usage error
 */
export async function runResolver(
  args: readonly string[],
  env: Record<string, string | undefined> = process.env,
): Promise<number> {
  const [startText, endText, centerArg] = args;
  if (!startText || !endText) {
    console.error(RESOLVER_USAGE);
    return 2;
  }

  const config = loadAppConfig(env);
  const priorities = loadPriorityTable(config.priorityConfigPath);

  try {
    if (config.listingCacheEnabled && !config.listingFilePath) {
      migrateDb(openDb(resolveDbPath(env)));
    }

    const report = await resolveProducts({
      startText,
      endText,
      requiredCategories: config.requiredCategories,
      provider: createListingProvider(config),
      concurrency: config.listingConcurrency,
    });

    if (report.resolution.status === "no_coverage") {
      logger.warn(
        "No product available for the selected window - try widening it",
        { reason: report.resolution.reason },
      );
      return 1;
    }

    const coverage = report.resolution.coverage;
    logger.info("Valid product combinations", {
      coverage: coverageToPlainObject(coverage),
    });

    const centers = centerArg
      ? [centerArg.toUpperCase()]
      : listAnalysisCenters(coverage);
    for (const center of centers) {
      const selection = selectOptimalForCenter(coverage, center, priorities);
      if (selection.status === "selected") {
        logger.info("Preferred combination", {
          analysisCenter: center,
          projectType: selection.projectType,
          solutionType: selection.solutionType,
        });
      } else {
        logger.info("No preferred combination", { analysisCenter: center });
      }
    }

    return 0;
  } finally {
    closeDb();
  }
}
