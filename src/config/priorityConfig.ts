/**
 * Priority table loading
 *
 * Reads the priority JSON file, validates it and returns the table
 * consumed by the priority selector.
 */

import * as fs from "fs";
import * as path from "path";
import type { PriorityTable } from "@/types";
import { validatePriorityConfigRaw } from "@/utils/priorityConfigValidation";
import { PRIORITY_CONFIG_PATH } from "@/constants";
import * as logger from "@/logger";

/**
 * Loads the priority table from a JSON file.
 *
 * Fail-fast: a missing file, malformed JSON or an invalid table throws.
 *
 * @param configPath - Path relative to the working directory (or absolute)
 * @throws {Error} If the file cannot be read
 * @throws {SyntaxError} If JSON is malformed
 * @throws {PriorityConfigValidationError} If validation fails
 */
export function loadPriorityTable(
  configPath: string = PRIORITY_CONFIG_PATH,
): PriorityTable {
  const resolvedPath = path.resolve(process.cwd(), configPath);
  const jsonContent = fs.readFileSync(resolvedPath, "utf-8");
  const raw: unknown = JSON.parse(jsonContent);
  const validated = validatePriorityConfigRaw(raw);

  logger.debug("Priority table loaded", {
    path: resolvedPath,
    version: validated.version,
  });

  return {
    projectTypes: validated.projectTypes,
    solutionTypes: validated.solutionTypes,
  };
}
