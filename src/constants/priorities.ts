/**
 * Priority table constants
 */

import type { PriorityTable } from "@/types";

/**
 * Default preference order: multi-GNSS project; final before rapid before ultra-rapid.
 *
 * Used when no priority file is configured. Always passed to the selector
 * explicitly, never read from here by the selector itself.
 */
export const DEFAULT_PRIORITY_TABLE: PriorityTable = {
  projectTypes: ["MGX"],
  solutionTypes: ["FIN", "RAP", "ULT"],
};

/**
 * Path to the priority table JSON file, relative to the working directory
 */
export const PRIORITY_CONFIG_PATH = "data/priorities.json";

/**
 * Length of every project/solution type code
 */
export const PRODUCT_CODE_LENGTH = 3;
