/**
 * Priority selector
 *
 * Picks the preferred (project, solution) combination of one analysis
 * center. Project-type priority is evaluated outermost: a lower-ranked
 * solution under a higher-ranked project wins over a higher-ranked
 * solution under a lower-ranked project.
 */

import type {
  CoverageResult,
  PriorityTable,
  PrioritySelection,
  ProductCombination,
} from "@/types";

/**
 * Select the first combination present, walking project types then
 * solution types in priority order.
 *
 * @returns "no_preference" when no listed pair is available
 */
export function selectOptimalCombination(
  combinations: readonly ProductCombination[],
  priorities: PriorityTable,
): PrioritySelection {
  for (const projectType of priorities.projectTypes) {
    const available = new Set(
      combinations
        .filter((combination) => combination.projectType === projectType)
        .map((combination) => combination.solutionType),
    );

    for (const solutionType of priorities.solutionTypes) {
      if (available.has(solutionType)) {
        return { status: "selected", projectType, solutionType };
      }
    }
  }

  return { status: "no_preference" };
}

/**
 * Select the preferred combination of a named center.
 * A center absent from the coverage has no preference.
 */
export function selectOptimalForCenter(
  coverage: CoverageResult,
  analysisCenter: string,
  priorities: PriorityTable,
): PrioritySelection {
  const combinations = coverage.get(analysisCenter);
  if (!combinations) {
    return { status: "no_preference" };
  }
  return selectOptimalCombination(combinations, priorities);
}
