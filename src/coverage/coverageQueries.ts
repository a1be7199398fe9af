/**
 * Read helpers over a coverage result
 */

import type { CoverageResult } from "@/types";

function uniqueSorted(values: string[]): string[] {
  return [...new Set(values)].sort();
}

/**
 * Analysis centers with at least one covering combination
 */
export function listAnalysisCenters(coverage: CoverageResult): string[] {
  return [...coverage.keys()].sort();
}

export function listProjectTypes(
  coverage: CoverageResult,
  analysisCenter: string,
): string[] {
  const combinations = coverage.get(analysisCenter) ?? [];
  return uniqueSorted(combinations.map((c) => c.projectType));
}

export function listSolutionTypes(
  coverage: CoverageResult,
  analysisCenter: string,
): string[] {
  const combinations = coverage.get(analysisCenter) ?? [];
  return uniqueSorted(combinations.map((c) => c.solutionType));
}

/**
 * Whether a user-chosen (center, project, solution) triple covers the window
 */
export function isValidCombination(
  coverage: CoverageResult,
  analysisCenter: string,
  projectType: string,
  solutionType: string,
): boolean {
  const combinations = coverage.get(analysisCenter) ?? [];
  return combinations.some(
    (c) => c.projectType === projectType && c.solutionType === solutionType,
  );
}
