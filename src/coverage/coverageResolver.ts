/**
 * Coverage resolver
 *
 * Decides which (center, project, solution) combinations cover a time
 * window completely. Two passes:
 *
 * 1. Upper bound: a combination is a candidate only if at least one of its
 *    records reaches the window end (endValidity + duration >= end).
 * 2. Lower bound: every distinct endValidity epoch of the candidate settled
 *    at or before the window start must carry all required categories. One
 *    incomplete epoch disqualifies the whole combination.
 *
 * A candidate with no settled epochs passes the lower bound vacuously
 * ("no_settled_epochs").
 */

import { DateTime } from "luxon";
import type {
  CoverageRejection,
  CoverageResolution,
  CoverageResult,
  LowerBoundOutcome,
  ProductCombination,
  ProductIdentity,
  ProductRecord,
  TimeWindow,
} from "@/types";
import {
  ProductCatalog,
  groupRecordsByIdentity,
  identityKey,
  toIdentity,
} from "@/products/productCatalog";
import * as logger from "@/logger";

/**
 * Upper-bound pass: distinct identities with a record reaching window.end,
 * in order of first appearance.
 */
export function findUpperBoundCandidates(
  catalog: ProductCatalog,
  window: TimeWindow,
): ProductIdentity[] {
  const candidates = new Map<string, ProductIdentity>();
  for (const record of catalog.recordsCoveringOrPast(window.end)) {
    const key = identityKey(record);
    if (!candidates.has(key)) {
      candidates.set(key, toIdentity(record));
    }
  }
  return [...candidates.values()];
}

/**
 * Check that every settled epoch among the records carries all required
 * categories. Epochs are inspected in chronological order so the reported
 * failure is the earliest one.
 */
export function evaluateSettledEpochs(
  settledRecords: readonly ProductRecord[],
  requiredCategories: Iterable<string>,
): LowerBoundOutcome {
  const categoriesByEpoch = new Map<number, Set<string>>();
  for (const record of settledRecords) {
    const epoch = record.endValidity.toMillis();
    const categories = categoriesByEpoch.get(epoch);
    if (categories) {
      categories.add(record.fileCategory);
    } else {
      categoriesByEpoch.set(epoch, new Set([record.fileCategory]));
    }
  }

  if (categoriesByEpoch.size === 0) {
    return { valid: true, reason: "no_settled_epochs", epochsChecked: 0 };
  }

  const required = [...new Set(requiredCategories)].sort();
  const epochs = [...categoriesByEpoch.keys()].sort((a, b) => a - b);

  for (const epoch of epochs) {
    const present = categoriesByEpoch.get(epoch) ?? new Set<string>();
    const missing = required.filter((category) => !present.has(category));
    if (missing.length > 0) {
      return {
        valid: false,
        reason: "missing_categories",
        epoch: DateTime.fromMillis(epoch, { zone: "utc" }),
        missing,
      };
    }
  }

  return { valid: true, reason: "complete", epochsChecked: epochs.length };
}

/**
 * Lower-bound pass for a single identity
 */
export function checkLowerBound(
  catalog: ProductCatalog,
  identity: ProductIdentity,
  window: TimeWindow,
  requiredCategories: Iterable<string>,
): LowerBoundOutcome {
  const key = identityKey(identity);
  const settled = catalog
    .recordsSettledBeforeOrAt(window.start)
    .filter((record) => identityKey(record) === key);
  return evaluateSettledEpochs(settled, requiredCategories);
}

function compareCombinations(
  a: ProductCombination,
  b: ProductCombination,
): number {
  if (a.projectType !== b.projectType) {
    return a.projectType < b.projectType ? -1 : 1;
  }
  if (a.solutionType !== b.solutionType) {
    return a.solutionType < b.solutionType ? -1 : 1;
  }
  return 0;
}

/**
 * Freeze accumulated combinations into a CoverageResult with sorted centers
 * and sorted (project, solution) lists.
 */
function toCoverageResult(
  accepted: Map<string, ProductCombination[]>,
): CoverageResult {
  const result = new Map<string, readonly ProductCombination[]>();
  for (const center of [...accepted.keys()].sort()) {
    const combinations = accepted.get(center) ?? [];
    result.set(center, [...combinations].sort(compareCombinations));
  }
  return result;
}

/**
 * Resolve which combinations fully cover the window.
 *
 * "no_coverage" is a normal outcome: the caller may retry with a wider
 * window or a different category set.
 *
 * @param catalog - Catalog built from the listing weeks spanning the window
 * @param window - Requested window (start <= end)
 * @param requiredCategories - Categories every settled epoch must provide
 */
export function resolveCoverage(
  catalog: ProductCatalog,
  window: TimeWindow,
  requiredCategories: Iterable<string>,
): CoverageResolution {
  const required = [...new Set(requiredCategories)];
  const candidates = findUpperBoundCandidates(catalog, window);

  logger.debug("Upper-bound pass complete", {
    catalogSize: catalog.size,
    candidates: candidates.length,
  });

  if (candidates.length === 0) {
    return {
      status: "no_coverage",
      reason: "no_upper_bound_candidates",
      catalogSize: catalog.size,
      rejections: [],
    };
  }

  const settledByIdentity = groupRecordsByIdentity(
    catalog.recordsSettledBeforeOrAt(window.start),
  );
  const accepted = new Map<string, ProductCombination[]>();
  const rejections: CoverageRejection[] = [];

  for (const candidate of candidates) {
    const outcome = evaluateSettledEpochs(
      settledByIdentity.get(identityKey(candidate)) ?? [],
      required,
    );

    if (!outcome.valid) {
      rejections.push({
        identity: candidate,
        epoch: outcome.epoch,
        missing: outcome.missing,
      });
      continue;
    }

    const combination: ProductCombination = {
      projectType: candidate.projectType,
      solutionType: candidate.solutionType,
    };
    const combinations = accepted.get(candidate.analysisCenter);
    if (combinations) {
      combinations.push(combination);
    } else {
      accepted.set(candidate.analysisCenter, [combination]);
    }
  }

  logger.debug("Lower-bound pass complete", {
    accepted: candidates.length - rejections.length,
    rejected: rejections.length,
  });

  if (accepted.size === 0) {
    return {
      status: "no_coverage",
      reason: "all_candidates_have_gaps",
      catalogSize: catalog.size,
      rejections,
    };
  }

  return {
    status: "covered",
    coverage: toCoverageResult(accepted),
    rejections,
  };
}

/**
 * Build a catalog from raw listing lines and resolve coverage in one call
 */
export function resolveCoverageFromLines(
  lines: Iterable<string>,
  window: TimeWindow,
  requiredCategories: Iterable<string>,
): CoverageResolution {
  return resolveCoverage(ProductCatalog.build(lines), window, requiredCategories);
}

/**
 * Plain-object view of a coverage result: { COD: [["MGX", "FIN"]] }
 */
export function coverageToPlainObject(
  coverage: CoverageResult,
): Record<string, Array<[string, string]>> {
  const plain: Record<string, Array<[string, string]>> = {};
  for (const [center, combinations] of coverage) {
    plain[center] = combinations.map(
      (combination): [string, string] => [
        combination.projectType,
        combination.solutionType,
      ],
    );
  }
  return plain;
}
