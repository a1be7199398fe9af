/**
 * Coverage resolution type definitions
 */

import type { DateTime } from "luxon";
import type { ProductIdentity } from "./products";

/**
 * Requested observation window (start <= end)
 */
export type TimeWindow = {
  readonly start: DateTime;
  readonly end: DateTime;
};

/**
 * A (project type, solution type) pair offered by one analysis center
 */
export type ProductCombination = {
  readonly projectType: string;
  readonly solutionType: string;
};

/**
 * Analysis center → covering combinations, sorted by project then solution type
 */
export type CoverageResult = ReadonlyMap<string, readonly ProductCombination[]>;

/**
 * Outcome of the lower-bound (gap) check for one candidate.
 *
 * "no_settled_epochs" is the vacuous case: the candidate has no records
 * settled at or before the window start, so nothing can disqualify it.
 */
export type LowerBoundOutcome =
  | {
      valid: true;
      reason: "complete" | "no_settled_epochs";
      /** Number of distinct settled epochs inspected */
      epochsChecked: number;
    }
  | {
      valid: false;
      reason: "missing_categories";
      /** First epoch (chronologically) found incomplete */
      epoch: DateTime;
      /** Required categories absent at that epoch, sorted */
      missing: string[];
    };

/**
 * A candidate that reached the window end but failed the gap check
 */
export type CoverageRejection = {
  identity: ProductIdentity;
  epoch: DateTime;
  missing: string[];
};

export type NoCoverageReason =
  | "no_upper_bound_candidates"
  | "all_candidates_have_gaps";

/**
 * Result of resolving coverage for a window
 */
export type CoverageResolution =
  | {
      status: "covered";
      coverage: CoverageResult;
      /** Candidates dropped by the gap check */
      rejections: CoverageRejection[];
    }
  | {
      /** No analysis center has a gap-free combination for the window */
      status: "no_coverage";
      reason: NoCoverageReason;
      /** Number of records in the catalog that was searched */
      catalogSize: number;
      rejections: CoverageRejection[];
    };

/**
 * Ordered preference lists consulted by the priority selector
 */
export type PriorityTable = {
  readonly projectTypes: readonly string[];
  readonly solutionTypes: readonly string[];
};

/**
 * Result of picking the preferred combination for one analysis center
 */
export type PrioritySelection =
  | {
      status: "selected";
      projectType: string;
      solutionType: string;
    }
  | {
      /** No combination in the priority lists is available */
      status: "no_preference";
    };
