/**
 * Product catalog
 *
 * Immutable in-memory table of parsed product records, built from a batch
 * of raw listing lines. Rebuilding means constructing a new catalog.
 */

import type { DateTime } from "luxon";
import type { ProductIdentity, ProductRecord } from "@/types";
import { IDENTITY_KEY_SEPARATOR } from "@/constants";
import { parseProductLine } from "./filenameParser";
import * as logger from "@/logger";

/**
 * Map key for a product identity ("COD|MGX|FIN")
 */
export function identityKey(identity: ProductIdentity): string {
  return [
    identity.analysisCenter,
    identity.projectType,
    identity.solutionType,
  ].join(IDENTITY_KEY_SEPARATOR);
}

/**
 * Inverse of identityKey. Returns null for keys not made of three parts.
 */
export function parseIdentityKey(key: string): ProductIdentity | null {
  const parts = key.split(IDENTITY_KEY_SEPARATOR);
  if (parts.length !== 3) {
    return null;
  }
  const [analysisCenter, projectType, solutionType] = parts;
  return { analysisCenter, projectType, solutionType };
}

/**
 * Strip a record down to its identity codes
 */
export function toIdentity(record: ProductIdentity): ProductIdentity {
  return {
    analysisCenter: record.analysisCenter,
    projectType: record.projectType,
    solutionType: record.solutionType,
  };
}

/**
 * Group records by identity key, keeping insertion order inside each group
 */
export function groupRecordsByIdentity(
  records: readonly ProductRecord[],
): Map<string, ProductRecord[]> {
  const groups = new Map<string, ProductRecord[]>();
  for (const record of records) {
    const key = identityKey(record);
    const group = groups.get(key);
    if (group) {
      group.push(record);
    } else {
      groups.set(key, [record]);
    }
  }
  return groups;
}

/**
 * Instant up to which a record's data reaches (endValidity + duration)
 */
export function coverageEnd(record: ProductRecord): DateTime {
  return record.endValidity.plus(record.duration);
}

export class ProductCatalog {
  /** Accepted records in insertion order */
  readonly records: readonly ProductRecord[];
  /** Lines dropped because they were not product filenames */
  readonly rejectedCount: number;

  private constructor(records: ProductRecord[], rejectedCount: number) {
    this.records = Object.freeze(records);
    this.rejectedCount = rejectedCount;
    Object.freeze(this);
  }

  /**
   * Parse every line and keep the ones that are product filenames.
   *
   * An empty batch yields an empty catalog.
   */
  static build(rawLines: Iterable<string>): ProductCatalog {
    const records: ProductRecord[] = [];
    let rejected = 0;

    for (const line of rawLines) {
      const record = parseProductLine(line);
      if (record) {
        records.push(record);
      } else {
        rejected++;
      }
    }

    logger.debug("Product catalog built", {
      accepted: records.length,
      rejected,
    });

    return new ProductCatalog(records, rejected);
  }

  get size(): number {
    return this.records.length;
  }

  /**
   * Records grouped by (center, project, solution)
   */
  groupByIdentity(): Map<string, ProductRecord[]> {
    return groupRecordsByIdentity(this.records);
  }

  /**
   * Records whose data reaches the instant: endValidity + duration >= instant
   */
  recordsCoveringOrPast(instant: DateTime): ProductRecord[] {
    const target = instant.toMillis();
    return this.records.filter(
      (record) => coverageEnd(record).toMillis() >= target,
    );
  }

  /**
   * Records settled at or before the instant: endValidity <= instant
   */
  recordsSettledBeforeOrAt(instant: DateTime): ProductRecord[] {
    const target = instant.toMillis();
    return this.records.filter(
      (record) => record.endValidity.toMillis() <= target,
    );
  }
}
