/**
 * Priority table validation
 *
 * Validates the priority JSON structure and enforces invariants:
 * - Non-empty project and solution type lists
 * - Every code is a 3-character upper-case alphanumeric string
 * - No duplicate codes within a list
 *
 * Validation is fail-fast: throws on first error.
 */

import type { PriorityConfigRaw } from "@/types";
import { PRODUCT_CODE_LENGTH } from "@/constants";

/**
 * Error thrown when priority table validation fails.
 */
export class PriorityConfigValidationError extends Error {
  constructor(message: string) {
    super(`Priority config validation failed: ${message}`);
    this.name = "PriorityConfigValidationError";
  }
}

const PRODUCT_CODE_PATTERN = new RegExp(`^[A-Z0-9]{${PRODUCT_CODE_LENGTH}}$`);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validates that a value is a non-empty string.
 *
 * @param fieldPath - Field path for error messages (e.g., "version")
 */
function validateNonEmptyString(
  value: unknown,
  fieldPath: string,
): asserts value is string {
  if (typeof value !== "string") {
    throw new PriorityConfigValidationError(
      `${fieldPath} must be a string, got ${typeof value}`,
    );
  }
  if (value.trim().length === 0) {
    throw new PriorityConfigValidationError(
      `${fieldPath} cannot be empty or whitespace-only`,
    );
  }
}

/**
 * Validates an ordered list of product codes.
 *
 * @param fieldPath - Field path for error messages (e.g., "projectTypes")
 */
function validateCodeList(value: unknown, fieldPath: string): string[] {
  if (!Array.isArray(value)) {
    throw new PriorityConfigValidationError(
      `${fieldPath} must be an array, got ${typeof value}`,
    );
  }
  if (value.length === 0) {
    throw new PriorityConfigValidationError(`${fieldPath} cannot be empty`);
  }

  const seen = new Set<string>();
  const codes: string[] = [];
  value.forEach((code: unknown, index: number) => {
    validateNonEmptyString(code, `${fieldPath}[${index}]`);
    if (!PRODUCT_CODE_PATTERN.test(code)) {
      throw new PriorityConfigValidationError(
        `${fieldPath}[${index}] must be ${PRODUCT_CODE_LENGTH} upper-case letters or digits, got "${code}"`,
      );
    }
    if (seen.has(code)) {
      throw new PriorityConfigValidationError(
        `Duplicate code in ${fieldPath}: "${code}"`,
      );
    }
    seen.add(code);
    codes.push(code);
  });

  return codes;
}

/**
 * Validates raw priority data from JSON.
 *
 * @param raw - Parsed JSON value
 * @returns The validated config
 * @throws {PriorityConfigValidationError} On the first invalid field
 *
 * @example
 * const config = validatePriorityConfigRaw(JSON.parse(jsonString));
 */
export function validatePriorityConfigRaw(raw: unknown): PriorityConfigRaw {
  if (!isRecord(raw)) {
    throw new PriorityConfigValidationError("Priority config must be an object");
  }

  validateNonEmptyString(raw.version, "version");

  return {
    version: raw.version,
    projectTypes: validateCodeList(raw.projectTypes, "projectTypes"),
    solutionTypes: validateCodeList(raw.solutionTypes, "solutionTypes"),
  };
}
