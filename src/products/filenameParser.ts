/**
 * Product filename parser
 *
 * Decodes one raw listing line ("<filename> <optional metadata>") into a
 * ProductRecord. Lines that do not follow the product filename grammar are
 * rejected with null; the parser never throws.
 */

import { Duration } from "luxon";
import type { ProductFilenameFields, ProductRecord } from "@/types";
import {
  PRODUCT_FILENAME_PATTERN,
  PRODUCT_FILENAME_PADDING,
  DEFAULT_DURATION_UNIT,
  DEFAULT_SAMPLE_RATE,
  DEFAULT_CONTENT_TAG,
} from "@/constants";
import {
  parseProductTimestamp,
  formatProductTimestamp,
} from "@/time/productTimestamp";

/**
 * First whitespace-delimited token of a listing line, or null for blank lines
 */
export function extractFilename(rawLine: string): string | null {
  const [filename] = rawLine.trim().split(/\s+/);
  return filename ? filename : null;
}

/**
 * Parse one listing line into a product record.
 *
 * The duration value is read as a count of days whatever its unit letter;
 * the unit is kept on the record as written.
 *
 * @param rawLine - e.g. "COD0MGXFIN_20250960000_01D_01D_OSB.BIA.gz 2025:04:17 10:38:56 63.19KB"
 * @returns Parsed record, or null when the line is not a product filename
 */
export function parseProductLine(rawLine: string): ProductRecord | null {
  const filename = extractFilename(rawLine);
  if (!filename) {
    return null;
  }

  const match = PRODUCT_FILENAME_PATTERN.exec(filename);
  if (!match) {
    return null;
  }

  const [
    ,
    analysisCenter,
    projectType,
    solutionType,
    endValidityText,
    durationValue,
    durationUnit,
    sampleRateValue,
    sampleRateUnit,
    fileCategory,
  ] = match;

  const endValidity = parseProductTimestamp(endValidityText);
  if (!endValidity) {
    return null;
  }

  const durationDays = parseInt(durationValue, 10);

  return {
    analysisCenter,
    projectType,
    solutionType,
    endValidity,
    duration: Duration.fromObject({ days: durationDays }),
    durationField: { value: durationDays, unit: durationUnit },
    sampleRate: { value: parseInt(sampleRateValue, 10), unit: sampleRateUnit },
    fileCategory,
    rawName: filename,
  };
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Build a grammar-conforming product filename from record fields.
 *
 * @example
 * formatProductFilename({
 *   analysisCenter: "COD", projectType: "MGX", solutionType: "FIN",
 *   endValidity: DateTime.utc(2025, 4, 6), durationDays: 1, fileCategory: "CLK",
 * }); // "COD0MGXFIN_20250960000_01D_01D_OSB.CLK"
 */
export function formatProductFilename(fields: ProductFilenameFields): string {
  const sampleRate = fields.sampleRate ?? DEFAULT_SAMPLE_RATE;
  const durationUnit = fields.durationUnit ?? DEFAULT_DURATION_UNIT;
  const contentTag = fields.contentTag ?? DEFAULT_CONTENT_TAG;

  const name =
    `${fields.analysisCenter}${PRODUCT_FILENAME_PADDING}${fields.projectType}${fields.solutionType}` +
    `_${formatProductTimestamp(fields.endValidity)}` +
    `_${pad2(fields.durationDays)}${durationUnit}` +
    `_${pad2(sampleRate.value)}${sampleRate.unit}` +
    `_${contentTag}.${fields.fileCategory}`;

  return fields.extension ? `${name}.${fields.extension}` : name;
}
