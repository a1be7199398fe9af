/**
 * Product record type definitions
 *
 * Shapes produced by the filename parser and held by the product catalog.
 */

import type { DateTime, Duration } from "luxon";

/**
 * The three codes that identify one product line.
 */
export type ProductIdentity = {
  /** Analysis center code (e.g., "COD") */
  readonly analysisCenter: string;
  /** Project type code (e.g., "MGX") */
  readonly projectType: string;
  /** Solution type code (e.g., "FIN", "RAP", "ULT") */
  readonly solutionType: string;
};

/**
 * A 2-digit value plus unit letter as written in a product filename
 * (e.g., "01D" → { value: 1, unit: "D" })
 */
export type FilenameSpan = {
  readonly value: number;
  readonly unit: string;
};

/**
 * One parsed catalog entry.
 */
export type ProductRecord = ProductIdentity & {
  /** Last instant the file is authoritative for (UTC) */
  readonly endValidity: DateTime;
  /** How far past endValidity the file's data extends */
  readonly duration: Duration;
  /** Duration field exactly as written; only the value is interpreted (as days) */
  readonly durationField: FilenameSpan;
  /** Sample-rate field, kept for diagnostics only */
  readonly sampleRate: FilenameSpan;
  /** File content kind (e.g., "CLK", "BIA", "SP3") */
  readonly fileCategory: string;
  /** Original filename */
  readonly rawName: string;
};

/**
 * Fields needed to write a grammar-conforming product filename.
 */
export type ProductFilenameFields = ProductIdentity & {
  endValidity: DateTime;
  durationDays: number;
  /** Duration unit letter, defaults to "D" */
  durationUnit?: string;
  sampleRate?: FilenameSpan;
  /** Three ignored characters before the category (defaults to "OSB") */
  contentTag?: string;
  fileCategory: string;
  /** Optional compression extension (e.g., "gz") */
  extension?: string;
};
