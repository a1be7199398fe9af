/**
 * Flat listing files
 *
 * A listing file holds one "<filename> <optional metadata>" entry per line,
 * with no header or footer. It is used to replay a recorded listing instead
 * of querying the archive.
 */

import { mkdir, readFile, writeFile } from "fs/promises";
import { dirname } from "path";
import type { ListingProvider } from "@/interfaces";
import { LISTING_FILE_TIMESTAMP_FORMAT } from "@/constants";
import { parseProductLine } from "@/products/filenameParser";
import * as logger from "@/logger";

/**
 * Split file content into non-blank lines
 */
export function splitListingLines(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Serves the same recorded lines for every week.
 */
export class FileListingProvider implements ListingProvider {
  readonly name = "file";

  constructor(private readonly filePath: string) {}

  async fetchWeek(gpsWeek: number): Promise<string[]> {
    const content = await readFile(this.filePath, "utf-8");
    const lines = splitListingLines(content);

    logger.debug("Listing file read", {
      gpsWeek,
      filePath: this.filePath,
      lines: lines.length,
    });

    return lines;
  }
}

/**
 * Render listing entries as file lines: product filenames only, first
 * occurrence kept, each followed by its end validity.
 *
 * @example
 * renderListingFile(["COD0MGXFIN_20250960000_01D_01D_OSB.CLK 63KB", "README"]);
 * // "COD0MGXFIN_20250960000_01D_01D_OSB.CLK 2025-04-06 00:00:00\n"
 */
export function renderListingFile(entries: Iterable<string>): string {
  const seen = new Set<string>();
  const lines: string[] = [];

  for (const entry of entries) {
    const record = parseProductLine(entry);
    if (!record || seen.has(record.rawName)) {
      continue;
    }
    seen.add(record.rawName);
    lines.push(
      `${record.rawName} ${record.endValidity.toFormat(LISTING_FILE_TIMESTAMP_FORMAT)}`,
    );
  }

  return lines.map((line) => `${line}\n`).join("");
}

/**
 * Write a listing file for later replay
 *
 * @returns Number of lines written
 */
export async function writeListingFile(
  filePath: string,
  entries: Iterable<string>,
): Promise<number> {
  const content = renderListingFile(entries);
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, content, "utf-8");
  return splitListingLines(content).length;
}
