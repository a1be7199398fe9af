/**
 * Archive directory page extraction
 *
 * Regex-based extraction of file names from the archive's HTML directory
 * pages. No DOM parsing: file entries are anchors carrying the archive item
 * class.
 */

import { ARCHIVE_ITEM_CLASS } from "@/constants";

const ANCHOR_OPEN_TAG_PATTERN = /<a\s+([^>]*)>/gi;
const HREF_ATTRIBUTE_PATTERN = /\bhref\s*=\s*["']([^"']+)["']/i;
const CLASS_ATTRIBUTE_PATTERN = /\bclass\s*=\s*["']([^"']*)["']/i;

function decodeName(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    // Malformed percent-escapes: keep the segment as written
    return segment;
  }
}

/**
 * Extract file names listed on an archive directory page.
 *
 * Keeps anchors whose class list contains the archive item class and whose
 * href is not a sub-directory (trailing "/"). Only the last path segment of
 * the href is returned, in page order, without duplicates.
 *
 * @param html - Raw directory page HTML
 * @returns File names, e.g. ["COD0MGXFIN_20250960000_01D_01D_OSB.BIA.gz"]
 */
export function extractArchiveItemNames(html: string): string[] {
  const names: string[] = [];
  const seen = new Set<string>();

  let match: RegExpExecArray | null;
  ANCHOR_OPEN_TAG_PATTERN.lastIndex = 0;
  while ((match = ANCHOR_OPEN_TAG_PATTERN.exec(html)) !== null) {
    const attributes = match[1];

    const classMatch = CLASS_ATTRIBUTE_PATTERN.exec(attributes);
    if (!classMatch || !classMatch[1].split(/\s+/).includes(ARCHIVE_ITEM_CLASS)) {
      continue;
    }

    const hrefMatch = HREF_ATTRIBUTE_PATTERN.exec(attributes);
    if (!hrefMatch) {
      continue;
    }

    const href = hrefMatch[1].trim();
    if (href.length === 0 || href.endsWith("/")) {
      continue;
    }

    const pathOnly = href.split(/[?#]/)[0];
    const segment = pathOnly.substring(pathOnly.lastIndexOf("/") + 1);
    const name = decodeName(segment);
    if (name && !seen.has(name)) {
      seen.add(name);
      names.push(name);
    }
  }

  return names;
}
