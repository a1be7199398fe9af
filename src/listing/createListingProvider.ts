/**
 * Listing provider selection from configuration
 */

import type { ListingProvider } from "@/interfaces";
import type { AppConfig } from "@/types";
import { ArchiveListingProvider } from "./archiveListingProvider";
import { FileListingProvider } from "./fileListingProvider";
import { CachedListingProvider } from "./cachedListingProvider";

/**
 * Recorded file when LISTING_FILE is set, otherwise the archive, wrapped in
 * the SQLite cache when enabled. The cache needs an open database.
 */
export function createListingProvider(config: AppConfig): ListingProvider {
  if (config.listingFilePath) {
    return new FileListingProvider(config.listingFilePath);
  }

  const archive = new ArchiveListingProvider({
    baseUrl: config.archiveBaseUrl,
    timeoutMs: config.listingTimeoutMs,
    maxAttempts: config.listingMaxAttempts,
  });

  return config.listingCacheEnabled
    ? new CachedListingProvider(archive)
    : archive;
}
