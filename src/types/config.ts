/**
 * Application configuration type definitions
 */

/**
 * Runtime configuration read from the environment
 */
export type AppConfig = {
  /** Base URL of the product archive (one directory per GPS week) */
  archiveBaseUrl: string;
  /** Per-request timeout for listing fetches */
  listingTimeoutMs: number;
  /** Attempts per listing fetch, including the first one */
  listingMaxAttempts: number;
  /** Number of weeks fetched at the same time */
  listingConcurrency: number;
  /** Whether fetched listings of settled weeks are cached in SQLite */
  listingCacheEnabled: boolean;
  /** Recorded listing file to replay instead of the archive (LISTING_FILE) */
  listingFilePath: string | null;
  /** File categories every settled epoch must provide */
  requiredCategories: string[];
  /** Path to the priority table JSON file */
  priorityConfigPath: string;
};

/**
 * Priority table JSON shape (deserialized from file)
 */
export type PriorityConfigRaw = {
  version: string;
  projectTypes: string[];
  solutionTypes: string[];
};
