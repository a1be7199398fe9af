/**
 * Application configuration from environment variables
 *
 * Environment variables:
 *   - ARCHIVE_BASE_URL: Product archive root (one directory per GPS week)
 *   - LISTING_TIMEOUT_MS: Per-request timeout for week listings
 *   - LISTING_MAX_ATTEMPTS: Attempts per week listing
 *   - LISTING_CONCURRENCY: Weeks fetched at the same time
 *   - LISTING_CACHE_ENABLED: Cache past-week listings in SQLite (true|false)
 *   - LISTING_FILE: Recorded listing file to replay instead of the archive
 *   - REQUIRED_CATEGORIES: Comma-separated file categories (e.g. CLK,BIA,SP3)
 *   - PRIORITY_CONFIG_PATH: Priority table JSON file
 *   - DB_PATH, LOG_LEVEL: read by the db and logger modules
 */

import type { AppConfig } from "@/types";
import {
  DEFAULT_ARCHIVE_BASE_URL,
  DEFAULT_LISTING_TIMEOUT_MS,
  DEFAULT_LISTING_MAX_ATTEMPTS,
  DEFAULT_LISTING_CONCURRENCY,
  DEFAULT_REQUIRED_CATEGORIES,
  PRIORITY_CONFIG_PATH,
} from "@/constants";

/**
 * Error thrown when an environment value cannot be used.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(`Configuration error: ${message}`);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string, fallback: string): string {
  const value = env[name]?.trim();
  return value ? value : fallback;
}

function readPositiveInt(env: Env, name: string, fallback: number): number {
  const value = env[name]?.trim();
  if (!value) {
    return fallback;
  }
  if (!/^\d+$/.test(value) || parseInt(value, 10) < 1) {
    throw new ConfigError(`${name} must be a positive integer, got "${value}"`);
  }
  return parseInt(value, 10);
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const value = env[name]?.trim().toLowerCase();
  if (!value) {
    return fallback;
  }
  if (value === "true" || value === "1") {
    return true;
  }
  if (value === "false" || value === "0") {
    return false;
  }
  throw new ConfigError(`${name} must be true or false, got "${value}"`);
}

/**
 * Parse a comma-separated category list ("CLK, bia,SP3" → ["CLK", "BIA", "SP3"])
 */
export function parseCategoryList(value: string): string[] {
  const categories = value
    .split(",")
    .map((category) => category.trim().toUpperCase())
    .filter((category) => category.length > 0);
  return [...new Set(categories)];
}

/**
 * Build the application config from an environment map.
 *
 * @param env - Defaults to process.env
 * @throws {ConfigError} If a value is present but invalid
 */
export function loadAppConfig(env: Env = process.env): AppConfig {
  const categoriesText = env.REQUIRED_CATEGORIES?.trim();
  const requiredCategories = categoriesText
    ? parseCategoryList(categoriesText)
    : [...DEFAULT_REQUIRED_CATEGORIES];
  if (requiredCategories.length === 0) {
    throw new ConfigError("REQUIRED_CATEGORIES lists no category");
  }

  const archiveBaseUrl = readString(
    env,
    "ARCHIVE_BASE_URL",
    DEFAULT_ARCHIVE_BASE_URL,
  ).replace(/\/+$/, "");
  if (!URL.canParse(archiveBaseUrl)) {
    throw new ConfigError(`ARCHIVE_BASE_URL is not a URL: "${archiveBaseUrl}"`);
  }

  return {
    archiveBaseUrl,
    listingTimeoutMs: readPositiveInt(
      env,
      "LISTING_TIMEOUT_MS",
      DEFAULT_LISTING_TIMEOUT_MS,
    ),
    listingMaxAttempts: readPositiveInt(
      env,
      "LISTING_MAX_ATTEMPTS",
      DEFAULT_LISTING_MAX_ATTEMPTS,
    ),
    listingConcurrency: readPositiveInt(
      env,
      "LISTING_CONCURRENCY",
      DEFAULT_LISTING_CONCURRENCY,
    ),
    listingCacheEnabled: readBoolean(env, "LISTING_CACHE_ENABLED", false),
    listingFilePath: env.LISTING_FILE?.trim() || null,
    requiredCategories,
    priorityConfigPath: readString(
      env,
      "PRIORITY_CONFIG_PATH",
      PRIORITY_CONFIG_PATH,
    ),
  };
}
