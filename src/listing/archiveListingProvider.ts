/**
 * ArchiveListingProvider: reads week directory pages of the product archive
 */

import type { ListingProvider } from "@/interfaces";
import type { HttpRequestFn } from "@/types";
import { httpRequest as defaultHttpRequest } from "@/clients/http";
import {
  DEFAULT_ARCHIVE_BASE_URL,
  DEFAULT_LISTING_TIMEOUT_MS,
  DEFAULT_LISTING_MAX_ATTEMPTS,
  LISTING_HEADERS,
} from "@/constants";
import { extractArchiveItemNames } from "./archiveAnchors";
import * as logger from "@/logger";

export interface ArchiveListingProviderConfig {
  /** Archive root; week pages live at `${baseUrl}/${week}/` */
  baseUrl?: string;
  timeoutMs?: number;
  maxAttempts?: number;
  /**
   * Optional HTTP request function (for testing/mocking)
   * Defaults to production httpRequest implementation
   */
  httpRequest?: HttpRequestFn;
}

export class ArchiveListingProvider implements ListingProvider {
  readonly name = "archive";

  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly httpRequest: HttpRequestFn;

  constructor(config?: ArchiveListingProviderConfig) {
    this.baseUrl = (config?.baseUrl ?? DEFAULT_ARCHIVE_BASE_URL).replace(
      /\/+$/,
      "",
    );
    this.timeoutMs = config?.timeoutMs ?? DEFAULT_LISTING_TIMEOUT_MS;
    this.maxAttempts = config?.maxAttempts ?? DEFAULT_LISTING_MAX_ATTEMPTS;
    this.httpRequest = config?.httpRequest ?? defaultHttpRequest;
  }

  weekUrl(gpsWeek: number): string {
    return `${this.baseUrl}/${gpsWeek}/`;
  }

  /**
   * Fetch the week page and return the names of the files it lists
   *
   * @throws {HttpError} On non-2xx status after retries
   */
  async fetchWeek(gpsWeek: number): Promise<string[]> {
    const url = this.weekUrl(gpsWeek);
    const response = await this.httpRequest({
      method: "GET",
      url,
      headers: LISTING_HEADERS,
      timeoutMs: this.timeoutMs,
      retry: { maxAttempts: this.maxAttempts },
    });

    const names = extractArchiveItemNames(response.body);

    logger.debug("Archive week listing fetched", {
      gpsWeek,
      url,
      entries: names.length,
    });

    return names;
  }
}
