/**
 * HTTP client type definitions
 */

export type HttpMethod = "GET" | "HEAD";

/**
 * Retry configuration for HTTP requests
 */
export interface HttpRetryConfig {
  /** Maximum number of attempts (including initial request). Default from constants. */
  maxAttempts?: number;
  /** Base delay in ms for exponential backoff. Default from constants. */
  baseDelayMs?: number;
  /** Maximum delay in ms between retries. Default from constants. */
  maxDelayMs?: number;
  /** Maximum time in ms to wait for Retry-After header. Default from constants. */
  maxRetryAfterMs?: number;
}

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  timeoutMs?: number;
  retry?: HttpRetryConfig;
}

/**
 * Successful (2xx) response with its body read as text
 */
export interface HttpTextResponse {
  status: number;
  url: string;
  contentType: string | null;
  body: string;
}

export interface HttpErrorDetails {
  status: number;
  statusText: string;
  url: string;
  bodySnippet?: string;
  headers?: Headers;
}

/**
 * HTTP request function type for dependency injection
 */
export type HttpRequestFn = (req: HttpRequest) => Promise<HttpTextResponse>;
