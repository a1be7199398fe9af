/**
 * Mock HTTP harness for offline tests
 *
 * Provides a controllable stand-in for httpRequest that:
 * - Returns registered text bodies for method+url routes
 * - Throws HttpError for non-2xx replies
 * - Throws loudly on unmocked requests (prevents accidental real calls)
 *
 * Usage:
 *   const mock = createMockHttp();
 *   mock.on("GET", "https://archive.test/products/2361/", html);
 *   const provider = new ArchiveListingProvider({ httpRequest: mock.request });
 */

import type { HttpRequest, HttpTextResponse } from "@/types";
import { HttpError } from "@/clients/http";
import { readFileSync } from "fs";
import { join } from "path";

type RouteKey = string; // "METHOD URL"

type MockHttpReply = {
  status: number;
  body: string;
  headers?: Record<string, string>;
};

type RouteHandler = (req: HttpRequest) => Promise<MockHttpReply>;

export interface MockHttp {
  /** Register a 200 text reply for method+url */
  on(method: string, url: string, body: string): void;
  /** Register a reply with explicit status */
  onResponse(method: string, url: string, reply: MockHttpReply): void;
  /** Register a custom handler for method+url */
  onCustom(method: string, url: string, handler: RouteHandler): void;
  /** Mock httpRequest function (inject into clients) */
  request: (req: HttpRequest) => Promise<HttpTextResponse>;
  /** Recorded requests (for assertions) */
  getRecordedRequests(): HttpRequest[];
  reset(): void;
}

/**
 * Load fixture content from tests/fixtures as UTF-8 text
 *
 * @param relativePath - Path relative to tests/fixtures (e.g. "archive/week_2361.html")
 */
export function loadFixtureText(relativePath: string): string {
  const fullPath = join(process.cwd(), "tests", "fixtures", relativePath);
  return readFileSync(fullPath, "utf-8");
}

/**
 * Build route key from method and URL (ignores query params)
 */
function buildRouteKey(method: string, url: string): RouteKey {
  const urlWithoutQuery = url.split("?")[0];
  return `${method.toUpperCase()} ${urlWithoutQuery}`;
}

export function createMockHttp(): MockHttp {
  const routes = new Map<RouteKey, RouteHandler>();
  const recordedRequests: HttpRequest[] = [];

  const onResponse = (method: string, url: string, reply: MockHttpReply) => {
    routes.set(buildRouteKey(method, url), async () => reply);
  };

  const on = (method: string, url: string, body: string) => {
    onResponse(method, url, { status: 200, body });
  };

  const onCustom = (method: string, url: string, handler: RouteHandler) => {
    routes.set(buildRouteKey(method, url), handler);
  };

  const request = async (req: HttpRequest): Promise<HttpTextResponse> => {
    recordedRequests.push({ ...req });

    const key = buildRouteKey(req.method, req.url);
    const handler = routes.get(key);

    if (!handler) {
      throw new Error(
        `[MockHttp] Unmocked request: ${key}\n` +
          `Available routes: ${Array.from(routes.keys()).join(", ") || "(none)"}`,
      );
    }

    const reply = await handler(req);

    if (reply.status >= 200 && reply.status < 300) {
      return {
        status: reply.status,
        url: req.url,
        contentType: reply.headers?.["content-type"] ?? "text/html",
        body: reply.body,
      };
    }

    throw new HttpError({
      status: reply.status,
      statusText: "Mock Response",
      url: req.url,
      bodySnippet: reply.body,
      headers: reply.headers ? new Headers(reply.headers) : undefined,
    });
  };

  return {
    on,
    onResponse,
    onCustom,
    request,
    getRecordedRequests: () => [...recordedRequests],
    reset: () => {
      routes.clear();
      recordedRequests.length = 0;
    },
  };
}
