/**
 * Retrying HTTP client for provider APIs and notifications
 */

import { Agent, type Dispatcher, request } from "undici";
import type { Logger } from "../utils/logger";

export type HttpHeaders = Record<string, string | string[] | undefined>;

export interface HttpRequestOptions {
  method?: "GET" | "POST";
  headers?: Record<string, string>;
  body?: string;
}

export interface HttpResponse {
  statusCode: number;
  headers: HttpHeaders;
  text: string;
}

export interface RetryPolicy {
  retryMax: number;
  retryWaitMinMs: number;
  retryWaitMaxMs: number;
}

/** Provider API calls: 2 retries, 60-120s apart */
export const API_RETRY_POLICY: RetryPolicy = {
  retryMax: 2,
  retryWaitMinMs: 60_000,
  retryWaitMaxMs: 120_000,
};

/** Webhooks and chat notifications: 3 retries, 1-3s apart */
export const NOTIFY_RETRY_POLICY: RetryPolicy = {
  retryMax: 3,
  retryWaitMinMs: 1_000,
  retryWaitMaxMs: 3_000,
};

export const DEFAULT_REQUEST_TIMEOUT_MS = 300_000;

const USER_AGENT = "repovault";

export interface HttpClientOptions extends Partial<RetryPolicy> {
  timeoutMs?: number;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  /** Connection pool to send through; an Agent built from timeoutMs by default */
  dispatcher?: Dispatcher;
}

export class HttpError extends Error {
  readonly statusCode: number;
  readonly url: string;

  constructor(url: string, statusCode: number, body: string) {
    const detail = body.trim().slice(0, 300);
    super(`${redactUrl(url)} returned ${statusCode}${detail ? `: ${detail}` : ""}`);
    this.name = "HttpError";
    this.statusCode = statusCode;
    this.url = redactUrl(url);
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Strip userinfo, query string and Telegram-style `/bot<token>` path
 * segments so tokens never reach logs
 */
export function redactUrl(url: string): string {
  try {
    const parsed = new URL(url);
    parsed.username = "";
    parsed.password = "";
    parsed.search = "";
    parsed.pathname = parsed.pathname.replace(/^\/bot[^/]+/, "/bot*****");
    return parsed.toString();
  } catch {
    return url;
  }
}

function isRetryableStatus(statusCode: number): boolean {
  return statusCode === 429 || statusCode >= 500;
}

export function headerValue(headers: HttpHeaders, name: string): string | undefined {
  const value = headers[name.toLowerCase()];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * `rel="next"` target of an RFC 8288 Link header
 */
export function parseLinkHeader(header: string | undefined): string | null {
  if (!header) return null;

  for (const part of header.split(",")) {
    const match = part.match(/<([^>]+)>\s*;\s*rel="?([^";]+)"?/);
    if (match?.[2]?.split(/\s+/).includes("next") && match[1]) {
      return match[1];
    }
  }

  return null;
}

export class HttpClient {
  private readonly dispatcher: Dispatcher;
  private readonly policy: RetryPolicy;
  private readonly timeoutMs: number;
  private readonly logger: Logger | undefined;
  private readonly wait: (ms: number) => Promise<void>;

  constructor(options: HttpClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.policy = {
      retryMax: options.retryMax ?? API_RETRY_POLICY.retryMax,
      retryWaitMinMs: options.retryWaitMinMs ?? API_RETRY_POLICY.retryWaitMinMs,
      retryWaitMaxMs: options.retryWaitMaxMs ?? API_RETRY_POLICY.retryWaitMaxMs,
    };
    this.logger = options.logger;
    this.wait = options.sleep ?? sleep;
    this.dispatcher =
      options.dispatcher ??
      new Agent({
        connectTimeout: Math.min(this.timeoutMs, 30_000),
        headersTimeout: this.timeoutMs,
        bodyTimeout: this.timeoutMs,
      });
  }

  /** Same connection settings with a different retry policy */
  withPolicy(policy: RetryPolicy): HttpClient {
    return new HttpClient({
      ...policy,
      timeoutMs: this.timeoutMs,
      logger: this.logger,
      sleep: this.wait,
      dispatcher: this.dispatcher,
    });
  }

  private backoff(attempt: number, retryAfter: string | undefined): number {
    const { retryWaitMinMs, retryWaitMaxMs } = this.policy;
    const seconds = retryAfter ? Number.parseInt(retryAfter, 10) : Number.NaN;
    const wanted = Number.isFinite(seconds) ? seconds * 1000 : retryWaitMinMs * 2 ** attempt;
    return Math.min(retryWaitMaxMs, Math.max(retryWaitMinMs, wanted));
  }

  /**
   * Send a request, retrying network errors, 429 and 5xx. Resolves with the
   * final response whatever its status.
   */
  async send(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
    const { retryMax } = this.policy;

    for (let attempt = 0; ; attempt++) {
      let response: HttpResponse;
      try {
        const { statusCode, headers, body } = await request(url, {
          method: options.method ?? "GET",
          headers: { "User-Agent": USER_AGENT, ...options.headers },
          body: options.body,
          dispatcher: this.dispatcher,
          signal: AbortSignal.timeout(this.timeoutMs),
        });
        response = { statusCode, headers, text: await body.text() };
      } catch (error) {
        if (attempt >= retryMax) throw error;
        const delay = this.backoff(attempt, undefined);
        this.logger?.warn(
          `Request to ${redactUrl(url)} failed (${error instanceof Error ? error.message : String(error)}), retrying in ${delay}ms`,
        );
        await this.wait(delay);
        continue;
      }

      if (!isRetryableStatus(response.statusCode) || attempt >= retryMax) {
        return response;
      }

      const delay = this.backoff(attempt, headerValue(response.headers, "retry-after"));
      this.logger?.warn(
        `Request to ${redactUrl(url)} returned ${response.statusCode}, retrying in ${delay}ms`,
      );
      await this.wait(delay);
    }
  }

  /**
   * Send and parse a JSON response body. Non-2xx responses throw HttpError.
   */
  async json<T>(url: string, options: HttpRequestOptions = {}): Promise<{ data: T; headers: HttpHeaders }> {
    const response = await this.send(url, {
      ...options,
      headers: { Accept: "application/json", ...options.headers },
    });
    assertOk(url, response);

    const data: T = JSON.parse(response.text);
    return { data, headers: response.headers };
  }

  async getJson<T>(url: string, headers: Record<string, string> = {}): Promise<{ data: T; headers: HttpHeaders }> {
    return this.json<T>(url, { method: "GET", headers });
  }

  async postJson<T>(
    url: string,
    payload: unknown,
    headers: Record<string, string> = {},
  ): Promise<{ data: T; headers: HttpHeaders }> {
    return this.json<T>(url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...headers },
      body: JSON.stringify(payload),
    });
  }
}

export function assertOk(url: string, response: HttpResponse): void {
  if (response.statusCode < 200 || response.statusCode >= 300) {
    throw new HttpError(url, response.statusCode, response.text);
  }
}
