import { setTimeout as delay } from "node:timers/promises";

import { BackendError } from "./errors.js";
import type { BackendErrorKind } from "./errors.js";

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
}

export interface HttpClientOptions {
  readonly headers: Record<string, string>;
  readonly timeoutMs: number;
  readonly retry: RetryPolicy;
  readonly fetch?: FetchFn;
  readonly sleep?: (ms: number) => Promise<void>;
  /** Called before each retry, so callers can report the wait. */
  readonly onRetry?: (info: { attempt: number; waitMs: number; error: BackendError }) => void;
}

export const DEFAULT_RETRY: RetryPolicy = { maxAttempts: 4, baseDelayMs: 500, maxDelayMs: 30_000 };

/** JSON over HTTPS with a per-call timeout, error classification and bounded retries. */
export class HttpClient {
  private readonly fetchFn: FetchFn;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: HttpClientOptions) {
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? ((ms) => delay(ms));
  }

  /**
   * `check` inspects a successful response and may throw a `BackendError`; retryable ones are retried
   * like failed statuses.
   */
  async request(method: string, url: string, body?: unknown, check?: (data: unknown) => void): Promise<unknown> {
    const { maxAttempts } = this.options.retry;
    for (let attempt = 1; ; attempt++) {
      try {
        const data = await this.send(method, url, body);
        check?.(data);
        return data;
      } catch (error) {
        if (!(error instanceof BackendError) || !error.retryable || attempt >= maxAttempts) {
          throw error;
        }
        const waitMs = backoff(this.options.retry, attempt, error.retryAfterMs);
        this.options.onRetry?.({ attempt, waitMs, error });
        await this.sleep(waitMs);
      }
    }
  }

  private async send(method: string, url: string, body: unknown): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method,
        headers: {
          ...this.options.headers,
          ...(body === undefined ? {} : { "Content-Type": "application/json" }),
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      const reason = isTimeout(error) ? `timed out after ${this.options.timeoutMs} ms` : describe(error);
      throw new BackendError("TransientNetworkError", `${method} ${url} failed: ${reason}`, { cause: error });
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw new BackendError("TransientNetworkError", `${method} ${url} failed while reading the response: ${describe(error)}`, {
        cause: error,
      });
    }
    if (!response.ok) {
      throw classifyResponse(method, url, response, text);
    }
    if (text.trim() === "") {
      return null;
    }
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new BackendError("TransientNetworkError", `${method} ${url} returned a body that is not JSON: ${summarize(text)}`, {
        cause: error,
      });
    }
  }
}

export function classifyResponse(method: string, url: string, response: Response, text: string): BackendError {
  const status = response.status;
  const message = `${method} ${url} returned ${status}: ${summarize(text)}`;
  const retryAfterMs = parseRetryAfter(response.headers);
  const rateLimited =
    status === 429 || (status === 403 && (response.headers.get("x-ratelimit-remaining") === "0" || retryAfterMs !== undefined));
  let kind: BackendErrorKind;
  if (rateLimited) {
    kind = "RateLimited";
  } else if (status === 401 || status === 403) {
    kind = "AuthError";
  } else if (status >= 500 || status === 408) {
    kind = "TransientNetworkError";
  } else {
    kind = "ValidationError";
  }
  return new BackendError(kind, message, { status, retryAfterMs });
}

export function backoff(policy: RetryPolicy, attempt: number, retryAfterMs?: number): number {
  const exponential = policy.baseDelayMs * 2 ** (attempt - 1);
  return Math.min(policy.maxDelayMs, Math.max(exponential, retryAfterMs ?? 0));
}

function parseRetryAfter(headers: Headers): number | undefined {
  const retryAfter = headers.get("retry-after");
  if (retryAfter) {
    const seconds = Number(retryAfter);
    if (Number.isFinite(seconds) && seconds >= 0) {
      return seconds * 1000;
    }
    const date = Date.parse(retryAfter);
    if (!Number.isNaN(date)) {
      return Math.max(0, date - Date.now());
    }
  }
  const reset = headers.get("x-ratelimit-reset");
  if (reset && headers.get("x-ratelimit-remaining") === "0") {
    const resetSeconds = Number(reset);
    if (Number.isFinite(resetSeconds)) {
      return Math.max(0, resetSeconds * 1000 - Date.now());
    }
  }
  return undefined;
}

function summarize(text: string): string {
  const compact = text.replace(/\s+/g, " ").trim();
  return compact.length > 300 ? `${compact.slice(0, 300)}…` : compact || "(empty body)";
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");
}

function describe(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? ` (${error.cause.message})` : "";
    return `${error.message}${cause}`;
  }
  return String(error);
}
