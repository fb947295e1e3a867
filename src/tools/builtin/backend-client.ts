/**
 * HTTP client for the ticketing backend the builtin tools wrap.
 */

import { BackendError, CircuitOpenError } from "../../errors.js";
import { createLogger } from "../../utils/logger.js";
import { CircuitBreaker, type CircuitBreakerOptions } from "./circuit-breaker.js";

const log = createLogger("backend");

export interface BackendClientOptions {
  baseUrl: string;
  /** Bearer token forwarded on every request. */
  token?: string;
  /** Defaults to global fetch. */
  fetchImpl?: typeof fetch;
  /** Trips after repeated transport failures or 5xx responses. */
  circuitBreaker?: CircuitBreakerOptions;
}

export type QueryValue = string | number | boolean | undefined | null;

export interface BackendRequest {
  method: "GET" | "POST";
  endpoint: string;
  query?: Record<string, QueryValue>;
  body?: unknown;
  signal?: AbortSignal;
}

export class BackendClient {
  private readonly baseUrl: string;
  private readonly token?: string;
  private readonly fetchImpl: typeof fetch;
  readonly breaker: CircuitBreaker;

  constructor(opts: BackendClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, "");
    this.token = opts.token || undefined;
    this.fetchImpl = opts.fetchImpl ?? fetch;
    this.breaker = new CircuitBreaker(opts.circuitBreaker);
  }

  buildUrl(endpoint: string, query?: Record<string, QueryValue>): string {
    const url = new URL(this.baseUrl + endpoint);
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value === undefined || value === null || value === "") continue;
      url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  async request(req: BackendRequest): Promise<unknown> {
    if (!this.breaker.tryAcquire()) {
      throw new CircuitOpenError(req.endpoint, this.breaker.retryInMs());
    }

    const headers: Record<string, string> = { Accept: "application/json" };
    if (this.token) headers.Authorization = `Bearer ${this.token}`;
    if (req.body !== undefined) headers["Content-Type"] = "application/json";

    let res: Response;
    let text: string;
    try {
      res = await this.fetchImpl(this.buildUrl(req.endpoint, req.query), {
        method: req.method,
        headers,
        body: req.body === undefined ? undefined : JSON.stringify(req.body),
        signal: req.signal,
      });
      text = await res.text();
    } catch (err) {
      this.breaker.recordFailure();
      log.warn({ err, method: req.method, endpoint: req.endpoint }, "backend request failed");
      throw err;
    }

    if (res.status >= 500) this.breaker.recordFailure();
    else this.breaker.recordSuccess();

    if (!res.ok) {
      throw new BackendError(res.status, text.slice(0, 500), req.endpoint);
    }
    if (!text) return null;
    try {
      return JSON.parse(text);
    } catch {
      return text;
    }
  }

  get(endpoint: string, query?: Record<string, QueryValue>, signal?: AbortSignal): Promise<unknown> {
    return this.request({ method: "GET", endpoint, query, signal });
  }

  post(endpoint: string, body: unknown, signal?: AbortSignal): Promise<unknown> {
    return this.request({ method: "POST", endpoint, body, signal });
  }
}
