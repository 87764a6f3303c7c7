/**
 * Thin HTTP client for the Financial Modeling Prep REST API.
 *
 * One GET per call, no retries, no caching. The parsed JSON is handed back
 * untouched; every failure mode maps to one of TransportError, UpstreamError
 * or MalformedResponseError.
 */

import type { ServerConfig } from "../config.js";
import { MalformedResponseError, TransportError, UpstreamError } from "../errors.js";

export type QueryValue = string | number | boolean;
export type QueryParams = Record<string, QueryValue | undefined>;

export interface UpstreamResponse {
  endpoint: string;
  status: number;
  payload: unknown;
}

export interface CallOptions {
  /** Cancellation from the protocol host; combined with the per-request timeout. */
  signal?: AbortSignal;
}

/** What tool handlers depend on. FmpClient is the real implementation. */
export interface UpstreamClient {
  call(endpoint: string, query?: QueryParams, options?: CallOptions): Promise<UpstreamResponse>;
}

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface FmpClientOptions {
  fetch?: FetchFn;
}

const MAX_ERROR_BODY_CHARS = 2000;
const MAX_EXCERPT_CHARS = 200;

/** Encode a caller-supplied value for use as a single path segment. */
export function segment(value: string): string {
  return encodeURIComponent(value.trim());
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}…` : text;
}

/** FMP reports some failures (bad key, plan limits) as 200 + {"Error Message": "..."}. */
function embeddedErrorMessage(payload: unknown): string | null {
  if (typeof payload !== "object" || payload === null || !("Error Message" in payload)) return null;
  const message = payload["Error Message"];
  return typeof message === "string" ? message : null;
}

export class FmpClient implements UpstreamClient {
  private readonly fetchFn: FetchFn;

  constructor(
    private readonly config: Pick<ServerConfig, "apiKey" | "baseUrl" | "timeoutMs">,
    options: FmpClientOptions = {}
  ) {
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  /** Full request URL, API key last. */
  buildUrl(endpoint: string, query: QueryParams = {}): string {
    const url = new URL(endpoint.replace(/^\/+/, ""), this.config.baseUrl);
    for (const [name, value] of Object.entries(query)) {
      // the configured key is the only credential sent
      if (value === undefined || name.toLowerCase() === "apikey") continue;
      url.searchParams.append(name, String(value));
    }
    url.searchParams.append("apikey", this.config.apiKey);
    return url.toString();
  }

  async call(endpoint: string, query: QueryParams = {}, options: CallOptions = {}): Promise<UpstreamResponse> {
    const url = this.buildUrl(endpoint, query);
    const timeout = AbortSignal.timeout(this.config.timeoutMs);
    const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

    let res: Response;
    let text: string;
    try {
      res = await this.fetchFn(url, {
        method: "GET",
        headers: { Accept: "application/json" },
        signal,
      });
      text = await res.text();
    } catch (e) {
      const timedOut = timeout.aborted;
      const reason = timedOut
        ? `no response within ${this.config.timeoutMs}ms`
        : e instanceof Error
          ? e.message
          : String(e);
      throw new TransportError(endpoint, reason, timedOut, e);
    }

    if (!res.ok) {
      throw new UpstreamError(endpoint, res.status, truncate(text, MAX_ERROR_BODY_CHARS));
    }

    if (text.trim() === "") {
      throw new MalformedResponseError(endpoint, "empty body");
    }

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch (e) {
      const reason = e instanceof Error ? e.message : "invalid JSON";
      throw new MalformedResponseError(endpoint, reason, truncate(text, MAX_EXCERPT_CHARS));
    }

    const embedded = embeddedErrorMessage(payload);
    if (embedded !== null) {
      throw new UpstreamError(endpoint, res.status, embedded);
    }

    return { endpoint, status: res.status, payload };
  }
}
