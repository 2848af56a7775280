import { type ErrorDetail, isTransientStatus, parseRetryAfter, PolarionError } from "./errors.js";
import { loadConfig, type PolarionConfig, DEFAULT_BATCH_SIZE, DEFAULT_MAX_CONTENT_SIZE, DEFAULT_PAGE_SIZE, DEFAULT_TIMEOUT_MS } from "./config.js";
import { isJsonObject, type JsonValue } from "./resource.js";
import { DEFAULT_RETRY_POLICY, executeWithRetry, type RetryOptions, type RetryPolicy } from "./retry.js";

export type HttpMethod = "GET" | "POST" | "PATCH" | "DELETE";

export type Params = Record<string, string | number | boolean | undefined>;

export interface RequestOptions {
  params?: Params;
  body?: JsonValue;
  /** Cancels the request, including any retry wait. */
  signal?: AbortSignal;
  /** GET only: cache the response for this long. */
  ttlMs?: number;
}

export interface ClientLimits {
  batchSize: number;
  pageSize: number;
  maxContentSize: number;
}

export interface PolarionClientOptions {
  baseUrl: string;
  token: string;
  timeoutMs?: number;
  retry?: Partial<RetryPolicy>;
  limits?: Partial<ClientLimits>;
  /** Jitter and sleep overrides, mainly for tests. */
  random?: RetryOptions["random"];
  sleep?: RetryOptions["sleep"];
}

/**
 * Returns an AbortSignal that fires after `timeoutMs` OR when `signal` fires,
 * whichever comes first.
 */
function withTimeout(timeoutMs: number, signal?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, timeout]) : timeout;
}

// ─── TTL cache ─────────────────────────────────────────────────────────────

const MAX_CACHE_ENTRIES = 1000;

class TTLCache {
  private readonly store = new Map<string, { value: unknown; exp: number }>();

  has(key: string): boolean {
    const entry = this.store.get(key);
    if (!entry) return false;
    if (Date.now() > entry.exp) {
      this.store.delete(key);
      return false;
    }
    return true;
  }

  get(key: string): unknown {
    return this.has(key) ? this.store.get(key)?.value : undefined;
  }

  set(key: string, value: unknown, ttlMs: number): void {
    this.store.delete(key);
    if (this.store.size >= MAX_CACHE_ENTRIES) {
      const oldest = this.store.keys().next();
      if (!oldest.done) this.store.delete(oldest.value);
    }
    this.store.set(key, { value, exp: Date.now() + ttlMs });
  }

  clear(): void {
    this.store.clear();
  }
}

// ─── Client ────────────────────────────────────────────────────────────────

/**
 * Health degradation thresholds.
 * After this many consecutive transient failures the onDegradation callback fires.
 */
const DEGRADATION_THRESHOLDS = [
  { count: 3, level: "warning" as const },
  { count: 5, level: "error" as const },
] as const;

export class PolarionClient {
  /** REST root without trailing slash, e.g. `https://host/polarion/rest/v1`. */
  readonly baseUrl: string;
  readonly retryPolicy: RetryPolicy;
  readonly limits: ClientLimits;

  private readonly authHeader: string;
  private readonly timeoutMs: number;
  private readonly random: RetryOptions["random"];
  private readonly sleep: RetryOptions["sleep"];
  private readonly cache = new TTLCache();

  /**
   * Count of consecutive transient failures across all API calls.
   * Reset on any successful response or on semantic (4xx) errors.
   */
  private consecutiveFailures = 0;

  /**
   * Fired when the consecutive transient failure count crosses a degradation
   * threshold. The MCP server forwards it to its logging channel.
   */
  onDegradation?: (level: "warning" | "error", message: string) => void;

  constructor(options: PolarionClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.authHeader = `Bearer ${options.token}`;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retryPolicy = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    this.limits = {
      batchSize: options.limits?.batchSize ?? DEFAULT_BATCH_SIZE,
      pageSize: options.limits?.pageSize ?? DEFAULT_PAGE_SIZE,
      maxContentSize: options.limits?.maxContentSize ?? DEFAULT_MAX_CONTENT_SIZE,
    };
    this.random = options.random;
    this.sleep = options.sleep;
  }

  get(path: string, options: Omit<RequestOptions, "body"> = {}): Promise<unknown> {
    return this.request("GET", path, options);
  }

  post(path: string, body: JsonValue, options: Omit<RequestOptions, "body" | "ttlMs"> = {}): Promise<unknown> {
    return this.request("POST", path, { ...options, body });
  }

  patch(path: string, body: JsonValue, options: Omit<RequestOptions, "body" | "ttlMs"> = {}): Promise<unknown> {
    return this.request("PATCH", path, { ...options, body });
  }

  delete(path: string, body?: JsonValue, options: Omit<RequestOptions, "body" | "ttlMs"> = {}): Promise<unknown> {
    return this.request("DELETE", path, { ...options, body });
  }

  /**
   * Sends one request through the retry executor and returns the parsed JSON
   * body, or undefined for 204 No Content.
   */
  async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<unknown> {
    const url = this.buildUrl(path, options.params);
    const cacheable = method === "GET" && options.ttlMs !== undefined;
    if (cacheable && this.cache.has(url)) return this.cache.get(url);

    // A write makes every cached read potentially stale
    if (method !== "GET") this.cache.clear();

    let data: unknown;
    try {
      data = await executeWithRetry(
        ({ signal }) => this.send(method, url, options.body, signal),
        this.retryPolicy,
        { signal: options.signal, random: this.random, sleep: this.sleep },
      );
    } catch (err) {
      this.recordFailure(err);
      throw err;
    }
    this.consecutiveFailures = 0;

    if (cacheable && options.ttlMs !== undefined) this.cache.set(url, data, options.ttlMs);
    return data;
  }

  /** Drops every cached response. */
  invalidate(): void {
    this.cache.clear();
  }

  private buildUrl(path: string, params?: Params): string {
    const url = new URL(`${this.baseUrl}${path.startsWith("/") ? path : "/" + path}`);
    if (params) {
      for (const [k, v] of Object.entries(params)) {
        if (v !== undefined) url.searchParams.set(k, String(v));
      }
    }
    return url.toString();
  }

  /**
   * Updates consecutive failure counter and fires onDegradation at thresholds.
   * Only transient errors count against availability.
   */
  private recordFailure(err: unknown): void {
    if (err instanceof PolarionError && err.isTransient) {
      this.consecutiveFailures++;
      for (const { count, level } of DEGRADATION_THRESHOLDS) {
        if (this.consecutiveFailures === count) {
          this.onDegradation?.(
            level,
            `Polarion ${level === "error" ? "appears unreachable" : "appears unstable"} — ` +
            `${this.consecutiveFailures} consecutive transient failures. ` +
            `Base URL: ${this.baseUrl}. Last: ${err.message}`,
          );
          break;
        }
      }
    } else {
      // Semantic 4xx or a local error: the instance is reachable
      this.consecutiveFailures = 0;
    }
  }

  private async send(method: HttpMethod, url: string, body: JsonValue | undefined, signal?: AbortSignal): Promise<unknown> {
    const headers: Record<string, string> = {
      Authorization: this.authHeader,
      Accept: "application/json",
    };
    if (body !== undefined) headers["Content-Type"] = "application/json";

    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers,
        body: body !== undefined ? JSON.stringify(body) : undefined,
        signal: withTimeout(this.timeoutMs, signal),
      });
    } catch (err) {
      if (err instanceof DOMException && err.name === "TimeoutError") {
        throw new PolarionError(`Request timed out after ${this.timeoutMs}ms`, undefined, true, { cause: err });
      }
      if (signal?.aborted) {
        throw new PolarionError("Request cancelled by client", undefined, false);
      }
      throw new PolarionError(
        err instanceof Error ? err.message : "Network error",
        undefined,
        true,
        { cause: err },
      );
    }

    if (!response.ok) {
      const { message, details } = await parseErrorBody(response);
      throw new PolarionError(message, response.status, isTransientStatus(response.status), {
        details,
        retryAfterMs: parseRetryAfter(response.headers.get("retry-after")),
      });
    }

    if (response.status === 204) return undefined;
    try {
      const data: unknown = await response.json();
      return data;
    } catch (err) {
      // Never transient: the server has already processed the request
      if (signal?.aborted) {
        throw new PolarionError("Request cancelled by client", undefined, false);
      }
      if (err instanceof DOMException && err.name === "TimeoutError") {
        throw new PolarionError(`Response body timed out after ${this.timeoutMs}ms`, response.status, false, { cause: err });
      }
      throw new PolarionError(
        `Response body is not valid JSON (HTTP ${response.status})`,
        response.status,
        false,
        { cause: err },
      );
    }
  }
}

/** Reads a JSON:API `errors` document; falls back to the status text. */
async function parseErrorBody(response: Response): Promise<{ message: string; details: ErrorDetail[] }> {
  let json: unknown;
  try {
    json = await response.json();
  } catch {
    return { message: response.statusText, details: [] };
  }

  const details: ErrorDetail[] = [];
  const errors = isJsonObject(json) ? json.errors : undefined;
  if (Array.isArray(errors)) {
    for (const e of errors) {
      if (!isJsonObject(e)) continue;
      const detail: ErrorDetail = {};
      const { status, title, detail: text, source } = e;
      if (typeof status === "string") detail.status = status;
      if (typeof title === "string") detail.title = title;
      if (typeof text === "string") detail.detail = text;
      if (isJsonObject(source) && typeof source.pointer === "string") detail.pointer = source.pointer;
      details.push(detail);
    }
  }

  const first = details[0];
  const message = first?.detail ?? first?.title ?? (isJsonObject(json) && typeof json.message === "string" ? json.message : response.statusText);
  return { message, details };
}

// ─── Cache TTLs ────────────────────────────────────────────────────────────

/** Reference data that almost never changes (enumerations). */
export const TTL_HOUR = 60 * 60 * 1000;

/** Organisational data that changes rarely (project list). */
export const TTL_5MIN = 5 * 60 * 1000;

// ─── Factory ───────────────────────────────────────────────────────────────

export function createClient(config: PolarionConfig = loadConfig()): PolarionClient {
  return new PolarionClient({
    baseUrl: config.baseUrl,
    token: config.token,
    timeoutMs: config.timeoutMs,
    retry: config.retry,
    limits: {
      batchSize: config.batchSize,
      pageSize: config.pageSize,
      maxContentSize: config.maxContentSize,
    },
  });
}
