/**
 * Error types for Polarion API failures and for the synchronization core.
 *
 * Error taxonomy:
 *   Transient  — 408, 425, 429, 5xx, network / timeout
 *                → retried by the retry executor; surfaced with retryCount when exhausted
 *   Semantic   — 400, 401, 403, 404, 409
 *                → never retried; hint points to the corrective action
 *   Encoding   — a custom field shadows a known field name (EncodingConflictError)
 *   Decoding   — a known field carries a value of the wrong shape (FieldDecodeError)
 *   Validation — client-side input checks before any request (ValidationError)
 *   Batch      — a bulk create failed part-way through (BatchCreateError)
 */

import type { Resource } from "./resource.js";

/** HTTP statuses that indicate a temporary condition worth retrying. */
export const TRANSIENT_STATUSES = new Set([408, 425, 429, 500, 502, 503, 504]);

const STATUS_HINTS: Readonly<Record<number, string>> = {
  400: "Check field names and values against the project's work item type configuration",
  401: "Authentication failed — verify POLARION_TOKEN is valid and not expired",
  403: "Insufficient permissions — the token's user lacks rights for this operation",
  404: "Resource not found — verify the project ID and work item ID",
  408: "Request timed out",
  409: "Conflict — the resource was modified concurrently; reload it and retry the change",
  429: "Rate limit exceeded — reduce request frequency",
  500: "Polarion internal server error — may be transient",
  502: "Polarion gateway error — server may be restarting",
  503: "Polarion service unavailable — server may be under maintenance or overloaded",
  504: "Polarion gateway timeout — upstream response too slow",
};

/** One entry of a JSON:API `errors` array. */
export interface ErrorDetail {
  status?: string;
  title?: string;
  detail?: string;
  /** JSON pointer to the offending field, e.g. `/data/0/attributes/myField`. */
  pointer?: string;
}

export interface PolarionErrorOptions {
  retryCount?: number;
  retryAfterMs?: number;
  details?: readonly ErrorDetail[];
  cause?: unknown;
}

export class PolarionError extends Error {
  /** HTTP status code, undefined for network / timeout / cancellation errors. */
  readonly statusCode: number | undefined;

  /** Whether this failure is worth retrying (network, timeout, 5xx, 429). */
  readonly isTransient: boolean;

  /** Number of automatic retries already performed before this error was thrown. */
  readonly retryCount: number;

  /** Retry-After delay in ms, parsed from the response header. */
  readonly retryAfterMs: number | undefined;

  readonly details: readonly ErrorDetail[];

  constructor(
    message: string,
    statusCode: number | undefined,
    isTransient: boolean,
    options: PolarionErrorOptions = {},
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "PolarionError";
    this.statusCode = statusCode;
    this.isTransient = isTransient;
    this.retryCount = options.retryCount ?? 0;
    this.retryAfterMs = options.retryAfterMs;
    this.details = options.details ?? [];
  }

  /** Copy of this error carrying the number of retries that preceded it. */
  withRetryCount(retryCount: number): PolarionError {
    return new PolarionError(this.message, this.statusCode, this.isTransient, {
      retryCount,
      retryAfterMs: this.retryAfterMs,
      details: this.details,
      cause: this.cause,
    });
  }

  /** Actionable guidance derived from the HTTP status. */
  get hint(): string {
    if (this.statusCode !== undefined) {
      return STATUS_HINTS[this.statusCode] ?? `HTTP ${this.statusCode}`;
    }
    return "Network error — check connectivity to the Polarion server";
  }

  /**
   * Single-line error string for MCP tool content.
   * Format: [Polarion <status>] <message> — <hint> (<details>) (retried N×)
   */
  toToolText(): string {
    const code = this.statusCode !== undefined ? ` ${this.statusCode}` : "";
    let text = `[Polarion${code}] ${this.message} — ${this.hint}`;
    if (this.details.length > 0) {
      text += ` (${this.details.map(formatDetail).join("; ")})`;
    }
    if (this.retryCount > 0) {
      text += ` (retried ${this.retryCount}×, further retries will not help)`;
    }
    return text;
  }
}

function formatDetail(detail: ErrorDetail): string {
  const text = detail.detail ?? detail.title ?? "unknown error";
  if (detail.pointer) return `field '${detail.pointer}': ${text}`;
  if (detail.title && detail.detail) return `${detail.title}: ${detail.detail}`;
  return text;
}

/**
 * Thrown by the codec when a custom field uses the name of a field declared
 * by the resource schema. Encoding both would silently drop one of them.
 */
export class EncodingConflictError extends Error {
  readonly field: string;
  readonly partition: "attributes" | "relationships";

  constructor(field: string, partition: "attributes" | "relationships") {
    super(`Custom ${partition === "attributes" ? "field" : "relationship"} "${field}" collides with a known ${partition} name`);
    this.name = "EncodingConflictError";
    this.field = field;
    this.partition = partition;
  }
}

/** Thrown by the codec when a known field's wire value does not match its declared shape. */
export class FieldDecodeError extends Error {
  readonly field: string;

  constructor(field: string, reason: string) {
    super(`Cannot decode field "${field}": ${reason}`);
    this.name = "FieldDecodeError";
    this.field = field;
  }
}

/** Client-side input validation failure, raised before any request is sent. */
export class ValidationError extends Error {
  readonly field: string;
  /** Position of the offending item in a bulk call, when there is one. */
  readonly index: number | undefined;

  constructor(field: string, message: string, index?: number) {
    super(index !== undefined ? `item ${index}: ${field} — ${message}` : `${field} — ${message}`);
    this.name = "ValidationError";
    this.field = field;
    this.index = index;
  }
}

/**
 * A bulk create failed on one of its requests. Earlier batches were accepted
 * by the server; `created` holds those items with their ids filled in.
 */
export class BatchCreateError extends Error {
  /** 0-based position of the failed request. */
  readonly batchIndex: number;
  readonly batchCount: number;
  /** Input positions of the items in the failed request. */
  readonly indices: readonly number[];
  /** Input positions of items in later requests, never sent. */
  readonly pendingIndices: readonly number[];
  readonly created: readonly Resource<unknown, string>[];

  constructor(
    failure: {
      batchIndex: number;
      batchCount: number;
      indices: readonly number[];
      pendingIndices: readonly number[];
      created: readonly Resource<unknown, string>[];
    },
    cause: unknown,
  ) {
    super(
      `Batch ${failure.batchIndex + 1} of ${failure.batchCount} failed (items ${failure.indices.join(", ")}) ` +
      `after ${failure.created.length} item(s) were created: ${errorMessage(cause)}`,
      { cause },
    );
    this.name = "BatchCreateError";
    this.batchIndex = failure.batchIndex;
    this.batchCount = failure.batchCount;
    this.indices = failure.indices;
    this.pendingIndices = failure.pendingIndices;
    this.created = failure.created;
  }

  /** Tool text: what was created, what failed, then the underlying error. */
  toToolText(): string {
    const ids = this.created.map(r => r.id ?? "(no id)").join(", ") || "none";
    const pending = this.pendingIndices.length > 0 ? `; not sent: items ${this.pendingIndices.join(", ")}` : "";
    const cause = this.cause instanceof PolarionError ? this.cause.toToolText() : errorMessage(this.cause);
    return `Batch ${this.batchIndex + 1} of ${this.batchCount} failed for items ${this.indices.join(", ")}` +
      `${pending}. Already created: ${ids}. ${cause}`;
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Returns true if the HTTP status code represents a transient, retryable condition. */
export function isTransientStatus(status: number): boolean {
  return TRANSIENT_STATUSES.has(status);
}

/**
 * Default retryability predicate.
 * PolarionErrors decide for themselves; codec and validation errors never
 * change on a second attempt; anything else is treated as a network failure.
 */
export function isRetryable(err: unknown): boolean {
  if (err instanceof PolarionError) return err.isTransient;
  if (
    err instanceof EncodingConflictError ||
    err instanceof FieldDecodeError ||
    err instanceof ValidationError ||
    err instanceof BatchCreateError
  ) {
    return false;
  }
  return true;
}

export function isNotFound(err: unknown): boolean {
  return err instanceof PolarionError && err.statusCode === 404;
}

/**
 * Parses the Retry-After header value into milliseconds.
 * Supports both delay-seconds (e.g. "120") and HTTP-date formats.
 * Returns undefined if the header is absent or unparseable.
 */
export function parseRetryAfter(header: string | null): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return Math.ceil(seconds * 1000);
  }
  const date = Date.parse(header);
  if (!Number.isNaN(date)) {
    const delay = date - Date.now();
    return delay > 0 ? delay : 0;
  }
  return undefined;
}
