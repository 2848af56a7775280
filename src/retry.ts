/**
 * Bounded, jittered exponential-backoff retry around a single async operation.
 *
 *   Attempting ──success──────────────────────────────────────→ Done
 *   Attempting ──failure, retryable, attempt < maxRetries─────→ Waiting → Attempting
 *   Attempting ──failure, not retryable or budget exhausted───→ Failed
 *
 * Every call owns its own RetryState; concurrent calls never interact.
 * The caller's AbortSignal reaches both the in-flight attempt and the wait.
 */

import { isRetryable as defaultIsRetryable, PolarionError } from "./errors.js";

export interface RetryPolicy {
  /** Retries after the first attempt. `0` means exactly one attempt. */
  readonly maxRetries: number;
  readonly minWaitMs: number;
  readonly maxWaitMs: number;
  readonly isRetryable: (err: unknown) => boolean;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 1,
  minWaitMs: 5_000,
  maxWaitMs: 15_000,
  isRetryable: defaultIsRetryable,
};

/** Policy that never retries. */
export const NO_RETRY: RetryPolicy = { ...DEFAULT_RETRY_POLICY, maxRetries: 0 };

export interface AttemptContext {
  /** 0-based attempt number. */
  readonly attempt: number;
  readonly signal: AbortSignal | undefined;
}

export interface RetryState {
  attempt: number;
  lastError: unknown;
  nextWaitMs: number;
}

export interface RetryOptions {
  signal?: AbortSignal;
  /** Source of jitter in [0, 1). */
  random?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** Called before each wait, after a retryable failure. */
  onRetry?: (state: Readonly<RetryState>) => void;
}

/**
 * Wait before retry number `retryIndex` (0 for the first retry).
 *
 * min × 2^k capped at max, jittered to ±25%, stretched to a server-provided
 * Retry-After when that is longer, then clamped to [min, max].
 */
export function computeBackoff(
  retryIndex: number,
  policy: Pick<RetryPolicy, "minWaitMs" | "maxWaitMs">,
  random: () => number = Math.random,
  retryAfterMs?: number,
): number {
  const base = Math.min(policy.minWaitMs * 2 ** retryIndex, policy.maxWaitMs);
  let wait = base - base / 4 + random() * (base / 2);
  if (retryAfterMs !== undefined && retryAfterMs > wait) wait = retryAfterMs;
  return Math.round(Math.min(Math.max(wait, policy.minWaitMs), policy.maxWaitMs));
}

/** setTimeout-based delay that rejects as soon as `signal` aborts. */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(cancelled());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(cancelled());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

function cancelled(): PolarionError {
  return new PolarionError("Request cancelled by client", undefined, false);
}

/**
 * Runs `operation` until it succeeds, fails permanently, or the retry budget
 * is spent. A final failure after at least one retry is re-thrown as a
 * PolarionError carrying `retryCount`; other errors are wrapped, keeping the
 * original as `cause`.
 */
export async function executeWithRetry<T>(
  operation: (ctx: AttemptContext) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {},
): Promise<T> {
  const { signal, random = Math.random, sleep = abortableSleep, onRetry } = options;
  const state: RetryState = { attempt: 0, lastError: undefined, nextWaitMs: 0 };

  for (;;) {
    if (signal?.aborted) throw cancelled();

    try {
      return await operation({ attempt: state.attempt, signal });
    } catch (err) {
      state.lastError = err;

      // An abort surfacing from inside the attempt is a cancellation, not a transport failure
      if (signal?.aborted) throw cancelled();

      const retryable = policy.isRetryable(err);
      if (!retryable || state.attempt >= policy.maxRetries) {
        throw finalError(err, state.attempt, retryable);
      }

      const retryAfter = err instanceof PolarionError ? err.retryAfterMs : undefined;
      state.nextWaitMs = computeBackoff(state.attempt, policy, random, retryAfter);
      onRetry?.(state);
      await sleep(state.nextWaitMs, signal);
      state.attempt++;
    }
  }
}

function finalError(err: unknown, retries: number, retryable: boolean): unknown {
  if (retries === 0) return err;
  if (err instanceof PolarionError) return err.withRetryCount(retries);
  const message = err instanceof Error ? err.message : String(err);
  return new PolarionError(message, undefined, retryable, { retryCount: retries, cause: err });
}
