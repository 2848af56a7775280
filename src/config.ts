import { z } from "zod";
import type { RetryPolicy } from "./retry.js";
import { DEFAULT_RETRY_POLICY } from "./retry.js";

export interface PolarionConfig {
  /** REST root, e.g. `https://polarion.example.com/polarion/rest/v1`. */
  baseUrl: string;
  token: string;
  /** Work items per create request. */
  batchSize: number;
  pageSize: number;
  /** Upper bound on a request body, in bytes. */
  maxContentSize: number;
  /** Per-attempt HTTP timeout. */
  timeoutMs: number;
  retry: Pick<RetryPolicy, "maxRetries" | "minWaitMs" | "maxWaitMs">;
}

export const DEFAULT_BATCH_SIZE = 100;
export const DEFAULT_PAGE_SIZE = 100;
export const DEFAULT_MAX_CONTENT_SIZE = 2 * 1024 * 1024;
export const DEFAULT_TIMEOUT_MS = 30_000;

type Env = Record<string, string | undefined>;

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const nonNegativeInt = (fallback: number) =>
  z.coerce.number().int().nonnegative().default(fallback);

/** Unset and blank variables both fall back to their defaults. */
const blankAsUnset = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const envSchema = z
  .object({
    POLARION_BASE_URL: z
      .string({ required_error: "is required.\n  Example: https://polarion.example.com/polarion/rest/v1" })
      .url("is not a valid URL.\n  Example: https://polarion.example.com/polarion/rest/v1"),
    POLARION_TOKEN: z
      .string({ required_error: "is required.\n  Create one at: My Account → Personal Access Token" })
      .min(1, "is required.\n  Create one at: My Account → Personal Access Token"),
    POLARION_BATCH_SIZE: z.preprocess(blankAsUnset, positiveInt(DEFAULT_BATCH_SIZE)),
    POLARION_PAGE_SIZE: z.preprocess(blankAsUnset, positiveInt(DEFAULT_PAGE_SIZE)),
    POLARION_MAX_CONTENT_SIZE: z.preprocess(blankAsUnset, positiveInt(DEFAULT_MAX_CONTENT_SIZE)),
    POLARION_MAX_RETRIES: z.preprocess(blankAsUnset, nonNegativeInt(DEFAULT_RETRY_POLICY.maxRetries)),
    POLARION_RETRY_MIN_WAIT_MS: z.preprocess(blankAsUnset, nonNegativeInt(DEFAULT_RETRY_POLICY.minWaitMs)),
    POLARION_RETRY_MAX_WAIT_MS: z.preprocess(blankAsUnset, nonNegativeInt(DEFAULT_RETRY_POLICY.maxWaitMs)),
    POLARION_TIMEOUT_MS: z.preprocess(blankAsUnset, positiveInt(DEFAULT_TIMEOUT_MS)),
  })
  .refine(env => env.POLARION_RETRY_MAX_WAIT_MS >= env.POLARION_RETRY_MIN_WAIT_MS, {
    message: "must not be smaller than POLARION_RETRY_MIN_WAIT_MS",
    path: ["POLARION_RETRY_MAX_WAIT_MS"],
  });

/**
 * Reads and validates the client configuration from environment variables.
 * Throws an Error naming the first offending variable.
 */
export function loadConfig(env: Env = process.env): PolarionConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue?.path.join(".") || "configuration";
    throw new Error(`${variable} ${issue?.message ?? "is invalid"}`);
  }

  const e = parsed.data;
  return {
    baseUrl: e.POLARION_BASE_URL.replace(/\/+$/, ""),
    token: e.POLARION_TOKEN,
    batchSize: e.POLARION_BATCH_SIZE,
    pageSize: e.POLARION_PAGE_SIZE,
    maxContentSize: e.POLARION_MAX_CONTENT_SIZE,
    timeoutMs: e.POLARION_TIMEOUT_MS,
    retry: {
      maxRetries: e.POLARION_MAX_RETRIES,
      minWaitMs: e.POLARION_RETRY_MIN_WAIT_MS,
      maxWaitMs: e.POLARION_RETRY_MAX_WAIT_MS,
    },
  };
}
