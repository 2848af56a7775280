import type { CallToolResult, ToolAnnotations } from "@modelcontextprotocol/sdk/types.js";
import { BatchCreateError, PolarionError } from "./errors.js";

// ─── URL helpers ──────────────────────────────────────────────────────────

/** Encode a value for safe inclusion in a URL path segment. */
export function enc(value: string): string {
  return encodeURIComponent(value);
}

/** `PROJECT/WI-1` → `WI-1`; short ids pass through. */
export function shortId(id: string): string {
  const slash = id.lastIndexOf("/");
  return slash === -1 ? id : id.slice(slash + 1);
}

/** `WI-1` → `PROJECT/WI-1`; ids that already carry a project pass through. */
export function fullId(projectId: string, id: string): string {
  return id.includes("/") ? id : `${projectId}/${id}`;
}

// ─── Response helpers ──────────────────────────────────────────────────────

/** Successful tool result with compact JSON (no whitespace = fewer tokens). */
export function ok(data: unknown): CallToolResult {
  return { content: [{ type: "text", text: JSON.stringify(data ?? null) }] };
}

/**
 * Tool error result. PolarionErrors are rendered with their structured hint
 * so the LLM receives actionable context in a single message.
 */
export function fail(e: unknown): CallToolResult {
  const text = e instanceof PolarionError || e instanceof BatchCreateError
    ? e.toToolText()
    : e instanceof Error ? e.message : String(e);
  return { content: [{ type: "text", text }], isError: true };
}

/**
 * Wraps an async call, catching any thrown errors and converting to an MCP
 * error result with isError: true.
 */
export async function run(fn: () => Promise<unknown>): Promise<CallToolResult> {
  try {
    return ok(await fn());
  } catch (e) {
    return fail(e);
  }
}

// ─── Tool annotations ──────────────────────────────────────────────────────

export const READ_ONLY: ToolAnnotations = {
  readOnlyHint: true,
  destructiveHint: false,
  idempotentHint: true,
  openWorldHint: true,
};

/** Creates or modifies Polarion data; repeating the call repeats the effect. */
export const WRITE: ToolAnnotations = {
  readOnlyHint: false,
  destructiveHint: false,
  idempotentHint: false,
  openWorldHint: true,
};

/** Diff-based update: re-sending the same target state is a no-op. */
export const WRITE_IDEMPOTENT: ToolAnnotations = {
  ...WRITE,
  idempotentHint: true,
};

export const DESTRUCTIVE: ToolAnnotations = {
  readOnlyHint: false,
  destructiveHint: true,
  idempotentHint: true,
  openWorldHint: true,
};

// ─── Logging ───────────────────────────────────────────────────────────────

/** Sink for MCP log notifications; tools report side information through it. */
export type Log = (level: "info" | "warning" | "error", data: string) => void;

export const NO_LOG: Log = () => {};
