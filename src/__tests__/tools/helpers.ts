/**
 * Shared test helpers for service and tool handler tests.
 *
 * Strategy: mock McpServer.registerTool to capture handlers by name,
 * then call them directly with test args and a client whose HTTP verbs
 * are spied.
 */
import { vi } from "vitest";
import { type ClientLimits, PolarionClient } from "../../client.js";

export const BASE_URL = "https://polarion.test/polarion/rest/v1";

/** Minimal extra object matching RequestHandlerExtra shape. */
export function makeExtra(overrides?: { signal?: AbortSignal }) {
  return {
    signal: overrides?.signal ?? new AbortController().signal,
    sendNotification: vi.fn().mockResolvedValue(undefined),
    _meta: {},
  };
}

/**
 * A real PolarionClient whose get/post/patch/delete never reach the network.
 * `getResult` is the default document every GET resolves to; writes resolve
 * to undefined (204) unless a test says otherwise.
 */
export function mockClient(getResult: unknown = { data: [] }, limits: Partial<ClientLimits> = {}) {
  const client = new PolarionClient({ baseUrl: BASE_URL, token: "test-secret", limits });
  const getSpy = vi.spyOn(client, "get").mockResolvedValue(getResult);
  const postSpy = vi.spyOn(client, "post").mockResolvedValue(undefined);
  const patchSpy = vi.spyOn(client, "patch").mockResolvedValue(undefined);
  const deleteSpy = vi.spyOn(client, "delete").mockResolvedValue(undefined);
  return { client, getSpy, postSpy, patchSpy, deleteSpy };
}

type ToolHandler = (args: Record<string, unknown>, extra: ReturnType<typeof makeExtra>) => Promise<ToolResult>;

interface ToolResult {
  content: Array<{ type: string; text?: string }>;
  isError?: boolean;
}

/**
 * Creates a mock McpServer that captures tool registrations.
 * Returns the mock server and a map of tool name → handler.
 */
export function mockServer(): {
  server: unknown;
  tools: Map<string, ToolHandler>;
} {
  const tools = new Map<string, ToolHandler>();
  const server = {
    registerTool: vi.fn(
      (name: string, _opts: unknown, handler: ToolHandler) => {
        tools.set(name, handler);
      },
    ),
    registerResource: vi.fn(),
  };
  return { server, tools };
}

/** Looks up a captured handler, failing the test when the tool was never registered. */
export function handlerFor(tools: Map<string, ToolHandler>, name: string): ToolHandler {
  const handler = tools.get(name);
  if (!handler) throw new Error(`tool ${name} was not registered`);
  return handler;
}

/** Parses the JSON text from an ok() MCP result. Throws if the result indicates an error or has no content. */
export function parseOkResult(result: ToolResult): unknown {
  if (result.isError) {
    throw new Error(`Expected ok result but got isError: true — ${result.content[0]?.text}`);
  }
  if (result.content.length === 0) {
    throw new Error("Expected ok result but content array is empty");
  }
  const text = result.content[0]?.text;
  if (text === undefined) {
    throw new Error("Expected ok result but text is undefined");
  }
  return JSON.parse(text);
}

/** Text of an error result. Throws if the result is not an error. */
export function errorText(result: ToolResult): string {
  if (!result.isError) throw new Error("Expected an error result");
  return result.content[0]?.text ?? "";
}

/** JSON:API document for one work item. */
export function workItemDoc(
  id: string,
  attributes: Record<string, unknown>,
  relationships?: Record<string, unknown>,
) {
  return { data: workItemData(id, attributes, relationships) };
}

export function workItemData(
  id: string,
  attributes: Record<string, unknown>,
  relationships?: Record<string, unknown>,
) {
  return { type: "workitems", id, revision: "100", attributes, ...(relationships ? { relationships } : {}) };
}
