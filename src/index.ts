#!/usr/bin/env node
import { createRequire } from "node:module";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createClient, type PolarionClient } from "./client.js";
import { registerResources } from "./resources.js";
import { registerProjectTools } from "./tools/projects.js";
import { registerUserTools } from "./tools/users.js";
import { registerWorkItemTools } from "./tools/work-items.js";
import type { Log } from "./utils.js";

const require = createRequire(import.meta.url);
const { version } = require("../package.json") as { version: string };

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ─── Configuration ─────────────────────────────────────────────────────────

let client: PolarionClient;
try {
  client = createClient();
} catch (err) {
  process.stderr.write(`[polarion-mcp] ${errorMessage(err)}\n`);
  process.exit(1);
}

// ─── Server ────────────────────────────────────────────────────────────────

const server = new McpServer(
  { name: "polarion-mcp", version },
  {
    capabilities: {
      tools: {},
      resources: {},
      logging: {},
    },
  },
);

// ─── Logging helper ────────────────────────────────────────────────────────
//
// Single MCP log helper shared by health monitoring and tools. A failed log
// notification is reported on stderr and otherwise ignored.

const log: Log = (level, data) => {
  server.sendLoggingMessage({ level, data }).catch((err: unknown) => {
    process.stderr.write(`[polarion-mcp] log delivery failed: ${errorMessage(err)}\n`);
  });
};

// ─── Health monitoring ─────────────────────────────────────────────────────
//
// Fires at 3 consecutive transient failures (warning) and 5 (error).

client.onDegradation = (level, message) => log(level, `[health] ${message}`);

// ─── Registration ──────────────────────────────────────────────────────────

registerWorkItemTools(server, client, log);
registerProjectTools(server, client);
registerUserTools(server, client);
registerResources(server, client);

// ─── Transport ─────────────────────────────────────────────────────────────

const transport = new StdioServerTransport();

try {
  await server.connect(transport);
  await server.sendLoggingMessage({
    level: "info",
    data: `polarion-mcp v${version} started — ${client.baseUrl}`,
  });
} catch (err) {
  process.stderr.write(`[polarion-mcp] Failed to start: ${errorMessage(err)}\n`);
  process.exit(1);
}
