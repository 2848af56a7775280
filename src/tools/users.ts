import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { PolarionClient } from "../client.js";
import { UserService } from "../services/users.js";
import { READ_ONLY, run } from "../utils.js";
import { resourceView } from "./view.js";

export function registerUserTools(server: McpServer, client: PolarionClient) {
  const users = new UserService(client);

  server.registerTool("get_users", {
    title: "Get Users",
    description: "List Polarion users. Supports filtering by name or id via a Lucene query.",
    inputSchema: {
      query: z.string().optional().describe("Lucene query, e.g. 'name:Jane*'"),
      pageSize: z.number().int().min(1).max(100).default(50),
      pageNumber: z.number().int().min(1).default(1),
    },
    annotations: READ_ONLY,
  }, async ({ query, pageSize, pageNumber }, extra) => run(async () => {
    const page = await users.page({ query, pageSize, pageNumber, signal: extra.signal });
    return { items: page.items.map(resourceView), hasNext: page.hasNext, totalCount: page.totalCount };
  }));

  server.registerTool("get_user", {
    title: "Get User",
    description: "Get a specific Polarion user by ID.",
    inputSchema: {
      userId: z.string().min(1).describe("User ID (login name)"),
    },
    annotations: READ_ONLY,
  }, async ({ userId }, extra) => run(async () =>
    resourceView(await users.get(userId, { signal: extra.signal }))
  ));
}
