import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { PolarionClient } from "../client.js";
import { ProjectService } from "../services/projects.js";
import { READ_ONLY, run } from "../utils.js";
import { resourceView } from "./view.js";

export function registerProjectTools(server: McpServer, client: PolarionClient) {
  const projects = new ProjectService(client);

  server.registerTool("get_projects", {
    title: "Get Projects",
    description:
      "List Polarion projects accessible to the current user. " +
      "Results are cached for 5 minutes.",
    inputSchema: {
      query: z.string().optional().describe("Lucene query over project fields, e.g. 'name:Demo*'"),
      pageSize: z.number().int().min(1).max(100).default(100),
      pageNumber: z.number().int().min(1).default(1),
    },
    annotations: READ_ONLY,
  }, async ({ query, pageSize, pageNumber }, extra) => run(async () => {
    const page = await projects.page({ query, pageSize, pageNumber, signal: extra.signal });
    return { items: page.items.map(resourceView), hasNext: page.hasNext, totalCount: page.totalCount };
  }));

  server.registerTool("get_project", {
    title: "Get Project",
    description: "Get details of a single Polarion project by ID.",
    inputSchema: {
      projectId: z.string().min(1).describe("Project ID, e.g. MYPROJ"),
    },
    annotations: READ_ONLY,
  }, async ({ projectId }, extra) => run(async () =>
    resourceView(await projects.get(projectId, { signal: extra.signal }))
  ));
}
