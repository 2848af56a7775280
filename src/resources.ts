import { type McpServer, ResourceTemplate } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { Variables } from "@modelcontextprotocol/sdk/shared/uriTemplate.js";
import type { PolarionClient } from "./client.js";
import { FIELDS_ALL } from "./fields.js";
import { ProjectService } from "./services/projects.js";
import { WorkItemService } from "./services/work-items.js";
import { resourceView } from "./tools/view.js";

/**
 * MCP Resources expose Polarion data as URI-addressable documents.
 *
 *   polarion://projects                                – all accessible projects (5 min cache)
 *   polarion://workitems/{projectId}/{workItemId}      – one work item, all fields (live)
 */
export function registerResources(server: McpServer, client: PolarionClient) {
  const projects = new ProjectService(client);

  // ── polarion://projects ──────────────────────────────────────────────────
  server.registerResource(
    "projects",
    "polarion://projects",
    {
      description: "All Polarion projects accessible to the current user.",
      mimeType: "application/json",
    },
    async (uri: URL, extra) => {
      const all = await projects.list({ signal: extra.signal });
      return {
        contents: [{ uri: uri.href, mimeType: "application/json", text: JSON.stringify(all.map(resourceView)) }],
      };
    },
  );

  // ── polarion://workitems/{projectId}/{workItemId} ────────────────────────
  server.registerResource(
    "workitem",
    new ResourceTemplate("polarion://workitems/{projectId}/{workItemId}", { list: undefined }),
    {
      description:
        "Full details of a Polarion work item. URI format: polarion://workitems/MYPROJ/MYPROJ-123",
      mimeType: "application/json",
    },
    async (uri: URL, variables: Variables, extra) => {
      const projectId = single(variables.projectId);
      const workItemId = single(variables.workItemId);
      const item = await new WorkItemService(client, projectId).get(workItemId, {
        fields: FIELDS_ALL,
        signal: extra.signal,
      });
      return {
        contents: [{ uri: uri.href, mimeType: "application/json", text: JSON.stringify(resourceView(item)) }],
      };
    },
  );
}

/** URI template variables may be exploded into lists; take the first value. */
function single(value: string | string[] | undefined): string {
  const v = Array.isArray(value) ? value[0] : value;
  if (!v) throw new Error("Missing URI template variable");
  return decodeURIComponent(v);
}
