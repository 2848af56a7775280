import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { PolarionClient } from "../client.js";
import { fieldSelector } from "../fields.js";
import { newWorkItem, type WorkItem, type WorkItemAttributes } from "../models.js";
import { htmlText, type JsonValue, singleRef } from "../resource.js";
import { WorkItemService } from "../services/work-items.js";
import { DESTRUCTIVE, type Log, NO_LOG, READ_ONLY, run, WRITE, WRITE_IDEMPOTENT } from "../utils.js";
import { relationshipView, resourceView } from "./view.js";

const jsonValue: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValue), z.record(jsonValue)]),
);

const projectId = z.string().min(1).describe("Polarion project ID, e.g. MYPROJ");
const workItemId = z.string().min(1).describe("Work item ID, e.g. MYPROJ-123 (or MYPROJ/MYPROJ-123)");
const fields = z.string().optional().describe(
  "Sparse fieldset: 'basic', 'default', 'all', or a comma-separated list of work item fields",
);

/** Standard fields an LLM may set; everything else goes through customFields. */
const editableFields = {
  title: z.string().min(1).optional(),
  description: z.string().optional().describe("HTML body"),
  status: z.string().optional().describe("Status option id, e.g. 'open'"),
  priority: z.string().optional(),
  severity: z.string().optional(),
  resolution: z.string().optional(),
  dueDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).optional().describe("YYYY-MM-DD"),
  initialEstimate: z.string().optional().describe("Duration, e.g. '2d 4h'"),
  remainingEstimate: z.string().optional(),
  customFields: z.record(jsonValue).optional().describe(
    "Project-specific custom fields by id, e.g. { \"riskLevel\": \"high\" }",
  ),
};

type EditableFields = {
  [K in keyof typeof editableFields]?: z.infer<(typeof editableFields)[K]>;
};

function knownFrom(input: EditableFields): Partial<WorkItemAttributes> {
  const known: Partial<WorkItemAttributes> = {};
  if (input.title !== undefined) known.title = input.title;
  if (input.description !== undefined) known.description = htmlText(input.description);
  if (input.status !== undefined) known.status = input.status;
  if (input.priority !== undefined) known.priority = input.priority;
  if (input.severity !== undefined) known.severity = input.severity;
  if (input.resolution !== undefined) known.resolution = input.resolution;
  if (input.dueDate !== undefined) known.dueDate = input.dueDate;
  if (input.initialEstimate !== undefined) known.initialEstimate = input.initialEstimate;
  if (input.remainingEstimate !== undefined) known.remainingEstimate = input.remainingEstimate;
  return known;
}

export function registerWorkItemTools(server: McpServer, client: PolarionClient, log: Log = NO_LOG) {
  const service = (project: string) => new WorkItemService(client, project);

  server.registerTool("get_work_item", {
    title: "Get Work Item",
    description: "Get a single Polarion work item with its standard and custom fields.",
    inputSchema: {
      projectId,
      workItemId,
      fields,
      revision: z.string().optional().describe("Read the work item as of this revision"),
    },
    annotations: READ_ONLY,
  }, async (args, extra) => run(async () => {
    const item = await service(args.projectId).get(args.workItemId, {
      fields: fieldSelector(args.fields ?? "all"),
      revision: args.revision,
      signal: extra.signal,
    });
    return resourceView(item);
  }));

  server.registerTool("query_work_items", {
    title: "Query Work Items",
    description:
      "Search work items of a project with a Lucene query. " +
      "Returns one page; hasNext tells whether to request pageNumber + 1.",
    inputSchema: {
      projectId,
      query: z.string().optional().describe("Lucene query, e.g. 'type:requirement AND status:open'"),
      pageSize: z.number().int().min(1).max(100).default(25),
      pageNumber: z.number().int().min(1).default(1),
      fields: fields.default("basic"),
    },
    annotations: READ_ONLY,
  }, async (args, extra) => run(async () => {
    const page = await service(args.projectId).query({
      query: args.query,
      pageSize: args.pageSize,
      pageNumber: args.pageNumber,
      fields: fieldSelector(args.fields),
      signal: extra.signal,
    });
    return {
      items: page.items.map(resourceView),
      hasNext: page.hasNext,
      totalCount: page.totalCount,
    };
  }));

  server.registerTool("create_work_items", {
    title: "Create Work Items",
    description:
      "Create one or more work items in a project. Large inputs are split into several requests. " +
      "Items too large for a single request are skipped and listed under 'oversized'.",
    inputSchema: {
      projectId,
      items: z.array(z.object({
        type: z.string().min(1).describe("Work item type id, e.g. 'requirement', 'task'"),
        ...editableFields,
        title: z.string().min(1),
      })).min(1),
    },
    annotations: WRITE,
  }, async (args, extra) => run(async () => {
    const items = args.items.map(input => newWorkItem(input.type, knownFrom(input), input.customFields));
    const { created, oversized } = await service(args.projectId).create(items, { signal: extra.signal });
    if (oversized.length > 0) {
      log("warning", `[create_work_items] skipped ${oversized.length} oversized item(s): ` +
        oversized.map(o => `#${o.index} (${o.size} bytes)`).join(", "));
    }
    return {
      created: created.map(item => ({ id: item.id, title: item.attributes.known.title })),
      oversized,
    };
  }));

  server.registerTool("update_work_item", {
    title: "Update Work Item",
    description:
      "Change fields of a work item. Only fields that differ from the current state are sent. " +
      "Omitted fields stay untouched; list field ids under 'clear' to empty them.",
    inputSchema: {
      projectId,
      workItemId,
      ...editableFields,
      assignee: z.string().min(1).optional().describe("User id of the new assignee"),
      clear: z.array(z.string().min(1)).optional().describe("Field or relationship ids to clear, e.g. 'assignee'"),
    },
    annotations: WRITE_IDEMPOTENT,
  }, async (args, extra) => run(async () => {
    const workItems = service(args.projectId);
    const baseline = await workItems.get(args.workItemId, { fields: fieldSelector("all"), signal: extra.signal });
    const modified: WorkItem = structuredClone(baseline);
    Object.assign(modified.attributes.known, knownFrom(args));
    Object.assign(modified.attributes.custom, args.customFields);
    if (args.assignee !== undefined) {
      modified.relationships ??= { known: {}, custom: {} };
      modified.relationships.known.assignee = singleRef("users", args.assignee);
    }

    const changes = workItems.diff(baseline, modified, { clear: args.clear });
    const updated = await workItems.updateChanged(baseline, modified, { clear: args.clear, signal: extra.signal });
    const relationships = Object.entries(changes?.relationships ?? {});
    return {
      id: modified.id,
      updated,
      changed: changes
        ? [
          ...Object.keys(changes.known),
          ...Object.keys(changes.custom),
          ...relationships.filter(([, r]) => r.refs.length > 0).map(([name]) => name),
        ]
        : [],
      cleared: [
        ...(changes?.cleared ?? []),
        ...relationships.filter(([, r]) => r.refs.length === 0).map(([name]) => name),
      ],
    };
  }));

  server.registerTool("delete_work_items", {
    title: "Delete Work Items",
    description: "Permanently delete work items from a project.",
    inputSchema: {
      projectId,
      workItemIds: z.array(z.string().min(1)).min(1),
    },
    annotations: DESTRUCTIVE,
  }, async (args, extra) => run(async () => {
    await service(args.projectId).delete(args.workItemIds, { signal: extra.signal });
    return { deleted: args.workItemIds };
  }));

  server.registerTool("get_work_item_relationships", {
    title: "Get Work Item Relationships",
    description:
      "Get the targets of one relationship of a work item, " +
      "e.g. 'linkedWorkItems', 'assignee', 'attachments', or a custom reference field id.",
    inputSchema: {
      projectId,
      workItemId,
      relationship: z.string().min(1),
    },
    annotations: READ_ONLY,
  }, async (args, extra) => run(async () => {
    const relationship = await service(args.projectId).getRelationships(
      args.workItemId,
      args.relationship,
      { signal: extra.signal },
    );
    return {
      relationship: args.relationship,
      targets: relationshipView(relationship) ?? null,
      refs: relationship.refs,
    };
  }));
}
