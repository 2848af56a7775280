import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { beforeEach, describe, expect, it, type Mock, vi } from "vitest";
import { PolarionError } from "../../errors.js";
import { registerWorkItemTools } from "../../tools/work-items.js";
import type { Log } from "../../utils.js";
import {
  errorText,
  handlerFor,
  makeExtra,
  mockClient,
  mockServer,
  parseOkResult,
  workItemData,
  workItemDoc,
} from "./helpers.js";

const BASE = "/projects/PROJ/workitems";

describe("work item tools", () => {
  let tools: ReturnType<typeof mockServer>["tools"];
  let cli: ReturnType<typeof mockClient>;
  let extra: ReturnType<typeof makeExtra>;
  let log: Mock<Log>;

  function setup(limits: Parameters<typeof mockClient>[1] = {}) {
    const srv = mockServer();
    cli = mockClient(
      workItemDoc(
        "PROJ/WI-1",
        { title: "Login fails", status: "open", riskLevel: "low" },
        { assignee: { data: { type: "users", id: "alice" } }, comments: { links: { related: "c" } } },
      ),
      limits,
    );
    tools = srv.tools;
    extra = makeExtra();
    log = vi.fn<Log>();
    registerWorkItemTools(srv.server as unknown as McpServer, cli.client, log);
  }

  beforeEach(() => setup());

  it("registers 6 work item tools", () => {
    expect([...tools.keys()]).toEqual([
      "get_work_item",
      "query_work_items",
      "create_work_items",
      "update_work_item",
      "delete_work_items",
      "get_work_item_relationships",
    ]);
  });

  describe("get_work_item", () => {
    it("reads all fields and flattens the view", async () => {
      const result = await handlerFor(tools, "get_work_item")({ projectId: "PROJ", workItemId: "WI-1" }, extra);
      expect(cli.getSpy).toHaveBeenCalledWith(`${BASE}/WI-1`, {
        params: {
          "fields[workitems]": "@all",
          "fields[linkedworkitems]": "@all",
          "fields[workitem_attachments]": "@all",
          revision: undefined,
        },
        signal: extra.signal,
      });
      expect(parseOkResult(result)).toEqual({
        id: "PROJ/WI-1",
        revision: "100",
        title: "Login fails",
        status: "open",
        riskLevel: "low",
        relationships: { assignee: "alice" },
      });
    });

    it("renders API errors as tool errors", async () => {
      cli.getSpy.mockRejectedValueOnce(new PolarionError("Work item WI-9 not found", 404, false));
      const result = await handlerFor(tools, "get_work_item")({ projectId: "PROJ", workItemId: "WI-9" }, extra);
      expect(errorText(result)).toBe(
        "[Polarion 404] Work item WI-9 not found — Resource not found — verify the project ID and work item ID",
      );
    });
  });

  describe("query_work_items", () => {
    it("returns one page with paging info", async () => {
      cli.getSpy.mockResolvedValueOnce({
        data: [workItemData("PROJ/WI-1", { title: "A" })],
        links: { next: "more" },
        meta: { totalCount: 30 },
      });
      const result = await handlerFor(tools, "query_work_items")(
        { projectId: "PROJ", query: "status:open", pageSize: 25, pageNumber: 1, fields: "basic" },
        extra,
      );
      expect(cli.getSpy.mock.calls[0]?.[1]?.params).toEqual({
        query: "status:open",
        "page[size]": 25,
        "page[number]": 1,
        "fields[workitems]": "@basic",
        revision: undefined,
      });
      expect(parseOkResult(result)).toEqual({
        items: [{ id: "PROJ/WI-1", revision: "100", title: "A" }],
        hasNext: true,
        totalCount: 30,
      });
    });
  });

  describe("create_work_items", () => {
    it("creates items with HTML descriptions and custom fields", async () => {
      cli.postSpy.mockResolvedValueOnce({ data: [workItemData("PROJ/WI-5", {})] });
      const result = await handlerFor(tools, "create_work_items")({
        projectId: "PROJ",
        items: [{ type: "task", title: "A", description: "<p>x</p>", customFields: { riskLevel: "high" } }],
      }, extra);
      expect(cli.postSpy).toHaveBeenCalledWith(
        BASE,
        {
          data: [{
            type: "workitems",
            attributes: {
              title: "A",
              description: { type: "text/html", value: "<p>x</p>" },
              type: "task",
              riskLevel: "high",
            },
          }],
        },
        { signal: extra.signal },
      );
      expect(parseOkResult(result)).toEqual({ created: [{ id: "PROJ/WI-5", title: "A" }], oversized: [] });
      expect(log).not.toHaveBeenCalled();
    });

    it("logs a warning for items too large to send", async () => {
      setup({ maxContentSize: 100 });
      const result = await handlerFor(tools, "create_work_items")({
        projectId: "PROJ",
        items: [{ type: "task", title: "x".repeat(200) }],
      }, extra);
      expect(cli.postSpy).not.toHaveBeenCalled();
      expect(parseOkResult(result)).toMatchObject({ created: [], oversized: [{ index: 0 }] });
      expect(log).toHaveBeenCalledWith(
        "warning",
        expect.stringMatching(/^\[create_work_items\] skipped 1 oversized item\(s\): #0 \(\d+ bytes\)$/),
      );
    });
  });

  describe("update_work_item", () => {
    it("sends only the fields that differ", async () => {
      const result = await handlerFor(tools, "update_work_item")({
        projectId: "PROJ",
        workItemId: "WI-1",
        title: "Login fails",
        status: "done",
        customFields: { riskLevel: "high" },
      }, extra);
      expect(cli.patchSpy).toHaveBeenCalledWith(
        `${BASE}/WI-1`,
        { data: { type: "workitems", id: "PROJ/WI-1", attributes: { status: "done", riskLevel: "high" } } },
        { signal: extra.signal },
      );
      expect(parseOkResult(result)).toEqual({
        id: "PROJ/WI-1",
        updated: true,
        changed: ["status", "riskLevel"],
        cleared: [],
      });
    });

    it("sends nothing when the item already matches", async () => {
      const result = await handlerFor(tools, "update_work_item")({
        projectId: "PROJ",
        workItemId: "WI-1",
        status: "open",
      }, extra);
      expect(cli.patchSpy).not.toHaveBeenCalled();
      expect(parseOkResult(result)).toEqual({ id: "PROJ/WI-1", updated: false, changed: [], cleared: [] });
    });

    it("clears fields listed under clear", async () => {
      const result = await handlerFor(tools, "update_work_item")({
        projectId: "PROJ",
        workItemId: "WI-1",
        clear: ["riskLevel"],
      }, extra);
      expect(cli.patchSpy.mock.calls[0]?.[1]).toEqual({
        data: { type: "workitems", id: "PROJ/WI-1", attributes: { riskLevel: null } },
      });
      expect(parseOkResult(result)).toEqual({ id: "PROJ/WI-1", updated: true, changed: [], cleared: ["riskLevel"] });
    });

    it("reassigns the work item", async () => {
      const result = await handlerFor(tools, "update_work_item")({
        projectId: "PROJ",
        workItemId: "WI-1",
        assignee: "bob",
      }, extra);
      expect(cli.patchSpy.mock.calls[0]?.[1]).toEqual({
        data: {
          type: "workitems",
          id: "PROJ/WI-1",
          attributes: {},
          relationships: { assignee: { data: { type: "users", id: "bob" } } },
        },
      });
      expect(parseOkResult(result)).toEqual({ id: "PROJ/WI-1", updated: true, changed: ["assignee"], cleared: [] });
    });

    it("leaves the assignee alone when it is unchanged", async () => {
      const result = await handlerFor(tools, "update_work_item")({
        projectId: "PROJ",
        workItemId: "WI-1",
        assignee: "alice",
      }, extra);
      expect(cli.patchSpy).not.toHaveBeenCalled();
      expect(parseOkResult(result)).toEqual({ id: "PROJ/WI-1", updated: false, changed: [], cleared: [] });
    });

    it("unassigns through clear", async () => {
      const result = await handlerFor(tools, "update_work_item")({
        projectId: "PROJ",
        workItemId: "WI-1",
        clear: ["assignee"],
      }, extra);
      expect(cli.patchSpy.mock.calls[0]?.[1]).toEqual({
        data: { type: "workitems", id: "PROJ/WI-1", attributes: {}, relationships: { assignee: { data: null } } },
      });
      expect(parseOkResult(result)).toEqual({ id: "PROJ/WI-1", updated: true, changed: [], cleared: ["assignee"] });
    });
  });

  describe("delete_work_items", () => {
    it("deletes the listed items", async () => {
      const result = await handlerFor(tools, "delete_work_items")(
        { projectId: "PROJ", workItemIds: ["WI-1", "WI-2"] },
        extra,
      );
      expect(cli.deleteSpy).toHaveBeenCalledWith(
        BASE,
        { data: [{ type: "workitems", id: "PROJ/WI-1" }, { type: "workitems", id: "PROJ/WI-2" }] },
        { signal: extra.signal },
      );
      expect(parseOkResult(result)).toEqual({ deleted: ["WI-1", "WI-2"] });
    });
  });

  describe("get_work_item_relationships", () => {
    it("returns target ids and full references", async () => {
      cli.getSpy.mockResolvedValueOnce({ data: { type: "users", id: "alice" } });
      const result = await handlerFor(tools, "get_work_item_relationships")(
        { projectId: "PROJ", workItemId: "WI-1", relationship: "assignee" },
        extra,
      );
      expect(cli.getSpy).toHaveBeenCalledWith(`${BASE}/WI-1/relationships/assignee`, { signal: extra.signal });
      expect(parseOkResult(result)).toEqual({
        relationship: "assignee",
        targets: "alice",
        refs: [{ type: "users", id: "alice" }],
      });
    });
  });
});
