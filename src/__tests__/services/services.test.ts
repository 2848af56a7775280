import { describe, expect, it } from "vitest";
import { TTL_5MIN, TTL_HOUR } from "../../client.js";
import { ValidationError } from "../../errors.js";
import { ApprovalService } from "../../services/approvals.js";
import { AttachmentService } from "../../services/attachments.js";
import { CommentService } from "../../services/comments.js";
import { collectPages, pageParams, readPage, readResources } from "../../services/document.js";
import { EnumerationService, enumerationOptions } from "../../services/enumerations.js";
import { LinkService } from "../../services/links.js";
import { ProjectService } from "../../services/projects.js";
import { UserGroupService } from "../../services/user-groups.js";
import { UserService } from "../../services/users.js";
import { WorkRecordService } from "../../services/work-records.js";
import { PROJECT_SCHEMA, USER_SCHEMA } from "../../models.js";
import { plainText } from "../../resource.js";
import { mockClient } from "../tools/helpers.js";

// ─── Documents ───────────────────────────────────────────────────────────

describe("document readers", () => {
  it("readPage reads hasNext from links.next and totalCount from meta", () => {
    const page = readPage(PROJECT_SCHEMA, {
      data: [{ type: "projects", id: "A", attributes: { name: "Alpha" } }],
      links: { next: "" },
      meta: { totalCount: 1 },
    });
    expect(page.items[0]?.attributes.known).toEqual({ name: "Alpha" });
    expect(page.hasNext).toBe(false);
    expect(page.totalCount).toBe(1);
  });

  it("readResources rejects a single resource where a collection is expected", () => {
    expect(() => readResources(USER_SCHEMA, { data: { type: "users", id: "alice" } }))
      .toThrow('Cannot decode field "data": expected a resource collection');
  });

  it("pageParams falls back to the default size and first page", () => {
    expect(pageParams({}, 50)).toEqual({ "page[size]": 50, "page[number]": 1 });
    expect(pageParams({ pageSize: 0, pageNumber: -1 }, 50)).toEqual({ "page[size]": 50, "page[number]": 1 });
    expect(pageParams({ pageSize: 10, pageNumber: 3 }, 50)).toEqual({ "page[size]": 10, "page[number]": 3 });
  });

  it("collectPages stops on an empty page even when next is advertised", async () => {
    const requested: number[] = [];
    const all = await collectPages(async n => {
      requested.push(n);
      return n === 1
        ? { items: ["a", "b"], hasNext: true, totalCount: undefined }
        : { items: [], hasNext: true, totalCount: undefined };
    });
    expect(all).toEqual(["a", "b"]);
    expect(requested).toEqual([1, 2]);
  });
});

// ─── Projects and users ──────────────────────────────────────────────────

describe("ProjectService", () => {
  it("caches project reads for five minutes", async () => {
    const cli = mockClient({ data: { type: "projects", id: "PROJ", attributes: { name: "Project", active: true } } });
    const project = await new ProjectService(cli.client).get("PROJ");
    expect(cli.getSpy).toHaveBeenCalledWith("/projects/PROJ", {
      params: { "fields[projects]": "@all" },
      signal: undefined,
      ttlMs: TTL_5MIN,
    });
    expect(project.attributes.known).toEqual({ name: "Project", active: true });
  });

  it("list walks every page", async () => {
    const cli = mockClient();
    cli.getSpy
      .mockResolvedValueOnce({ data: [{ type: "projects", id: "A" }], links: { next: "p2" } })
      .mockResolvedValueOnce({ data: [{ type: "projects", id: "B" }] });
    const all = await new ProjectService(cli.client).list({ pageSize: 1 });
    expect(all.map(p => p.id)).toEqual(["A", "B"]);
    expect(cli.getSpy.mock.calls[1]?.[1]?.params).toEqual({
      query: undefined,
      "page[size]": 1,
      "page[number]": 2,
      "fields[projects]": "@basic",
    });
  });
});

describe("UserService", () => {
  it("get reads all user fields", async () => {
    const cli = mockClient({ data: { type: "users", id: "alice", attributes: { name: "Alice", email: "alice@example.test" } } });
    const user = await new UserService(cli.client).get("alice");
    expect(cli.getSpy).toHaveBeenCalledWith("/users/alice", { params: { "fields[users]": "@all" }, signal: undefined });
    expect(user.attributes.known.email).toBe("alice@example.test");
  });

  it("update patches the user's attributes", async () => {
    const cli = mockClient();
    await new UserService(cli.client).update({
      type: "users",
      id: "alice",
      attributes: { known: { name: "Alice B." }, custom: {} },
    });
    expect(cli.patchSpy).toHaveBeenCalledWith(
      "/users/alice",
      { data: { type: "users", id: "alice", attributes: { name: "Alice B." } } },
      {},
    );
  });

  it("update requires an id", async () => {
    const cli = mockClient();
    await expect(new UserService(cli.client).update({ type: "users", attributes: { known: {}, custom: {} } }))
      .rejects.toThrow("id — user ID is required for update");
  });
});

// ─── Enumerations and attachments ────────────────────────────────────────

describe("EnumerationService", () => {
  const doc = {
    data: {
      type: "enumerations",
      id: "~/status/task",
      attributes: {
        enumName: "status",
        options: [
          { id: "open", name: "Open", color: "#00ff00", default: true },
          { id: "done", name: "Done" },
          { name: "no id" },
        ],
      },
    },
  };

  it("reads project enumerations with a one-hour cache", async () => {
    const cli = mockClient(doc);
    const enumeration = await new EnumerationService(cli.client, "PROJ").get("~", "status", "task");
    expect(cli.getSpy).toHaveBeenCalledWith("/projects/PROJ/enumerations/~/status/task", {
      signal: undefined,
      ttlMs: TTL_HOUR,
    });
    expect(enumerationOptions(enumeration)).toEqual([
      { id: "open", name: "Open", color: "#00ff00", default: true },
      { id: "done", name: "Done", color: undefined, default: false },
    ]);
  });

  it("reads global enumerations without a project prefix", async () => {
    const cli = mockClient(doc);
    await new EnumerationService(cli.client).get("~", "severity", "task");
    expect(cli.getSpy.mock.calls[0]?.[0]).toBe("/enumerations/~/severity/task");
  });
});

describe("AttachmentService", () => {
  it("lists the attachments of one work item", async () => {
    const cli = mockClient({
      data: [{ type: "workitem_attachments", id: "PROJ/WI-1/1-log.txt", attributes: { fileName: "log.txt", length: 120 } }],
    });
    const all = await new AttachmentService(cli.client, "PROJ", "PROJ/WI-1").list();
    expect(cli.getSpy.mock.calls[0]?.[0]).toBe("/projects/PROJ/workitems/WI-1/attachments");
    expect(all.map(a => a.attributes.known)).toEqual([{ fileName: "log.txt", length: 120 }]);
  });
});

// ─── Approvals ───────────────────────────────────────────────────────────

describe("ApprovalService", () => {
  const BASE = "/projects/PROJ/workitems/WI-1/approvals";

  it("requests approvals with status waiting by default", async () => {
    const cli = mockClient();
    cli.postSpy.mockResolvedValueOnce({
      data: [{ type: "workitem_approvals", id: "PROJ/WI-1/alice", attributes: { status: "waiting" } }],
    });
    const created = await new ApprovalService(cli.client, "PROJ", "WI-1").create([{ userId: "alice" }]);
    expect(cli.postSpy).toHaveBeenCalledWith(
      BASE,
      {
        data: [{
          type: "workitem_approvals",
          attributes: { status: "waiting" },
          relationships: { user: { data: { type: "users", id: "alice" } } },
        }],
      },
      {},
    );
    expect(created.map(a => a.id)).toEqual(["PROJ/WI-1/alice"]);
  });

  it("validates every request before sending", async () => {
    const cli = mockClient();
    const approvals = new ApprovalService(cli.client, "PROJ", "WI-1");
    await expect(approvals.create([{ userId: "alice" }, { userId: "" }]))
      .rejects.toThrow(new ValidationError("userId", "approver user ID is required", 1));
    expect(cli.postSpy).not.toHaveBeenCalled();
  });

  it("update addresses the approval by user", async () => {
    const cli = mockClient();
    await new ApprovalService(cli.client, "PROJ", "PROJ/WI-1").update("alice", "approved", { comment: "LGTM" });
    expect(cli.patchSpy).toHaveBeenCalledWith(
      `${BASE}/alice`,
      {
        data: {
          type: "workitem_approvals",
          id: "PROJ/WI-1/alice",
          attributes: { status: "approved", comment: "LGTM" },
        },
      },
      { signal: undefined },
    );
  });

  it("delete removes one approval", async () => {
    const cli = mockClient();
    await new ApprovalService(cli.client, "PROJ", "WI-1").delete("alice");
    expect(cli.deleteSpy).toHaveBeenCalledWith(`${BASE}/alice`, undefined, {});
  });
});

// ─── Comments ────────────────────────────────────────────────────────────

describe("CommentService", () => {
  const BASE = "/projects/PROJ/workitems/WI-1/comments";

  it("posts new comments and replies in one request", async () => {
    const cli = mockClient();
    cli.postSpy.mockResolvedValueOnce({
      data: [
        { type: "workitem_comments", id: "PROJ/WI-1/4" },
        { type: "workitem_comments", id: "PROJ/WI-1/5" },
      ],
    });
    const created = await new CommentService(cli.client, "PROJ", "PROJ/WI-1").create([
      { text: "<p>Looks good</p>" },
      { text: plainText("Agreed"), parentCommentId: "3" },
    ]);
    expect(cli.postSpy).toHaveBeenCalledWith(
      BASE,
      {
        data: [
          { type: "workitem_comments", attributes: { text: { type: "text/html", value: "<p>Looks good</p>" } } },
          {
            type: "workitem_comments",
            attributes: { text: { type: "text/plain", value: "Agreed" } },
            relationships: { parentComment: { data: { type: "workitem_comments", id: "PROJ/WI-1/3" } } },
          },
        ],
      },
      {},
    );
    expect(created.map(c => c.id)).toEqual(["PROJ/WI-1/4", "PROJ/WI-1/5"]);
  });

  it("rejects a blank comment before sending", async () => {
    const cli = mockClient();
    await expect(new CommentService(cli.client, "PROJ", "WI-1").create([{ text: "  " }]))
      .rejects.toThrow("item 0: text — comment text is required");
    expect(cli.postSpy).not.toHaveBeenCalled();
  });

  it("update sends writable attributes only", async () => {
    const cli = mockClient();
    await new CommentService(cli.client, "PROJ", "WI-1").update({
      type: "workitem_comments",
      id: "PROJ/WI-1/4",
      attributes: { known: { resolved: true, created: "2024-05-02T09:00:00Z" }, custom: {} },
    });
    expect(cli.patchSpy).toHaveBeenCalledWith(
      `${BASE}/4`,
      { data: { type: "workitem_comments", id: "PROJ/WI-1/4", attributes: { resolved: true } } },
      {},
    );
  });

  it("reads one comment by its short id", async () => {
    const cli = mockClient({
      data: { type: "workitem_comments", id: "PROJ/WI-1/4", attributes: { text: { type: "text/html", value: "x" } } },
    });
    const comment = await new CommentService(cli.client, "PROJ", "WI-1").get("PROJ/WI-1/4");
    expect(cli.getSpy).toHaveBeenCalledWith(`${BASE}/4`, {
      params: { "fields[workitem_comments]": "@all" },
      signal: undefined,
    });
    expect(comment.attributes.known.text?.value).toBe("x");
  });
});

// ─── Links ───────────────────────────────────────────────────────────────

describe("LinkService", () => {
  const BASE = "/projects/PROJ/workitems/WI-1/linkedworkitems";
  const LINK_ID = "PROJ/WI-1/relates_to/PROJ/WI-2";

  it("creates links to targets in this and other projects", async () => {
    const cli = mockClient();
    await new LinkService(cli.client, "PROJ", "WI-1").create([
      { role: "relates_to", target: "WI-2" },
      { role: "depends_on", target: "OTHER/WI-9", suspect: false },
    ]);
    expect(cli.postSpy).toHaveBeenCalledWith(
      BASE,
      {
        data: [
          {
            type: "linkedworkitems",
            attributes: { role: "relates_to" },
            relationships: { workItem: { data: { type: "workitems", id: "PROJ/WI-2" } } },
          },
          {
            type: "linkedworkitems",
            attributes: { role: "depends_on", suspect: false },
            relationships: { workItem: { data: { type: "workitems", id: "OTHER/WI-9" } } },
          },
        ],
      },
      {},
    );
  });

  it("requires a role and a target", async () => {
    const cli = mockClient();
    const links = new LinkService(cli.client, "PROJ", "WI-1");
    await expect(links.create([{ role: "", target: "WI-2" }])).rejects.toThrow("item 0: role — link role is required");
    await expect(links.create([{ role: "parent", target: "" }]))
      .rejects.toThrow("item 0: target — target work item ID is required");
    expect(cli.postSpy).not.toHaveBeenCalled();
  });

  it("addresses one link by role and target", async () => {
    const cli = mockClient({ data: { type: "linkedworkitems", id: LINK_ID, attributes: { role: "relates_to" } } });
    const link = await new LinkService(cli.client, "PROJ", "WI-1").get(LINK_ID);
    expect(cli.getSpy).toHaveBeenCalledWith(`${BASE}/relates_to/PROJ/WI-2`, {
      params: { "fields[linkedworkitems]": "@all" },
      signal: undefined,
    });
    expect(link.attributes.known.role).toBe("relates_to");
  });

  it("rejects a malformed link id", async () => {
    const cli = mockClient();
    await expect(new LinkService(cli.client, "PROJ", "WI-1").get("relates_to"))
      .rejects.toThrow('id — malformed link ID "relates_to" (expected PROJ/WI-1/role/PROJ/WI-2)');
    expect(cli.getSpy).not.toHaveBeenCalled();
  });

  it("update marks a link suspect without resending its role", async () => {
    const cli = mockClient();
    await new LinkService(cli.client, "PROJ", "WI-1").update({
      type: "linkedworkitems",
      id: LINK_ID,
      attributes: { known: { role: "relates_to", suspect: true }, custom: {} },
    });
    expect(cli.patchSpy).toHaveBeenCalledWith(
      `${BASE}/relates_to/PROJ/WI-2`,
      { data: { type: "linkedworkitems", id: LINK_ID, attributes: { suspect: true } } },
      {},
    );
  });

  it("deletes links in one request", async () => {
    const cli = mockClient();
    await new LinkService(cli.client, "PROJ", "WI-1").delete([LINK_ID]);
    expect(cli.deleteSpy).toHaveBeenCalledWith(BASE, { data: [{ type: "linkedworkitems", id: LINK_ID }] }, {});
  });
});

// ─── Work records ────────────────────────────────────────────────────────

describe("WorkRecordService", () => {
  const BASE = "/projects/PROJ/workitems/WI-1/workrecords";

  it("books time with the user as a relationship", async () => {
    const cli = mockClient();
    await new WorkRecordService(cli.client, "PROJ", "PROJ/WI-1").create([
      { userId: "alice", date: "2024-05-02", timeSpent: "2h 30m", comment: "pairing" },
      { userId: "bob", date: { year: 2024, month: 5, day: 3 }, timeSpent: "1d" },
    ]);
    expect(cli.postSpy).toHaveBeenCalledWith(
      BASE,
      {
        data: [
          {
            type: "workrecords",
            attributes: { date: "2024-05-02", timeSpent: "2h 30m", comment: { type: "text/plain", value: "pairing" } },
            relationships: { user: { data: { type: "users", id: "alice" } } },
          },
          {
            type: "workrecords",
            attributes: { date: "2024-05-03", timeSpent: "1d" },
            relationships: { user: { data: { type: "users", id: "bob" } } },
          },
        ],
      },
      {},
    );
  });

  it("rejects an impossible date", async () => {
    const cli = mockClient();
    await expect(new WorkRecordService(cli.client, "PROJ", "WI-1").create([
      { userId: "alice", date: "2024-02-30", timeSpent: "1h" },
    ])).rejects.toThrow('item 0: date — invalid date: "2024-02-30"');
    expect(cli.postSpy).not.toHaveBeenCalled();
  });

  it("rejects zero time spent", async () => {
    const cli = mockClient();
    await expect(new WorkRecordService(cli.client, "PROJ", "WI-1").create([
      { userId: "alice", date: "2024-05-02", timeSpent: "1h" },
      { userId: "alice", date: "2024-05-02", timeSpent: "0h" },
    ])).rejects.toThrow(new ValidationError("timeSpent", "time spent must be greater than zero", 1));
    expect(cli.postSpy).not.toHaveBeenCalled();
  });

  it("deletes records one at a time", async () => {
    const cli = mockClient();
    await new WorkRecordService(cli.client, "PROJ", "WI-1").delete(["PROJ/WI-1/wr-1", "wr-2"]);
    expect(cli.deleteSpy.mock.calls).toEqual([
      [`${BASE}/wr-1`, undefined, {}],
      [`${BASE}/wr-2`, undefined, {}],
    ]);
  });
});

// ─── User groups ─────────────────────────────────────────────────────────

describe("UserGroupService", () => {
  it("caches group reads for five minutes", async () => {
    const cli = mockClient({ data: { type: "usergroups", id: "developers", attributes: { name: "Developers" } } });
    const group = await new UserGroupService(cli.client).get("developers");
    expect(cli.getSpy).toHaveBeenCalledWith("/usergroups/developers", {
      params: { "fields[usergroups]": "@all" },
      signal: undefined,
      ttlMs: TTL_5MIN,
    });
    expect(group.attributes.known.name).toBe("Developers");
  });

  it("list passes the query", async () => {
    const cli = mockClient({ data: [{ type: "usergroups", id: "qa" }] });
    const all = await new UserGroupService(cli.client).list({ query: "name:qa*" });
    expect(all.map(g => g.id)).toEqual(["qa"]);
    expect(cli.getSpy.mock.calls[0]?.[1]?.params).toEqual({
      query: "name:qa*",
      "page[size]": 100,
      "page[number]": 1,
      "fields[usergroups]": "@all",
    });
  });
});
