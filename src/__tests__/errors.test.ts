import { describe, expect, it } from "vitest";
import {
  BatchCreateError,
  EncodingConflictError,
  FieldDecodeError,
  isNotFound,
  isRetryable,
  isTransientStatus,
  parseRetryAfter,
  PolarionError,
  ValidationError,
} from "../errors.js";

describe("isTransientStatus", () => {
  it("returns true for all transient status codes", () => {
    for (const code of [408, 425, 429, 500, 502, 503, 504]) {
      expect(isTransientStatus(code)).toBe(true);
    }
  });

  it("returns false for semantic status codes", () => {
    for (const code of [400, 401, 403, 404, 409, 200, 201]) {
      expect(isTransientStatus(code)).toBe(false);
    }
  });
});

describe("PolarionError", () => {
  it("sets all properties correctly", () => {
    const err = new PolarionError("Not found", 404, false);
    expect(err.message).toBe("Not found");
    expect(err.statusCode).toBe(404);
    expect(err.isTransient).toBe(false);
    expect(err.retryCount).toBe(0);
    expect(err.details).toEqual([]);
    expect(err.name).toBe("PolarionError");
  });

  it("generates hint from known status code", () => {
    expect(new PolarionError("err", 401, false).hint).toContain("POLARION_TOKEN");
  });

  it("generates hint for unknown status code", () => {
    expect(new PolarionError("err", 418, false).hint).toBe("HTTP 418");
  });

  it("generates hint for network error (no status code)", () => {
    expect(new PolarionError("err", undefined, true).hint).toContain("Network error");
  });

  it("toToolText includes status, message and retry info", () => {
    const text = new PolarionError("slow down", 429, true, { retryCount: 2 }).toToolText();
    expect(text).toBe(
      "[Polarion 429] slow down — Rate limit exceeded — reduce request frequency " +
      "(retried 2×, further retries will not help)",
    );
  });

  it("toToolText omits retry info when retryCount is 0", () => {
    expect(new PolarionError("fail", 500, true).toToolText()).not.toContain("retried");
  });

  it("toToolText lists JSON:API error details", () => {
    const err = new PolarionError("Bad request", 400, false, {
      details: [
        { title: "Bad Request", detail: "Unknown field", pointer: "/data/attributes/foo" },
        { title: "Bad Request", detail: "Title missing" },
        { detail: "plain" },
      ],
    });
    expect(err.toToolText()).toContain(
      "(field '/data/attributes/foo': Unknown field; Bad Request: Title missing; plain)",
    );
  });

  it("withRetryCount keeps everything else", () => {
    const cause = new Error("socket");
    const err = new PolarionError("rate limited", 429, true, { retryAfterMs: 5000, cause });
    const copy = err.withRetryCount(3);
    expect(copy.retryCount).toBe(3);
    expect(copy.retryAfterMs).toBe(5000);
    expect(copy.statusCode).toBe(429);
    expect(copy.cause).toBe(cause);
  });
});

describe("core errors", () => {
  it("EncodingConflictError names the field and partition", () => {
    const err = new EncodingConflictError("title", "attributes");
    expect(err.message).toBe('Custom field "title" collides with a known attributes name');
    expect(err.field).toBe("title");
    expect(err.partition).toBe("attributes");
  });

  it("EncodingConflictError wording for relationships", () => {
    expect(new EncodingConflictError("author", "relationships").message)
      .toBe('Custom relationship "author" collides with a known relationships name');
  });

  it("FieldDecodeError names the field", () => {
    const err = new FieldDecodeError("dueDate", "Expected string, received number");
    expect(err.message).toBe('Cannot decode field "dueDate": Expected string, received number');
    expect(err.field).toBe("dueDate");
  });

  it("ValidationError includes the item index when given", () => {
    expect(new ValidationError("title", "work item title is required", 2).message)
      .toBe("item 2: title — work item title is required");
    expect(new ValidationError("id", "required").message).toBe("id — required");
  });
});

describe("isRetryable", () => {
  it("follows isTransient for PolarionError", () => {
    expect(isRetryable(new PolarionError("x", 503, true))).toBe(true);
    expect(isRetryable(new PolarionError("x", 404, false))).toBe(false);
  });

  it("never retries codec or validation errors", () => {
    expect(isRetryable(new EncodingConflictError("a", "attributes"))).toBe(false);
    expect(isRetryable(new FieldDecodeError("a", "b"))).toBe(false);
    expect(isRetryable(new ValidationError("a", "b"))).toBe(false);
  });

  it("never retries a partly applied bulk create", () => {
    const failure = { batchIndex: 0, batchCount: 1, indices: [0], pendingIndices: [], created: [] };
    const err = new BatchCreateError(failure, new TypeError("fetch failed"));
    expect(isRetryable(err)).toBe(false);
  });

  it("treats unknown errors as network failures", () => {
    expect(isRetryable(new TypeError("fetch failed"))).toBe(true);
  });
});

describe("isNotFound", () => {
  it("matches only 404 PolarionErrors", () => {
    expect(isNotFound(new PolarionError("x", 404, false))).toBe(true);
    expect(isNotFound(new PolarionError("x", 400, false))).toBe(false);
    expect(isNotFound(new Error("404"))).toBe(false);
  });
});

describe("parseRetryAfter", () => {
  it("returns undefined for null", () => {
    expect(parseRetryAfter(null)).toBeUndefined();
  });

  it("parses integer seconds", () => {
    expect(parseRetryAfter("120")).toBe(120_000);
  });

  it("parses fractional seconds", () => {
    expect(parseRetryAfter("1.5")).toBe(1500);
  });

  it("returns 0 for an HTTP date in the past", () => {
    expect(parseRetryAfter("Wed, 21 Oct 2015 07:28:00 GMT")).toBe(0);
  });

  it("returns undefined for garbage", () => {
    expect(parseRetryAfter("soon")).toBeUndefined();
  });
});

describe("BatchCreateError", () => {
  const created = [
    { type: "workitems", id: "PROJ/WI-5", attributes: { known: {}, custom: {} } },
    { type: "workitems", attributes: { known: {}, custom: {} } },
  ];

  it("names the failed batch, its items and what was already created", () => {
    const cause = new PolarionError("bad", 400, false);
    const failure = { batchIndex: 1, batchCount: 3, indices: [2, 3], pendingIndices: [4], created };
    const err = new BatchCreateError(failure, cause);
    expect(err.message).toBe("Batch 2 of 3 failed (items 2, 3) after 2 item(s) were created: bad");
    expect(err.cause).toBe(cause);
    expect(err.toToolText()).toBe(
      "Batch 2 of 3 failed for items 2, 3; not sent: items 4. Already created: PROJ/WI-5, (no id). " +
      "[Polarion 400] bad — Check field names and values against the project's work item type configuration",
    );
  });

  it("reports a failure on the first batch", () => {
    const failure = { batchIndex: 0, batchCount: 1, indices: [0], pendingIndices: [], created: [] };
    const err = new BatchCreateError(failure, new Error("socket hang up"));
    expect(err.toToolText()).toBe("Batch 1 of 1 failed for items 0. Already created: none. socket hang up");
  });
});
