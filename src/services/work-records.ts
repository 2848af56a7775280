import type { PolarionClient } from "../client.js";
import { encodeResource } from "../codec.js";
import { ValidationError } from "../errors.js";
import { type DateOnly, formatDateOnly, parseDateOnly, parseDuration } from "../field-types.js";
import { WORK_RECORD_SCHEMA, type WorkRecord } from "../models.js";
import { plainText, singleRef } from "../resource.js";
import { enc, shortId } from "../utils.js";
import type { CallOptions } from "./work-items.js";
import { collectPages, type Page, type PageRequest, pageParams, readPage, readResource, readResources } from "./document.js";

export interface WorkRecordInput {
  userId: string;
  /** `YYYY-MM-DD`, or a calendar date. */
  date: string | DateOnly;
  /** Polarion duration, e.g. `"2h 30m"`. */
  timeSpent: string;
  comment?: string;
}

/** Time booked against one work item. */
export class WorkRecordService {
  private readonly base: string;

  constructor(
    private readonly client: PolarionClient,
    readonly projectId: string,
    readonly workItemId: string,
  ) {
    this.base = `/projects/${enc(projectId)}/workitems/${enc(shortId(workItemId))}/workrecords`;
  }

  async get(recordId: string, options: CallOptions = {}): Promise<WorkRecord> {
    const doc = await this.client.get(`${this.base}/${enc(shortId(recordId))}`, {
      params: { "fields[workrecords]": "@all" },
      signal: options.signal,
    });
    return readResource(WORK_RECORD_SCHEMA, doc);
  }

  async page(options: PageRequest & CallOptions = {}): Promise<Page<WorkRecord>> {
    const doc = await this.client.get(this.base, {
      params: { ...pageParams(options, this.client.limits.pageSize), "fields[workrecords]": "@all" },
      signal: options.signal,
    });
    return readPage(WORK_RECORD_SCHEMA, doc);
  }

  list(options: CallOptions = {}): Promise<WorkRecord[]> {
    return collectPages(pageNumber => this.page({ ...options, pageNumber }));
  }

  /** Books every record in one request. Inputs are validated before it is sent. */
  async create(records: readonly WorkRecordInput[], options: CallOptions = {}): Promise<WorkRecord[]> {
    const data = records.map((r, i) => {
      if (!r.userId) throw new ValidationError("userId", "user ID is required", i);
      const date = checkDate(r.date, i);
      checkTimeSpent(r.timeSpent, i);
      return encodeResource(WORK_RECORD_SCHEMA, {
        type: WORK_RECORD_SCHEMA.type,
        attributes: {
          known: { date, timeSpent: r.timeSpent, comment: r.comment ? plainText(r.comment) : undefined },
          custom: {},
        },
        relationships: { known: { user: singleRef("users", r.userId) }, custom: {} },
      });
    });
    if (data.length === 0) return [];

    const doc = await this.client.post(this.base, { data }, options);
    return doc === undefined ? [] : readResources(WORK_RECORD_SCHEMA, doc);
  }

  /** Deletes records one request at a time, stopping at the first failure. */
  async delete(recordIds: readonly string[], options: CallOptions = {}): Promise<void> {
    for (const id of recordIds) {
      await this.client.delete(`${this.base}/${enc(shortId(id))}`, undefined, options);
    }
  }
}

function checkDate(date: string | DateOnly, index: number): string {
  try {
    return formatDateOnly(typeof date === "string" ? parseDateOnly(date) : date);
  } catch (err) {
    throw new ValidationError("date", err instanceof Error ? err.message : "invalid date", index);
  }
}

function checkTimeSpent(timeSpent: string, index: number): void {
  let ms: number;
  try {
    ms = parseDuration(timeSpent);
  } catch (err) {
    throw new ValidationError("timeSpent", err instanceof Error ? err.message : "invalid duration", index);
  }
  if (ms <= 0) throw new ValidationError("timeSpent", "time spent must be greater than zero", index);
}
