import type { PolarionClient } from "../client.js";
import { encodeResource } from "../codec.js";
import { ValidationError } from "../errors.js";
import { type Approval, APPROVAL_SCHEMA, APPROVAL_STATUSES, type ApprovalStatus } from "../models.js";
import { singleRef } from "../resource.js";
import { enc, shortId } from "../utils.js";
import type { CallOptions } from "./work-items.js";
import { readResources } from "./document.js";

export interface ApprovalRequest {
  userId: string;
  status?: ApprovalStatus;
  comment?: string;
}

/** Approval requests on one work item, keyed by the approving user. */
export class ApprovalService {
  private readonly base: string;
  private readonly workItemShortId: string;

  constructor(
    private readonly client: PolarionClient,
    readonly projectId: string,
    workItemId: string,
  ) {
    this.workItemShortId = shortId(workItemId);
    this.base = `/projects/${enc(projectId)}/workitems/${enc(this.workItemShortId)}/approvals`;
  }

  async list(options: CallOptions = {}): Promise<Approval[]> {
    const doc = await this.client.get(this.base, {
      params: { "fields[workitem_approvals]": "@all" },
      signal: options.signal,
    });
    return readResources(APPROVAL_SCHEMA, doc);
  }

  /** Requests approval from each user; status defaults to `waiting`. */
  async create(requests: readonly ApprovalRequest[], options: CallOptions = {}): Promise<Approval[]> {
    requests.forEach((r, i) => {
      if (!r.userId) throw new ValidationError("userId", "approver user ID is required", i);
      if (r.status !== undefined) assertStatus(r.status, i);
    });
    if (requests.length === 0) return [];

    const data = requests.map(r =>
      encodeResource(APPROVAL_SCHEMA, {
        type: APPROVAL_SCHEMA.type,
        attributes: { known: { status: r.status ?? "waiting", comment: r.comment }, custom: {} },
        relationships: { known: { user: singleRef("users", r.userId) }, custom: {} },
      }),
    );
    const doc = await this.client.post(this.base, { data }, options);
    return doc === undefined ? [] : readResources(APPROVAL_SCHEMA, doc);
  }

  async update(userId: string, status: ApprovalStatus, options: CallOptions & { comment?: string } = {}): Promise<void> {
    assertStatus(status);
    const data = encodeResource(APPROVAL_SCHEMA, {
      type: APPROVAL_SCHEMA.type,
      id: `${this.projectId}/${this.workItemShortId}/${userId}`,
      attributes: { known: { status, comment: options.comment }, custom: {} },
    });
    await this.client.patch(`${this.base}/${enc(userId)}`, { data }, { signal: options.signal });
  }

  async delete(userId: string, options: CallOptions = {}): Promise<void> {
    await this.client.delete(`${this.base}/${enc(userId)}`, undefined, options);
  }
}

function assertStatus(status: string, index?: number): void {
  if (!APPROVAL_STATUSES.some(s => s === status)) {
    throw new ValidationError("status", `must be one of ${APPROVAL_STATUSES.join(", ")}`, index);
  }
}
