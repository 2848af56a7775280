import { encodedSize, type OversizedItem, partition } from "../batch.js";
import type { PolarionClient } from "../client.js";
import {
  decodeRelationship,
  encodeAttributes,
  encodePatch,
  encodeRef,
  encodeRelationships,
  encodeResource,
  mergeResource,
} from "../codec.js";
import { type DiffOptions, diffResources, equals } from "../diff.js";
import { BatchCreateError, FieldDecodeError, ValidationError } from "../errors.js";
import { FIELDS_ALL, FIELDS_DEFAULT, type FieldSelector, toFieldParams } from "../fields.js";
import { WORK_ITEM_SCHEMA, type WorkItem, type WorkItemAttributes } from "../models.js";
import { type ChangeSet, isJsonObject, type JsonObject, type Relationship, type ResourceRef } from "../resource.js";
import { enc, fullId, shortId } from "../utils.js";
import { collectPages, documentData, type Page, type PageRequest, pageParams, readPage, readResource, readResources } from "./document.js";

export interface CallOptions {
  signal?: AbortSignal;
}

export interface GetWorkItemOptions extends CallOptions {
  fields?: FieldSelector;
  /** Read the work item as of this repository revision. */
  revision?: string;
}

export interface QueryWorkItemsOptions extends PageRequest, CallOptions {
  /** Lucene query, e.g. `type:requirement AND status:open`. */
  query?: string;
  fields?: FieldSelector;
  revision?: string;
}

export interface CreateResult {
  /** Placed items, in input order, with server ids and revisions filled in. */
  created: WorkItem[];
  /** Items too large for a single request; nothing was sent for them. */
  oversized: OversizedItem[];
}

export interface UpdateChangedOptions extends DiffOptions, CallOptions {}

/**
 * Work items of one project.
 *
 * Ids may be given short (`WI-1`) or qualified (`PROJ/WI-1`); URLs use the
 * short form, request bodies the qualified one.
 */
export class WorkItemService {
  private readonly base: string;

  constructor(
    private readonly client: PolarionClient,
    readonly projectId: string,
  ) {
    this.base = `/projects/${enc(projectId)}/workitems`;
  }

  async get(id: string, options: GetWorkItemOptions = {}): Promise<WorkItem> {
    const doc = await this.client.get(`${this.base}/${enc(shortId(id))}`, {
      params: { ...toFieldParams(options.fields ?? FIELDS_DEFAULT), revision: options.revision },
      signal: options.signal,
    });
    return readResource(WORK_ITEM_SCHEMA, doc);
  }

  /** One page of results. */
  async query(options: QueryWorkItemsOptions = {}): Promise<Page<WorkItem>> {
    const doc = await this.client.get(this.base, {
      params: {
        query: options.query || undefined,
        ...pageParams(options, this.client.limits.pageSize),
        ...toFieldParams(options.fields ?? FIELDS_ALL),
        revision: options.revision,
      },
      signal: options.signal,
    });
    return readPage(WORK_ITEM_SCHEMA, doc);
  }

  /** Every matching work item, following pages until the last one. */
  queryAll(query: string, options: Omit<QueryWorkItemsOptions, "query" | "pageNumber"> = {}): Promise<WorkItem[]> {
    return collectPages(pageNumber => this.query({ ...options, query, pageNumber }));
  }

  /**
   * Creates work items in as few requests as the batch size and content size
   * limits allow. Server-assigned ids and revisions are copied back onto the
   * given objects. Every item is validated before the first request.
   *
   * Requests go out one at a time. When one fails, a BatchCreateError reports
   * the failed and unsent item positions and the items already created.
   */
  async create(items: readonly WorkItem[], options: CallOptions = {}): Promise<CreateResult> {
    items.forEach((item, i) => this.validateNew(item, i));
    if (items.length === 0) return { created: [], oversized: [] };

    const encoded = items.map(item => encodeResource(WORK_ITEM_SCHEMA, { ...item, id: undefined }));
    const { batches, oversized } = partition(encoded, encodedSize, {
      maxCount: this.client.limits.batchSize,
      maxBytes: this.client.limits.maxContentSize,
    });

    const created: WorkItem[] = [];
    for (const [batchIndex, batch] of batches.entries()) {
      let results: WorkItem[];
      try {
        const doc = await this.client.post(this.base, { data: batch.items }, options);
        results = readResources(WORK_ITEM_SCHEMA, doc);
      } catch (err) {
        throw new BatchCreateError({
          batchIndex,
          batchCount: batches.length,
          indices: batch.indices,
          pendingIndices: batches.slice(batchIndex + 1).flatMap(b => b.indices),
          created: [...created],
        }, err);
      }
      batch.indices.forEach((itemIndex, i) => {
        const item = items[itemIndex];
        const result = results[i];
        if (result) mergeResource(item, result);
        created.push(item);
      });
    }
    return { created, oversized };
  }

  /** Sends every writable attribute and relationship of `item`. */
  async update(item: WorkItem, options: CallOptions = {}): Promise<void> {
    const id = this.requireId(item);
    const data: JsonObject = {
      type: WORK_ITEM_SCHEMA.type,
      id: fullId(this.projectId, id),
      attributes: encodeAttributes(WORK_ITEM_SCHEMA, item.attributes, { omitReadOnly: true }),
    };
    if (item.relationships) {
      const relationships = encodeRelationships(WORK_ITEM_SCHEMA, item.relationships, { omitReadOnly: true });
      if (Object.keys(relationships).length > 0) data.relationships = relationships;
    }
    await this.patchAndMerge(id, data, item, options);
  }

  /**
   * Sends only what changed between `baseline` (as fetched) and `modified`.
   * Returns false, without a request, when there is nothing to send.
   */
  async updateChanged(baseline: WorkItem, modified: WorkItem, options: UpdateChangedOptions = {}): Promise<boolean> {
    const id = this.requireId(modified);
    const changes = diffResources(WORK_ITEM_SCHEMA, baseline, modified, { clear: options.clear });
    if (!changes) return false;

    const data = encodePatch(WORK_ITEM_SCHEMA, { type: WORK_ITEM_SCHEMA.type, id: fullId(this.projectId, id) }, changes);
    await this.patchAndMerge(id, data, modified, { signal: options.signal });
    return true;
  }

  diff(baseline: WorkItem, modified: WorkItem, options?: DiffOptions): ChangeSet<WorkItemAttributes> | undefined {
    return diffResources(WORK_ITEM_SCHEMA, baseline, modified, options);
  }

  equals(a: WorkItem, b: WorkItem): boolean {
    return equals(WORK_ITEM_SCHEMA, a, b);
  }

  async delete(ids: readonly string[], options: CallOptions = {}): Promise<void> {
    if (ids.length === 0) return;
    const data = ids.map(id => ({ type: WORK_ITEM_SCHEMA.type, id: fullId(this.projectId, id) }));
    await this.client.delete(this.base, { data }, options);
  }

  // ─── Relationships ───────────────────────────────────────────────────────

  async getRelationships(id: string, relationship: string, options: CallOptions = {}): Promise<Relationship> {
    const doc = await this.client.get(this.relationshipPath(id, relationship), options);
    if (!isJsonObject(doc)) {
      throw new FieldDecodeError(relationship, "response is not a JSON:API document");
    }
    return decodeRelationship(relationship, doc);
  }

  /** Adds targets to a to-many relationship. */
  async createRelationships(id: string, relationship: string, refs: readonly ResourceRef[], options: CallOptions = {}): Promise<void> {
    if (refs.length === 0) return;
    await this.client.post(this.relationshipPath(id, relationship), { data: refs.map(encodeRef) }, options);
  }

  /** Replaces the targets of a relationship. */
  async updateRelationships(id: string, relationship: string, refs: readonly ResourceRef[], options: CallOptions = {}): Promise<void> {
    await this.client.patch(this.relationshipPath(id, relationship), { data: refs.map(encodeRef) }, options);
  }

  /** Removes the given targets from a to-many relationship. */
  async deleteRelationships(id: string, relationship: string, refs: readonly ResourceRef[], options: CallOptions = {}): Promise<void> {
    if (refs.length === 0) return;
    await this.client.delete(this.relationshipPath(id, relationship), { data: refs.map(encodeRef) }, options);
  }

  // ─── Workflow and documents ──────────────────────────────────────────────

  /** Workflow actions currently available on the work item, as returned by the server. */
  async getWorkflowActions(id: string, options: CallOptions = {}): Promise<JsonObject[]> {
    const doc = await this.client.get(`${this.base}/${enc(shortId(id))}/actions`, options);
    const data = documentData(doc);
    return Array.isArray(data) ? data.filter(isJsonObject) : [];
  }

  /**
   * Moves a work item into a LiveDoc.
   * @param documentId  Space-qualified document, e.g. `_default/Requirements`.
   * @param position    Insert position within the document; the server appends when omitted.
   */
  async moveToDocument(id: string, documentId: string, position?: number, options: CallOptions = {}): Promise<void> {
    if (!documentId) throw new ValidationError("targetDocument", "target document ID is required");
    const attributes: JsonObject = { targetDocument: documentId };
    if (position !== undefined) attributes.position = position;
    await this.client.post(
      `${this.base}/${enc(shortId(id))}/actions/moveToDocument`,
      { data: { type: WORK_ITEM_SCHEMA.type, id: fullId(this.projectId, id), attributes } },
      options,
    );
  }

  /** Takes a work item out of its document, keeping it in the project tracker. */
  async moveFromDocument(id: string, options: CallOptions = {}): Promise<void> {
    await this.client.post(
      `${this.base}/${enc(shortId(id))}/actions/moveFromDocument`,
      { data: { type: WORK_ITEM_SCHEMA.type, id: fullId(this.projectId, id) } },
      options,
    );
  }

  // ─── Internals ───────────────────────────────────────────────────────────

  private relationshipPath(id: string, relationship: string): string {
    return `${this.base}/${enc(shortId(id))}/relationships/${enc(relationship)}`;
  }

  private async patchAndMerge(id: string, data: JsonObject, target: WorkItem, options: CallOptions): Promise<void> {
    const doc = await this.client.patch(`${this.base}/${enc(shortId(id))}`, { data }, options);
    // 204 No Content carries nothing to merge
    if (doc === undefined) return;
    mergeResource(target, readResource(WORK_ITEM_SCHEMA, doc));
  }

  private requireId(item: WorkItem): string {
    if (!item.id) throw new ValidationError("id", "work item ID is required for update");
    return item.id;
  }

  private validateNew(item: WorkItem, index: number): void {
    if (item.type !== WORK_ITEM_SCHEMA.type) {
      throw new ValidationError("type", `resource type must be "${WORK_ITEM_SCHEMA.type}"`, index);
    }
    const { title } = item.attributes.known;
    if (typeof title !== "string" || title.trim() === "") {
      throw new ValidationError("title", "work item title is required", index);
    }
  }
}
