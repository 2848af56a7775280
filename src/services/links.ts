import type { PolarionClient } from "../client.js";
import { encodeResource, mergeResource } from "../codec.js";
import { ValidationError } from "../errors.js";
import { LINK_SCHEMA, WORK_ITEM_SCHEMA, type WorkItemLink } from "../models.js";
import { singleRef } from "../resource.js";
import { enc, fullId, shortId } from "../utils.js";
import type { CallOptions } from "./work-items.js";
import { collectPages, type Page, type PageRequest, pageParams, readPage, readResource, readResources } from "./document.js";

export interface LinkInput {
  /** Link role id, e.g. `relates_to`, `parent`. */
  role: string;
  /** Target work item; a short id stays in this project. */
  target: string;
  suspect?: boolean;
  /** Pin the link to this revision of the target. */
  revision?: string;
}

/**
 * Outgoing links of one work item.
 *
 * Link ids have the form `PROJ/WI-1/relates_to/PROJ/WI-2`: source, role, target.
 */
export class LinkService {
  private readonly base: string;

  constructor(
    private readonly client: PolarionClient,
    readonly projectId: string,
    readonly workItemId: string,
  ) {
    this.base = `/projects/${enc(projectId)}/workitems/${enc(shortId(workItemId))}/linkedworkitems`;
  }

  async get(linkId: string, options: CallOptions = {}): Promise<WorkItemLink> {
    const doc = await this.client.get(this.linkPath(linkId), {
      params: { "fields[linkedworkitems]": "@all" },
      signal: options.signal,
    });
    return readResource(LINK_SCHEMA, doc);
  }

  async page(options: PageRequest & CallOptions = {}): Promise<Page<WorkItemLink>> {
    const doc = await this.client.get(this.base, {
      params: { ...pageParams(options, this.client.limits.pageSize), "fields[linkedworkitems]": "@all" },
      signal: options.signal,
    });
    return readPage(LINK_SCHEMA, doc);
  }

  list(options: CallOptions = {}): Promise<WorkItemLink[]> {
    return collectPages(pageNumber => this.page({ ...options, pageNumber }));
  }

  async create(links: readonly LinkInput[], options: CallOptions = {}): Promise<WorkItemLink[]> {
    links.forEach((l, i) => {
      if (!l.role) throw new ValidationError("role", "link role is required", i);
      if (!l.target) throw new ValidationError("target", "target work item ID is required", i);
    });
    if (links.length === 0) return [];

    const data = links.map(l =>
      encodeResource(LINK_SCHEMA, {
        type: LINK_SCHEMA.type,
        attributes: { known: { role: l.role, suspect: l.suspect, revision: l.revision }, custom: {} },
        relationships: {
          known: { workItem: singleRef(WORK_ITEM_SCHEMA.type, fullId(this.projectId, l.target)) },
          custom: {},
        },
      }),
    );
    const doc = await this.client.post(this.base, { data }, options);
    return doc === undefined ? [] : readResources(LINK_SCHEMA, doc);
  }

  /** Sends the link's writable attributes, typically `suspect`. */
  async update(link: WorkItemLink, options: CallOptions = {}): Promise<void> {
    if (!link.id) throw new ValidationError("id", "link ID is required for update");
    const data = encodeResource(
      LINK_SCHEMA,
      { type: LINK_SCHEMA.type, id: link.id, attributes: link.attributes },
      { omitReadOnly: true },
    );
    const doc = await this.client.patch(this.linkPath(link.id), { data }, options);
    if (doc !== undefined) mergeResource(link, readResource(LINK_SCHEMA, doc));
  }

  async delete(linkIds: readonly string[], options: CallOptions = {}): Promise<void> {
    if (linkIds.length === 0) return;
    const data = linkIds.map(id => ({ type: LINK_SCHEMA.type, id }));
    await this.client.delete(this.base, { data }, options);
  }

  private linkPath(linkId: string): string {
    const [role, targetProject, target] = linkId.split("/").slice(-3);
    if (!role || !targetProject || !target || linkId.split("/").length < 5) {
      throw new ValidationError("id", `malformed link ID "${linkId}" (expected PROJ/WI-1/role/PROJ/WI-2)`);
    }
    return `${this.base}/${enc(role)}/${enc(targetProject)}/${enc(target)}`;
  }
}
