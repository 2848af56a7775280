import type { PolarionClient } from "../client.js";
import { type Attachment, ATTACHMENT_SCHEMA } from "../models.js";
import { enc, shortId } from "../utils.js";
import type { CallOptions } from "./work-items.js";
import { collectPages, type Page, type PageRequest, pageParams, readPage, readResource } from "./document.js";

/** Attachment metadata of one work item. */
export class AttachmentService {
  private readonly base: string;

  constructor(
    private readonly client: PolarionClient,
    readonly projectId: string,
    readonly workItemId: string,
  ) {
    this.base = `/projects/${enc(projectId)}/workitems/${enc(shortId(workItemId))}/attachments`;
  }

  async get(attachmentId: string, options: CallOptions = {}): Promise<Attachment> {
    const doc = await this.client.get(`${this.base}/${enc(attachmentId)}`, {
      params: { "fields[workitem_attachments]": "@all" },
      signal: options.signal,
    });
    return readResource(ATTACHMENT_SCHEMA, doc);
  }

  async page(options: PageRequest & CallOptions = {}): Promise<Page<Attachment>> {
    const doc = await this.client.get(this.base, {
      params: { ...pageParams(options, this.client.limits.pageSize), "fields[workitem_attachments]": "@all" },
      signal: options.signal,
    });
    return readPage(ATTACHMENT_SCHEMA, doc);
  }

  list(options: CallOptions = {}): Promise<Attachment[]> {
    return collectPages(pageNumber => this.page({ ...options, pageNumber }));
  }
}
