import type { PolarionClient } from "../client.js";
import { encodeResource, mergeResource } from "../codec.js";
import { ValidationError } from "../errors.js";
import { COMMENT_SCHEMA, type WorkItemComment } from "../models.js";
import { htmlText, singleRef, type TextContent } from "../resource.js";
import { enc, shortId } from "../utils.js";
import type { CallOptions } from "./work-items.js";
import { collectPages, type Page, type PageRequest, pageParams, readPage, readResource, readResources } from "./document.js";

export interface CommentInput {
  /** HTML, or explicit text content. */
  text: string | TextContent;
  title?: string;
  /** Comment this one replies to; short (`3`) or qualified (`PROJ/WI-1/3`). */
  parentCommentId?: string;
}

/** Comment threads of one work item. */
export class CommentService {
  private readonly base: string;
  private readonly workItemShortId: string;

  constructor(
    private readonly client: PolarionClient,
    readonly projectId: string,
    workItemId: string,
  ) {
    this.workItemShortId = shortId(workItemId);
    this.base = `/projects/${enc(projectId)}/workitems/${enc(this.workItemShortId)}/comments`;
  }

  async get(commentId: string, options: CallOptions = {}): Promise<WorkItemComment> {
    const doc = await this.client.get(`${this.base}/${enc(shortId(commentId))}`, {
      params: { "fields[workitem_comments]": "@all" },
      signal: options.signal,
    });
    return readResource(COMMENT_SCHEMA, doc);
  }

  async page(options: PageRequest & CallOptions = {}): Promise<Page<WorkItemComment>> {
    const doc = await this.client.get(this.base, {
      params: { ...pageParams(options, this.client.limits.pageSize), "fields[workitem_comments]": "@all" },
      signal: options.signal,
    });
    return readPage(COMMENT_SCHEMA, doc);
  }

  list(options: CallOptions = {}): Promise<WorkItemComment[]> {
    return collectPages(pageNumber => this.page({ ...options, pageNumber }));
  }

  /** Posts every comment in one request and returns the server's copies. */
  async create(comments: readonly CommentInput[], options: CallOptions = {}): Promise<WorkItemComment[]> {
    comments.forEach((c, i) => {
      const text = typeof c.text === "string" ? c.text : c.text.value;
      if (text.trim() === "") throw new ValidationError("text", "comment text is required", i);
    });
    if (comments.length === 0) return [];

    const data = comments.map(c => encodeResource(COMMENT_SCHEMA, this.newComment(c)));
    const doc = await this.client.post(this.base, { data }, options);
    return doc === undefined ? [] : readResources(COMMENT_SCHEMA, doc);
  }

  /** Sends the comment's writable attributes, e.g. `resolved`. */
  async update(comment: WorkItemComment, options: CallOptions = {}): Promise<void> {
    if (!comment.id) throw new ValidationError("id", "comment ID is required for update");
    const data = encodeResource(
      COMMENT_SCHEMA,
      { type: COMMENT_SCHEMA.type, id: comment.id, attributes: comment.attributes },
      { omitReadOnly: true },
    );
    const doc = await this.client.patch(`${this.base}/${enc(shortId(comment.id))}`, { data }, options);
    if (doc !== undefined) mergeResource(comment, readResource(COMMENT_SCHEMA, doc));
  }

  private newComment(input: CommentInput): WorkItemComment {
    const comment: WorkItemComment = {
      type: COMMENT_SCHEMA.type,
      attributes: {
        known: { text: typeof input.text === "string" ? htmlText(input.text) : input.text, title: input.title },
        custom: {},
      },
    };
    if (input.parentCommentId) {
      const parentId = input.parentCommentId.includes("/")
        ? input.parentCommentId
        : `${this.projectId}/${this.workItemShortId}/${input.parentCommentId}`;
      comment.relationships = { known: { parentComment: singleRef(COMMENT_SCHEMA.type, parentId) }, custom: {} };
    }
    return comment;
  }
}
