import { TTL_5MIN, type PolarionClient } from "../client.js";
import { type Project, PROJECT_SCHEMA } from "../models.js";
import { enc } from "../utils.js";
import type { CallOptions } from "./work-items.js";
import { collectPages, type Page, type PageRequest, pageParams, readPage, readResource } from "./document.js";

export interface ListProjectsOptions extends PageRequest, CallOptions {
  /** Lucene query over project fields. */
  query?: string;
}

export class ProjectService {
  constructor(private readonly client: PolarionClient) {}

  async get(projectId: string, options: CallOptions = {}): Promise<Project> {
    const doc = await this.client.get(`/projects/${enc(projectId)}`, {
      params: { "fields[projects]": "@all" },
      signal: options.signal,
      ttlMs: TTL_5MIN,
    });
    return readResource(PROJECT_SCHEMA, doc);
  }

  async page(options: ListProjectsOptions = {}): Promise<Page<Project>> {
    const doc = await this.client.get("/projects", {
      params: {
        query: options.query || undefined,
        ...pageParams(options, this.client.limits.pageSize),
        "fields[projects]": "@basic",
      },
      signal: options.signal,
      ttlMs: TTL_5MIN,
    });
    return readPage(PROJECT_SCHEMA, doc);
  }

  /** Every project visible to the token's user. */
  list(options: Omit<ListProjectsOptions, "pageNumber"> = {}): Promise<Project[]> {
    return collectPages(pageNumber => this.page({ ...options, pageNumber }));
  }
}
