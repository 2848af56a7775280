import { TTL_5MIN, type PolarionClient } from "../client.js";
import { type UserGroup, USER_GROUP_SCHEMA } from "../models.js";
import { enc } from "../utils.js";
import type { CallOptions } from "./work-items.js";
import { collectPages, type Page, type PageRequest, pageParams, readPage, readResource } from "./document.js";

export interface ListUserGroupsOptions extends PageRequest, CallOptions {
  query?: string;
}

export class UserGroupService {
  constructor(private readonly client: PolarionClient) {}

  async get(groupId: string, options: CallOptions = {}): Promise<UserGroup> {
    const doc = await this.client.get(`/usergroups/${enc(groupId)}`, {
      params: { "fields[usergroups]": "@all" },
      signal: options.signal,
      ttlMs: TTL_5MIN,
    });
    return readResource(USER_GROUP_SCHEMA, doc);
  }

  async page(options: ListUserGroupsOptions = {}): Promise<Page<UserGroup>> {
    const doc = await this.client.get("/usergroups", {
      params: {
        query: options.query || undefined,
        ...pageParams(options, this.client.limits.pageSize),
        "fields[usergroups]": "@all",
      },
      signal: options.signal,
      ttlMs: TTL_5MIN,
    });
    return readPage(USER_GROUP_SCHEMA, doc);
  }

  list(options: Omit<ListUserGroupsOptions, "pageNumber"> = {}): Promise<UserGroup[]> {
    return collectPages(pageNumber => this.page({ ...options, pageNumber }));
  }
}
