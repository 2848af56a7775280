import type { PolarionClient } from "../client.js";
import { encodeAttributes, mergeResource } from "../codec.js";
import { ValidationError } from "../errors.js";
import { type User, USER_SCHEMA } from "../models.js";
import { enc } from "../utils.js";
import type { CallOptions } from "./work-items.js";
import { collectPages, type Page, type PageRequest, pageParams, readPage, readResource } from "./document.js";

export interface ListUsersOptions extends PageRequest, CallOptions {
  query?: string;
}

export class UserService {
  constructor(private readonly client: PolarionClient) {}

  async get(userId: string, options: CallOptions = {}): Promise<User> {
    const doc = await this.client.get(`/users/${enc(userId)}`, {
      params: { "fields[users]": "@all" },
      signal: options.signal,
    });
    return readResource(USER_SCHEMA, doc);
  }

  async page(options: ListUsersOptions = {}): Promise<Page<User>> {
    const doc = await this.client.get("/users", {
      params: {
        query: options.query || undefined,
        ...pageParams(options, this.client.limits.pageSize),
        "fields[users]": "@basic",
      },
      signal: options.signal,
    });
    return readPage(USER_SCHEMA, doc);
  }

  list(options: Omit<ListUsersOptions, "pageNumber"> = {}): Promise<User[]> {
    return collectPages(pageNumber => this.page({ ...options, pageNumber }));
  }

  /** Sends the user's attributes; the server echo, if any, is merged back. */
  async update(user: User, options: CallOptions = {}): Promise<void> {
    if (!user.id) throw new ValidationError("id", "user ID is required for update");
    const doc = await this.client.patch(
      `/users/${enc(user.id)}`,
      { data: { type: USER_SCHEMA.type, id: user.id, attributes: encodeAttributes(USER_SCHEMA, user.attributes) } },
      options,
    );
    if (doc !== undefined) mergeResource(user, readResource(USER_SCHEMA, doc));
  }
}
