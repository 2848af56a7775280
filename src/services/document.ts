/**
 * Readers for JSON:API response documents (`{ data, links, meta }`).
 */

import { decodeResource } from "../codec.js";
import { FieldDecodeError } from "../errors.js";
import { isJsonObject, type JsonValue, type Resource } from "../resource.js";
import type { AttributesOf, FieldSpecs, ResourceSchema } from "../schema.js";

export interface Page<T> {
  items: T[];
  /** Whether the server advertised a `links.next` page. */
  hasNext: boolean;
  /** `meta.totalCount`, when the server reports it. */
  totalCount: number | undefined;
}

export interface PageRequest {
  pageSize?: number;
  /** 1-based. */
  pageNumber?: number;
}

/** The `data` member of a response document. */
export function documentData(doc: unknown): JsonValue {
  if (!isJsonObject(doc) || !("data" in doc)) {
    throw new FieldDecodeError("data", "response is not a JSON:API document");
  }
  return doc.data;
}

export function readResource<F extends FieldSpecs, R extends string>(
  schema: ResourceSchema<F, R>,
  doc: unknown,
): Resource<AttributesOf<F>, R> {
  return decodeResource(schema, documentData(doc));
}

export function readResources<F extends FieldSpecs, R extends string>(
  schema: ResourceSchema<F, R>,
  doc: unknown,
): Resource<AttributesOf<F>, R>[] {
  const data = documentData(doc);
  if (!Array.isArray(data)) {
    throw new FieldDecodeError("data", "expected a resource collection");
  }
  return data.map(item => decodeResource(schema, item));
}

export function readPage<F extends FieldSpecs, R extends string>(
  schema: ResourceSchema<F, R>,
  doc: unknown,
): Page<Resource<AttributesOf<F>, R>> {
  const items = readResources(schema, doc);
  let hasNext = false;
  let totalCount: number | undefined;
  if (isJsonObject(doc)) {
    const { links, meta } = doc;
    hasNext = isJsonObject(links) && typeof links.next === "string" && links.next !== "";
    if (isJsonObject(meta) && typeof meta.totalCount === "number") totalCount = meta.totalCount;
  }
  return { items, hasNext, totalCount };
}

export function pageParams(request: PageRequest, defaultSize: number): Record<string, number> {
  return {
    "page[size]": request.pageSize && request.pageSize > 0 ? request.pageSize : defaultSize,
    "page[number]": request.pageNumber && request.pageNumber > 0 ? request.pageNumber : 1,
  };
}

/** Follows pages from 1 until the server stops advertising a next page. */
export async function collectPages<T>(fetchPage: (pageNumber: number) => Promise<Page<T>>): Promise<T[]> {
  const all: T[] = [];
  for (let pageNumber = 1; ; pageNumber++) {
    const page = await fetchPage(pageNumber);
    all.push(...page.items);
    if (!page.hasNext || page.items.length === 0) return all;
  }
}
