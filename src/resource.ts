/**
 * In-memory model of a Polarion JSON:API resource.
 *
 * Attributes and relationships are each split into the fields the resource
 * schema declares (`known`) and an open-ended bag for everything else the
 * server sends (`custom`). A name never lives in both partitions.
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

/** Rich text content, e.g. `{ type: "text/html", value: "<p>…</p>" }`. */
export interface TextContent {
  type: string;
  value: string;
}

export interface Hyperlink {
  uri?: string;
  role?: string;
}

/** Typed pointer to another resource. */
export interface ResourceRef {
  type: string;
  id: string;
  revision?: string;
}

/**
 * Wire arity of a relationship:
 *   one  — `data` is a single reference or null
 *   many — `data` is an array of references
 *   none — the server sent links/meta only, no `data`
 */
export type RelationshipShape = "one" | "many" | "none";

/** JSON:API `links` member, kept verbatim (`self`, `related`, `portal`, …). */
export type Links = JsonObject;

export interface Relationship {
  /** Always a list, whatever the wire arity. */
  refs: ResourceRef[];
  shape: RelationshipShape;
  links?: Links;
  meta?: JsonObject;
}

export interface AttributeSet<A> {
  known: Partial<A>;
  custom: Record<string, JsonValue>;
}

export interface RelationshipSet<R extends string = string> {
  known: Partial<Record<R, Relationship>>;
  custom: Record<string, Relationship>;
}

export interface Resource<A = Record<string, unknown>, R extends string = string> {
  type: string;
  /** Server-assigned id; absent on locally created resources. */
  id?: string;
  /** Concurrency token. */
  revision?: string;
  attributes: AttributeSet<A>;
  relationships?: RelationshipSet<R>;
  links?: Links;
  meta?: JsonObject;
}

/** Sparse diff between two versions of a resource. */
export interface ChangeSet<A> {
  known: Partial<A>;
  custom: Record<string, JsonValue>;
  /** Attributes the caller asked to clear; encoded as `null`. */
  cleared: string[];
  /**
   * Relationships, known or custom, whose targets changed. A cleared
   * relationship appears here with no refs.
   */
  relationships: Record<string, Relationship>;
}

export function singleRef(type: string, id: string): Relationship {
  return { refs: [{ type, id }], shape: "one" };
}

export function manyRefs(refs: readonly ResourceRef[]): Relationship {
  return { refs: refs.map(r => ({ ...r })), shape: "many" };
}

export function emptyAttributes<A>(): AttributeSet<A> {
  return { known: {}, custom: {} };
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function htmlText(html: string): TextContent {
  return { type: "text/html", value: html };
}

export function plainText(text: string): TextContent {
  return { type: "text/plain", value: text };
}
