/**
 * Flexible attribute codec: JSON:API wire objects ⇄ split attribute and
 * relationship sets.
 *
 * Decoding classifies every wire key against the schema; unknown keys are
 * copied verbatim into the custom partition. Encoding writes known fields
 * first (skipping empty ones), then merges the custom partition into the same
 * flat object. A custom key that shadows a known name is an error, never a
 * silent overwrite.
 *
 * All functions are pure.
 */

import { EncodingConflictError, FieldDecodeError } from "./errors.js";
import {
  type AttributeSet,
  type ChangeSet,
  isJsonObject,
  type JsonObject,
  type JsonValue,
  type Relationship,
  type RelationshipSet,
  type Resource,
  type ResourceRef,
} from "./resource.js";
import {
  type AttributesOf,
  type FieldSpecs,
  isEmptyValue,
  isKnownAttribute,
  isKnownRelationship,
  isWritableRelationship,
  matchesAttributes,
  type ResourceSchema,
} from "./schema.js";

export interface EncodeOptions {
  /**
   * Update payloads: drop the schema's read-only attributes and
   * relationships, links-only relationships, and server-owned links/meta.
   */
  omitReadOnly?: boolean;
}

// ─── Attributes ────────────────────────────────────────────────────────────

export function decodeAttributes<F extends FieldSpecs, R extends string>(
  schema: ResourceSchema<F, R>,
  wire: JsonObject | undefined,
): AttributeSet<AttributesOf<F>> {
  const known: Record<string, unknown> = {};
  const custom: Record<string, JsonValue> = {};

  for (const [name, value] of Object.entries(wire ?? {})) {
    if (!isKnownAttribute(schema, name)) {
      custom[name] = structuredClone(value);
      continue;
    }
    if (value === null) continue;
    const parsed = schema.attributes[name].validator.safeParse(value);
    if (!parsed.success) {
      throw new FieldDecodeError(name, parsed.error.issues[0]?.message ?? "invalid value");
    }
    known[name] = parsed.data;
  }

  if (!matchesAttributes(schema, known)) {
    // Unreachable: every entry above was validated against its spec
    throw new FieldDecodeError(Object.keys(known).join(","), "schema mismatch");
  }
  return { known, custom };
}

export function encodeAttributes<F extends FieldSpecs, R extends string>(
  schema: ResourceSchema<F, R>,
  set: AttributeSet<AttributesOf<F>>,
  options: EncodeOptions = {},
): JsonObject {
  const wire: JsonObject = {};

  for (const [name, value] of knownEntries(set.known)) {
    if (!isKnownAttribute(schema, name)) continue;
    if (options.omitReadOnly && schema.readOnly.has(name)) continue;
    if (isEmptyValue(schema.attributes[name].kind, value)) continue;
    wire[name] = toJson(name, value);
  }

  for (const [name, value] of Object.entries(set.custom)) {
    if (isKnownAttribute(schema, name)) {
      throw new EncodingConflictError(name, "attributes");
    }
    wire[name] = value;
  }

  return wire;
}

/** Attribute payload for a partial update: changed fields, plus `null` for cleared ones. */
export function encodeChangeSet<F extends FieldSpecs, R extends string>(
  schema: ResourceSchema<F, R>,
  changes: ChangeSet<AttributesOf<F>>,
): JsonObject {
  const wire = encodeAttributes(schema, { known: changes.known, custom: changes.custom }, { omitReadOnly: true });
  for (const name of changes.cleared) {
    if (isKnownAttribute(schema, name) && schema.readOnly.has(name)) continue;
    wire[name] = null;
  }
  return wire;
}

// ─── Relationships ─────────────────────────────────────────────────────────

export function decodeRelationships<F extends FieldSpecs, R extends string>(
  schema: ResourceSchema<F, R>,
  wire: JsonObject | undefined,
): RelationshipSet<R> {
  const known: Partial<Record<R, Relationship>> = {};
  const custom: Record<string, Relationship> = {};

  for (const [name, value] of Object.entries(wire ?? {})) {
    const relationship = decodeRelationship(name, value);
    const knownName = schema.relationships.find(r => r === name);
    if (knownName !== undefined) {
      known[knownName] = relationship;
    } else {
      custom[name] = relationship;
    }
  }

  return { known, custom };
}

export function encodeRelationships<F extends FieldSpecs, R extends string>(
  schema: ResourceSchema<F, R>,
  set: RelationshipSet<R>,
  options: EncodeOptions = {},
): JsonObject {
  const wire: JsonObject = {};
  const encode = (name: string, relationship: Relationship) => {
    if (!options.omitReadOnly) {
      wire[name] = encodeRelationship(relationship);
    } else if (isWritableRelationship(schema, name) && relationship.shape !== "none") {
      wire[name] = { data: relationshipData(relationship) };
    }
  };

  for (const name of schema.relationships) {
    const relationship = set.known[name];
    if (relationship) encode(name, relationship);
  }

  for (const [name, relationship] of Object.entries(set.custom)) {
    if (isKnownRelationship(schema, name)) {
      throw new EncodingConflictError(name, "relationships");
    }
    encode(name, relationship);
  }

  return wire;
}

/** Relationship payload for a partial update: `{ data }` per changed relationship. */
export function encodeRelationshipChanges<F extends FieldSpecs, R extends string>(
  schema: ResourceSchema<F, R>,
  changes: ChangeSet<AttributesOf<F>>,
): JsonObject {
  const wire: JsonObject = {};
  for (const [name, relationship] of Object.entries(changes.relationships)) {
    if (!isWritableRelationship(schema, name) || relationship.shape === "none") continue;
    wire[name] = { data: relationshipData(relationship) };
  }
  return wire;
}

export function decodeRelationship(name: string, value: JsonValue): Relationship {
  if (!isJsonObject(value)) {
    throw new FieldDecodeError(name, "relationship must be an object");
  }

  let relationship: Relationship;
  const data = value.data;
  if (!("data" in value)) {
    relationship = { refs: [], shape: "none" };
  } else if (Array.isArray(data)) {
    relationship = { refs: data.map(d => decodeRef(name, d)), shape: "many" };
  } else if (data === null) {
    relationship = { refs: [], shape: "one" };
  } else {
    relationship = { refs: [decodeRef(name, data)], shape: "one" };
  }

  const { links, meta } = value;
  if (isJsonObject(links)) relationship.links = structuredClone(links);
  if (isJsonObject(meta)) relationship.meta = structuredClone(meta);

  return relationship;
}

export function decodeRef(name: string, value: JsonValue): ResourceRef {
  if (!isJsonObject(value)) {
    throw new FieldDecodeError(name, "reference must be an object");
  }
  const { type, id, revision } = value;
  if (typeof type !== "string" || typeof id !== "string") {
    throw new FieldDecodeError(name, "reference must have string type and id");
  }
  const ref: ResourceRef = { type, id };
  if (typeof revision === "string") ref.revision = revision;
  return ref;
}

export function encodeRelationship(relationship: Relationship): JsonObject {
  const wire: JsonObject = {};
  if (relationship.shape !== "none") wire.data = relationshipData(relationship);
  if (relationship.links) wire.links = relationship.links;
  if (relationship.meta) wire.meta = relationship.meta;
  return wire;
}

/** The `data` member: one ref or null for to-one, a list for to-many. */
export function relationshipData(relationship: Relationship): JsonValue {
  if (relationship.shape === "many") return relationship.refs.map(encodeRef);
  const [ref] = relationship.refs;
  return ref ? encodeRef(ref) : null;
}

export function encodeRef(ref: ResourceRef): JsonObject {
  const wire: JsonObject = { type: ref.type, id: ref.id };
  if (ref.revision !== undefined) wire.revision = ref.revision;
  return wire;
}

// ─── Whole resources ───────────────────────────────────────────────────────

export function decodeResource<F extends FieldSpecs, R extends string>(
  schema: ResourceSchema<F, R>,
  wire: JsonValue,
): Resource<AttributesOf<F>, R> {
  if (!isJsonObject(wire)) {
    throw new FieldDecodeError("type", "resource must be an object");
  }
  const { type, id, revision, attributes, relationships, links, meta } = wire;
  if (typeof type !== "string") {
    throw new FieldDecodeError("type", "resource type must be a string");
  }

  const resource: Resource<AttributesOf<F>, R> = {
    type,
    attributes: decodeAttributes(schema, isJsonObject(attributes) ? attributes : undefined),
  };
  if (typeof id === "string") resource.id = id;
  if (typeof revision === "string") resource.revision = revision;
  if (isJsonObject(relationships)) {
    resource.relationships = decodeRelationships(schema, relationships);
  }
  if (isJsonObject(links)) resource.links = structuredClone(links);
  if (isJsonObject(meta)) resource.meta = structuredClone(meta);
  return resource;
}

export function encodeResource<F extends FieldSpecs, R extends string>(
  schema: ResourceSchema<F, R>,
  resource: Resource<AttributesOf<F>, R>,
  options: EncodeOptions = {},
): JsonObject {
  const wire: JsonObject = { type: resource.type };
  if (resource.id !== undefined) wire.id = resource.id;
  if (resource.revision !== undefined) wire.revision = resource.revision;
  wire.attributes = encodeAttributes(schema, resource.attributes, options);
  if (resource.relationships) {
    const relationships = encodeRelationships(schema, resource.relationships, options);
    if (Object.keys(relationships).length > 0) wire.relationships = relationships;
  }
  if (options.omitReadOnly) return wire;
  if (resource.links) wire.links = resource.links;
  if (resource.meta) wire.meta = resource.meta;
  return wire;
}

/**
 * `data` member of a PATCH request that carries only `changes`: changed and
 * cleared attributes, plus changed relationships when there are any.
 */
export function encodePatch<F extends FieldSpecs, R extends string>(
  schema: ResourceSchema<F, R>,
  target: { type: string; id: string },
  changes: ChangeSet<AttributesOf<F>>,
): JsonObject {
  const wire: JsonObject = { type: target.type, id: target.id, attributes: encodeChangeSet(schema, changes) };
  const relationships = encodeRelationshipChanges(schema, changes);
  if (Object.keys(relationships).length > 0) wire.relationships = relationships;
  return wire;
}

/**
 * Copies server-assigned state from a decoded response onto the caller's
 * resource: id, revision, links, and every attribute and relationship the
 * response carried. Custom fields the response omitted stay as they were.
 */
export function mergeResource<A, R extends string>(target: Resource<A, R>, source: Resource<A, R>): void {
  if (source.id !== undefined) target.id = source.id;
  if (source.revision !== undefined) target.revision = source.revision;
  if (source.links) target.links = source.links;
  target.attributes = {
    known: { ...target.attributes.known, ...source.attributes.known },
    custom: { ...target.attributes.custom, ...source.attributes.custom },
  };
  if (source.relationships) {
    const current = target.relationships ?? { known: {}, custom: {} };
    target.relationships = {
      known: { ...current.known, ...source.relationships.known },
      custom: { ...current.custom, ...source.relationships.custom },
    };
  }
}

// ─── Helpers ───────────────────────────────────────────────────────────────

function knownEntries(known: object): Array<[string, unknown]> {
  return Object.entries(known);
}

function toJson(name: string, value: unknown): JsonValue {
  if (isJsonValue(value)) return value;
  throw new FieldDecodeError(name, "value is not JSON-serializable");
}

function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object":
      if (Array.isArray(value)) return value.every(isJsonValue);
      return Object.values(value).every(v => v === undefined || isJsonValue(v));
    default:
      return false;
  }
}
