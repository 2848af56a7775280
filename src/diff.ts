/**
 * Change-set diff engine.
 *
 * A known field lands in the change set when the modified value is
 * non-empty and differs from the baseline. An empty modified value means
 * "not touched", so a plain diff can set or leave a field but never clear
 * it; fields passed in `clear` are the explicit third state and are sent as
 * null. Custom fields are compared structurally.
 *
 * Relationships follow the same rules: a relationship with no refs is
 * untouched, one whose refs or arity differ from the baseline is changed,
 * and one named in `clear` is sent with empty data. Read-only and links-only
 * relationships are never part of a change set.
 */

import { isDeepStrictEqual } from "node:util";
import type { AttributeSet, ChangeSet, Relationship, RelationshipSet, Resource, ResourceRef } from "./resource.js";
import {
  type AttributesOf,
  type FieldKind,
  type FieldSpecs,
  isEmptyValue,
  isKnownAttribute,
  isWritableRelationship,
  matchesAttributes,
  type ResourceSchema,
} from "./schema.js";

export interface DiffOptions {
  /**
   * Field names (known or custom) to clear. A name is reported in
   * `cleared` only when the baseline currently holds a value for it.
   */
  clear?: readonly string[];
}

export function diffAttributes<F extends FieldSpecs, R extends string>(
  schema: ResourceSchema<F, R>,
  baseline: AttributeSet<AttributesOf<F>>,
  modified: AttributeSet<AttributesOf<F>>,
  options: DiffOptions = {},
): ChangeSet<AttributesOf<F>> | undefined {
  const base = new Map<string, unknown>(Object.entries(baseline.known));
  const changedKnown: Record<string, unknown> = {};
  const changedCustom: ChangeSet<AttributesOf<F>>["custom"] = {};
  const cleared: string[] = [];
  const clear = new Set(options.clear ?? []);

  for (const [name, value] of Object.entries(modified.known)) {
    if (!isKnownAttribute(schema, name) || schema.readOnly.has(name) || clear.has(name)) continue;
    const kind = schema.attributes[name].kind;
    if (isEmptyValue(kind, value)) continue;
    if (!fieldEquals(kind, base.get(name), value)) changedKnown[name] = value;
  }

  for (const [name, value] of Object.entries(modified.custom)) {
    if (clear.has(name)) continue;
    if (!Object.hasOwn(baseline.custom, name) || !isDeepStrictEqual(baseline.custom[name], value)) {
      changedCustom[name] = value;
    }
  }

  for (const name of clear) {
    if (isKnownAttribute(schema, name)) {
      if (schema.readOnly.has(name)) continue;
      if (!isEmptyValue(schema.attributes[name].kind, base.get(name))) cleared.push(name);
    } else if (Object.hasOwn(baseline.custom, name) && baseline.custom[name] !== null) {
      cleared.push(name);
    }
  }

  if (Object.keys(changedKnown).length === 0 && Object.keys(changedCustom).length === 0 && cleared.length === 0) {
    return undefined;
  }
  if (!matchesAttributes(schema, changedKnown)) {
    throw new TypeError("modified attributes do not match the resource schema");
  }
  return { known: changedKnown, custom: changedCustom, cleared, relationships: {} };
}

/**
 * Changed relationships, keyed by name. Names in `clear` that the baseline
 * holds targets for map to an empty relationship of the baseline's arity.
 */
export function diffRelationships<F extends FieldSpecs, R extends string>(
  schema: ResourceSchema<F, R>,
  baseline: RelationshipSet<R> | undefined,
  modified: RelationshipSet<R> | undefined,
  options: DiffOptions = {},
): Record<string, Relationship> {
  const base = relationshipEntries(schema, baseline);
  const changed: Record<string, Relationship> = {};
  const clear = new Set(options.clear ?? []);

  for (const [name, relationship] of relationshipEntries(schema, modified)) {
    if (!isWritableRelationship(schema, name) || clear.has(name)) continue;
    if (relationship.shape === "none" || relationship.refs.length === 0) continue;
    const current = base.get(name);
    if (!current || !relationshipEquals(current, relationship)) {
      changed[name] = { refs: relationship.refs.map(r => ({ ...r })), shape: relationship.shape };
    }
  }

  for (const name of clear) {
    if (isKnownAttribute(schema, name) || !isWritableRelationship(schema, name)) continue;
    const current = base.get(name);
    if (current && current.refs.length > 0) {
      changed[name] = { refs: [], shape: current.shape === "many" ? "many" : "one" };
    }
  }

  return changed;
}

export function diffResources<F extends FieldSpecs, R extends string>(
  schema: ResourceSchema<F, R>,
  baseline: Resource<AttributesOf<F>, R>,
  modified: Resource<AttributesOf<F>, R>,
  options?: DiffOptions,
): ChangeSet<AttributesOf<F>> | undefined {
  const attributes = diffAttributes(schema, baseline.attributes, modified.attributes, options);
  const relationships = diffRelationships(schema, baseline.relationships, modified.relationships, options);
  if (Object.keys(relationships).length === 0) return attributes;
  return {
    known: attributes?.known ?? {},
    custom: attributes?.custom ?? {},
    cleared: attributes?.cleared ?? [],
    relationships,
  };
}

/** True when `b` carries no change relative to `a`. */
export function equals<F extends FieldSpecs, R extends string>(
  schema: ResourceSchema<F, R>,
  a: Resource<AttributesOf<F>, R>,
  b: Resource<AttributesOf<F>, R>,
): boolean {
  return diffResources(schema, a, b) === undefined;
}

function relationshipEntries<F extends FieldSpecs, R extends string>(
  schema: ResourceSchema<F, R>,
  set: RelationshipSet<R> | undefined,
): Map<string, Relationship> {
  const entries = new Map<string, Relationship>();
  if (!set) return entries;
  for (const name of schema.relationships) {
    const relationship = set.known[name];
    if (relationship) entries.set(name, relationship);
  }
  for (const [name, relationship] of Object.entries(set.custom)) entries.set(name, relationship);
  return entries;
}

function relationshipEquals(a: Relationship, b: Relationship): boolean {
  return a.shape === b.shape && a.refs.length === b.refs.length && a.refs.every((ref, i) => refEquals(ref, b.refs[i]));
}

function refEquals(a: ResourceRef, b: ResourceRef | undefined): boolean {
  return b !== undefined && a.type === b.type && a.id === b.id && a.revision === b.revision;
}

function fieldEquals(kind: FieldKind, a: unknown, b: unknown): boolean {
  if (kind === "dateTime" && typeof a === "string" && typeof b === "string") {
    const ta = Date.parse(a);
    const tb = Date.parse(b);
    if (!Number.isNaN(ta) && !Number.isNaN(tb)) return ta === tb;
    return a === b;
  }
  return isDeepStrictEqual(a, b);
}
