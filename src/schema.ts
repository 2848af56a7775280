/**
 * Declarative field tables for Polarion resource types.
 *
 * A ResourceSchema is built once per resource type and passed explicitly to
 * the codec and the diff engine. It is the single source of truth for which
 * attribute names are "known" (statically typed, validated with zod) and
 * which relationship names are known; every other name the server sends is
 * routed to the custom partitions.
 */

import { z } from "zod";

export type FieldKind =
  | "string"
  | "date"
  | "dateTime"
  | "text"
  | "hyperlinks"
  | "boolean"
  | "number";

export interface FieldSpec<V extends z.ZodTypeAny = z.ZodTypeAny> {
  readonly kind: FieldKind;
  readonly validator: V;
}

export type FieldSpecs = Readonly<Record<string, FieldSpec>>;

export type FieldValue<S extends FieldSpec> = z.infer<S["validator"]>;

/** Statically typed attribute record described by a set of field specs. */
export type AttributesOf<F extends FieldSpecs> = { [K in keyof F]: FieldValue<F[K]> };

const textContent = z.object({ type: z.string(), value: z.string() });
const hyperlink = z.object({ uri: z.string().optional(), role: z.string().optional() });

/** Field spec constructors; the kind decides emptiness and equality rules. */
export const field = {
  string: (): FieldSpec<z.ZodString> => ({ kind: "string", validator: z.string() }),
  /** `YYYY-MM-DD` */
  date: (): FieldSpec<z.ZodString> => ({ kind: "date", validator: z.string() }),
  /** ISO-8601 timestamp, kept as the server's string so round trips are exact. */
  dateTime: (): FieldSpec<z.ZodString> => ({ kind: "dateTime", validator: z.string() }),
  text: (): FieldSpec<typeof textContent> => ({ kind: "text", validator: textContent }),
  hyperlinks: (): FieldSpec<z.ZodArray<typeof hyperlink>> => ({
    kind: "hyperlinks",
    validator: z.array(hyperlink),
  }),
  boolean: (): FieldSpec<z.ZodBoolean> => ({ kind: "boolean", validator: z.boolean() }),
  number: (): FieldSpec<z.ZodNumber> => ({ kind: "number", validator: z.number() }),
} as const;

export interface ResourceSchema<F extends FieldSpecs = FieldSpecs, R extends string = string> {
  /** JSON:API resource type, e.g. "workitems". */
  readonly type: string;
  readonly attributes: F;
  readonly relationships: readonly R[];
  /** Attributes the server owns; stripped from update payloads. */
  readonly readOnly: ReadonlySet<string>;
  /** Relationships the server owns or that have their own endpoints; never sent in updates. */
  readonly readOnlyRelationships: ReadonlySet<string>;
}

export interface SchemaDefinition<F extends FieldSpecs, R extends string> {
  type: string;
  attributes: F;
  relationships?: readonly R[];
  readOnly?: readonly (keyof F & string)[];
  readOnlyRelationships?: readonly R[];
}

export function defineSchema<F extends FieldSpecs, R extends string = never>(
  def: SchemaDefinition<F, R>,
): ResourceSchema<F, R> {
  return {
    type: def.type,
    attributes: def.attributes,
    relationships: def.relationships ?? [],
    readOnly: new Set(def.readOnly ?? []),
    readOnlyRelationships: new Set(def.readOnlyRelationships ?? []),
  };
}

export function isKnownAttribute(schema: ResourceSchema, name: string): boolean {
  return Object.hasOwn(schema.attributes, name);
}

export function isKnownRelationship(schema: ResourceSchema, name: string): boolean {
  return schema.relationships.includes(name);
}

/** Whether an update may carry the named relationship. Custom relationships always may. */
export function isWritableRelationship(schema: ResourceSchema, name: string): boolean {
  return !schema.readOnlyRelationships.has(name);
}

/**
 * Narrows a plain record to the schema's attribute shape by validating every
 * entry against its field spec. Unknown names fail the check.
 */
export function matchesAttributes<F extends FieldSpecs>(
  schema: ResourceSchema<F, string>,
  value: unknown,
): value is Partial<AttributesOf<F>> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  for (const [name, v] of Object.entries(value)) {
    const spec = schema.attributes[name];
    if (!spec) return false;
    if (v !== undefined && !spec.validator.safeParse(v).success) return false;
  }
  return true;
}

/**
 * True when a known field value should be treated as absent: omitted on
 * encode and read as "not touched" by the diff engine.
 */
export function isEmptyValue(kind: FieldKind, value: unknown): boolean {
  if (value === undefined || value === null) return true;
  switch (kind) {
    case "string":
    case "date":
    case "dateTime":
      return value === "";
    case "hyperlinks":
      return Array.isArray(value) && value.length === 0;
    default:
      return false;
  }
}
