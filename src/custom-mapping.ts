/**
 * Declarative mapping between a typed record and a resource's custom bags.
 *
 * ```ts
 * const RiskFields = defineCustomFieldMapping({
 *   riskScore: customField.number(),
 *   reviewDate: customField.date({ key: "review_date" }),
 *   owner: customField.reference("users"),
 * });
 * const values = RiskFields.load(workItem);   // { riskScore?: number, ... }
 * RiskFields.save(workItem, { ...values, riskScore: 7 });
 * ```
 *
 * Scalar fields live in `attributes.custom`; reference fields in
 * `relationships.custom`. Saving `undefined` removes the entry.
 */

import { CustomFields } from "./custom-fields.js";
import type { DateOnly, TableField, TimeOnly } from "./field-types.js";
import { type JsonValue, manyRefs, type Relationship, type Resource, singleRef, type TextContent } from "./resource.js";

export interface CustomSource {
  fields: CustomFields;
  relationships: Record<string, Relationship>;
}

export interface CustomFieldDescriptor<T> {
  /** Wire name; defaults to the mapping's property name. */
  readonly key: string | undefined;
  load(source: CustomSource, key: string): T | undefined;
  save(target: CustomSource, key: string, value: T | undefined): void;
}

interface KeyOption {
  key?: string;
}

function attribute<T>(
  read: (fields: CustomFields, key: string) => T | undefined,
  write: (fields: CustomFields, key: string, value: T) => void,
  options: KeyOption = {},
): CustomFieldDescriptor<T> {
  return {
    key: options.key,
    load: (source, key) => read(source.fields, key),
    save: (target, key, value) => {
      if (value === undefined) target.fields.delete(key);
      else write(target.fields, key, value);
    },
  };
}

const setJson = (fields: CustomFields, key: string, value: JsonValue) => fields.set(key, value);

export const customField = {
  string: (o?: KeyOption) => attribute<string>((f, k) => f.getString(k), setJson, o),
  enumeration: (o?: KeyOption) => attribute<string>((f, k) => f.getEnum(k), setJson, o),
  number: (o?: KeyOption) => attribute<number>((f, k) => f.getNumber(k), setJson, o),
  integer: (o?: KeyOption) =>
    attribute<number>((f, k) => f.getInteger(k), (f, k, v) => f.set(k, Math.trunc(v)), o),
  boolean: (o?: KeyOption) => attribute<boolean>((f, k) => f.getBoolean(k), setJson, o),
  text: (o?: KeyOption) =>
    attribute<TextContent>((f, k) => f.getText(k), (f, k, v) => f.set(k, { type: v.type, value: v.value }), o),
  date: (o?: KeyOption) => attribute<DateOnly>((f, k) => f.getDate(k), (f, k, v) => f.setDate(k, v), o),
  time: (o?: KeyOption) => attribute<TimeOnly>((f, k) => f.getTime(k), (f, k, v) => f.setTime(k, v), o),
  dateTime: (o?: KeyOption) => attribute<Date>((f, k) => f.getDateTime(k), (f, k, v) => f.setDateTime(k, v), o),
  /** Milliseconds. */
  duration: (o?: KeyOption) => attribute<number>((f, k) => f.getDuration(k), (f, k, v) => f.setDuration(k, v), o),
  table: (o?: KeyOption) => attribute<TableField>((f, k) => f.getTable(k), (f, k, v) => f.setTable(k, v), o),

  /** Single reference; the value is the target's id. */
  reference: (targetType: string, o: KeyOption = {}): CustomFieldDescriptor<string> => ({
    key: o.key,
    load: (source, key) => source.relationships[key]?.refs[0]?.id,
    save: (target, key, value) => {
      if (value === undefined) delete target.relationships[key];
      else target.relationships[key] = singleRef(targetType, value);
    },
  }),

  /** Multi-valued reference; the value is the list of target ids. */
  references: (targetType: string, o: KeyOption = {}): CustomFieldDescriptor<string[]> => ({
    key: o.key,
    load: (source, key) => source.relationships[key]?.refs.map(r => r.id),
    save: (target, key, value) => {
      if (value === undefined) delete target.relationships[key];
      else target.relationships[key] = manyRefs(value.map(id => ({ type: targetType, id })));
    },
  }),
} as const;

export type CustomFieldMap = Record<string, CustomFieldDescriptor<unknown>>;

export type CustomFieldValues<M extends CustomFieldMap> = {
  [K in keyof M]?: M[K] extends CustomFieldDescriptor<infer T> ? T : never;
};

export interface CustomFieldMapping<M extends CustomFieldMap> {
  readonly fields: M;
  /** Reads every mapped field; missing or mistyped entries come back undefined. */
  load(resource: Resource<unknown, string>): CustomFieldValues<M>;
  /** Writes every mapped field present as a key in `values`, removing those set to undefined. */
  save(resource: Resource<unknown, string>, values: CustomFieldValues<M>): void;
}

export function defineCustomFieldMapping<M extends CustomFieldMap>(fields: M): CustomFieldMapping<M> {
  return {
    fields,
    load(resource) {
      const src: CustomSource = {
        fields: new CustomFields(resource.attributes.custom),
        relationships: resource.relationships?.custom ?? {},
      };
      const values: CustomFieldValues<M> = {};
      for (const name in fields) {
        const descriptor = fields[name];
        const value = descriptor.load(src, descriptor.key ?? name);
        if (value !== undefined) Object.assign(values, { [name]: value });
      }
      return values;
    },
    save(resource, values) {
      resource.relationships ??= { known: {}, custom: {} };
      const src: CustomSource = {
        fields: new CustomFields(resource.attributes.custom),
        relationships: resource.relationships.custom,
      };
      for (const name in fields) {
        if (!Object.hasOwn(values, name)) continue;
        const descriptor = fields[name];
        descriptor.save(src, descriptor.key ?? name, values[name]);
      }
    },
  };
}
