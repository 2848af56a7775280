import {
  type DateOnly,
  type TableField,
  type TimeOnly,
  formatDateOnly,
  formatDuration,
  formatTimeOnly,
  parseDateOnly,
  parseDuration,
  parseTimeOnly,
  tableFieldSchema,
} from "./field-types.js";
import { isJsonObject, type JsonValue, type TextContent } from "./resource.js";

/**
 * Typed accessors over a resource's custom attribute bag.
 *
 * Getters return `undefined` when the field is missing, null, or holds a
 * value of another shape; they never throw. Writes go straight through to
 * the underlying record, so the view and the resource stay in sync.
 */
export class CustomFields {
  constructor(private readonly bag: Record<string, JsonValue>) {}

  has(key: string): boolean {
    return Object.hasOwn(this.bag, key) && this.bag[key] !== null;
  }

  get(key: string): JsonValue | undefined {
    return Object.hasOwn(this.bag, key) ? this.bag[key] : undefined;
  }

  getString(key: string): string | undefined {
    const v = this.get(key);
    return typeof v === "string" ? v : undefined;
  }

  /** Enumeration option ids are plain strings on the wire. */
  getEnum(key: string): string | undefined {
    return this.getString(key);
  }

  /** Accepts numeric strings, which is how currency fields arrive. */
  getNumber(key: string): number | undefined {
    const v = this.get(key);
    if (typeof v === "number") return v;
    if (typeof v === "string" && v.trim() !== "") {
      const n = Number(v);
      return Number.isFinite(n) ? n : undefined;
    }
    return undefined;
  }

  /** Truncates toward zero. */
  getInteger(key: string): number | undefined {
    const v = this.get(key);
    return typeof v === "number" ? Math.trunc(v) : undefined;
  }

  getBoolean(key: string): boolean | undefined {
    const v = this.get(key);
    return typeof v === "boolean" ? v : undefined;
  }

  getText(key: string): TextContent | undefined {
    const v = this.get(key);
    if (!isJsonObject(v)) return undefined;
    const { type, value } = v;
    return { type: typeof type === "string" ? type : "", value: typeof value === "string" ? value : "" };
  }

  getDate(key: string): DateOnly | undefined {
    return this.parsed(key, parseDateOnly);
  }

  getTime(key: string): TimeOnly | undefined {
    return this.parsed(key, parseTimeOnly);
  }

  getDateTime(key: string): Date | undefined {
    const s = this.getString(key);
    if (s === undefined) return undefined;
    const ms = Date.parse(s);
    return Number.isNaN(ms) ? undefined : new Date(ms);
  }

  /** Duration in milliseconds. */
  getDuration(key: string): number | undefined {
    return this.parsed(key, parseDuration);
  }

  getTable(key: string): TableField | undefined {
    const parsed = tableFieldSchema.safeParse(this.get(key));
    return parsed.success ? parsed.data : undefined;
  }

  set(key: string, value: JsonValue): void {
    this.bag[key] = value;
  }

  setDate(key: string, value: DateOnly): void {
    this.bag[key] = formatDateOnly(value);
  }

  setTime(key: string, value: TimeOnly): void {
    this.bag[key] = formatTimeOnly(value);
  }

  setDateTime(key: string, value: Date): void {
    this.bag[key] = value.toISOString();
  }

  setDuration(key: string, ms: number): void {
    this.bag[key] = formatDuration(ms);
  }

  setTable(key: string, value: TableField): void {
    this.bag[key] = {
      keys: [...value.keys],
      rows: value.rows.map(r => ({ values: r.values.map(c => ({ type: c.type, value: c.value })) })),
    };
  }

  delete(key: string): void {
    delete this.bag[key];
  }

  keys(): string[] {
    return Object.keys(this.bag);
  }

  private parsed<T>(key: string, parse: (s: string) => T): T | undefined {
    const s = this.getString(key);
    if (s === undefined) return undefined;
    try {
      return parse(s);
    } catch {
      return undefined;
    }
  }
}

/** Typed view over `resource.attributes.custom`. */
export function customFields(resource: { attributes: { custom: Record<string, JsonValue> } }): CustomFields {
  return new CustomFields(resource.attributes.custom);
}
