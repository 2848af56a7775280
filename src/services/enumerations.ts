import { TTL_HOUR, type PolarionClient } from "../client.js";
import { type Enumeration, ENUMERATION_SCHEMA } from "../models.js";
import { isJsonObject } from "../resource.js";
import { enc } from "../utils.js";
import type { CallOptions } from "./work-items.js";
import { readResource } from "./document.js";

export interface EnumerationOption {
  id: string;
  name: string | undefined;
  color: string | undefined;
  default: boolean;
}

/**
 * Enumerations (option lists for status, priority, severity and
 * enumeration-typed custom fields). Project-scoped when a project id is
 * given, global otherwise.
 */
export class EnumerationService {
  constructor(
    private readonly client: PolarionClient,
    readonly projectId?: string,
  ) {}

  /**
   * @param context    e.g. `~` for the default context
   * @param name       e.g. `status`
   * @param targetType work item type the enumeration applies to, e.g. `requirement`
   */
  async get(context: string, name: string, targetType: string, options: CallOptions = {}): Promise<Enumeration> {
    const scope = this.projectId !== undefined ? `/projects/${enc(this.projectId)}` : "";
    const doc = await this.client.get(
      `${scope}/enumerations/${enc(context)}/${enc(name)}/${enc(targetType)}`,
      { signal: options.signal, ttlMs: TTL_HOUR },
    );
    return readResource(ENUMERATION_SCHEMA, doc);
  }
}

/** Options carried in an enumeration's `options` attribute. */
export function enumerationOptions(enumeration: Enumeration): EnumerationOption[] {
  const raw = enumeration.attributes.custom.options;
  if (!Array.isArray(raw)) return [];
  const options: EnumerationOption[] = [];
  for (const entry of raw) {
    if (!isJsonObject(entry) || typeof entry.id !== "string") continue;
    const { name, color } = entry;
    options.push({
      id: entry.id,
      name: typeof name === "string" ? name : undefined,
      color: typeof color === "string" ? color : undefined,
      default: entry.default === true,
    });
  }
  return options;
}
