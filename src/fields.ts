/**
 * Polarion REST sparse fieldsets.
 *
 * Polarion returns only a resource's id and type unless `fields[<type>]` asks
 * for more. Two shorthands exist: `@basic` (server-chosen core fields) and
 * `@all`. A comma-separated list of field names also works.
 */

import type { Params } from "./client.js";

export interface FieldSelector {
  workItems?: string;
  linkedWorkItems?: string;
  workItemAttachments?: string;
}

/** Core work item fields only. */
export const FIELDS_BASIC: FieldSelector = {
  workItems: "@basic",
};

/** Core fields plus the link data needed to follow relationships; default for `get`. */
export const FIELDS_DEFAULT: FieldSelector = {
  workItems: "@basic",
  linkedWorkItems: "id,role,suspect",
  workItemAttachments: "@basic",
};

/** Everything, including custom fields; default for queries. */
export const FIELDS_ALL: FieldSelector = {
  workItems: "@all",
  linkedWorkItems: "@all",
  workItemAttachments: "@all",
};

export function toFieldParams(fields: FieldSelector): Params {
  const params: Params = {};
  if (fields.workItems) params["fields[workitems]"] = fields.workItems;
  if (fields.linkedWorkItems) params["fields[linkedworkitems]"] = fields.linkedWorkItems;
  if (fields.workItemAttachments) params["fields[workitem_attachments]"] = fields.workItemAttachments;
  return params;
}

/** Resolves a preset name or a custom work item field list to a selector. */
export function fieldSelector(spec: "basic" | "default" | "all" | string): FieldSelector {
  switch (spec) {
    case "basic":
      return FIELDS_BASIC;
    case "default":
      return FIELDS_DEFAULT;
    case "all":
      return FIELDS_ALL;
    default:
      return { workItems: spec };
  }
}
