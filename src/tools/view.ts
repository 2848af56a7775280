/**
 * Compact JSON views of decoded resources for tool results.
 *
 * Known and custom attributes are flattened into one object, as on the wire;
 * relationships are reduced to target ids.
 */

import type { Relationship, Resource } from "../resource.js";

export type RelationshipView = string | string[] | null;

export function relationshipView(relationship: Relationship): RelationshipView | undefined {
  switch (relationship.shape) {
    case "many":
      return relationship.refs.map(r => r.id);
    case "one":
      return relationship.refs[0]?.id ?? null;
    default:
      return undefined;
  }
}

export function resourceView(resource: Resource<unknown, string>): Record<string, unknown> {
  const view: Record<string, unknown> = { id: resource.id };
  if (resource.revision !== undefined) view.revision = resource.revision;
  Object.assign(view, resource.attributes.known, resource.attributes.custom);

  if (resource.relationships) {
    const relationships: Record<string, RelationshipView> = {};
    const all: Record<string, Relationship | undefined> = {
      ...resource.relationships.known,
      ...resource.relationships.custom,
    };
    for (const [name, relationship] of Object.entries(all)) {
      const v = relationship && relationshipView(relationship);
      if (v !== undefined) relationships[name] = v;
    }
    if (Object.keys(relationships).length > 0) view.relationships = relationships;
  }
  return view;
}
