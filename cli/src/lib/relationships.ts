/**
 * Item relations → directed (source, target) pairs
 */

import { RelationShapeError } from "./errors.js";
import type { ZoteroItem } from "./zotero-client.js";

export const RELATION_PREDICATE = "dc:relation";

export interface Relationship {
  source: string;
  target: string;
}

function describeShape(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array with non-string entries";
  return typeof value;
}

/**
 * Zotero stores a single relation as a bare string and several as a list.
 * Returns undefined when the item declares no relation at all.
 */
export function normalizeRelations(itemKey: string, value: unknown): string[] | undefined {
  if (value === undefined) return undefined;
  if (typeof value === "string") return [value];
  if (Array.isArray(value) && value.every((entry): entry is string => typeof entry === "string")) {
    return value;
  }
  throw new RelationShapeError(itemKey, describeShape(value));
}

/**
 * Key of the item a relation URI points at, e.g.
 * "http://zotero.org/users/1/items/ABCD" → "ABCD".
 */
export function relationTargetKey(uri: string): string {
  const segments = uri.replace(/\/+$/, "").split("/");
  return segments[segments.length - 1] ?? uri;
}

/**
 * One edge per declared relation. An item without relations becomes a
 * self-loop so it still shows up as a node.
 */
export function extractRelationships(items: ZoteroItem[]): Relationship[] {
  const relationships: Relationship[] = [];

  for (const item of items) {
    const itemKey = item.data.key;
    const uris = normalizeRelations(itemKey, item.data.relations?.[RELATION_PREDICATE]);

    if (uris === undefined) {
      relationships.push({ source: itemKey, target: itemKey });
      continue;
    }

    for (const uri of uris) {
      relationships.push({ source: itemKey, target: relationTargetKey(uri) });
    }
  }

  return relationships;
}

export function extractNodes(relationships: Relationship[]): Set<string> {
  const nodes = new Set<string>();
  for (const { source, target } of relationships) {
    nodes.add(source);
    nodes.add(target);
  }
  return nodes;
}
