/**
 * Resolve a slash-separated collection path ("Projects/Thesis/Data") to the
 * key of its last collection.
 */

import { CollectionNotFoundError } from "./errors.js";
import type { ZoteroCollection } from "./zotero-client.js";

export type PathStrategy = "hierarchy" | "flat";

export interface CollectionTreeNode {
  key: string;
  name: string;
  parentKey: string | null;
  childKeys: string[];
}

export interface CollectionTree {
  nodes: Map<string, CollectionTreeNode>;
  rootKeys: string[];
}

export function splitCollectionPath(collectionPath: string): string[] {
  return collectionPath.split("/").filter((segment) => segment.length > 0);
}

/**
 * Build the parent/child tree from the flat listing. A collection whose parent
 * is not in the listing is treated as top-level.
 */
export function buildCollectionTree(collections: ZoteroCollection[]): CollectionTree {
  const nodes = new Map<string, CollectionTreeNode>();
  for (const collection of collections) {
    const parent = collection.data.parentCollection;
    nodes.set(collection.key, {
      key: collection.key,
      name: collection.data.name,
      parentKey: typeof parent === "string" ? parent : null,
      childKeys: [],
    });
  }

  const rootKeys: string[] = [];
  for (const node of nodes.values()) {
    const parent = node.parentKey ? nodes.get(node.parentKey) : undefined;
    if (parent) {
      parent.childKeys.push(node.key);
    } else {
      rootKeys.push(node.key);
    }
  }

  return { nodes, rootKeys };
}

/**
 * First collection anywhere in the listing with this name.
 */
export function findCollectionKeyByName(collections: ZoteroCollection[], name: string): string {
  const match = collections.find((collection) => collection.data.name === name);
  if (!match) {
    throw new CollectionNotFoundError(name);
  }
  return match.key;
}

// Each segment searched over the whole listing, ignoring containment.
function resolveFlat(collections: ZoteroCollection[], segments: string[]): string {
  let key = "";
  for (const segment of segments) {
    key = findCollectionKeyByName(collections, segment);
  }
  return key;
}

function resolveInTree(collections: ZoteroCollection[], segments: string[]): string {
  const tree = buildCollectionTree(collections);
  let candidates = tree.rootKeys;
  const resolved: string[] = [];
  let key = "";

  for (const segment of segments) {
    const match = candidates.find((candidate) => tree.nodes.get(candidate)?.name === segment);
    if (!match) {
      throw new CollectionNotFoundError(segment, resolved);
    }
    key = match;
    resolved.push(segment);
    candidates = tree.nodes.get(match)?.childKeys ?? [];
  }

  return key;
}

export function resolveCollectionKey(
  collections: ZoteroCollection[],
  collectionPath: string,
  options: { strategy?: PathStrategy } = {}
): string {
  const segments = splitCollectionPath(collectionPath);
  if (segments.length === 0) {
    throw new CollectionNotFoundError(collectionPath);
  }

  return options.strategy === "hierarchy"
    ? resolveInTree(collections, segments)
    : resolveFlat(collections, segments);
}
