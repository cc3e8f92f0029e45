/**
 * Per-node display metadata, one item fetch per node
 */

import type { ZoteroClient, ZoteroItem } from "./zotero-client.js";

export interface NodeMetadata {
  item_type?: string;
  title?: string;
  url?: string;
}

export type NodeRecord = [key: string, metadata: NodeMetadata];

export type ProgressFn = (done: number, total: number, key: string) => void;

export function toNodeMetadata(item: ZoteroItem): NodeMetadata {
  return {
    item_type: item.data.itemType,
    title: item.data.title,
    url: item.data.url,
  };
}

export async function fetchNodeMetadata(
  client: ZoteroClient,
  nodes: Iterable<string>,
  options: { onProgress?: ProgressFn } = {}
): Promise<NodeRecord[]> {
  const keys = [...nodes];
  const records: NodeRecord[] = [];

  // One request in flight at a time
  for (const key of keys) {
    const item = await client.getItem(key);
    records.push([key, toNodeMetadata(item)]);
    options.onProgress?.(records.length, keys.length, key);
  }

  return records;
}
