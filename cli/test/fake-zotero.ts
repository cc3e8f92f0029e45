import type { ZoteroClient, ZoteroCollection, ZoteroItem } from "../src/lib/zotero-client.js";

export function collection(key: string, name: string, parentCollection: string | false = false): ZoteroCollection {
  return { key, data: { name, parentCollection } };
}

export interface ItemFields {
  itemType?: string;
  title?: string;
  url?: string;
  relations?: Record<string, unknown>;
}

export function item(key: string, fields: ItemFields = {}): ZoteroItem {
  return { key, data: { key, ...fields } };
}

export function relatedTo(...keys: string[]): Record<string, unknown> {
  return { "dc:relation": keys.map((k) => `http://zotero.org/users/1/items/${k}`) };
}

/**
 * In-memory store keyed the way the Zotero API is. Records every getItem call.
 */
export class FakeZoteroClient implements ZoteroClient {
  readonly fetched: string[] = [];

  constructor(
    private readonly collections: ZoteroCollection[],
    private readonly itemsByCollection: Record<string, ZoteroItem[]>,
    private readonly library: Record<string, ZoteroItem> = {}
  ) {}

  async listCollections(): Promise<ZoteroCollection[]> {
    return this.collections;
  }

  async listCollectionItems(collectionKey: string): Promise<ZoteroItem[]> {
    return this.itemsByCollection[collectionKey] ?? [];
  }

  async getItem(itemKey: string): Promise<ZoteroItem> {
    this.fetched.push(itemKey);
    const found = this.library[itemKey];
    if (!found) {
      throw new Error(`Item ${itemKey} not found`);
    }
    return found;
  }
}
