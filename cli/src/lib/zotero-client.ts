/**
 * Zotero Web API client (remote api.zotero.org or the local connector API)
 *
 * Only the three reads the exporter needs. Each call is a single request:
 * results are capped at the API's page size of 100.
 */

import { z } from "zod";
import { ZoteroApiError } from "./errors.js";
import { debug } from "./format.js";

export const REMOTE_BASE_URL = "https://api.zotero.org";
export const LOCAL_BASE_URL = "http://localhost:23119/api";
const API_VERSION = "3";
const PAGE_LIMIT = 100;

// ── Response shapes ────────────────────────────────────

export const collectionSchema = z.object({
  key: z.string(),
  data: z
    .object({
      name: z.string(),
      parentCollection: z.union([z.string(), z.literal(false)]).optional().default(false),
    })
    .passthrough(),
});

export const itemSchema = z.object({
  key: z.string(),
  data: z
    .object({
      key: z.string(),
      itemType: z.string().optional(),
      title: z.string().optional(),
      url: z.string().optional(),
      relations: z.record(z.unknown()).optional(),
    })
    .passthrough(),
});

export type ZoteroCollection = z.infer<typeof collectionSchema>;
export type ZoteroItem = z.infer<typeof itemSchema>;

export type LibraryType = "user" | "group";

/**
 * The store the exporter reads from. Any implementation returning these
 * shapes (remote API, local connector, in-memory fake) is interchangeable.
 */
export interface ZoteroClient {
  listCollections(): Promise<ZoteroCollection[]>;
  listCollectionItems(collectionKey: string): Promise<ZoteroItem[]>;
  getItem(itemKey: string): Promise<ZoteroItem>;
}

export interface HttpZoteroClientOptions {
  libraryId: string;
  libraryType: LibraryType;
  apiKey?: string;
  local?: boolean;
  baseUrl?: string;
  fetch?: typeof fetch;
}

export class HttpZoteroClient implements ZoteroClient {
  private readonly baseUrl: string;
  private readonly prefix: string;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpZoteroClientOptions) {
    this.baseUrl = (options.baseUrl ?? (options.local ? LOCAL_BASE_URL : REMOTE_BASE_URL)).replace(/\/+$/, "");
    this.prefix = `/${options.libraryType === "group" ? "groups" : "users"}/${encodeURIComponent(options.libraryId)}`;
    this.headers = { "Zotero-API-Version": API_VERSION };
    if (options.apiKey) {
      this.headers["Zotero-API-Key"] = options.apiKey;
    }
    this.fetchImpl = options.fetch ?? fetch;
  }

  async listCollections(): Promise<ZoteroCollection[]> {
    return await this.get(`/collections?limit=${PAGE_LIMIT}`, z.array(collectionSchema));
  }

  async listCollectionItems(collectionKey: string): Promise<ZoteroItem[]> {
    return await this.get(
      `/collections/${encodeURIComponent(collectionKey)}/items?limit=${PAGE_LIMIT}`,
      z.array(itemSchema)
    );
  }

  async getItem(itemKey: string): Promise<ZoteroItem> {
    return await this.get(`/items/${encodeURIComponent(itemKey)}`, itemSchema);
  }

  private async get<T extends z.ZodTypeAny>(path: string, schema: T): Promise<z.output<T>> {
    const fullPath = `${this.prefix}${path}`;
    debug("zotero-client", `GET ${this.baseUrl}${fullPath}`);

    const response = await this.fetchImpl(`${this.baseUrl}${fullPath}`, {
      method: "GET",
      headers: this.headers,
    });

    if (!response.ok) {
      throw new ZoteroApiError(
        `Zotero API error: ${response.status} ${response.statusText} (${fullPath})`,
        fullPath,
        response.status
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ZoteroApiError(`Zotero API returned invalid JSON for ${fullPath}: ${reason}`, fullPath, response.status);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join(".") || "<root>"}: ${issue.message}` : "unknown shape";
      throw new ZoteroApiError(`Unexpected Zotero API response for ${fullPath} (${where})`, fullPath, response.status);
    }
    return parsed.data;
  }
}
