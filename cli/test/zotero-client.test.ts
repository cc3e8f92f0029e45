import { describe, expect, test, vi } from "vitest";
import { ZoteroApiError } from "../src/lib/errors.js";
import { HttpZoteroClient } from "../src/lib/zotero-client.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function clientWith(fetchMock: typeof fetch, overrides: { local?: boolean; libraryType?: "user" | "group" } = {}) {
  return new HttpZoteroClient({
    libraryId: "123",
    libraryType: overrides.libraryType ?? "user",
    apiKey: overrides.local ? "" : "test-secret",
    local: overrides.local,
    fetch: fetchMock,
  });
}

describe("HttpZoteroClient", () => {
  test("lists collections from the user library with auth headers", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockImplementation(async () =>
      jsonResponse([
        { key: "P1", data: { key: "P1", name: "Projects", parentCollection: false } },
        { key: "T1", data: { key: "T1", name: "Thesis", parentCollection: "P1" } },
      ])
    );

    const collections = await clientWith(fetchMock).listCollections();

    expect(collections.map((c) => [c.key, c.data.name, c.data.parentCollection])).toEqual([
      ["P1", "Projects", false],
      ["T1", "Thesis", "P1"],
    ]);
    expect(fetchMock).toHaveBeenCalledWith("https://api.zotero.org/users/123/collections?limit=100", {
      method: "GET",
      headers: { "Zotero-API-Version": "3", "Zotero-API-Key": "test-secret" },
    });
  });

  test("defaults a missing parentCollection to top-level", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockImplementation(async () =>
      jsonResponse([{ key: "P1", data: { name: "Projects" } }])
    );

    const [first] = await clientWith(fetchMock).listCollections();
    expect(first?.data.parentCollection).toBe(false);
  });

  test("lists the items of one collection", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockImplementation(async () =>
      jsonResponse([{ key: "I1", data: { key: "I1", itemType: "book", title: "Beta", relations: {} } }])
    );

    const items = await clientWith(fetchMock, { libraryType: "group" }).listCollectionItems("K1");

    expect(items[0]?.data.itemType).toBe("book");
    expect(fetchMock.mock.calls[0]?.[0]).toBe("https://api.zotero.org/groups/123/collections/K1/items?limit=100");
  });

  test("fetches a single item from the local API without a key header", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockImplementation(async () =>
      jsonResponse({ key: "I1", data: { key: "I1", title: "Alpha" } })
    );

    const found = await clientWith(fetchMock, { local: true }).getItem("I1");

    expect(found.data.title).toBe("Alpha");
    expect(fetchMock).toHaveBeenCalledWith("http://localhost:23119/api/users/123/items/I1", {
      method: "GET",
      headers: { "Zotero-API-Version": "3" },
    });
  });

  test("honours an explicit base URL", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockImplementation(async () => jsonResponse([]));
    const client = new HttpZoteroClient({
      libraryId: "0",
      libraryType: "user",
      local: true,
      baseUrl: "http://127.0.0.1:9999/api/",
      fetch: fetchMock,
    });

    await client.listCollections();

    expect(fetchMock.mock.calls[0]?.[0]).toBe("http://127.0.0.1:9999/api/users/0/collections?limit=100");
  });

  test("raises ZoteroApiError on a non-2xx status", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockImplementation(
      async () => new Response("Forbidden", { status: 403, statusText: "Forbidden" })
    );

    const failure = clientWith(fetchMock).getItem("I1");

    await expect(failure).rejects.toBeInstanceOf(ZoteroApiError);
    await expect(clientWith(fetchMock).getItem("I1")).rejects.toThrow(
      "Zotero API error: 403 Forbidden (/users/123/items/I1)"
    );
  });

  test("raises ZoteroApiError on an unexpected body", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockImplementation(async () => jsonResponse([{ key: "P1" }]));

    await expect(clientWith(fetchMock).listCollections()).rejects.toThrow(ZoteroApiError);
    await expect(clientWith(fetchMock).listCollections()).rejects.toThrow("(0.data: Required)");
  });

  test("raises ZoteroApiError on invalid JSON", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockImplementation(async () => new Response("<html>", { status: 200 }));

    await expect(clientWith(fetchMock).listCollections()).rejects.toThrow(
      "Zotero API returned invalid JSON for /users/123/collections?limit=100"
    );
  });
});
