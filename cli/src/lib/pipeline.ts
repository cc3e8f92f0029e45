/**
 * Collection → GraphML export, end to end
 */

import { resolveCollectionKey, type PathStrategy } from "./collection-path.js";
import { buildGraph, writeGraphML, type GraphExportResult } from "./graph-exporter.js";
import { fetchNodeMetadata, type ProgressFn } from "./node-metadata.js";
import { extractNodes, extractRelationships } from "./relationships.js";
import type { ZoteroClient } from "./zotero-client.js";

export interface ExportRequest {
  collectionPath: string;
  outputPath: string;
  strategy?: PathStrategy;
}

export interface ExportHooks {
  onStage?: (text: string) => void;
  onProgress?: ProgressFn;
}

export interface ExportSummary extends GraphExportResult {
  collectionKey: string;
  itemCount: number;
}

export async function exportCollectionGraph(
  client: ZoteroClient,
  request: ExportRequest,
  hooks: ExportHooks = {}
): Promise<ExportSummary> {
  hooks.onStage?.("Listing collections...");
  const collections = await client.listCollections();
  const collectionKey = resolveCollectionKey(collections, request.collectionPath, {
    strategy: request.strategy,
  });

  hooks.onStage?.(`Listing items in ${request.collectionPath}...`);
  const items = await client.listCollectionItems(collectionKey);

  const relationships = extractRelationships(items);
  const nodes = extractNodes(relationships);

  hooks.onStage?.(`Fetching metadata for ${nodes.size} items...`);
  const records = await fetchNodeMetadata(client, nodes, { onProgress: hooks.onProgress });

  hooks.onStage?.("Writing GraphML...");
  const graph = buildGraph(records, relationships);
  const result = await writeGraphML(graph, request.outputPath);

  return { ...result, collectionKey, itemCount: items.length };
}
