import fs from "node:fs/promises";
import path from "node:path";
import { DirectedGraph } from "graphology";
import type { NodeMetadata, NodeRecord } from "./node-metadata.js";
import type { Relationship } from "./relationships.js";

export const MISSING_VALUE = "null";

export type GraphNodeAttributes = {
  item_type: string;
  title: string;
  url: string;
};

export type ItemGraph = DirectedGraph<GraphNodeAttributes>;

export interface GraphExportResult {
  outputPath: string;
  nodeCount: number;
  edgeCount: number;
}

// Order of the GraphML <key> declarations (d0, d1, d2)
const NODE_ATTRIBUTES = ["item_type", "title", "url"] as const;

function toAttributes(metadata: NodeMetadata): GraphNodeAttributes {
  return {
    item_type: metadata.item_type ?? MISSING_VALUE,
    title: metadata.title ?? MISSING_VALUE,
    url: metadata.url ?? MISSING_VALUE,
  };
}

export function buildGraph(nodes: NodeRecord[], relationships: Relationship[]): ItemGraph {
  const graph: ItemGraph = new DirectedGraph<GraphNodeAttributes>();

  for (const [key, metadata] of nodes) {
    graph.mergeNode(key, toAttributes(metadata));
  }

  for (const { source, target } of relationships) {
    for (const endpoint of [source, target]) {
      if (!graph.hasNode(endpoint)) {
        graph.addNode(endpoint, toAttributes({}));
      }
    }
    // Duplicate relations collapse onto one edge
    graph.mergeEdge(source, target);
  }

  return graph;
}

// Characters XML 1.0 does not allow anywhere in a document
const INVALID_XML_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]/g;

export function escapeXml(value: string): string {
  return value
    .replace(INVALID_XML_CHARS, "")
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

export function serializeGraphML(graph: ItemGraph): string {
  const lines: string[] = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<graphml xmlns="http://graphml.graphdrawing.org/xmlns" ' +
      'xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance" ' +
      'xsi:schemaLocation="http://graphml.graphdrawing.org/xmlns ' +
      'http://graphml.graphdrawing.org/xmlns/1.0/graphml.xsd">',
  ];

  NODE_ATTRIBUTES.forEach((name, index) => {
    lines.push(`  <key id="d${index}" for="node" attr.name="${name}" attr.type="string" />`);
  });

  lines.push('  <graph edgedefault="directed">');

  graph.forEachNode((key, attributes) => {
    lines.push(`    <node id="${escapeXml(key)}">`);
    NODE_ATTRIBUTES.forEach((name, index) => {
      lines.push(`      <data key="d${index}">${escapeXml(attributes[name])}</data>`);
    });
    lines.push("    </node>");
  });

  graph.forEachEdge((_edge, _attributes, source, target) => {
    lines.push(`    <edge source="${escapeXml(source)}" target="${escapeXml(target)}" />`);
  });

  lines.push("  </graph>", "</graphml>");
  return lines.join("\n") + "\n";
}

/**
 * Overwrites the file at outputPath. The parent directory must already exist.
 */
export async function writeGraphML(graph: ItemGraph, outputPath: string): Promise<GraphExportResult> {
  const absolutePath = path.resolve(outputPath);
  await fs.writeFile(absolutePath, serializeGraphML(graph), "utf8");
  return { outputPath: absolutePath, nodeCount: graph.order, edgeCount: graph.size };
}
