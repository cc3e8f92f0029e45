/**
 * zog — export a Zotero collection as a GraphML relation graph
 */

import { Command, Option } from "commander";
import ora from "ora";
import { ConfigError } from "../lib/errors.js";
import { resolveExportConfig, type Env, type ExportConfig } from "../lib/config.js";
import { exportCollectionGraph } from "../lib/pipeline.js";
import { HttpZoteroClient, type ZoteroClient } from "../lib/zotero-client.js";
import * as fmt from "../lib/format.js";

export const VERSION = "0.1.0";

export interface ExportCommandDeps {
  createClient?: (config: ExportConfig) => ZoteroClient;
  env?: Env;
  silent?: boolean;
}

function defaultClient(config: ExportConfig): ZoteroClient {
  return new HttpZoteroClient({
    libraryId: config.libraryId,
    libraryType: config.libraryType,
    apiKey: config.apiKey,
    local: config.local,
    baseUrl: config.baseUrl,
  });
}

export function createExportCommand(deps: ExportCommandDeps = {}): Command {
  const createClient = deps.createClient ?? defaultClient;

  return new Command("zog")
    .description("ZOtero knowledge Graph: export a collection's item relations as GraphML")
    .version(VERSION)
    .option("--library-id <id>", "Zotero library ID (env: ZOTERO_LIBRARY_ID)")
    .addOption(
      new Option("--library-type <type>", "Type of Zotero library").choices(["user", "group"]).default("user")
    )
    .option("--api-key <key>", "Zotero API key, required unless --local (env: ZOTERO_API_KEY)")
    .option("--local", "Use the local Zotero API instead of api.zotero.org", false)
    .requiredOption("--collection-path <path>", "Collection path, e.g. 'Projects/Thesis/Datasets'")
    .requiredOption("--output-path <file>", "GraphML file to write, e.g. './output/graph.graphml'")
    .option("--strict-path", "Match each path segment only among the children of the previous one", false)
    .option("--json", "Print the export summary as JSON", false)
    .action(async (opts: Record<string, unknown>, command: Command) => {
      let config: ExportConfig;
      try {
        config = resolveExportConfig(opts, deps.env);
      } catch (err) {
        if (err instanceof ConfigError) {
          command.error(`error: ${err.message}`);
        }
        throw err;
      }

      const spinner = ora({ text: "Listing collections...", isSilent: deps.silent }).start();
      try {
        const summary = await exportCollectionGraph(
          createClient(config),
          {
            collectionPath: config.collectionPath,
            outputPath: config.outputPath,
            strategy: config.strategy,
          },
          {
            onStage: (text) => {
              spinner.text = text;
            },
            onProgress: (done, total) => {
              spinner.text = fmt.progress(done, total, "Fetching item metadata");
            },
          }
        );

        spinner.succeed(`Exported ${summary.nodeCount} nodes and ${summary.edgeCount} edges`);

        if (config.json) {
          console.log(JSON.stringify(summary, null, 2));
          return;
        }

        console.log(fmt.header("Graph exported"));
        if (summary.itemCount === 0) {
          console.log(fmt.warn(`Collection "${config.collectionPath}" has no items`));
        }
        console.log(fmt.label("Collection", `${config.collectionPath} (${summary.collectionKey})`));
        console.log(fmt.label("Items", summary.itemCount));
        console.log(fmt.label("Output", summary.outputPath));
      } catch (err) {
        spinner.fail(err instanceof Error ? err.message : String(err));
        process.exitCode = 1;
      }
    });
}
