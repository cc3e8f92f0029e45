#!/usr/bin/env node

/**
 * zog CLI — Zotero collection relations as a GraphML graph
 */

import { createExportCommand } from "./commands/export.js";
import { loadEnv } from "./lib/config.js";

loadEnv();

await createExportCommand().parseAsync();
