/**
 * Export options: CLI flags, environment fallbacks and validation
 */

import { resolve, dirname } from "node:path";
import { existsSync, readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { PathStrategy } from "./collection-path.js";
import type { LibraryType } from "./zotero-client.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

export const API_KEY_REQUIRED = "The --api-key argument is required unless --local is specified.";

export const exportOptionsSchema = z
  .object({
    libraryId: z.string({ required_error: "--library-id is required" }).min(1, "--library-id is required"),
    libraryType: z.enum(["user", "group"]).default("user"),
    apiKey: z.string().default(""),
    local: z.boolean().default(false),
    localUrl: z.string().optional(),
    collectionPath: z.string({ required_error: "--collection-path is required" }).min(1, "--collection-path is required"),
    outputPath: z.string({ required_error: "--output-path is required" }).min(1, "--output-path is required"),
    strictPath: z.boolean().default(false),
    json: z.boolean().default(false),
  })
  .superRefine((opts, ctx) => {
    if (!opts.local && !opts.apiKey) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["apiKey"], message: API_KEY_REQUIRED });
    }
    // Only read in local mode
    if (opts.local && opts.localUrl !== undefined && !z.string().url().safeParse(opts.localUrl).success) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["localUrl"],
        message: `ZOTERO_LOCAL_URL is not a valid URL: ${opts.localUrl}`,
      });
    }
  });

export interface ExportConfig {
  libraryId: string;
  libraryType: LibraryType;
  apiKey: string;
  local: boolean;
  baseUrl?: string;
  collectionPath: string;
  outputPath: string;
  strategy: PathStrategy;
  json: boolean;
}

export type Env = Record<string, string | undefined>;

/**
 * Merge raw CLI flags with ZOTERO_* environment variables (flags win) and
 * validate. Throws ConfigError with the first problem found.
 */
export function resolveExportConfig(flags: Record<string, unknown>, env: Env = process.env): ExportConfig {
  const merged: Record<string, unknown> = {
    ...flags,
    libraryId: flags.libraryId ?? env.ZOTERO_LIBRARY_ID,
    apiKey: flags.apiKey ?? env.ZOTERO_API_KEY,
    localUrl: flags.localUrl ?? env.ZOTERO_LOCAL_URL,
  };

  const parsed = exportOptionsSchema.safeParse(merged);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(issue ? issue.message : "Invalid options");
  }

  const opts = parsed.data;
  return {
    libraryId: opts.libraryId,
    libraryType: opts.libraryType,
    apiKey: opts.apiKey,
    local: opts.local,
    baseUrl: opts.local ? opts.localUrl : undefined,
    collectionPath: opts.collectionPath,
    outputPath: opts.outputPath,
    strategy: opts.strictPath ? "hierarchy" : "flat",
    json: opts.json,
  };
}

export function parseEnvFile(content: string): Array<[string, string]> {
  const entries: Array<[string, string]> = [];
  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eq = trimmed.indexOf("=");
    if (eq === -1) continue;
    const key = trimmed.slice(0, eq).trim();
    const val = trimmed.slice(eq + 1).trim().replace(/^(["'])(.*)\1$/, "$2");
    entries.push([key, val]);
  }
  return entries;
}

/**
 * Load .env from the cli package or the repo root. Variables already set in
 * the environment are left alone.
 */
export function loadEnv(env: Env = process.env): void {
  const paths = [resolve(__dirname, "..", "..", ".env"), resolve(__dirname, "..", "..", "..", ".env")];
  for (const p of paths) {
    if (!existsSync(p)) continue;
    for (const [key, val] of parseEnvFile(readFileSync(p, "utf8"))) {
      if (!env[key]) {
        env[key] = val;
      }
    }
  }
}
