// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Configuration loader for novelseek.
 * Reads novelseek.yaml from the working directory or ~/.novelseek/config.yaml.
 * Validates with Zod and provides typed defaults.
 */

import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { join } from "path";

import yaml from "js-yaml";
import { z } from "zod";

import { ConfigurationError } from "../exceptions.js";
import type { NovelSeekConfig } from "../types.js";

// ── Zod schema ───────────────────────────────────────────────────────────────

const SearchSchema = z.object({
  concurrency: z.number().int().positive().default(10),
  maxResults: z.number().int().positive().default(10),
  taskTimeoutSeconds: z.number().nonnegative().default(30),
});

const LoggingSchema = z.object({
  level: z.enum(["DEBUG", "INFO", "WARNING", "ERROR"]).default("INFO"),
});

const SourceSchema = z.object({
  id: z.string().min(1),
  hosts: z.union([z.string().min(1), z.array(z.string().min(1)).nonempty()]),
  searchUrl: z
    .string()
    .url()
    .refine((u) => u.includes("{query}"), { message: "must contain a {query} placeholder" }),
  resultsPath: z.string().default(""),
  titleField: z.string().min(1).default("title"),
  urlField: z.string().min(1).default("url"),
}).transform((data) => ({
  ...data,
  hosts: (Array.isArray(data.hosts) ? data.hosts : [data.hosts]).map((h) => h.toLowerCase()),
}));

const ConfigSchema = z.object({
  search: SearchSchema.default({}),
  logging: LoggingSchema.default({}),
  sources: z.array(SourceSchema).default([]),
});

// ── YAML key → camelCase mapping ─────────────────────────────────────────────

/** Convert snake_case YAML keys to camelCase for Zod schema. */
function toCamel(obj: unknown): unknown {
  if (Array.isArray(obj)) return obj.map(toCamel);
  if (obj !== null && typeof obj === "object") {
    return Object.fromEntries(
      Object.entries(obj).map(([k, v]) => [
        k.replace(/_([a-z])/g, (_, c: string) => c.toUpperCase()),
        toCamel(v),
      ]),
    );
  }
  return obj;
}

// ── Loader ───────────────────────────────────────────────────────────────────

const SEARCH_PATHS = [
  "novelseek.yaml",
  "config/novelseek.yaml",
  join(homedir(), ".novelseek", "config.yaml"),
];

export function loadConfig(configPath?: string): NovelSeekConfig {
  const paths = configPath ? [configPath] : SEARCH_PATHS;
  const found = paths.find((p) => existsSync(p));

  if (!found) {
    if (configPath) {
      throw new ConfigurationError(`Config file '${configPath}' does not exist`);
    }
    // No config file — defaults, no sources
    return defaultConfig;
  }

  let raw: unknown;
  try {
    raw = yaml.load(readFileSync(found, "utf8"));
  } catch (err) {
    throw new ConfigurationError(`Failed to read config at '${found}': ${String(err)}`);
  }

  return parseConfig(raw ?? {}, found);
}

/** Validate an already-parsed config object. `origin` names it in error messages. */
export function parseConfig(raw: unknown, origin = "<inline>"): NovelSeekConfig {
  const result = ConfigSchema.safeParse(toCamel(raw));
  if (!result.success) {
    const issues = result.error.issues.map((i) => `  ${i.path.join(".")}: ${i.message}`).join("\n");
    throw new ConfigurationError(`Invalid configuration in '${origin}':\n${issues}`);
  }

  const ids = new Set<string>();
  for (const source of result.data.sources) {
    if (ids.has(source.id)) {
      throw new ConfigurationError(`Invalid configuration in '${origin}':\n  sources: duplicate id '${source.id}'`);
    }
    ids.add(source.id);
  }

  return result.data;
}

export const defaultConfig: NovelSeekConfig = ConfigSchema.parse({});
