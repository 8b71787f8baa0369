// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Core shared types for novelseek.
 * Sources, the dispatcher, the aggregator and the CLI operate on these types.
 */

import type { SourceSearchError } from "./exceptions.js";

/** An unvalidated hit as yielded by a source. Extra fields are ignored. */
export interface RawHit {
  title?: string | null;
  url?: string | null;
  [extra: string]: unknown;
}

/** Hints handed to a source for one search call. */
export interface SearchContext {
  /** Always false during a fan-out search: sources must not start a browser. */
  readonly canUseBrowser: boolean;
  /** Fires when the task has timed out and its results will be discarded. */
  readonly signal: AbortSignal;
}

/**
 * One independently queryable content provider.
 * `search` returns a finite lazy sequence and may throw at any point of the iteration.
 */
export interface SearchCapability {
  /** Stable identifier; mirrors of the same site share one id. */
  readonly id: string;
  search(query: string, context: SearchContext): Iterable<RawHit> | AsyncIterable<RawHit>;
}

/** Maps a source reference (URL or hostname) to its capability. Pure lookup. */
export interface CapabilityResolver {
  resolve(reference: string): SearchCapability | undefined;
}

/** A validated hit from one source. */
export interface CanonicalResult {
  readonly title: string;
  readonly url: string;
  readonly sourceId: string;
}

/** One logical item matched by one or more sources. */
export interface CombinedResult {
  /** Slug of the title; always longer than two characters. */
  readonly id: string;
  readonly title: string;
  /** Ordered by url ascending. */
  readonly members: readonly CanonicalResult[];
}

/** Typed outcome of a per-source search task. */
export type SourceOutcome =
  | { ok: true; sourceId: string; results: CanonicalResult[] }
  | { ok: false; sourceId: string; error: SourceSearchError };

export interface SourceFailure {
  sourceId: string;
  reason: string;
}

/** What `SearchEngine.runSearch` hands back once every task has completed. */
export interface SearchReport {
  query: string;
  /** Always 100 once the report exists. */
  progress: number;
  results: readonly CombinedResult[];
  failures: readonly SourceFailure[];
}

export type LogLevel = "DEBUG" | "INFO" | "WARNING" | "ERROR";

/** Declarative JSON-API source, as written in the config file. */
export interface JsonSourceDefinition {
  id: string;
  hosts: string[];
  /** `{query}` is replaced by the URL-encoded query. */
  searchUrl: string;
  /** Dot path to the result array; empty means the payload itself. */
  resultsPath: string;
  titleField: string;
  urlField: string;
}

/** Full configuration schema — loaded from novelseek.yaml */
export interface NovelSeekConfig {
  search: {
    /** Maximum number of source tasks in flight. */
    concurrency: number;
    /** Length cap of the final combined list. */
    maxResults: number;
    /** Per-source timeout; 0 disables it. */
    taskTimeoutSeconds: number;
  };
  logging: {
    level: LogLevel;
  };
  sources: JsonSourceDefinition[];
}
