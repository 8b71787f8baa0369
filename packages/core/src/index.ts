// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * novelseek public API.
 * Import from this module when using novelseek as a library.
 */

export { VERSION } from "./version.js";
export type {
  RawHit,
  SearchContext,
  SearchCapability,
  CapabilityResolver,
  CanonicalResult,
  CombinedResult,
  SourceOutcome,
  SourceFailure,
  SearchReport,
  LogLevel,
  JsonSourceDefinition,
  NovelSeekConfig,
} from "./types.js";
export {
  NovelSeekError,
  ConfigurationError,
  SourceSearchError,
  SourceTimeoutError,
  MalformedHitError,
  describeError,
} from "./exceptions.js";
export { loadConfig, parseConfig, defaultConfig } from "./config/config.js";
export { createLogger, setLogLevel, getLogLevel } from "./utils/logger.js";
export type { Logger } from "./utils/logger.js";
export * from "./search/index.js";
