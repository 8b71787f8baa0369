// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/** Search engine public API. */

export { SearchEngine } from "./engine.js";
export type { RunSearchOptions } from "./engine.js";
export { SearchSession } from "./session.js";
export { FanOutDispatcher, DEFAULT_CONCURRENCY } from "./dispatcher.js";
export type { DispatcherOptions } from "./dispatcher.js";
export { runSourceSearch } from "./task.js";
export type { SourceTaskOptions } from "./task.js";
export { aggregateResults, groupByTitle, DEFAULT_RESULT_LIMIT } from "./aggregator.js";
export type { AggregateOptions } from "./aggregator.js";
export { toCanonicalResult, titleCase, slugKey } from "./normalize.js";
export { similarity } from "./similarity.js";
export { SourceCatalog, catalogFromDefinitions, hostnameOf } from "./catalog.js";
export { JsonApiSource } from "./sources/json-api.js";
