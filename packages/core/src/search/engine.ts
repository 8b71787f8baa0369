// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * SearchEngine — the entry point of a multi-source search:
 *   1. FanOutDispatcher — one task per distinct source, bounded concurrency
 *   2. aggregateResults  — group by title slug, rank, keep the top N
 *
 * `start()` returns the live session so callers can poll or listen to progress;
 * `runSearch()` waits for the final report.
 */

import type { CapabilityResolver, NovelSeekConfig, SearchCapability, SearchReport } from "../types.js";
import { createLogger, type Logger } from "../utils/logger.js";
import { aggregateResults } from "./aggregator.js";
import { FanOutDispatcher } from "./dispatcher.js";
import { SearchSession } from "./session.js";

export interface RunSearchOptions {
    onProgress?: (percent: number) => void;
}

export class SearchEngine {
    private readonly dispatcher: FanOutDispatcher;
    private readonly maxResults: number;

    constructor(
        resolver: CapabilityResolver,
        config: NovelSeekConfig["search"],
        private readonly log: Logger = createLogger("engine"),
    ) {
        this.maxResults = config.maxResults;
        this.dispatcher = new FanOutDispatcher(resolver, {
            concurrency: config.concurrency,
            taskTimeoutMs: config.taskTimeoutSeconds * 1000,
        });
    }

    /** Distinct capabilities the references resolve to, in first-seen order. */
    plan(references: Iterable<string>): SearchCapability[] {
        return this.dispatcher.plan(references);
    }

    /**
     * Begin a search and return its session immediately.
     * An empty query or reference set yields a session that is already done.
     */
    start(query: string, references: Iterable<string>): SearchSession {
        const session = new SearchSession(query.trim());
        const capabilities = session.query ? this.plan(references) : [];

        if (capabilities.length === 0) {
            session.begin([]);
            session.finish([]);
            return session;
        }

        this.log.info(`searching ${capabilities.length} source(s) for "${session.query}"`);
        this.dispatcher
            .dispatch(session, capabilities)
            .then(() => {
                session.finish(
                    aggregateResults(session.collectedResults, session.query, { limit: this.maxResults }),
                );
            })
            .catch((err: unknown) => {
                this.log.error(`search for "${session.query}" failed: ${String(err)}`);
                session.fail(err);
            });

        return session;
    }

    async runSearch(
        query: string,
        references: Iterable<string>,
        options: RunSearchOptions = {},
    ): Promise<SearchReport> {
        const session = this.start(query, references);
        const { onProgress } = options;
        if (onProgress) session.on("progress", onProgress);

        try {
            const results = await session.wait();
            return {
                query: session.query,
                progress: session.progress,
                results,
                failures: session.failures,
            };
        } finally {
            if (onProgress) session.off("progress", onProgress);
        }
    }
}
