// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * FanOutDispatcher — runs one search task per distinct capability, at most
 * `concurrency` at a time (p-limit). Outcomes are recorded on the session as
 * each task finishes, in completion order. A failed source is logged and
 * counted, never rethrown.
 */

import pLimit from "p-limit";

import type { CapabilityResolver, SearchCapability, SourceOutcome } from "../types.js";
import { createLogger, type Logger } from "../utils/logger.js";
import type { SearchSession } from "./session.js";
import { runSourceSearch } from "./task.js";

export const DEFAULT_CONCURRENCY = 10;

export interface DispatcherOptions {
    concurrency?: number;
    /** 0 disables the per-source timeout. */
    taskTimeoutMs?: number;
}

export class FanOutDispatcher {
    private readonly concurrency: number;
    private readonly taskTimeoutMs: number;

    constructor(
        private readonly resolver: CapabilityResolver,
        options: DispatcherOptions = {},
        private readonly log: Logger = createLogger("dispatcher"),
    ) {
        this.concurrency = Math.max(1, Math.floor(options.concurrency ?? DEFAULT_CONCURRENCY));
        this.taskTimeoutMs = Math.max(0, options.taskTimeoutMs ?? 0);
    }

    /**
     * Resolve references to capabilities, keeping the first capability seen
     * for each id. Unresolvable references are skipped.
     */
    plan(references: Iterable<string>): SearchCapability[] {
        const seen = new Set<string>();
        const planned: SearchCapability[] = [];

        for (const reference of references) {
            const capability = this.resolver.resolve(reference);
            if (!capability) {
                this.log.debug(`no source for '${reference}'`);
                continue;
            }
            if (seen.has(capability.id)) continue;
            seen.add(capability.id);
            planned.push(capability);
        }
        return planned;
    }

    /** Query every planned capability and record each outcome on the session. */
    async dispatch(session: SearchSession, capabilities: readonly SearchCapability[]): Promise<void> {
        session.begin(capabilities);
        if (capabilities.length === 0) return;

        const limit = pLimit(this.concurrency);
        const options = { timeoutMs: this.taskTimeoutMs };

        await Promise.all(
            capabilities.map((capability) =>
                limit(() => runSourceSearch(capability, session.query, options)).then((outcome) =>
                    this.complete(session, outcome),
                ),
            ),
        );
    }

    private complete(session: SearchSession, outcome: SourceOutcome): void {
        if (outcome.ok) {
            this.log.debug(`${outcome.sourceId}: ${outcome.results.length} result(s)`);
        } else {
            this.log.warn(outcome.error.message);
        }
        session.record(outcome);
    }
}
