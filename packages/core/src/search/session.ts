// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// SearchSession — per-call state of one fan-out search.
//
// Events:
//   "progress"  (percent: number)               after every task completion
//   "done"      (results: CombinedResult[])     once, when the final list is ready
//
// Only the dispatcher and the engine mutate a session. Completion handlers run
// one at a time on the event loop, so record() is the single writer.
// A listener that throws is logged; it never fails the search.

import EventEmitter from "events";

import { describeError } from "../exceptions.js";
import type { CanonicalResult, CombinedResult, SearchCapability, SourceFailure, SourceOutcome } from "../types.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("session");

export class SearchSession extends EventEmitter {
    private total = 0;
    private completed = 0;
    private finished = false;
    private readonly collected: CanonicalResult[] = [];
    private readonly failed: SourceFailure[] = [];
    private final: readonly CombinedResult[] = [];
    private sources: readonly SearchCapability[] = [];
    private readonly settled: Promise<readonly CombinedResult[]>;
    private resolveSettled: (results: readonly CombinedResult[]) => void = () => undefined;
    private rejectSettled: (reason: unknown) => void = () => undefined;

    constructor(readonly query: string) {
        super();
        this.settled = new Promise((resolve, reject) => {
            this.resolveSettled = resolve;
            this.rejectSettled = reject;
        });
        // wait() still rejects; this only marks the rejection as handled
        this.settled.catch(() => undefined);
    }

    /** Completed tasks as a percentage of planned tasks; 100 once a session without tasks is done. */
    get progress(): number {
        if (this.total === 0) return this.finished ? 100 : 0;
        return (100 * this.completed) / this.total;
    }

    get isDone(): boolean {
        return this.finished;
    }

    /** Capabilities this session queries, one per distinct source. */
    get capabilities(): readonly SearchCapability[] {
        return this.sources;
    }

    /** Every canonical result collected so far, in completion order. */
    get collectedResults(): readonly CanonicalResult[] {
        return this.collected;
    }

    get failures(): readonly SourceFailure[] {
        return this.failed;
    }

    /** Final ranked list; empty until the session is done. */
    get results(): readonly CombinedResult[] {
        return this.final;
    }

    /** Resolves with the final ranked list. */
    wait(): Promise<readonly CombinedResult[]> {
        return this.settled;
    }

    begin(capabilities: readonly SearchCapability[]): void {
        this.sources = capabilities;
        this.total = capabilities.length;
        this.completed = 0;
    }

    record(outcome: SourceOutcome): void {
        if (this.completed >= this.total) return;

        if (outcome.ok) {
            this.collected.push(...outcome.results);
        } else {
            this.failed.push({ sourceId: outcome.sourceId, reason: outcome.error.message });
        }
        this.completed++;
        this.notify("progress", this.progress);
    }

    finish(results: readonly CombinedResult[]): void {
        if (this.finished) return;
        this.finished = true;
        this.final = results;
        this.resolveSettled(results);
        this.notify("done", results);
    }

    /** Internal failure of the engine itself (never a source failure). */
    fail(reason: unknown): void {
        if (this.finished) return;
        this.finished = true;
        this.rejectSettled(reason);
    }

    private notify(event: "progress" | "done", payload: unknown): void {
        try {
            this.emit(event, payload);
        } catch (err) {
            log.warn(`"${event}" listener failed: ${describeError(err)}`);
        }
    }
}
