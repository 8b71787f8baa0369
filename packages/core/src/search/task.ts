// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Per-source search task — runs the query against one capability, drains its
 * lazy sequence and normalises every hit. Never rejects: failures come back
 * as `{ ok: false }` outcomes.
 */

import { SourceSearchError, SourceTimeoutError, describeError } from "../exceptions.js";
import type { CanonicalResult, SearchCapability, SourceOutcome } from "../types.js";
import { createLogger } from "../utils/logger.js";
import { toCanonicalResult } from "./normalize.js";

const log = createLogger("task");

export interface SourceTaskOptions {
    /** 0 disables the timeout. */
    timeoutMs: number;
}

async function collect(
    capability: SearchCapability,
    query: string,
    signal: AbortSignal,
): Promise<CanonicalResult[]> {
    const results: CanonicalResult[] = [];
    for await (const raw of capability.search(query, { canUseBrowser: false, signal })) {
        if (signal.aborted) break;
        const result = toCanonicalResult(raw, capability.id);
        if (result) results.push(result);
    }
    return results;
}

function withTimeout<T>(
    work: Promise<T>,
    timeoutMs: number,
    controller: AbortController,
    sourceId: string,
): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            controller.abort();
            reject(new SourceTimeoutError(sourceId, timeoutMs));
        }, timeoutMs);
    });

    // The source may still fail after the deadline; its outcome is already settled
    work.catch((err: unknown) => {
        if (controller.signal.aborted) {
            log.debug(`${sourceId}: late failure after timeout: ${describeError(err)}`);
        }
    });

    return Promise.race([work, expired]).finally(() => clearTimeout(timer));
}

export async function runSourceSearch(
    capability: SearchCapability,
    query: string,
    options: SourceTaskOptions,
): Promise<SourceOutcome> {
    const controller = new AbortController();
    const work = collect(capability, query, controller.signal);

    try {
        const results =
            options.timeoutMs > 0
                ? await withTimeout(work, options.timeoutMs, controller, capability.id)
                : await work;
        return { ok: true, sourceId: capability.id, results };
    } catch (err) {
        const error =
            err instanceof SourceSearchError
                ? err
                : new SourceSearchError(capability.id, describeError(err), { cause: err });
        return { ok: false, sourceId: capability.id, error };
    }
}
