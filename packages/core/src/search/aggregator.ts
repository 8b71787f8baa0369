// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Result aggregation — merges the hits of every source into ranked CombinedResults.
 *
 *   1. group hits by the slug of their title (slugs of ≤ 2 chars are noise)
 *   2. order each group's members by url; the first member names the group
 *   3. rank: more sources first, then closer to the query, then by id
 *   4. keep the top `limit`
 */

import type { CanonicalResult, CombinedResult } from "../types.js";
import { slugKey } from "./normalize.js";
import { similarity } from "./similarity.js";

export const DEFAULT_RESULT_LIMIT = 10;
const MIN_KEY_LENGTH = 3;

export interface AggregateOptions {
    limit?: number;
}

function compareText(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

function compareMembers(a: CanonicalResult, b: CanonicalResult): number {
    return compareText(a.url, b.url) || compareText(a.sourceId, b.sourceId) || compareText(a.title, b.title);
}

/** Group hits by slug key, in arrival order. Keys shorter than three characters are dropped. */
export function groupByTitle(results: readonly CanonicalResult[]): Map<string, CanonicalResult[]> {
    const groups = new Map<string, CanonicalResult[]>();
    for (const result of results) {
        if (!result.title) continue;
        const key = slugKey(result.title);
        if (key.length < MIN_KEY_LENGTH) continue;

        const members = groups.get(key);
        if (members) members.push(result);
        else groups.set(key, [result]);
    }
    return groups;
}

export function aggregateResults(
    results: readonly CanonicalResult[],
    query: string,
    options: AggregateOptions = {},
): CombinedResult[] {
    const limit = options.limit ?? DEFAULT_RESULT_LIMIT;

    const ranked: Array<{ combined: CombinedResult; score: number }> = [];
    for (const [id, members] of groupByTitle(results)) {
        const sorted = [...members].sort(compareMembers);
        const title = sorted[0]?.title ?? "";
        ranked.push({
            combined: Object.freeze({ id, title, members: Object.freeze(sorted) }),
            score: similarity(title, query),
        });
    }

    ranked.sort(
        (a, b) =>
            b.combined.members.length - a.combined.members.length ||
            b.score - a.score ||
            compareText(a.combined.id, b.combined.id),
    );

    return ranked.slice(0, limit).map((r) => r.combined);
}
