// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Ratcliff/Obershelp sequence similarity.
 *
 *   ratio = 2·M / (|a| + |b|)
 *
 * M is the total size of the matching blocks found by taking the longest
 * common substring (leftmost in `a`, then leftmost in `b`) and recursing on
 * the pieces to its left and right. Strings are compared by code point.
 * When `b` has 200 or more characters, characters occurring in more than
 * 1% of `b` are not used to seed a match.
 */

const POPULAR_MIN_LENGTH = 200;

interface Match {
    i: number;
    j: number;
    size: number;
}

function indexPositions(b: string[]): Map<string, number[]> {
    const b2j = new Map<string, number[]>();
    b.forEach((ch, j) => {
        const positions = b2j.get(ch);
        if (positions) positions.push(j);
        else b2j.set(ch, [j]);
    });

    if (b.length >= POPULAR_MIN_LENGTH) {
        const limit = Math.floor(b.length / 100) + 1;
        for (const [ch, positions] of [...b2j]) {
            if (positions.length > limit) b2j.delete(ch);
        }
    }
    return b2j;
}

function longestMatch(
    a: string[],
    b: string[],
    b2j: Map<string, number[]>,
    alo: number,
    ahi: number,
    blo: number,
    bhi: number,
): Match {
    let besti = alo;
    let bestj = blo;
    let bestsize = 0;
    let j2len = new Map<number, number>();

    for (let i = alo; i < ahi; i++) {
        const next = new Map<number, number>();
        for (const j of b2j.get(a[i] ?? "") ?? []) {
            if (j < blo) continue;
            if (j >= bhi) break;
            const k = (j2len.get(j - 1) ?? 0) + 1;
            next.set(j, k);
            if (k > bestsize) {
                besti = i - k + 1;
                bestj = j - k + 1;
                bestsize = k;
            }
        }
        j2len = next;
    }

    // Popular characters never seed a match but may still extend one
    while (besti > alo && bestj > blo && a[besti - 1] === b[bestj - 1]) {
        besti--;
        bestj--;
        bestsize++;
    }
    while (besti + bestsize < ahi && bestj + bestsize < bhi && a[besti + bestsize] === b[bestj + bestsize]) {
        bestsize++;
    }

    return { i: besti, j: bestj, size: bestsize };
}

/** Number of characters in all matching blocks of `a` and `b`. */
export function matchingCharacters(a: string, b: string): number {
    const left = Array.from(a);
    const right = Array.from(b);
    const b2j = indexPositions(right);

    let total = 0;
    const pending: Array<[number, number, number, number]> = [[0, left.length, 0, right.length]];
    for (let range = pending.pop(); range; range = pending.pop()) {
        const [alo, ahi, blo, bhi] = range;
        const { i, j, size } = longestMatch(left, right, b2j, alo, ahi, blo, bhi);
        if (size === 0) continue;
        total += size;
        if (alo < i && blo < j) pending.push([alo, i, blo, j]);
        if (i + size < ahi && j + size < bhi) pending.push([i + size, ahi, j + size, bhi]);
    }
    return total;
}

/** Similarity in [0, 1]; 1 for two empty strings. */
export function similarity(a: string, b: string): number {
    const length = Array.from(a).length + Array.from(b).length;
    if (length === 0) return 1;
    return (2 * matchingCharacters(a, b)) / length;
}
