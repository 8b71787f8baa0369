// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Hit normalisation — turns what a source yields into CanonicalResult records,
 * and derives the grouping key used by the aggregator.
 */

import slugify from "@sindresorhus/slugify";
import { transliterate } from "transliteration";
import { z } from "zod";

import { MalformedHitError } from "../exceptions.js";
import type { CanonicalResult } from "../types.js";

const RawHitSchema = z
    .object({
        title: z.string().nullish(),
        url: z.string().nullish(),
    })
    .passthrough();

/**
 * Lower-case the text, then upper-case the first letter of every word.
 * A letter preceded by a letter, digit or apostrophe is not a word start.
 *
 * @example
 *   titleCase("the KING's AVATAR") → "The King's Avatar"
 */
export function titleCase(text: string): string {
    return text
        .toLowerCase()
        .replace(/(^|[^\p{L}\p{N}'’])(\p{L})/gu, (_, lead: string, letter: string) => lead + letter.toUpperCase());
}

/**
 * Grouping key: ASCII, lower-case, words joined by "-". Non-Latin scripts are
 * romanised first, so "斗破苍穹" keys as "dou-po-cang-qiong".
 * "&" is a plain separator: "Pride & Prejudice" and "Pride and Prejudice" stay apart.
 */
export function slugKey(title: string): string {
    return slugify(transliterate(title), {
        decamelize: false,
        customReplacements: [["&", " "]],
    });
}

/**
 * Validate one raw hit. Returns null for a hit without a usable title or url;
 * throws MalformedHitError when the hit is not a title/url record at all.
 */
export function toCanonicalResult(raw: unknown, sourceId: string): CanonicalResult | null {
    const parsed = RawHitSchema.safeParse(raw);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const detail = issue ? `${issue.path.join(".") || "hit"}: ${issue.message}` : "invalid hit";
        throw new MalformedHitError(sourceId, detail);
    }

    const title = (parsed.data.title ?? "").trim().replace(/\s+/g, " ");
    const url = (parsed.data.url ?? "").trim();
    if (!title || !url) return null;

    return Object.freeze({ title: titleCase(title), url, sourceId });
}
