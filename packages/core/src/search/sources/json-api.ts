// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * JsonApiSource — searches a site through a JSON endpoint declared in the
 * config file (`sources:`). `{query}` in the search URL is replaced by the
 * URL-encoded query; hits are read from the array at `resultsPath`.
 * Relative result urls are resolved against the search URL.
 */

import { SourceSearchError } from "../../exceptions.js";
import type { JsonSourceDefinition, RawHit, SearchCapability, SearchContext } from "../../types.js";

function readPath(data: unknown, path: string): unknown {
    if (!path) return data;
    let current: unknown = data;
    for (const key of path.split(".")) {
        if (current === null || typeof current !== "object") return undefined;
        current = Object.getOwnPropertyDescriptor(current, key)?.value;
    }
    return current;
}

function textField(item: unknown, field: string): string | null {
    const value = readPath(item, field);
    if (typeof value === "string") return value;
    if (typeof value === "number") return String(value);
    return null;
}

/** Absolute form of `link`; null when it is not a valid URL. */
function absoluteUrl(link: string, base: string): string | null {
    try {
        return new URL(link, base).toString();
    } catch {
        return null;
    }
}

export class JsonApiSource implements SearchCapability {
    readonly id: string;

    constructor(private readonly definition: JsonSourceDefinition) {
        this.id = definition.id;
    }

    buildUrl(query: string): string {
        return this.definition.searchUrl.split("{query}").join(encodeURIComponent(query));
    }

    async *search(query: string, context: SearchContext): AsyncGenerator<RawHit> {
        const url = this.buildUrl(query);
        const resp = await fetch(url, {
            headers: { Accept: "application/json" },
            signal: context.signal,
        });

        if (!resp.ok) {
            throw new SourceSearchError(this.id, `HTTP ${resp.status} from ${url}`);
        }

        const items = readPath(await resp.json(), this.definition.resultsPath);
        if (!Array.isArray(items)) {
            throw new SourceSearchError(
                this.id,
                `expected an array at '${this.definition.resultsPath || "<root>"}'`,
            );
        }

        for (const item of items) {
            const title = textField(item, this.definition.titleField);
            const link = textField(item, this.definition.urlField);
            yield {
                title,
                url: link ? absoluteUrl(link, url) : null,
            };
        }
    }
}
