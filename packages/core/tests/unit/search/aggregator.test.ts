// © 2026 LearnHubPlay BV. All rights reserved.
// packages/core/tests/unit/search/aggregator.test.ts

import { describe, it, expect } from "vitest";
import { aggregateResults, groupByTitle } from "../../../src/search/aggregator.js";
import type { CanonicalResult } from "../../../src/types.js";

function hit(title: string, url: string, sourceId = url.split("/")[0] ?? "src"): CanonicalResult {
    return { title, url, sourceId };
}

describe("aggregateResults", () => {
    it("ranks a title confirmed by three sources above a singleton", () => {
        const results = [
            hit("My Cultivation Journey", "c.com/3"),
            hit("Unrelated Title", "d.com/4"),
            hit("My Cultivation Journey", "a.com/1"),
            hit("My Cultivation Journey", "b.com/2"),
        ];

        const combined = aggregateResults(results, "Cultivation");

        expect(combined.map((c) => c.id)).toEqual(["my-cultivation-journey", "unrelated-title"]);
        expect(combined[0]?.title).toBe("My Cultivation Journey");
        expect(combined[0]?.members.map((m) => m.url)).toEqual(["a.com/1", "b.com/2", "c.com/3"]);
        expect(combined[1]?.members).toEqual([hit("Unrelated Title", "d.com/4")]);
    });

    it("breaks equal group sizes by similarity to the query", () => {
        const combined = aggregateResults(
            [hit("Apple Orchard", "a.com/1"), hit("Zen Garden", "z.com/1")],
            "Zen Garden",
        );
        expect(combined.map((c) => c.id)).toEqual(["zen-garden", "apple-orchard"]);
    });

    it("drops titles whose key is two characters or shorter", () => {
        const combined = aggregateResults(
            [
                hit("Hi", "a.com/1"),
                hit("Hi", "b.com/1"),
                hit("Hi", "c.com/1"),
                hit("!!!", "d.com/1"),
                hit("Hello There", "e.com/1"),
            ],
            "Hi",
        );
        expect(combined.map((c) => c.id)).toEqual(["hello-there"]);
    });

    it("names a group after the member with the smallest url", () => {
        const [group] = aggregateResults(
            [hit("Return Of The Hero", "https://z.com/1"), hit("Return Of The Hero!", "https://a.com/9")],
            "hero",
        );
        expect(group?.id).toBe("return-of-the-hero");
        expect(group?.title).toBe("Return Of The Hero!");
        expect(group?.members.map((m) => m.url)).toEqual(["https://a.com/9", "https://z.com/1"]);
    });

    it("orders by size then id when the query is empty", () => {
        const combined = aggregateResults(
            [
                hit("Beta Story", "b.com/1"),
                hit("Alpha Story", "a.com/1"),
                hit("Gamma Story", "g.com/1"),
                hit("Gamma Story", "h.com/1"),
            ],
            "",
        );
        expect(combined.map((c) => c.id)).toEqual(["gamma-story", "alpha-story", "beta-story"]);
    });

    it("keeps at most ten groups by default", () => {
        const results = Array.from({ length: 12 }, (_, i) => hit(`Title Number ${i + 1}`, `s${i}.com/1`));
        const combined = aggregateResults(results, "");
        expect(combined).toHaveLength(10);
        expect(combined.every((c) => c.id.length > 2)).toBe(true);
    });

    it("honours a custom limit", () => {
        const results = [hit("First Book", "a.com/1"), hit("Second Book", "b.com/1"), hit("Third Book", "c.com/1")];
        expect(aggregateResults(results, "", { limit: 2 })).toHaveLength(2);
    });

    it("produces identical output for the same input, in any arrival order", () => {
        const results = [
            hit("Sword Saint", "b.com/2"),
            hit("Sword Saint", "a.com/1"),
            hit("Sword Sage", "c.com/1"),
            hit("Blade Saint", "d.com/1"),
            hit("Blade Saint", "e.com/1"),
        ];
        const first = JSON.stringify(aggregateResults(results, "Sword Saint"));
        const second = JSON.stringify(aggregateResults(results, "Sword Saint"));
        const reversed = JSON.stringify(aggregateResults([...results].reverse(), "Sword Saint"));

        expect(second).toBe(first);
        expect(reversed).toBe(first);
    });

    it("returns an empty list for no results", () => {
        expect(aggregateResults([], "anything")).toEqual([]);
    });
});

describe("aggregateResults with non-Latin titles", () => {
    it("groups a Chinese title confirmed by two sources", () => {
        const combined = aggregateResults(
            [hit("斗破苍穹", "b.com/2"), hit("斗破苍穹", "a.com/1"), hit("Other Story", "c.com/1")],
            "斗破苍穹",
        );

        expect(combined.map((c) => c.id)).toEqual(["dou-po-cang-qiong", "other-story"]);
        expect(combined[0]?.title).toBe("斗破苍穹");
        expect(combined[0]?.members.map((m) => m.url)).toEqual(["a.com/1", "b.com/2"]);
    });

    it("groups a Korean title confirmed by two sources", () => {
        const combined = aggregateResults(
            [hit("전지적 독자 시점", "a.com/1"), hit("전지적 독자 시점", "b.com/1")],
            "독자",
        );

        expect(combined).toHaveLength(1);
        expect(combined[0]?.title).toBe("전지적 독자 시점");
        expect(combined[0]?.members).toHaveLength(2);
    });

    it("keeps an ampersand title apart from its spelled-out twin", () => {
        const combined = aggregateResults(
            [hit("Pride & Prejudice", "a.com/1"), hit("Pride and Prejudice", "b.com/1")],
            "",
        );

        expect(combined.map((c) => c.id)).toEqual(["pride-and-prejudice", "pride-prejudice"]);
    });
});

describe("groupByTitle", () => {
    it("skips results without a title", () => {
        const groups = groupByTitle([hit("", "a.com/1"), hit("Real Title", "b.com/1")]);
        expect([...groups.keys()]).toEqual(["real-title"]);
    });
});
