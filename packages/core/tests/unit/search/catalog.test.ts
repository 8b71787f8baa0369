// © 2026 LearnHubPlay BV. All rights reserved.
// packages/core/tests/unit/search/catalog.test.ts

import { describe, it, expect } from "vitest";
import { SourceCatalog, catalogFromDefinitions, hostnameOf } from "../../../src/search/catalog.js";
import { JsonApiSource } from "../../../src/search/sources/json-api.js";
import { FakeSource } from "./fakes.js";

describe("hostnameOf", () => {
    it("reads the hostname of a URL, lower-cased", () => {
        expect(hostnameOf("https://www.Example.com/novel/1?page=2")).toBe("www.example.com");
    });

    it("accepts bare hostnames", () => {
        expect(hostnameOf(" novels.test ")).toBe("novels.test");
    });

    it("returns null for empty or unparseable references", () => {
        expect(hostnameOf("")).toBeNull();
        expect(hostnameOf("not a host")).toBeNull();
    });
});

describe("SourceCatalog", () => {
    it("resolves any URL on a registered host", () => {
        const source = new FakeSource("novels", []);
        const catalog = new SourceCatalog().register(source, ["novels.test"]);

        expect(catalog.resolve("https://NOVELS.test/search?q=x")).toBe(source);
        expect(catalog.resolve("novels.test")).toBe(source);
        expect(catalog.resolve("https://other.test/")).toBeUndefined();
    });

    it("matches hosts exactly", () => {
        const catalog = new SourceCatalog().register(new FakeSource("novels", []), ["novels.test"]);
        expect(catalog.resolve("https://www.novels.test/")).toBeUndefined();
    });

    it("lists mirrors under their capability", () => {
        const catalog = new SourceCatalog()
            .register(new FakeSource("novels", []), ["novels.test", "mirror.novels.test"])
            .register(new FakeSource("stories", []), ["https://stories.test/"]);

        expect(catalog.list()).toEqual([
            { id: "novels", hosts: ["novels.test", "mirror.novels.test"] },
            { id: "stories", hosts: ["stories.test"] },
        ]);
        expect(catalog.size).toBe(3);
    });
});

describe("catalogFromDefinitions", () => {
    it("registers one JSON-API source per definition", () => {
        const catalog = catalogFromDefinitions([
            {
                id: "novels",
                hosts: ["novels.test", "mirror.novels.test"],
                searchUrl: "https://novels.test/api/search?q={query}",
                resultsPath: "",
                titleField: "title",
                urlField: "url",
            },
        ]);

        const resolved = catalog.resolve("https://mirror.novels.test/");
        expect(resolved).toBeInstanceOf(JsonApiSource);
        expect(resolved?.id).toBe("novels");
        expect(catalog.resolve("novels.test")).toBe(resolved);
    });
});
