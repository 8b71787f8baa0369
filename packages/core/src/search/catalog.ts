// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * SourceCatalog — in-memory map of hostname → search capability.
 * Mirrors are registered as extra hosts of the same capability.
 */

import type { CapabilityResolver, JsonSourceDefinition, SearchCapability } from "../types.js";
import { JsonApiSource } from "./sources/json-api.js";

/** Hostname of a URL or bare hostname reference, lower-cased; null when unparseable. */
export function hostnameOf(reference: string): string | null {
    const trimmed = reference.trim();
    if (!trimmed) return null;

    const candidate = /^[a-z][a-z\d+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
    try {
        const { hostname } = new URL(candidate);
        return hostname ? hostname.toLowerCase() : null;
    } catch {
        return null;
    }
}

export class SourceCatalog implements CapabilityResolver {
    private readonly byHost = new Map<string, SearchCapability>();

    /** Register a capability under one or more hostnames. A later registration replaces the host. */
    register(capability: SearchCapability, hosts: readonly string[]): this {
        for (const host of hosts) {
            const hostname = hostnameOf(host);
            if (hostname) this.byHost.set(hostname, capability);
        }
        return this;
    }

    resolve(reference: string): SearchCapability | undefined {
        const hostname = hostnameOf(reference);
        return hostname ? this.byHost.get(hostname) : undefined;
    }

    /** Every registered hostname, grouped by capability id. */
    list(): Array<{ id: string; hosts: string[] }> {
        const grouped = new Map<string, string[]>();
        for (const [host, capability] of this.byHost) {
            const hosts = grouped.get(capability.id);
            if (hosts) hosts.push(host);
            else grouped.set(capability.id, [host]);
        }
        return [...grouped].map(([id, hosts]) => ({ id, hosts }));
    }

    get size(): number {
        return this.byHost.size;
    }
}

/** Catalog of the JSON-API sources declared in the config file. */
export function catalogFromDefinitions(definitions: readonly JsonSourceDefinition[]): SourceCatalog {
    const catalog = new SourceCatalog();
    for (const definition of definitions) {
        catalog.register(new JsonApiSource(definition), definition.hosts);
    }
    return catalog;
}
