/**
 * Host-keyed route table.
 *
 * Built once from the route configuration file and never mutated afterwards,
 * so every request handler can read it without coordination.
 */

import { normalizeHost } from "../http/headers.js";
import type { RouteConfigEntry, RouteEntry } from "../types.js";

const BACKEND_PROTOCOLS = new Set(["http:", "https:", "ws:", "wss:"]);

export interface SkippedRoute {
  host: string;
  backend: string;
  reason: string;
}

export interface RouteTableBuild {
  table: RouteTable;
  skipped: SkippedRoute[];
  /** Hosts configured more than once; the last entry wins. */
  duplicates: string[];
}

export class RouteTable {
  private readonly routes: ReadonlyMap<string, RouteEntry>;

  constructor(routes: Iterable<RouteEntry>) {
    const map = new Map<string, RouteEntry>();
    for (const route of routes) {
      map.set(route.host, Object.freeze({ ...route }));
    }
    this.routes = map;
    Object.freeze(this);
  }

  static empty(): RouteTable {
    return new RouteTable([]);
  }

  get size(): number {
    return this.routes.size;
  }

  /** Case- and port-insensitive lookup. */
  lookup(host: string | undefined): RouteEntry | undefined {
    const key = normalizeHost(host);
    if (!key) return undefined;
    return this.routes.get(key);
  }

  entries(): RouteEntry[] {
    return [...this.routes.values()];
  }

  /** Host to configured backend URL, for the config dump endpoint. */
  listAll(): Record<string, string> {
    const out: Record<string, string> = {};
    for (const [host, route] of this.routes) {
      out[host] = route.backendUrl;
    }
    return out;
  }
}

/**
 * Parse a backend URL, returning an error message instead of throwing.
 */
export function parseBackendUrl(
  backend: string,
): { url: URL; error: null } | { url: null; error: string } {
  let url: URL;
  try {
    url = new URL(backend);
  } catch {
    return { url: null, error: `invalid URL "${backend}"` };
  }
  if (!BACKEND_PROTOCOLS.has(url.protocol)) {
    return { url: null, error: `unsupported scheme "${url.protocol}"` };
  }
  if (!url.hostname) {
    return { url: null, error: "missing host" };
  }
  return { url, error: null };
}

/**
 * Build a route table from configuration entries.
 *
 * A malformed entry is reported in `skipped` and does not affect the others.
 */
export function buildRouteTable(
  entries: readonly RouteConfigEntry[],
): RouteTableBuild {
  const routes = new Map<string, RouteEntry>();
  const skipped: SkippedRoute[] = [];
  const duplicates: string[] = [];

  for (const entry of entries) {
    const host = normalizeHost(entry.host);
    if (!host) {
      skipped.push({
        host: entry.host,
        backend: entry.backend,
        reason: "empty host",
      });
      continue;
    }

    const parsed = parseBackendUrl(entry.backend);
    if (!parsed.url) {
      skipped.push({ host: entry.host, backend: entry.backend, reason: parsed.error });
      continue;
    }

    if (routes.has(host)) duplicates.push(host);
    routes.set(host, {
      host,
      backend: parsed.url,
      backendUrl: entry.backend,
      skipTlsVerify: entry.no_tls_verify === true,
    });
  }

  return { table: new RouteTable(routes.values()), skipped, duplicates };
}
