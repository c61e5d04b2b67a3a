import type {
  ClientDetail,
  ConnectionFilter,
  ConnectionRecord,
  StatsSummary,
} from "../types.js";
import type { ConnectionReader } from "./store.js";

export const DEFAULT_LIMIT = 100;
export const MAX_LIMIT = 1000;

/** Integer in [1, MAX_LIMIT]; anything else falls back to DEFAULT_LIMIT. */
export function parseLimit(raw: string | undefined | null): number {
  if (raw == null || !/^-?\d+$/.test(raw.trim())) return DEFAULT_LIMIT;
  const n = Number.parseInt(raw, 10);
  if (n <= 0 || n > MAX_LIMIT) return DEFAULT_LIMIT;
  return n;
}

export function parseOffset(raw: string | undefined | null): number {
  if (raw == null || !/^\d+$/.test(raw.trim())) return 0;
  const n = Number.parseInt(raw, 10);
  return Number.isSafeInteger(n) ? n : 0;
}

/** Filters and aggregates over stored connections. */
export class QueryService {
  private readonly reader: ConnectionReader;

  constructor(reader: ConnectionReader) {
    this.reader = reader;
  }

  listConnections(filter: ConnectionFilter): ConnectionRecord[] {
    return this.reader.listConnections(filter);
  }

  /**
   * Totals are over all records; `since` only bounds the per-client list.
   */
  stats(since?: string): StatsSummary {
    const { totalConnections, uniqueIps } = this.reader.totals();
    const topHosts: Record<string, number> = {};
    for (const row of this.reader.topHosts()) {
      topHosts[row.host] = row.hits;
    }
    return {
      total_connections: totalConnections,
      unique_ips: uniqueIps,
      top_ips: this.reader.topClients(since || undefined),
      top_hosts: topHosts,
    };
  }

  clientDetail(ip: string): ClientDetail | null {
    const stats = this.reader.clientStats(ip);
    if (!stats) return null;
    return { stats, recent_paths: this.reader.recentPaths(ip) };
  }
}
