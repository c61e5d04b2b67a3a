import sqlite3 from "node-sqlite3-wasm";

import type {
  ClientStats,
  ConnectionFilter,
  ConnectionInput,
  ConnectionRecord,
  PathHost,
  RecordSource,
} from "../types.js";

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS connections (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    timestamp DATETIME DEFAULT CURRENT_TIMESTAMP,
    client_ip TEXT NOT NULL,
    country TEXT,
    method TEXT,
    path TEXT,
    host TEXT,
    user_agent TEXT,
    referer TEXT,
    source TEXT NOT NULL DEFAULT 'proxy'
  );
  CREATE INDEX IF NOT EXISTS idx_timestamp ON connections(timestamp);
  CREATE INDEX IF NOT EXISTS idx_client_ip ON connections(client_ip);
  CREATE INDEX IF NOT EXISTS idx_country ON connections(country);
  CREATE INDEX IF NOT EXISTS idx_host ON connections(host);
`;

const RECORD_COLUMNS = `
  id, timestamp, client_ip,
  COALESCE(country, '') AS country,
  COALESCE(method, '') AS method,
  COALESCE(path, '') AS path,
  COALESCE(host, '') AS host,
  COALESCE(user_agent, '') AS user_agent,
  COALESCE(referer, '') AS referer,
  COALESCE(source, 'proxy') AS source
`;

// Country of the client's most recent record.
const CLIENT_AGGREGATE_COLUMNS = `
  c.client_ip AS client_ip,
  COALESCE((
    SELECT c2.country FROM connections c2
    WHERE c2.client_ip = c.client_ip
    ORDER BY c2.id DESC LIMIT 1
  ), '') AS country,
  COUNT(*) AS hit_count,
  MIN(c.timestamp) AS first_seen,
  MAX(c.timestamp) AS last_seen
`;

export const TOP_CLIENTS_LIMIT = 100;
export const TOP_HOSTS_LIMIT = 20;
export const RECENT_PATHS_LIMIT = 20;

export interface HostHits {
  host: string;
  hits: number;
}

/** Read side of the store, handed to the query layer. */
export interface ConnectionReader {
  listConnections(filter: ConnectionFilter): ConnectionRecord[];
  topClients(since?: string): ClientStats[];
  totals(): { totalConnections: number; uniqueIps: number };
  topHosts(): HostHits[];
  clientStats(ip: string): ClientStats | null;
  recentPaths(ip: string): PathHost[];
}

/**
 * Format a date as local wall-clock time with second precision.
 *
 * Stored timestamps use this shape so that string order matches time order.
 */
export function formatTimestamp(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

function toSource(value: string): RecordSource {
  return value === "daemon-log" ? "daemon-log" : "proxy";
}

// Column readers: rows come back untyped from the binding.

function column(row: unknown, name: string): unknown {
  return typeof row === "object" && row !== null ? Reflect.get(row, name) : undefined;
}

function text(row: unknown, name: string): string {
  const value = column(row, name);
  return typeof value === "string" ? value : value == null ? "" : String(value);
}

function int(row: unknown, name: string): number {
  const value = column(row, name);
  if (typeof value === "number") return value;
  if (typeof value === "bigint") return Number(value);
  return 0;
}

function toRecord(row: unknown): ConnectionRecord {
  return {
    id: int(row, "id"),
    timestamp: text(row, "timestamp"),
    client_ip: text(row, "client_ip"),
    country: text(row, "country"),
    method: text(row, "method"),
    path: text(row, "path"),
    host: text(row, "host"),
    user_agent: text(row, "user_agent"),
    referer: text(row, "referer"),
    source: toSource(text(row, "source")),
  };
}

function toClientStats(row: unknown): ClientStats {
  return {
    client_ip: text(row, "client_ip"),
    country: text(row, "country"),
    hit_count: int(row, "hit_count"),
    first_seen: text(row, "first_seen"),
    last_seen: text(row, "last_seen"),
  };
}

function toPathHost(row: unknown): PathHost {
  return { path: text(row, "path"), host: text(row, "host") };
}

const { Database } = sqlite3;
type SqliteDatabase = InstanceType<typeof Database>;

const INSERT_SQL = `
  INSERT INTO connections
    (timestamp, client_ip, country, method, path, host, user_agent, referer, source)
  VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
`;

/**
 * SQLite-backed connection store.
 *
 * SQLite runs as WebAssembly and keeps the database in one file on disk. The proxy and the log ingester may share that file from
 * separate processes; `busy_timeout` makes a second writer wait instead of
 * failing.
 */
export class ConnectionStore implements ConnectionReader {
  private readonly db: SqliteDatabase;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    try {
      this.db.exec("PRAGMA busy_timeout = 5000");
      this.db.exec(SCHEMA);
      this.migrate();
    } catch (err: unknown) {
      this.db.close();
      throw err;
    }
  }

  /** Databases created before the `source` column existed get it added. */
  private migrate(): void {
    const columns = this.db.all("PRAGMA table_info(connections)");
    if (!columns.some((c) => text(c, "name") === "source")) {
      this.db.exec(
        "ALTER TABLE connections ADD COLUMN source TEXT NOT NULL DEFAULT 'proxy'",
      );
    }
  }

  insert(input: ConnectionInput): number {
    const result = this.db.run(INSERT_SQL, [
      formatTimestamp(input.timestamp),
      input.clientIp,
      input.country,
      input.method,
      input.path,
      input.host,
      input.userAgent,
      input.referer,
      input.source,
    ]);
    return Number(result.lastInsertRowid);
  }

  listConnections(filter: ConnectionFilter): ConnectionRecord[] {
    let sql = `SELECT ${RECORD_COLUMNS} FROM connections WHERE 1=1`;
    const args: (string | number)[] = [];

    if (filter.ip) {
      sql += " AND client_ip = ?";
      args.push(filter.ip);
    }
    if (filter.country) {
      sql += " AND country = ?";
      args.push(filter.country);
    }
    if (filter.host) {
      sql += " AND host LIKE ? ESCAPE '\\'";
      args.push(`%${escapeLike(filter.host)}%`);
    }
    if (filter.since) {
      sql += " AND timestamp >= ?";
      args.push(filter.since);
    }

    sql += " ORDER BY timestamp DESC, id DESC LIMIT ? OFFSET ?";
    args.push(filter.limit, filter.offset);

    return this.db.all(sql, args).map(toRecord);
  }

  topClients(since?: string): ClientStats[] {
    let sql = `SELECT ${CLIENT_AGGREGATE_COLUMNS} FROM connections c`;
    const args: (string | number)[] = [];
    if (since) {
      sql += " WHERE c.timestamp >= ?";
      args.push(since);
    }
    sql += " GROUP BY c.client_ip ORDER BY hit_count DESC, last_seen DESC LIMIT ?";
    args.push(TOP_CLIENTS_LIMIT);
    return this.db.all(sql, args).map(toClientStats);
  }

  totals(): { totalConnections: number; uniqueIps: number } {
    const row = this.db.get(
      "SELECT COUNT(*) AS total, COUNT(DISTINCT client_ip) AS unique_ips FROM connections",
    );
    return {
      totalConnections: row ? int(row, "total") : 0,
      uniqueIps: row ? int(row, "unique_ips") : 0,
    };
  }

  topHosts(): HostHits[] {
    return this.db
      .all(
        `SELECT COALESCE(host, '') AS host, COUNT(*) AS hits
         FROM connections GROUP BY host ORDER BY hits DESC, host ASC LIMIT ?`,
        [TOP_HOSTS_LIMIT],
      )
      .map((row) => ({ host: text(row, "host"), hits: int(row, "hits") }));
  }

  clientStats(ip: string): ClientStats | null {
    const row = this.db.get(
      `SELECT ${CLIENT_AGGREGATE_COLUMNS} FROM connections c
       WHERE c.client_ip = ? GROUP BY c.client_ip`,
      [ip],
    );
    return row ? toClientStats(row) : null;
  }

  recentPaths(ip: string): PathHost[] {
    return this.db
      .all(
        `SELECT COALESCE(path, '') AS path, COALESCE(host, '') AS host
         FROM connections WHERE client_ip = ?
         GROUP BY path, host
         ORDER BY MAX(timestamp) DESC, MAX(id) DESC LIMIT ?`,
        [ip, RECENT_PATHS_LIMIT],
      )
      .map(toPathHost);
  }

  close(): void {
    this.db.close();
  }
}
