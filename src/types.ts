// --- Core domain types ---

/** Which ingestion path observed a connection. */
export type RecordSource = "proxy" | "daemon-log";

/**
 * A connection observation before the store assigns it an id.
 *
 * Every string field is `""` when the information was not available.
 */
export interface ConnectionInput {
  timestamp: Date;
  clientIp: string;
  country: string;
  method: string;
  path: string;
  host: string;
  userAgent: string;
  referer: string;
  source: RecordSource;
}

/** A persisted observation, shaped the way the read API serves it. */
export interface ConnectionRecord {
  id: number;
  /** Local time, `YYYY-MM-DD HH:MM:SS`. */
  timestamp: string;
  client_ip: string;
  country: string;
  method: string;
  path: string;
  host: string;
  user_agent: string;
  referer: string;
  source: RecordSource;
}

export interface ClientStats {
  client_ip: string;
  country: string;
  hit_count: number;
  first_seen: string;
  last_seen: string;
}

export interface PathHost {
  path: string;
  host: string;
}

export interface ClientDetail {
  stats: ClientStats;
  recent_paths: PathHost[];
}

export interface StatsSummary {
  total_connections: number;
  unique_ips: number;
  top_ips: ClientStats[];
  top_hosts: Record<string, number>;
}

export interface ConnectionFilter {
  ip?: string;
  country?: string;
  /** Substring match against the recorded host. */
  host?: string;
  /** Inclusive lower bound, compared against the stored timestamp text. */
  since?: string;
  limit: number;
  offset: number;
}

// --- Routing ---

/** One entry of the route configuration file, as written by the operator. */
export interface RouteConfigEntry {
  host: string;
  backend: string;
  no_tls_verify?: boolean;
}

export interface RouteEntry {
  /** Lowercased, without port. */
  host: string;
  backend: URL;
  /** The backend URL exactly as configured. */
  backendUrl: string;
  skipTlsVerify: boolean;
}

export interface ClientIdentity {
  clientIp: string;
  country: string;
}
