import path from "node:path";

export const DEFAULT_DATA_DIR = "/data";
export const DEFAULT_PORT = 8080;
export const DEFAULT_BIND_HOST = "0.0.0.0";
export const DEFAULT_API_PREFIX = "/api";
export const ROUTE_CONFIG_FILENAME = "proxy-config.json";

export interface ServerConfig {
  dataDir: string;
  port: number;
  bindHost: string;
  /** Route configuration file. */
  routeConfigFile: string;
  /** Mount point of the read API, no trailing slash. */
  apiPrefix: string;
  /** Static files of an external dashboard, when installed. */
  dashboardDir: string | null;
}

type Env = Record<string, string | undefined>;

function parsePort(raw: string | undefined): number {
  if (!raw || !/^\d+$/.test(raw.trim())) return DEFAULT_PORT;
  const port = Number.parseInt(raw, 10);
  return port > 0 && port < 65536 ? port : DEFAULT_PORT;
}

/**
 * Normalize an API prefix to `/segment[/segment...]`.
 *
 * `/` alone would shadow every proxied path, so it falls back to the default.
 */
export function normalizeApiPrefix(raw: string | undefined): string {
  const trimmed = (raw ?? "").trim().replace(/\/+$/, "");
  if (!trimmed) return DEFAULT_API_PREFIX;
  return trimmed.startsWith("/") ? trimmed : `/${trimmed}`;
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
  const dataDir = env.DATA_DIR?.trim() || DEFAULT_DATA_DIR;
  return {
    dataDir,
    port: parsePort(env.PORT),
    bindHost: env.BIND_HOST?.trim() || DEFAULT_BIND_HOST,
    routeConfigFile:
      env.PROXY_CONFIG?.trim() || path.join(dataDir, ROUTE_CONFIG_FILENAME),
    apiPrefix: normalizeApiPrefix(env.API_PREFIX),
    dashboardDir: env.DASHBOARD_DIR?.trim() || null,
  };
}
