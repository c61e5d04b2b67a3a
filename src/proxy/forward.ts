/**
 * Standard HTTP forwarding to a routed backend.
 *
 * The request is streamed to the backend with the original Host header and
 * the response is piped back unmodified.
 */

import http from "node:http";
import https from "node:https";
import net from "node:net";

import { FORWARDED_FOR_HEADER, headerValue, type HeaderMap } from "../http/headers.js";
import type { RouteEntry } from "../types.js";

/** Connection-scoped headers that never cross the proxy. */
const HOP_BY_HOP_HEADERS = [
  "connection",
  "keep-alive",
  "proxy-authenticate",
  "proxy-authorization",
  "proxy-connection",
  "te",
  "trailer",
  "upgrade",
];

export interface ForwardHeaderOptions {
  /** Peer address appended to X-Forwarded-For. */
  clientAddress?: string;
  /** Set when the body is sent as one buffer instead of streamed. */
  bodyLength?: number;
}

/**
 * Build headers to send to the backend.
 *
 * Host is left as the client sent it so the backend sees the virtual host.
 */
export function buildForwardHeaders(
  reqHeaders: HeaderMap,
  opts: ForwardHeaderOptions = {},
): HeaderMap {
  const forwardHeaders: HeaderMap = { ...reqHeaders };
  const listed = headerValue(reqHeaders, "connection")
    .split(",")
    .map((token) => token.trim().toLowerCase())
    .filter((token) => token && token !== "host");
  for (const name of [...HOP_BY_HOP_HEADERS, ...listed]) {
    delete forwardHeaders[name];
  }

  if (opts.clientAddress) {
    const prior = headerValue(reqHeaders, FORWARDED_FOR_HEADER);
    forwardHeaders[FORWARDED_FOR_HEADER] = prior
      ? `${prior}, ${opts.clientAddress}`
      : opts.clientAddress;
  }

  if (opts.bodyLength != null) {
    delete forwardHeaders["transfer-encoding"];
    forwardHeaders["content-length"] = String(opts.bodyLength);
  }
  return forwardHeaders;
}

/** Join two URL paths with exactly one slash between them. */
export function joinPaths(base: string, rest: string): string {
  const baseSlash = base.endsWith("/");
  const restSlash = rest.startsWith("/");
  if (baseSlash && restSlash) return base + rest.slice(1);
  if (!baseSlash && !restSlash) return `${base}/${rest}`;
  return base + rest;
}

/** Split a request target into path and raw query (without `?`). */
export function splitTarget(rawUrl: string | undefined): {
  path: string;
  query: string;
} {
  let target = rawUrl || "/";
  const scheme = target.match(/^[a-zA-Z][a-zA-Z0-9+.-]*:\/\/[^/?#]*/);
  if (scheme) target = target.slice(scheme[0].length);
  const hash = target.indexOf("#");
  if (hash !== -1) target = target.slice(0, hash);
  const q = target.indexOf("?");
  if (q === -1) return { path: target || "/", query: "" };
  return { path: target.slice(0, q) || "/", query: target.slice(q + 1) };
}

/**
 * Backend path and query for a request: the backend's own path prefix joined
 * with the request path, and both query strings combined.
 */
export function resolveTargetPath(backend: URL, rawUrl: string | undefined): string {
  const { path, query } = splitTarget(rawUrl);
  const joined = joinPaths(backend.pathname || "/", path);
  const backendQuery = backend.search.replace(/^\?/, "");
  const combined =
    backendQuery && query ? `${backendQuery}&${query}` : backendQuery || query;
  return combined ? `${joined}?${combined}` : joined;
}

function isSecure(backend: URL): boolean {
  return backend.protocol === "https:" || backend.protocol === "wss:";
}

export function defaultPort(backend: URL): number {
  return isSecure(backend) ? 443 : 80;
}

/** TLS server name for a backend host; IP literals get none. */
export function serverNameFor(hostname: string): string {
  const bare = hostname.replace(/^\[|\]$/g, "");
  return net.isIP(bare) ? "" : bare;
}

/** One agent per route, so TLS verification settings never leak across routes. */
export class RouteAgents {
  private readonly agents = new Map<string, http.Agent>();

  agentFor(route: RouteEntry): http.Agent {
    const existing = this.agents.get(route.host);
    if (existing) return existing;
    const agent = isSecure(route.backend)
      ? new https.Agent({ rejectUnauthorized: !route.skipTlsVerify })
      : new http.Agent();
    this.agents.set(route.host, agent);
    return agent;
  }

  destroy(): void {
    for (const agent of this.agents.values()) agent.destroy();
    this.agents.clear();
  }
}

/**
 * Wire up error/close handlers between client response and backend request.
 */
function attachLifecycleHandlers(
  res: http.ServerResponse,
  proxyReq: http.ClientRequest,
): void {
  res.on("close", () => {
    if (!proxyReq.destroyed) proxyReq.destroy();
  });

  proxyReq.on("error", (err) => {
    if (res.destroyed) return;
    const detail = err.message || ("code" in err ? String(err.code) : "unknown");
    console.error("Proxy error:", detail);
    if (!res.headersSent) {
      res.writeHead(502, { "Content-Type": "application/json" });
    }
    if (!res.destroyed) {
      res.end(JSON.stringify({ error: "Proxy error", details: err.message }));
    }
  });
}

export interface ForwardOptions {
  agent: http.Agent;
  clientAddress?: string;
  /**
   * Complete request body. When omitted the incoming request is piped
   * through as it arrives.
   */
  body?: Buffer;
}

/**
 * Forward one request to the route's backend and stream the response back.
 */
export function forwardRequest(
  req: http.IncomingMessage,
  res: http.ServerResponse,
  route: RouteEntry,
  opts: ForwardOptions,
): void {
  const backend = route.backend;
  const headers = buildForwardHeaders(req.headers, {
    clientAddress: opts.clientAddress,
    bodyLength: opts.body?.length,
  });
  if (!headers.host) headers.host = backend.host;

  const requestOptions: https.RequestOptions = {
    hostname: backend.hostname.replace(/^\[|\]$/g, ""),
    port: backend.port ? Number(backend.port) : defaultPort(backend),
    path: resolveTargetPath(backend, req.url),
    method: req.method,
    headers,
    agent: opts.agent,
  };
  if (isSecure(backend)) {
    // Without this the Host header (the virtual host) would be sent as SNI.
    requestOptions.servername = serverNameFor(backend.hostname);
  }

  const protocol = isSecure(backend) ? https : http;
  const proxyReq = protocol.request(requestOptions, (proxyRes) => {
    if (!res.headersSent) {
      res.writeHead(proxyRes.statusCode ?? 502, proxyRes.statusMessage, proxyRes.headers);
    }
    proxyRes.pipe(res);
    proxyRes.on("error", (err) => {
      console.error("Upstream response error:", err.message);
      if (!res.destroyed) res.end();
    });
  });

  attachLifecycleHandlers(res, proxyReq);

  if (opts.body) {
    proxyReq.end(opts.body);
  } else {
    req.pipe(proxyReq);
  }
}
