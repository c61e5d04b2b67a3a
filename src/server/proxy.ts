import http from "node:http";
import net from "node:net";
import type { Duplex } from "node:stream";

import {
  extractClientIdentity,
  headerValue,
  isWebSocketUpgrade,
  requestPath,
  stripPort,
} from "../http/headers.js";
import { forwardRequest, type RouteAgents } from "../proxy/forward.js";
import type { RouteTable } from "../proxy/routing.js";
import { dialBackend, relayDuplex, serializeRequestHead } from "../proxy/tunnel.js";
import type { ClientIdentity, ConnectionInput, RouteEntry } from "../types.js";
import type { DashboardHandler } from "./static.js";

/** Anything that can persist an observation; the recorder in production. */
export interface ConnectionSink {
  record(input: ConnectionInput): Promise<unknown>;
}

export interface ProxyDeps {
  routes: RouteTable;
  recorder: ConnectionSink;
  dashboard: DashboardHandler;
  agents: RouteAgents;
}

export interface ProxyHandler {
  handleRequest(req: http.IncomingMessage, res: http.ServerResponse): void;
  handleUpgrade(req: http.IncomingMessage, socket: Duplex, head: Buffer): void;
}

interface Observation {
  identity: ClientIdentity;
  host: string;
  path: string;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function sendText(res: http.ServerResponse, status: number, body: string): void {
  res.writeHead(status, { "Content-Type": "text/plain; charset=utf-8" });
  res.end(body);
}

export function formatIdentitySummary(obs: Observation): string {
  return (
    `Your IP: ${obs.identity.clientIp}\n` +
    `Country: ${obs.identity.country}\n` +
    `Host: ${obs.host}\n` +
    `Path: ${obs.path}\n`
  );
}

/**
 * A response written straight onto an upgrade socket that Node has already
 * handed over. The socket is closed once the response is flushed.
 */
export function responseOnSocket(req: http.IncomingMessage, socket: net.Socket): http.ServerResponse {
  const res = new http.ServerResponse(req);
  res.shouldKeepAlive = false;
  res.assignSocket(socket);
  res.on("finish", () => {
    res.detachSocket(socket);
    socket.end();
  });
  return res;
}

/**
 * Create the dispatcher for every request that is not an API call.
 *
 * Each request is recorded first, then routed by Host: unrouted hosts get
 * the dashboard or an identity summary, routed hosts are forwarded or
 * tunneled.
 */
export function createProxyHandler(deps: ProxyDeps): ProxyHandler {
  function observe(req: http.IncomingMessage): Observation {
    const identity = extractClientIdentity(req.headers, req.socket.remoteAddress);
    const obs: Observation = {
      identity,
      host: headerValue(req.headers, "host"),
      path: requestPath(req.url),
    };
    const method = req.method ?? "GET";

    deps.recorder
      .record({
        timestamp: new Date(),
        clientIp: identity.clientIp,
        country: identity.country,
        method,
        path: obs.path,
        host: obs.host,
        userAgent: headerValue(req.headers, "user-agent"),
        referer: headerValue(req.headers, "referer"),
        source: "proxy",
      })
      .catch((err: unknown) => {
        console.error("Failed to record connection:", describe(err));
      });

    console.log(`${identity.clientIp} (${identity.country}) -> ${obs.host} ${method} ${obs.path}`);
    return obs;
  }

  function serveUnrouted(
    req: http.IncomingMessage,
    res: http.ServerResponse,
    obs: Observation,
  ): void {
    if (deps.dashboard.matches(obs.path)) {
      deps.dashboard.handle(req, res);
    } else {
      sendText(res, 200, formatIdentitySummary(obs));
    }
  }

  /**
   * A websocket request whose connection cannot be taken over: the backend
   * is still dialed so an unreachable backend reports 502, then dropped.
   */
  async function refuseTakeover(route: RouteEntry, res: http.ServerResponse): Promise<void> {
    let backend: net.Socket;
    try {
      backend = await dialBackend(route);
    } catch (err: unknown) {
      console.error(`Backend dial failed for ${route.host}:`, describe(err));
      sendText(res, 502, "Backend connection failed\n");
      return;
    }
    backend.destroy();
    sendText(res, 500, "Hijacking not supported\n");
  }

  async function tunnel(
    req: http.IncomingMessage,
    client: net.Socket,
    head: Buffer,
    route: RouteEntry,
  ): Promise<void> {
    let backend: net.Socket;
    try {
      backend = await dialBackend(route);
    } catch (err: unknown) {
      console.error(`Backend dial failed for ${route.host}:`, describe(err));
      sendText(responseOnSocket(req, client), 502, "Backend connection failed\n");
      return;
    }

    backend.write(serializeRequestHead(req));
    if (head.length > 0) backend.write(head);

    const result = await relayDuplex(client, backend);
    if (result.error) {
      console.warn(`Tunnel to ${route.host} ended by ${result.closedBy}:`, result.error.message);
    }
  }

  function handleRequest(req: http.IncomingMessage, res: http.ServerResponse): void {
    const obs = observe(req);
    const route = deps.routes.lookup(obs.host);
    if (!route) {
      serveUnrouted(req, res, obs);
      return;
    }

    if (isWebSocketUpgrade(req.headers)) {
      refuseTakeover(route, res).catch((err: unknown) => {
        console.error("Takeover refusal failed:", describe(err));
      });
      return;
    }

    forwardRequest(req, res, route, {
      agent: deps.agents.agentFor(route),
      clientAddress: req.socket.remoteAddress ? stripPort(req.socket.remoteAddress) : undefined,
    });
  }

  function handleUpgrade(req: http.IncomingMessage, socket: Duplex, head: Buffer): void {
    socket.on("error", (err) => {
      console.warn("Client socket error:", err.message);
    });

    const obs = observe(req);

    if (!(socket instanceof net.Socket)) {
      socket.end("HTTP/1.1 500 Internal Server Error\r\nConnection: close\r\n\r\n");
      return;
    }

    const route = deps.routes.lookup(obs.host);
    if (route && isWebSocketUpgrade(req.headers)) {
      tunnel(req, socket, head, route).catch((err: unknown) => {
        console.error(`Tunnel to ${route.host} failed:`, describe(err));
        socket.destroy();
      });
      return;
    }

    const res = responseOnSocket(req, socket);
    if (!route) {
      serveUnrouted(req, res, obs);
      return;
    }

    // Some other protocol upgrade: forwarded as a plain request.
    forwardRequest(req, res, route, {
      agent: deps.agents.agentFor(route),
      clientAddress: socket.remoteAddress ? stripPort(socket.remoteAddress) : undefined,
      body: head,
    });
  }

  return { handleRequest, handleUpgrade };
}
