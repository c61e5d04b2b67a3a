/**
 * Raw byte tunnel between a taken-over client socket and a backend.
 *
 * Used for WebSocket upgrades: the client's request head is replayed on a
 * fresh backend connection and from then on bytes are copied both ways
 * without interpretation.
 */

import type http from "node:http";
import net from "node:net";
import type { Duplex } from "node:stream";
import { pipeline } from "node:stream/promises";
import tls from "node:tls";

import type { RouteEntry } from "../types.js";
import { defaultPort, serverNameFor } from "./forward.js";

/**
 * Open a transport connection to the route's backend.
 *
 * `http:`/`ws:` dial plain TCP, `https:`/`wss:` dial TLS. Resolves once the
 * connection (and handshake) is established.
 */
export function dialBackend(route: RouteEntry): Promise<net.Socket> {
  const backend = route.backend;
  const host = backend.hostname.replace(/^\[|\]$/g, "");
  const port = backend.port ? Number(backend.port) : defaultPort(backend);
  const secure = backend.protocol === "https:" || backend.protocol === "wss:";

  return new Promise((resolve, reject) => {
    let socket: net.Socket;
    if (secure) {
      const servername = serverNameFor(backend.hostname);
      socket = tls.connect({
        host,
        port,
        rejectUnauthorized: !route.skipTlsVerify,
        ...(servername ? { servername } : {}),
      });
    } else {
      socket = net.connect({ host, port });
    }

    const onError = (err: Error): void => {
      socket.destroy();
      reject(err);
    };
    socket.once("error", onError);
    socket.once(secure ? "secureConnect" : "connect", () => {
      socket.off("error", onError);
      resolve(socket);
    });
  });
}

/** Request target in origin form (`/path?query`). */
function originForm(rawUrl: string | undefined): string {
  let target = rawUrl || "/";
  const scheme = target.match(/^[a-zA-Z][a-zA-Z0-9+.-]*:\/\/[^/?#]*/);
  if (scheme) target = target.slice(scheme[0].length);
  if (!target.startsWith("/")) target = `/${target}`;
  return target;
}

/**
 * Rebuild the client's request head for the backend: request line, headers
 * exactly as received (Host included), blank line.
 */
export function serializeRequestHead(req: http.IncomingMessage): Buffer {
  const lines = [`${req.method ?? "GET"} ${originForm(req.url)} HTTP/1.1`];
  for (let i = 0; i + 1 < req.rawHeaders.length; i += 2) {
    lines.push(`${req.rawHeaders[i]}: ${req.rawHeaders[i + 1]}`);
  }
  // Node decodes header bytes as latin1; encode the same way to keep them intact.
  return Buffer.from(`${lines.join("\r\n")}\r\n\r\n`, "latin1");
}

export type RelaySide = "client" | "backend";

export interface RelayResult {
  /** Side whose read loop finished first. */
  closedBy: RelaySide;
  error: Error | null;
}

async function copy(from: Duplex, to: Duplex, side: RelaySide): Promise<RelayResult> {
  try {
    await pipeline(from, to);
    return { closedBy: side, error: null };
  } catch (err: unknown) {
    return {
      closedBy: side,
      error: err instanceof Error ? err : new Error(String(err)),
    };
  }
}

/**
 * Copy bytes in both directions until either side finishes.
 *
 * The first loop to end (EOF or error) tears down both sockets; the result
 * describes that loop. Resolves after both loops have stopped.
 */
export async function relayDuplex(client: Duplex, backend: Duplex): Promise<RelayResult> {
  const upstream = copy(client, backend, "client");
  const downstream = copy(backend, client, "backend");

  const first = await Promise.race([upstream, downstream]);
  client.destroy();
  backend.destroy();
  await Promise.all([upstream, downstream]);
  return first;
}
