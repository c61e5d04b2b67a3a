import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import http from "node:http";
import https from "node:https";
import net from "node:net";
import { tmpdir } from "node:os";
import path from "node:path";

import type { ConnectionSink } from "../../src/server/proxy.js";
import type { ConnectionInput } from "../../src/types.js";

// --- Listening helpers ---

export function listen(server: net.Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(0, "127.0.0.1", () => {
      const addr = server.address();
      if (addr && typeof addr === "object") resolve(addr.port);
      else reject(new Error("server has no TCP address"));
    });
  });
}

export function close(server: net.Server): Promise<void> {
  return new Promise((resolve) => {
    server.close(() => resolve());
    if (server instanceof http.Server || server instanceof https.Server) {
      server.closeAllConnections();
    }
  });
}

/** A port nothing listens on: bound, read, released. */
export async function unusedPort(): Promise<number> {
  const server = net.createServer();
  const port = await listen(server);
  await close(server);
  return port;
}

export function makeTempDir(prefix: string): string {
  return mkdtempSync(path.join(tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

// --- Backends ---

/** Self-signed key pair for `localhost` / 127.0.0.1; no client trusts it. */
export function selfSignedCredentials(): { key: Buffer; cert: Buffer } {
  return {
    key: readFileSync(new URL("../fixtures/tls/key.pem", import.meta.url)),
    cert: readFileSync(new URL("../fixtures/tls/cert.pem", import.meta.url)),
  };
}

export interface BackendRequest {
  method: string;
  url: string;
  headers: http.IncomingHttpHeaders;
  body: string;
}

/** A real HTTP server standing in for a routed backend. */
export function createBackendServer(response: {
  status?: number;
  headers?: Record<string, string>;
  body?: string;
} = {}): { server: http.Server; requests: BackendRequest[] } {
  const requests: BackendRequest[] = [];
  const server = http.createServer((req, res) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => {
      requests.push({
        method: req.method ?? "",
        url: req.url ?? "",
        headers: req.headers,
        body: Buffer.concat(chunks).toString("utf8"),
      });
      res.writeHead(response.status ?? 200, {
        "content-type": "text/plain",
        ...response.headers,
      });
      res.end(response.body ?? "backend ok");
    });
  });
  return { server, requests };
}

/**
 * A raw TCP backend that answers any request head with 101 Switching
 * Protocols and then echoes every byte back.
 */
export function createEchoUpgradeBackend(): { server: net.Server; heads: string[] } {
  const heads: string[] = [];
  const server = net.createServer((socket) => {
    let buffered = Buffer.alloc(0);
    let upgraded = false;
    socket.on("error", () => socket.destroy());
    socket.on("data", (chunk: Buffer) => {
      if (upgraded) {
        socket.write(chunk);
        return;
      }
      buffered = Buffer.concat([buffered, chunk]);
      const end = buffered.indexOf("\r\n\r\n");
      if (end === -1) return;
      heads.push(buffered.subarray(0, end + 4).toString("latin1"));
      upgraded = true;
      socket.write(
        "HTTP/1.1 101 Switching Protocols\r\nUpgrade: websocket\r\nConnection: Upgrade\r\n\r\n",
      );
      const rest = buffered.subarray(end + 4);
      if (rest.length > 0) socket.write(rest);
    });
  });
  return { server, heads };
}

// --- Client ---

export interface ClientResponse {
  status: number;
  headers: http.IncomingHttpHeaders;
  body: string;
}

export function request(
  port: number,
  opts: { method?: string; path?: string; headers?: Record<string, string>; body?: string } = {},
): Promise<ClientResponse> {
  return new Promise((resolve, reject) => {
    const req = http.request(
      {
        host: "127.0.0.1",
        port,
        method: opts.method ?? "GET",
        path: opts.path ?? "/",
        headers: opts.headers,
        agent: false,
      },
      (res) => {
        const chunks: Buffer[] = [];
        res.on("data", (chunk: Buffer) => chunks.push(chunk));
        res.on("end", () =>
          resolve({
            status: res.statusCode ?? 0,
            headers: res.headers,
            body: Buffer.concat(chunks).toString("utf8"),
          }),
        );
        res.on("error", reject);
      },
    );
    req.on("error", reject);
    req.end(opts.body);
  });
}

/**
 * Send an upgrade request and resolve with the taken-over socket once the
 * server answers 101.
 */
export function upgrade(
  port: number,
  opts: { path?: string; headers?: Record<string, string> } = {},
): Promise<{ socket: net.Socket; response: http.IncomingMessage }> {
  return new Promise((resolve, reject) => {
    const req = http.request({
      host: "127.0.0.1",
      port,
      path: opts.path ?? "/",
      headers: {
        Connection: "Upgrade",
        Upgrade: "websocket",
        ...opts.headers,
      },
      agent: false,
    });
    req.on("upgrade", (response, socket) => resolve({ socket, response }));
    req.on("response", (response) =>
      reject(new Error(`expected an upgrade, got ${response.statusCode}`)),
    );
    req.on("error", reject);
    req.end();
  });
}

/** Read from a socket until `expected` bytes have arrived. */
export function readBytes(socket: net.Socket, expected: number): Promise<string> {
  return new Promise((resolve, reject) => {
    let received = Buffer.alloc(0);
    const onData = (chunk: Buffer): void => {
      received = Buffer.concat([received, chunk]);
      if (received.length >= expected) {
        socket.off("data", onData);
        resolve(received.toString("utf8"));
      }
    };
    socket.on("data", onData);
    socket.once("error", reject);
  });
}

// --- Recording ---

/** Keeps records in memory; optionally fails every write. */
export class MemorySink implements ConnectionSink {
  readonly records: ConnectionInput[] = [];
  failWith: Error | null = null;

  async record(input: ConnectionInput): Promise<ConnectionInput> {
    if (this.failWith) throw this.failWith;
    this.records.push(input);
    return input;
  }
}
