import http from "node:http";
import net from "node:net";
import { getRequestListener } from "@hono/node-server";

import { requestPath } from "../http/headers.js";
import { createApiApp } from "./api.js";
import type { AppContext } from "./context.js";
import { createProxyHandler, responseOnSocket } from "./proxy.js";

/** True when a request path falls under the API mount point. */
export function isApiPath(reqPath: string, prefix: string): boolean {
  return reqPath === prefix || reqPath.startsWith(`${prefix}/`);
}

/**
 * Create the single HTTP entry point.
 *
 * API paths go to the Hono app and take priority over proxy routes, upgrade
 * requests included; everything else goes through the proxy dispatcher.
 */
export function createAppServer(ctx: AppContext): http.Server {
  const api = createApiApp({
    prefix: ctx.config.apiPrefix,
    queries: ctx.queries,
    routes: ctx.routes,
    recorder: ctx.recorder,
  });
  const apiListener = getRequestListener(api.fetch);
  const proxy = createProxyHandler({
    routes: ctx.routes,
    recorder: ctx.recorder,
    dashboard: ctx.dashboard,
    agents: ctx.agents,
  });

  function serveApi(req: http.IncomingMessage, res: http.ServerResponse): void {
    apiListener(req, res).catch((err: unknown) => {
      console.error(
        "API listener error:",
        err instanceof Error ? err.message : String(err),
      );
    });
  }

  const server = http.createServer((req, res) => {
    if (isApiPath(requestPath(req.url), ctx.config.apiPrefix)) {
      serveApi(req, res);
      return;
    }
    proxy.handleRequest(req, res);
  });

  server.on("upgrade", (req: http.IncomingMessage, socket, head: Buffer) => {
    if (socket instanceof net.Socket && isApiPath(requestPath(req.url), ctx.config.apiPrefix)) {
      socket.on("error", (err) => {
        console.warn("Client socket error:", err.message);
      });
      // The API never upgrades: answer as a plain request and close.
      serveApi(req, responseOnSocket(req, socket));
      return;
    }
    proxy.handleUpgrade(req, socket, head);
  });

  return server;
}
