import type { HttpBindings } from "@hono/node-server";
import { Hono } from "hono";

import { extractClientIdentity } from "../http/headers.js";
import type { RouteTable } from "../proxy/routing.js";
import type { ConnectionFilter } from "../types.js";
import type { ConnectionSink } from "./proxy.js";
import { parseLimit, parseOffset, type QueryService } from "./queries.js";

export interface ApiDeps {
  /** Mount point, e.g. `/api`. */
  prefix: string;
  queries: QueryService;
  routes: RouteTable;
  recorder: ConnectionSink;
}

export type ApiApp = Hono<{ Bindings: HttpBindings }>;

/**
 * Create the Hono app with all read API routes, mounted under `prefix`.
 */
export function createApiApp(deps: ApiDeps): ApiApp {
  const app = new Hono<{ Bindings: HttpBindings }>().basePath(deps.prefix);

  // --- Every API call is itself a recorded connection ---

  app.use("*", async (c, next) => {
    const headers = c.req.header();
    // `incoming` is absent when the app is driven through app.request().
    const identity = extractClientIdentity(
      headers,
      c.env?.incoming?.socket.remoteAddress,
    );
    deps.recorder
      .record({
        timestamp: new Date(),
        clientIp: identity.clientIp,
        country: identity.country,
        method: c.req.method,
        path: c.req.path,
        host: headers.host ?? "",
        userAgent: headers["user-agent"] ?? "",
        referer: headers.referer ?? "",
        source: "proxy",
      })
      .catch((err: unknown) => {
        console.error(
          "Failed to record API call:",
          err instanceof Error ? err.message : String(err),
        );
      });
    await next();
  });

  // --- Connections ---

  app.get("/connections", (c) => {
    const filter: ConnectionFilter = {
      ip: c.req.query("ip") || undefined,
      country: c.req.query("country") || undefined,
      host: c.req.query("host") || undefined,
      since: c.req.query("since") || undefined,
      limit: parseLimit(c.req.query("limit")),
      offset: parseOffset(c.req.query("offset")),
    };
    return c.json(deps.queries.listConnections(filter));
  });

  app.all("/connections", (c) => c.text("Method not allowed", 405));

  // --- Stats ---

  app.get("/stats", (c) => {
    return c.json(deps.queries.stats(c.req.query("since") || undefined));
  });

  app.all("/stats", (c) => c.text("Method not allowed", 405));

  app.get("/stats/ip/:ip", (c) => {
    const ip = c.req.param("ip");
    const detail = deps.queries.clientDetail(ip);
    if (!detail) {
      return c.json({ error: "IP not found" }, 404);
    }
    return c.json(detail);
  });

  app.get("/stats/ip", (c) => c.json({ error: "IP required" }, 400));
  app.get("/stats/ip/", (c) => c.json({ error: "IP required" }, 400));

  // --- Service ---

  app.get("/health", (c) => c.json({ status: "ok" }));

  app.get("/config", (c) => c.json(deps.routes.listAll()));

  app.onError((err, c) => {
    console.error("API error:", err.message);
    return c.json({ error: err.message }, 500);
  });

  return app;
}
