import assert from "node:assert/strict";
import http from "node:http";
import https from "node:https";
import { afterEach, describe, it } from "node:test";

import {
  buildForwardHeaders,
  forwardRequest,
  joinPaths,
  resolveTargetPath,
  RouteAgents,
  serverNameFor,
} from "../src/proxy/forward.js";
import { buildRouteTable } from "../src/proxy/routing.js";
import type { RouteEntry } from "../src/types.js";
import {
  close,
  createBackendServer,
  listen,
  request,
  selfSignedCredentials,
  unusedPort,
} from "./helpers/servers.js";

function routeTo(backend: string, skipTlsVerify = false): RouteEntry {
  const { table } = buildRouteTable([
    { host: "svc.example.com", backend, no_tls_verify: skipTlsVerify },
  ]);
  const route = table.lookup("svc.example.com");
  assert.ok(route);
  return route;
}

describe("proxy/forward", () => {
  describe("buildForwardHeaders", () => {
    it("drops hop-by-hop headers and keeps Host", () => {
      const headers = buildForwardHeaders({
        host: "svc.example.com",
        connection: "keep-alive, x-session-hint",
        "keep-alive": "timeout=5",
        upgrade: "h2c",
        te: "trailers",
        "x-session-hint": "abc",
        "transfer-encoding": "chunked",
        accept: "*/*",
      });
      assert.deepEqual(headers, {
        host: "svc.example.com",
        "transfer-encoding": "chunked",
        accept: "*/*",
      });
    });

    it("appends the client to X-Forwarded-For", () => {
      assert.equal(
        buildForwardHeaders({}, { clientAddress: "192.0.2.10" })["x-forwarded-for"],
        "192.0.2.10",
      );
      assert.equal(
        buildForwardHeaders(
          { "x-forwarded-for": "203.0.113.7" },
          { clientAddress: "192.0.2.10" },
        )["x-forwarded-for"],
        "203.0.113.7, 192.0.2.10",
      );
    });

    it("replaces chunked encoding with a length for buffered bodies", () => {
      const headers = buildForwardHeaders(
        { "transfer-encoding": "chunked" },
        { bodyLength: 12 },
      );
      assert.deepEqual(headers, { "content-length": "12" });
    });
  });

  describe("target paths", () => {
    it("joins with exactly one slash", () => {
      assert.equal(joinPaths("/", "/widgets"), "/widgets");
      assert.equal(joinPaths("/base/", "/widgets"), "/base/widgets");
      assert.equal(joinPaths("/base", "widgets"), "/base/widgets");
      assert.equal(joinPaths("/base", "/widgets"), "/base/widgets");
    });

    it("combines backend and request queries", () => {
      assert.equal(
        resolveTargetPath(new URL("http://h/api?key=1"), "/items?page=2"),
        "/api/items?key=1&page=2",
      );
      assert.equal(resolveTargetPath(new URL("http://h"), "/items?page=2"), "/items?page=2");
      assert.equal(resolveTargetPath(new URL("http://h"), "http://svc/x"), "/x");
      assert.equal(resolveTargetPath(new URL("http://h/base"), "/"), "/base/");
    });

    it("sends no server name for IP literals", () => {
      assert.equal(serverNameFor("10.0.0.5"), "");
      assert.equal(serverNameFor("[::1]"), "");
      assert.equal(serverNameFor("nas.internal"), "nas.internal");
    });
  });

  describe("RouteAgents", () => {
    it("keeps one agent per route", () => {
      const agents = new RouteAgents();
      const route = routeTo("http://127.0.0.1:3000");
      assert.equal(agents.agentFor(route), agents.agentFor(route));
      agents.destroy();
    });

    it("skips certificate checks only for routes that ask for it", () => {
      const agents = new RouteAgents();
      const lax = agents.agentFor(routeTo("https://10.0.0.5", true));
      assert.ok(lax instanceof https.Agent);
      assert.equal(lax.options.rejectUnauthorized, false);

      const strict = new RouteAgents().agentFor(routeTo("https://10.0.0.5"));
      assert.ok(strict instanceof https.Agent);
      assert.equal(strict.options.rejectUnauthorized, true);
      agents.destroy();
    });
  });

  describe("forwardRequest", () => {
    const servers: http.Server[] = [];
    const agents = new RouteAgents();

    afterEach(async () => {
      agents.destroy();
      await Promise.all(servers.splice(0).map(close));
    });

    async function startFront(route: RouteEntry): Promise<number> {
      const front = http.createServer((req, res) => {
        forwardRequest(req, res, route, {
          agent: agents.agentFor(route),
          clientAddress: "192.0.2.10",
        });
      });
      servers.push(front);
      return listen(front);
    }

    it("streams the request to the backend with the virtual host intact", async () => {
      const backend = createBackendServer({
        status: 201,
        headers: { "x-backend": "yes" },
        body: "created",
      });
      servers.push(backend.server);
      const backendPort = await listen(backend.server);
      const frontPort = await startFront(routeTo(`http://127.0.0.1:${backendPort}/base`));

      const res = await request(frontPort, {
        method: "POST",
        path: "/widgets?color=red",
        headers: { Host: "svc.example.com", "Content-Type": "text/plain" },
        body: "payload",
      });

      assert.equal(res.status, 201);
      assert.equal(res.body, "created");
      assert.equal(res.headers["x-backend"], "yes");

      assert.equal(backend.requests.length, 1);
      const seen = backend.requests[0];
      assert.equal(seen.method, "POST");
      assert.equal(seen.url, "/base/widgets?color=red");
      assert.equal(seen.headers.host, "svc.example.com");
      assert.equal(seen.headers["x-forwarded-for"], "192.0.2.10");
      assert.equal(seen.body, "payload");
    });

    function startTlsBackend(): Promise<number> {
      const backend = https.createServer(selfSignedCredentials(), (req, res) => {
        res.writeHead(200, { "content-type": "text/plain" });
        res.end(`tls ok for ${req.headers.host ?? ""}`);
      });
      servers.push(backend);
      return listen(backend);
    }

    it("forwards to an https backend with an unverifiable certificate when told to", async () => {
      const backendPort = await startTlsBackend();
      const frontPort = await startFront(routeTo(`https://127.0.0.1:${backendPort}`, true));

      const res = await request(frontPort, { headers: { Host: "svc.example.com" } });
      assert.equal(res.status, 200);
      assert.equal(res.body, "tls ok for svc.example.com");
    });

    it("answers 502 when an https backend's certificate does not verify", async () => {
      const backendPort = await startTlsBackend();
      const frontPort = await startFront(routeTo(`https://127.0.0.1:${backendPort}`));

      const res = await request(frontPort, { headers: { Host: "svc.example.com" } });
      assert.equal(res.status, 502);
      const body: unknown = JSON.parse(res.body);
      assert.ok(body && typeof body === "object" && "error" in body);
      assert.equal(body.error, "Proxy error");
    });

    it("answers 502 JSON when the backend is unreachable", async () => {
      const deadPort = await unusedPort();
      const frontPort = await startFront(routeTo(`http://127.0.0.1:${deadPort}`));

      const res = await request(frontPort, { headers: { Host: "svc.example.com" } });
      assert.equal(res.status, 502);
      assert.equal(res.headers["content-type"], "application/json");
      const body: unknown = JSON.parse(res.body);
      assert.ok(body && typeof body === "object" && "error" in body && "details" in body);
      assert.equal(body.error, "Proxy error");
      assert.match(String(body.details), /ECONNREFUSED/);
    });
  });
});
