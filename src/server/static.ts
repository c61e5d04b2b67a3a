import fs from "node:fs";
import type http from "node:http";
import path from "node:path";

const MIME_TYPES: Record<string, string> = {
  ".html": "text/html",
  ".js": "application/javascript",
  ".css": "text/css",
  ".json": "application/json",
  ".png": "image/png",
  ".svg": "image/svg+xml",
  ".ico": "image/x-icon",
  ".woff": "font/woff",
  ".woff2": "font/woff2",
  ".map": "application/json",
};

const DASHBOARD_PATH = "/dashboard";

export interface DashboardOptions {
  /** Directory holding the dashboard build; null when none is installed. */
  dir: string | null;
  /** Where the read API is mounted, for the notice shown without a dashboard. */
  apiPrefix: string;
}

export interface DashboardHandler {
  /** True for paths the dashboard answers on an unrouted host. */
  matches(reqPath: string): boolean;
  handle(req: http.IncomingMessage, res: http.ServerResponse): void;
}

/**
 * Create the dashboard hand-off.
 *
 * With a directory, `/` and `/dashboard` serve its index.html and
 * `/dashboard/<file>` serves assets, falling back to index.html for unknown
 * paths. Without one, `/` and `/dashboard` get a short plain-text notice.
 */
export function createDashboardHandler(opts: DashboardOptions): DashboardHandler {
  const root = opts.dir ? path.resolve(opts.dir) : null;
  const hasDir = root !== null && fs.existsSync(root);
  if (root && !hasDir) {
    console.warn(`⚠️  Dashboard directory ${root} not found, serving notice only`);
  }

  const notice =
    "Dashboard not installed.\n" +
    `Read API: ${opts.apiPrefix}/connections, ${opts.apiPrefix}/stats, ${opts.apiPrefix}/health\n`;

  function matches(reqPath: string): boolean {
    if (reqPath === "/" || reqPath === DASHBOARD_PATH) return true;
    return hasDir && reqPath.startsWith(`${DASHBOARD_PATH}/`);
  }

  function isFile(filePath: string): boolean {
    try {
      return fs.statSync(filePath).isFile();
    } catch {
      // ENOENT, ENOTDIR (a path through a file), EACCES: nothing to serve.
      return false;
    }
  }

  function sendFile(res: http.ServerResponse, filePath: string): boolean {
    if (!isFile(filePath)) return false;
    const ext = path.extname(filePath).toLowerCase();
    res.writeHead(200, { "Content-Type": MIME_TYPES[ext] || "application/octet-stream" });
    res.end(fs.readFileSync(filePath));
    return true;
  }

  function handle(req: http.IncomingMessage, res: http.ServerResponse): void {
    if (!hasDir || !root) {
      res.writeHead(200, { "Content-Type": "text/plain; charset=utf-8" });
      res.end(notice);
      return;
    }

    const reqPath = req.url?.split("?")[0] || "/";
    let relative = "index.html";
    if (reqPath.startsWith(`${DASHBOARD_PATH}/`)) {
      // Prevent directory traversal
      const normalized = path.posix.normalize(`/${reqPath.slice(DASHBOARD_PATH.length + 1)}`);
      if (normalized !== "/") relative = normalized.slice(1);
    }

    const filePath = path.join(root, relative);
    if (filePath !== root && !filePath.startsWith(root + path.sep)) {
      res.writeHead(403, { "Content-Type": "text/plain" });
      res.end("Forbidden");
      return;
    }

    if (sendFile(res, filePath)) return;

    // SPA fallback: serve index.html for unmatched routes
    if (!sendFile(res, path.join(root, "index.html"))) {
      res.writeHead(404, { "Content-Type": "text/plain" });
      res.end("Not Found");
    }
  }

  return { matches, handle };
}
