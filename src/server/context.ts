import { loadRouteConfig } from "../proxy/config.js";
import { RouteAgents } from "../proxy/forward.js";
import { buildRouteTable, RouteTable } from "../proxy/routing.js";
import type { ServerConfig } from "./config.js";
import { QueryService } from "./queries.js";
import { ConnectionRecorder } from "./recorder.js";
import { createDashboardHandler, type DashboardHandler } from "./static.js";

/** Everything a handler needs, built once at startup. */
export interface AppContext {
  config: ServerConfig;
  routes: RouteTable;
  recorder: ConnectionRecorder;
  queries: QueryService;
  dashboard: DashboardHandler;
  agents: RouteAgents;
}

/**
 * Load the route table. Problems with the file only cost routes: the server
 * still answers the read API and the dashboard.
 */
export function loadRoutes(file: string): RouteTable {
  const loaded = loadRouteConfig(file);
  if (!loaded.ok) {
    console.warn(`⚠️  No routes loaded: ${loaded.reason}`);
    return RouteTable.empty();
  }
  for (const bad of loaded.invalid) {
    console.warn(`⚠️  Skipping route entry #${bad.index}: ${bad.reason}`);
  }

  const { table, skipped, duplicates } = buildRouteTable(loaded.entries);
  for (const s of skipped) {
    console.warn(`⚠️  Skipping route ${s.host} -> ${s.backend}: ${s.reason}`);
  }
  for (const host of duplicates) {
    console.warn(`⚠️  Route for ${host} configured more than once, last entry wins`);
  }
  return table;
}

export async function createAppContext(config: ServerConfig): Promise<AppContext> {
  const recorder = await ConnectionRecorder.open({ dataDir: config.dataDir });
  return {
    config,
    routes: loadRoutes(config.routeConfigFile),
    recorder,
    queries: new QueryService(recorder.reader),
    dashboard: createDashboardHandler({
      dir: config.dashboardDir,
      apiPrefix: config.apiPrefix,
    }),
    agents: new RouteAgents(),
  };
}

/** Release the context's resources. Pending log appends are flushed first. */
export async function closeAppContext(ctx: AppContext): Promise<void> {
  ctx.agents.destroy();
  await ctx.recorder.close();
}
