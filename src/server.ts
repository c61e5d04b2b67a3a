#!/usr/bin/env node

/**
 * conn-ledger server.
 *
 * One listener: the read API under its prefix, everything else proxied by
 * Host header (or answered with the dashboard / identity summary), and every
 * request recorded.
 */

import { createAppServer } from "./server/app.js";
import { loadServerConfig } from "./server/config.js";
import { closeAppContext, createAppContext } from "./server/context.js";

async function main(): Promise<void> {
  const config = loadServerConfig();
  const ctx = await createAppContext(config);
  const server = createAppServer(ctx);

  server.on("error", (err: NodeJS.ErrnoException) => {
    console.error(`Server error: ${err.message}`);
    if (err.code === "EADDRINUSE") {
      console.error(`Port ${config.port} is already in use`);
    }
    process.exit(1);
  });

  server.listen(config.port, config.bindHost, () => {
    console.log(`🌐 conn-ledger listening on http://${config.bindHost}:${config.port}`);
    console.log(`💾 Database → ${ctx.recorder.dbPath}`);
    console.log(`📝 Log → ${ctx.recorder.logPath}`);
    console.log(`🔎 API → ${config.apiPrefix}`);
    if (ctx.routes.size === 0) {
      console.log("No routes configured, serving API and dashboard only");
    }
    for (const route of ctx.routes.entries()) {
      console.log(`  ${route.host} -> ${route.backendUrl} (skipTls: ${route.skipTlsVerify})`);
    }
  });

  // --- Graceful shutdown ---

  let shuttingDown = false;

  function shutdown(): void {
    if (shuttingDown) return;
    shuttingDown = true;

    server.close();
    closeAppContext(ctx).catch((err: unknown) => {
      console.error(
        "Shutdown error:",
        err instanceof Error ? err.message : String(err),
      );
    });

    // server.close() waits for open connections (tunnels included) to
    // drain; give in-flight work a moment, then leave.
    setTimeout(() => process.exit(0), 500);
  }

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  console.error("Fatal:", err instanceof Error ? err.message : String(err));
  process.exit(1);
});
