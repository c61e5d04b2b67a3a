#!/usr/bin/env node

import fsp from "node:fs/promises";
import type { Readable } from "node:stream";

import { formatIngestHelpText, parseIngestArgs } from "./cli-utils.js";
import { LogIngester } from "./ingest/ingester.js";
import { ConnectionRecorder } from "./server/recorder.js";

async function main(): Promise<number> {
  const parsedArgs = parseIngestArgs(process.argv.slice(2));
  if (parsedArgs.error) {
    console.error(parsedArgs.error);
    return 1;
  }
  if (parsedArgs.showHelp) {
    console.log(formatIngestHelpText());
    return 0;
  }

  let input: Readable;
  if (parsedArgs.file) {
    // Opened up front so a missing file fails here, not mid-stream.
    const handle = await fsp.open(parsedArgs.file, "r");
    input = handle.createReadStream({ encoding: "utf8" });
    console.log(`Reading from file: ${parsedArgs.file}`);
  } else {
    input = process.stdin;
    console.log("Reading from stdin...");
  }
  const recorder = await ConnectionRecorder.open({ dataDir: parsedArgs.dataDir });
  console.log(`💾 Database → ${recorder.dbPath}`);

  const ingester = new LogIngester({ recorder, verbose: parsedArgs.verbose });
  try {
    const summary = await ingester.ingest(input);
    console.log(
      `Done: ${summary.lines} lines, ${summary.recorded} recorded, ${summary.skipped} skipped, ${summary.failed} failed`,
    );
  } finally {
    await recorder.close();
  }
  return 0;
}

main().then(
  (exitCode) => process.exit(exitCode),
  (err: unknown) => {
    console.error("Fatal:", err instanceof Error ? err.message : String(err));
    process.exit(1);
  },
);
