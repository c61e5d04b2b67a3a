import readline from "node:readline";
import type { Readable } from "node:stream";

import type { ConnectionSink } from "../server/proxy.js";
import { formatTimestamp } from "../server/store.js";
import { classifyLine, parseLine, type SkipReason } from "./parse.js";

/** Lines longer than this are dropped unparsed. */
export const MAX_LINE_BYTES = 1024 * 1024;

export interface IngestSummary {
  /** Non-empty lines read. */
  lines: number;
  recorded: number;
  skipped: number;
  failed: number;
}

export type LineOutcome = "empty" | "recorded" | "skipped" | "failed";

export interface IngesterOptions {
  recorder: ConnectionSink;
  verbose?: boolean;
  /** Clock for lines without a usable timestamp. */
  now?: () => Date;
}

function preview(line: string): string {
  return line.length > 200 ? `${line.slice(0, 200)}…` : line;
}

/**
 * Turns a tunnel daemon's log stream into connection records.
 *
 * Lines are handled one at a time, in order; a bad line is counted and
 * skipped, never fatal.
 */
export class LogIngester {
  private readonly recorder: ConnectionSink;
  private readonly verbose: boolean;
  private readonly now: () => Date;

  constructor(opts: IngesterOptions) {
    this.recorder = opts.recorder;
    this.verbose = opts.verbose ?? false;
    this.now = opts.now ?? (() => new Date());
  }

  private skip(reason: SkipReason, detail: string, line: string): LineOutcome {
    if (this.verbose) {
      console.log(`Skipping line (${reason}: ${detail}): ${preview(line)}`);
    }
    return "skipped";
  }

  async ingestLine(line: string): Promise<LineOutcome> {
    if (line.trim() === "") return "empty";
    if (Buffer.byteLength(line, "utf8") > MAX_LINE_BYTES) {
      return this.skip("too-long", `over ${MAX_LINE_BYTES} bytes`, line);
    }

    const event = parseLine(line);
    if (!event) {
      return this.skip("unparseable", "no parser matched", line);
    }

    const classified = classifyLine(event, line, this.now());
    if (classified.kind === "skip") {
      return this.skip(classified.reason, classified.detail, line);
    }

    const input = classified.input;
    try {
      await this.recorder.record(input);
    } catch (err: unknown) {
      console.error(
        "Failed to insert:",
        err instanceof Error ? err.message : String(err),
      );
      return "failed";
    }
    console.log(
      `Logged: ${formatTimestamp(input.timestamp)} | ${input.clientIp} | ${input.method} ${input.path} | ${input.host}`,
    );
    return "recorded";
  }

  /** Read `input` to EOF. */
  async ingest(input: Readable): Promise<IngestSummary> {
    const summary: IngestSummary = { lines: 0, recorded: 0, skipped: 0, failed: 0 };
    const rl = readline.createInterface({ input, crlfDelay: Infinity });

    for await (const line of rl) {
      const outcome = await this.ingestLine(line);
      if (outcome === "empty") continue;
      summary.lines++;
      summary[outcome]++;
    }
    return summary;
  }
}
