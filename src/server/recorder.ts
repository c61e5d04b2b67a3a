import fs from "node:fs";
import fsp from "node:fs/promises";
import path from "node:path";

import type { ConnectionInput, ConnectionRecord } from "../types.js";
import { ConnectionStore, formatTimestamp, type ConnectionReader } from "./store.js";

export const DB_FILENAME = "connections.db";
export const LOG_FILENAME = "connections.log";

export type RecordSink = "store" | "log";

export interface SinkFailure {
  sink: RecordSink;
  error: unknown;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** One or both sinks rejected a record. The other sink was still attempted. */
export class RecordWriteError extends Error {
  readonly failures: SinkFailure[];

  constructor(failures: SinkFailure[]) {
    super(
      `record write failed (${failures
        .map((f) => `${f.sink}: ${describe(f.error)}`)
        .join("; ")})`,
    );
    this.name = "RecordWriteError";
    this.failures = failures;
  }

  get sinks(): RecordSink[] {
    return this.failures.map((f) => f.sink);
  }
}

/** `timestamp | client_ip | country | method path | host | user_agent` */
export function formatLogLine(input: ConnectionInput): string {
  return [
    formatTimestamp(input.timestamp),
    input.clientIp,
    input.country,
    `${input.method} ${input.path}`,
    input.host,
    input.userAgent,
  ].join(" | ");
}

export interface RecorderOptions {
  dataDir: string;
}

/**
 * Writes every observed connection to the SQLite store and the append-only
 * text log.
 *
 * The two writes are not atomic. The store is written first, synchronously,
 * then the log line is queued; both are always attempted and any failure
 * rejects `record()` with a RecordWriteError naming the sinks that failed.
 */
export class ConnectionRecorder {
  private readonly store: ConnectionStore;
  private readonly log: fsp.FileHandle;
  // Serializes appends so concurrent callers never interleave partial lines.
  private writeQueue: Promise<void> = Promise.resolve();
  private closed = false;

  readonly dbPath: string;
  readonly logPath: string;

  private constructor(
    store: ConnectionStore,
    log: fsp.FileHandle,
    dbPath: string,
    logPath: string,
  ) {
    this.store = store;
    this.log = log;
    this.dbPath = dbPath;
    this.logPath = logPath;
  }

  static async open(options: RecorderOptions): Promise<ConnectionRecorder> {
    fs.mkdirSync(options.dataDir, { recursive: true });
    const dbPath = path.join(options.dataDir, DB_FILENAME);
    const logPath = path.join(options.dataDir, LOG_FILENAME);

    const store = new ConnectionStore(dbPath);
    let log: fsp.FileHandle;
    try {
      log = await fsp.open(logPath, "a");
    } catch (err: unknown) {
      store.close();
      throw err;
    }
    return new ConnectionRecorder(store, log, dbPath, logPath);
  }

  /** Read-only view for the query layer. */
  get reader(): ConnectionReader {
    return this.store;
  }

  /**
   * Persist one observation.
   *
   * The store insert happens before this returns; the log append completes
   * when the promise settles.
   */
  async record(input: ConnectionInput): Promise<ConnectionRecord> {
    if (this.closed) {
      throw new Error("recorder is closed");
    }

    const failures: SinkFailure[] = [];
    let id = 0;
    try {
      id = this.store.insert(input);
    } catch (err: unknown) {
      failures.push({ sink: "store", error: err });
    }

    try {
      await this.append(formatLogLine(input));
    } catch (err: unknown) {
      failures.push({ sink: "log", error: err });
    }

    if (failures.length > 0) {
      throw new RecordWriteError(failures);
    }

    return {
      id,
      timestamp: formatTimestamp(input.timestamp),
      client_ip: input.clientIp,
      country: input.country,
      method: input.method,
      path: input.path,
      host: input.host,
      user_agent: input.userAgent,
      referer: input.referer,
      source: input.source,
    };
  }

  private append(line: string): Promise<void> {
    const write = this.writeQueue.then(() => this.log.appendFile(`${line}\n`));
    // The caller sees the rejection through `write`; the queue itself keeps going.
    this.writeQueue = write.then(
      () => undefined,
      () => undefined,
    );
    return write;
  }

  /** Wait for queued appends, then close the log file and the database. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.writeQueue;
    await this.log.close();
    this.store.close();
  }
}
