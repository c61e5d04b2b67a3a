import assert from "node:assert/strict";
import { readFileSync } from "node:fs";
import path from "node:path";
import { Readable } from "node:stream";
import { afterEach, beforeEach, describe, it } from "node:test";

import { LogIngester, MAX_LINE_BYTES } from "../src/ingest/ingester.js";
import { ConnectionRecorder, LOG_FILENAME } from "../src/server/recorder.js";
import { makeTempDir, MemorySink, removeDir } from "./helpers/servers.js";

const NOW = new Date(Date.UTC(2024, 5, 1, 12, 0, 0));

function lines(...items: string[]): Readable {
  return Readable.from([items.join("\n")]);
}

describe("ingest/ingester", () => {
  let sink: MemorySink;
  let ingester: LogIngester;

  beforeEach(() => {
    sink = new MemorySink();
    ingester = new LogIngester({ recorder: sink, now: () => NOW });
  });

  it("counts recorded and skipped lines, ignoring blank ones", async () => {
    const summary = await ingester.ingest(
      lines(
        '{"time":"2024-01-01T00:00:00Z","clientIP":"1.2.3.4","hostname":"svc.local"}',
        "",
        "   ",
        '{"message":"Registered tunnel connection","ip":"198.51.100.2"}',
        "time=2024-01-01T00:00:05Z ip=5.6.7.8 host=svc.local path=/b method=POST",
        "plain noise",
      ),
    );

    assert.deepEqual(summary, { lines: 4, recorded: 2, skipped: 2, failed: 0 });
    assert.deepEqual(
      sink.records.map((r) => [r.clientIp, r.method, r.path, r.source]),
      [
        ["1.2.3.4", "GET", "", "daemon-log"],
        ["5.6.7.8", "POST", "/b", "daemon-log"],
      ],
    );
  });

  it("handles CRLF line endings", async () => {
    const summary = await ingester.ingest(Readable.from(["ip=1.2.3.4\r\nip=5.6.7.8\r\n"]));
    assert.deepEqual(summary, { lines: 2, recorded: 2, skipped: 0, failed: 0 });
    assert.deepEqual(
      sink.records.map((r) => r.clientIp),
      ["1.2.3.4", "5.6.7.8"],
    );
  });

  it("stamps lines without a time with the clock", async () => {
    await ingester.ingest(lines("ip=1.2.3.4"));
    assert.equal(sink.records[0].timestamp, NOW);
  });

  it("skips over-long lines without parsing them", async () => {
    assert.equal(await ingester.ingestLine(`ip=1.2.3.4 ${"x".repeat(MAX_LINE_BYTES)}`), "skipped");
    assert.equal(sink.records.length, 0);
  });

  it("counts record failures and keeps going", async () => {
    sink.failWith = new Error("database is locked");
    const summary = await ingester.ingest(lines("ip=1.2.3.4", "ip=5.6.7.8"));
    assert.deepEqual(summary, { lines: 2, recorded: 0, skipped: 0, failed: 2 });
  });

  describe("with a real recorder", () => {
    let dir: string;

    beforeEach(() => {
      dir = makeTempDir("conn-ledger-ingest-");
    });

    afterEach(() => {
      removeDir(dir);
    });

    it("writes the store and the log", async () => {
      const recorder = await ConnectionRecorder.open({ dataDir: dir });
      const summary = await new LogIngester({ recorder }).ingest(
        lines('{"time":"2024-01-01T00:00:00Z","clientIP":"1.2.3.4","hostname":"svc.local","path":"/x"}'),
      );
      assert.equal(summary.recorded, 1);

      const [row] = recorder.reader.listConnections({ limit: 10, offset: 0 });
      assert.equal(row.client_ip, "1.2.3.4");
      assert.equal(row.host, "svc.local");
      assert.equal(row.path, "/x");
      assert.equal(row.country, "");
      assert.equal(row.source, "daemon-log");
      await recorder.close();

      const log = readFileSync(path.join(dir, LOG_FILENAME), "utf8");
      assert.equal(log.split("\n").length, 2);
      assert.ok(log.includes(" | 1.2.3.4 |  | GET /x | svc.local | \n"));
    });
  });
});
