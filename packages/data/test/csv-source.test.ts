import { strict as assert } from "node:assert";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";

import type { LogMeta, Logger } from "@quantlens/logger";

import { CsvSource, parseCsv } from "../src/index.js";

const SAMPLE_CSV =
  `timestamp,open,high,low,close,volume\n` +
  `2024-01-02T00:00:00.000Z,180.0,182.0,179.5,181.0,1000\n` +
  `2024-01-03T00:00:00.000Z,181.0,183.0,180.5,182.0,1200\n` +
  `2024-01-02T00:00:00.000Z,180.0,182.0,179.5,181.5,1000\n` +
  `2024-01-05T00:00:00.000Z,183.0,185.0,182.5,184.0,1500\n` +
  `2024-01-04T00:00:00.000Z,182.0,184.0,181.5,183.0,1400\n` +
  `2024-01-06T00:00:00.000Z,abc,1,1,1,1\n` +
  `2024-01-07T00:00:00.000Z,1,1,1,-1,1\n` +
  `not-a-date,1,1,1,1,1\n` +
  `\n`;

const createRecordingLogger = () => {
  const warnings: Array<[string, LogMeta | undefined]> = [];
  const logger: Logger = {
    module: "test",
    level: "debug",
    log: () => {},
    debug: () => {},
    info: () => {},
    warn: (msg, meta) => {
      warnings.push([msg, meta]);
    },
    error: () => {},
    child: () => logger,
  };
  return { logger, warnings };
};

// ============================================================================
// parseCsv
// ============================================================================

test("parseCsv sorts, de-duplicates and skips bad rows", () => {
  const { bars, skippedLines } = parseCsv(SAMPLE_CSV);
  assert.deepEqual(
    bars.map((bar) => bar.timestamp),
    [
      "2024-01-02T00:00:00.000Z",
      "2024-01-03T00:00:00.000Z",
      "2024-01-04T00:00:00.000Z",
      "2024-01-05T00:00:00.000Z",
    ],
  );
  assert.deepEqual(skippedLines, [7, 8, 9]);
});

test("parseCsv keeps the last row for a repeated timestamp", () => {
  const { bars } = parseCsv(SAMPLE_CSV);
  assert.deepEqual(bars[0], {
    timestamp: "2024-01-02T00:00:00.000Z",
    open: 180,
    high: 182,
    low: 179.5,
    close: 181.5,
    volume: 1000,
  });
});

test("parseCsv rejects short rows and empty cells", () => {
  const { bars, skippedLines } = parseCsv(
    "timestamp,open,high,low,close,volume\n2024-01-08,1,2\n2024-01-09,1,1,1,,5\r\n",
  );
  assert.deepEqual(bars, []);
  assert.deepEqual(skippedLines, [2, 3]);
});

test("parseCsv handles an empty file", () => {
  assert.deepEqual(parseCsv(""), { bars: [], skippedLines: [] });
});

// ============================================================================
// CsvSource
// ============================================================================

test("CsvSource loads the dataset for a symbol and timeframe", async (t) => {
  const datasetsDir = await mkdtemp(join(tmpdir(), "csv-source-"));
  t.after(() => rm(datasetsDir, { recursive: true, force: true }));
  await writeFile(join(datasetsDir, "brk_b_1d.csv"), SAMPLE_CSV, { encoding: "utf-8" });

  const { logger, warnings } = createRecordingLogger();
  const source = new CsvSource({ datasetsDir, logger });
  assert.equal(source.resolveDatasetPath({ symbol: "BRK.B", timeframe: "1d" }), join(datasetsDir, "brk_b_1d.csv"));

  const bars = await source.loadBars({ symbol: "BRK.B", timeframe: "1d" });
  assert.equal(bars.length, 4);
  assert.equal(warnings.length, 1);
  assert.equal(warnings[0]?.[0], "Skipped unparsable CSV rows");
  assert.deepEqual(warnings[0]?.[1]?.lines, [7, 8, 9]);

  await t.test("applies the inclusive date range", async () => {
    const ranged = await source.loadBars({
      symbol: "BRK.B",
      timeframe: "1d",
      start: "2024-01-03T00:00:00.000Z",
      end: "2024-01-04T00:00:00.000Z",
    });
    assert.deepEqual(
      ranged.map((bar) => bar.timestamp),
      ["2024-01-03T00:00:00.000Z", "2024-01-04T00:00:00.000Z"],
    );
  });
});

test("CsvSource returns no bars for a missing dataset", async (t) => {
  const datasetsDir = await mkdtemp(join(tmpdir(), "csv-source-"));
  t.after(() => rm(datasetsDir, { recursive: true, force: true }));
  const { logger, warnings } = createRecordingLogger();
  const source = new CsvSource({ datasetsDir, logger });

  assert.deepEqual(await source.loadBars({ symbol: "NONE", timeframe: "1h" }), []);
  assert.equal(warnings[0]?.[0], "Dataset not found");
});
