import { strict as assert } from "node:assert";
import test from "node:test";

import {
  BacktestResultSchema,
  BarSchema,
  BarSeriesSchema,
  DataValidationError,
  DecisionSchema,
  assertValid,
  isDataValidationError,
  type Bar,
} from "../src/index.js";

const bar = (timestamp: string, close = 100): Bar => ({
  timestamp,
  open: close,
  high: close + 1,
  low: close - 1,
  close,
  volume: 1_000,
});

// ============================================================================
// assertValid
// ============================================================================

test("assertValid returns the parsed value", () => {
  const parsed = assertValid(BarSchema, bar("2024-01-02T00:00:00.000Z"), "bar");
  assert.equal(parsed.close, 100);
});

test("assertValid lists every issue with its path", () => {
  assert.throws(
    () => assertValid(BarSchema, { ...bar("2024-01-02T00:00:00.000Z"), close: -1, volume: -5 }, "bar"),
    (error: unknown) => {
      assert.ok(isDataValidationError(error));
      assert.equal(error.label, "bar");
      assert.deepEqual(error.issues, [
        "close: Number must be greater than 0",
        "volume: Number must be greater than or equal to 0",
      ]);
      assert.equal(
        error.message,
        "Invalid bar: close: Number must be greater than 0; volume: Number must be greater than or equal to 0",
      );
      return true;
    },
  );
});

test("assertValid reports root level failures", () => {
  assert.throws(() => assertValid(DecisionSchema, null), /Invalid payload: \(root\): Expected object, received null/u);
});

// ============================================================================
// Bars
// ============================================================================

test("BarSchema rejects unparsable timestamps", () => {
  const result = BarSchema.safeParse(bar("not a date"));
  assert.equal(result.success, false);
});

test("BarSeriesSchema accepts strictly increasing timestamps", () => {
  const series = [bar("2024-01-02T00:00:00.000Z"), bar("2024-01-03T00:00:00.000Z")];
  assert.equal(BarSeriesSchema.safeParse(series).success, true);
});

test("BarSeriesSchema flags out of order and duplicate bars", () => {
  const series = [
    bar("2024-01-03T00:00:00.000Z"),
    bar("2024-01-02T00:00:00.000Z"),
    bar("2024-01-02T00:00:00.000Z"),
  ];
  assert.throws(
    () => assertValid(BarSeriesSchema, series, "bars"),
    (error: unknown) => {
      assert.ok(error instanceof DataValidationError);
      assert.deepEqual(error.issues, [
        "1.timestamp: timestamp 2024-01-02T00:00:00.000Z does not follow 2024-01-03T00:00:00.000Z",
        "2.timestamp: timestamp 2024-01-02T00:00:00.000Z does not follow 2024-01-02T00:00:00.000Z",
      ]);
      return true;
    },
  );
});

// ============================================================================
// Decisions and results
// ============================================================================

test("DecisionSchema bounds confidence to [0, 10]", () => {
  assert.equal(DecisionSchema.safeParse({ action: "BUY", confidence: 10 }).success, true);
  assert.equal(DecisionSchema.safeParse({ action: "BUY", confidence: 10.5 }).success, false);
  assert.equal(DecisionSchema.safeParse({ action: "SHORT", confidence: 1 }).success, false);
});

test("BacktestResultSchema rejects NaN metrics", () => {
  const result = {
    initialCapital: 10_000,
    finalValue: 10_000,
    totalReturn: 0,
    totalReturnPct: 0,
    totalTrades: 0,
    profitableTrades: 0,
    losingTrades: 0,
    winRate: 0,
    avgProfit: 0,
    avgLoss: 0,
    maxDrawdown: 0,
    sharpeRatio: 0,
    sortinoRatio: 0,
    cagr: 0,
    finalPosition: { cash: 10_000, sharesHeld: 0, entryPrice: null, entryTimestamp: null },
    trades: [],
    equityCurve: [{ timestamp: "2024-01-02T00:00:00.000Z", portfolioValue: 10_000 }],
  };
  assert.equal(BacktestResultSchema.safeParse(result).success, true);
  assert.equal(BacktestResultSchema.safeParse({ ...result, sharpeRatio: Number.NaN }).success, false);
  assert.equal(BacktestResultSchema.safeParse({ ...result, winRate: 120 }).success, false);
});
