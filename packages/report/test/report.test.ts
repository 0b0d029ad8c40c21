import { strict as assert } from "node:assert";
import test from "node:test";

import type { BacktestResult } from "@quantlens/sdk";
import type { Recommendation } from "@quantlens/signals";

import { buildReportMarkdown } from "../src/index.js";

const result: BacktestResult = {
  initialCapital: 10_000,
  finalValue: 12_000,
  totalReturn: 2_000,
  totalReturnPct: 20,
  totalTrades: 1,
  profitableTrades: 1,
  losingTrades: 0,
  winRate: 100,
  avgProfit: 2_000,
  avgLoss: 0,
  maxDrawdown: 3.456,
  sharpeRatio: 1.234,
  sortinoRatio: 0,
  cagr: 0.125,
  finalPosition: { cash: 12_000, sharesHeld: 0, entryPrice: null, entryTimestamp: null },
  trades: [
    {
      entryTimestamp: "2024-01-06T00:00:00.000Z",
      entryPrice: 100,
      exitTimestamp: "2024-01-21T00:00:00.000Z",
      exitPrice: 120,
      shares: 100,
      pnl: 2_000,
      pnlPct: 20,
      exitReason: "signal",
    },
  ],
  equityCurve: [
    { timestamp: "2024-01-01T00:00:00.000Z", portfolioValue: 10_000 },
    { timestamp: "2024-01-21T00:00:00.000Z", portfolioValue: 12_000 },
  ],
};

const recommendation: Recommendation = {
  symbol: "ACME",
  timestamp: "2024-01-21T00:00:00.000Z",
  action: "BUY",
  confidence: 7.5,
  outlook: "BULLISH",
  marketOutlook: "Technical outlook for ACME is BULLISH: 3 bullish and 0 bearish votes across 4 indicators",
  entryStrategy: "Consider buying ACME near 120.00",
  riskManagement: "Risk 2% of capital per position with a stop-loss 5% below entry",
  timeHorizon: "Short to medium term (1-4 weeks)",
  signals: ["RSI 25.00: oversold"],
  indicators: { timestamp: "2024-01-21T00:00:00.000Z", close: 120, rsi: 25 },
  states: { rsi: "oversold" },
  votes: { bullish: 3, bearish: 0, available: 4 },
  advised: false,
};

test("report starts with a title and run details", () => {
  const lines = buildReportMarkdown({
    symbol: "ACME",
    result,
    runId: "acme-run",
    strategyName: "signal_fusion",
  }).split("\n");
  assert.equal(lines[0], "# Backtest report: ACME");
  assert.equal(lines[2], "Run `acme-run`, strategy `signal_fusion`, 2 bars.");
});

test("summary table formats every metric", () => {
  const markdown = buildReportMarkdown({ symbol: "ACME", result });
  const lines = markdown.split("\n");
  assert.equal(lines[2], "2 bars.");
  assert.ok(lines.includes("| Initial capital | 10000.00 |"));
  assert.ok(lines.includes("| Total return | 2000.00 (20.00%) |"));
  assert.ok(lines.includes("| Trades | 1 (1 winning, 0 losing) |"));
  assert.ok(lines.includes("| Win rate | 100.00% |"));
  assert.ok(lines.includes("| Max drawdown | 3.46% |"));
  assert.ok(lines.includes("| Sharpe ratio | 1.23 |"));
  assert.ok(lines.includes("| CAGR | 12.50% |"));
  assert.ok(lines.includes("Flat with 12000.00 cash."));
});

test("trades are listed one per row", () => {
  const lines = buildReportMarkdown({ symbol: "ACME", result }).split("\n");
  assert.ok(
    lines.includes(
      "| 1 | 2024-01-06T00:00:00.000Z | 100.00 | 2024-01-21T00:00:00.000Z | 120.00 | 100.0000 | 2000.00 | 20.00% | signal |",
    ),
  );
});

test("a run without trades says so", () => {
  const markdown = buildReportMarkdown({ symbol: "ACME", result: { ...result, trades: [] } });
  assert.ok(markdown.split("\n").includes("No trades were closed."));
});

test("an open position is described", () => {
  const markdown = buildReportMarkdown({
    symbol: "ACME",
    result: {
      ...result,
      finalPosition: {
        cash: 0,
        sharesHeld: 12.5,
        entryPrice: 80,
        entryTimestamp: "2024-01-10T00:00:00.000Z",
      },
    },
  });
  assert.ok(
    markdown
      .split("\n")
      .includes("Long 12.5000 shares since 2024-01-10T00:00:00.000Z at 80.00; cash 0.00."),
  );
});

test("recommendation section is appended when supplied", () => {
  const markdown = buildReportMarkdown({ symbol: "ACME", result, recommendation });
  const lines = markdown.split("\n");
  assert.ok(lines.includes("## Recommendation"));
  assert.ok(lines.includes("**BUY** with confidence 7.5/10 as of 2024-01-21T00:00:00.000Z."));
  assert.ok(lines.includes("- Entry strategy: Consider buying ACME near 120.00"));
  assert.ok(lines.includes("- RSI 25.00: oversold"));
  assert.ok(markdown.endsWith("- RSI 25.00: oversold\n"));
});

test("report ends with a single newline", () => {
  const markdown = buildReportMarkdown({ symbol: "ACME", result });
  assert.ok(markdown.endsWith("|\n"));
  assert.ok(!markdown.endsWith("\n\n"));
});
