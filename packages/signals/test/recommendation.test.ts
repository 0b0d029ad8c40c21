import { strict as assert } from "node:assert";
import test from "node:test";

import type { IndicatorVector } from "@quantlens/sdk";

import { buildRecommendation, describeSignals, fuseSignals } from "../src/index.js";

const vector: IndicatorVector = {
  timestamp: "2024-05-10T00:00:00.000Z",
  close: 90,
  rsi: 25,
  macd: 1.5,
  smaShort: 105,
  smaLong: 100,
  bollingerUpper: 110,
  bollingerMiddle: 102.5,
  bollingerLower: 95,
};

test("describeSignals renders one line per classified indicator", () => {
  const decision = fuseSignals(vector);
  assert.deepEqual(describeSignals(vector, decision.states), [
    "RSI 25.00: oversold",
    "MACD 1.50: bullish",
    "SMA 105.00 vs 100.00: bullish",
    "Bollinger 95.00-110.00: below lower",
  ]);
});

test("describeSignals skips indicators without values", () => {
  const partial: IndicatorVector = { timestamp: vector.timestamp, close: 90, rsi: 72.4 };
  assert.deepEqual(describeSignals(partial, { rsi: "overbought" }), ["RSI 72.40: overbought"]);
});

test("buildRecommendation summarises a BUY", () => {
  const recommendation = buildRecommendation("ACME", vector, fuseSignals(vector));
  assert.equal(recommendation.symbol, "ACME");
  assert.equal(recommendation.timestamp, "2024-05-10T00:00:00.000Z");
  assert.equal(recommendation.action, "BUY");
  assert.equal(recommendation.confidence, 10);
  assert.equal(recommendation.outlook, "BULLISH");
  assert.equal(
    recommendation.marketOutlook,
    "Technical outlook for ACME is BULLISH: 4 bullish and 0 bearish votes across 4 indicators",
  );
  assert.equal(recommendation.entryStrategy, "Consider buying ACME near 90.00");
  assert.equal(
    recommendation.riskManagement,
    "Risk 2% of capital per position with a stop-loss 5% below entry",
  );
  assert.equal(recommendation.timeHorizon, "Short to medium term (1-4 weeks)");
  assert.deepEqual(recommendation.votes, { bullish: 4, bearish: 0, available: 4 });
  assert.equal(recommendation.advised, false);
  assert.equal(recommendation.indicators, vector);
});

test("buildRecommendation tells the reader to wait on HOLD", () => {
  const flat: IndicatorVector = { timestamp: vector.timestamp, close: 50 };
  const recommendation = buildRecommendation("ACME", flat, fuseSignals(flat));
  assert.equal(recommendation.action, "HOLD");
  assert.equal(recommendation.outlook, "NEUTRAL");
  assert.equal(recommendation.entryStrategy, "Wait for clearer signals before entering");
  assert.deepEqual(recommendation.signals, []);
});

test("buildRecommendation flags an advised decision", () => {
  const decision = fuseSignals(vector, undefined, { action: "SELL", confidence: 3 });
  const recommendation = buildRecommendation("ACME", vector, decision);
  assert.equal(recommendation.advised, true);
  assert.equal(recommendation.action, "BUY");
  assert.equal(recommendation.confidence, 6);
});
