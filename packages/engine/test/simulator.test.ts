import { strict as assert } from "node:assert";
import test from "node:test";

import type { Action, Bar } from "@quantlens/sdk";

import { createSimulator } from "../src/index.js";

const barAt = (day: number, close: number): Bar => ({
  timestamp: new Date(Date.UTC(2024, 0, day)).toISOString(),
  open: close,
  high: close,
  low: close,
  close,
  volume: 500,
});

const act = (action: Action) => ({ action, confidence: action === "HOLD" ? 0 : 5 });

test("starts flat with all capital in cash", () => {
  const simulator = createSimulator({ initialCapital: 10_000 });
  assert.equal(simulator.state, "FLAT");
  assert.deepEqual(simulator.position, {
    cash: 10_000,
    sharesHeld: 0,
    entryPrice: null,
    entryTimestamp: null,
  });
  assert.deepEqual(simulator.trades, []);
  assert.deepEqual(simulator.equityCurve, []);
});

test("rejects a non-positive capital", () => {
  assert.throws(() => createSimulator({ initialCapital: 0 }), /initialCapital must be a positive number/);
  assert.throws(() => createSimulator({ initialCapital: Number.NaN }), /initialCapital/);
});

test("BUY while flat converts all cash into fractional shares", () => {
  const simulator = createSimulator({ initialCapital: 10_000 });
  const point = simulator.step(barAt(1, 100), act("BUY"));
  assert.equal(simulator.state, "LONG");
  assert.deepEqual(simulator.position, {
    cash: 0,
    sharesHeld: 100,
    entryPrice: 100,
    entryTimestamp: "2024-01-01T00:00:00.000Z",
  });
  assert.deepEqual(point, { timestamp: "2024-01-01T00:00:00.000Z", portfolioValue: 10_000 });
});

test("fractional sizing leaves no negative cash on awkward prices", () => {
  const simulator = createSimulator({ initialCapital: 10_000 });
  simulator.step(barAt(1, 3), act("BUY"));
  assert.equal(simulator.position.cash, 0);
  assert.equal(simulator.position.sharesHeld, 10_000 / 3);
});

test("SELL while long closes the round trip at the close", () => {
  const simulator = createSimulator({ initialCapital: 10_000 });
  simulator.step(barAt(1, 100), act("BUY"));
  simulator.step(barAt(2, 110), act("HOLD"));
  const point = simulator.step(barAt(3, 120), act("SELL"));

  assert.equal(simulator.state, "FLAT");
  assert.equal(point.portfolioValue, 12_000);
  assert.deepEqual(simulator.trades, [
    {
      entryTimestamp: "2024-01-01T00:00:00.000Z",
      entryPrice: 100,
      exitTimestamp: "2024-01-03T00:00:00.000Z",
      exitPrice: 120,
      shares: 100,
      pnl: 2_000,
      pnlPct: 20,
      exitReason: "signal",
    },
  ]);
  assert.deepEqual(
    simulator.equityCurve.map((p) => p.portfolioValue),
    [10_000, 11_000, 12_000],
  );
});

test("redundant signals are no-ops", () => {
  const simulator = createSimulator({ initialCapital: 1_000 });
  simulator.step(barAt(1, 10), act("SELL"));
  assert.equal(simulator.state, "FLAT");
  simulator.step(barAt(2, 10), act("BUY"));
  simulator.step(barAt(3, 20), act("BUY"));
  assert.equal(simulator.position.entryPrice, 10);
  assert.equal(simulator.position.sharesHeld, 100);
  assert.equal(simulator.trades.length, 0);
  assert.equal(simulator.equityCurve.length, 3);
});

test("whole sizing buys whole shares and keeps the remainder", () => {
  const simulator = createSimulator({ initialCapital: 1_000, positionSizing: "whole" });
  simulator.step(barAt(1, 300), act("BUY"));
  assert.equal(simulator.position.sharesHeld, 3);
  assert.equal(simulator.position.cash, 100);
  const point = simulator.step(barAt(2, 310), act("HOLD"));
  assert.equal(point.portfolioValue, 1_030);
});

test("whole sizing stays flat when a single share is unaffordable", () => {
  const simulator = createSimulator({ initialCapital: 100, positionSizing: "whole" });
  simulator.step(barAt(1, 150), act("BUY"));
  assert.equal(simulator.state, "FLAT");
  assert.equal(simulator.position.cash, 100);
});

test("liquidate closes an open position with the given reason", () => {
  const simulator = createSimulator({ initialCapital: 500 });
  assert.equal(simulator.liquidate(barAt(1, 50), "end_of_data"), null);
  simulator.step(barAt(1, 50), act("BUY"));
  simulator.step(barAt(2, 40), act("HOLD"));
  const trade = simulator.liquidate(barAt(2, 40), "end_of_data");
  assert.ok(trade);
  assert.equal(trade.exitReason, "end_of_data");
  assert.equal(trade.pnl, -100);
  assert.equal(trade.pnlPct, -20);
  assert.equal(simulator.position.cash, 400);
  assert.equal(simulator.equityCurve.length, 2);
});

test("cash and shares never go negative", () => {
  const simulator = createSimulator({ initialCapital: 7_777, positionSizing: "whole" });
  const actions: Action[] = ["BUY", "HOLD", "SELL", "BUY", "BUY", "SELL", "SELL", "BUY"];
  actions.forEach((action, idx) => {
    simulator.step(barAt(idx + 1, 13.37 + idx * 1.1), act(action));
    assert.ok(simulator.position.cash >= 0);
    assert.ok(simulator.position.sharesHeld >= 0);
  });
});

test("position snapshots are copies", () => {
  const simulator = createSimulator({ initialCapital: 100 });
  const before = simulator.position;
  simulator.step(barAt(1, 10), act("BUY"));
  assert.equal(before.cash, 100);
});
