import type { Bar, Decision, IndicatorVector } from "../index.js";

export interface StrategyContext {
  readonly symbol: string;
  readonly runId?: string;
}

export interface StrategyDecision extends Decision {
  /** Short machine-readable tag carried into trade logs. */
  readonly reason?: string;
}

/**
 * Per-bar decision maker driven by the backtest loop. `onBar` is called once
 * per bar in chronological order with the indicator vector for that bar.
 */
export interface Strategy {
  readonly name: string;
  readonly params: Readonly<Record<string, unknown>>;
  onInit(context: StrategyContext): void;
  onBar(context: StrategyContext, bar: Bar, indicators: IndicatorVector): StrategyDecision;
  onStop(context: StrategyContext): void;
}

export type StrategyFactory<P> = (params: P) => Strategy;

export const HOLD: StrategyDecision = { action: "HOLD", confidence: 0 };
