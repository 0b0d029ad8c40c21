// Source of truth for the value shapes passed between QuantLens packages.
// Everything here is plain data: the surrounding layers serialise it however they like.

import { z } from "zod";

/** -----------------------------------------------------------------------
 *  Shared enums & primitives
 *  -------------------------------------------------------------------- */

/** ISO-8601 date string (UTC recommended). */
export type ISODate = string;

/** Discrete trading action produced by signal fusion or a strategy. */
export type Action = "BUY" | "SELL" | "HOLD";

/** Bar intervals understood by the CSV loader and the CLI. */
export type Timeframe = "1d" | "1h" | "15m" | "1m";

export const TimeframeSchema = z.enum(["1d", "1h", "15m", "1m"]);

/**
 * Bars per year used to annualise Sharpe and Sortino, assuming 252 sessions
 * of 6.5 trading hours.
 */
export const PERIODS_PER_YEAR_BY_TIMEFRAME: Readonly<Record<Timeframe, number>> = {
  "1d": 252,
  "1h": 1_638,
  "15m": 6_552,
  "1m": 98_280,
};

export const ACTIONS: ReadonlyArray<Action> = ["BUY", "SELL", "HOLD"];

/** -----------------------------------------------------------------------
 *  Bar
 *  -------------------------------------------------------------------- */

/**
 * One OHLCV observation. Sequences are expected in strictly increasing
 * timestamp order with no duplicates.
 */
export interface Bar {
  readonly timestamp: ISODate;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
}

const price = z.number().finite().positive();

/** Runtime validator for a single {@link Bar}. */
export const BarSchema = z.object({
  timestamp: z
    .string()
    .min(1)
    .refine((value) => !Number.isNaN(Date.parse(value)), { message: "must be an ISO-8601 date" }),
  open: price,
  high: price,
  low: price,
  close: price,
  volume: z.number().finite().nonnegative(),
});

/**
 * Runtime validator for a bar sequence: every bar valid and timestamps
 * strictly increasing.
 */
export const BarSeriesSchema = z.array(BarSchema).superRefine((bars, ctx) => {
  for (let i = 1; i < bars.length; i += 1) {
    const previous = Date.parse(bars[i - 1].timestamp);
    const current = Date.parse(bars[i].timestamp);
    if (current <= previous) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `timestamp ${bars[i].timestamp} does not follow ${bars[i - 1].timestamp}`,
        path: [i, "timestamp"],
      });
    }
  }
});

/** -----------------------------------------------------------------------
 *  Indicators & signals
 *  -------------------------------------------------------------------- */

/**
 * Indicator values for one bar. A field is left off the object until its
 * lookback window holds enough history.
 */
export interface IndicatorVector {
  readonly timestamp: ISODate;
  readonly close: number;
  readonly rsi?: number;
  readonly macd?: number;
  readonly macdSignal?: number;
  readonly macdHistogram?: number;
  readonly smaShort?: number;
  readonly smaLong?: number;
  readonly bollingerUpper?: number;
  readonly bollingerMiddle?: number;
  readonly bollingerLower?: number;
}

export type RsiState = "oversold" | "overbought" | "neutral";
export type TrendState = "bullish" | "bearish" | "neutral";
export type BandState = "below_lower" | "above_upper" | "inside";

/** Per-indicator classification; a key is absent when its inputs are. */
export interface SignalStates {
  readonly rsi?: RsiState;
  readonly macd?: TrendState;
  readonly maCrossover?: TrendState;
  readonly bollinger?: BandState;
}

export interface Decision {
  readonly action: Action;
  /** Agreement score in [0, 10]. */
  readonly confidence: number;
}

/** Runtime validator for {@link Decision}. */
export const DecisionSchema = z.object({
  action: z.enum(["BUY", "SELL", "HOLD"]),
  confidence: z.number().min(0).max(10),
});

/**
 * Decision together with the vote tally that produced it.
 */
export interface FusedDecision extends Decision {
  readonly states: SignalStates;
  readonly bullishVotes: number;
  readonly bearishVotes: number;
  /** Rule-based indicators that had a value on this bar. */
  readonly availableIndicators: number;
  /** Advisory vote that was blended in, if any. */
  readonly advisory: Decision | null;
}

/** -----------------------------------------------------------------------
 *  Simulation state
 *  -------------------------------------------------------------------- */

export interface Position {
  readonly cash: number;
  readonly sharesHeld: number;
  /** `null` while flat. */
  readonly entryPrice: number | null;
  readonly entryTimestamp: ISODate | null;
}

export type ExitReason = "signal" | "end_of_data";

/** Closed round trip. */
export interface Trade {
  readonly entryTimestamp: ISODate;
  readonly entryPrice: number;
  readonly exitTimestamp: ISODate;
  readonly exitPrice: number;
  readonly shares: number;
  readonly pnl: number;
  readonly pnlPct: number;
  readonly exitReason: ExitReason;
}

/** Mark-to-market portfolio value captured after processing a bar. */
export interface EquityPoint {
  readonly timestamp: ISODate;
  readonly portfolioValue: number;
}

/** -----------------------------------------------------------------------
 *  BacktestResult
 *  -------------------------------------------------------------------- */

/**
 * Output of a completed backtest run. Percentages (`totalReturnPct`,
 * `winRate`, `maxDrawdown`) are expressed on a 0–100 scale.
 */
export interface BacktestResult {
  readonly initialCapital: number;
  readonly finalValue: number;
  readonly totalReturn: number;
  readonly totalReturnPct: number;
  readonly totalTrades: number;
  readonly profitableTrades: number;
  readonly losingTrades: number;
  readonly winRate: number;
  readonly avgProfit: number;
  readonly avgLoss: number;
  readonly maxDrawdown: number;
  readonly sharpeRatio: number;
  readonly sortinoRatio: number;
  readonly cagr: number;
  readonly finalPosition: Position;
  readonly trades: ReadonlyArray<Trade>;
  readonly equityCurve: ReadonlyArray<EquityPoint>;
}

const finite = z.number().finite();

/** Runtime validator for {@link BacktestResult}; rejects NaN and Infinity anywhere. */
export const BacktestResultSchema = z.object({
  initialCapital: finite.positive(),
  finalValue: finite.nonnegative(),
  totalReturn: finite,
  totalReturnPct: finite,
  totalTrades: z.number().int().nonnegative(),
  profitableTrades: z.number().int().nonnegative(),
  losingTrades: z.number().int().nonnegative(),
  winRate: finite.min(0).max(100),
  avgProfit: finite,
  avgLoss: finite,
  maxDrawdown: finite.nonnegative(),
  sharpeRatio: finite,
  sortinoRatio: finite,
  cagr: finite,
  finalPosition: z.object({
    cash: finite.nonnegative(),
    sharesHeld: finite.nonnegative(),
    entryPrice: finite.nullable(),
    entryTimestamp: z.string().nullable(),
  }),
  trades: z.array(
    z.object({
      entryTimestamp: z.string(),
      entryPrice: finite,
      exitTimestamp: z.string(),
      exitPrice: finite,
      shares: finite.positive(),
      pnl: finite,
      pnlPct: finite,
      exitReason: z.enum(["signal", "end_of_data"]),
    }),
  ),
  equityCurve: z.array(
    z.object({
      timestamp: z.string(),
      portfolioValue: finite.nonnegative(),
    }),
  ),
});

/** -----------------------------------------------------------------------
 *  Re-exports grouped for convenience
 *  -------------------------------------------------------------------- */

export * from "./config.js";
export * from "./validation.js";
export * from "./strategies/types.js";
