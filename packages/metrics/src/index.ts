import type { BacktestResult, EquityPoint, Position, Trade } from "@quantlens/sdk";

const MS_PER_YEAR = 365.25 * 24 * 60 * 60 * 1000;
const TRADING_DAYS_PER_YEAR = 252;
const EPSILON = 1e-12;

export interface RatioOptions {
  /** Bars per year used to annualise per-bar statistics. */
  readonly periodsPerYear?: number;
  /** Annual risk-free rate as a fraction, e.g. 0.02. */
  readonly riskFreeRate?: number;
}

/** Bar-to-bar fractional returns; steps from a non-positive value are skipped. */
export const calculateReturns = (points: ReadonlyArray<EquityPoint>): number[] => {
  if (points.length < 2) {
    return [];
  }
  const returns: number[] = [];
  for (let i = 1; i < points.length; i += 1) {
    const prev = points[i - 1];
    const current = points[i];
    if (prev.portfolioValue <= 0) {
      continue;
    }
    returns.push((current.portfolioValue - prev.portfolioValue) / prev.portfolioValue);
  }
  return returns;
};

const mean = (values: ReadonlyArray<number>): number => {
  if (values.length === 0) {
    return 0;
  }
  const sum = values.reduce((acc, value) => acc + value, 0);
  return sum / values.length;
};

const sampleStandardDeviation = (values: ReadonlyArray<number>): number => {
  if (values.length < 2) {
    return 0;
  }
  const avg = mean(values);
  const variance =
    values.reduce((acc, value) => {
      const diff = value - avg;
      return acc + diff * diff;
    }, 0) /
    (values.length - 1);
  return Math.sqrt(variance);
};

const excessReturns = (points: ReadonlyArray<EquityPoint>, options: RatioOptions): number[] => {
  const periodsPerYear = options.periodsPerYear ?? TRADING_DAYS_PER_YEAR;
  const perPeriodRiskFree = (options.riskFreeRate ?? 0) / periodsPerYear;
  return calculateReturns(points).map((value) => value - perPeriodRiskFree);
};

/**
 * Annualised Sharpe ratio: mean excess return over its sample standard
 * deviation, scaled by `sqrt(periodsPerYear)`. Zero with fewer than two
 * returns or a flat curve.
 */
export const calculateSharpe = (
  points: ReadonlyArray<EquityPoint>,
  options: RatioOptions = {},
): number => {
  const returns = excessReturns(points, options);
  if (returns.length < 2) {
    return 0;
  }
  const std = sampleStandardDeviation(returns);
  if (std < EPSILON) {
    return 0;
  }
  return (mean(returns) / std) * Math.sqrt(options.periodsPerYear ?? TRADING_DAYS_PER_YEAR);
};

/** Like {@link calculateSharpe} but only downside deviation is penalised. */
export const calculateSortino = (
  points: ReadonlyArray<EquityPoint>,
  options: RatioOptions = {},
): number => {
  const returns = excessReturns(points, options);
  if (returns.length < 2) {
    return 0;
  }
  const downside = returns.filter((value) => value < 0);
  if (downside.length === 0) {
    return 0;
  }
  const downsideVariance = downside.reduce((acc, value) => acc + value * value, 0) / downside.length;
  const downsideStd = Math.sqrt(downsideVariance);
  if (downsideStd < EPSILON) {
    return 0;
  }
  return (mean(returns) / downsideStd) * Math.sqrt(options.periodsPerYear ?? TRADING_DAYS_PER_YEAR);
};

/** Largest peak-to-trough decline as a positive percentage (0–100). */
export const calculateMaxDrawdown = (points: ReadonlyArray<EquityPoint>): number => {
  if (points.length === 0) {
    return 0;
  }
  let peak = points[0].portfolioValue;
  let maxDrawdown = 0;
  for (const point of points) {
    if (point.portfolioValue > peak) {
      peak = point.portfolioValue;
    }
    if (peak > 0) {
      const drawdown = ((peak - point.portfolioValue) / peak) * 100;
      if (drawdown > maxDrawdown) {
        maxDrawdown = drawdown;
      }
    }
  }
  return maxDrawdown;
};

export const calculateCagr = (points: ReadonlyArray<EquityPoint>): number => {
  if (points.length < 2) {
    return 0;
  }
  const start = points[0];
  const end = points[points.length - 1];
  if (start.portfolioValue <= 0 || end.portfolioValue <= 0) {
    return 0;
  }
  const startTime = Date.parse(start.timestamp);
  const endTime = Date.parse(end.timestamp);
  if (!Number.isFinite(startTime) || !Number.isFinite(endTime) || startTime >= endTime) {
    return 0;
  }
  const years = (endTime - startTime) / MS_PER_YEAR;
  return Math.pow(end.portfolioValue / start.portfolioValue, 1 / years) - 1;
};

/** Share of closed trades with positive pnl, as a percentage. */
export const calculateWinRate = (trades: ReadonlyArray<Trade>): number => {
  if (trades.length === 0) {
    return 0;
  }
  const winners = trades.filter((trade) => trade.pnl > 0).length;
  return (winners * 100) / trades.length;
};

export interface TradeSummary {
  readonly totalTrades: number;
  readonly profitableTrades: number;
  readonly losingTrades: number;
  readonly winRate: number;
  /** Mean pnl of winning trades. */
  readonly avgProfit: number;
  /** Mean pnl of losing trades (negative or zero). */
  readonly avgLoss: number;
}

export const summarizeTrades = (trades: ReadonlyArray<Trade>): TradeSummary => {
  const winners = trades.filter((trade) => trade.pnl > 0);
  const losers = trades.filter((trade) => trade.pnl < 0);
  return {
    totalTrades: trades.length,
    profitableTrades: winners.length,
    losingTrades: losers.length,
    winRate: calculateWinRate(trades),
    avgProfit: mean(winners.map((trade) => trade.pnl)),
    avgLoss: mean(losers.map((trade) => trade.pnl)),
  };
};

export interface PerformanceInput extends RatioOptions {
  readonly initialCapital: number;
  readonly finalPosition: Position;
  readonly trades: ReadonlyArray<Trade>;
  readonly equityCurve: ReadonlyArray<EquityPoint>;
}

const finiteOrZero = (value: number): number => (Number.isFinite(value) ? value : 0);

/**
 * Assembles a {@link BacktestResult} from a finished simulation. The final
 * value is the last equity point (the initial capital for an empty curve);
 * every derived statistic is forced finite.
 */
export const analyzePerformance = (input: PerformanceInput): BacktestResult => {
  const { initialCapital, finalPosition, trades, equityCurve } = input;
  const lastPoint = equityCurve[equityCurve.length - 1];
  const finalValue = lastPoint ? lastPoint.portfolioValue : initialCapital;
  const totalReturn = finalValue - initialCapital;
  const tradeSummary = summarizeTrades(trades);

  return {
    initialCapital,
    finalValue,
    totalReturn,
    totalReturnPct: finiteOrZero((totalReturn * 100) / initialCapital),
    ...tradeSummary,
    maxDrawdown: finiteOrZero(calculateMaxDrawdown(equityCurve)),
    sharpeRatio: finiteOrZero(calculateSharpe(equityCurve, input)),
    sortinoRatio: finiteOrZero(calculateSortino(equityCurve, input)),
    cagr: finiteOrZero(calculateCagr(equityCurve)),
    finalPosition,
    trades: [...trades],
    equityCurve: [...equityCurve],
  };
};
