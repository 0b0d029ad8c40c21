import {
  resolvePipelineConfig,
  type BacktestResult,
  type Bar,
  type EquityPoint,
  type IndicatorVector,
  type PipelineConfig,
  type PipelineConfigInput,
  type Position,
  type Strategy,
  type StrategyContext,
  type StrategyDecision,
  type Trade,
} from "@quantlens/sdk";
import { IndicatorEngine, computeIndicators } from "@quantlens/indicators";
import {
  SignalFuser,
  buildRecommendation,
  createStrategy,
  type Advisor,
  type Recommendation,
} from "@quantlens/signals";
import { analyzePerformance } from "@quantlens/metrics";
import { silentLogger, type Logger } from "@quantlens/logger";

import { createSimulator } from "./simulator.js";

const DEFAULT_SYMBOL = "primary";
const DEFAULT_STRATEGY = "signal_fusion";

export interface StrategySelection {
  readonly name: string;
  readonly params?: unknown;
}

export interface PipelineOptions {
  /** Partial configuration; omitted fields take their defaults. */
  readonly config?: PipelineConfigInput;
  /** A strategy instance, or a preset name with params. Defaults to `signal_fusion`. */
  readonly strategy?: Strategy | StrategySelection;
  readonly advisor?: Advisor;
  readonly symbol?: string;
  readonly runId?: string;
  readonly logger?: Logger;
}

/** Everything known after one bar has been processed. */
export interface BacktestStep {
  readonly index: number;
  readonly bar: Bar;
  readonly indicators: IndicatorVector;
  readonly decision: StrategyDecision;
  readonly equity: EquityPoint;
}

/** Returned by {@link streamBacktest} once the bars are exhausted. */
export interface BacktestOutcome {
  readonly config: PipelineConfig;
  readonly finalPosition: Position;
  readonly trades: ReadonlyArray<Trade>;
  readonly equityCurve: ReadonlyArray<EquityPoint>;
}

const isStrategy = (value: Strategy | StrategySelection): value is Strategy =>
  "onBar" in value && typeof value.onBar === "function";

const resolveStrategy = (
  config: PipelineConfig,
  options: PipelineOptions,
  logger: Logger,
): Strategy => {
  const selection = options.strategy ?? { name: DEFAULT_STRATEGY };
  if (isStrategy(selection)) {
    return selection;
  }
  const params =
    selection.params ?? (selection.name === DEFAULT_STRATEGY ? config.fusion : {});
  return createStrategy(selection.name, params, { advisor: options.advisor, logger });
};

/**
 * Runs the pipeline one bar at a time: indicators, then the strategy
 * decision, then the simulator. Nothing is computed ahead of the consumer.
 * A position still open after the last bar is liquidated when
 * `backtest.liquidateAtEnd` is set.
 *
 * @throws DataValidationError when a bar is malformed or out of order.
 */
export function* streamBacktest(
  bars: Iterable<Bar>,
  options: PipelineOptions = {},
): Generator<BacktestStep, BacktestOutcome, undefined> {
  const config = resolvePipelineConfig(options.config);
  const symbol = options.symbol ?? DEFAULT_SYMBOL;
  const logger = (options.logger ?? silentLogger).child({ runId: options.runId, symbol });
  const strategy = resolveStrategy(config, options, logger);
  const engine = new IndicatorEngine(config.indicators);
  const simulator = createSimulator({
    initialCapital: config.backtest.initialCapital,
    positionSizing: config.backtest.positionSizing,
    logger,
  });
  const context: StrategyContext = { symbol, runId: options.runId };

  logger.info("Backtest started", {
    strategy: strategy.name,
    initialCapital: config.backtest.initialCapital,
    positionSizing: config.backtest.positionSizing,
  });

  strategy.onInit(context);
  let lastBar: Bar | null = null;
  let index = 0;
  for (const bar of bars) {
    const indicators = engine.push(bar);
    const decision = strategy.onBar(context, bar, indicators);
    const equity = simulator.step(bar, decision);
    lastBar = bar;
    yield { index, bar, indicators, decision, equity };
    index += 1;
  }
  strategy.onStop(context);

  if (lastBar !== null && config.backtest.liquidateAtEnd) {
    simulator.liquidate(lastBar, "end_of_data");
  }

  return {
    config,
    finalPosition: simulator.position,
    trades: simulator.trades,
    equityCurve: simulator.equityCurve,
  };
}

/**
 * Consumes {@link streamBacktest} and analyses the run.
 */
export const runBacktest = (bars: Iterable<Bar>, options: PipelineOptions = {}): BacktestResult => {
  const logger = (options.logger ?? silentLogger).child({
    runId: options.runId,
    symbol: options.symbol ?? DEFAULT_SYMBOL,
  });
  const stream = streamBacktest(bars, options);
  let next = stream.next();
  while (!next.done) {
    next = stream.next();
  }
  const outcome = next.value;

  const result = analyzePerformance({
    initialCapital: outcome.config.backtest.initialCapital,
    finalPosition: outcome.finalPosition,
    trades: outcome.trades,
    equityCurve: outcome.equityCurve,
    periodsPerYear: outcome.config.backtest.periodsPerYear,
    riskFreeRate: outcome.config.backtest.riskFreeRate,
  });

  logger.info("Backtest completed", {
    bars: outcome.equityCurve.length,
    trades: result.totalTrades,
    finalValue: result.finalValue,
    totalReturnPct: result.totalReturnPct,
    sharpeRatio: result.sharpeRatio,
  });
  return result;
};

/**
 * Fused decision and trading plan for the most recent bar.
 *
 * @throws Error when no bars are supplied.
 * @throws DataValidationError when the bars or config are malformed.
 */
export const generateStrategy = (
  symbol: string,
  bars: ReadonlyArray<Bar>,
  options: Omit<PipelineOptions, "strategy" | "symbol"> = {},
): Recommendation => {
  const config = resolvePipelineConfig(options.config);
  const logger = (options.logger ?? silentLogger).child({ runId: options.runId, symbol });
  const vectors = computeIndicators(bars, config.indicators, { logger });
  const latest = vectors[vectors.length - 1];
  if (latest === undefined) {
    throw new Error(`No bars available for ${symbol}`);
  }
  const fuser = new SignalFuser(config.fusion, { advisor: options.advisor, logger });
  const recommendation = buildRecommendation(symbol, latest, fuser.decide(latest));
  logger.info("Recommendation generated", {
    timestamp: recommendation.timestamp,
    action: recommendation.action,
    confidence: recommendation.confidence,
  });
  return recommendation;
};
