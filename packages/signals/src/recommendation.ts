import type {
  Action,
  FusedDecision,
  ISODate,
  IndicatorVector,
  SignalStates,
} from "@quantlens/sdk";

export type Outlook = "BULLISH" | "BEARISH" | "NEUTRAL";

/**
 * Human-facing trading plan for the most recent bar.
 */
export interface Recommendation {
  readonly symbol: string;
  readonly timestamp: ISODate;
  readonly action: Action;
  readonly confidence: number;
  readonly outlook: Outlook;
  readonly marketOutlook: string;
  readonly entryStrategy: string;
  readonly riskManagement: string;
  readonly timeHorizon: string;
  readonly signals: ReadonlyArray<string>;
  readonly indicators: IndicatorVector;
  readonly states: SignalStates;
  readonly votes: {
    readonly bullish: number;
    readonly bearish: number;
    readonly available: number;
  };
  /** Whether an advisory vote took part in the decision. */
  readonly advised: boolean;
}

const OUTLOOK: Record<Action, Outlook> = {
  BUY: "BULLISH",
  SELL: "BEARISH",
  HOLD: "NEUTRAL",
};

const RISK_MANAGEMENT = "Risk 2% of capital per position with a stop-loss 5% below entry";
const TIME_HORIZON = "Short to medium term (1-4 weeks)";

const formatNumber = (value: number): string => value.toFixed(2);

/**
 * One line per indicator that had a value, e.g. `RSI 72.40: overbought`.
 */
export const describeSignals = (vector: IndicatorVector, states: SignalStates): string[] => {
  const lines: string[] = [];
  if (states.rsi && vector.rsi !== undefined) {
    lines.push(`RSI ${formatNumber(vector.rsi)}: ${states.rsi}`);
  }
  if (states.macd && vector.macd !== undefined) {
    lines.push(`MACD ${formatNumber(vector.macd)}: ${states.macd}`);
  }
  if (states.maCrossover && vector.smaShort !== undefined && vector.smaLong !== undefined) {
    lines.push(
      `SMA ${formatNumber(vector.smaShort)} vs ${formatNumber(vector.smaLong)}: ${states.maCrossover}`,
    );
  }
  if (
    states.bollinger &&
    vector.bollingerLower !== undefined &&
    vector.bollingerUpper !== undefined
  ) {
    lines.push(
      `Bollinger ${formatNumber(vector.bollingerLower)}-${formatNumber(vector.bollingerUpper)}: ${states.bollinger.replace("_", " ")}`,
    );
  }
  return lines;
};

const describeEntry = (symbol: string, action: Action, close: number): string => {
  if (action === "HOLD") {
    return "Wait for clearer signals before entering";
  }
  const verb = action === "BUY" ? "buying" : "selling";
  return `Consider ${verb} ${symbol} near ${formatNumber(close)}`;
};

export const buildRecommendation = (
  symbol: string,
  vector: IndicatorVector,
  decision: FusedDecision,
): Recommendation => {
  const outlook = OUTLOOK[decision.action];
  return {
    symbol,
    timestamp: vector.timestamp,
    action: decision.action,
    confidence: decision.confidence,
    outlook,
    marketOutlook:
      `Technical outlook for ${symbol} is ${outlook}: ${decision.bullishVotes} bullish and ` +
      `${decision.bearishVotes} bearish votes across ${decision.availableIndicators} indicators`,
    entryStrategy: describeEntry(symbol, decision.action, vector.close),
    riskManagement: RISK_MANAGEMENT,
    timeHorizon: TIME_HORIZON,
    signals: describeSignals(vector, decision.states),
    indicators: vector,
    states: decision.states,
    votes: {
      bullish: decision.bullishVotes,
      bearish: decision.bearishVotes,
      available: decision.availableIndicators,
    },
    advised: decision.advisory !== null,
  };
};
