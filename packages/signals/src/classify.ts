import type {
  BandState,
  FusionConfig,
  IndicatorVector,
  RsiState,
  SignalStates,
  TrendState,
} from "@quantlens/sdk";

export type Bias = "bullish" | "bearish" | "neutral";

export const classifyRsi = (
  value: number,
  thresholds: Pick<FusionConfig, "rsiOversold" | "rsiOverbought">,
): RsiState => {
  if (value < thresholds.rsiOversold) {
    return "oversold";
  }
  if (value > thresholds.rsiOverbought) {
    return "overbought";
  }
  return "neutral";
};

export const classifyMacd = (value: number): TrendState => {
  if (value > 0) {
    return "bullish";
  }
  if (value < 0) {
    return "bearish";
  }
  return "neutral";
};

/** Short average above long is bullish; anything else is bearish. */
export const classifyCrossover = (short: number, long: number): TrendState =>
  short > long ? "bullish" : "bearish";

export const classifyBollinger = (close: number, upper: number, lower: number): BandState => {
  if (close < lower) {
    return "below_lower";
  }
  if (close > upper) {
    return "above_upper";
  }
  return "inside";
};

/**
 * Maps each indicator with a value to its discrete state. Indicators whose
 * inputs are missing are left out rather than defaulted.
 */
export const classifySignals = (
  vector: IndicatorVector,
  thresholds: Pick<FusionConfig, "rsiOversold" | "rsiOverbought">,
): SignalStates => {
  const { rsi, macd, smaShort, smaLong, bollingerUpper, bollingerLower, close } = vector;
  return {
    ...(rsi !== undefined ? { rsi: classifyRsi(rsi, thresholds) } : {}),
    ...(macd !== undefined ? { macd: classifyMacd(macd) } : {}),
    ...(smaShort !== undefined && smaLong !== undefined
      ? { maCrossover: classifyCrossover(smaShort, smaLong) }
      : {}),
    ...(bollingerUpper !== undefined && bollingerLower !== undefined
      ? { bollinger: classifyBollinger(close, bollingerUpper, bollingerLower) }
      : {}),
  };
};

const BIAS: Record<RsiState | TrendState | BandState, Bias> = {
  oversold: "bullish",
  overbought: "bearish",
  neutral: "neutral",
  bullish: "bullish",
  bearish: "bearish",
  below_lower: "bullish",
  above_upper: "bearish",
  inside: "neutral",
};

/** Directional bias of every state present, in a fixed indicator order. */
export const biasesOf = (states: SignalStates): Bias[] => {
  const ordered = [states.rsi, states.macd, states.maCrossover, states.bollinger];
  return ordered
    .filter((state): state is RsiState | TrendState | BandState => state !== undefined)
    .map((state) => BIAS[state]);
};
