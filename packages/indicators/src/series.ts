/**
 * Window primitives shared by the batch helpers below and by the
 * incremental {@link IndicatorEngine}, so both produce identical numbers.
 */

export const mean = (values: ReadonlyArray<number>): number => {
  if (values.length === 0) {
    return 0;
  }
  const sum = values.reduce((acc, value) => acc + value, 0);
  return sum / values.length;
};

/** Sample (n - 1) standard deviation; 0 for fewer than two values. */
export const sampleStdDev = (values: ReadonlyArray<number>): number => {
  if (values.length < 2) {
    return 0;
  }
  const avg = mean(values);
  const squared = values.reduce((acc, value) => {
    const diff = value - avg;
    return acc + diff * diff;
  }, 0);
  return Math.sqrt(squared / (values.length - 1));
};

export const emaStep = (previous: number, value: number, span: number): number => {
  const alpha = 2 / (span + 1);
  return alpha * value + (1 - alpha) * previous;
};

/**
 * RSI over `closes.length - 1` consecutive deltas using simple averages of
 * gains and losses. A window without losses saturates at 100.
 */
export const rsiFromWindow = (closes: ReadonlyArray<number>): number => {
  const period = closes.length - 1;
  let gains = 0;
  let losses = 0;
  for (let i = 1; i < closes.length; i += 1) {
    const diff = closes[i] - closes[i - 1];
    if (diff > 0) {
      gains += diff;
    } else {
      losses -= diff;
    }
  }
  const avgGain = gains / period;
  const avgLoss = losses / period;
  if (avgLoss === 0) {
    return 100;
  }
  const rs = avgGain / avgLoss;
  return 100 - 100 / (1 + rs);
};

export type Series = Array<number | undefined>;

const trailingWindow = (values: ReadonlyArray<number>, end: number, length: number): number[] =>
  values.slice(end - length + 1, end + 1);

export const sma = (values: ReadonlyArray<number>, window: number): Series =>
  values.map((_, index) =>
    index >= window - 1 ? mean(trailingWindow(values, index, window)) : undefined,
  );

/** EMA seeded with the first value; defined at every index. */
export const ema = (values: ReadonlyArray<number>, span: number): number[] => {
  const result: number[] = [];
  let previous: number | undefined;
  for (const value of values) {
    previous = previous === undefined ? value : emaStep(previous, value, span);
    result.push(previous);
  }
  return result;
};

export const rsi = (closes: ReadonlyArray<number>, period = 14): Series =>
  closes.map((_, index) =>
    index >= period ? rsiFromWindow(trailingWindow(closes, index, period + 1)) : undefined,
  );

export interface MacdSeries {
  readonly macd: Series;
  readonly signal: Series;
  readonly histogram: Series;
}

/**
 * MACD line from index `slow - 1`, signal line (EMA of the MACD line seeded
 * with its first value) from index `slow + signal - 2`.
 */
export const macd = (
  closes: ReadonlyArray<number>,
  fast = 12,
  slow = 26,
  signalSpan = 9,
): MacdSeries => {
  const fastEma = ema(closes, fast);
  const slowEma = ema(closes, slow);
  const macdLine: Series = [];
  const signalLine: Series = [];
  const histogram: Series = [];
  let signal: number | undefined;
  let emitted = 0;

  closes.forEach((_, index) => {
    if (index < slow - 1) {
      macdLine.push(undefined);
      signalLine.push(undefined);
      histogram.push(undefined);
      return;
    }
    const value = fastEma[index] - slowEma[index];
    signal = signal === undefined ? value : emaStep(signal, value, signalSpan);
    emitted += 1;
    macdLine.push(value);
    if (emitted >= signalSpan) {
      signalLine.push(signal);
      histogram.push(value - signal);
    } else {
      signalLine.push(undefined);
      histogram.push(undefined);
    }
  });

  return { macd: macdLine, signal: signalLine, histogram };
};

export interface BollingerSeries {
  readonly upper: Series;
  readonly middle: Series;
  readonly lower: Series;
}

export const bollingerBands = (
  closes: ReadonlyArray<number>,
  period = 20,
  stdDevMultiplier = 2,
): BollingerSeries => {
  const upper: Series = [];
  const middle: Series = [];
  const lower: Series = [];
  closes.forEach((_, index) => {
    if (index < period - 1) {
      upper.push(undefined);
      middle.push(undefined);
      lower.push(undefined);
      return;
    }
    const window = trailingWindow(closes, index, period);
    const avg = mean(window);
    const band = sampleStdDev(window) * stdDevMultiplier;
    upper.push(avg + band);
    middle.push(avg);
    lower.push(avg - band);
  });
  return { upper, middle, lower };
};
