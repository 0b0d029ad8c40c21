import {
  BarSchema,
  BarSeriesSchema,
  DataValidationError,
  IndicatorConfigSchema,
  assertValid,
  longestLookback,
  type Bar,
  type IndicatorConfig,
  type IndicatorConfigInput,
  type IndicatorVector,
} from "@quantlens/sdk";
import { silentLogger, type Logger } from "@quantlens/logger";

import { emaStep, mean, rsiFromWindow, sampleStdDev } from "./series.js";

/**
 * Rejects a malformed bar sequence. Input is never sorted or repaired.
 *
 * @throws DataValidationError
 */
export const validateBars = (bars: unknown): Bar[] => assertValid(BarSeriesSchema, bars, "bars");

/**
 * Incremental indicator calculator. Feed bars in chronological order with
 * {@link IndicatorEngine.push}; each call returns the vector for that bar
 * using only the bars seen so far.
 */
export class IndicatorEngine {
  public readonly config: IndicatorConfig;

  private readonly capacity: number;
  private closes: number[] = [];
  private barsSeen = 0;
  private lastTimestamp: { readonly raw: string; readonly epoch: number } | null = null;
  private fastEma: number | null = null;
  private slowEma: number | null = null;
  private signal: number | null = null;
  private macdEmitted = 0;

  public constructor(config: IndicatorConfigInput = {}) {
    this.config = assertValid(IndicatorConfigSchema, config, "IndicatorConfig");
    this.capacity = Math.max(
      this.config.rsiPeriod + 1,
      this.config.smaLong,
      this.config.bollingerPeriod,
    );
  }

  /** Bars needed before every field of the vector is present. */
  public get warmupBars(): number {
    return longestLookback(this.config);
  }

  public get processed(): number {
    return this.barsSeen;
  }

  public reset(): void {
    this.closes = [];
    this.barsSeen = 0;
    this.lastTimestamp = null;
    this.fastEma = null;
    this.slowEma = null;
    this.signal = null;
    this.macdEmitted = 0;
  }

  /**
   * @throws DataValidationError when the bar is malformed or does not follow
   * the previous bar in time.
   */
  public push(input: Bar): IndicatorVector {
    const bar = assertValid(BarSchema, input, `bar[${this.barsSeen}]`);
    const epoch = Date.parse(bar.timestamp);
    if (this.lastTimestamp !== null && epoch <= this.lastTimestamp.epoch) {
      throw new DataValidationError(`bar[${this.barsSeen}]`, [
        `timestamp: ${bar.timestamp} does not follow ${this.lastTimestamp.raw}`,
      ]);
    }
    this.lastTimestamp = { raw: bar.timestamp, epoch };

    const index = this.barsSeen;
    this.barsSeen += 1;

    this.closes.push(bar.close);
    if (this.closes.length > this.capacity) {
      this.closes.shift();
    }

    const { config } = this;
    this.fastEma = this.fastEma === null ? bar.close : emaStep(this.fastEma, bar.close, config.macdFast);
    this.slowEma = this.slowEma === null ? bar.close : emaStep(this.slowEma, bar.close, config.macdSlow);

    let macd: number | undefined;
    let macdSignal: number | undefined;
    if (index >= config.macdSlow - 1) {
      macd = this.fastEma - this.slowEma;
      this.signal = this.signal === null ? macd : emaStep(this.signal, macd, config.macdSignal);
      this.macdEmitted += 1;
      if (this.macdEmitted >= config.macdSignal) {
        macdSignal = this.signal;
      }
    }

    const rsi =
      this.closes.length >= config.rsiPeriod + 1
        ? rsiFromWindow(this.tail(config.rsiPeriod + 1))
        : undefined;
    const smaShort = this.closes.length >= config.smaShort ? mean(this.tail(config.smaShort)) : undefined;
    const smaLong = this.closes.length >= config.smaLong ? mean(this.tail(config.smaLong)) : undefined;

    let bands: { upper: number; middle: number; lower: number } | undefined;
    if (this.closes.length >= config.bollingerPeriod) {
      const window = this.tail(config.bollingerPeriod);
      const middle = mean(window);
      const width = sampleStdDev(window) * config.bollingerStdDev;
      bands = { upper: middle + width, middle, lower: middle - width };
    }

    return {
      timestamp: bar.timestamp,
      close: bar.close,
      ...(rsi !== undefined ? { rsi } : {}),
      ...(macd !== undefined ? { macd } : {}),
      ...(macd !== undefined && macdSignal !== undefined
        ? { macdSignal, macdHistogram: macd - macdSignal }
        : {}),
      ...(smaShort !== undefined ? { smaShort } : {}),
      ...(smaLong !== undefined ? { smaLong } : {}),
      ...(bands
        ? {
            bollingerUpper: bands.upper,
            bollingerMiddle: bands.middle,
            bollingerLower: bands.lower,
          }
        : {}),
    };
  }

  private tail(length: number): number[] {
    return this.closes.slice(this.closes.length - length);
  }
}

export interface ComputeIndicatorsOptions {
  readonly logger?: Logger;
}

/**
 * Validates the full sequence and returns one {@link IndicatorVector} per bar.
 * Short histories yield partial vectors rather than an error.
 */
export const computeIndicators = (
  bars: ReadonlyArray<Bar>,
  config: IndicatorConfigInput = {},
  options: ComputeIndicatorsOptions = {},
): IndicatorVector[] => {
  const logger = options.logger ?? silentLogger;
  const series = validateBars(bars);
  const engine = new IndicatorEngine(config);

  if (series.length < engine.warmupBars) {
    logger.warn("Bar history shorter than the longest indicator window", {
      bars: series.length,
      warmupBars: engine.warmupBars,
    });
  }

  return series.map((bar) => engine.push(bar));
};
