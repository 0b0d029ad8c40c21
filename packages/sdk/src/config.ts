import { z } from "zod";

import { assertValid } from "./validation.js";

/** -----------------------------------------------------------------------
 *  Indicator windows
 *  -------------------------------------------------------------------- */

/** Runtime validator for indicator windows; every field has a default. */
export const IndicatorConfigSchema = z
  .object({
    rsiPeriod: z.number().int().min(2).default(14),
    macdFast: z.number().int().min(1).default(12),
    macdSlow: z.number().int().min(2).default(26),
    macdSignal: z.number().int().min(1).default(9),
    smaShort: z.number().int().min(1).default(20),
    smaLong: z.number().int().min(2).default(50),
    bollingerPeriod: z.number().int().min(2).default(20),
    bollingerStdDev: z.number().finite().positive().default(2),
  })
  .superRefine((value, ctx) => {
    if (value.macdFast >= value.macdSlow) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "macdFast must be less than macdSlow",
        path: ["macdFast"],
      });
    }
    if (value.smaShort >= value.smaLong) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "smaShort must be less than smaLong",
        path: ["smaShort"],
      });
    }
  });

export type IndicatorConfig = z.infer<typeof IndicatorConfigSchema>;
export type IndicatorConfigInput = z.input<typeof IndicatorConfigSchema>;

/** -----------------------------------------------------------------------
 *  Fusion thresholds
 *  -------------------------------------------------------------------- */

/**
 * Thresholds used to classify indicators and the minimum number of
 * rule-based indicators that must carry a value before a non-HOLD
 * decision is allowed.
 */
export const FusionConfigSchema = z
  .object({
    rsiOversold: z.number().min(0).max(100).default(30),
    rsiOverbought: z.number().min(0).max(100).default(70),
    minIndicators: z.number().int().min(1).max(4).default(3),
  })
  .superRefine((value, ctx) => {
    if (value.rsiOversold >= value.rsiOverbought) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "rsiOversold must be less than rsiOverbought",
        path: ["rsiOversold"],
      });
    }
  });

export type FusionConfig = z.infer<typeof FusionConfigSchema>;
export type FusionConfigInput = z.input<typeof FusionConfigSchema>;

/** -----------------------------------------------------------------------
 *  Simulation & analysis
 *  -------------------------------------------------------------------- */

/**
 * `fractional` converts all cash into shares; `whole` buys
 * `floor(cash / close)` shares and keeps the remainder as cash.
 */
export type PositionSizing = "fractional" | "whole";

export const BacktestConfigSchema = z.object({
  initialCapital: z.number().finite().positive().default(10_000),
  positionSizing: z.enum(["fractional", "whole"]).default("fractional"),
  /** Close any open position at the last bar so it shows up as a trade. */
  liquidateAtEnd: z.boolean().default(true),
  /** Annualisation factor for Sharpe/Sortino; 252 for daily bars. */
  periodsPerYear: z.number().finite().positive().default(252),
  /** Annual risk-free rate as a fraction (0.02 for 2%). */
  riskFreeRate: z.number().finite().min(0).max(1).default(0),
});

export type BacktestConfig = z.infer<typeof BacktestConfigSchema>;
export type BacktestConfigInput = z.input<typeof BacktestConfigSchema>;

/** -----------------------------------------------------------------------
 *  PipelineConfig
 *  -------------------------------------------------------------------- */

export const PipelineConfigSchema = z.object({
  indicators: IndicatorConfigSchema.default({}),
  fusion: FusionConfigSchema.default({}),
  backtest: BacktestConfigSchema.default({}),
});

/** Fully resolved configuration for one pipeline run. */
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

/** Partial configuration accepted from callers; omitted fields take defaults. */
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = PipelineConfigSchema.parse({});

/**
 * Applies defaults and validates a caller supplied configuration.
 *
 * @throws DataValidationError when a field is out of range or windows conflict.
 */
export const resolvePipelineConfig = (input: PipelineConfigInput = {}): PipelineConfig =>
  assertValid(PipelineConfigSchema, input, "PipelineConfig");

/** Largest lookback across every indicator, i.e. the warm-up length. */
export const longestLookback = (config: IndicatorConfig): number =>
  Math.max(
    config.rsiPeriod + 1,
    config.macdSlow + config.macdSignal - 1,
    config.smaLong,
    config.bollingerPeriod,
  );
