import { z } from "zod";

import {
  PERIODS_PER_YEAR_BY_TIMEFRAME,
  TimeframeSchema,
  assertValid,
  type PipelineConfigInput,
  type Timeframe,
} from "@quantlens/sdk";

const blankToUndefined = (value: unknown): unknown =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalNumber = z.preprocess(blankToUndefined, z.coerce.number().finite().optional());
const optionalInt = z.preprocess(blankToUndefined, z.coerce.number().int().optional());
const optionalBoolean = z.preprocess(
  blankToUndefined,
  z
    .enum(["true", "false"])
    .transform((value) => value === "true")
    .optional(),
);

/**
 * Environment read by the CLI. Numeric settings left unset fall through to
 * the pipeline defaults.
 */
export const CliEnvSchema = z.object({
  INITIAL_CAPITAL: optionalNumber,
  RSI_PERIOD: optionalInt,
  MACD_FAST: optionalInt,
  MACD_SLOW: optionalInt,
  MACD_SIGNAL: optionalInt,
  SMA_SHORT: optionalInt,
  SMA_LONG: optionalInt,
  BOLLINGER_PERIOD: optionalInt,
  BOLLINGER_STD_DEV: optionalNumber,
  RSI_OVERSOLD: optionalNumber,
  RSI_OVERBOUGHT: optionalNumber,
  MIN_INDICATORS: optionalInt,
  POSITION_SIZING: z.preprocess(blankToUndefined, z.enum(["fractional", "whole"]).optional()),
  LIQUIDATE_AT_END: optionalBoolean,
  PERIODS_PER_YEAR: optionalNumber,
  RISK_FREE_RATE: optionalNumber,
  DATASETS_DIR: z.preprocess(blankToUndefined, z.string().default("storage/datasets")),
  OUTPUT_DIR: z.preprocess(blankToUndefined, z.string().default("storage/runs")),
  TIMEFRAME: z.preprocess(blankToUndefined, TimeframeSchema.default("1d")),
  STRATEGY: z.preprocess(blankToUndefined, z.string().default("signal_fusion")),
  LOG_LEVEL: z.preprocess(
    (value) => (typeof value === "string" ? blankToUndefined(value.toLowerCase()) : value),
    z.enum(["debug", "info", "warn", "error"]).optional(),
  ),
});

export type CliEnv = z.infer<typeof CliEnvSchema>;

/**
 * @throws DataValidationError naming each offending variable.
 */
export const loadCliEnv = (env: NodeJS.ProcessEnv = process.env): CliEnv =>
  assertValid(CliEnvSchema, env, "environment");

/**
 * Maps the environment onto a pipeline config. `PERIODS_PER_YEAR` falls back
 * to the bar count per year of `timeframe`.
 */
export const toPipelineConfig = (
  env: CliEnv,
  timeframe: Timeframe = env.TIMEFRAME,
): PipelineConfigInput => ({
  indicators: {
    rsiPeriod: env.RSI_PERIOD,
    macdFast: env.MACD_FAST,
    macdSlow: env.MACD_SLOW,
    macdSignal: env.MACD_SIGNAL,
    smaShort: env.SMA_SHORT,
    smaLong: env.SMA_LONG,
    bollingerPeriod: env.BOLLINGER_PERIOD,
    bollingerStdDev: env.BOLLINGER_STD_DEV,
  },
  fusion: {
    rsiOversold: env.RSI_OVERSOLD,
    rsiOverbought: env.RSI_OVERBOUGHT,
    minIndicators: env.MIN_INDICATORS,
  },
  backtest: {
    initialCapital: env.INITIAL_CAPITAL,
    positionSizing: env.POSITION_SIZING,
    liquidateAtEnd: env.LIQUIDATE_AT_END,
    periodsPerYear: env.PERIODS_PER_YEAR ?? PERIODS_PER_YEAR_BY_TIMEFRAME[timeframe],
    riskFreeRate: env.RISK_FREE_RATE,
  },
});
