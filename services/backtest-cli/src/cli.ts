import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { parseArgs } from "node:util";

import { z } from "zod";

import { TimeframeSchema, assertValid, type BacktestResult, type Timeframe } from "@quantlens/sdk";
import { CsvSource, slugify, type IDataSource } from "@quantlens/data";
import { generateStrategy, runBacktest } from "@quantlens/engine";
import { buildReportMarkdown } from "@quantlens/report";
import type { Recommendation } from "@quantlens/signals";
import type { Logger } from "@quantlens/logger";

import { toPipelineConfig, type CliEnv } from "./env.js";

export const USAGE = [
  "Usage: quantlens <backtest|recommend> <SYMBOL> [options]",
  "",
  "Options:",
  "  -t, --timeframe <1d|1h|15m|1m>  Bar interval (default: TIMEFRAME or 1d)",
  "  -s, --strategy <name>           Strategy preset (default: STRATEGY or signal_fusion)",
  "      --start <ISO date>          First bar to include",
  "      --end <ISO date>            Last bar to include",
  "      --run-id <id>               Output folder name for backtest artifacts",
].join("\n");

const isoDate = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: "must be an ISO-8601 date" });

const CliArgsSchema = z.object({
  command: z.enum(["backtest", "recommend"]),
  symbol: z
    .string()
    .min(1)
    .transform((value) => value.toUpperCase()),
  timeframe: TimeframeSchema.optional(),
  strategy: z.string().min(1).optional(),
  start: isoDate.optional(),
  end: isoDate.optional(),
  runId: z
    .string()
    .regex(/^[A-Za-z0-9._-]+$/u, "may only contain letters, digits, dot, dash and underscore")
    .optional(),
});

export type CliArgs = z.infer<typeof CliArgsSchema>;

/**
 * @throws DataValidationError for an unknown command or a bad option value.
 */
export const parseCliArgs = (argv: ReadonlyArray<string>): CliArgs => {
  const { values, positionals } = parseArgs({
    args: [...argv],
    allowPositionals: true,
    strict: true,
    options: {
      timeframe: { type: "string", short: "t" },
      strategy: { type: "string", short: "s" },
      start: { type: "string" },
      end: { type: "string" },
      "run-id": { type: "string" },
    },
  });
  const [command, symbol] = positionals;
  return assertValid(
    CliArgsSchema,
    {
      command,
      symbol,
      timeframe: values.timeframe,
      strategy: values.strategy,
      start: values.start,
      end: values.end,
      runId: values["run-id"],
    },
    "arguments",
  );
};

export const makeRunId = (symbol: string, now: Date): string => {
  const slug = slugify(symbol).replace(/_/gu, "-");
  const timestamp = now
    .toISOString()
    .replace(/[^0-9]+/gu, "")
    .slice(0, 14);
  return `${slug.length > 0 ? slug : "run"}-${timestamp}`;
};

export interface RunArtifacts {
  readonly runId: string;
  readonly symbol: string;
  readonly timeframe: Timeframe;
  readonly strategy: string;
  readonly result: BacktestResult;
  readonly recommendation?: Recommendation;
}

/** Writes the artifacts of one run and returns the run directory. */
export type ArtifactWriter = (artifacts: RunArtifacts) => Promise<string>;

export interface ArtifactWriterOptions {
  readonly outputDir: string;
  readonly now?: () => Date;
}

/**
 * Writes `result.json` and `report.md` into `<outputDir>/<runId>/`.
 */
export const createArtifactWriter = (options: ArtifactWriterOptions): ArtifactWriter => {
  const now = options.now ?? (() => new Date());
  return async (artifacts) => {
    const runDir = join(options.outputDir, artifacts.runId);
    await mkdir(runDir, { recursive: true });

    const manifest = {
      runId: artifacts.runId,
      symbol: artifacts.symbol,
      timeframe: artifacts.timeframe,
      strategy: artifacts.strategy,
      createdAt: now().toISOString(),
      result: artifacts.result,
    };
    await writeFile(join(runDir, "result.json"), `${JSON.stringify(manifest, null, 2)}\n`, {
      encoding: "utf-8",
    });

    const report = buildReportMarkdown({
      symbol: artifacts.symbol,
      result: artifacts.result,
      runId: artifacts.runId,
      strategyName: artifacts.strategy,
      recommendation: artifacts.recommendation,
    });
    await writeFile(join(runDir, "report.md"), report, { encoding: "utf-8" });
    return runDir;
  };
};

export interface CliDependencies {
  readonly env: CliEnv;
  readonly logger: Logger;
  readonly source?: IDataSource;
  readonly writeArtifacts?: ArtifactWriter;
  readonly stdout?: (text: string) => void;
  readonly now?: () => Date;
}

/**
 * Runs one CLI invocation and resolves to the process exit code. Failures
 * are logged, never thrown.
 */
export const runCli = async (argv: ReadonlyArray<string>, deps: CliDependencies): Promise<number> => {
  const { env, logger } = deps;
  const stdout = deps.stdout ?? ((text: string) => process.stdout.write(`${text}\n`));
  const now = deps.now ?? (() => new Date());

  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    logger.error("Invalid arguments", { error });
    stdout(USAGE);
    return 1;
  }

  const timeframe = args.timeframe ?? env.TIMEFRAME;
  const strategy = args.strategy ?? env.STRATEGY;
  const config = toPipelineConfig(env, timeframe);
  const source = deps.source ?? new CsvSource({ datasetsDir: env.DATASETS_DIR, logger });

  try {
    const bars = await source.loadBars({
      symbol: args.symbol,
      timeframe,
      start: args.start,
      end: args.end,
    });
    if (bars.length === 0) {
      throw new Error(`No bars loaded for ${args.symbol} ${timeframe} from ${source.id}`);
    }

    if (args.command === "recommend") {
      const recommendation = generateStrategy(args.symbol, bars, { config, logger });
      stdout(JSON.stringify(recommendation, null, 2));
      return 0;
    }

    const runId = args.runId ?? makeRunId(args.symbol, now());
    const result = runBacktest(bars, {
      config,
      strategy: { name: strategy },
      symbol: args.symbol,
      runId,
      logger,
    });
    const recommendation = generateStrategy(args.symbol, bars, { config, runId, logger });
    const writeArtifacts =
      deps.writeArtifacts ?? createArtifactWriter({ outputDir: env.OUTPUT_DIR, now });
    const runDir = await writeArtifacts({
      runId,
      symbol: args.symbol,
      timeframe,
      strategy,
      result,
      recommendation,
    });

    stdout(
      JSON.stringify(
        {
          runId,
          runDir,
          finalValue: result.finalValue,
          totalReturnPct: result.totalReturnPct,
          totalTrades: result.totalTrades,
          winRate: result.winRate,
          maxDrawdown: result.maxDrawdown,
          sharpeRatio: result.sharpeRatio,
        },
        null,
        2,
      ),
    );
    return 0;
  } catch (error) {
    logger.error("Command failed", { command: args.command, symbol: args.symbol, error });
    return 1;
  }
};
