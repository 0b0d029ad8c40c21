import { readFile } from "node:fs/promises";
import { join } from "node:path";

import { BarSchema, type Bar } from "@quantlens/sdk";
import { silentLogger, type Logger } from "@quantlens/logger";

import type { DataRequest, IDataSource } from "./IDataSource.js";
import { filterBarsForRequest, slugify, sortAndDedupeBars } from "./internalUtils.js";

const DEFAULT_DATASETS_DIR = join(process.cwd(), "storage", "datasets");
const EXPECTED_COLUMNS = ["timestamp", "open", "high", "low", "close", "volume"] as const;

export interface CsvSourceOptions {
  readonly datasetsDir?: string;
  readonly logger?: Logger;
}

export interface ParsedCsv {
  readonly bars: Bar[];
  /** 1-based line numbers of rows that could not be turned into a bar. */
  readonly skippedLines: number[];
}

/**
 * CSV-backed data source reading `<datasetsDir>/<symbol>_<timeframe>.csv`.
 */
export class CsvSource implements IDataSource {
  public readonly id = "csv";

  private readonly datasetsDir: string;
  private readonly logger: Logger;

  public constructor(options: CsvSourceOptions = {}) {
    this.datasetsDir = options.datasetsDir ?? DEFAULT_DATASETS_DIR;
    this.logger = options.logger ?? silentLogger;
  }

  public resolveDatasetPath(request: Pick<DataRequest, "symbol" | "timeframe">): string {
    const filename = `${slugify(request.symbol)}_${slugify(request.timeframe)}.csv`;
    return join(this.datasetsDir, filename);
  }

  /**
   * Returns an empty list when the dataset file does not exist.
   */
  public async loadBars(request: DataRequest): Promise<ReadonlyArray<Bar>> {
    const datasetPath = this.resolveDatasetPath(request);

    let content: string;
    try {
      content = await readFile(datasetPath, { encoding: "utf-8" });
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.warn("Dataset not found", { symbol: request.symbol, path: datasetPath });
        return [];
      }
      throw error;
    }

    const { bars, skippedLines } = parseCsv(content);
    if (skippedLines.length > 0) {
      this.logger.warn("Skipped unparsable CSV rows", {
        symbol: request.symbol,
        path: datasetPath,
        lines: skippedLines,
      });
    }
    return filterBarsForRequest(bars, request);
  }
}

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * Parses `timestamp,open,high,low,close,volume` rows after a header line.
 * Rows that fail bar validation are skipped; the rest come back sorted and
 * de-duplicated.
 */
export const parseCsv = (content: string): ParsedCsv => {
  const lines = content.split(/\r?\n/u).map((line) => line.trim());
  const skippedLines: number[] = [];
  const bars: Bar[] = [];

  lines.forEach((line, idx) => {
    if (idx === 0 || line.length === 0) {
      return;
    }
    const bar = toBar(line);
    if (bar) {
      bars.push(bar);
    } else {
      skippedLines.push(idx + 1);
    }
  });

  return { bars: sortAndDedupeBars(bars), skippedLines };
};

const toBar = (row: string): Bar | null => {
  const parts = row.split(",").map((part) => part.trim());
  if (parts.length < EXPECTED_COLUMNS.length) {
    return null;
  }
  const [timestamp, open, high, low, close, volume] = parts;
  const parsed = BarSchema.safeParse({
    timestamp,
    open: toNumber(open),
    high: toNumber(high),
    low: toNumber(low),
    close: toNumber(close),
    volume: toNumber(volume),
  });
  return parsed.success ? parsed.data : null;
};

const toNumber = (value: string): number => (value.length === 0 ? Number.NaN : Number(value));

/**
 * Factory used by callers to construct the CSV data source.
 */
export const createCsvSource = (options?: CsvSourceOptions): CsvSource => {
  return new CsvSource(options);
};
