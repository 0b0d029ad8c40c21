import type { Bar } from "@quantlens/sdk";

import type { DataRequest } from "./IDataSource.js";

/**
 * Shared helpers used across data sources to enforce consistent behaviour.
 */
export const slugify = (value: string): string => {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/gu, "_")
    .replace(/^_+|_+$/gu, "");
};

const parseTimestamp = (value: string): number | null => {
  const epoch = Date.parse(value);
  if (Number.isNaN(epoch)) {
    return null;
  }
  return epoch;
};

/**
 * Filters bars by the optional start/end timestamps inside a {@link DataRequest}.
 */
export const filterBarsForRequest = (
  bars: ReadonlyArray<Bar>,
  request: Pick<DataRequest, "start" | "end">,
): ReadonlyArray<Bar> => {
  const startEpoch = parseTimestamp(request.start ?? "");
  const endEpoch = parseTimestamp(request.end ?? "");
  if (startEpoch === null && endEpoch === null) {
    return bars;
  }

  return bars.filter((bar) => {
    const barEpoch = parseTimestamp(bar.timestamp);
    if (barEpoch === null) {
      return false;
    }
    const afterStart = startEpoch === null ? true : barEpoch >= startEpoch;
    const beforeEnd = endEpoch === null ? true : barEpoch <= endEpoch;
    return afterStart && beforeEnd;
  });
};

/**
 * Orders bars by time and keeps the last bar seen for each instant, so
 * `2024-01-02` and `2024-01-02T00:00:00Z` count as the same bar.
 */
export const sortAndDedupeBars = (bars: ReadonlyArray<Bar>): Bar[] => {
  const byEpoch = new Map<number, Bar>();
  for (const bar of bars) {
    const epoch = parseTimestamp(bar.timestamp);
    if (epoch !== null) {
      byEpoch.set(epoch, bar);
    }
  }
  return Array.from(byEpoch.entries())
    .sort(([a], [b]) => a - b)
    .map(([, bar]) => bar);
};
