import type { Bar, ISODate, Timeframe } from "@quantlens/sdk";

/**
 * Identifies one bar series. `start` and `end` are inclusive bounds.
 */
export interface DataRequest {
  readonly symbol: string;
  readonly timeframe: Timeframe;
  readonly start?: ISODate;
  readonly end?: ISODate;
}

/**
 * Generic contract for loading market data series. Implementations return
 * bars sorted by timestamp with no duplicates.
 */
export interface IDataSource {
  readonly id: string;
  loadBars(request: DataRequest): Promise<ReadonlyArray<Bar>>;
}
