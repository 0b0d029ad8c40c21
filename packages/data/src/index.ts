export type { DataRequest, IDataSource } from "./IDataSource.js";
export { CsvSource, createCsvSource, parseCsv } from "./CsvSource.js";
export type { CsvSourceOptions, ParsedCsv } from "./CsvSource.js";
export { filterBarsForRequest, slugify, sortAndDedupeBars } from "./internalUtils.js";
