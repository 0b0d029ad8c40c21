/**
 * Technical indicators over OHLCV bars.
 * @packageDocumentation
 */

export * from "./series.js";
export * from "./engine.js";
