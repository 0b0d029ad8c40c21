import { assertValid, type Strategy } from "@quantlens/sdk";

import * as combined from "./combined.js";
import * as maCrossover from "./ma_crossover.js";
import * as rsiMacd from "./rsi_macd.js";
import * as signalFusion from "./signal_fusion.js";
import type { StrategyOptions, StrategyPreset } from "./types.js";

export { combined, maCrossover, rsiMacd, signalFusion };
export type { StrategyOptions, StrategyPreset } from "./types.js";

export type StrategyName =
  | typeof signalFusion.name
  | typeof rsiMacd.name
  | typeof maCrossover.name
  | typeof combined.name;

export interface RegisteredStrategy {
  readonly name: StrategyName;
  readonly description: string;
  create(params?: unknown, options?: StrategyOptions): Strategy;
}

const register = <P>(preset: StrategyPreset<P> & { readonly name: StrategyName }): RegisteredStrategy => ({
  name: preset.name,
  description: preset.description,
  create: (params = {}, options = {}) =>
    preset.factory(assertValid(preset.schema, params, `${preset.name} params`), options),
});

export const STRATEGY_REGISTRY: Readonly<Record<StrategyName, RegisteredStrategy>> = {
  [signalFusion.name]: register(signalFusion),
  [rsiMacd.name]: register(rsiMacd),
  [maCrossover.name]: register(maCrossover),
  [combined.name]: register(combined),
};

export const strategyList = Object.values(STRATEGY_REGISTRY);

export const isStrategyName = (value: string): value is StrategyName =>
  Object.prototype.hasOwnProperty.call(STRATEGY_REGISTRY, value);

/**
 * Instantiates a preset strategy by name with validated params.
 *
 * @throws Error when the name is unknown.
 * @throws DataValidationError when the params do not match the preset schema.
 */
export const createStrategy = (
  name: string,
  params: unknown = {},
  options: StrategyOptions = {},
): Strategy => {
  if (!isStrategyName(name)) {
    throw new Error(`Unknown strategy "${name}"`);
  }
  return STRATEGY_REGISTRY[name].create(params, options);
};
