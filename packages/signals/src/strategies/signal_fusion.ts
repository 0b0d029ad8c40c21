import { FusionConfigSchema, type FusionConfig, type Strategy } from "@quantlens/sdk";

import { SignalFuser } from "../fusion.js";
import type { StrategyOptions } from "./types.js";

export const name = "signal_fusion" as const;

export const description =
  "Votes RSI, MACD, moving-average crossover and Bollinger states (plus an optional advisor).";

export const schema = FusionConfigSchema;

export type SignalFusionParams = FusionConfig;

export const factory = (params: SignalFusionParams, options: StrategyOptions = {}): Strategy => {
  let fuser = new SignalFuser(params, options);

  return {
    name,
    params,
    onInit(context) {
      fuser = new SignalFuser(params, {
        ...options,
        logger: options.logger?.child({ symbol: context.symbol, runId: context.runId }),
      });
    },
    onBar(_context, _bar, indicators) {
      const decision = fuser.decide(indicators);
      return { ...decision, reason: `votes_${decision.bullishVotes}_${decision.bearishVotes}` };
    },
    onStop() {},
  };
};
