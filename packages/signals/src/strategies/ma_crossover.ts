import { z } from "zod";

import { HOLD, type Strategy } from "@quantlens/sdk";

export const name = "ma_crossover" as const;

export const description = "Long while the short SMA is above the long SMA, flat otherwise.";

export const schema = z.object({}).strict();

export type MaCrossoverParams = z.infer<typeof schema>;

export const factory = (params: MaCrossoverParams): Strategy => ({
  name,
  params,
  onInit() {},
  onBar(_context, _bar, { smaShort, smaLong }) {
    if (smaShort === undefined || smaLong === undefined) {
      return HOLD;
    }
    if (smaShort > smaLong) {
      return { action: "BUY", confidence: 10, reason: "short_sma_above_long" };
    }
    if (smaShort < smaLong) {
      return { action: "SELL", confidence: 10, reason: "short_sma_below_long" };
    }
    return HOLD;
  },
  onStop() {},
});
