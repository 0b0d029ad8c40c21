import { z } from "zod";

import { HOLD, type Strategy } from "@quantlens/sdk";

export const name = "combined" as const;

export const description =
  "Requires RSI, MACD-vs-signal and SMA crossover to agree before entering or exiting.";

export const schema = z
  .object({
    rsiBuyBelow: z.number().min(0).max(100).default(40),
    rsiSellAbove: z.number().min(0).max(100).default(60),
  })
  .superRefine((value, ctx) => {
    if (value.rsiBuyBelow > value.rsiSellAbove) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "rsiBuyBelow must not exceed rsiSellAbove",
        path: ["rsiBuyBelow"],
      });
    }
  });

export type CombinedParams = z.infer<typeof schema>;

export const factory = (params: CombinedParams): Strategy => ({
  name,
  params,
  onInit() {},
  onBar(_context, _bar, { rsi, macd, macdSignal, smaShort, smaLong }) {
    if (
      rsi === undefined ||
      macd === undefined ||
      macdSignal === undefined ||
      smaShort === undefined ||
      smaLong === undefined
    ) {
      return HOLD;
    }
    if (rsi < params.rsiBuyBelow && macd > macdSignal && smaShort > smaLong) {
      return { action: "BUY", confidence: 10, reason: "all_bullish" };
    }
    if (rsi > params.rsiSellAbove && macd < macdSignal && smaShort < smaLong) {
      return { action: "SELL", confidence: 10, reason: "all_bearish" };
    }
    return HOLD;
  },
  onStop() {},
});
