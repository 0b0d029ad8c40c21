import { z } from "zod";

import { HOLD, type Strategy } from "@quantlens/sdk";

export const name = "rsi_macd" as const;

export const description = "Buys oversold RSI with MACD above its signal line; sells the mirror image.";

export const schema = z
  .object({
    rsiOversold: z.number().min(0).max(100).default(30),
    rsiOverbought: z.number().min(0).max(100).default(70),
  })
  .superRefine((value, ctx) => {
    if (value.rsiOversold >= value.rsiOverbought) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "rsiOversold must be less than rsiOverbought",
        path: ["rsiOversold"],
      });
    }
  });

export type RsiMacdParams = z.infer<typeof schema>;

export const factory = (params: RsiMacdParams): Strategy => ({
  name,
  params,
  onInit() {},
  onBar(_context, _bar, { rsi, macd, macdSignal }) {
    if (rsi === undefined || macd === undefined || macdSignal === undefined) {
      return HOLD;
    }
    if (rsi < params.rsiOversold && macd > macdSignal) {
      return { action: "BUY", confidence: 10, reason: "rsi_oversold_macd_rising" };
    }
    if (rsi > params.rsiOverbought && macd < macdSignal) {
      return { action: "SELL", confidence: 10, reason: "rsi_overbought_macd_falling" };
    }
    return HOLD;
  },
  onStop() {},
});
