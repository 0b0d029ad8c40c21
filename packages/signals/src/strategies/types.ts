import type { z } from "zod";

import type { Strategy } from "@quantlens/sdk";
import type { Logger } from "@quantlens/logger";

import type { Advisor } from "../fusion.js";

export interface StrategyOptions {
  readonly advisor?: Advisor;
  readonly logger?: Logger;
}

/**
 * A named strategy module: validated params in, {@link Strategy} out.
 */
export interface StrategyPreset<P> {
  readonly name: string;
  readonly description: string;
  readonly schema: z.ZodType<P, z.ZodTypeDef, unknown>;
  readonly factory: (params: P, options?: StrategyOptions) => Strategy;
}
