import {
  DEFAULT_PIPELINE_CONFIG,
  DecisionSchema,
  FusionConfigSchema,
  assertValid,
  type Action,
  type Decision,
  type FusedDecision,
  type FusionConfig,
  type FusionConfigInput,
  type IndicatorVector,
} from "@quantlens/sdk";
import { silentLogger, type Logger } from "@quantlens/logger";

import { biasesOf, classifySignals } from "./classify.js";

/**
 * Optional external opinion (for example a language-model backed analyst).
 * Its decision is blended in as a single extra vote; returning `null` means
 * "no opinion" and leaves the rule-based result untouched.
 */
export interface Advisor {
  readonly name: string;
  advise(vector: IndicatorVector): Decision | null;
}

const roundConfidence = (value: number): number => Math.round(value * 10) / 10;

const voteOf = (action: Action): "bullish" | "bearish" | null => {
  if (action === "BUY") {
    return "bullish";
  }
  if (action === "SELL") {
    return "bearish";
  }
  return null;
};

/**
 * Combines per-indicator states into one decision.
 *
 * Fewer than `minIndicators` rule-based states yields HOLD with zero
 * confidence; the advisory vote never counts toward that minimum.
 * Confidence is `|bullish - bearish| / voters * 10`, one decimal.
 */
export const fuseSignals = (
  vector: IndicatorVector,
  config: FusionConfig = DEFAULT_PIPELINE_CONFIG.fusion,
  advisory: Decision | null = null,
): FusedDecision => {
  const states = classifySignals(vector, config);
  const biases = biasesOf(states);
  const availableIndicators = biases.length;
  const ruleBullish = biases.filter((bias) => bias === "bullish").length;
  const ruleBearish = biases.filter((bias) => bias === "bearish").length;

  if (availableIndicators < config.minIndicators) {
    return {
      action: "HOLD",
      confidence: 0,
      states,
      bullishVotes: ruleBullish,
      bearishVotes: ruleBearish,
      availableIndicators,
      advisory: null,
    };
  }

  const advisoryVote = advisory ? voteOf(advisory.action) : null;
  const bullishVotes = ruleBullish + (advisoryVote === "bullish" ? 1 : 0);
  const bearishVotes = ruleBearish + (advisoryVote === "bearish" ? 1 : 0);
  const voters = availableIndicators + (advisory ? 1 : 0);
  const margin = bullishVotes - bearishVotes;

  let action: Action = "HOLD";
  if (margin > 0) {
    action = "BUY";
  } else if (margin < 0) {
    action = "SELL";
  }

  return {
    action,
    confidence: margin === 0 ? 0 : roundConfidence((Math.abs(margin) / voters) * 10),
    states,
    bullishVotes,
    bearishVotes,
    availableIndicators,
    advisory,
  };
};

export interface SignalFuserOptions {
  readonly advisor?: Advisor;
  readonly logger?: Logger;
}

/**
 * Rule-based fusion with an optional advisor. Advisor failures are logged
 * and the bar is decided from the indicators alone.
 */
export class SignalFuser {
  public readonly config: FusionConfig;

  private readonly advisor: Advisor | null;
  private readonly logger: Logger;

  public constructor(config: FusionConfigInput = {}, options: SignalFuserOptions = {}) {
    this.config = assertValid(FusionConfigSchema, config, "FusionConfig");
    this.advisor = options.advisor ?? null;
    this.logger = options.logger ?? silentLogger;
  }

  public get hasAdvisor(): boolean {
    return this.advisor !== null;
  }

  public decide(vector: IndicatorVector): FusedDecision {
    return fuseSignals(vector, this.config, this.consultAdvisor(vector));
  }

  private consultAdvisor(vector: IndicatorVector): Decision | null {
    if (!this.advisor) {
      return null;
    }
    let advice: Decision | null;
    try {
      advice = this.advisor.advise(vector);
    } catch (error) {
      this.logger.warn("Advisor failed; using rule-based fusion", {
        advisor: this.advisor.name,
        timestamp: vector.timestamp,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
    if (advice === null) {
      return null;
    }
    const parsed = DecisionSchema.safeParse(advice);
    if (!parsed.success) {
      this.logger.warn("Advisor returned an invalid decision; ignoring it", {
        advisor: this.advisor.name,
        timestamp: vector.timestamp,
      });
      return null;
    }
    return parsed.data;
  }
}
