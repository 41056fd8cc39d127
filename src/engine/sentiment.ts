import Sentiment from "sentiment";
import type { Logger } from "pino";

import { normaliseError } from "./error_utils.js";
import { getLexicon } from "./lexicon.js";
import type { Lexicon, SentimentRule } from "./lexicon.js";
import { componentLogger } from "./logger.js";
import { sentimentFallbackTotal } from "./metrics.js";
import type { SentimentLabel, SentimentResult } from "./types.js";
import { clamp, withTimeout } from "./utils.js";

export const LOCAL_METHOD = "lexicon_enhanced";

const POSITIVE_THRESHOLD = 0.05;
const NEGATIVE_THRESHOLD = -0.05;

export interface BaseEstimate {
  polarity: number;
  subjectivity: number;
}

/** Statistical polarity estimate the rule cascade starts from. */
export type PolarityEstimator = (text: string) => BaseEstimate;

export interface ExternalSentimentVerdict {
  label: SentimentLabel;
  polarity: number;
  confidence: number;
  reasoning: string;
}

export interface ExternalSentimentStrategy {
  readonly name: string;
  analyze(text: string, signal: AbortSignal): Promise<ExternalSentimentVerdict>;
}

const afinn = new Sentiment();

export const afinnEstimator: PolarityEstimator = (text) => {
  const analysis = afinn.analyze(text);
  const tokenCount = analysis.tokens.filter((token) => token.length > 0).length;
  if (tokenCount === 0) {
    return { polarity: 0, subjectivity: 0 };
  }
  const scoredTokens = analysis.positive.length + analysis.negative.length;
  return {
    polarity: clamp(Number.isFinite(analysis.comparative) ? analysis.comparative : 0, -1, 1),
    subjectivity: clamp(scoredTokens / tokenCount, 0, 1),
  };
};

export function labelForPolarity(polarity: number): SentimentLabel {
  if (polarity > POSITIVE_THRESHOLD) return "positive";
  if (polarity < NEGATIVE_THRESHOLD) return "negative";
  return "neutral";
}

function sumMatches(rules: readonly SentimentRule[], text: string): number {
  return rules.reduce((total, rule) => (rule.pattern.test(text) ? total + rule.delta : total), 0);
}

/**
 * Adjusts a base polarity with the lexicon's contextual rules. Positive reinforcement only
 * applies when the base estimate is already positive; the other buckets always apply.
 */
export function applyContextRules(text: string, basePolarity: number, lexicon: Lexicon = getLexicon()): number {
  const lowered = text.toLowerCase();
  const { dissatisfaction, positiveReinforcement, negativeReinforcement } = lexicon.sentimentRules;

  let adjusted = basePolarity + sumMatches(dissatisfaction, lowered);
  if (basePolarity > 0) {
    adjusted += sumMatches(positiveReinforcement, lowered);
  }
  adjusted += sumMatches(negativeReinforcement, lowered);

  return clamp(adjusted, -1, 1);
}

export interface SentimentScorerOptions {
  lexicon?: Lexicon;
  estimator?: PolarityEstimator;
  external?: ExternalSentimentStrategy | null;
  timeoutMs?: number;
  logger?: Logger;
}

export class SentimentScorer {
  private readonly lexicon: Lexicon;
  private readonly estimator: PolarityEstimator;
  private readonly external: ExternalSentimentStrategy | null;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: SentimentScorerOptions = {}) {
    this.lexicon = options.lexicon ?? getLexicon();
    this.estimator = options.estimator ?? afinnEstimator;
    this.external = options.external ?? null;
    this.timeoutMs = options.timeoutMs ?? 8_000;
    this.logger = options.logger ?? componentLogger("sentiment");
  }

  get method(): string {
    return this.external ? this.external.name : LOCAL_METHOD;
  }

  scoreLocal(text: string): SentimentResult {
    const base = this.estimator(text);
    const polarity = applyContextRules(text, clamp(base.polarity, -1, 1), this.lexicon);
    return {
      polarity,
      label: labelForPolarity(polarity),
      subjectivity: clamp(base.subjectivity, 0, 1),
      method: LOCAL_METHOD,
    };
  }

  async score(text: string): Promise<SentimentResult> {
    const strategy = this.external;
    if (!strategy || text.trim().length === 0) {
      return this.scoreLocal(text);
    }

    try {
      const verdict = await withTimeout((signal) => strategy.analyze(text, signal), this.timeoutMs);
      return {
        polarity: clamp(verdict.polarity, -1, 1),
        label: verdict.label,
        subjectivity: clamp(this.estimator(text).subjectivity, 0, 1),
        method: strategy.name,
        confidence: clamp(verdict.confidence, 0, 1),
        reasoning: verdict.reasoning,
      };
    } catch (error) {
      sentimentFallbackTotal.inc({ strategy: strategy.name });
      this.logger.warn(
        { error: normaliseError(error), strategy: strategy.name },
        "External sentiment strategy failed; falling back to lexicon scorer"
      );
      return this.scoreLocal(text);
    }
  }
}
