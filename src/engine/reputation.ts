import { getLexicon } from "./lexicon.js";
import type { Lexicon } from "./lexicon.js";
import type {
  ClassifiedMention,
  CrisisLevel,
  Intent,
  Priority,
  ReputationTrend,
  ScoreInterpretation,
  SentimentLabel,
  SerpResult,
  TrendDirection,
} from "./types.js";
import { clamp, round1 } from "./utils.js";

export const NEUTRAL_BASELINE = 50;

const SENTIMENT_VALUE: Readonly<Record<SentimentLabel, number>> = {
  positive: 80,
  negative: 20,
  neutral: 50,
};

const PRIORITY_WEIGHT: Readonly<Record<Priority, number>> = {
  critical: 3,
  high: 2,
  medium: 1.5,
  low: 1,
};

const INTENT_MODIFIER: Readonly<Record<Intent, number>> = {
  complaint: 2,
  recommendation: 1.5,
  question: 1,
  neutral_mention: 1,
};

const DEFAULT_CONFIDENCE_WEIGHT = 0.5;

export function mentionWeight(mention: ClassifiedMention): number {
  const { priority, intent, confidenceScore } = mention.classification;
  const confidence = confidenceScore > 0 ? confidenceScore : DEFAULT_CONFIDENCE_WEIGHT;
  return PRIORITY_WEIGHT[priority] * INTENT_MODIFIER[intent] * confidence;
}

/**
 * Weighted 0-100 score over classified mentions. Urgent complaints pull hardest; an empty
 * set scores the neutral baseline.
 */
export function calculateReputationScore(mentions: readonly ClassifiedMention[]): number {
  let weightedScore = 0;
  let totalWeight = 0;

  for (const mention of mentions) {
    const weight = mentionWeight(mention);
    weightedScore += SENTIMENT_VALUE[mention.classification.sentimentLabel] * weight;
    totalWeight += weight;
  }

  if (totalWeight <= 0) {
    return NEUTRAL_BASELINE;
  }
  return clamp(weightedScore / totalWeight, 0, 100);
}

export function compareReputation(
  current: readonly ClassifiedMention[],
  previous: readonly ClassifiedMention[]
): ReputationTrend {
  const currentScore = calculateReputationScore(current);
  const previousScore = calculateReputationScore(previous);

  let percentageChange = 0;
  let direction: TrendDirection = "no_change";
  if (previousScore > 0) {
    const change = ((currentScore - previousScore) / previousScore) * 100;
    direction = change > 0 ? "increase" : change < 0 ? "decrease" : "no_change";
    percentageChange = round1(change);
  }

  return {
    currentScore: round1(currentScore),
    previousScore: round1(previousScore),
    percentageChange,
    direction,
    description: `${percentageChange > 0 ? "+" : ""}${percentageChange.toFixed(1)}% from last period`,
    currentMentions: current.length,
    previousMentions: previous.length,
  };
}

export interface CompositeScoreInput {
  mentions: readonly ClassifiedMention[];
  serpResults: readonly SerpResult[];
  issueCount: number;
}

/**
 * Review sentiment contributes up to 50 points, the share of search results outside
 * negative queries up to 30, and an issue allowance of 20 loses 2 points per issue.
 */
export function calculateCompositeScore(input: CompositeScoreInput, lexicon: Lexicon = getLexicon()): number {
  const { mentions, serpResults, issueCount } = input;

  let sentimentComponent = 0;
  if (mentions.length > 0) {
    const average = averagePolarity(mentions);
    sentimentComponent = (average + 1) * 25;
  }

  let serpComponent = 30;
  if (serpResults.length > 0) {
    const negative = serpResults.filter((result) => {
      const query = result.query.toLowerCase();
      return lexicon.serp.negativeQueryTerms.some((term) => query.includes(term));
    }).length;
    serpComponent = 30 * (1 - negative / serpResults.length);
  }

  const issuePenalty = Math.min(Math.max(0, issueCount) * 2, 20);

  return clamp(sentimentComponent + serpComponent + (20 - issuePenalty), 0, 100);
}

export function averagePolarity(mentions: readonly ClassifiedMention[]): number {
  if (mentions.length === 0) {
    return 0;
  }
  const total = mentions.reduce((sum, mention) => sum + mention.classification.sentimentPolarity, 0);
  return clamp(total / mentions.length, -1, 1);
}

export function interpretScore(score: number): ScoreInterpretation {
  if (score >= 80) {
    return { status: "excellent", description: "Strong positive reputation", action: "maintain current practices" };
  }
  if (score >= 60) {
    return {
      status: "good",
      description: "Generally positive with improvement opportunities",
      action: "address moderate issues",
    };
  }
  if (score >= 40) {
    return {
      status: "concerning",
      description: "Mixed reputation with notable issues",
      action: "immediate improvement plan needed",
    };
  }
  return { status: "critical", description: "Significant reputation damage", action: "urgent intervention required" };
}

export function assessOverallHealth(score: number, crisisLevel: CrisisLevel): string {
  if (crisisLevel === "high" || crisisLevel === "critical") {
    return "Critical - Immediate attention required";
  }
  if (score >= 80) return "Healthy - Reputation is strong";
  if (score >= 60) return "Stable - Minor improvements needed";
  if (score >= 40) return "At Risk - Significant issues present";
  return "Damaged - Urgent intervention required";
}
