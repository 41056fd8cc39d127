import { getLexicon } from "./lexicon.js";
import type { Lexicon, TrendTopicDefinition } from "./lexicon.js";
import type { ClassifiedMention, SentimentLabel, TopicTrend } from "./types.js";
import { round1 } from "./utils.js";

const MAX_TREND = 500;
const MIN_TREND = -100;
const SMALL_SAMPLE = 3;
const SMALL_SAMPLE_MAX_TREND = 300;
const SMALL_SAMPLE_MIN_TREND = -75;

/**
 * Period-over-period change in mention count, capped so that small samples do not produce
 * four-digit percentages.
 */
export function calculateTopicTrend(current: number, previous: number): number {
  if (previous === 0) {
    return current > 0 ? 100 : 0;
  }
  if (current === 0) {
    return -100;
  }

  const raw = ((current - previous) / previous) * 100;
  let trend: number;
  if (previous <= SMALL_SAMPLE) {
    if (current > previous * 3) {
      trend = Math.min(SMALL_SAMPLE_MAX_TREND, raw);
    } else if (current < previous / 3) {
      trend = Math.max(SMALL_SAMPLE_MIN_TREND, raw);
    } else {
      trend = raw;
    }
  } else {
    trend = Math.max(MIN_TREND, Math.min(MAX_TREND, raw));
  }

  return round1(trend);
}

export function calculateTopicPriority(sentimentScore: number, trendPercentage: number, mentions: number): number {
  let priority = 0;

  if (sentimentScore < -20) {
    priority += 3;
  } else if (sentimentScore < 0) {
    priority += 1;
  }

  if (trendPercentage < -20) {
    priority += 2;
  } else if (trendPercentage > 50) {
    priority += 1;
  }

  if (mentions > 20) {
    priority += 2;
  } else if (mentions > 10) {
    priority += 1;
  }

  return priority;
}

export function mentionMatchesTopic(mention: ClassifiedMention, topic: TrendTopicDefinition): boolean {
  const content = mention.text.toLowerCase();
  const topics: readonly string[] = mention.classification.topics;
  const keywords = mention.classification.keywordsMatched;
  return topic.keywords.some(
    (keyword) => content.includes(keyword) || topics.includes(keyword) || keywords.includes(keyword)
  );
}

export function analyzeTopicTrends(
  current: readonly ClassifiedMention[],
  previous: readonly ClassifiedMention[],
  lexicon: Lexicon = getLexicon()
): TopicTrend[] {
  const trends: TopicTrend[] = [];

  for (const topic of lexicon.trendTopics) {
    const currentMatches = current.filter((mention) => mentionMatchesTopic(mention, topic));
    if (currentMatches.length === 0) {
      continue;
    }
    const previousCount = previous.filter((mention) => mentionMatchesTopic(mention, topic)).length;

    const breakdown: Record<SentimentLabel, number> = { positive: 0, negative: 0, neutral: 0 };
    for (const mention of currentMatches) {
      breakdown[mention.classification.sentimentLabel] += 1;
    }

    const total = currentMatches.length;
    const sentimentScore = ((breakdown.positive - breakdown.negative) / total) * 100;
    const trendPercentage = calculateTopicTrend(total, previousCount);

    trends.push({
      topic: topic.name,
      mentions: total,
      previousMentions: previousCount,
      sentimentScore: round1(sentimentScore),
      trendPercentage,
      sentimentBreakdown: breakdown,
      priority: calculateTopicPriority(sentimentScore, trendPercentage, total),
    });
  }

  return trends.sort((a, b) => b.priority - a.priority || b.mentions - a.mentions);
}
