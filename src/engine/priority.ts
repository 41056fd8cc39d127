import { getLexicon } from "./lexicon.js";
import type { Lexicon } from "./lexicon.js";
import type { IntentResult, Priority, SentimentResult } from "./types.js";
import { containsAny } from "./utils.js";

export const PRIORITY_RANK: Readonly<Record<Priority, number>> = {
  critical: 4,
  high: 3,
  medium: 2,
  low: 1,
};

/** Sort comparator, most urgent first. */
export function comparePriority(a: Priority, b: Priority): number {
  return PRIORITY_RANK[b] - PRIORITY_RANK[a];
}

export function rankPriority(
  sentiment: Pick<SentimentResult, "label" | "confidence">,
  intent: Pick<IntentResult, "intent" | "confidence">,
  text: string,
  lexicon: Lexicon = getLexicon()
): Priority {
  const lowered = text.toLowerCase();
  // The local scorer reports no confidence of its own.
  const sentimentConfidence = sentiment.confidence ?? 0;
  const negative = sentiment.label === "negative";
  const complaint = intent.intent === "complaint";

  if (
    (negative && sentimentConfidence > 0.8) ||
    (complaint && intent.confidence > 0.8) ||
    containsAny(lowered, lexicon.priorityKeywords.critical)
  ) {
    return "critical";
  }

  if ((negative && sentimentConfidence > 0.6) || complaint || containsAny(lowered, lexicon.priorityKeywords.high)) {
    return "high";
  }

  if (intent.intent === "question" || sentiment.label === "neutral") {
    return "medium";
  }

  return "low";
}
