import { getLexicon } from "./lexicon.js";
import type { Lexicon } from "./lexicon.js";
import { INTENTS } from "./types.js";
import type { Intent, IntentResult } from "./types.js";

const HITS_FOR_FULL_CONFIDENCE = 3;

/**
 * Keyword-overlap intent classification. The intent with the most substring hits wins;
 * equal counts resolve in `INTENTS` order, so complaint beats question beats recommendation.
 */
export function classifyIntent(text: string, lexicon: Lexicon = getLexicon()): IntentResult {
  const lowered = text.toLowerCase();
  const scores: Partial<Record<Intent, number>> = {};
  let best: { intent: Intent; hits: string[] } | null = null;

  for (const intent of INTENTS) {
    const hits = lexicon.intents[intent].filter((keyword) => lowered.includes(keyword));
    if (hits.length === 0) {
      continue;
    }
    scores[intent] = hits.length;
    if (!best || hits.length > best.hits.length) {
      best = { intent, hits };
    }
  }

  if (!best) {
    return { intent: "neutral_mention", confidence: 0.5, keywordsMatched: [], scores };
  }

  return {
    intent: best.intent,
    confidence: Math.min(1, best.hits.length / HITS_FOR_FULL_CONFIDENCE),
    keywordsMatched: best.hits,
    scores,
  };
}
