import type { PolarityEstimator } from "../src/engine/sentiment.js";
import type { ClassifiedMention, Mention, MentionClassification } from "../src/engine/types.js";

export function buildMention(overrides: Partial<Mention> = {}): Mention {
  return {
    externalId: "m1",
    platform: "AppStore",
    text: "",
    authorName: "Anonymous",
    originalDate: new Date("2024-06-01T00:00:00.000Z"),
    isMarked: false,
    ...overrides,
  };
}

export function buildClassified(
  text: string,
  classification: Partial<MentionClassification> = {},
  overrides: Partial<Mention> = {}
): ClassifiedMention {
  return {
    ...buildMention({ text, ...overrides }),
    classification: {
      sentimentLabel: "neutral",
      sentimentPolarity: 0,
      intent: "neutral_mention",
      priority: "low",
      confidenceScore: 0.5,
      keywordsMatched: [],
      topics: [],
      method: "lexicon_enhanced",
      responseSuggested: {
        shouldRespond: false,
        urgency: "low",
        recommendedStyle: "friendly",
        responseType: "acknowledgment",
        keyPoints: [],
      },
      ...classification,
    },
  };
}

/** Keeps the rule cascade deterministic by starting every text from zero. */
export const flatEstimator: PolarityEstimator = () => ({ polarity: 0, subjectivity: 0 });
