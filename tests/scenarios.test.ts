import { describe, expect, it } from "vitest";

import {
  SentimentScorer,
  buildReputationReport,
  calculateCompositeScore,
  calculateReputationScore,
  classifyMention,
  classifyText,
  detectCrisis,
  normalizeRawMention,
} from "../src/engine/index.js";
import type { ClassifiedMention, Mention, SerpResult } from "../src/engine/index.js";

const now = new Date("2024-06-30T12:00:00.000Z");
const scorer = new SentimentScorer();

const VOCABULARY = [
  "amazing",
  "terrible",
  "love it",
  "highly recommend",
  "worst",
  "hate",
  "alternative to",
  "waste of",
  "not worth",
  "crash",
  "refund",
  "charged twice",
  "great",
  "good",
  "bad",
  "awful",
  "perfect",
  "excellent",
  "slow",
  "app",
  "price",
  "support",
  "how do",
  "why does",
  "never again",
  "okay but",
  "the",
  "update",
];

// Small seeded generator so every run draws the same texts.
function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function randomTexts(count: number, seed: number): string[] {
  const random = seededRandom(seed);
  return Array.from({ length: count }, () => {
    const length = 1 + Math.floor(random() * 12);
    return Array.from({ length }, () => VOCABULARY[Math.floor(random() * VOCABULARY.length)] ?? "app").join(" ");
  });
}

function normalised(raw: Record<string, unknown>): Mention {
  const outcome = normalizeRawMention(raw, now);
  if (!outcome.ok) {
    throw new Error(outcome.reason);
  }
  return outcome.mention;
}

async function classified(mention: Mention): Promise<ClassifiedMention> {
  const result = await classifyMention(mention, { scorer });
  if (!result) {
    throw new Error(`mention ${mention.externalId} has no text`);
  }
  return result;
}

describe("positive app store review", () => {
  it("is a low priority recommendation worth thanking", async () => {
    const mention = await classified(
      normalised({
        platform: "App Store",
        content: "Amazing app, I love it! Highly recommend.",
        rating: 5,
        id: "ios-1",
        date: "2024-06-20T08:00:00Z",
      })
    );

    expect(mention.platform).toBe("AppStore");
    expect(mention.classification).toMatchObject({
      sentimentLabel: "positive",
      sentimentPolarity: 1,
      intent: "recommendation",
      priority: "low",
      keywordsMatched: ["app"],
      topics: [],
      method: "lexicon_enhanced",
    });
    expect(mention.classification.confidenceScore).toBeCloseTo(1 / 3, 10);
    expect(mention.classification.responseSuggested).toMatchObject({
      shouldRespond: false,
      responseType: "gratitude_and_engagement",
    });
  });
});

describe("critical billing complaint", () => {
  it("is escalated and counted as a crisis signal", async () => {
    const mention = await classified(
      normalised({
        platform: "trustpilot",
        content: "The app keeps crashing and I was charged twice. Terrible, I want a refund.",
        id: "tp-7",
        date: "2024-06-25T08:00:00Z",
      })
    );

    expect(mention.classification).toMatchObject({
      sentimentLabel: "negative",
      intent: "complaint",
      priority: "critical",
      topics: ["bugs"],
    });
    expect(mention.classification.sentimentPolarity).toBeLessThanOrEqual(-0.4);
    expect(mention.classification.responseSuggested).toMatchObject({
      shouldRespond: true,
      urgency: "critical",
      recommendedStyle: "official",
      responseType: "apology_and_resolution",
    });
    expect(detectCrisis([mention]).categoryBreakdown).toEqual({ technical: 1, payment: 1 });
  });
});

describe("bounds", () => {
  const texts = randomTexts(300, 20240630);

  it("keeps polarity, subjectivity and confidence in range", async () => {
    for (const text of texts) {
      const local = scorer.scoreLocal(text);
      expect(local.polarity).toBeGreaterThanOrEqual(-1);
      expect(local.polarity).toBeLessThanOrEqual(1);
      expect(local.subjectivity).toBeGreaterThanOrEqual(0);
      expect(local.subjectivity).toBeLessThanOrEqual(1);

      const classification = await classifyText(text, { scorer });
      expect(classification).not.toBeNull();
      if (classification) {
        expect(Math.abs(classification.sentimentPolarity)).toBeLessThanOrEqual(1);
        expect(classification.confidenceScore).toBeGreaterThanOrEqual(0);
        expect(classification.confidenceScore).toBeLessThanOrEqual(1);
      }
    }
  });

  it("keeps every score between 0 and 100", async () => {
    const mentions = await Promise.all(
      texts.map((text, index) =>
        classified(normalised({ platform: "reddit", content: text, id: `r-${index}`, date: "2024-06-29T00:00:00Z" }))
      )
    );
    const random = seededRandom(7);
    const serpResults: SerpResult[] = texts.slice(0, 20).map((text, index) => ({
      query: random() < 0.5 ? "acme complaint" : "acme review",
      title: `Result ${index}`,
      snippet: text,
      source: "example.com",
      link: `https://example.com/${index}`,
      position: index + 1,
    }));

    for (let start = 0; start < mentions.length; start += 25) {
      const slice = mentions.slice(start, start + 1 + Math.floor(random() * 40));
      const weighted = calculateReputationScore(slice);
      const composite = calculateCompositeScore({ mentions: slice, serpResults, issueCount: Math.floor(random() * 30) });

      for (const score of [weighted, composite]) {
        expect(score).toBeGreaterThanOrEqual(0);
        expect(score).toBeLessThanOrEqual(100);
      }
    }

    const report = buildReputationReport({ product: "acme", current: mentions, previous: [], serpResults, now });
    expect(report.snapshot.overallScore).toBeGreaterThanOrEqual(0);
    expect(report.snapshot.overallScore).toBeLessThanOrEqual(100);
  });
});

describe("repeatability", () => {
  it("classifies the same text the same way twice", async () => {
    const text = "Used to be great, now the app is slow and support never answers. How do I get a refund?";

    expect(await classifyText(text, { scorer })).toEqual(await classifyText(text, { scorer }));
  });

  it("builds identical reports from identical input", async () => {
    const current = await Promise.all(
      randomTexts(40, 99).map((text, index) =>
        classified(normalised({ platform: "google play", content: text, id: `g-${index}`, date: "2024-06-28T00:00:00Z" }))
      )
    );
    const previous = current.slice(0, 10);
    const input = { product: "acme", current, previous, serpResults: [], now };

    expect(buildReputationReport(input)).toEqual(buildReputationReport(input));
  });
});
