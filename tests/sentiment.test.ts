import { describe, expect, it, vi } from "vitest";

import { LOCAL_METHOD, SentimentScorer, applyContextRules, labelForPolarity } from "../src/engine/sentiment.js";
import type { ExternalSentimentStrategy } from "../src/engine/sentiment.js";
import { flatEstimator } from "./helpers.js";

function strategy(analyze: ExternalSentimentStrategy["analyze"]): ExternalSentimentStrategy {
  return { name: "fake-model", analyze };
}

describe("applyContextRules", () => {
  it("stacks dissatisfaction penalties on a mildly positive base", () => {
    const adjusted = applyContextRules("The service is fine but I'm looking for alternatives to Uber", 0.2);

    expect(adjusted).toBeCloseTo(-0.4, 5);
  });

  it("only reinforces positives when the base is already positive", () => {
    expect(applyContextRules("amazing app", 0.1)).toBeCloseTo(0.4, 5);
    expect(applyContextRules("amazing app", 0)).toBe(0);
    expect(applyContextRules("amazing app", -0.1)).toBeCloseTo(-0.1, 5);
  });

  it("applies negative reinforcement regardless of the base", () => {
    expect(applyContextRules("worst app ever", 0)).toBeCloseTo(-0.4, 5);
  });

  it("clamps to the polarity range", () => {
    expect(applyContextRules("terrible, awful, horrible, the worst", -0.5)).toBe(-1);
  });
});

describe("labelForPolarity", () => {
  it("uses a small neutral band", () => {
    expect(labelForPolarity(0.06)).toBe("positive");
    expect(labelForPolarity(0.05)).toBe("neutral");
    expect(labelForPolarity(-0.05)).toBe("neutral");
    expect(labelForPolarity(-0.06)).toBe("negative");
  });
});

describe("SentimentScorer", () => {
  it("scores enthusiastic feedback as positive", async () => {
    const result = await new SentimentScorer().score("This app is amazing and so fast!");

    expect(result.label).toBe("positive");
    expect(result.method).toBe(LOCAL_METHOD);
    expect(result.confidence).toBeUndefined();
  });

  it("treats a search for alternatives as dissatisfaction", async () => {
    const result = await new SentimentScorer().score("The service is fine but I'm looking for alternatives to Uber");

    expect(result.label).toBe("negative");
  });

  it("scores empty text as neutral", () => {
    const result = new SentimentScorer({ estimator: flatEstimator }).scoreLocal("");

    expect(result).toEqual({ polarity: 0, label: "neutral", subjectivity: 0, method: LOCAL_METHOD });
  });

  it("uses the external verdict when the strategy answers", async () => {
    const analyze = vi.fn<Parameters<ExternalSentimentStrategy["analyze"]>, ReturnType<ExternalSentimentStrategy["analyze"]>>();
    analyze.mockResolvedValueOnce({ label: "negative", polarity: -2, confidence: 0.9, reasoning: "angry" });
    const scorer = new SentimentScorer({ estimator: flatEstimator, external: strategy(analyze) });

    const result = await scorer.score("It keeps logging me out");

    expect(scorer.method).toBe("fake-model");
    expect(result).toEqual({
      polarity: -1,
      label: "negative",
      subjectivity: 0,
      method: "fake-model",
      confidence: 0.9,
      reasoning: "angry",
    });
  });

  it("falls back to the local scorer when the strategy fails", async () => {
    const scorer = new SentimentScorer({
      estimator: flatEstimator,
      external: strategy(async () => {
        throw new Error("upstream unavailable");
      }),
    });

    const result = await scorer.score("I hate the new update");

    expect(result.method).toBe(LOCAL_METHOD);
    expect(result.polarity).toBeCloseTo(-0.4, 5);
    expect(result.label).toBe("negative");
  });

  it("falls back when the strategy does not answer in time", async () => {
    const scorer = new SentimentScorer({
      estimator: flatEstimator,
      external: strategy(() => new Promise(() => undefined)),
      timeoutMs: 20,
    });

    const result = await scorer.score("Pretty average");

    expect(result.method).toBe(LOCAL_METHOD);
    expect(result.label).toBe("neutral");
  });

  it("does not call the strategy for empty text", async () => {
    const analyze = vi.fn<Parameters<ExternalSentimentStrategy["analyze"]>, ReturnType<ExternalSentimentStrategy["analyze"]>>();
    const scorer = new SentimentScorer({ estimator: flatEstimator, external: strategy(analyze) });

    await scorer.score("   ");

    expect(analyze).not.toHaveBeenCalled();
  });
});
