import { describe, expect, it } from "vitest";

import {
  complaintRatio,
  computeIntentBreakdown,
  computePlatformDistribution,
  countCriticalActions,
  dominantIntent,
  generateActionableInsights,
  generateDataCitations,
  groupInsightsByTeam,
} from "../src/engine/insights.js";
import { detectCrisis } from "../src/engine/crisis.js";
import { identifyIssues } from "../src/engine/issues.js";
import type { SerpResult } from "../src/engine/types.js";
import { buildClassified, buildMention } from "./helpers.js";

function serp(query: string, position: number): SerpResult {
  return { query, title: `Result ${position}`, snippet: "", source: "example.com", link: "https://example.com", position };
}

describe("intent breakdown", () => {
  it("counts intents and finds the dominant one", () => {
    const breakdown = computeIntentBreakdown([
      buildClassified("a", { intent: "complaint" }),
      buildClassified("b", { intent: "complaint" }),
      buildClassified("c", { intent: "question" }),
      buildClassified("d", { intent: "question" }),
    ]);

    expect(breakdown).toEqual({ complaint: 2, question: 2 });
    expect(dominantIntent(breakdown)).toBe("complaint");
    expect(complaintRatio(breakdown)).toBe(0.5);
  });

  it("has no dominant intent for an empty breakdown", () => {
    expect(dominantIntent({})).toBeNull();
    expect(complaintRatio({})).toBe(0);
  });
});

describe("generateActionableInsights", () => {
  it("orders crisis, satisfaction and product insights", () => {
    const crisis = detectCrisis(
      Array.from({ length: 6 }, (_, index) => buildMention({ externalId: `m${index}`, text: "app crash" }))
    );
    const issues = identifyIssues(
      [
        buildClassified("crashes after login", { sentimentLabel: "negative" }),
        buildClassified("crashes on start", { sentimentLabel: "negative" }),
        buildClassified("crashes constantly", { sentimentLabel: "negative" }),
      ],
      []
    );

    const insights = generateActionableInsights({ crisis, intentBreakdown: { complaint: 3, question: 1 }, issues });

    expect(insights.map((insight) => insight.insight)).toEqual([
      "Crisis level detected: high",
      "75.0% of feedback consists of complaints",
      "Product team should prioritize fixing 'crashes' - affects 3 customers across multiple platforms",
    ]);
    expect(insights[2]).toMatchObject({
      category: "product_improvement",
      priority: "medium",
      action: "Address 'crashes' mentioned 3 times",
      timeline: "1-2 months",
      responsibleTeam: "Product Team",
      evidenceCount: 0,
    });
    expect(countCriticalActions(insights)).toBe(2);
    expect(Object.keys(groupInsightsByTeam(insights))).toEqual(["Crisis Management", "Customer Success", "Product Team"]);
  });
});

describe("generateDataCitations", () => {
  it("cites each platform and the search results", () => {
    const mentions = [
      buildMention({ externalId: "a1", platform: "AppStore", text: "first", rating: 5 }),
      buildMention({ externalId: "r1", platform: "Reddit", text: "second" }),
      buildMention({ externalId: "a2", platform: "AppStore", text: "third" }),
    ];
    const serpResults = [serp("acme review", 1), serp("acme review", 2), serp("acme complaint", 3), serp("acme app", 4)];

    const citations = generateDataCitations(mentions, serpResults);

    expect(citations).toHaveLength(3);
    expect(citations[0]).toEqual({
      sourceType: "app_reviews",
      platform: "AppStore",
      sampleCount: 2,
      methodology: "Automated sentiment analysis and topic extraction",
      sampleReviews: [
        { id: "a1", snippet: "first", rating: 5, date: "2024-06-01T00:00:00.000Z" },
        { id: "a2", snippet: "third", rating: undefined, date: "2024-06-01T00:00:00.000Z" },
      ],
    });
    expect(citations[2]).toMatchObject({
      sourceType: "search_results",
      resultsAnalyzed: 4,
      searchQueries: ["acme review", "acme complaint", "acme app"],
    });
    const search = citations[2];
    expect(search?.sourceType === "search_results" && search.sampleResults.map((result) => result.position)).toEqual([
      1, 2, 3,
    ]);
  });

  it("reports platform shares", () => {
    const distribution = computePlatformDistribution([
      buildMention({ platform: "Reddit" }),
      buildMention({ platform: "AppStore" }),
      buildMention({ platform: "Reddit" }),
    ]);

    expect(distribution).toEqual([
      { platform: "Reddit", count: 2, percentage: 66.7 },
      { platform: "AppStore", count: 1, percentage: 33.3 },
    ]);
  });
});
