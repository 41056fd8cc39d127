import { INTENTS } from "./types.js";
import type {
  ActionableInsight,
  ClassifiedMention,
  CrisisSnapshot,
  DataCitation,
  Intent,
  Issue,
  Mention,
  MentionPlatform,
  Priority,
  SerpResult,
} from "./types.js";
import { round1, truncate } from "./utils.js";

const COMPLAINT_RATIO_THRESHOLD = 0.4;
const TOP_ISSUE_INSIGHTS = 3;
const CITATION_SAMPLE_REVIEWS = 2;
const CITATION_SAMPLE_RESULTS = 3;
const CITATION_SNIPPET_LENGTH = 100;

export function computeIntentBreakdown(mentions: readonly ClassifiedMention[]): Partial<Record<Intent, number>> {
  const breakdown: Partial<Record<Intent, number>> = {};
  for (const mention of mentions) {
    const { intent } = mention.classification;
    breakdown[intent] = (breakdown[intent] ?? 0) + 1;
  }
  return breakdown;
}

export function complaintRatio(breakdown: Partial<Record<Intent, number>>): number {
  const total = INTENTS.reduce((sum, intent) => sum + (breakdown[intent] ?? 0), 0);
  return total > 0 ? (breakdown.complaint ?? 0) / total : 0;
}

export function dominantIntent(breakdown: Partial<Record<Intent, number>>): Intent | null {
  let dominant: Intent | null = null;
  for (const intent of INTENTS) {
    const count = breakdown[intent] ?? 0;
    if (count > 0 && (dominant === null || count > (breakdown[dominant] ?? 0))) {
      dominant = intent;
    }
  }
  return dominant;
}

export function computePriorityBreakdown(mentions: readonly ClassifiedMention[]): Record<Priority, number> {
  const breakdown: Record<Priority, number> = { critical: 0, high: 0, medium: 0, low: 0 };
  for (const mention of mentions) {
    breakdown[mention.classification.priority] += 1;
  }
  return breakdown;
}

export interface PlatformShare {
  platform: MentionPlatform;
  count: number;
  percentage: number;
}

export function computePlatformDistribution(mentions: readonly Mention[]): PlatformShare[] {
  const counts = new Map<MentionPlatform, number>();
  for (const mention of mentions) {
    counts.set(mention.platform, (counts.get(mention.platform) ?? 0) + 1);
  }
  return Array.from(counts.entries())
    .map(([platform, count]) => ({ platform, count, percentage: round1((count / mentions.length) * 100) }))
    .sort((a, b) => b.count - a.count);
}

export interface InsightInput {
  crisis: CrisisSnapshot;
  intentBreakdown: Partial<Record<Intent, number>>;
  issues: readonly Issue[];
}

export function generateActionableInsights({ crisis, intentBreakdown, issues }: InsightInput): ActionableInsight[] {
  const insights: ActionableInsight[] = [];

  if (crisis.crisisLevel === "high" || crisis.crisisLevel === "critical") {
    insights.push({
      category: "immediate_action",
      priority: "critical",
      insight: `Crisis level detected: ${crisis.crisisLevel}`,
      action: crisis.recommendation,
      timeline: "Immediate",
      responsibleTeam: "Crisis Management",
    });
  }

  const ratio = complaintRatio(intentBreakdown);
  if (ratio > COMPLAINT_RATIO_THRESHOLD) {
    insights.push({
      category: "customer_satisfaction",
      priority: "high",
      insight: `${(ratio * 100).toFixed(1)}% of feedback consists of complaints`,
      action: "Implement proactive customer outreach and issue resolution process",
      timeline: "1-2 weeks",
      responsibleTeam: "Customer Success",
    });
  }

  for (const issue of issues.slice(0, TOP_ISSUE_INSIGHTS)) {
    insights.push({
      category: "product_improvement",
      priority: issue.priority,
      insight: issue.actionableInsight,
      action: `Address '${issue.term}' mentioned ${issue.frequency} times`,
      timeline: issue.priority === "high" ? "2-4 weeks" : "1-2 months",
      responsibleTeam: issue.kind === "product_issue" ? "Product Team" : "Support Team",
      evidenceCount: issue.evidence.length,
    });
  }

  return insights;
}

export function groupInsightsByTeam(insights: readonly ActionableInsight[]): Record<string, ActionableInsight[]> {
  const byTeam: Record<string, ActionableInsight[]> = {};
  for (const insight of insights) {
    (byTeam[insight.responsibleTeam] ??= []).push(insight);
  }
  return byTeam;
}

export function countCriticalActions(insights: readonly ActionableInsight[]): number {
  return insights.filter((insight) => insight.priority === "critical" || insight.priority === "high").length;
}

export function generateDataCitations(mentions: readonly Mention[], serpResults: readonly SerpResult[]): DataCitation[] {
  const citations: DataCitation[] = [];

  const byPlatform = new Map<MentionPlatform, Mention[]>();
  for (const mention of mentions) {
    const bucket = byPlatform.get(mention.platform);
    if (bucket) {
      bucket.push(mention);
    } else {
      byPlatform.set(mention.platform, [mention]);
    }
  }

  for (const [platform, platformMentions] of byPlatform) {
    citations.push({
      sourceType: "app_reviews",
      platform,
      sampleCount: platformMentions.length,
      methodology: "Automated sentiment analysis and topic extraction",
      sampleReviews: platformMentions.slice(0, CITATION_SAMPLE_REVIEWS).map((mention) => ({
        id: mention.externalId,
        snippet: truncate(mention.text, CITATION_SNIPPET_LENGTH),
        rating: mention.rating,
        date: mention.originalDate.toISOString(),
      })),
    });
  }

  if (serpResults.length > 0) {
    citations.push({
      sourceType: "search_results",
      resultsAnalyzed: serpResults.length,
      searchQueries: Array.from(new Set(serpResults.map((result) => result.query))),
      methodology: "SERP API analysis for brand mentions and reputation tracking",
      sampleResults: serpResults.slice(0, CITATION_SAMPLE_RESULTS).map((result) => ({
        title: result.title,
        source: result.source,
        link: result.link,
        position: result.position,
      })),
    });
  }

  return citations;
}
