import { getLexicon } from "./lexicon.js";
import type { Lexicon } from "./lexicon.js";
import { CRISIS_CATEGORIES } from "./types.js";
import type { AffectedReview, CrisisAlert, CrisisCategory, CrisisLevel, CrisisSnapshot, Mention } from "./types.js";
import { truncate } from "./utils.js";

const MAX_AFFECTED_REVIEWS = 5;
const SNIPPET_LENGTH = 100;
const ALERT_THRESHOLD = 2;
const HIGH_SEVERITY_THRESHOLD = 5;

const RECOMMENDATIONS: Readonly<Record<CrisisLevel, string>> = {
  critical: "IMMEDIATE ACTION REQUIRED: Contact crisis management team and prepare public statement",
  high: "URGENT: Escalate to management and prepare response strategy",
  medium: "MONITOR CLOSELY: Increase response frequency and track trends",
  low: "NORMAL: Continue standard monitoring and response procedures",
  none: "NORMAL: Continue standard monitoring and response procedures",
};

const ESCALATION_TIMELINES: Readonly<Record<CrisisLevel, string>> = {
  critical: "Immediate (within 1 hour)",
  high: "Urgent (within 4 hours)",
  medium: "Standard (within 24 hours)",
  low: "Normal (within 3 days)",
  none: "No escalation needed",
};

const NOTIFICATIONS: Readonly<Record<CrisisLevel, readonly string[]>> = {
  critical: ["CEO", "PR Director", "Crisis Management Team", "Legal Team"],
  high: ["VP Customer Success", "PR Team", "Support Manager"],
  medium: ["Customer Success Manager", "Support Team Lead"],
  low: ["Support Team"],
  none: [],
};

const REVIEW_CADENCE: Readonly<Record<CrisisLevel, string>> = {
  critical: "Every 30 minutes",
  high: "Every 2 hours",
  medium: "Daily",
  low: "Weekly",
  none: "Monthly",
};

export function crisisLevelFor(totalSignals: number): Exclude<CrisisLevel, "none"> {
  if (totalSignals >= 10) return "critical";
  if (totalSignals >= 5) return "high";
  if (totalSignals >= 2) return "medium";
  return "low";
}

export function escalationTimeline(level: CrisisLevel): string {
  return ESCALATION_TIMELINES[level];
}

export function requiredNotifications(level: CrisisLevel): string[] {
  return [...NOTIFICATIONS[level]];
}

export function recommendedReviewCadence(level: CrisisLevel): string {
  return REVIEW_CADENCE[level];
}

export function isEscalationRequired(level: CrisisLevel): boolean {
  return level === "high" || level === "critical";
}

/**
 * Counts crisis signals across a batch: each mention adds at most one signal per category,
 * for the first keyword of that category found in its text and title.
 */
export function detectCrisis(mentions: readonly Mention[], lexicon: Lexicon = getLexicon()): CrisisSnapshot {
  if (mentions.length === 0) {
    return {
      crisisLevel: "none",
      totalSignals: 0,
      categoryBreakdown: {},
      alerts: [],
      affectedReviews: [],
      recommendation: RECOMMENDATIONS.none,
    };
  }

  const breakdown: Partial<Record<CrisisCategory, number>> = {};
  const affectedReviews: AffectedReview[] = [];

  for (const mention of mentions) {
    const content = [mention.text, mention.title ?? ""].join(" ").trim().toLowerCase();

    for (const category of CRISIS_CATEGORIES) {
      const keyword = lexicon.crisis[category].find((candidate) => content.includes(candidate));
      if (!keyword) {
        continue;
      }
      breakdown[category] = (breakdown[category] ?? 0) + 1;
      if (affectedReviews.length < MAX_AFFECTED_REVIEWS) {
        affectedReviews.push({
          reviewId: mention.externalId,
          contentSnippet: truncate(content, SNIPPET_LENGTH),
          category,
          keyword,
          platform: mention.platform,
        });
      }
    }
  }

  const totalSignals = Object.values(breakdown).reduce((sum, count) => sum + count, 0);
  const crisisLevel = crisisLevelFor(totalSignals);

  const alerts: CrisisAlert[] = [];
  for (const category of CRISIS_CATEGORIES) {
    const count = breakdown[category] ?? 0;
    if (count >= ALERT_THRESHOLD) {
      alerts.push({
        category,
        severity: count >= HIGH_SEVERITY_THRESHOLD ? "high" : "medium",
        count,
        message: `Spike detected in ${category} issues: ${count} mentions in recent reviews`,
      });
    }
  }

  return {
    crisisLevel,
    totalSignals,
    categoryBreakdown: breakdown,
    alerts,
    affectedReviews,
    recommendation: RECOMMENDATIONS[crisisLevel],
  };
}
