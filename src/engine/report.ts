import {
  detectCrisis,
  escalationTimeline,
  isEscalationRequired,
  recommendedReviewCadence,
  requiredNotifications,
} from "./crisis.js";
import {
  computeIntentBreakdown,
  computePlatformDistribution,
  computePriorityBreakdown,
  countCriticalActions,
  complaintRatio,
  dominantIntent,
  generateActionableInsights,
  generateDataCitations,
  groupInsightsByTeam,
} from "./insights.js";
import type { PlatformShare } from "./insights.js";
import { attachEvidence, extractThemesWithEvidence, groupIssuesByCategory, identifyIssues } from "./issues.js";
import { getLexicon } from "./lexicon.js";
import type { Lexicon } from "./lexicon.js";
import {
  assessOverallHealth,
  averagePolarity,
  calculateCompositeScore,
  calculateReputationScore,
  compareReputation,
  interpretScore,
} from "./reputation.js";
import { draftAllStyles } from "./responses.js";
import type { ResponseDraftSet } from "./responses.js";
import { SentimentScorer } from "./sentiment.js";
import { analyzeTopicTrends } from "./topic_trends.js";
import type {
  ActionableInsight,
  ClassifiedMention,
  Intent,
  IssueGroup,
  KeyTheme,
  Priority,
  ReputationSnapshot,
  ReputationTrend,
  ScoreInterpretation,
  SerpResult,
  TopicTrend,
} from "./types.js";
import { round1 } from "./utils.js";

const RESPONSE_DRAFT_ISSUES = 3;
const TOP_ISSUE_GROUPS = 5;

export interface EscalationPlan {
  required: boolean;
  timeline: string;
  notifications: string[];
  nextReview: string;
}

export interface ReputationReport {
  snapshot: ReputationSnapshot;
  reputationTrend: ReputationTrend;
  topicTrends: TopicTrend[];
  topIssues: IssueGroup[];
  keyThemes: KeyTheme[];
  responseDrafts: Array<{ issue: string; drafts: ResponseDraftSet }>;
  scoreInterpretation: ScoreInterpretation;
  overallHealth: string;
  escalation: EscalationPlan;
  complaintRatio: number;
  dominantIntent: Intent | null;
  criticalActions: number;
  insightsByTeam: Record<string, ActionableInsight[]>;
  priorityBreakdown: Record<Priority, number>;
  platformDistribution: PlatformShare[];
}

export interface ReportInput {
  product: string;
  current: readonly ClassifiedMention[];
  previous: readonly ClassifiedMention[];
  serpResults: readonly SerpResult[];
  now?: Date;
  lexicon?: Lexicon;
  /** Polarity used for theme context scoring; defaults to the local lexicon scorer. */
  polarityOf?: (text: string) => number;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/**
 * Assembles the per-run report. The embedded snapshot is deep-frozen: callers persist it,
 * they never amend it.
 */
export function buildReputationReport(input: ReportInput): ReputationReport {
  const { product, current, previous, serpResults } = input;
  const lexicon = input.lexicon ?? getLexicon();
  const now = input.now ?? new Date();
  const polarityOf =
    input.polarityOf ??
    (() => {
      const scorer = new SentimentScorer({ lexicon });
      return (text: string) => scorer.scoreLocal(text).polarity;
    })();

  const crisisAnalysis = detectCrisis(current, lexicon);
  const issuesList = identifyIssues(current, serpResults, lexicon).map((issue) =>
    attachEvidence(issue, current, serpResults)
  );
  const intentBreakdown = computeIntentBreakdown(current);

  const overallScore =
    serpResults.length > 0
      ? calculateCompositeScore({ mentions: current, serpResults, issueCount: issuesList.length }, lexicon)
      : calculateReputationScore(current);

  const actionableInsights = generateActionableInsights({ crisis: crisisAnalysis, intentBreakdown, issues: issuesList });

  const snapshot: ReputationSnapshot = deepFreeze({
    product,
    createdAt: now.toISOString(),
    overallScore: round1(overallScore),
    sentimentScore: averagePolarity(current),
    intentBreakdown,
    issuesList,
    crisisAnalysis,
    dataCitations: generateDataCitations(current, serpResults),
    actionableInsights,
  });

  const responseDrafts = issuesList.slice(0, RESPONSE_DRAFT_ISSUES).map((issue) => ({
    issue: issue.term,
    drafts: draftAllStyles({
      issue: issue.term,
      intent: "complaint",
      priority: issue.priority,
      keywordsMatched: [issue.term],
    }),
  }));

  const level = crisisAnalysis.crisisLevel;

  return {
    snapshot,
    reputationTrend: compareReputation(current, previous),
    topicTrends: analyzeTopicTrends(current, previous, lexicon),
    topIssues: groupIssuesByCategory(current, TOP_ISSUE_GROUPS, lexicon),
    keyThemes: extractThemesWithEvidence(current, polarityOf, lexicon),
    responseDrafts,
    scoreInterpretation: interpretScore(snapshot.overallScore),
    overallHealth: assessOverallHealth(snapshot.overallScore, level),
    escalation: {
      required: isEscalationRequired(level),
      timeline: escalationTimeline(level),
      notifications: requiredNotifications(level),
      nextReview: recommendedReviewCadence(level),
    },
    complaintRatio: complaintRatio(intentBreakdown),
    dominantIntent: dominantIntent(intentBreakdown),
    criticalActions: countCriticalActions(actionableInsights),
    insightsByTeam: groupInsightsByTeam(snapshot.actionableInsights),
    priorityBreakdown: computePriorityBreakdown(current),
    platformDistribution: computePlatformDistribution(current),
  };
}
