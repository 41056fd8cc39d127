export const MENTION_PLATFORMS = ["AppStore", "GooglePlay", "Reddit", "Trustpilot", "SearchResult", "Unknown"] as const;
export type MentionPlatform = (typeof MENTION_PLATFORMS)[number];

export const SENTIMENT_LABELS = ["positive", "negative", "neutral"] as const;
export type SentimentLabel = (typeof SENTIMENT_LABELS)[number];

/** Declaration order doubles as the intent tie-break order. */
export const INTENTS = ["complaint", "question", "recommendation", "neutral_mention"] as const;
export type Intent = (typeof INTENTS)[number];

export const PRIORITIES = ["critical", "high", "medium", "low"] as const;
export type Priority = (typeof PRIORITIES)[number];

export const TOPICS = ["performance", "usability", "pricing", "features", "bugs", "customer_service", "design"] as const;
export type Topic = (typeof TOPICS)[number];

export const CRISIS_CATEGORIES = ["technical", "payment", "security", "service"] as const;
export type CrisisCategory = (typeof CRISIS_CATEGORIES)[number];

export type CrisisLevel = "none" | "low" | "medium" | "high" | "critical";

/** Raw payload handed over by an ingestion source, before normalisation. */
export interface RawMentionInput {
  platform?: string;
  content?: string;
  title?: string | null;
  rating?: number | string | null;
  author?: string | null;
  source_url?: string | null;
  date?: string | number | null;
  id?: string | number | null;
  external_id?: string | number | null;
}

export interface SentimentResult {
  polarity: number;
  label: SentimentLabel;
  subjectivity: number;
  method: string;
  /** Only strategies that report their own certainty set this. */
  confidence?: number;
  reasoning?: string;
}

export interface IntentResult {
  intent: Intent;
  confidence: number;
  keywordsMatched: string[];
  scores: Partial<Record<Intent, number>>;
}

export const RESPONSE_TYPES = [
  "apology_and_resolution",
  "informational_assistance",
  "gratitude_and_engagement",
  "acknowledgment",
] as const;
export type ResponseType = (typeof RESPONSE_TYPES)[number];

export interface ResponseSuggestion {
  shouldRespond: boolean;
  urgency: Priority;
  recommendedStyle: "official" | "friendly";
  responseType: ResponseType;
  keyPoints: string[];
}

export interface MentionClassification {
  sentimentLabel: SentimentLabel;
  sentimentPolarity: number;
  intent: Intent;
  priority: Priority;
  confidenceScore: number;
  keywordsMatched: string[];
  topics: Topic[];
  method: string;
  responseSuggested: ResponseSuggestion;
}

export interface Mention {
  externalId: string;
  platform: MentionPlatform;
  text: string;
  title?: string;
  rating?: number;
  authorName: string;
  sourceUrl?: string;
  originalDate: Date;
  isMarked: boolean;
  classification?: MentionClassification;
}

export type ClassifiedMention = Mention & { classification: MentionClassification };

export interface SerpResult {
  query: string;
  title: string;
  snippet: string;
  source: string;
  link: string;
  position: number;
}

export interface ThemeSummary {
  commonWords: Array<[string, number]>;
  commonPhrases: Array<[string, number]>;
  totalTextsAnalyzed: number;
}

export interface CrisisAlert {
  category: CrisisCategory;
  severity: "medium" | "high";
  count: number;
  message: string;
}

export interface AffectedReview {
  reviewId: string;
  contentSnippet: string;
  category: CrisisCategory;
  keyword: string;
  platform: MentionPlatform;
}

export interface CrisisSnapshot {
  crisisLevel: CrisisLevel;
  totalSignals: number;
  categoryBreakdown: Partial<Record<CrisisCategory, number>>;
  alerts: CrisisAlert[];
  affectedReviews: AffectedReview[];
  recommendation: string;
}

export type IssueKind = "product_issue" | "reputation_issue";

export type Evidence =
  | {
      type: "review";
      platform: MentionPlatform;
      snippet: string;
      rating?: number;
      date: string;
    }
  | {
      type: "serp";
      title: string;
      snippet: string;
      source: string;
      link: string;
    };

export interface Issue {
  term: string;
  kind: IssueKind;
  source: "reviews" | "serp";
  category: string;
  title: string;
  description: string;
  priority: Priority;
  frequency: number;
  evidence: Evidence[];
  actionableInsight: string;
}

export interface IssueGroup {
  category: string;
  title: string;
  description: string;
  priority: Priority;
  totalMentions: number;
  priorityCounts: Record<Priority, number>;
  representativeMentionId: string;
}

export interface KeyTheme {
  theme: string;
  frequency: number;
  supportingEvidence: Array<{ platform: MentionPlatform; snippet: string; rating?: number }>;
  averageSentiment: number;
  sampleContexts: string[];
}

export type TrendDirection = "increase" | "decrease" | "no_change";

export interface ReputationTrend {
  currentScore: number;
  previousScore: number;
  percentageChange: number;
  direction: TrendDirection;
  description: string;
  currentMentions: number;
  previousMentions: number;
}

export interface TopicTrend {
  topic: string;
  mentions: number;
  previousMentions: number;
  sentimentScore: number;
  trendPercentage: number;
  sentimentBreakdown: Record<SentimentLabel, number>;
  priority: number;
}

export interface ActionableInsight {
  category: "immediate_action" | "customer_satisfaction" | "product_improvement";
  priority: Priority;
  insight: string;
  action: string;
  timeline: string;
  responsibleTeam: string;
  evidenceCount?: number;
}

export type DataCitation =
  | {
      sourceType: "app_reviews";
      platform: MentionPlatform;
      sampleCount: number;
      methodology: string;
      sampleReviews: Array<{ id: string; snippet: string; rating?: number; date: string }>;
    }
  | {
      sourceType: "search_results";
      resultsAnalyzed: number;
      searchQueries: string[];
      methodology: string;
      sampleResults: Array<{ title: string; source: string; link: string; position: number }>;
    };

export interface ScoreInterpretation {
  status: "excellent" | "good" | "concerning" | "critical";
  description: string;
  action: string;
}

export interface ReputationSnapshot {
  product: string;
  createdAt: string;
  overallScore: number;
  sentimentScore: number;
  intentBreakdown: Partial<Record<Intent, number>>;
  issuesList: Issue[];
  crisisAnalysis: CrisisSnapshot;
  dataCitations: DataCitation[];
  actionableInsights: ActionableInsight[];
}
