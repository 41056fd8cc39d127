export * from "./types.js";
export { LexiconError, getLexicon, loadLexicon, parseLexicon } from "./lexicon.js";
export type { Lexicon, SentimentRule, IssueCategoryDefinition, TrendTopicDefinition } from "./lexicon.js";
export { SentimentScorer, afinnEstimator, applyContextRules, labelForPolarity, LOCAL_METHOD } from "./sentiment.js";
export type {
  BaseEstimate,
  ExternalSentimentStrategy,
  ExternalSentimentVerdict,
  PolarityEstimator,
  SentimentScorerOptions,
} from "./sentiment.js";
export { OpenAiSentimentStrategy, ExternalStrategyError, createExternalStrategy } from "./llm_strategy.js";
export { classifyIntent } from "./intent.js";
export { rankPriority, comparePriority, PRIORITY_RANK } from "./priority.js";
export { extractKeywords, extractThemes, tagTopics, tokenize } from "./topics.js";
export { normalizeRawMention, normalizePlatform } from "./normalizer.js";
export type { NormalizeOutcome } from "./normalizer.js";
export { classifyBatch, classifyMention, classifyText, suggestResponse } from "./classifier.js";
export type { BatchFailure, BatchOutcome, ClassifierDeps } from "./classifier.js";
export { detectCrisis, crisisLevelFor } from "./crisis.js";
export type { CompositeScoreInput } from "./reputation.js";
export {
  calculateCompositeScore,
  calculateReputationScore,
  compareReputation,
  interpretScore,
  assessOverallHealth,
  NEUTRAL_BASELINE,
} from "./reputation.js";
export { identifyIssues, attachEvidence, categorizeMention, groupIssuesByCategory, extractThemesWithEvidence } from "./issues.js";
export { analyzeTopicTrends, calculateTopicTrend, calculateTopicPriority } from "./topic_trends.js";
export { generateActionableInsights, generateDataCitations, groupInsightsByTeam } from "./insights.js";
export { buildReputationReport } from "./report.js";
export type { ReputationReport, ReportInput, EscalationPlan } from "./report.js";
export { draftResponse, draftAllStyles, recommendStyle, RESPONSE_STYLES } from "./responses.js";
export type { ResponseDraft, ResponseDraftInput, ResponseDraftSet, ResponseStyle } from "./responses.js";
