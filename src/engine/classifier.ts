import pLimit from "p-limit";
import type { Logger } from "pino";

import { errorMessage, logRecoverableError } from "./error_utils.js";
import { classifyIntent } from "./intent.js";
import { getLexicon } from "./lexicon.js";
import type { Lexicon } from "./lexicon.js";
import { componentLogger } from "./logger.js";
import { mentionsClassifiedTotal, mentionsFailedTotal, mentionsSkippedTotal } from "./metrics.js";
import { rankPriority } from "./priority.js";
import type { SentimentScorer } from "./sentiment.js";
import { extractKeywords, tagTopics } from "./topics.js";
import type {
  ClassifiedMention,
  Intent,
  Mention,
  MentionClassification,
  ResponseSuggestion,
  ResponseType,
  SentimentLabel,
} from "./types.js";
import { clamp } from "./utils.js";

const MAX_STORED_KEYWORDS = 7;
const MAX_STORED_TOPICS = 4;
const DEFAULT_SENTIMENT_CONFIDENCE = 0.5;

export interface ClassifierDeps {
  scorer: SentimentScorer;
  lexicon?: Lexicon;
  logger?: Logger;
}

export async function classifyText(text: string, deps: ClassifierDeps): Promise<MentionClassification | null> {
  if (text.trim().length === 0) {
    return null;
  }
  const lexicon = deps.lexicon ?? getLexicon();

  const [sentiment, intent] = await Promise.all([deps.scorer.score(text), Promise.resolve(classifyIntent(text, lexicon))]);
  const priority = rankPriority(sentiment, intent, text, lexicon);

  return {
    sentimentLabel: sentiment.label,
    sentimentPolarity: clamp(sentiment.polarity, -1, 1),
    intent: intent.intent,
    priority,
    confidenceScore: clamp(Math.min(sentiment.confidence ?? DEFAULT_SENTIMENT_CONFIDENCE, intent.confidence), 0, 1),
    keywordsMatched: extractKeywords(text, lexicon).slice(0, MAX_STORED_KEYWORDS),
    topics: tagTopics(text, lexicon).slice(0, MAX_STORED_TOPICS),
    method: sentiment.method,
    responseSuggested: suggestResponse({ intent: intent.intent, sentimentLabel: sentiment.label, priority }),
  };
}

/** Returns the mention with its classification replaced, or `null` when it has no text. */
export async function classifyMention(mention: Mention, deps: ClassifierDeps): Promise<ClassifiedMention | null> {
  const classification = await classifyText(mention.text, deps);
  if (!classification) {
    return null;
  }
  return { ...mention, classification };
}

export interface BatchFailure {
  externalId: string;
  error: string;
}

export interface BatchOutcome {
  classified: ClassifiedMention[];
  skipped: number;
  failed: number;
  failures: BatchFailure[];
}

type ItemOutcome =
  | { kind: "classified"; mention: ClassifiedMention }
  | { kind: "skipped" }
  | { kind: "failed"; failure: BatchFailure };

/**
 * Classifies mentions with bounded parallelism. Never rejects: empty mentions are counted
 * as skipped and per-mention errors as failed, while the rest of the batch carries on.
 * Classified mentions keep their input order.
 */
export async function classifyBatch(
  mentions: readonly Mention[],
  deps: ClassifierDeps,
  options: { concurrency?: number; product?: string } = {}
): Promise<BatchOutcome> {
  const limit = pLimit(Math.max(1, options.concurrency ?? 8));
  const log = deps.logger ?? componentLogger("classifier");

  const outcomes = await Promise.all(
    mentions.map((mention) =>
      limit(async (): Promise<ItemOutcome> => {
        try {
          const classified = await classifyMention(mention, deps);
          return classified ? { kind: "classified", mention: classified } : { kind: "skipped" };
        } catch (error) {
          logRecoverableError(
            log,
            error,
            { location: "classifyBatch", product: options.product, mentionId: mention.externalId },
            "Failed to classify mention"
          );
          return { kind: "failed", failure: { externalId: mention.externalId, error: errorMessage(error) } };
        }
      })
    )
  );

  const result: BatchOutcome = { classified: [], skipped: 0, failed: 0, failures: [] };
  for (const outcome of outcomes) {
    if (outcome.kind === "classified") {
      result.classified.push(outcome.mention);
      mentionsClassifiedTotal.inc({ method: outcome.mention.classification.method });
    } else if (outcome.kind === "skipped") {
      result.skipped += 1;
    } else {
      result.failed += 1;
      result.failures.push(outcome.failure);
    }
  }
  mentionsSkippedTotal.inc(result.skipped);
  mentionsFailedTotal.inc(result.failed);

  return result;
}

function responseTypeFor(intent: Intent, sentiment: SentimentLabel): ResponseType {
  if (intent === "complaint") return "apology_and_resolution";
  if (intent === "question") return "informational_assistance";
  if (intent === "recommendation" && sentiment === "positive") return "gratitude_and_engagement";
  return "acknowledgment";
}

const KEY_POINTS: Partial<Record<Intent, readonly string[]>> = {
  complaint: ["Acknowledge the issue", "Apologize for the inconvenience", "Offer a solution or next steps"],
  question: ["Provide helpful information", "Offer additional resources", "Invite further questions"],
  recommendation: ["Thank the user for feedback", "Consider implementing suggestion", "Keep user updated on progress"],
};

export function suggestResponse(
  classification: Pick<MentionClassification, "intent" | "sentimentLabel" | "priority">
): ResponseSuggestion {
  const { intent, sentimentLabel, priority } = classification;
  const keyPoints = [...(KEY_POINTS[intent] ?? [])];
  if (priority === "critical") {
    keyPoints.push("Escalate to senior support team");
  }

  return {
    shouldRespond: priority === "critical" || priority === "high",
    urgency: priority,
    recommendedStyle: priority === "critical" ? "official" : "friendly",
    responseType: responseTypeFor(intent, sentimentLabel),
    keyPoints,
  };
}
