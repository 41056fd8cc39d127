import { readFileSync } from "node:fs";
import { z } from "zod";

import { TOPICS } from "./types.js";
import type { CrisisCategory, Intent, Topic } from "./types.js";

export const DEFAULT_LEXICON_URL = new URL("../../data/lexicon.json", import.meta.url);

/** Raised when a lexicon table is missing, unreadable or malformed. */
export class LexiconError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LexiconError";
  }
}

const keywordList = z.array(z.string().trim().min(1)).min(1);

const ruleSchema = z.object({
  pattern: z.string().min(1),
  delta: z.number().min(-1).max(1),
});

const issueCategorySchema = z.object({
  name: z.string().min(1),
  title: z.string().min(1),
  description: z.string().min(1),
  topics: z.array(z.enum(TOPICS)),
  patterns: keywordList,
});

const lexiconSchema = z.object({
  sentimentRules: z.object({
    dissatisfaction: z.array(ruleSchema),
    positiveReinforcement: z.array(ruleSchema),
    negativeReinforcement: z.array(ruleSchema),
  }),
  intents: z.object({
    complaint: keywordList,
    question: keywordList,
    recommendation: keywordList,
    neutral_mention: keywordList,
  }),
  priorityKeywords: z.object({
    critical: keywordList,
    high: keywordList,
  }),
  productKeywords: keywordList,
  topics: z.object({
    performance: keywordList,
    usability: keywordList,
    pricing: keywordList,
    features: keywordList,
    bugs: keywordList,
    customer_service: keywordList,
    design: keywordList,
  }),
  crisis: z.object({
    technical: keywordList,
    payment: keywordList,
    security: keywordList,
    service: keywordList,
  }),
  issueStems: keywordList,
  stopWords: keywordList,
  serp: z.object({
    complaintQueryTerms: keywordList,
    negativeQueryTerms: keywordList,
  }),
  trendTopics: z.record(z.string().min(1), keywordList),
  issueCategories: z.array(issueCategorySchema).min(1),
  fallbackIssueCategory: issueCategorySchema.pick({ name: true, title: true, description: true }),
});

type LexiconSource = z.infer<typeof lexiconSchema>;

export interface SentimentRule {
  readonly source: string;
  readonly pattern: RegExp;
  readonly delta: number;
}

export interface IssueCategoryDefinition {
  readonly name: string;
  readonly title: string;
  readonly description: string;
  readonly topics: readonly Topic[];
  readonly patterns: readonly string[];
}

export interface TrendTopicDefinition {
  readonly name: string;
  readonly keywords: readonly string[];
}

export interface Lexicon {
  readonly sentimentRules: {
    readonly dissatisfaction: readonly SentimentRule[];
    readonly positiveReinforcement: readonly SentimentRule[];
    readonly negativeReinforcement: readonly SentimentRule[];
  };
  readonly intents: Readonly<Record<Intent, readonly string[]>>;
  readonly priorityKeywords: { readonly critical: readonly string[]; readonly high: readonly string[] };
  readonly productKeywords: readonly string[];
  readonly topics: Readonly<Record<Topic, readonly string[]>>;
  readonly crisis: Readonly<Record<CrisisCategory, readonly string[]>>;
  readonly issueStems: ReadonlySet<string>;
  readonly stopWords: ReadonlySet<string>;
  readonly serp: { readonly complaintQueryTerms: readonly string[]; readonly negativeQueryTerms: readonly string[] };
  readonly trendTopics: readonly TrendTopicDefinition[];
  readonly issueCategories: readonly IssueCategoryDefinition[];
  readonly fallbackIssueCategory: Omit<IssueCategoryDefinition, "topics" | "patterns">;
}

function lower(list: readonly string[]): string[] {
  return list.map((entry) => entry.toLowerCase());
}

function compileRules(bucket: string, rules: LexiconSource["sentimentRules"]["dissatisfaction"]): SentimentRule[] {
  return rules.map((rule) => {
    try {
      return Object.freeze({ source: rule.pattern, pattern: new RegExp(rule.pattern, "i"), delta: rule.delta });
    } catch (error) {
      throw new LexiconError(`Invalid ${bucket} pattern "${rule.pattern}"`, { cause: error });
    }
  });
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join("; ");
}

export function parseLexicon(raw: unknown): Lexicon {
  const parsed = lexiconSchema.safeParse(raw);
  if (!parsed.success) {
    throw new LexiconError(`Malformed lexicon table: ${formatIssues(parsed.error)}`);
  }
  const source = parsed.data;

  const topics: Record<Topic, readonly string[]> = { ...source.topics };
  for (const topic of TOPICS) {
    topics[topic] = lower(source.topics[topic]);
  }

  return Object.freeze({
    sentimentRules: Object.freeze({
      dissatisfaction: compileRules("dissatisfaction", source.sentimentRules.dissatisfaction),
      positiveReinforcement: compileRules("positiveReinforcement", source.sentimentRules.positiveReinforcement),
      negativeReinforcement: compileRules("negativeReinforcement", source.sentimentRules.negativeReinforcement),
    }),
    intents: Object.freeze({
      complaint: lower(source.intents.complaint),
      question: lower(source.intents.question),
      recommendation: lower(source.intents.recommendation),
      neutral_mention: lower(source.intents.neutral_mention),
    }),
    priorityKeywords: Object.freeze({
      critical: lower(source.priorityKeywords.critical),
      high: lower(source.priorityKeywords.high),
    }),
    productKeywords: lower(source.productKeywords),
    topics: Object.freeze(topics),
    crisis: Object.freeze({
      technical: lower(source.crisis.technical),
      payment: lower(source.crisis.payment),
      security: lower(source.crisis.security),
      service: lower(source.crisis.service),
    }),
    issueStems: new Set(lower(source.issueStems)),
    stopWords: new Set(lower(source.stopWords)),
    serp: Object.freeze({
      complaintQueryTerms: lower(source.serp.complaintQueryTerms),
      negativeQueryTerms: lower(source.serp.negativeQueryTerms),
    }),
    trendTopics: Object.entries(source.trendTopics).map(([name, keywords]) => Object.freeze({ name, keywords: lower(keywords) })),
    issueCategories: source.issueCategories.map((category) =>
      Object.freeze({ ...category, patterns: lower(category.patterns) })
    ),
    fallbackIssueCategory: Object.freeze({ ...source.fallbackIssueCategory }),
  });
}

export function loadLexicon(path: string | URL = DEFAULT_LEXICON_URL): Lexicon {
  let contents: string;
  try {
    contents = readFileSync(path, "utf8");
  } catch (error) {
    throw new LexiconError(`Unable to read lexicon table at ${String(path)}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (error) {
    throw new LexiconError(`Lexicon table at ${String(path)} is not valid JSON`, { cause: error });
  }

  return parseLexicon(raw);
}

let defaultLexicon: Lexicon | null = null;

export function getLexicon(): Lexicon {
  if (!defaultLexicon) {
    defaultLexicon = loadLexicon();
  }
  return defaultLexicon;
}
