import { getLexicon } from "./lexicon.js";
import type { IssueCategoryDefinition, Lexicon } from "./lexicon.js";
import { PRIORITY_RANK, comparePriority } from "./priority.js";
import { extractThemes } from "./topics.js";
import type {
  ClassifiedMention,
  Evidence,
  Issue,
  IssueGroup,
  IssueKind,
  KeyTheme,
  Mention,
  Priority,
  SerpResult,
  Topic,
} from "./types.js";
import { truncate } from "./utils.js";

const MAX_ISSUES = 10;
const MAX_REVIEW_EVIDENCE = 3;
const MAX_SERP_EVIDENCE = 2;
const EVIDENCE_SNIPPET_LENGTH = 150;
const THEME_SNIPPET_LENGTH = 100;
const THEME_CONTEXT_RADIUS = 10;

type CategoryInfo = Omit<IssueCategoryDefinition, "topics" | "patterns">;

export function categorizeMention(
  text: string,
  topics: readonly Topic[],
  keywords: readonly string[],
  lexicon: Lexicon = getLexicon()
): CategoryInfo {
  for (const topic of topics) {
    const byTopic = lexicon.issueCategories.find((category) => category.topics.includes(topic));
    if (byTopic) {
      return byTopic;
    }
  }

  const lowered = text.toLowerCase();
  const loweredKeywords = keywords.map((keyword) => keyword.toLowerCase());
  const byPattern = lexicon.issueCategories.find(
    (category) =>
      category.patterns.some((pattern) => lowered.includes(pattern)) ||
      loweredKeywords.some((keyword) => category.patterns.includes(keyword))
  );

  return byPattern ?? lexicon.fallbackIssueCategory;
}

export function generateIssueInsight(issue: Pick<Issue, "term" | "kind" | "frequency">): string {
  if (issue.kind === "product_issue") {
    return `Product team should prioritize fixing '${issue.term}' - affects ${issue.frequency} customers across multiple platforms`;
  }
  return `PR team should address '${issue.term}' narrative appearing in search results and online discussions`;
}

function buildIssue(
  term: string,
  kind: IssueKind,
  frequency: number,
  priority: Priority,
  lexicon: Lexicon
): Issue {
  const category = categorizeMention(term, [], [], lexicon);
  const base = { term, kind, frequency };
  return {
    ...base,
    source: kind === "product_issue" ? "reviews" : "serp",
    category: category.name,
    title: category.title,
    description: category.description,
    priority,
    evidence: [],
    actionableInsight: generateIssueInsight(base),
  };
}

/**
 * Recurring negative terms from reviews, plus recurring phrases from complaint-oriented
 * search results. Evidence is attached separately by `attachEvidence`.
 */
export function identifyIssues(
  mentions: readonly ClassifiedMention[],
  serpResults: readonly SerpResult[],
  lexicon: Lexicon = getLexicon()
): Issue[] {
  const issues: Issue[] = [];

  const negativeTexts = mentions
    .filter((mention) => mention.classification.sentimentLabel === "negative")
    .map((mention) => mention.text);

  if (negativeTexts.length > 0) {
    const themes = extractThemes(negativeTexts, 2, lexicon);
    const stems = Array.from(lexicon.issueStems);
    for (const [word, frequency] of themes.commonWords) {
      if (stems.some((stem) => word.includes(stem))) {
        issues.push(buildIssue(word, "product_issue", frequency, frequency > 5 ? "high" : "medium", lexicon));
      }
    }
  }

  const complaintSerpTexts = serpResults
    .filter((result) => {
      const query = result.query.toLowerCase();
      return lexicon.serp.complaintQueryTerms.some((term) => query.includes(term));
    })
    .map((result) => `${result.title} ${result.snippet}`);

  if (complaintSerpTexts.length > 0) {
    const themes = extractThemes(complaintSerpTexts, 1, lexicon);
    for (const [phrase, frequency] of themes.commonPhrases) {
      issues.push(buildIssue(phrase, "reputation_issue", frequency, frequency > 2 ? "high" : "medium", lexicon));
    }
  }

  return issues
    .sort((a, b) => comparePriority(a.priority, b.priority) || b.frequency - a.frequency)
    .slice(0, MAX_ISSUES);
}

function searchableText(mention: Mention): string {
  return [mention.text, mention.title ?? ""].join(" ").trim().toLowerCase();
}

export function attachEvidence(
  issue: Issue,
  mentions: readonly Mention[],
  serpResults: readonly SerpResult[]
): Issue {
  const term = issue.term.toLowerCase();
  const evidence: Evidence[] = [];

  for (const mention of mentions) {
    if (evidence.length >= MAX_REVIEW_EVIDENCE) break;
    const content = searchableText(mention);
    if (content.includes(term)) {
      evidence.push({
        type: "review",
        platform: mention.platform,
        snippet: truncate(content, EVIDENCE_SNIPPET_LENGTH),
        rating: mention.rating,
        date: mention.originalDate.toISOString(),
      });
    }
  }

  let serpEvidence = 0;
  for (const result of serpResults) {
    if (serpEvidence >= MAX_SERP_EVIDENCE) break;
    if (`${result.title} ${result.snippet}`.toLowerCase().includes(term)) {
      evidence.push({
        type: "serp",
        title: result.title,
        snippet: truncate(result.snippet, EVIDENCE_SNIPPET_LENGTH),
        source: result.source,
        link: result.link,
      });
      serpEvidence += 1;
    }
  }

  return { ...issue, evidence };
}

/**
 * Dashboard view of the most pressing problem areas: critical, high and medium mentions
 * grouped by issue category, most severe group first.
 */
export function groupIssuesByCategory(
  mentions: readonly ClassifiedMention[],
  limit = 5,
  lexicon: Lexicon = getLexicon()
): IssueGroup[] {
  const groups = new Map<string, { info: CategoryInfo; mentions: ClassifiedMention[]; counts: Record<Priority, number> }>();

  for (const mention of mentions) {
    const { priority, topics, keywordsMatched } = mention.classification;
    if (priority === "low") {
      continue;
    }
    const info = categorizeMention(mention.text, topics, keywordsMatched, lexicon);
    let group = groups.get(info.name);
    if (!group) {
      group = { info, mentions: [], counts: { critical: 0, high: 0, medium: 0, low: 0 } };
      groups.set(info.name, group);
    }
    group.mentions.push(mention);
    group.counts[priority] += 1;
  }

  const result: IssueGroup[] = [];
  for (const group of groups.values()) {
    const priority: Priority = group.counts.critical > 0 ? "critical" : group.counts.high > 0 ? "high" : "medium";
    const representative = group.mentions.reduce((best, candidate) =>
      PRIORITY_RANK[candidate.classification.priority] > PRIORITY_RANK[best.classification.priority] ? candidate : best
    );
    result.push({
      category: group.info.name,
      title: group.info.title,
      description: group.info.description,
      priority,
      totalMentions: group.mentions.length,
      priorityCounts: group.counts,
      representativeMentionId: representative.externalId,
    });
  }

  return result
    .sort((a, b) => comparePriority(a.priority, b.priority) || b.totalMentions - a.totalMentions)
    .slice(0, limit);
}

function themeContexts(theme: string, texts: readonly string[]): string[] {
  const contexts: string[] = [];
  for (const text of texts) {
    if (!text.toLowerCase().includes(theme)) continue;
    const words = text.split(/\s+/).filter((word) => word.length > 0);
    words.forEach((word, index) => {
      if (word.toLowerCase().includes(theme)) {
        const start = Math.max(0, index - THEME_CONTEXT_RADIUS);
        contexts.push(words.slice(start, index + THEME_CONTEXT_RADIUS).join(" "));
      }
    });
  }
  return contexts;
}

/**
 * Top five recurring words across all mentions, each with up to three supporting reviews
 * and the mean polarity of the text surrounding it.
 */
export function extractThemesWithEvidence(
  mentions: readonly Mention[],
  polarityOf: (text: string) => number,
  lexicon: Lexicon = getLexicon()
): KeyTheme[] {
  const texts = mentions.map((mention) => mention.text).filter((text) => text.length > 0);
  const { commonWords } = extractThemes(texts, 3, lexicon);

  return commonWords.slice(0, 5).map(([theme, frequency]) => {
    const supportingEvidence = mentions
      .filter((mention) => mention.text.toLowerCase().includes(theme))
      .slice(0, 3)
      .map((mention) => ({
        platform: mention.platform,
        snippet: truncate(mention.text.toLowerCase(), THEME_SNIPPET_LENGTH),
        rating: mention.rating,
      }));

    const contexts = themeContexts(theme, texts);
    const averageSentiment =
      contexts.length > 0 ? contexts.reduce((sum, context) => sum + polarityOf(context), 0) / contexts.length : 0;

    return { theme, frequency, supportingEvidence, averageSentiment, sampleContexts: contexts.slice(0, 3) };
  });
}
