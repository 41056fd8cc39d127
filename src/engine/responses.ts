import { readFileSync } from "node:fs";
import { z } from "zod";

import { LexiconError } from "./lexicon.js";
import type { Intent, Priority } from "./types.js";

export const RESPONSE_STYLES = ["official", "friendly", "tech_support"] as const;
export type ResponseStyle = (typeof RESPONSE_STYLES)[number];

export type ChecklistType = "technical_issue" | "billing_issue" | "account_issue" | "general_complaint";

type Severity = "high" | "medium" | "low";

export const DEFAULT_TEMPLATES_URL = new URL("../../data/response_templates.json", import.meta.url);

const templateSchema = z.object({
  opening: z.string(),
  acknowledgment: z.string(),
  action: z.string(),
  closing: z.string(),
  tone: z.string(),
});

const intentTemplates = z.object({
  complaint: templateSchema,
  question: templateSchema,
  recommendation: templateSchema,
});

const linkSchema = z.object({ title: z.string(), url: z.string().url(), description: z.string() });

const escalationSchema = z.object({
  timeline: z.string(),
  escalationLevel: z.string(),
  priority: z.string(),
  additionalActions: z.array(z.string()),
});

const bySeverity = z.object({ high: z.string(), medium: z.string(), low: z.string() });

const templatesSchema = z.object({
  templates: z.object({ official: intentTemplates, friendly: intentTemplates, tech_support: intentTemplates }),
  checklistKeywords: z.object({
    technical_issue: z.array(z.string()),
    billing_issue: z.array(z.string()),
    account_issue: z.array(z.string()),
  }),
  actionChecklists: z.object({
    technical_issue: z.array(z.string()),
    billing_issue: z.array(z.string()),
    account_issue: z.array(z.string()),
    general_complaint: z.array(z.string()),
  }),
  knowledgeBase: z.object({
    faq: linkSchema,
    technical_issue: z.array(linkSchema),
    billing_issue: z.array(linkSchema),
    account_issue: z.array(linkSchema),
    general_complaint: z.array(linkSchema),
  }),
  escalation: z.object({ high: escalationSchema, medium: escalationSchema, low: escalationSchema }),
  resolutionTimes: z.object({
    technical_issue: bySeverity,
    billing_issue: bySeverity,
    account_issue: bySeverity,
    general_complaint: bySeverity,
  }),
});

export type ResponseTemplates = z.infer<typeof templatesSchema>;
export type ResponseComponents = z.infer<typeof templateSchema>;
export type KnowledgeBaseLink = z.infer<typeof linkSchema>;
export type EscalationInfo = z.infer<typeof escalationSchema>;

export interface ResponseDraftInput {
  issue: string;
  intent: Intent;
  priority: Priority;
  keywordsMatched: readonly string[];
}

export interface ResponseDraft {
  responseDraft: string;
  components: ResponseComponents;
  actionChecklist: string[];
  knowledgeBaseLinks: KnowledgeBaseLink[];
  escalation: EscalationInfo;
  metadata: {
    style: ResponseStyle;
    intent: Intent;
    severity: Priority;
    estimatedResolutionTime: string;
    followUpRequired: boolean;
  };
}

export interface StyleRecommendation {
  recommendedStyle: ResponseStyle;
  reason: string;
}

export interface ResponseDraftSet {
  responses: Record<ResponseStyle, ResponseDraft>;
  recommendation: StyleRecommendation;
  commonElements: {
    actionChecklist: string[];
    knowledgeBaseLinks: KnowledgeBaseLink[];
  };
}

export function loadResponseTemplates(path: string | URL = DEFAULT_TEMPLATES_URL): ResponseTemplates {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    throw new LexiconError(`Unable to load response templates from ${String(path)}`, { cause: error });
  }
  const parsed = templatesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new LexiconError(`Malformed response templates: ${parsed.error.message}`);
  }
  return parsed.data;
}

let defaultTemplates: ResponseTemplates | null = null;

export function getResponseTemplates(): ResponseTemplates {
  if (!defaultTemplates) {
    defaultTemplates = loadResponseTemplates();
  }
  return defaultTemplates;
}

// Critical mentions escalate on the same track as high ones.
function severityOf(priority: Priority): Severity {
  return priority === "critical" ? "high" : priority;
}

export function determineChecklistType(
  input: Pick<ResponseDraftInput, "issue" | "keywordsMatched">,
  templates: ResponseTemplates = getResponseTemplates()
): ChecklistType {
  const issue = input.issue.toLowerCase();
  const keywords = input.keywordsMatched.join(" ").toLowerCase();
  const matches = (list: readonly string[]) => list.some((keyword) => issue.includes(keyword) || keywords.includes(keyword));

  if (matches(templates.checklistKeywords.technical_issue)) return "technical_issue";
  if (matches(templates.checklistKeywords.billing_issue)) return "billing_issue";
  if (matches(templates.checklistKeywords.account_issue)) return "account_issue";
  return "general_complaint";
}

function templateFor(style: ResponseStyle, intent: Intent, templates: ResponseTemplates): ResponseComponents {
  if (intent === "neutral_mention") {
    return templates.templates.official.complaint;
  }
  return templates.templates[style][intent];
}

export function draftResponse(
  input: ResponseDraftInput,
  style: ResponseStyle = "official",
  templates: ResponseTemplates = getResponseTemplates()
): ResponseDraft {
  const issue = input.issue.trim() || "your concern";
  const template = templateFor(style, input.intent, templates);
  const components: ResponseComponents = {
    ...template,
    acknowledgment: template.acknowledgment.replaceAll("{issue}", issue),
  };

  const checklistType = determineChecklistType(input, templates);
  const severity = severityOf(input.priority);

  return {
    responseDraft: [components.opening, components.acknowledgment, components.action, components.closing].join(" "),
    components,
    actionChecklist: [...templates.actionChecklists[checklistType]],
    knowledgeBaseLinks: [templates.knowledgeBase.faq, ...templates.knowledgeBase[checklistType]],
    escalation: templates.escalation[severity],
    metadata: {
      style,
      intent: input.intent,
      severity: input.priority,
      estimatedResolutionTime: templates.resolutionTimes[checklistType][severity],
      followUpRequired: severity === "high" || input.intent === "complaint" || checklistType === "technical_issue",
    },
  };
}

export function recommendStyle(
  input: ResponseDraftInput,
  templates: ResponseTemplates = getResponseTemplates()
): StyleRecommendation {
  if (determineChecklistType(input, templates) === "technical_issue") {
    return {
      recommendedStyle: "tech_support",
      reason: "Technical issue detected - structured troubleshooting approach recommended",
    };
  }
  if (input.intent === "complaint" && severityOf(input.priority) === "high") {
    return {
      recommendedStyle: "official",
      reason: "High severity complaint - professional formal response recommended",
    };
  }
  if (input.intent === "question") {
    return {
      recommendedStyle: "friendly",
      reason: "User inquiry - helpful and approachable tone recommended",
    };
  }
  return {
    recommendedStyle: "official",
    reason: "Standard professional response appropriate for this issue type",
  };
}

export function draftAllStyles(
  input: ResponseDraftInput,
  templates: ResponseTemplates = getResponseTemplates()
): ResponseDraftSet {
  const responses: Record<ResponseStyle, ResponseDraft> = {
    official: draftResponse(input, "official", templates),
    friendly: draftResponse(input, "friendly", templates),
    tech_support: draftResponse(input, "tech_support", templates),
  };

  return {
    responses,
    recommendation: recommendStyle(input, templates),
    commonElements: {
      actionChecklist: responses.official.actionChecklist,
      knowledgeBaseLinks: responses.official.knowledgeBaseLinks,
    },
  };
}
