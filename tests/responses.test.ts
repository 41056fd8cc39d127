import { describe, expect, it } from "vitest";

import {
  determineChecklistType,
  draftAllStyles,
  draftResponse,
  recommendStyle,
} from "../src/engine/responses.js";

describe("draftResponse", () => {
  it("fills the template for the chosen style", () => {
    const draft = draftResponse(
      { issue: "login failures", intent: "question", priority: "medium", keywordsMatched: [] },
      "friendly"
    );

    expect(draft.responseDraft).toBe(
      "Hey! Great question! We'd love to help you with login failures. Here's what you need to know: Hope this helps! Feel free to ask if you need anything else! 😊"
    );
    expect(draft.actionChecklist[0]).toBe("Verify login credentials");
    expect(draft.knowledgeBaseLinks.map((link) => link.title)).toEqual([
      "Frequently Asked Questions",
      "Account Management",
    ]);
    expect(draft.escalation.timeline).toBe("1-2 business days");
    expect(draft.metadata).toEqual({
      style: "friendly",
      intent: "question",
      severity: "medium",
      estimatedResolutionTime: "2-4 hours",
      followUpRequired: false,
    });
  });

  it("substitutes a generic phrase for a blank issue", () => {
    const draft = draftResponse({ issue: "  ", intent: "complaint", priority: "low", keywordsMatched: [] });

    expect(draft.components.acknowledgment).toBe("We understand your frustration regarding your concern.");
  });

  it("escalates critical issues on the high track", () => {
    const draft = draftResponse({ issue: "double charge", intent: "complaint", priority: "critical", keywordsMatched: [] });

    expect(draft.escalation.escalationLevel).toBe("Senior Support Manager");
    expect(draft.metadata.severity).toBe("critical");
    expect(draft.metadata.estimatedResolutionTime).toBe("1-3 hours");
    expect(draft.metadata.followUpRequired).toBe(true);
  });

  it("answers neutral mentions with the official acknowledgment", () => {
    const draft = draftResponse(
      { issue: "the redesign", intent: "neutral_mention", priority: "low", keywordsMatched: [] },
      "friendly"
    );

    expect(draft.components.opening).toBe("Thank you for bringing this to our attention.");
  });
});

describe("determineChecklistType", () => {
  it("checks technical, billing and account vocabulary in turn", () => {
    expect(determineChecklistType({ issue: "refund after crash", keywordsMatched: [] })).toBe("technical_issue");
    expect(determineChecklistType({ issue: "refund", keywordsMatched: [] })).toBe("billing_issue");
    expect(determineChecklistType({ issue: "odd", keywordsMatched: ["password"] })).toBe("account_issue");
    expect(determineChecklistType({ issue: "odd", keywordsMatched: [] })).toBe("general_complaint");
  });
});

describe("recommendStyle", () => {
  it("routes by issue type, severity and intent", () => {
    expect(
      recommendStyle({ issue: "app crash", intent: "complaint", priority: "low", keywordsMatched: [] }).recommendedStyle
    ).toBe("tech_support");
    expect(
      recommendStyle({ issue: "rude staff", intent: "complaint", priority: "high", keywordsMatched: [] }).recommendedStyle
    ).toBe("official");
    expect(
      recommendStyle({ issue: "dark mode", intent: "question", priority: "medium", keywordsMatched: [] }).recommendedStyle
    ).toBe("friendly");
  });
});

describe("draftAllStyles", () => {
  it("drafts every style and shares the checklist", () => {
    const set = draftAllStyles({ issue: "rude staff", intent: "complaint", priority: "high", keywordsMatched: [] });

    expect(Object.keys(set.responses)).toEqual(["official", "friendly", "tech_support"]);
    expect(set.recommendation.reason).toBe("High severity complaint - professional formal response recommended");
    expect(set.commonElements.actionChecklist).toEqual(set.responses.official.actionChecklist);
  });
});
