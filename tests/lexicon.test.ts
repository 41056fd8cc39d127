import { readFileSync } from "node:fs";
import { describe, expect, it } from "vitest";

import { DEFAULT_LEXICON_URL, LexiconError, getLexicon, loadLexicon, parseLexicon } from "../src/engine/lexicon.js";

function rawTable(): Record<string, unknown> {
  const parsed: unknown = JSON.parse(readFileSync(DEFAULT_LEXICON_URL, "utf8"));
  if (typeof parsed !== "object" || parsed === null) {
    throw new Error("lexicon fixture is not an object");
  }
  return { ...parsed };
}

describe("lexicon", () => {
  it("loads the bundled tables", () => {
    const lexicon = getLexicon();

    expect(lexicon.intents.complaint).toContain("crash");
    expect(lexicon.stopWords.has("the")).toBe(true);
    expect(lexicon.trendTopics[0]?.name).toBe("Performance");
    expect(lexicon.fallbackIssueCategory.name).toBe("General Issues");
    expect(lexicon.sentimentRules.dissatisfaction[0]?.pattern.test("Any ALTERNATIVES TO this?")).toBe(true);
  });

  it("memoises the default table", () => {
    expect(getLexicon()).toBe(getLexicon());
  });

  it("rejects a table with missing sections", () => {
    expect(() => parseLexicon({ intents: {} })).toThrow(LexiconError);
  });

  it("rejects an uncompilable pattern", () => {
    const table = rawTable();
    table.sentimentRules = {
      dissatisfaction: [{ pattern: "(unclosed", delta: -0.2 }],
      positiveReinforcement: [],
      negativeReinforcement: [],
    };

    expect(() => parseLexicon(table)).toThrow(/Invalid dissatisfaction pattern/);
  });

  it("lowercases keyword lists", () => {
    const table = rawTable();
    table.productKeywords = ["App", "BILLING"];

    expect(parseLexicon(table).productKeywords).toEqual(["app", "billing"]);
  });

  it("wraps unreadable files", () => {
    expect(() => loadLexicon("/nonexistent/lexicon.json")).toThrow(LexiconError);
  });
});
