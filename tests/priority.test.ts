import { describe, expect, it } from "vitest";

import { comparePriority, rankPriority } from "../src/engine/priority.js";
import type { Priority } from "../src/engine/types.js";

const neutralIntent = { intent: "neutral_mention", confidence: 0.5 } as const;

describe("rankPriority", () => {
  it("escalates confident negative sentiment to critical", () => {
    expect(rankPriority({ label: "negative", confidence: 0.9 }, neutralIntent, "meh")).toBe("critical");
  });

  it("escalates confident complaints to critical", () => {
    expect(rankPriority({ label: "neutral" }, { intent: "complaint", confidence: 0.9 }, "meh")).toBe("critical");
  });

  it("escalates on critical keywords alone", () => {
    expect(rankPriority({ label: "positive" }, neutralIntent, "this is a scam")).toBe("critical");
  });

  it("treats any complaint as high", () => {
    expect(rankPriority({ label: "neutral" }, { intent: "complaint", confidence: 0.5 }, "meh")).toBe("high");
  });

  it("treats high keywords as high", () => {
    expect(rankPriority({ label: "positive" }, neutralIntent, "so slow")).toBe("high");
  });

  it("reads a missing sentiment confidence as zero", () => {
    expect(rankPriority({ label: "negative" }, neutralIntent, "meh")).toBe("low");
  });

  it("ranks questions and neutral sentiment as medium", () => {
    expect(rankPriority({ label: "positive" }, { intent: "question", confidence: 0.3 }, "meh")).toBe("medium");
    expect(rankPriority({ label: "neutral" }, neutralIntent, "meh")).toBe("medium");
  });

  it("leaves positive recommendations low", () => {
    expect(rankPriority({ label: "positive" }, { intent: "recommendation", confidence: 0.3 }, "great stuff")).toBe("low");
  });
});

describe("priority ordering", () => {
  it("sorts most urgent first", () => {
    const priorities: Priority[] = ["low", "critical", "medium", "high"];

    expect(priorities.sort(comparePriority)).toEqual(["critical", "high", "medium", "low"]);
  });
});
