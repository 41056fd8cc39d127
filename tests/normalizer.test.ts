import { describe, expect, it } from "vitest";

import { normalizePlatform, normalizeRawMention } from "../src/engine/normalizer.js";

const now = new Date("2024-06-30T12:00:00.000Z");

describe("normalizeRawMention", () => {
  it("maps a complete payload", () => {
    const outcome = normalizeRawMention(
      {
        platform: "Google Play",
        content: "  Works well  ",
        title: "",
        rating: "4",
        author: "",
        source_url: "https://example.com/reviews/1",
        date: "2024-03-01T10:00:00Z",
        id: 42,
      },
      now
    );

    expect(outcome).toEqual({
      ok: true,
      mention: {
        externalId: "42",
        platform: "GooglePlay",
        text: "Works well",
        title: undefined,
        rating: 4,
        authorName: "Anonymous",
        sourceUrl: "https://example.com/reviews/1",
        originalDate: new Date("2024-03-01T10:00:00.000Z"),
        isMarked: false,
      },
    });
  });

  it("reads small epoch numbers as seconds", () => {
    const outcome = normalizeRawMention({ content: "ok", date: 1_700_000_000 }, now);

    expect(outcome.ok && outcome.mention.originalDate.getTime()).toBe(1_700_000_000_000);
  });

  it("falls back to the current time for unreadable dates", () => {
    const outcome = normalizeRawMention({ content: "ok", date: "not a date" }, now);

    expect(outcome.ok && outcome.mention.originalDate).toEqual(now);
  });

  it("uses external_id when id is absent", () => {
    const outcome = normalizeRawMention({ content: "ok", external_id: "ext-9" }, now);

    expect(outcome.ok && outcome.mention.externalId).toBe("ext-9");
  });

  it("generates an id when none is supplied", () => {
    const outcome = normalizeRawMention({ content: "ok" }, now);

    expect(outcome.ok && outcome.mention.externalId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("drops ratings that are not numbers", () => {
    const outcome = normalizeRawMention({ content: "ok", rating: "five" }, now);

    expect(outcome.ok && outcome.mention.rating).toBeUndefined();
  });

  it("keeps payloads without content so they can be skipped later", () => {
    const outcome = normalizeRawMention({ platform: "reddit" }, now);

    expect(outcome.ok && outcome.mention.text).toBe("");
  });

  it("rejects payloads with the wrong shape", () => {
    expect(normalizeRawMention("just a string", now).ok).toBe(false);

    const outcome = normalizeRawMention({ content: 5 }, now);
    expect(outcome.ok).toBe(false);
    expect(!outcome.ok && outcome.reason).toMatch(/^content: /);
  });
});

describe("normalizePlatform", () => {
  it("accepts common spellings", () => {
    expect(normalizePlatform("App Store")).toBe("AppStore");
    expect(normalizePlatform("play-store")).toBe("GooglePlay");
    expect(normalizePlatform("Trustpilot")).toBe("Trustpilot");
  });

  it("maps anything else to Unknown", () => {
    expect(normalizePlatform("myspace")).toBe("Unknown");
    expect(normalizePlatform(undefined)).toBe("Unknown");
  });
});
