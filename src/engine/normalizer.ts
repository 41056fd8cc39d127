import { randomUUID } from "node:crypto";
import { z } from "zod";

import type { Mention, MentionPlatform, RawMentionInput } from "./types.js";

const PLATFORM_ALIASES: Readonly<Record<string, MentionPlatform>> = {
  appstore: "AppStore",
  applestore: "AppStore",
  ios: "AppStore",
  googleplay: "GooglePlay",
  playstore: "GooglePlay",
  android: "GooglePlay",
  reddit: "Reddit",
  trustpilot: "Trustpilot",
  searchresult: "SearchResult",
  serp: "SearchResult",
  search: "SearchResult",
  google: "SearchResult",
};

// Epoch values below this are read as seconds rather than milliseconds.
const EPOCH_SECONDS_CEILING = 1e11;

const identifier = z.union([z.string(), z.number()]).nullish();

export const rawMentionSchema = z.object({
  platform: z.string().optional(),
  content: z.string().optional(),
  title: z.string().nullish(),
  rating: z.union([z.number(), z.string()]).nullish(),
  author: z.string().nullish(),
  source_url: z.string().nullish(),
  date: z.union([z.string(), z.number()]).nullish(),
  id: identifier,
  external_id: identifier,
});

export type NormalizeOutcome = { ok: true; mention: Mention } | { ok: false; reason: string };

export function normalizePlatform(platform: string | undefined): MentionPlatform {
  if (!platform) {
    return "Unknown";
  }
  const key = platform.toLowerCase().replace(/[^a-z]/g, "");
  return PLATFORM_ALIASES[key] ?? "Unknown";
}

function normalizeRating(rating: RawMentionInput["rating"]): number | undefined {
  if (rating === null || rating === undefined) {
    return undefined;
  }
  if (typeof rating === "string" && rating.trim().length === 0) {
    return undefined;
  }
  const value = typeof rating === "number" ? rating : Number(rating);
  return Number.isFinite(value) ? value : undefined;
}

function normalizeDate(date: RawMentionInput["date"], now: Date): Date {
  if (date === null || date === undefined || date === "") {
    return now;
  }
  const parsed =
    typeof date === "number" ? new Date(date < EPOCH_SECONDS_CEILING ? date * 1000 : date) : new Date(date);
  return Number.isNaN(parsed.getTime()) ? now : parsed;
}

function normalizeIdentifier(raw: RawMentionInput): string {
  for (const candidate of [raw.id, raw.external_id]) {
    if (candidate !== null && candidate !== undefined && String(candidate).trim().length > 0) {
      return String(candidate).trim();
    }
  }
  return randomUUID();
}

function optionalText(value: string | null | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Turns an untyped ingestion payload into a `Mention`. Only structurally wrong payloads are
 * rejected; missing fields get defaults, and empty content is kept so the classifier can
 * count it as skipped.
 */
export function normalizeRawMention(raw: unknown, now: Date = new Date()): NormalizeOutcome {
  const parsed = rawMentionSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, reason: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ") };
  }
  const input = parsed.data;

  return {
    ok: true,
    mention: {
      externalId: normalizeIdentifier(input),
      platform: normalizePlatform(input.platform),
      text: input.content?.trim() ?? "",
      title: optionalText(input.title),
      rating: normalizeRating(input.rating),
      authorName: optionalText(input.author) ?? "Anonymous",
      sourceUrl: optionalText(input.source_url),
      originalDate: normalizeDate(input.date, now),
      isMarked: false,
    },
  };
}
