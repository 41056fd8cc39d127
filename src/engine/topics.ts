import { getLexicon } from "./lexicon.js";
import type { Lexicon } from "./lexicon.js";
import { TOPICS } from "./types.js";
import type { ThemeSummary, Topic } from "./types.js";

const MAX_KEYWORDS = 10;
const TOP_WORDS = 20;
const TOP_PHRASES = 15;
const MIN_WORD_LENGTH = 4;
const MIN_PHRASE_LENGTH = 7;

export function extractKeywords(text: string, lexicon: Lexicon = getLexicon()): string[] {
  const lowered = text.toLowerCase();
  return lexicon.productKeywords.filter((keyword) => lowered.includes(keyword)).slice(0, MAX_KEYWORDS);
}

export function tagTopics(text: string, lexicon: Lexicon = getLexicon()): Topic[] {
  const lowered = text.toLowerCase();
  return TOPICS.filter((topic) => lexicon.topics[topic].some((keyword) => lowered.includes(keyword)));
}

/** Word runs in any script; accented and non-Latin letters stay inside their word. */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}_]+/gu) ?? [];
}

function increment(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

// Array.prototype.sort is stable, so equal counts keep first-seen order.
function topEntries(counts: Map<string, number>, minFrequency: number, limit: number): Array<[string, number]> {
  return Array.from(counts.entries())
    .filter(([, count]) => count >= minFrequency)
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit);
}

/**
 * Frequency-based theme summary across a batch of texts. Bigrams span every adjacent word
 * pair, stop words included, and are kept only when the joined phrase is longer than six
 * characters.
 */
export function extractThemes(texts: readonly string[], minFrequency = 3, lexicon: Lexicon = getLexicon()): ThemeSummary {
  const wordCounts = new Map<string, number>();
  const phraseCounts = new Map<string, number>();

  for (const text of texts) {
    const words = tokenize(text);
    for (const word of words) {
      if (word.length >= MIN_WORD_LENGTH && !lexicon.stopWords.has(word)) {
        increment(wordCounts, word);
      }
    }
    // Pairs stay within one text; the last word of a review and the first of the next are unrelated.
    for (let i = 0; i < words.length - 1; i += 1) {
      const phrase = `${words[i]} ${words[i + 1]}`;
      if (phrase.length >= MIN_PHRASE_LENGTH) {
        increment(phraseCounts, phrase);
      }
    }
  }

  return {
    commonWords: topEntries(wordCounts, minFrequency, TOP_WORDS),
    commonPhrases: topEntries(phraseCounts, minFrequency, TOP_PHRASES),
    totalTextsAnalyzed: texts.length,
  };
}
