import stopWordList from '../data/stopwords.json';
import type { KeywordEntry, NormalizedDocument } from '../../shared/api.js';

const stopWords = new Set<string>(stopWordList);

export type Extraction = {
  keywords: KeywordEntry[];
  hashtags: string[];
};

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .split(/\s+/)
    .filter(Boolean);
}

export function isCandidate(word: string): boolean {
  return word.length > 3 && !stopWords.has(word) && !/^\p{N}+$/u.test(word);
}

/** "ai-powered" -> "#AiPowered". Returns null when nothing alphanumeric is left. */
export function toHashtag(keyword: string): string | null {
  const body = keyword
    .split(/[^\p{L}\p{N}]+/u)
    .filter(Boolean)
    .map(part => part.charAt(0).toUpperCase() + part.slice(1))
    .join('');
  return body ? `#${body}` : null;
}

export function toHashtags(keywords: KeywordEntry[]): string[] {
  const seen = new Set<string>();
  const hashtags: string[] = [];
  for (const { keyword } of keywords) {
    const tag = toHashtag(keyword);
    if (!tag || seen.has(tag.toLowerCase())) continue;
    seen.add(tag.toLowerCase());
    hashtags.push(tag);
  }
  return hashtags;
}

export class KeywordExtractor {
  extract(doc: NormalizedDocument, maxKeywords: number): Extraction {
    const limit = Number.isFinite(maxKeywords) ? Math.max(0, Math.floor(maxKeywords)) : 0;
    const words = tokenize(doc.text).filter(isCandidate);

    // Map keeps first-occurrence order, which the stable sort uses as the tie-break.
    const freq = new Map<string, number>();
    for (const w of words) freq.set(w, (freq.get(w) || 0) + 1);

    const keywords = [...freq.entries()]
      .sort((a, b) => b[1] - a[1])
      .slice(0, limit)
      .map(([keyword, count]) => ({
        keyword,
        weight: Math.round((count / words.length) * 10_000) / 10_000,
      }));

    return { keywords, hashtags: toHashtags(keywords) };
  }
}
