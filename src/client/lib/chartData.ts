import type { BrandMention, KeywordEntry, SentimentResult } from '../../shared/api.js';

export type SentimentBar = { name: 'Negative' | 'Neutral' | 'Positive'; value: number };

export function sentimentBars(sentiment: SentimentResult): SentimentBar[] {
  return [
    { name: 'Negative', value: sentiment.breakdown.negative },
    { name: 'Neutral', value: sentiment.breakdown.neutral },
    { name: 'Positive', value: sentiment.breakdown.positive },
  ];
}

/** Polarity -1..1 as a 0..100 gauge position. */
export function polarityPercent(polarity: number): number {
  return Math.round(((Math.max(-1, Math.min(1, polarity)) + 1) / 2) * 100);
}

export function mentionBars(mentions: BrandMention[]): { brand: string; mentions: number }[] {
  return mentions.map(m => ({ brand: m.brand, mentions: m.mentions }));
}

/** Keyword weights relative to the strongest one, for bar widths. */
export function keywordWidths(keywords: KeywordEntry[]): { keyword: string; percent: number }[] {
  const top = keywords.reduce((max, k) => Math.max(max, k.weight), 0);
  return keywords.map(k => ({
    keyword: k.keyword,
    percent: top > 0 ? Math.round((k.weight / top) * 100) : 0,
  }));
}

/** "Acme, Globex,,acme " -> ["Acme", "Globex"] */
export function parseBrandList(input: string): string[] {
  const seen = new Set<string>();
  const brands: string[] = [];
  for (const raw of input.split(',')) {
    const name = raw.trim();
    if (!name || seen.has(name.toLowerCase())) continue;
    seen.add(name.toLowerCase());
    brands.push(name);
  }
  return brands;
}
