import type {
  AnalysisReport,
  BrandMention,
  KeywordEntry,
  NormalizedDocument,
  SentimentResult,
} from '../../shared/api.js';

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Combines the analyzer outputs into the report the client renders. Copies
 * every input so that later changes to them cannot reach the report.
 */
export function aggregate(
  doc: NormalizedDocument,
  sentiment: SentimentResult,
  keywords: KeywordEntry[],
  hashtags: string[],
  mentions: BrandMention[],
): AnalysisReport {
  return deepFreeze({
    document: doc.sourceUrl ? { text: doc.text, sourceUrl: doc.sourceUrl } : { text: doc.text },
    sentiment: { ...sentiment, breakdown: { ...sentiment.breakdown } },
    keywords: keywords.map(k => ({ ...k })),
    hashtags: [...hashtags],
    mentions: mentions.map(m => ({ ...m })),
  });
}
