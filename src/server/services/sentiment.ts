import Sentiment from 'sentiment';
import type { NormalizedDocument, SentimentLabel, SentimentResult } from '../../shared/api.js';

const NEUTRAL: SentimentResult = {
  polarity: 0,
  subjectivity: 0,
  label: 'Neutral',
  breakdown: { negative: 0, neutral: 0, positive: 0 },
};

// `|| 0` turns -0 into 0
const round3 = (n: number) => Math.round(n * 1000) / 1000 || 0;
const clamp = (n: number, min: number, max: number) => Math.max(min, Math.min(max, n));

export function labelFor(polarity: number): SentimentLabel {
  if (polarity > 0.05) return 'Positive';
  if (polarity < -0.05) return 'Negative';
  return 'Neutral';
}

/**
 * AFINN-based scoring. Comparative scores (score per token) typically fall
 * within -5..5, so polarity is the comparative score divided by 5.
 * Subjectivity is the share of tokens that carry a lexicon score.
 */
export class SentimentAnalyzer {
  private readonly engine = new Sentiment();

  analyze(doc: NormalizedDocument): SentimentResult {
    if (!doc.text.trim()) return { ...NEUTRAL, breakdown: { ...NEUTRAL.breakdown } };

    const result = this.engine.analyze(doc.text);
    const tokenCount = result.tokens.filter(t => t.length > 0).length;
    if (tokenCount === 0) return { ...NEUTRAL, breakdown: { ...NEUTRAL.breakdown } };

    const polarity = round3(clamp(result.score / tokenCount / 5, -1, 1));
    const positive = round3(result.positive.length / tokenCount);
    const negative = round3(result.negative.length / tokenCount);

    return {
      polarity,
      subjectivity: round3(clamp(result.words.length / tokenCount, 0, 1)),
      label: labelFor(polarity),
      breakdown: {
        negative,
        neutral: round3(Math.max(0, 1 - positive - negative)),
        positive,
      },
    };
  }
}
