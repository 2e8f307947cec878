import type PQueue from 'p-queue';
import type { ZodType } from 'zod';
import type { TrendSummary } from '../../shared/api.js';
import { ExternalServiceError } from '../errors.js';
import { trendSummarySchema } from '../schemas.js';
import { llmQueue } from './llmQueue.js';

type GeminiResponse = {
  candidates?: {
    content?: {
      parts?: { text?: string }[];
    };
  }[];
};

// ===================== SCHEMAS =====================

const TREND_SUMMARY_SCHEMA = {
  type: 'object',
  properties: {
    trends: {
      type: 'array',
      items: {
        type: 'object',
        properties: { title: { type: 'string' }, summary: { type: 'string' } },
        required: ['title', 'summary'],
      },
    },
    competitorMentions: { type: 'array', items: { type: 'string' } },
    brandPerception: { type: 'string' },
  },
  required: ['trends', 'competitorMentions', 'brandPerception'],
};

export type AIServiceOptions = {
  model?: string;
  fetch?: typeof fetch;
  queue?: PQueue;
  retryDelayMs?: number;
};

export class AIService {
  private readonly model: string;
  private readonly fetchImpl: typeof fetch;
  private readonly queue: PQueue;
  private readonly retryDelayMs: number;

  constructor(private readonly apiKey: string, options: AIServiceOptions = {}) {
    this.model = options.model ?? 'gemini-2.5-flash';
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.queue = options.queue ?? llmQueue;
    this.retryDelayMs = options.retryDelayMs ?? 1500;
  }

  // =========================================================
  // STRUCTURED GEMINI CALL (validated JSON)
  // =========================================================
  private async callGeminiJSON<T>(
    prompt: string,
    responseSchema: Record<string, unknown>,
    parser: ZodType<T>,
    retries = 2,
  ): Promise<T> {
    const url = `https://generativelanguage.googleapis.com/v1beta/models/${this.model}:generateContent`;

    const attempt = async (): Promise<Response> => {
      try {
        return await this.fetchImpl(`${url}?key=${this.apiKey}`, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({
            contents: [{ parts: [{ text: prompt }] }],
            generationConfig: {
              temperature: 0.2,
              maxOutputTokens: 1000,
              responseMimeType: 'application/json',
              responseSchema,
            },
          }),
          signal: AbortSignal.timeout(30_000),
        });
      } catch (e) {
        throw new ExternalServiceError('gemini', e instanceof Error ? e.message : String(e), 'summary');
      }
    };

    return this.queue.add(async () => {
      let res = await attempt();

      // retry transient
      for (let left = retries; left > 0 && (res.status === 429 || res.status >= 500); left--) {
        await new Promise(r => setTimeout(r, this.retryDelayMs));
        res = await attempt();
      }

      if (!res.ok) throw new ExternalServiceError('gemini', `HTTP ${res.status}`, 'summary');

      const data = (await res.json()) as GeminiResponse;
      const text = data.candidates?.[0]?.content?.parts?.[0]?.text;
      if (!text) throw new ExternalServiceError('gemini', 'Empty structured response', 'summary');

      let json: unknown;
      try {
        json = JSON.parse(text);
      } catch {
        throw new ExternalServiceError('gemini', 'Response was not valid JSON', 'summary');
      }

      const parsed = parser.safeParse(json);
      if (!parsed.success) throw new ExternalServiceError('gemini', 'Response did not match the schema', 'summary');
      return parsed.data;
    });
  }

  // =========================================================
  // SUMMARIZE TRENDS, COMPETITORS AND BRAND PERCEPTION
  // =========================================================
  async summarizeTrends(content: string, question?: string): Promise<TrendSummary> {
    const trimmedContent = content.slice(0, 10000);

    const prompt = `
You are a market research analyst. Analyze the following content and extract:
1. The top trends or topics (at most 6), each with a 1-2 line summary
2. Any competitor or brand mentions
3. The overall brand perception, in one or two sentences
${question ? `\nAlso keep this question in mind: ${question}\n` : ''}
Content:
${trimmedContent}

Return the data matching the JSON schema exactly.
`;

    console.log(`🤖 Summarizing ${trimmedContent.length} chars with ${this.model}`);
    return this.callGeminiJSON(prompt, TREND_SUMMARY_SCHEMA, trendSummarySchema);
  }
}
