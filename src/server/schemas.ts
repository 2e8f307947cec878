import { z } from 'zod';
import type { RawInput } from '../shared/api.js';

const brandSchema = z.union([
  z.string().trim().min(1).max(100),
  z.object({
    name: z.string().trim().min(1).max(100),
    aliases: z.array(z.string().trim().min(1).max(100)).max(10).optional(),
  }),
]);

export const analyzeBodySchema = z
  .object({
    url: z.string().optional(),
    text: z.string().max(200_000).optional(),
    brands: z.array(brandSchema).max(25).optional(),
    maxKeywords: z.number().int().min(1).max(50).optional(),
  })
  .refine(body => (body.url === undefined) !== (body.text === undefined), {
    message: 'Provide exactly one of "url" or "text"',
  });

export const summarizeBodySchema = z
  .object({
    url: z.string().optional(),
    text: z.string().max(200_000).optional(),
    question: z.string().trim().max(500).optional(),
  })
  .refine(body => (body.url === undefined) !== (body.text === undefined), {
    message: 'Provide exactly one of "url" or "text"',
  });

export type AnalyzeBody = z.infer<typeof analyzeBodySchema>;
export type SummarizeBody = z.infer<typeof summarizeBodySchema>;

export const trendSummarySchema = z.object({
  trends: z.array(z.object({ title: z.string(), summary: z.string() })),
  competitorMentions: z.array(z.string()),
  brandPerception: z.string(),
});

export function toRawInput(body: { url?: string; text?: string }): RawInput {
  return body.url !== undefined ? { kind: 'url', url: body.url } : { kind: 'text', text: body.text ?? '' };
}
