import PQueue from 'p-queue';

/**
 * Gemini free tier allows ~60 requests/minute; keep a margin.
 */
export function createLlmQueue(options: { concurrency?: number; intervalCap?: number } = {}) {
  return new PQueue({
    concurrency: options.concurrency ?? 5,
    interval: 60_000,
    intervalCap: options.intervalCap ?? 55,
  });
}

export const llmQueue = createLlmQueue();
