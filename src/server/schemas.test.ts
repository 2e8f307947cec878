import { analyzeBodySchema, summarizeBodySchema, toRawInput } from './schemas';

describe('analyzeBodySchema', () => {
  it('accepts brand names and brand specs', () => {
    const parsed = analyzeBodySchema.parse({
      url: 'https://example.com',
      brands: ['Acme', { name: ' Globex ', aliases: ['Globex Corp'] }],
      maxKeywords: 10,
    });
    expect(parsed.brands).toEqual(['Acme', { name: 'Globex', aliases: ['Globex Corp'] }]);
  });

  it('rejects a body with neither url nor text', () => {
    expect(analyzeBodySchema.safeParse({ brands: ['Acme'] }).success).toBe(false);
  });

  it('rejects keyword limits outside 1..50', () => {
    expect(analyzeBodySchema.safeParse({ text: 'x', maxKeywords: 51 }).success).toBe(false);
    expect(analyzeBodySchema.safeParse({ text: 'x', maxKeywords: 2.5 }).success).toBe(false);
  });
});

describe('summarizeBodySchema', () => {
  it('accepts an optional question', () => {
    expect(summarizeBodySchema.parse({ text: 'x', question: ' Who leads? ' })).toEqual({ text: 'x', question: 'Who leads?' });
  });
});

describe('toRawInput', () => {
  it('prefers the url when present', () => {
    expect(toRawInput({ url: 'https://example.com' })).toEqual({ kind: 'url', url: 'https://example.com' });
    expect(toRawInput({ text: 'hello' })).toEqual({ kind: 'text', text: 'hello' });
    expect(toRawInput({})).toEqual({ kind: 'text', text: '' });
  });
});
