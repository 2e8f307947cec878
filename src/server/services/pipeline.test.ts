import type { PipelineStage, SentimentResult, SessionContext } from '../../shared/api';
import { AnalysisError, AuthenticationError, FetchError, InvalidInputError } from '../errors';
import { ContentLoader } from './loader';
import { AnalysisPipeline } from './pipeline';
import { SentimentAnalyzer } from './sentiment';

const signedIn: SessionContext = { authenticated: true, user: { uid: 'user-1', email: 'user@example.com' } };
const anonymous: SessionContext = { authenticated: false };

function stubFetch(response: Response) {
  return jest.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => response);
}

function createPipeline(fetch = stubFetch(new Response('unused')), overrides: { sentiment?: SentimentAnalyzer } = {}) {
  return new AnalysisPipeline({
    loader: new ContentLoader({ fetch }),
    sentiment: overrides.sentiment,
    defaultBrands: ['Acme', 'Globex'],
    maxKeywords: 15,
  });
}

describe('AnalysisPipeline', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('produces a full report for pasted text', async () => {
    const pipeline = createPipeline();

    const report = await pipeline.run(signedIn, { kind: 'text', text: 'Acme phones are great, I love my Acme phone!' });

    expect(report.document).toEqual({ text: 'Acme phones are great, I love my Acme phone!' });
    expect(report.sentiment.label).toBe('Positive');
    expect(report.sentiment.polarity).toBe(0.133);
    expect(report.keywords[0]).toEqual({ keyword: 'acme', weight: 0.3333 });
    expect(report.hashtags).toEqual(['#Acme', '#Phones', '#Great', '#Love', '#Phone']);
    expect(report.mentions).toEqual([
      { brand: 'Acme', mentions: 2 },
      { brand: 'Globex', mentions: 0 },
    ]);
  });

  it('uses the brands and keyword limit given for the run', async () => {
    const pipeline = createPipeline();

    const report = await pipeline.run(
      signedIn,
      { kind: 'text', text: 'Acme phones are great, I love my Acme phone!' },
      { brands: ['Phone'], maxKeywords: 2 },
    );

    expect(report.mentions).toEqual([{ brand: 'Phone', mentions: 1 }]);
    expect(report.keywords.map(k => k.keyword)).toEqual(['acme', 'phones']);
  });

  it('analyzes a fetched page and reports stages in order', async () => {
    const fetch = stubFetch(new Response('<article><p>This update is terrible and I hate it.</p></article>', {
      status: 200,
      headers: { 'content-type': 'text/html' },
    }));
    const pipeline = createPipeline(fetch);
    const stages: PipelineStage[] = [];

    const report = await pipeline.run(signedIn, { kind: 'url', url: 'https://example.com/review' }, {
      onStage: stage => stages.push(stage),
    });

    expect(stages).toEqual(['loading', 'analyzing', 'aggregating']);
    expect(report.document.sourceUrl).toBe('https://example.com/review');
    expect(report.sentiment.label).toBe('Negative');
  });

  it('stops at loading when the page cannot be fetched', async () => {
    const fetch = stubFetch(new Response('gone', { status: 404, headers: { 'content-type': 'text/html' } }));
    const pipeline = createPipeline(fetch);
    const stages: PipelineStage[] = [];

    await expect(
      pipeline.run(signedIn, { kind: 'url', url: 'https://example.com/gone' }, { onStage: s => stages.push(s) }),
    ).rejects.toBeInstanceOf(FetchError);
    expect(stages).toEqual(['loading']);
  });

  it('rejects empty text', async () => {
    await expect(createPipeline().run(signedIn, { kind: 'text', text: '' })).rejects.toBeInstanceOf(InvalidInputError);
  });

  it('requires a signed-in session before loading anything', async () => {
    const fetch = stubFetch(new Response('<p>hi</p>', { status: 200, headers: { 'content-type': 'text/html' } }));
    const pipeline = createPipeline(fetch);

    await expect(pipeline.run(anonymous, { kind: 'url', url: 'https://example.com/' }))
      .rejects.toBeInstanceOf(AuthenticationError);
    expect(fetch).not.toHaveBeenCalled();
  });

  it('validates brands before loading', async () => {
    const fetch = stubFetch(new Response('<p>hi</p>', { status: 200, headers: { 'content-type': 'text/html' } }));
    const pipeline = createPipeline(fetch);

    await expect(pipeline.run(signedIn, { kind: 'url', url: 'https://example.com/' }, { brands: ['Acme', 'ACME'] }))
      .rejects.toThrow('Brand "ACME" is listed more than once');
    expect(fetch).not.toHaveBeenCalled();
  });

  it('wraps unexpected analyzer failures with the failing stage', async () => {
    class BrokenSentiment extends SentimentAnalyzer {
      analyze(): SentimentResult {
        throw new Error('lexicon unavailable');
      }
    }
    const pipeline = createPipeline(undefined, { sentiment: new BrokenSentiment() });

    const err = await pipeline.run(signedIn, { kind: 'text', text: 'Some text here' }).catch(e => e);

    expect(err).toBeInstanceOf(AnalysisError);
    expect(err.stage).toBe('sentiment');
    expect(err.message).toBe('sentiment analysis failed: lexicon unavailable');
  });
});
