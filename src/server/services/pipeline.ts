import type {
  AnalysisReport,
  BrandSpec,
  FailedStage,
  PipelineStage,
  RawInput,
  SessionContext,
} from '../../shared/api.js';
import { AnalysisError, AppError, AuthenticationError } from '../errors.js';
import { aggregate } from './aggregator.js';
import { BrandMentionTracker, toBrandSpecs } from './brands.js';
import { KeywordExtractor } from './keywords.js';
import { ContentLoader } from './loader.js';
import { SentimentAnalyzer } from './sentiment.js';

export type PipelineDeps = {
  loader: ContentLoader;
  sentiment?: SentimentAnalyzer;
  keywords?: KeywordExtractor;
  brands?: BrandMentionTracker;
  defaultBrands: string[];
  maxKeywords: number;
};

export type RunOptions = {
  brands?: Array<string | BrandSpec>;
  maxKeywords?: number;
  onStage?: (stage: PipelineStage) => void;
};

async function runStage<T>(stage: FailedStage, task: () => T): Promise<T> {
  try {
    return await task();
  } catch (err) {
    if (err instanceof AppError) throw err;
    throw new AnalysisError(stage, err);
  }
}

export class AnalysisPipeline {
  private readonly loader: ContentLoader;
  private readonly sentiment: SentimentAnalyzer;
  private readonly keywords: KeywordExtractor;
  private readonly brands: BrandMentionTracker;
  private readonly defaultBrands: string[];
  private readonly maxKeywords: number;

  constructor(deps: PipelineDeps) {
    this.loader = deps.loader;
    this.sentiment = deps.sentiment ?? new SentimentAnalyzer();
    this.keywords = deps.keywords ?? new KeywordExtractor();
    this.brands = deps.brands ?? new BrandMentionTracker();
    this.defaultBrands = deps.defaultBrands;
    this.maxKeywords = deps.maxKeywords;
  }

  async run(session: SessionContext, input: RawInput, options: RunOptions = {}): Promise<AnalysisReport> {
    if (!session.authenticated) throw new AuthenticationError();

    const brands = toBrandSpecs(options.brands && options.brands.length > 0 ? options.brands : this.defaultBrands);
    const maxKeywords = options.maxKeywords ?? this.maxKeywords;

    options.onStage?.('loading');
    const doc = await this.loader.load(input);

    // Independent analyzers over the same immutable document; Promise.all is the join.
    options.onStage?.('analyzing');
    const [sentiment, extraction, mentions] = await Promise.all([
      runStage('sentiment', () => this.sentiment.analyze(doc)),
      runStage('keywords', () => this.keywords.extract(doc, maxKeywords)),
      runStage('brands', () => this.brands.track(doc, brands)),
    ]);

    options.onStage?.('aggregating');
    return runStage('aggregate', () =>
      aggregate(doc, sentiment, extraction.keywords, extraction.hashtags, mentions),
    );
  }
}
