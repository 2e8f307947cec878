export type RawInput =
  | { kind: 'url'; url: string }
  | { kind: 'text'; text: string };

export type NormalizedDocument = {
  text: string;
  sourceUrl?: string;
};

export type SentimentLabel = 'Positive' | 'Negative' | 'Neutral';

export type SentimentResult = {
  polarity: number;      // [-1, 1]
  subjectivity: number;  // [0, 1]
  label: SentimentLabel;
  breakdown: { negative: number; neutral: number; positive: number };
};

export type KeywordEntry = {
  keyword: string;
  weight: number;
};

export type BrandSpec = {
  name: string;
  aliases?: string[];
};

export type BrandMention = {
  brand: string;
  mentions: number;
};

export type AnalysisReport = {
  document: NormalizedDocument;
  sentiment: SentimentResult;
  keywords: KeywordEntry[];
  hashtags: string[];
  mentions: BrandMention[];
};

export type AnalysisRequest = {
  url?: string;
  text?: string;
  brands?: Array<string | BrandSpec>;
  maxKeywords?: number;
};

export type PipelineStage = 'loading' | 'analyzing' | 'aggregating';

export type FailedStage = 'request' | 'session' | 'load' | 'sentiment' | 'keywords' | 'brands' | 'aggregate' | 'summary';

export type ApiResponse<T> = {
  success: boolean;
  data?: T;
  error?: string;
  code?: string;
  stage?: FailedStage;
};

export type AnalysisResponse = ApiResponse<AnalysisReport>;

export type StreamEvent =
  | { type: 'stage'; step: PipelineStage }
  | { type: 'report'; data: AnalysisReport }
  | { type: 'error'; message: string; code?: string; stage?: FailedStage }
  | { type: 'done' };

export type SessionUser = {
  uid: string;
  email?: string;
};

export type SessionContext = {
  authenticated: boolean;
  user?: SessionUser;
};

export type PublicConfig = {
  firebase: {
    apiKey: string;
    authDomain: string;
    projectId: string;
    appId: string;
  } | null;
  summariesEnabled: boolean;
  defaultBrands: string[];
  maxKeywords: number;
};

export type TrendSummary = {
  trends: { title: string; summary: string }[];
  competitorMentions: string[];
  brandPerception: string;
};

export type SummaryRequest = AnalysisRequest & { question?: string };

export type SummaryResponse = ApiResponse<TrendSummary>;
