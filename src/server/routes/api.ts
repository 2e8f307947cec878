import { Router, type NextFunction, type Request, type Response } from 'express';
import type { AnalysisResponse, PublicConfig, SessionContext, SummaryResponse } from '../../shared/api.js';
import type { AppConfig } from '../config.js';
import { AuthenticationError, ServiceUnavailableError } from '../errors.js';
import { getSession } from '../middleware/session.js';
import { validate } from '../middleware/validate.js';
import { analyzeBodySchema, summarizeBodySchema, toRawInput, type AnalyzeBody, type SummarizeBody } from '../schemas.js';
import type { AIService } from '../services/ai.js';
import type { ContentLoader } from '../services/loader.js';
import type { AnalysisPipeline } from '../services/pipeline.js';

export type ApiDeps = {
  config: AppConfig;
  pipeline: AnalysisPipeline;
  loader: ContentLoader;
  ai: AIService | null;
};

export function analyzeHandler(pipeline: AnalysisPipeline) {
  return async (req: Request, res: Response, next: NextFunction) => {
    const body: AnalyzeBody = req.body;
    const session = getSession(res);

    try {
      console.log(`\n🔍 Analyzing ${body.url ? body.url : `${body.text?.length ?? 0} chars of text`}`);
      const report = await pipeline.run(session, toRawInput(body), {
        brands: body.brands,
        maxKeywords: body.maxKeywords,
      });
      console.log(`📊 ${report.sentiment.label} sentiment, ${report.keywords.length} keywords, ${report.mentions.length} brands`);

      res.json({ success: true, data: report } satisfies AnalysisResponse);
    } catch (err) {
      next(err);
    }
  };
}

export function summarizeHandler(loader: ContentLoader, ai: AIService | null) {
  return async (req: Request, res: Response, next: NextFunction) => {
    const body: SummarizeBody = req.body;
    const session = getSession(res);

    try {
      if (!session.authenticated) throw new AuthenticationError();
      if (!ai) throw new ServiceUnavailableError('Trend summaries are not configured on this server', 'summary');

      const doc = await loader.load(toRawInput(body));
      const summary = await ai.summarizeTrends(doc.text, body.question);

      res.json({ success: true, data: summary } satisfies SummaryResponse);
    } catch (err) {
      next(err);
    }
  };
}

export function publicConfig(config: AppConfig): PublicConfig {
  return {
    firebase: config.firebase,
    summariesEnabled: config.gemini !== null,
    defaultBrands: config.defaultBrands,
    maxKeywords: config.maxKeywords,
  };
}

export function createApiRouter({ config, pipeline, loader, ai }: ApiDeps) {
  const router = Router();

  router.get('/health', (_req, res) => {
    res.json({
      status: 'healthy',
      service: 'Trend Insights',
      features: { auth: config.firebase !== null, summaries: ai !== null },
    });
  });

  router.get('/config', (_req, res) => {
    res.json({ success: true, data: publicConfig(config) });
  });

  router.get('/session', (_req, res) => {
    const session: SessionContext = getSession(res);
    res.json({ success: true, data: session });
  });

  router.post('/analyze', validate(analyzeBodySchema), analyzeHandler(pipeline));
  router.post('/summarize', validate(summarizeBodySchema), summarizeHandler(loader, ai));

  return router;
}
