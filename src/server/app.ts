import cors from 'cors';
import express from 'express';
import { existsSync } from 'fs';
import { join } from 'path';
import type { AppConfig } from './config.js';
import { errorHandler } from './middleware/errorHandler.js';
import { sessionContext } from './middleware/session.js';
import { createApiRouter } from './routes/api.js';
import { createStreamRouter } from './routes/streamAnalyze.js';
import { AIService } from './services/ai.js';
import { FirebaseIdentityProvider, type IdentityProvider } from './services/auth.js';
import { ContentLoader } from './services/loader.js';
import { AnalysisPipeline } from './services/pipeline.js';

export type AppOverrides = {
  identityProvider?: IdentityProvider | null;
  loader?: ContentLoader;
  ai?: AIService | null;
};

export function createApp(config: AppConfig, overrides: AppOverrides = {}) {
  const identityProvider = overrides.identityProvider !== undefined
    ? overrides.identityProvider
    : config.firebase && new FirebaseIdentityProvider(config.firebase.apiKey);

  const loader = overrides.loader ?? new ContentLoader({
    timeoutMs: config.fetchTimeoutMs,
    maxChars: config.maxContentChars,
  });

  const ai = overrides.ai !== undefined
    ? overrides.ai
    : config.gemini && new AIService(config.gemini.apiKey, { model: config.gemini.model });

  const pipeline = new AnalysisPipeline({
    loader,
    defaultBrands: config.defaultBrands,
    maxKeywords: config.maxKeywords,
  });

  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '1mb' }));
  app.use('/api', sessionContext(identityProvider));
  app.use('/api', createApiRouter({ config, pipeline, loader, ai }));
  app.use('/api', createStreamRouter(pipeline));

  // Serve Vite-built frontend in production
  if (config.isProd) {
    const clientDist = join(process.cwd(), 'dist/public');
    if (existsSync(clientDist)) {
      app.use(express.static(clientDist));
      app.get('*', (_req, res) => res.sendFile(join(clientDist, 'index.html')));
      console.log(`📦 Serving built client from ${clientDist}`);
    }
  }

  app.use(errorHandler);

  return app;
}
