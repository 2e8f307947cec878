import { Router, type Request, type Response } from 'express';
import type { StreamEvent } from '../../shared/api.js';
import { toErrorBody } from '../middleware/errorHandler.js';
import { getSession } from '../middleware/session.js';
import { validate } from '../middleware/validate.js';
import { analyzeBodySchema, toRawInput, type AnalyzeBody } from '../schemas.js';
import type { AnalysisPipeline } from '../services/pipeline.js';

export function streamAnalyzeHandler(pipeline: AnalysisPipeline) {
  return async (req: Request, res: Response) => {
    const body: AnalyzeBody = req.body;
    const session = getSession(res);

    // SSE HEADERS
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.flushHeaders();

    const send = (event: StreamEvent) => {
      res.write(`data: ${JSON.stringify(event)}\n\n`);
    };

    try {
      const report = await pipeline.run(session, toRawInput(body), {
        brands: body.brands,
        maxKeywords: body.maxKeywords,
        onStage: step => send({ type: 'stage', step }),
      });
      send({ type: 'report', data: report });
    } catch (err) {
      const { status, body: errorBody } = toErrorBody(err);
      if (status >= 500) console.error('Stream analysis failed:', err);
      send({
        type: 'error',
        message: errorBody.error ?? 'Analysis failed',
        code: errorBody.code,
        stage: errorBody.stage,
      });
    }

    send({ type: 'done' });
    res.end();
  };
}

export function createStreamRouter(pipeline: AnalysisPipeline) {
  const streamRouter = Router();
  streamRouter.post('/stream-analyze', validate(analyzeBodySchema), streamAnalyzeHandler(pipeline));
  return streamRouter;
}
