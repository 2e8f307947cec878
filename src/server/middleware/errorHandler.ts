import type { NextFunction, Request, Response } from 'express';
import type { ApiResponse } from '../../shared/api.js';
import { AppError } from '../errors.js';

const STAGE_NAMES = {
  request: 'Request validation',
  session: 'Sign-in check',
  load: 'Content loading',
  sentiment: 'Sentiment analysis',
  keywords: 'Keyword extraction',
  brands: 'Brand mention tracking',
  aggregate: 'Report assembly',
  summary: 'Trend summary',
} as const;

const BODY_ERROR_MESSAGES: Record<string, string> = {
  'entity.parse.failed': 'Request body is not valid JSON',
  'entity.too.large': 'Request body is too large',
  'charset.unsupported': 'Request body charset is not supported',
  'encoding.unsupported': 'Request body encoding is not supported',
};

type BodyParserError = Error & { status: number; type: string };

/** express.json() failures carry a 4xx `status` and a `type` such as "entity.too.large". */
function isBodyParserError(err: unknown): err is BodyParserError {
  return err instanceof Error
    && 'status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500
    && 'type' in err && typeof err.type === 'string';
}

export function toErrorBody(err: unknown): { status: number; body: ApiResponse<never> } {
  if (err instanceof AppError) {
    const prefix = err.stage ? `${STAGE_NAMES[err.stage]} failed: ` : '';
    return {
      status: err.statusCode,
      body: { success: false, error: `${prefix}${err.message}`, code: err.code, stage: err.stage },
    };
  }
  if (isBodyParserError(err)) {
    const message = BODY_ERROR_MESSAGES[err.type] ?? err.message;
    return {
      status: err.status,
      body: { success: false, error: `${STAGE_NAMES.request} failed: ${message}`, code: 'INVALID_INPUT', stage: 'request' },
    };
  }
  return {
    status: 500,
    body: { success: false, error: 'Internal server error', code: 'INTERNAL_ERROR' },
  };
}

/**
 * Global error handler: typed errors keep their status and stage, anything
 * else is logged and reported as a generic 500.
 */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  const { status, body } = toErrorBody(err);

  if (status >= 500) {
    console.error('Error in request:', {
      method: req.method,
      url: req.url,
      error: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
  } else {
    console.warn(`${req.method} ${req.url} -> ${status}: ${body.error}`);
  }

  res.status(status).json(body);
}
