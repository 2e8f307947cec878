import type { FailedStage } from '../shared/api.js';

/**
 * Base class for every error the API turns into a JSON envelope.
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly stage?: FailedStage;

  constructor(message: string, code: string, statusCode = 500, stage?: FailedStage) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.stage = stage;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class InvalidInputError extends AppError {
  constructor(message: string, stage?: FailedStage) {
    super(message, 'INVALID_INPUT', 400, stage);
  }
}

export class AuthenticationError extends AppError {
  constructor(message = 'Authentication required') {
    super(message, 'UNAUTHENTICATED', 401, 'session');
  }
}

export class FetchError extends AppError {
  public readonly url?: string;
  public readonly status?: number;

  constructor(message: string, details: { url?: string; status?: number } = {}) {
    super(message, 'FETCH_FAILED', 502, 'load');
    this.url = details.url;
    this.status = details.status;
  }
}

export class AnalysisError extends AppError {
  constructor(stage: FailedStage, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${stage} analysis failed: ${reason}`, 'ANALYSIS_FAILED', 500, stage);
  }
}

export class ServiceUnavailableError extends AppError {
  constructor(message: string, stage?: FailedStage) {
    super(message, 'SERVICE_UNAVAILABLE', 503, stage);
  }
}

export class ExternalServiceError extends AppError {
  constructor(service: string, message: string, stage?: FailedStage) {
    super(`External service error (${service}): ${message}`, 'EXTERNAL_SERVICE_ERROR', 502, stage);
  }
}
