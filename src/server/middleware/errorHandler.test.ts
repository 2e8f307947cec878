import { Request, Response } from 'express';
import { AnalysisError, AuthenticationError, FetchError, InvalidInputError } from '../errors';
import { errorHandler, toErrorBody } from './errorHandler';

describe('toErrorBody', () => {
  it('prefixes the failing stage', () => {
    expect(toErrorBody(new FetchError('Failed to fetch https://example.com/: HTTP 404'))).toEqual({
      status: 502,
      body: {
        success: false,
        error: 'Content loading failed: Failed to fetch https://example.com/: HTTP 404',
        code: 'FETCH_FAILED',
        stage: 'load',
      },
    });
  });

  it('leaves stage-less errors unprefixed', () => {
    expect(toErrorBody(new InvalidInputError('Provide exactly one of "url" or "text"'))).toEqual({
      status: 400,
      body: { success: false, error: 'Provide exactly one of "url" or "text"', code: 'INVALID_INPUT', stage: undefined },
    });
  });

  it('maps authentication and analysis failures', () => {
    expect(toErrorBody(new AuthenticationError()).status).toBe(401);
    expect(toErrorBody(new AuthenticationError()).body.error).toBe('Sign-in check failed: Authentication required');

    const analysis = toErrorBody(new AnalysisError('keywords', new Error('boom')));
    expect(analysis.status).toBe(500);
    expect(analysis.body.error).toBe('Keyword extraction failed: keywords analysis failed: boom');
  });

  it('maps malformed JSON bodies to 400', () => {
    const err = Object.assign(new SyntaxError('Unexpected token'), {
      status: 400,
      type: 'entity.parse.failed',
      body: '{oops',
    });
    expect(toErrorBody(err)).toEqual({
      status: 400,
      body: {
        success: false,
        error: 'Request validation failed: Request body is not valid JSON',
        code: 'INVALID_INPUT',
        stage: 'request',
      },
    });
  });

  it('keeps the 413 status for oversized bodies', () => {
    const err = Object.assign(new Error('request entity too large'), {
      status: 413,
      statusCode: 413,
      type: 'entity.too.large',
      expected: 2_000_000,
      limit: 1_048_576,
    });
    expect(toErrorBody(err)).toEqual({
      status: 413,
      body: {
        success: false,
        error: 'Request validation failed: Request body is too large',
        code: 'INVALID_INPUT',
        stage: 'request',
      },
    });
  });

  it('falls back to the parser message for other body errors', () => {
    const err = Object.assign(new Error('unsupported content encoding "br2"'), {
      status: 415,
      type: 'encoding.unknown',
    });
    expect(toErrorBody(err).status).toBe(415);
    expect(toErrorBody(err).body.error).toBe('Request validation failed: unsupported content encoding "br2"');
  });

  it('does not treat server-side errors with a status as body errors', () => {
    const err = Object.assign(new Error('upstream down'), { status: 503, type: 'upstream' });
    expect(toErrorBody(err).status).toBe(500);
  });

  it('hides unexpected errors behind a generic 500', () => {
    expect(toErrorBody(new Error('db password leaked'))).toEqual({
      status: 500,
      body: { success: false, error: 'Internal server error', code: 'INTERNAL_ERROR' },
    });
  });
});

describe('errorHandler', () => {
  let req: Partial<Request>;
  let res: Partial<Response>;

  beforeEach(() => {
    req = { method: 'POST', url: '/api/analyze' };
    res = {
      status: jest.fn().mockReturnThis(),
      json: jest.fn(),
    };
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('responds with the typed status and logs client errors as warnings', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});

    errorHandler(new AuthenticationError(), req as Request, res as Response, jest.fn());

    expect(res.status).toHaveBeenCalledWith(401);
    expect(res.json).toHaveBeenCalledWith({
      success: false,
      error: 'Sign-in check failed: Authentication required',
      code: 'UNAUTHENTICATED',
      stage: 'session',
    });
    expect(warn).toHaveBeenCalledWith('POST /api/analyze -> 401: Sign-in check failed: Authentication required');
  });

  it('answers an oversized body with 413 and logs it as a warning', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
    const error = jest.spyOn(console, 'error').mockImplementation(() => {});
    const tooLarge = Object.assign(new Error('request entity too large'), { status: 413, type: 'entity.too.large' });

    errorHandler(tooLarge, req as Request, res as Response, jest.fn());

    expect(res.status).toHaveBeenCalledWith(413);
    expect(res.json).toHaveBeenCalledWith({
      success: false,
      error: 'Request validation failed: Request body is too large',
      code: 'INVALID_INPUT',
      stage: 'request',
    });
    expect(warn).toHaveBeenCalledTimes(1);
    expect(error).not.toHaveBeenCalled();
  });

  it('logs server errors with their stack', () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => {});

    errorHandler(new Error('boom'), req as Request, res as Response, jest.fn());

    expect(res.status).toHaveBeenCalledWith(500);
    expect(error).toHaveBeenCalledTimes(1);
    expect(error.mock.calls[0][0]).toBe('Error in request:');
  });
});
