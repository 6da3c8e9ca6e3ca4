import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import errorHandler, { AppError, ErrorCode } from '../errorHandler';

describe('errorHandler', () => {
  it('passes AppErrors through', () => {
    const original = errorHandler.createError(ErrorCode.PATH_REJECTED, 'Rejected filename');
    expect(errorHandler.handleError(original)).toBe(original);
    expect(original.statusCode).toBe(400);
    expect(original.userMessage).toBe('Rejected filename');
  });

  it('classifies rate limits by status or message', () => {
    expect(errorHandler.isRateLimitError(Object.assign(new Error('quota'), { status: 429 }))).toBe(true);
    expect(errorHandler.isRateLimitError(new Error('RESOURCE_EXHAUSTED: try later'))).toBe(true);
    expect(errorHandler.isRateLimitError(new Error('bad request'))).toBe(false);

    const handled = errorHandler.handleError(new Error('got 429 from upstream'));
    expect(handled.code).toBe(ErrorCode.RATE_LIMIT_EXCEEDED);
    expect(handled.statusCode).toBe(429);
    expect(handled.isRetryable).toBe(true);
  });

  it('maps network failures', () => {
    const error = Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' });
    expect(errorHandler.handleError(error).code).toBe(ErrorCode.NETWORK_ERROR);
  });

  it('maps zod failures to validation errors', () => {
    const result = z.object({ prompt: z.string() }).safeParse({});
    const handled = errorHandler.handleError(result.success ? null : result.error);
    expect(handled.code).toBe(ErrorCode.VALIDATION_ERROR);
    expect(handled.statusCode).toBe(400);
  });

  it('falls back to an internal error', () => {
    const handled = errorHandler.handleError('plain string failure');
    expect(handled).toBeInstanceOf(AppError);
    expect(handled.code).toBe(ErrorCode.INTERNAL_ERROR);
    expect(handled.message).toBe('plain string failure');
    expect(handled.userMessage).toBe('An unexpected error occurred.');
  });
});
