import type { NextFunction, Request, Response } from 'express';
import errorHandler from '../utils/errorHandler';
import type { ApiErrorResponse } from '../types/index';

export const notFoundHandler = (req: Request, res: Response) => {
  const requestId = req.reqId ?? 'unknown';
  res.status(404).json({
    error: 'NOT_FOUND',
    message: `Route not found: ${req.method} ${req.path}`,
    requestId,
    retryable: false,
  } satisfies ApiErrorResponse);
};

// Express recognises error middleware by its four parameters.
export const errorMiddleware = (err: unknown, req: Request, res: Response, _next: NextFunction) => {
  const requestId = req.reqId ?? 'unknown';
  const appError = errorHandler.handleError(err, requestId);

  const body: ApiErrorResponse = {
    error: appError.code,
    message: appError.userMessage,
    requestId,
    retryable: appError.isRetryable,
  };
  if (appError.statusCode < 500 || process.env.NODE_ENV === 'development') {
    body.details = appError.details;
  }

  res.status(appError.statusCode).json(body);
};
