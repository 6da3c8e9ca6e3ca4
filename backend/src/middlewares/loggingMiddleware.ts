import type { NextFunction, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import logger from '../utils/logger';

export const loggingMiddleware = (req: Request, res: Response, next: NextFunction) => {
  const requestId = uuidv4();
  const log = logger.child(requestId);
  req.reqId = requestId;
  req.log = log;

  const startTime = Date.now();
  log.debug('Incoming request', { method: req.method, path: req.path });

  res.on('finish', () => {
    log.info('Request completed', {
      method: req.method,
      path: req.originalUrl,
      statusCode: res.statusCode,
      duration: Date.now() - startTime
    });
  });

  next();
};
