import 'express';
import type { ChildLogger } from '../../utils/logger';

// Request id and request-scoped logger assigned by the request logging middleware.
declare global {
  namespace Express {
    export interface Request {
      reqId?: string;
      log?: ChildLogger;
    }
  }
}
