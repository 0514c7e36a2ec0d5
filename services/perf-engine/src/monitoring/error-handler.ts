import type { NextFunction, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import type { Logger } from '../utils/logger.js';

export interface ErrorInfo {
  id: string;
  timestamp: string;
  type: string;
  message: string;
  context: {
    url?: string;
    method?: string;
  };
}

/**
 * Last-resort handler for route errors. Every captured error gets an id that
 * is returned to the caller and logged alongside the stack.
 */
export class ErrorHandler {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: 'http' });
  }

  middleware() {
    return (error: unknown, req: Request, res: Response, next: NextFunction): void => {
      const errorInfo = this.captureError(error, { url: req.originalUrl, method: req.method });

      if (res.headersSent) {
        next(error);
        return;
      }

      res.status(500).json({
        success: false,
        error: 'Internal Server Error',
        errorId: errorInfo.id,
        timestamp: errorInfo.timestamp,
      });
    };
  }

  captureError(error: unknown, context: ErrorInfo['context'] = {}): ErrorInfo {
    const err = error instanceof Error ? error : new Error(String(error));
    const errorInfo: ErrorInfo = {
      id: uuidv4(),
      timestamp: new Date().toISOString(),
      type: err.name,
      message: err.message,
      context,
    };

    this.logger.error({ err, errorId: errorInfo.id, ...context }, 'Unhandled route error');
    return errorInfo;
  }
}
