import type { Request, Response, NextFunction } from 'express';
import { ErrorCodes, type ErrorCode } from '@lmstudio-compat-proxy/shared';
import type { Logger } from '../lib/logger.js';

export class AppError extends Error {
  constructor(
    public statusCode: number,
    public code: ErrorCode,
    message: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

interface BodyReaderError extends Error {
  status: number;
  type?: string;
}

/**
 * Client errors (http-errors with a 4xx `status`) raised by express' body
 * parser while reading the inbound body.
 */
export function isBodyReaderError(err: unknown): err is BodyReaderError {
  return (
    err instanceof Error &&
    'status' in err &&
    typeof err.status === 'number' &&
    err.status >= 400 &&
    err.status < 500
  );
}

export function createErrorHandler(logger: Logger) {
  return function errorHandler(err: Error, _req: Request, res: Response, next: NextFunction): void {
    if (res.headersSent) {
      logger.warn({ err }, 'Error after response headers were sent');
      next(err);
      return;
    }

    if (err instanceof AppError) {
      logger.error({ err, code: err.code }, err.message);
      res.status(err.statusCode).json({
        success: false,
        error: {
          code: err.code,
          message: err.message,
          details: err.details,
        },
      });
      return;
    }

    if (isBodyReaderError(err)) {
      logger.error({ err, type: err.type }, 'Failed to read request body');
      res.status(400).json({
        success: false,
        error: {
          code: ErrorCodes.CLIENT_BODY_READ_ERROR,
          message: 'Failed to read request body',
          details: err.type,
        },
      });
      return;
    }

    logger.error({ err }, 'Error occurred');
    res.status(500).json({
      success: false,
      error: {
        code: ErrorCodes.INTERNAL_ERROR,
        message: 'Internal server error',
      },
    });
  };
}
