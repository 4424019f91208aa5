// API layer: Global error handler middleware

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { ZodError } from 'zod';
import { AppError } from '@/utils/errors.js';
import { Logger, serverLogger } from '@/utils/logger.js';

interface ErrorBody {
  success: false;
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

// body-parser and other http-errors style failures
interface HttpError extends Error {
  status: number;
  expose?: boolean;
  type?: string;
}

function isHttpError(err: unknown): err is HttpError {
  return err instanceof Error && 'status' in err && typeof err.status === 'number';
}

function body(code: string, message: string, details?: unknown): ErrorBody {
  return { success: false, error: details === undefined ? { code, message } : { code, message, details } };
}

export function createErrorHandler(logger: Logger = serverLogger) {
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    if (err instanceof ZodError) {
      res.status(422).json(body('VALIDATION_ERROR', 'Validation failed', err.issues));
      return;
    }

    if (err instanceof AppError) {
      if (err.statusCode === 401) {
        res.setHeader('WWW-Authenticate', 'Bearer');
      }
      if (err.statusCode >= 500) {
        logger.error(err.message, { code: err.code, method: req.method, path: req.path });
      }

      const isProduction = process.env.NODE_ENV === 'production';
      const message = isProduction && err.statusCode >= 500 ? 'Internal server error' : err.message;
      res.status(err.statusCode).json(body(err.code, message, err.details));
      return;
    }

    if (isHttpError(err) && err.status < 500) {
      const code = err.status === 413 ? 'PAYLOAD_TOO_LARGE' : 'BAD_REQUEST';
      res.status(err.status).json(body(code, err.expose === false ? 'Bad request' : err.message));
      return;
    }

    logger.error('Unhandled error', {
      method: req.method,
      path: req.path,
      error: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
    });

    // Don't leak error details in production
    const message =
      process.env.NODE_ENV === 'development' && err instanceof Error ? err.message : 'Internal server error';
    res.status(500).json(body('INTERNAL_ERROR', message));
  };
}

export const errorHandler = createErrorHandler();

// Async handler wrapper to avoid try-catch in every route
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
  return (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
