import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import { InvalidArgumentError } from '../../../domain/auth/errors.js';
import { ConflictError, UnauthorizedError } from '../../../application/errors.js';
import { isUniqueViolation } from '../../db/sqlExecutor.js';
import type { Logger } from '../../logger.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

export function createErrorHandler(logger: Logger = console) {
  return (err: Error, _req: Request, res: Response, _next: NextFunction): void => {
    if (err instanceof ZodError) {
      const response: ErrorResponse = {
        code: 'VALIDATION_ERROR',
        message: 'Validation failed',
        details: {
          issues: err.errors.map((e) => ({
            path: e.path.join('.'),
            message: e.message,
          })),
        },
      };
      res.status(400).json(response);
      return;
    }

    if (err instanceof InvalidArgumentError) {
      const response: ErrorResponse = { code: 'INVALID_ARGUMENT', message: err.message };
      res.status(400).json(response);
      return;
    }

    if (err instanceof UnauthorizedError) {
      const response: ErrorResponse = { code: 'UNAUTHORIZED', message: err.message };
      res.status(401).json(response);
      return;
    }

    if (err instanceof ConflictError || isUniqueViolation(err)) {
      const response: ErrorResponse = {
        code: 'CONFLICT',
        message: err instanceof ConflictError ? err.message : 'Conflict',
      };
      res.status(409).json(response);
      return;
    }

    logger.error('Error:', err);
    const response: ErrorResponse = {
      code: 'INTERNAL_ERROR',
      message: 'Internal server error',
    };
    res.status(500).json(response);
  };
}
