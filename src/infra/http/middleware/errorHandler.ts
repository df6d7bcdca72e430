import { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { UniquenessViolationError, UserNotFoundError } from '../../../domain/user/errors.js';
import { ValidationError } from '../../../application/errors.js';
import type { Logger } from '../../logging/logger.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

function isBodyParseError(err: Error): boolean {
  return 'type' in err && err.type === 'entity.parse.failed';
}

export function errorHandler(logger: Logger): ErrorRequestHandler {
  return (err: Error, _req: Request, res: Response, _next: NextFunction): void => {
    if (err instanceof ValidationError) {
      const response: ErrorResponse = {
        code: 'VALIDATION_ERROR',
        message: err.message,
        details: { issues: err.issues },
      };
      res.status(400).json(response);
      return;
    }

    if (isBodyParseError(err)) {
      const response: ErrorResponse = {
        code: 'INVALID_JSON',
        message: 'Request body is not valid JSON',
      };
      res.status(400).json(response);
      return;
    }

    if (err instanceof UserNotFoundError) {
      const response: ErrorResponse = {
        code: 'NOT_FOUND',
        message: err.message,
      };
      res.status(404).json(response);
      return;
    }

    if (err instanceof UniquenessViolationError) {
      const response: ErrorResponse = {
        code: 'CONFLICT',
        message: err.message,
        details: err.field ? { field: err.field } : undefined,
      };
      res.status(409).json(response);
      return;
    }

    logger.error({ err }, 'Unhandled error');

    const response: ErrorResponse = {
      code: 'INTERNAL_ERROR',
      message: 'Internal server error',
    };
    res.status(500).json(response);
  };
}
