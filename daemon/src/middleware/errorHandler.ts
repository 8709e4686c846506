import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { logger } from '../logger';
import { CorebarError, ValidationError } from '../errors';

interface ErrorDetails {
  statusCode: number;
  code: string;
  details?: string[];
}

function describe(err: Error): ErrorDetails {
  if (err instanceof ValidationError) {
    return { statusCode: err.statusCode, code: err.code, details: err.details };
  }
  if (err instanceof CorebarError) {
    return { statusCode: err.statusCode, code: err.code };
  }
  if (err instanceof ZodError) {
    return {
      statusCode: 400,
      code: 'VALIDATION_ERROR',
      details: err.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    };
  }
  // body-parser marks malformed JSON bodies with a 4xx status
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return { statusCode: err.status, code: 'BAD_REQUEST' };
  }
  return { statusCode: 500, code: 'INTERNAL_ERROR' };
}

export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction) {
  const { statusCode, code, details } = describe(err);

  if (statusCode >= 500) {
    logger.error({
      module: 'middleware.errorHandler',
      error_message: err.message,
      stack_trace: err.stack,
      request_id: req.id,
      path: req.path,
      error_type: err.name,
      error_code: code,
    }, `${statusCode} returned`);
  } else {
    logger.warn({
      module: 'middleware.errorHandler',
      error_message: err.message,
      request_id: req.id,
      path: req.path,
      error_type: err.name,
      error_code: code,
    }, 'Request rejected');
  }

  res.status(statusCode).json({
    error: {
      message: statusCode === 500 && !(err instanceof CorebarError) ? 'Internal server error' : err.message,
      type: err.name,
      code,
      ...(details && { details }),
    },
  });
}
