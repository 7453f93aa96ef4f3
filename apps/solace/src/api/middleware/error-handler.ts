import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { SolaceError, ValidationError, handleError } from '../../utils/errors';
import { createLogger } from '../../utils/logger';
import { ApiResponse, apiErrorResponse } from './response';

const logger = createLogger('ErrorHandler');

const isDevelopment = (): boolean => process.env.NODE_ENV === 'development';

/**
 * Turn zod issues into a ValidationError naming the first offending field
 */
export function fromZodError(error: ZodError): ValidationError {
  const issues = error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
  const first = issues[0];
  const message = first
    ? `Invalid request${first.path ? ` (${first.path})` : ''}: ${first.message}`
    : 'Invalid request';
  return new ValidationError(message, issues);
}

/**
 * Body-parser failures carry an HTTP status and a type
 */
const isBodyParserError = (err: unknown): err is Error & { status: number; type: string } => {
  return err instanceof Error && 'status' in err && typeof err.status === 'number' && 'type' in err;
};

/**
 * 404 for routes nothing matched
 */
export function notFoundHandler(req: Request, res: Response<ApiResponse<null>>): void {
  res.status(404).json(apiErrorResponse('NOT_FOUND', `Route not found: ${req.method} ${req.path}`));
}

/**
 * Global error handler middleware
 */
export function errorHandler(
  err: unknown,
  req: Request,
  res: Response<ApiResponse<null>>,
  _next: NextFunction
): void {
  let error: SolaceError;
  if (err instanceof ZodError) {
    error = fromZodError(err);
  } else if (isBodyParserError(err) && err.status < 500) {
    error = new ValidationError(`Malformed request body: ${err.message}`);
  } else {
    error = handleError(err);
  }

  if (error.statusCode >= 500) {
    logger.error(`${req.method} ${req.path} failed`, error);
  } else {
    logger.warn(`${req.method} ${req.path} rejected`, { code: error.code, message: error.message });
  }

  // Internal details stay out of production responses
  const exposeDetails = error.statusCode < 500 || isDevelopment();
  const message = error.statusCode >= 500 && !isDevelopment()
    ? 'An unexpected error occurred'
    : error.message;

  res.status(error.statusCode).json(
    apiErrorResponse(error.code, message, exposeDetails ? error.details : undefined)
  );
}
