/**
 * Error Handling Middleware
 * ApiError, async route wrapper and the terminal Express error handler
 */

import { NextFunction, Request, RequestHandler, Response } from 'express';
import { CrawlError, httpStatusFor } from '../lib/errors/crawl.errors';
import { env } from '../config/env';

export class ApiError extends Error {
  readonly statusCode: number;
  readonly code?: string;

  constructor(statusCode: number, message: string, code?: string) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.code = code;
  }

  static fromCrawlError(error: CrawlError): ApiError {
    return new ApiError(httpStatusFor(error.code), error.message, error.code);
  }
}

/**
 * Forward rejected promises from async route handlers to Express
 */
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler => {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
};

/**
 * Must be registered after every router
 */
export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const apiError =
    err instanceof ApiError
      ? err
      : err instanceof CrawlError
        ? ApiError.fromCrawlError(err)
        : null;

  if (apiError) {
    res.status(apiError.statusCode).json({
      success: false,
      error: apiError.message,
      code: apiError.code,
    });
    return;
  }

  console.error(`Unhandled error on ${req.method} ${req.path}:`, err);
  res.status(500).json({
    success: false,
    error: env.NODE_ENV === 'production' ? 'Internal server error' : String(err),
  });
};
