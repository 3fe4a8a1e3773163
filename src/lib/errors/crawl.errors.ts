/**
 * Crawl Error Handling
 * Error taxonomy shared by the crawl core and the HTTP edge
 */

export enum CrawlErrorCode {
  // Request level
  CONFIG_NOT_FOUND = 'ConfigNotFound',
  INVALID_OPTIONS = 'InvalidOptions',
  JOB_NOT_FOUND = 'JobNotFound',
  INVALID_TRANSITION = 'InvalidTransition',

  // Record level (returned as rejections, never thrown by the normalizer)
  INVALID_TITLE = 'InvalidTitle',
  INVALID_URL = 'InvalidURL',
  INCOMPLETE_RECORD = 'IncompleteRecord',

  // Page level
  FETCH_ERROR = 'FetchError',
  EXTRACTION_ERROR = 'ExtractionError',

  // Storage / job level
  STORAGE_UNAVAILABLE = 'StorageUnavailable',
  JOB_FATAL = 'JobFatal',
}

export type RejectionReason =
  | CrawlErrorCode.INVALID_TITLE
  | CrawlErrorCode.INVALID_URL
  | CrawlErrorCode.INCOMPLETE_RECORD;

export class CrawlError extends Error {
  readonly code: CrawlErrorCode;
  readonly details?: Record<string, unknown>;
  readonly cause?: unknown;

  constructor(
    code: CrawlErrorCode,
    message: string,
    options: { details?: Record<string, unknown>; cause?: unknown } = {}
  ) {
    super(message);
    this.name = 'CrawlError';
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

export function isCrawlError(error: unknown, code?: CrawlErrorCode): error is CrawlError {
  if (!(error instanceof CrawlError)) {
    return false;
  }
  return code === undefined || error.code === code;
}

/**
 * Human readable message for anything that was thrown
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Unknown error';
}

/**
 * Class name used in job error details
 */
export function getErrorType(error: unknown): string {
  if (error instanceof CrawlError) {
    return error.code;
  }
  if (error instanceof Error) {
    return error.constructor.name || error.name;
  }
  return typeof error;
}

/**
 * HTTP status for errors that surface through the API
 */
export function httpStatusFor(code: CrawlErrorCode): number {
  switch (code) {
    case CrawlErrorCode.CONFIG_NOT_FOUND:
    case CrawlErrorCode.JOB_NOT_FOUND:
      return 404;
    case CrawlErrorCode.INVALID_OPTIONS:
      return 400;
    case CrawlErrorCode.INVALID_TRANSITION:
      return 409;
    case CrawlErrorCode.STORAGE_UNAVAILABLE:
      return 503;
    default:
      return 500;
  }
}
