import { logger } from './logger';

export class ServiceError extends Error {
  constructor(
    message: string,
    public service: string,
    public statusCode: number = 500,
    public originalError?: unknown
  ) {
    super(message);
    this.name = 'ServiceError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConnectionError extends Error {
  constructor(
    message: string,
    public service: string,
    public originalError?: unknown
  ) {
    super(message);
    this.name = 'ConnectionError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class PermissionError extends Error {
  constructor(message: string, public directory: string) {
    super(message);
    this.name = 'PermissionError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class RateLimitedError extends Error {
  constructor(
    message: string,
    public service: string,
    public retryAfterMs?: number
  ) {
    super(message);
    this.name = 'RateLimitedError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class DownloadQuotaExceededError extends Error {
  constructor(message: string, public resetTime?: string) {
    super(message);
    this.name = 'DownloadQuotaExceededError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Logs an error that aborts the run and returns the process exit code.
 */
export function handleFatalError(err: unknown): number {
  if (err instanceof ConfigurationError) {
    logger.error(`Configuration error: ${err.message}`);
    return 1;
  }

  if (err instanceof ConnectionError) {
    logger.error(`[${err.service}] ${err.message}`);
    return 1;
  }

  if (err instanceof ServiceError) {
    logger.error(`[${err.service}] ${err.message} (status ${err.statusCode})`);
    return 1;
  }

  logger.error('Unhandled error:', err);
  return 1;
}
