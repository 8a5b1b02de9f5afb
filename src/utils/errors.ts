/**
 * Error classes for the batch pipeline and the control API.
 *
 * Every error carries an HTTP-style status code and a machine-readable code,
 * and serializes to an ErrorResponse via toJSON().
 */

import type { ErrorResponse } from '../types/api.ts';

/** Base application error with status code and machine-readable code. */
export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;

  constructor(message: string, statusCode: number, code: string) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
  }

  /** Produces an ErrorResponse-compatible JSON object for API responses. */
  toJSON(): ErrorResponse {
    return { error: this.message };
  }
}

/** 400 Bad Request -- invalid input or failed validation. */
export class ValidationError extends AppError {
  readonly details?: string;

  constructor(message: string, details?: string) {
    super(message, 400, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
    this.details = details;
  }

  toJSON(): ErrorResponse {
    return {
      error: this.message,
      ...(this.details ? { details: this.details } : {}),
    };
  }
}

/** 404 Not Found -- resource does not exist. */
export class NotFoundError extends AppError {
  constructor(message = 'Resource not found') {
    super(message, 404, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

/** 409 Conflict -- the request collides with the current run state. */
export class ConflictError extends AppError {
  constructor(message = 'Conflict') {
    super(message, 409, 'CONFLICT');
    this.name = 'ConflictError';
  }
}

/** Unreadable or invalid configuration. Fatal to a run. */
export class ConfigError extends AppError {
  readonly details?: string;

  constructor(message: string, details?: string) {
    super(message, 500, 'CONFIG_ERROR');
    this.name = 'ConfigError';
    this.details = details;
  }

  toJSON(): ErrorResponse {
    return {
      error: this.message,
      ...(this.details ? { details: this.details } : {}),
    };
  }
}

/** The input root is missing or not a directory. Fatal to a run. */
export class InputRootError extends AppError {
  constructor(message: string) {
    super(message, 500, 'INPUT_ROOT_UNAVAILABLE');
    this.name = 'InputRootError';
  }
}

/** The output root cannot be created. Fatal to a run. */
export class OutputRootError extends AppError {
  constructor(message: string) {
    super(message, 500, 'OUTPUT_ROOT_UNAVAILABLE');
    this.name = 'OutputRootError';
  }
}

/** A read or write of a single file's input or artifacts failed. Not retried. */
export class FilesystemFailure extends AppError {
  constructor(message = 'Filesystem operation failed', code = 'FILESYSTEM_FAILURE') {
    super(message, 500, code);
    this.name = 'FilesystemFailure';
  }
}

/** The PDF report could not be rendered or written. */
export class ReportRenderError extends FilesystemFailure {
  constructor(message = 'Report rendering failed') {
    super(message, 'REPORT_RENDER_FAILURE');
    this.name = 'ReportRenderError';
  }
}

/** Network error, timeout or 5xx from the annotation service. Retryable. */
export class TransientFailure extends AppError {
  constructor(message = 'Annotation service unavailable') {
    super(message, 502, 'TRANSIENT_FAILURE');
    this.name = 'TransientFailure';
  }
}

/** 429 from the annotation service. Retryable on the same backoff path. */
export class ThrottledFailure extends AppError {
  /** Delay requested by the service's Retry-After header, when present. */
  readonly retryAfterMs?: number;

  constructor(message = 'Annotation service rate limit reached', retryAfterMs?: number) {
    super(message, 429, 'THROTTLED');
    this.name = 'ThrottledFailure';
    this.retryAfterMs = retryAfterMs;
  }
}

/** Malformed request or response, or a 4xx other than 429. Never retried. */
export class PermanentFailure extends AppError {
  readonly details?: string;

  constructor(message: string, details?: string) {
    super(message, 502, 'PERMANENT_FAILURE');
    this.name = 'PermanentFailure';
    this.details = details;
  }
}

/** Every allowed attempt failed with a retryable error. */
export class RetriesExhausted extends AppError {
  readonly attempts: number;
  readonly lastError: TransientFailure | ThrottledFailure;

  constructor(attempts: number, lastError: TransientFailure | ThrottledFailure) {
    super(`All ${attempts} attempts failed: ${lastError.message}`, 502, 'RETRIES_EXHAUSTED');
    this.name = 'RetriesExhausted';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/** The run's abort signal fired while a file was in flight. */
export class RunCancelledError extends AppError {
  constructor(message = 'Run cancelled') {
    super(message, 499, 'RUN_CANCELLED');
    this.name = 'RunCancelledError';
  }
}

/** True for failures the retry policy may try again. */
export function isRetryable(error: unknown): error is TransientFailure | ThrottledFailure {
  return error instanceof TransientFailure || error instanceof ThrottledFailure;
}

/** Message of any thrown value, for logs and events. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
