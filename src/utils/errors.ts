/**
 * Error classification for design-refiner.
 *
 * Provides:
 * - A base error with codes, an HTTP-like status and a retry hint
 * - Subclasses for the failure kinds the refinement loop distinguishes
 * - Normalisation of arbitrary thrown values into structured tool responses
 */

import { ZodError } from 'zod';
import { PathTraversalError, InvalidPathError } from './path-security.js';

export const ErrorCode = {
  // Client errors (4xx equivalent)
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_ARGUMENTS: 'INVALID_ARGUMENTS',
  NOT_FOUND: 'NOT_FOUND',
  SECURITY_ERROR: 'SECURITY_ERROR',
  CONFLICT: 'CONFLICT',
  PRECONDITION_FAILED: 'PRECONDITION_FAILED',

  // Server errors (5xx equivalent)
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
  EXTERNAL_SERVICE_ERROR: 'EXTERNAL_SERVICE_ERROR',
  ADAPTER_FAILURE: 'ADAPTER_FAILURE',

  // Tool-specific errors
  UNKNOWN_TOOL: 'UNKNOWN_TOOL',
  TOOL_EXECUTION_ERROR: 'TOOL_EXECUTION_ERROR',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

export const HttpStatus = {
  BAD_REQUEST: 400,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  CONFLICT: 409,
  PRECONDITION_FAILED: 412,
  UNPROCESSABLE_ENTITY: 422,
  INTERNAL_SERVER_ERROR: 500,
  BAD_GATEWAY: 502,
  SERVICE_UNAVAILABLE: 503,
} as const;

export class RefinerError extends Error {
  public readonly code: ErrorCodeType;
  public readonly httpStatus: number;
  public readonly details: Record<string, unknown> | undefined;
  public readonly isRetryable: boolean;

  constructor(
    message: string,
    code: ErrorCodeType,
    options?: {
      httpStatus?: number;
      details?: Record<string, unknown> | undefined;
      isRetryable?: boolean;
      cause?: unknown;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'RefinerError';
    this.code = code;
    this.httpStatus = options?.httpStatus ?? this.defaultHttpStatus(code);
    this.details = options?.details;
    this.isRetryable = options?.isRetryable ?? this.defaultRetryable(code);
  }

  private defaultHttpStatus(code: ErrorCodeType): number {
    switch (code) {
      case ErrorCode.VALIDATION_ERROR:
      case ErrorCode.INVALID_ARGUMENTS:
        return HttpStatus.UNPROCESSABLE_ENTITY;
      case ErrorCode.UNKNOWN_TOOL:
        return HttpStatus.BAD_REQUEST;
      case ErrorCode.NOT_FOUND:
        return HttpStatus.NOT_FOUND;
      case ErrorCode.SECURITY_ERROR:
        return HttpStatus.FORBIDDEN;
      case ErrorCode.CONFLICT:
        return HttpStatus.CONFLICT;
      case ErrorCode.PRECONDITION_FAILED:
        return HttpStatus.PRECONDITION_FAILED;
      case ErrorCode.ADAPTER_FAILURE:
        return HttpStatus.BAD_GATEWAY;
      case ErrorCode.SERVICE_UNAVAILABLE:
      case ErrorCode.EXTERNAL_SERVICE_ERROR:
        return HttpStatus.SERVICE_UNAVAILABLE;
      default:
        return HttpStatus.INTERNAL_SERVER_ERROR;
    }
  }

  private defaultRetryable(code: ErrorCodeType): boolean {
    switch (code) {
      case ErrorCode.SERVICE_UNAVAILABLE:
      case ErrorCode.EXTERNAL_SERVICE_ERROR:
        return true;
      default:
        return false;
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      error: true,
      code: this.code,
      message: this.message,
      httpStatus: this.httpStatus,
      isRetryable: this.isRetryable,
      ...(this.details && { details: this.details }),
    };
  }
}

export class NotFoundError extends RefinerError {
  constructor(resourceType: string, resourceId: string, details?: Record<string, unknown>) {
    super(`${resourceType} not found: ${resourceId}`, ErrorCode.NOT_FOUND, {
      details: { resourceType, resourceId, ...details },
    });
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends RefinerError {
  constructor(message: string, validationErrors?: Array<{ path: string; message: string }>) {
    const details = validationErrors ? { errors: validationErrors } : undefined;
    super(message, ErrorCode.VALIDATION_ERROR, { details });
    this.name = 'ValidationError';
  }

  static fromZodError(error: ZodError): ValidationError {
    const validationErrors = error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    return new ValidationError(
      `Validation failed: ${validationErrors.map((e) => e.message).join(', ')}`,
      validationErrors
    );
  }
}

export class SecurityError extends RefinerError {
  constructor(message: string, details?: Record<string, unknown> | undefined) {
    super(message, ErrorCode.SECURITY_ERROR, details ? { details } : undefined);
    this.name = 'SecurityError';
  }
}

/**
 * Which adapter boundary a failure surfaced from, after its own retries ran out
 */
export type AdapterName = 'generation' | 'compile' | 'validation';

export class AdapterError extends RefinerError {
  public readonly adapter: AdapterName;

  constructor(adapter: AdapterName, message: string, cause?: unknown) {
    super(`${adapter} adapter failed: ${message}`, ErrorCode.ADAPTER_FAILURE, {
      details: { adapter },
      cause,
    });
    this.name = 'AdapterError';
    this.adapter = adapter;
  }
}

/**
 * A run's onIteration hook threw; the run is sealed before this propagates
 */
export class IterationHookError extends RefinerError {
  constructor(
    public readonly iteration: number,
    cause: unknown
  ) {
    super(
      `Iteration hook failed after iteration ${iteration}: ${cause instanceof Error ? cause.message : String(cause)}`,
      ErrorCode.INTERNAL_ERROR,
      { details: { iteration }, cause }
    );
    this.name = 'IterationHookError';
  }
}

/**
 * Thrown when a run's AbortSignal fires while a call is in flight
 */
export class RunAbortedError extends Error {
  constructor(public readonly reason: unknown) {
    super(`Run aborted: ${reason instanceof Error ? reason.message : String(reason ?? 'signal aborted')}`);
    this.name = 'RunAbortedError';
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof RunAbortedError
    || (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError'));
}

/**
 * Normalise any thrown value into a RefinerError.
 */
export function classifyError(error: unknown): RefinerError {
  if (error instanceof RefinerError) {
    return error;
  }

  if (error instanceof ZodError) {
    return ValidationError.fromZodError(error);
  }

  if (error instanceof PathTraversalError) {
    return new SecurityError(`Path traversal attempt detected: ${error.attemptedPath}`, {
      attemptedPath: error.attemptedPath,
      resolvedPath: error.resolvedPath,
      allowedRoot: error.allowedRoot,
    });
  }

  if (error instanceof InvalidPathError) {
    return new ValidationError(`Invalid path: ${error.reason}`, [
      { path: 'path', message: error.reason },
    ]);
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();

    if (message.includes('not found') || message.includes('enoent')) {
      return new RefinerError(error.message, ErrorCode.NOT_FOUND, { cause: error });
    }

    if (message.includes('invalid') || message.includes('required') || message.includes('must be')) {
      return new RefinerError(error.message, ErrorCode.VALIDATION_ERROR, { cause: error });
    }

    if (message.includes('permission') || message.includes('eacces')) {
      return new RefinerError(error.message, ErrorCode.SECURITY_ERROR, { cause: error });
    }

    return new RefinerError(error.message, ErrorCode.INTERNAL_ERROR, { cause: error });
  }

  return new RefinerError('An unexpected error occurred', ErrorCode.INTERNAL_ERROR, {
    details: { originalError: String(error) },
  });
}

/**
 * Structured error payload for MCP tool responses.
 */
export function createErrorResponse(error: unknown, requestId?: string): Record<string, unknown> {
  const classified = classifyError(error);
  return {
    ...classified.toJSON(),
    ...(requestId && { requestId }),
  };
}
