/**
 * Error handling utilities for API clients
 *
 * Every failure the client surfaces is a `BaseAPIError` subclass with a
 * stable `code`. Only network-level failures are retryable; any HTTP
 * response the upstream actually produced is final.
 */

import { z } from 'zod';

/**
 * Base error class for all API-related errors
 */
export abstract class BaseAPIError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintains proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Whether sending the same request again may succeed
   */
  isRetryable(): boolean {
    return false;
  }
}

// ─── Network ────────────────────────────────────────────────

/**
 * NetworkError - the request never produced an HTTP response
 */
export abstract class NetworkError extends BaseAPIError {
  constructor(
    message: string,
    public readonly url: string,
    cause?: unknown
  ) {
    super(message, { cause });
  }

  override isRetryable(): boolean {
    return true;
  }
}

export class TimeoutError extends NetworkError {
  readonly code = 'TIMEOUT';

  constructor(
    url: string,
    public readonly timeoutMs: number,
    public readonly phase: 'connect' | 'total',
    cause?: unknown
  ) {
    super(
      phase === 'connect'
        ? `Connection not established within ${timeoutMs}ms`
        : `Request timeout after ${timeoutMs}ms`,
      url,
      cause
    );
  }
}

export class TransportError extends NetworkError {
  readonly code = 'TRANSPORT_ERROR';

  constructor(url: string, cause?: unknown) {
    super('Failed to connect to server', url, cause);
  }
}

// ─── HTTP status ────────────────────────────────────────────

/**
 * HttpError - the upstream answered with a non-2xx status
 */
export abstract class HttpError extends BaseAPIError {
  constructor(
    message: string,
    public readonly status: number,
    public readonly statusText: string,
    public readonly url: string,
    public readonly body?: unknown
  ) {
    super(message);
  }
}

/** 404: the requested entity does not exist upstream */
export class EntityNotFoundError extends HttpError {
  readonly code = 'ENTITY_NOT_FOUND';

  constructor(url: string, body?: unknown, public readonly entity?: string) {
    super(entity ? `Entity not found: ${entity}` : 'Entity not found', 404, 'Not Found', url, body);
  }
}

/** 401: credentials were rejected */
export class AuthError extends HttpError {
  readonly code = 'AUTH_ERROR';

  constructor(url: string, body?: unknown) {
    super('API key rejected by upstream', 401, 'Unauthorized', url, body);
  }
}

/** 429: the upstream quota is exhausted */
export class RateLimitedError extends HttpError {
  readonly code = 'RATE_LIMITED';

  constructor(
    url: string,
    public readonly retryAfter?: number,
    body?: unknown
  ) {
    super('Rate limit exceeded. Please slow down your requests.', 429, 'Too Many Requests', url, body);
  }

  /**
   * Get the recommended wait time in milliseconds
   */
  getWaitTimeMs(): number {
    return this.retryAfter !== undefined ? this.retryAfter * 1000 : 60_000;
  }

  /**
   * Create from response headers
   */
  static fromResponse(
    url: string,
    headers: { get(name: string): string | null },
    body?: unknown
  ): RateLimitedError {
    const retryAfter = Number.parseInt(headers.get('Retry-After') ?? '', 10);
    return new RateLimitedError(url, Number.isNaN(retryAfter) ? undefined : retryAfter, body);
  }
}

/** Any other non-2xx status */
export class UpstreamError extends HttpError {
  readonly code = 'UPSTREAM_ERROR';
}

// ─── Payload ────────────────────────────────────────────────

/**
 * MalformedResponseError - 2xx response whose body is not JSON or fails the schema
 */
export class MalformedResponseError extends BaseAPIError {
  readonly code = 'MALFORMED_RESPONSE';

  constructor(
    message: string,
    public readonly url: string,
    public readonly issues: z.ZodIssue[] = [],
    public readonly rawData?: unknown,
    cause?: unknown
  ) {
    super(message, { cause });
  }

  /**
   * Get a formatted list of validation issues
   */
  getFormattedErrors(): string[] {
    return this.issues.map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    });
  }

  /**
   * Create from a ZodError
   */
  static fromZodError(error: z.ZodError, url: string, rawData?: unknown): MalformedResponseError {
    return new MalformedResponseError(
      `Response validation failed: ${error.errors.map(e => e.message).join(', ')}`,
      url,
      error.errors,
      rawData,
      error
    );
  }
}

/**
 * Type guards
 */
export function isBaseAPIError(error: unknown): error is BaseAPIError {
  return error instanceof BaseAPIError;
}

export function isNetworkError(error: unknown): error is NetworkError {
  return error instanceof NetworkError;
}

export function isRetryableError(error: unknown): error is BaseAPIError {
  return error instanceof BaseAPIError && error.isRetryable();
}

/**
 * Extract error details for logging
 */
export function getErrorDetails(error: unknown): {
  code: string;
  message: string;
  status?: number;
  url?: string;
  isRetryable: boolean;
  details?: unknown;
} {
  if (error instanceof RateLimitedError) {
    return {
      code: error.code,
      message: error.message,
      status: error.status,
      url: error.url,
      isRetryable: false,
      details: { retryAfter: error.retryAfter },
    };
  }

  if (error instanceof TimeoutError) {
    return {
      code: error.code,
      message: error.message,
      url: error.url,
      isRetryable: true,
      details: { phase: error.phase, timeoutMs: error.timeoutMs },
    };
  }

  if (error instanceof NetworkError) {
    return {
      code: error.code,
      message: error.message,
      url: error.url,
      isRetryable: true,
      details: { cause: error.cause instanceof Error ? error.cause.message : undefined },
    };
  }

  if (error instanceof MalformedResponseError) {
    return {
      code: error.code,
      message: error.message,
      url: error.url,
      isRetryable: false,
      details: { errors: error.getFormattedErrors() },
    };
  }

  if (error instanceof HttpError) {
    return {
      code: error.code,
      message: error.message,
      status: error.status,
      url: error.url,
      isRetryable: false,
      details: { statusText: error.statusText, body: error.body },
    };
  }

  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return { code: error.code, message: error.message, isRetryable: false };
  }

  const message = error instanceof Error ? error.message : String(error);
  return {
    code: 'UNKNOWN_ERROR',
    message,
    isRetryable: false,
  };
}
