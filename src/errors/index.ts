/**
 * Error types for the gateway.
 *
 * Build-time errors (`RequestBuildError`, `ValidationError`) are raised before
 * any network call. `TransportError` wraps failures of the outbound hop.
 * Responses the daemon produced itself are never converted into errors; they
 * are relayed unchanged and only described by `UpstreamError` for logging.
 */

/**
 * Base error class for all application errors
 */
export abstract class ApplicationError extends Error {
  public readonly timestamp: Date;
  public readonly context: Record<string, unknown>;

  constructor(
    message: string,
    public readonly code: string,
    context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context ?? {};
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): {
    name: string;
    message: string;
    code: string;
    timestamp: Date;
    context: Record<string, unknown>;
    stack?: string;
  } {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp,
      context: this.context,
      stack: this.stack,
    };
  }
}

/**
 * Error thrown when inbound parameters fail validation
 */
export class ValidationError extends ApplicationError {
  constructor(
    message: string,
    public readonly violations: Array<{ field: string; message: string }> = [],
    context?: Record<string, unknown>,
  ) {
    super(message, 'VALIDATION_ERROR', { ...context, violations });
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends ApplicationError {
  constructor(
    message: string,
    public readonly configKey?: string,
    public readonly actualValue?: unknown,
    context?: Record<string, unknown>,
  ) {
    super(message, 'CONFIG_ERROR', { ...context, configKey, actualValue });
    this.name = 'ConfigurationError';
  }
}

export type ResolutionFailure = 'TENANT_NOT_FOUND' | 'INVALID_TENANT';

/**
 * Error thrown when a tenant identifier cannot be mapped to a daemon
 */
export class ResolutionError extends ApplicationError {
  constructor(
    message: string,
    public readonly tenantId: string,
    public readonly reason: ResolutionFailure = 'TENANT_NOT_FOUND',
  ) {
    super(message, reason, { tenantId });
    this.name = 'ResolutionError';
  }
}

/**
 * Error thrown when a request descriptor cannot be assembled
 */
export class RequestBuildError extends ApplicationError {
  constructor(
    message: string,
    public readonly path?: string,
    public override readonly cause?: Error,
  ) {
    super(message, 'REQUEST_BUILD_ERROR', { path, cause: cause?.message });
    this.name = 'RequestBuildError';
  }
}

/**
 * Error thrown when the outbound request to a daemon fails before a response arrives
 */
export class TransportError extends ApplicationError {
  constructor(
    message: string,
    public readonly url: string,
    public override readonly cause?: Error,
    public readonly timedOut = false,
    context?: Record<string, unknown>,
  ) {
    super(message, timedOut ? 'TRANSPORT_TIMEOUT' : 'TRANSPORT_ERROR', {
      ...context,
      url,
      cause: cause?.message,
      causeCode: errorCode(cause),
    });
    this.name = 'TransportError';
  }
}

/**
 * Describes a non-2xx answer from the daemon. The response itself is relayed as-is.
 */
export class UpstreamError extends ApplicationError {
  constructor(
    public readonly status: number,
    public readonly url: string,
    context?: Record<string, unknown>,
  ) {
    super(`Daemon responded with status ${status}`, 'UPSTREAM_ERROR', { ...context, status, url });
    this.name = 'UpstreamError';
  }
}

function errorCode(error: Error | undefined): string | undefined {
  if (error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Helper function to check if an error is one of our custom error types
 */
export function isApplicationError(error: unknown): error is ApplicationError {
  return error instanceof ApplicationError;
}

class UnexpectedError extends ApplicationError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INTERNAL_ERROR', context);
    this.name = 'UnexpectedError';
  }
}

/**
 * Helper function to convert unknown errors to our error types
 */
export function normalizeError(
  error: unknown,
  defaultMessage = 'An unexpected error occurred',
): ApplicationError {
  if (isApplicationError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new UnexpectedError(error.message, { originalError: error.name });
  }

  return new UnexpectedError(typeof error === 'string' ? error : defaultMessage);
}

/**
 * HTTP status the gateway answers with when it fails on its own side
 */
export function httpStatusFor(error: ApplicationError): number {
  if (error instanceof ValidationError || error instanceof RequestBuildError) {
    return 400;
  }
  if (error instanceof ResolutionError) {
    return error.reason === 'INVALID_TENANT' ? 400 : 404;
  }
  if (error instanceof TransportError) {
    return error.timedOut ? 504 : 502;
  }
  if (error instanceof UpstreamError) {
    return error.status;
  }
  return 500;
}

/**
 * Error serialization for gateway responses
 */
export function serializeError(
  error: ApplicationError,
  details: Record<string, unknown> = {},
): Record<string, unknown> {
  return {
    error: {
      code: error.code,
      message: error.message,
      details: { ...error.context, ...details },
      timestamp: error.timestamp.toISOString(),
    },
  };
}
