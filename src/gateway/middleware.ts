/**
 * Express middleware shared by every route: request ids and logging,
 * async error propagation and the error responder.
 */

import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import { nanoid } from 'nanoid';
import {
  httpStatusFor,
  normalizeError,
  serializeError,
  ValidationError,
  type ApplicationError,
} from '../errors';
import type { Logger } from '../lib/logger';

export const REQUEST_ID_HEADER = 'X-Request-Id';

const requestLoggers = new WeakMap<Request, Logger>();

/** Logger bound to the request id of `req`, or `fallback` outside a request scope */
export function loggerFor(req: Request, fallback: Logger): Logger {
  return requestLoggers.get(req) ?? fallback;
}

/**
 * Assign a request id, attach a child logger and log completion.
 */
export function requestLogging(logger: Logger): RequestHandler {
  return (req, res, next) => {
    const requestId = req.get(REQUEST_ID_HEADER) ?? nanoid();
    const log = logger.child({ requestId });
    requestLoggers.set(req, log);
    res.setHeader(REQUEST_ID_HEADER, requestId);

    const started = Date.now();
    res.on('finish', () => {
      log.info(
        {
          method: req.method,
          path: req.originalUrl,
          status: res.statusCode,
          duration_ms: Date.now() - started,
        },
        'Request completed',
      );
    });
    next();
  };
}

/**
 * Express 4 does not await handlers; route rejections to `next`.
 */
export function asyncHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<void>,
): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

interface BodyParserError {
  status: number;
  type: string;
  message: string;
}

function isBodyParserError(error: unknown): error is BodyParserError {
  return (
    error instanceof Error &&
    'status' in error &&
    typeof error.status === 'number' &&
    'type' in error &&
    typeof error.type === 'string'
  );
}

function toApplicationError(error: unknown): { error: ApplicationError; status: number } {
  if (isBodyParserError(error) && error.status >= 400 && error.status < 500) {
    return {
      error: new ValidationError(error.message, [{ field: 'body', message: error.type }]),
      status: error.status,
    };
  }
  const normalized = normalizeError(error);
  return { error: normalized, status: httpStatusFor(normalized) };
}

/**
 * Answer with `{ error: { code, message, details, timestamp } }`.
 */
export function errorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, next) => {
    const log = loggerFor(req, logger);
    const { error, status } = toApplicationError(err);

    if (status >= 500) {
      log.error({ err }, error.message);
    } else {
      log.warn({ code: error.code, status }, error.message);
    }

    if (res.headersSent) {
      next(err);
      return;
    }
    res.status(status).json(serializeError(error, { path: req.originalUrl }));
  };
}

/** Fallback for paths no route matches */
export const notFound: RequestHandler = (req, res) => {
  res.status(404).json({
    error: {
      code: 'ROUTE_NOT_FOUND',
      message: `No route for ${req.method} ${req.path}`,
      details: { path: req.originalUrl },
      timestamp: new Date().toISOString(),
    },
  });
};
