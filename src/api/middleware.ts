/**
 * API middleware: request logging, the credential gate and the global error
 * handler.
 */

import { Request, Response, NextFunction } from 'express';
import {
  ServiceError,
  TypedError,
  apiError,
  httpStatusFor,
  internalError,
  validationError,
} from '../domain/errors';
import { isRecord } from '../domain/guards';
import { IdentityService } from '../services/identity-service';
import { logger } from '../logger';

const log = logger.child({ module: 'http' });

/** Header carrying the bearer token on protected requests. */
export const AUTH_TOKEN_HEADER = 'X-Auth-Token';

/** Log method, path, status and duration of every request once it has been answered. */
export function requestLogger() {
  return (req: Request, res: Response, next: NextFunction) => {
    const startedAt = Date.now();
    res.on('finish', () => {
      log.debug('Request completed', {
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        durationMs: Date.now() - startedAt,
      });
    });
    next();
  };
}

/**
 * Credential gate. Rejects the request with 401 unless `X-Auth-Token` names
 * a recorded token; runs before any handler touches a collection.
 */
export function requireToken(identity: IdentityService) {
  return (req: Request, _res: Response, next: NextFunction) => {
    try {
      identity.authenticate(req.header(AUTH_TOKEN_HEADER));
      next();
    } catch (err) {
      next(err);
    }
  };
}

/**
 * Errors raised by Express itself (body-parser) carry an HTTP status and a
 * `type`, e.g. `entity.parse.failed` for malformed JSON.
 */
function clientErrorFromFramework(err: unknown): { status: number; typedError: TypedError } | undefined {
  if (!isRecord(err)) return undefined;
  const { status, type } = err;
  if (typeof status !== 'number' || typeof type !== 'string') return undefined;
  if (status < 400 || status >= 500) return undefined;
  const message = type === 'entity.parse.failed' ? 'Malformed JSON body' : `Invalid request: ${type}`;
  return { status, typedError: validationError(message, { type }) };
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  if (err instanceof ServiceError) {
    const status = httpStatusFor(err.typedError);
    if (status >= 500) {
      log.error('Request failed', { code: err.typedError.code, status, path: req.path });
    } else {
      log.warn('Request error', { code: err.typedError.code, status, path: req.path });
    }
    res.status(status).json(apiError(err.typedError));
    return;
  }

  const clientError = clientErrorFromFramework(err);
  if (clientError) {
    log.warn('Request error', { code: clientError.typedError.code, status: clientError.status, path: req.path });
    res.status(clientError.status).json(apiError(clientError.typedError));
    return;
  }

  const message = err instanceof Error ? err.message : 'Internal server error';
  log.error('Unhandled request error', {
    message,
    stack: err instanceof Error ? err.stack : undefined,
    path: req.path,
  });
  res.status(500).json(apiError(internalError(message)));
}
