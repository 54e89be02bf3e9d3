// src/http/middleware.ts

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { ConfigurationResolver, ResolvedUserConfig } from '../core/config/types';
import type { Logger } from '../observability/Logger';
import { AuthenticationError, isRelayError } from '../utils/errors';

export interface ErrorBody {
  error: {
    code: string;
    message: string;
  };
}

/**
 * API key from the X-API-Key header, or the `key` query parameter for
 * clients that can only issue plain GETs.
 */
export function extractApiKey(req: Request): string | undefined {
  const header = req.get('x-api-key');
  if (header) return header;
  return typeof req.query.key === 'string' && req.query.key ? req.query.key : undefined;
}

/**
 * Wraps async route handlers so rejections reach the error middleware
 */
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};

/**
 * Authenticated handler that only needs the caller's user id
 */
export function withUser(
  resolver: ConfigurationResolver,
  handler: (req: Request, res: Response, userId: string) => Promise<void>
): RequestHandler {
  return asyncHandler(async (req, res) => {
    const userId = await resolver.authenticate(extractApiKey(req));
    if (!userId) {
      throw new AuthenticationError();
    }
    await handler(req, res, userId);
  });
}

/**
 * Authenticated handler that needs the caller's complete configuration.
 * An incomplete configuration is rejected with CONFIGURATION_INCOMPLETE.
 */
export function withCaller(
  resolver: ConfigurationResolver,
  handler: (req: Request, res: Response, caller: ResolvedUserConfig) => Promise<void>
): RequestHandler {
  return withUser(resolver, async (req, res, userId) => {
    const caller = await resolver.resolve(userId);
    await handler(req, res, caller);
  });
}

function isMalformedBody(error: unknown): boolean {
  return (
    error instanceof SyntaxError &&
    'type' in error &&
    error.type === 'entity.parse.failed'
  );
}

/**
 * Maps RelayErrors to their status and a `{ error: { code, message } }` body.
 * Anything else is logged and answered with a generic 500.
 */
export function errorHandler(logger: Logger) {
  return (error: unknown, req: Request, res: Response, _next: NextFunction): void => {
    if (isRelayError(error)) {
      const level = error.statusCode >= 500 ? 'error' : 'warn';
      logger[level]('Request failed', {
        method: req.method,
        path: req.path,
        code: error.code,
        status: error.statusCode,
      });
      const body: ErrorBody = { error: { code: error.code, message: error.message } };
      res.status(error.statusCode).json(body);
      return;
    }

    if (isMalformedBody(error)) {
      const body: ErrorBody = {
        error: { code: 'VALIDATION_ERROR', message: 'Request body is not valid JSON' },
      };
      res.status(400).json(body);
      return;
    }

    logger.error('Unhandled request error', {
      method: req.method,
      path: req.path,
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    const body: ErrorBody = {
      error: { code: 'INTERNAL_ERROR', message: 'Internal server error' },
    };
    res.status(500).json(body);
  };
}

export const notFoundHandler = (_req: Request, res: Response): void => {
  const body: ErrorBody = { error: { code: 'ENDPOINT_NOT_FOUND', message: 'Endpoint not found' } };
  res.status(404).json(body);
};
