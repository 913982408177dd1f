import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';

import {
  HttpFailure,
  InvariantError,
  ProviderStatusFailure,
  RequestValidationError,
  TransportFailure,
  UpstreamError
} from '../errors';
import { errorMessage, logError, logWarn } from '../observability/logger';

type BodyParserError = Error & { type: string; status: number };

// Erreurs levées par express.json() (corps tronqué, trop gros...).
function isBodyParserError(err: unknown): err is BodyParserError {
  return (
    err instanceof Error &&
    'type' in err &&
    typeof err.type === 'string' &&
    'status' in err &&
    typeof err.status === 'number'
  );
}

export function sendError(res: Response, err: unknown, requestId?: string): void {
  if (isBodyParserError(err) && err.status >= 400 && err.status < 500) {
    res.status(err.status).json({
      error: err.type === 'entity.parse.failed' ? 'Malformed JSON body' : err.message,
      kind: 'validation',
      requestId
    });
    return;
  }

  if (err instanceof ZodError) {
    res.status(400).json({
      error: 'Invalid request',
      kind: 'validation',
      issues: err.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
      requestId
    });
    return;
  }

  if (err instanceof RequestValidationError) {
    res.status(400).json({ error: err.message, kind: 'validation', requestId });
    return;
  }

  if (err instanceof UpstreamError) {
    logWarn('upstream_call_failed', {
      requestId,
      provider: err.provider,
      operation: err.operation,
      kind: err.kind,
      error: err.message
    });
    const body: Record<string, unknown> = {
      error: err.message,
      kind: err.kind,
      provider: err.provider,
      requestId
    };
    if (err instanceof HttpFailure) body.statusCode = err.statusCode;
    if (err instanceof ProviderStatusFailure) body.status = err.status;
    res.status(err instanceof TransportFailure ? 504 : 502).json(body);
    return;
  }

  logError(err instanceof InvariantError ? 'invariant_violation' : 'unhandled_error', {
    requestId,
    error: errorMessage(err)
  });
  res.status(500).json({ error: 'Internal server error', kind: 'internal', requestId });
}

/** Dernier middleware : toute erreur passée à next() repart au format JSON. */
export function jsonErrorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }
  sendError(res, err, req.requestId);
}
