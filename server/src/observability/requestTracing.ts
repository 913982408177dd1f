import { randomUUID } from 'crypto';
import type { RequestHandler } from 'express';

import { logInfo } from './logger';

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{1,128}$/;

export function applyRequestTracing(): RequestHandler {
  return (req, res, next) => {
    const incoming = req.header('x-request-id');
    const requestId = incoming && REQUEST_ID_PATTERN.test(incoming) ? incoming : randomUUID();
    const started = Date.now();

    req.requestId = requestId;
    res.setHeader('X-Request-Id', requestId);

    res.on('finish', () => {
      logInfo('http_request', {
        requestId,
        method: req.method,
        path: req.path,
        status: res.statusCode,
        durationMs: Date.now() - started
      });
    });

    next();
  };
}
