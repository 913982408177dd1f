import type { Request, RequestHandler } from 'express';

import { logInfo } from '../observability/logger';
import type { SessionState, SessionStore } from './sessionStore';

export const SESSION_HEADER = 'x-session-id';

export function attachSession(store: SessionStore): RequestHandler {
  return (req, res, next) => {
    const { session, created } = store.getOrCreate(req.header(SESSION_HEADER));
    if (created) {
      logInfo('session_created', { sessionId: session.id, requestId: req.requestId, active: store.size });
    }
    req.sessionState = session;
    res.setHeader('X-Session-Id', session.id);
    next();
  };
}

export function requireSession(req: Request): SessionState {
  if (!req.sessionState) {
    throw new Error('attachSession middleware is not installed');
  }
  return req.sessionState;
}
