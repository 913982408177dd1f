import type { SessionState } from '../session/sessionStore';

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
      sessionState?: SessionState;
    }
  }
}

export {};
