import { Router, Request, Response } from 'express';

import { requireSession } from '../session/sessionMiddleware';
import { sendError } from './httpErrors';

const router = Router();

router.get('/', (req: Request, res: Response) => {
  try {
    const session = requireSession(req);
    res.json({
      sessionId: session.id,
      createdAt: new Date(session.createdAt).toISOString(),
      location: session.location,
      prefill: session.prefill,
      positions: session.positions
        ? {
            bodies: session.positions.rows.map((r) => r.name),
            query: session.positions.query,
            fetchedAt: session.positions.fetchedAt
          }
        : null
    });
  } catch (err) {
    sendError(res, err, req.requestId);
  }
});

export default router;
