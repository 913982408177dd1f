import { Router, Request, Response } from 'express';

import { requireSession } from '../session/sessionMiddleware';
import type { SessionController } from '../session/sessionController';
import { sendError } from './httpErrors';
import { locationBodySchema, suggestionsQuerySchema } from './schemas';

export function createLocationRouter(controller: SessionController): Router {
  const router = Router();

  router.get('/suggestions', async (req: Request, res: Response) => {
    try {
      const { q } = suggestionsQuerySchema.parse(req.query);
      const suggestions = await controller.suggestLocations(q, req.requestId);
      res.json({ suggestions });
    } catch (err) {
      sendError(res, err, req.requestId);
    }
  });

  router.post('/', async (req: Request, res: Response) => {
    try {
      const session = requireSession(req);
      const input = locationBodySchema.parse(req.body);
      const location = await controller.submitLocation(session, input, req.requestId);
      res.json({ location, prefill: session.prefill });
    } catch (err) {
      sendError(res, err, req.requestId);
    }
  });

  return router;
}
