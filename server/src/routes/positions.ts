import { Router, Request, Response } from 'express';

import { requireSession } from '../session/sessionMiddleware';
import type { SessionController } from '../session/sessionController';
import { sendError } from './httpErrors';
import { positionsBodySchema, positionsViewQuerySchema } from './schemas';

export function createPositionsRouter(controller: SessionController): Router {
  const router = Router();

  router.post('/', async (req: Request, res: Response) => {
    try {
      const session = requireSession(req);
      const input = positionsBodySchema.parse(req.body);
      res.json(await controller.fetchPositions(session, input, req.requestId));
    } catch (err) {
      sendError(res, err, req.requestId);
    }
  });

  router.get('/', (req: Request, res: Response) => {
    try {
      const session = requireSession(req);
      const options = positionsViewQuerySchema.parse(req.query);
      res.json(controller.positionsView(session, options));
    } catch (err) {
      sendError(res, err, req.requestId);
    }
  });

  return router;
}
