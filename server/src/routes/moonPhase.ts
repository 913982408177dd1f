import { Router, Request, Response } from 'express';

import { requireSession } from '../session/sessionMiddleware';
import type { SessionController } from '../session/sessionController';
import { sendError } from './httpErrors';
import { moonPhaseBodySchema } from './schemas';

export function createMoonPhaseRouter(controller: SessionController): Router {
  const router = Router();

  router.get('/form', (req: Request, res: Response) => {
    try {
      const session = requireSession(req);
      res.json({
        defaults: controller.formDefaults(session, 'moonPhase'),
        formats: ['png', 'svg'],
        moonStyles: ['default', 'sketch', 'shaded'],
        backgroundStyles: ['stars', 'solid'],
        orientations: ['north-up', 'south-up']
      });
    } catch (err) {
      sendError(res, err, req.requestId);
    }
  });

  router.post('/', async (req: Request, res: Response) => {
    try {
      const session = requireSession(req);
      const input = moonPhaseBodySchema.parse(req.body);
      const result = await controller.generateMoonPhase(session, input, req.requestId);
      // Sans imageUrl, la réponse brute est renvoyée telle quelle au front.
      res.json(result);
    } catch (err) {
      sendError(res, err, req.requestId);
    }
  });

  return router;
}
