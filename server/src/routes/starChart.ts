import { Router, Request, Response } from 'express';

import { CONSTELLATIONS } from '../config/constellations';
import { requireSession } from '../session/sessionMiddleware';
import type { SessionController } from '../session/sessionController';
import { sendError } from './httpErrors';
import { starChartBodySchema } from './schemas';

export function createStarChartRouter(controller: SessionController): Router {
  const router = Router();

  router.get('/form', (req: Request, res: Response) => {
    try {
      const session = requireSession(req);
      res.json({
        defaults: controller.formDefaults(session, 'starChart'),
        constellations: CONSTELLATIONS
      });
    } catch (err) {
      sendError(res, err, req.requestId);
    }
  });

  router.post('/', async (req: Request, res: Response) => {
    try {
      const session = requireSession(req);
      const input = starChartBodySchema.parse(req.body);
      const result = await controller.generateStarChart(session, input, req.requestId);
      res.json(result);
    } catch (err) {
      sendError(res, err, req.requestId);
    }
  });

  return router;
}
