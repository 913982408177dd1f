import express, { Express } from 'express';
import cors from 'cors';
import path from 'path';
import fs from 'fs';

import { AstronomyClient } from './astronomy/astronomyClient';
import type { AppConfig } from './config/appConfig';
import { CONSTELLATIONS } from './config/constellations';
import { LocationResolver } from './google/locationResolver';
import { errorMessage, logInfo } from './observability/logger';
import { getMetricsSnapshot, metricsContentType } from './observability/metrics';
import { applyRequestTracing } from './observability/requestTracing';
import { jsonErrorHandler } from './routes/httpErrors';
import { createLocationRouter } from './routes/location';
import { createMoonPhaseRouter } from './routes/moonPhase';
import { createPositionsRouter } from './routes/positions';
import sessionRouter from './routes/session';
import { createStarChartRouter } from './routes/starChart';
import { SessionController } from './session/sessionController';
import { attachSession } from './session/sessionMiddleware';
import { SessionStore } from './session/sessionStore';

export interface AppDeps {
  resolver?: LocationResolver;
  astronomy?: AstronomyClient;
  sessions?: SessionStore;
}

export function createApp(config: AppConfig, deps: AppDeps = {}): Express {
  const controller = new SessionController({
    resolver: deps.resolver ?? new LocationResolver(config.google),
    astronomy: deps.astronomy ?? new AstronomyClient(config.astronomy)
  });
  const sessions = deps.sessions ?? new SessionStore(config.sessionTtlMs);

  const app = express();

  app.use(applyRequestTracing());
  app.use(cors({ exposedHeaders: ['X-Request-Id', 'X-Session-Id'] }));
  app.use(express.json());

  app.get('/api/constellations', (_req, res) => {
    res.json({ constellations: CONSTELLATIONS });
  });

  const api = express.Router();
  api.use(attachSession(sessions));
  api.use('/session', sessionRouter);
  api.use('/location', createLocationRouter(controller));
  api.use('/star-chart', createStarChartRouter(controller));
  api.use('/moon-phase', createMoonPhaseRouter(controller));
  api.use('/positions', createPositionsRouter(controller));
  app.use('/api', api);

  app.get('/metrics', async (_req, res) => {
    try {
      const metrics = await getMetricsSnapshot();
      res.setHeader('Content-Type', metricsContentType);
      res.send(metrics);
    } catch (err) {
      res.status(500).send(`# Metrics error: ${errorMessage(err)}`);
    }
  });

  // Sert le front buildé si le dossier existe (un seul serveur pour front+API).
  const clientDist = config.clientDist ?? path.resolve(__dirname, '..', '..', 'client', 'dist');
  if (fs.existsSync(clientDist)) {
    app.use(express.static(clientDist));
    app.get('*', (_req, res) => {
      res.sendFile(path.join(clientDist, 'index.html'));
    });
  } else {
    app.get('/', (_req, res) => {
      res.send('Constellation Viewer – Google Maps + AstronomyAPI');
    });
    logInfo('client_dist_missing', { clientDist });
  }

  app.use(jsonErrorHandler);

  return app;
}
