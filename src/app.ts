import express from 'express';
import { requestContextMiddleware } from './middleware/requestContext.middleware';
import { requestLoggerMiddleware } from './middleware/requestLogger.middleware';
import { createPlanRunsRouter } from './routes/planRuns.routes';
import purchasePlansRouter from './routes/purchasePlans.routes';
import type { PlanRunStore } from './services/planRuns.service';

export type AppOptions = {
  planRunStore: PlanRunStore;
  jsonLimit?: string;
};

export function createApp(options: AppOptions) {
  const app = express();
  app.use(express.json({ limit: options.jsonLimit ?? '10mb' }));
  app.use(requestContextMiddleware);
  app.use(requestLoggerMiddleware);

  app.get('/healthz', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use(purchasePlansRouter);
  app.use(createPlanRunsRouter(options.planRunStore));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}
