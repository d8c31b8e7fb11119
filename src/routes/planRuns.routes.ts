import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { mapPgErrorToHttp } from '../lib/pgErrors';
import { asyncErrorHandler, planningErrorMap } from '../middleware/validation/errors';
import { planRunCreateSchema } from '../schemas/planning.schema';
import { loadCatalog } from '../services/catalogLoader.service';
import { recordPlanRun, type PlanRunStore } from '../services/planRuns.service';
import { generatePurchasePlan, resolvePlanParameters, summarizePlan } from '../services/purchasePlan.service';

const uuidSchema = z.string().uuid();

export function createPlanRunsRouter(store: PlanRunStore) {
  const router = Router();

  router.post(
    '/plan-runs',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = planRunCreateSchema.safeParse(req.body);
      if (!parsed.success) return res.status(400).json({ error: parsed.error.flatten() });
      const catalog = loadCatalog(parsed.data.catalog);
      const params = resolvePlanParameters(parsed.data.params);
      const rows = generatePurchasePlan(catalog, params);
      try {
        const run = await recordPlanRun(store, catalog, params, rows, parsed.data.sourceFiles ?? []);
        return res.status(201).json({ ...run, summary: summarizePlan(rows) });
      } catch (error) {
        const mapped = mapPgErrorToHttp(error, {
          unique: () => ({ status: 409, body: { error: 'Duplicate item and month within a plan run.' } }),
          check: () => ({ status: 400, body: { error: 'Plan run lines must carry non-negative quantities.' } })
        });
        if (mapped) return res.status(mapped.status).json(mapped.body);
        throw error;
      }
    }, planningErrorMap)
  );

  router.get(
    '/plan-runs',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const limit = Math.min(200, Math.max(1, Number(req.query.limit) || 50));
      const offset = Math.max(0, Number(req.query.offset) || 0);
      const data = await store.listRuns(limit, offset);
      return res.json({ data, paging: { limit, offset } });
    })
  );

  router.get(
    '/plan-runs/:id',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const { id } = req.params;
      if (!uuidSchema.safeParse(id).success) return res.status(400).json({ error: 'Invalid plan run id.' });
      const run = await store.getRun(id);
      if (!run) return res.status(404).json({ error: 'Plan run not found.' });
      return res.json(run);
    })
  );

  return router;
}
