import { Router, type Request, type Response } from 'express';
import { asyncErrorHandler, planningErrorMap } from '../middleware/validation/errors';
import {
  adjustmentsRequestSchema,
  csvPlanRequestSchema,
  exportQuerySchema,
  planRequestSchema
} from '../schemas/planning.schema';
import { loadCatalog } from '../services/catalogLoader.service';
import { catalogDocumentsFromCsv } from '../services/catalogTables.service';
import { toCsvExport, toJsonExport } from '../services/planExport.service';
import {
  applyOrderAdjustments,
  generatePurchasePlan,
  resolvePlanParameters,
  summarizePlan
} from '../services/purchasePlan.service';

const router = Router();

router.post(
  '/purchase-plans',
  asyncErrorHandler(async (req: Request, res: Response) => {
    const parsed = planRequestSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: parsed.error.flatten() });
    const catalog = loadCatalog(parsed.data.catalog);
    const params = resolvePlanParameters(parsed.data.params);
    const rows = generatePurchasePlan(catalog, params);
    return res.json({ data: rows, params, summary: summarizePlan(rows) });
  }, planningErrorMap)
);

router.post(
  '/purchase-plans/from-csv',
  asyncErrorHandler(async (req: Request, res: Response) => {
    const parsed = csvPlanRequestSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: parsed.error.flatten() });
    const catalog = loadCatalog(catalogDocumentsFromCsv(parsed.data.tables));
    const params = resolvePlanParameters(parsed.data.params);
    const rows = generatePurchasePlan(catalog, params);
    return res.json({ data: rows, params, summary: summarizePlan(rows) });
  }, planningErrorMap)
);

router.post(
  '/purchase-plans/export',
  asyncErrorHandler(async (req: Request, res: Response) => {
    const format = exportQuerySchema.safeParse(req.query);
    if (!format.success) return res.status(400).json({ error: 'Invalid export format.' });
    const parsed = planRequestSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: parsed.error.flatten() });

    const catalog = loadCatalog(parsed.data.catalog);
    const rows = generatePurchasePlan(catalog, resolvePlanParameters(parsed.data.params));
    if (format.data.format === 'csv') {
      res.setHeader('content-disposition', 'attachment; filename="purchase_plan.csv"');
      return res.type('text/csv').send(toCsvExport(rows));
    }
    return res.json(toJsonExport(rows));
  }, planningErrorMap)
);

router.post(
  '/purchase-plans/adjustments',
  asyncErrorHandler(async (req: Request, res: Response) => {
    const parsed = adjustmentsRequestSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: parsed.error.flatten() });
    const result = applyOrderAdjustments(parsed.data.rows, parsed.data.adjustments, {
      cutoffMonth: parsed.data.cutoffMonth
    });
    return res.json({ data: result.rows, changes: result.changes, summary: summarizePlan(result.rows) });
  }, planningErrorMap)
);

export default router;
