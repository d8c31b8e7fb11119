import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { query, withTransaction } from '../db';
import type { PlanParameters, PlanningCatalog, PurchaseForecast } from '../domains/planning';
import { toNumber } from '../lib/numbers';
import { currentRequestId } from '../lib/requestContext';

export type PlanRunLineMetadata = {
  minimumOrderQty: number | null;
  orderMultiple: number | null;
  openingInventoryUnits: number;
  closingInventoryUnits: number;
};

export type PlanRunLineInput = {
  forecastMonth: string;
  sku: string;
  itemName: string;
  supplier: string;
  demand: number;
  orderQty: number;
  unitCost: number;
  totalCost: number;
  notes: string[];
  metadata: PlanRunLineMetadata;
};

export type PlanRunLine = PlanRunLineInput & { id: string };

export type PlanRun = {
  id: string;
  startedAt: string;
  params: PlanParameters;
  sourceFiles: string[];
  createdAt: string;
};

export type PlanRunWithLines = PlanRun & { lines: PlanRunLine[] };

export type NewPlanRun = {
  startedAt: Date;
  params: PlanParameters;
  sourceFiles: string[];
  lines: PlanRunLineInput[];
};

/** Storage seam for planning runs; PostgreSQL in production. */
export interface PlanRunStore {
  createRun(run: NewPlanRun): Promise<PlanRunWithLines>;
  listRuns(limit: number, offset: number): Promise<PlanRun[]>;
  getRun(id: string): Promise<PlanRunWithLines | null>;
}

const NOTES_SEPARATOR = '; ';

const storedParamsSchema = z.object({
  startMonth: z.string(),
  numMonths: z.number(),
  serviceLevel: z.number(),
  reviewPeriodDays: z.number(),
  includeInTransit: z.boolean()
});

const storedSourceFilesSchema = z.array(z.string()).catch([]);

const storedMetadataSchema = z.object({
  minimumOrderQty: z.number().nullable().catch(null),
  orderMultiple: z.number().nullable().catch(null),
  openingInventoryUnits: z.number().catch(0),
  closingInventoryUnits: z.number().catch(0)
});

export function toPlanRunLines(catalog: PlanningCatalog, rows: readonly PurchaseForecast[]): PlanRunLineInput[] {
  return rows.map((row) => {
    const params = catalog.itemParams.get(row.itemId);
    return {
      forecastMonth: row.forecastMonth,
      sku: row.itemId,
      itemName: row.itemName,
      supplier: row.supplierName,
      demand: row.adjustedDemand,
      orderQty: row.optimizedOrderQty,
      unitCost: row.effectiveUnitCost,
      totalCost: row.totalOrderCost,
      notes: [...row.notes],
      metadata: {
        minimumOrderQty: params?.minimumOrderQty ?? null,
        orderMultiple: params?.orderMultiple ?? null,
        openingInventoryUnits: row.openingInventoryUnits,
        closingInventoryUnits: row.closingInventoryUnits
      }
    };
  });
}

type PlanRunRow = {
  id: string;
  started_at: Date | string;
  params_json: unknown;
  source_files: unknown;
  created_at: Date | string;
};

type PlanRunLineRow = {
  id: string;
  forecast_month: string;
  sku: string;
  item_name: string | null;
  supplier: string | null;
  demand: string | number | null;
  order_qty: string | number | null;
  unit_cost: string | number | null;
  total_cost: string | number | null;
  notes: string | null;
  metadata_json: unknown;
};

function toIso(value: Date | string): string {
  return value instanceof Date ? value.toISOString() : value;
}

export function mapPlanRun(row: PlanRunRow): PlanRun {
  return {
    id: row.id,
    startedAt: toIso(row.started_at),
    params: storedParamsSchema.parse(row.params_json),
    sourceFiles: storedSourceFilesSchema.parse(row.source_files),
    createdAt: toIso(row.created_at)
  };
}

export function mapPlanRunLine(row: PlanRunLineRow): PlanRunLine {
  const metadata = storedMetadataSchema.safeParse(row.metadata_json);
  return {
    id: row.id,
    forecastMonth: row.forecast_month,
    sku: row.sku,
    itemName: row.item_name ?? '',
    supplier: row.supplier ?? '',
    demand: toNumber(row.demand),
    orderQty: toNumber(row.order_qty),
    unitCost: toNumber(row.unit_cost),
    totalCost: toNumber(row.total_cost),
    notes: row.notes ? row.notes.split(NOTES_SEPARATOR) : [],
    metadata: metadata.success
      ? metadata.data
      : { minimumOrderQty: null, orderMultiple: null, openingInventoryUnits: 0, closingInventoryUnits: 0 }
  };
}

export function createPgPlanRunStore(): PlanRunStore {
  return {
    async createRun(run) {
      const id = uuidv4();
      const now = new Date();
      return withTransaction(async (client) => {
        const runRes = await client.query<PlanRunRow>(
          `INSERT INTO plan_runs (id, started_at, params_json, source_files, created_at)
           VALUES ($1,$2,$3,$4,$5)
           RETURNING *`,
          [id, run.startedAt, JSON.stringify(run.params), JSON.stringify(run.sourceFiles), now]
        );
        const lines: PlanRunLine[] = [];
        for (const line of run.lines) {
          const res = await client.query<PlanRunLineRow>(
            `INSERT INTO plan_run_lines (
              id, plan_run_id, forecast_month, sku, item_name, supplier, demand, order_qty, unit_cost, total_cost,
              notes, metadata_json
            ) VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12)
            RETURNING *`,
            [
              uuidv4(),
              id,
              line.forecastMonth,
              line.sku,
              line.itemName,
              line.supplier,
              line.demand,
              line.orderQty,
              line.unitCost,
              line.totalCost,
              line.notes.join(NOTES_SEPARATOR),
              JSON.stringify(line.metadata)
            ]
          );
          lines.push(mapPlanRunLine(res.rows[0]));
        }
        return { ...mapPlanRun(runRes.rows[0]), lines };
      });
    },

    async listRuns(limit, offset) {
      const { rows } = await query<PlanRunRow>(
        `SELECT * FROM plan_runs ORDER BY started_at DESC, id ASC LIMIT $1 OFFSET $2`,
        [limit, offset]
      );
      return rows.map(mapPlanRun);
    },

    async getRun(id) {
      const runRes = await query<PlanRunRow>('SELECT * FROM plan_runs WHERE id = $1', [id]);
      if (runRes.rowCount === 0) return null;
      const linesRes = await query<PlanRunLineRow>(
        `SELECT * FROM plan_run_lines WHERE plan_run_id = $1 ORDER BY sku ASC, forecast_month ASC`,
        [id]
      );
      return { ...mapPlanRun(runRes.rows[0]), lines: linesRes.rows.map(mapPlanRunLine) };
    }
  };
}

export async function recordPlanRun(
  store: PlanRunStore,
  catalog: PlanningCatalog,
  params: PlanParameters,
  rows: readonly PurchaseForecast[],
  sourceFiles: string[] = []
): Promise<PlanRunWithLines> {
  const run = await store.createRun({
    startedAt: new Date(),
    params,
    sourceFiles,
    lines: toPlanRunLines(catalog, rows)
  });
  console.log(
    JSON.stringify({
      event: 'plan_run_created',
      requestId: currentRequestId(),
      runId: run.id,
      lineCount: run.lines.length,
      totalOrderQty: run.lines.reduce((sum, line) => sum + line.orderQty, 0),
      timestamp: new Date().toISOString()
    })
  );
  return run;
}
