import { z } from 'zod';
import { catalogDocumentsSchema, monthKeySchema } from './catalog.schema';

export const planParamsSchema = z.object({
  startMonth: monthKeySchema,
  numMonths: z.number().int().min(1).max(24).optional(),
  serviceLevel: z.number().gt(0).lt(1).optional(),
  reviewPeriodDays: z.number().int().nonnegative().max(366).optional(),
  includeInTransit: z.boolean().optional()
});

export const planRequestSchema = z.object({
  catalog: catalogDocumentsSchema,
  params: planParamsSchema
});

export const csvPlanRequestSchema = z.object({
  tables: z.object({
    salesHistory: z.string().min(1),
    itemParameters: z.string().min(1),
    currentInventory: z.string().min(1),
    salesForecasts: z.string().optional()
  }),
  params: planParamsSchema
});

export const exportQuerySchema = z.object({
  format: z.enum(['json', 'csv']).default('json')
});

export const orderAdjustmentSchema = z.object({
  itemId: z.string().min(1),
  month: monthKeySchema,
  orderQty: z.number().int().nonnegative()
});

const purchaseForecastSchema = z.object({
  forecastMonth: monthKeySchema,
  itemId: z.string().min(1),
  itemName: z.string(),
  category: z.string().nullable(),
  segment: z.string().nullable(),
  adjustedDemand: z.number().nonnegative(),
  optimizedOrderQty: z.number().nonnegative(),
  effectiveUnitCost: z.number().nonnegative(),
  totalOrderCost: z.number().nonnegative(),
  openingInventoryUnits: z.number().nonnegative(),
  plannedIntakeUnits: z.number().nonnegative(),
  actualIntakeUnits: z.number().nonnegative(),
  forecastedSalesUnits: z.number().nonnegative(),
  actualSalesUnits: z.number(),
  closingInventoryUnits: z.number().nonnegative(),
  futureCoverMonths: z.number().nonnegative(),
  orderByDate: z.string(),
  expectedDeliveryDate: z.string(),
  supplierName: z.string(),
  notes: z.array(z.string())
});

export const adjustmentsRequestSchema = z.object({
  rows: z.array(purchaseForecastSchema).min(1),
  adjustments: z.array(orderAdjustmentSchema).min(1),
  cutoffMonth: monthKeySchema.optional()
});

export const planRunCreateSchema = planRequestSchema.extend({
  sourceFiles: z.array(z.string().max(512)).max(16).optional()
});

export type PlanParamsInput = z.infer<typeof planParamsSchema>;
export type OrderAdjustment = z.infer<typeof orderAdjustmentSchema>;
