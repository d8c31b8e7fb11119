import { z } from 'zod';
import { isMonthKey } from '../lib/months';
import { toOptionalNumber } from '../lib/numbers';
import type {
  CurrentInventory,
  HistoricalSalesRecord,
  ItemParameters,
  MonthlyForecastRecord
} from '../domains/planning';

export const CATALOG_SCHEMA_VERSION = 1;

const DEFAULT_MAX_STOCK_COVER_MONTHS = 2.0;
const DEFAULT_CONFIDENCE_SCORE = 0.7;

export const monthKeySchema = z
  .string()
  .refine(isMonthKey, 'Use month format YYYY-MM');

const itemIdSchema = z
  .union([z.string().trim().min(1), z.number().int()])
  .transform((value) => String(value));

const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? '');

const optionalLabel = z
  .string()
  .nullish()
  .transform((value) => (value && value.trim() ? value : null));

// Policy numbers never fail a load: anything unusable becomes null ("absent").
const tolerantNumber = z.unknown().transform((value) => toOptionalNumber(value));
const tolerantQuantity = z.unknown().transform((value) => toOptionalNumber(value) ?? 0);

export const historicalSalesRecordSchema = z
  .object({
    month: monthKeySchema,
    item_id: itemIdSchema,
    item_name: optionalText,
    actual_sales_qty: z.number().finite(),
    stock_available: z.boolean().nullish(),
    lost_sales_qty: z.number().nonnegative().nullish(),
    unit_price: z.number().nonnegative().nullish(),
    category: optionalText
  })
  .transform(
    (row): HistoricalSalesRecord => ({
      month: row.month,
      itemId: row.item_id,
      itemName: row.item_name,
      actualSalesQty: row.actual_sales_qty,
      stockAvailable: row.stock_available ?? true,
      lostSalesQty: row.lost_sales_qty ?? 0,
      unitPrice: row.unit_price ?? 0,
      category: row.category
    })
  );

export const monthlyForecastRecordSchema = z
  .object({
    month: monthKeySchema,
    forecasted_sales_qty: z.number().nonnegative(),
    forecast_source: optionalText,
    confidence_score: z.number().min(0).max(1).nullish()
  })
  .transform(
    (row): MonthlyForecastRecord => ({
      month: row.month,
      forecastedSalesQty: row.forecasted_sales_qty,
      forecastSource: row.forecast_source,
      confidenceScore: row.confidence_score ?? DEFAULT_CONFIDENCE_SCORE
    })
  );

export const itemParametersSchema = z
  .object({
    item_id: itemIdSchema,
    item_name: z.string(),
    supplier: z.string(),
    order_lead_time_days: tolerantNumber,
    minimum_order_qty: tolerantNumber,
    order_multiple: tolerantNumber,
    unit_cost: tolerantNumber,
    shelf_life_days: tolerantNumber,
    safety_stock_days: tolerantNumber,
    max_stock_cover_months: z
      .unknown()
      .transform((value) => (value === undefined ? DEFAULT_MAX_STOCK_COVER_MONTHS : toOptionalNumber(value))),
    category: optionalLabel,
    segment: optionalLabel
  })
  .transform(
    (row): ItemParameters => ({
      itemId: row.item_id,
      itemName: row.item_name,
      supplier: row.supplier,
      orderLeadTimeDays: row.order_lead_time_days,
      minimumOrderQty: row.minimum_order_qty,
      orderMultiple: row.order_multiple,
      unitCost: row.unit_cost,
      shelfLifeDays: row.shelf_life_days,
      safetyStockDays: row.safety_stock_days,
      maxStockCoverMonths: row.max_stock_cover_months,
      category: row.category,
      segment: row.segment
    })
  );

export const currentInventorySchema = z
  .object({
    item_id: itemIdSchema,
    current_stock_qty: tolerantQuantity,
    in_transit_qty: tolerantQuantity,
    in_transit_arrival_date: z.string().nullish(),
    committed_qty: tolerantQuantity
  })
  .transform(
    (row): CurrentInventory => ({
      itemId: row.item_id,
      currentStockQty: row.current_stock_qty,
      inTransitQty: row.in_transit_qty,
      inTransitArrivalDate: row.in_transit_arrival_date ?? null,
      committedQty: row.committed_qty
    })
  );

export const salesHistoryDocumentSchema = z.array(historicalSalesRecordSchema);
export const itemParametersDocumentSchema = z.array(itemParametersSchema);
export const currentInventoryDocumentSchema = z.array(currentInventorySchema);
export const salesForecastsDocumentSchema = z.record(z.array(monthlyForecastRecordSchema));

/** Raw catalog documents as read from files or a request body. */
export const catalogDocumentsSchema = z.object({
  salesHistory: z.unknown(),
  itemParameters: z.unknown(),
  currentInventory: z.unknown(),
  salesForecasts: z.unknown().optional()
});

export type CatalogDocuments = z.infer<typeof catalogDocumentsSchema>;
