import type { PurchaseForecast } from '../domains/planning';
import { formatCsv } from '../lib/csv';

export type PlanJsonExport = {
  generated: string;
  forecasts: PurchaseForecast[];
};

export const PLAN_EXPORT_COLUMNS: ReadonlyArray<keyof PurchaseForecast> = [
  'forecastMonth',
  'itemId',
  'itemName',
  'category',
  'segment',
  'adjustedDemand',
  'optimizedOrderQty',
  'effectiveUnitCost',
  'totalOrderCost',
  'openingInventoryUnits',
  'plannedIntakeUnits',
  'actualIntakeUnits',
  'forecastedSalesUnits',
  'actualSalesUnits',
  'closingInventoryUnits',
  'futureCoverMonths',
  'orderByDate',
  'expectedDeliveryDate',
  'supplierName',
  'notes'
];

export function toJsonExport(rows: readonly PurchaseForecast[], generatedAt: Date = new Date()): PlanJsonExport {
  return { generated: generatedAt.toISOString(), forecasts: [...rows] };
}

function cell(value: PurchaseForecast[keyof PurchaseForecast]): string {
  if (value === null) return '';
  if (Array.isArray(value)) return value.join('; ');
  return String(value);
}

export function toCsvExport(rows: readonly PurchaseForecast[]): string {
  return formatCsv(
    [...PLAN_EXPORT_COLUMNS],
    rows.map((row) => PLAN_EXPORT_COLUMNS.map((column) => cell(row[column])))
  );
}
