import { getPlanningDefaults, type PlanningDefaults } from '../config/planningDefaults';
import {
  buildPurchasePlan,
  closingInventory,
  coverMonths,
  type PlanParameters,
  type PlanningCatalog,
  type PurchaseForecast
} from '../domains/planning';
import { addMonths, monthOf } from '../lib/months';
import { roundQuantity } from '../lib/numbers';
import { currentRequestId } from '../lib/requestContext';
import type { OrderAdjustment, PlanParamsInput } from '../schemas/planning.schema';

export type PlanSummary = {
  totalOrderQty: number;
  totalOrderCost: number;
  itemCount: number;
  averageCoverMonths: number;
  stockoutRiskCount: number;
};

export type OrderAdjustmentChange = {
  itemId: string;
  itemName: string;
  month: string;
  originalQty: number;
  newQty: number;
  difference: number;
};

export type AdjustmentResult = {
  rows: PurchaseForecast[];
  changes: OrderAdjustmentChange[];
};

/** Months before current + 2 are locked for manual edits. */
const EDITABLE_MONTH_OFFSET = 2;

export function resolvePlanParameters(
  input: PlanParamsInput,
  defaults: PlanningDefaults = getPlanningDefaults()
): PlanParameters {
  return {
    startMonth: input.startMonth,
    numMonths: input.numMonths ?? defaults.horizonMonths,
    serviceLevel: input.serviceLevel ?? defaults.serviceLevel,
    reviewPeriodDays: input.reviewPeriodDays ?? defaults.reviewPeriodDays,
    includeInTransit: input.includeInTransit ?? defaults.includeInTransit
  };
}

export function generatePurchasePlan(catalog: PlanningCatalog, params: PlanParameters): PurchaseForecast[] {
  const start = Date.now();
  const rows = buildPurchasePlan(catalog, params);
  console.log(
    JSON.stringify({
      event: 'purchase_plan_generated',
      requestId: currentRequestId(),
      startMonth: params.startMonth,
      numMonths: params.numMonths,
      serviceLevel: params.serviceLevel,
      reviewPeriodDays: params.reviewPeriodDays,
      includeInTransit: params.includeInTransit,
      itemCount: catalog.itemParams.size,
      rowCount: rows.length,
      durationMs: Date.now() - start,
      timestamp: new Date().toISOString()
    })
  );
  return rows;
}

export function summarizePlan(rows: readonly PurchaseForecast[]): PlanSummary {
  let totalOrderQty = 0;
  let totalOrderCost = 0;
  let coverTotal = 0;
  let stockoutRiskCount = 0;
  const items = new Set<string>();

  for (const row of rows) {
    totalOrderQty += row.optimizedOrderQty;
    totalOrderCost += row.totalOrderCost;
    coverTotal += row.futureCoverMonths;
    if (row.closingInventoryUnits === 0) stockoutRiskCount += 1;
    items.add(row.itemId);
  }

  return {
    totalOrderQty,
    totalOrderCost: roundQuantity(totalOrderCost),
    itemCount: items.size,
    averageCoverMonths: rows.length > 0 ? roundQuantity(coverTotal / rows.length) : 0,
    stockoutRiskCount
  };
}

export function editableCutoffMonth(today: Date = new Date()): string {
  return addMonths(monthOf(today), EDITABLE_MONTH_OFFSET);
}

function rowKey(itemId: string, month: string): string {
  return `${itemId}:${month}`;
}

/**
 * Re-threads opening/closing stock for one item from `fromIndex` onward.
 * Cover is measured against the row's rounded demand.
 */
function rethreadItem(rows: PurchaseForecast[], indexes: number[], fromIndex: number): void {
  for (let i = fromIndex; i < indexes.length; i += 1) {
    const row = rows[indexes[i]];
    const opening = i === 0 ? row.openingInventoryUnits : rows[indexes[i - 1]].closingInventoryUnits;
    const closing = closingInventory(opening, row.plannedIntakeUnits, row.actualIntakeUnits, row.forecastedSalesUnits);
    rows[indexes[i]] = {
      ...row,
      openingInventoryUnits: opening,
      closingInventoryUnits: closing,
      futureCoverMonths: coverMonths(closing, row.forecastedSalesUnits)
    };
  }
}

/**
 * Applies manual order quantities to a generated plan. Every adjustment is
 * checked before any is applied, so a locked or unknown row rejects the
 * whole batch.
 */
export function applyOrderAdjustments(
  rows: readonly PurchaseForecast[],
  adjustments: readonly OrderAdjustment[],
  options: { cutoffMonth?: string } = {}
): AdjustmentResult {
  const cutoffMonth = options.cutoffMonth ?? editableCutoffMonth();
  const next = rows.map((row) => ({ ...row, notes: [...row.notes] }));
  const positions = new Map<string, number>();
  next.forEach((row, index) => positions.set(rowKey(row.itemId, row.forecastMonth), index));

  for (const adjustment of adjustments) {
    if (!positions.has(rowKey(adjustment.itemId, adjustment.month))) {
      throw new Error('PLAN_ROW_NOT_FOUND');
    }
    if (adjustment.month < cutoffMonth) {
      throw new Error('PLAN_MONTH_LOCKED');
    }
  }

  const changes: OrderAdjustmentChange[] = [];
  const touchedItems = new Set<string>();
  for (const adjustment of adjustments) {
    const index = positions.get(rowKey(adjustment.itemId, adjustment.month));
    if (index === undefined) continue;
    const row = next[index];
    if (row.optimizedOrderQty === adjustment.orderQty) continue;

    changes.push({
      itemId: row.itemId,
      itemName: row.itemName,
      month: row.forecastMonth,
      originalQty: row.optimizedOrderQty,
      newQty: adjustment.orderQty,
      difference: adjustment.orderQty - row.optimizedOrderQty
    });
    next[index] = {
      ...row,
      optimizedOrderQty: adjustment.orderQty,
      plannedIntakeUnits: adjustment.orderQty,
      totalOrderCost: adjustment.orderQty * row.effectiveUnitCost
    };
    touchedItems.add(row.itemId);
  }

  for (const itemId of touchedItems) {
    const indexes = next
      .map((row, index) => ({ row, index }))
      .filter(({ row }) => row.itemId === itemId)
      .sort((a, b) => (a.row.forecastMonth < b.row.forecastMonth ? -1 : 1))
      .map(({ index }) => index);
    const firstChanged = indexes.findIndex((index) =>
      changes.some((change) => change.itemId === itemId && change.month === next[index].forecastMonth)
    );
    rethreadItem(next, indexes, Math.max(0, firstChanged));
  }

  if (changes.length > 0) {
    console.log(
      JSON.stringify({
        event: 'purchase_plan_adjusted',
        requestId: currentRequestId(),
        changeCount: changes.length,
        itemCount: touchedItems.size,
        cutoffMonth,
        timestamp: new Date().toISOString()
      })
    );
  }

  return { rows: next, changes };
}
