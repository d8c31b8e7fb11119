import { monthRange } from '../../../lib/months';
import { roundHalfEven } from '../../../lib/numbers';
import type { ItemParameters, PlanParameters, PlanningCatalog, PurchaseForecast } from '../types';
import { actualSalesFor, categoryForItem, historyForItem } from './catalog';
import { estimateDailyDemand, resolveMonthlyExpected, selectForecast } from './demand';
import { computeOrderQuantity } from './orderPolicy';

function startingAvailable(catalog: PlanningCatalog, itemId: string, includeInTransit: boolean): number {
  const inventory = catalog.currentInventory.get(itemId);
  const onHand = inventory ? inventory.currentStockQty : 0;
  const inTransit = inventory && includeInTransit ? inventory.inTransitQty : 0;
  return Math.max(0, onHand + inTransit);
}

export function closingInventory(opening: number, plannedIntake: number, actualIntake: number, sales: number): number {
  return Math.max(0, roundHalfEven(opening + plannedIntake + actualIntake - sales));
}

export function coverMonths(closing: number, monthlyExpected: number): number {
  return monthlyExpected > 0 ? closing / monthlyExpected : 0;
}

function planItem(catalog: PlanningCatalog, params: ItemParameters, plan: PlanParameters): PurchaseForecast[] {
  const history = historyForItem(catalog, params.itemId);
  const demand = estimateDailyDemand(params.itemId, history);
  const forecasts = catalog.salesForecasts.get(params.itemId);
  const category = categoryForItem(params, history);
  const available = startingAvailable(catalog, params.itemId, plan.includeInTransit);
  const unitCost = params.unitCost !== null && Number.isFinite(params.unitCost) ? params.unitCost : 0;

  const rows: PurchaseForecast[] = [];
  let opening = available;

  for (const month of monthRange(plan.startMonth, plan.numMonths)) {
    const monthlyExpected = resolveMonthlyExpected(selectForecast(forecasts, month), demand);
    const decision = computeOrderQuantity({
      available,
      params,
      demand,
      reviewPeriodDays: plan.reviewPeriodDays,
      serviceLevel: plan.serviceLevel,
      monthlyExpected
    });

    const forecastedSales = roundHalfEven(monthlyExpected);
    const plannedIntake = decision.orderQty;
    const actualIntake = 0;
    const closing = closingInventory(opening, plannedIntake, actualIntake, forecastedSales);

    rows.push({
      forecastMonth: month,
      itemId: params.itemId,
      itemName: params.itemName,
      category,
      segment: params.segment ?? null,
      adjustedDemand: forecastedSales,
      optimizedOrderQty: decision.orderQty,
      effectiveUnitCost: unitCost,
      totalOrderCost: decision.totalCost,
      openingInventoryUnits: opening,
      plannedIntakeUnits: plannedIntake,
      actualIntakeUnits: actualIntake,
      forecastedSalesUnits: forecastedSales,
      actualSalesUnits: actualSalesFor(history, month),
      closingInventoryUnits: closing,
      futureCoverMonths: coverMonths(closing, monthlyExpected),
      orderByDate: `${month}-01`,
      expectedDeliveryDate: `${month}-28`,
      supplierName: params.supplier,
      notes: [`Z=${decision.z}`, `L=${decision.leadTimeDays}d`, `R=${plan.reviewPeriodDays}d`]
    });

    opening = closing;
  }

  return rows;
}

/**
 * Month-by-month purchase plan for every item with parameters. Rows come
 * out grouped by item id (ascending) with months in calendar order.
 */
export function buildPurchasePlan(catalog: PlanningCatalog, plan: PlanParameters): PurchaseForecast[] {
  const itemIds = [...catalog.itemParams.keys()].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  const rows: PurchaseForecast[] = [];
  for (const itemId of itemIds) {
    const params = catalog.itemParams.get(itemId);
    if (!params) continue;
    rows.push(...planItem(catalog, params, plan));
  }
  return rows;
}
