import type {
  CurrentInventory,
  HistoricalSalesRecord,
  ItemParameters,
  MonthlyForecastRecord,
  PlanParameters
} from '../domains/planning';

export function makeItemParams(itemId: string, overrides: Partial<ItemParameters> = {}): ItemParameters {
  return {
    itemId,
    itemName: `Item ${itemId}`,
    supplier: 'Northwind Supply',
    orderLeadTimeDays: 15,
    minimumOrderQty: 100,
    orderMultiple: 25,
    unitCost: 2.5,
    shelfLifeDays: null,
    safetyStockDays: null,
    maxStockCoverMonths: 2,
    category: null,
    segment: null,
    ...overrides
  };
}

export function makeInventory(itemId: string, overrides: Partial<CurrentInventory> = {}): CurrentInventory {
  return {
    itemId,
    currentStockQty: 0,
    inTransitQty: 0,
    inTransitArrivalDate: null,
    committedQty: 0,
    ...overrides
  };
}

/** One history record per quantity, for consecutive months from January of `startYear`. */
export function makeHistory(
  itemId: string,
  quantities: number[],
  startYear = 2023,
  category = ''
): HistoricalSalesRecord[] {
  return quantities.map((qty, index) => ({
    month: `${startYear + Math.floor(index / 12)}-${String((index % 12) + 1).padStart(2, '0')}`,
    itemId,
    itemName: `Item ${itemId}`,
    actualSalesQty: qty,
    stockAvailable: true,
    lostSalesQty: 0,
    unitPrice: 4,
    category
  }));
}

export function makeForecast(
  month: string,
  forecastedSalesQty: number,
  confidenceScore = 0.7,
  forecastSource = 'baseline'
): MonthlyForecastRecord {
  return { month, forecastedSalesQty, forecastSource, confidenceScore };
}

export function makePlanParams(overrides: Partial<PlanParameters> = {}): PlanParameters {
  return {
    startMonth: '2024-01',
    numMonths: 3,
    serviceLevel: 0.95,
    reviewPeriodDays: 30,
    includeInTransit: true,
    ...overrides
  };
}

/** Twelve months alternating 270/330: mean 300 per month, roughly 1 unit/day of spread. */
export const STEADY_SALES = [270, 330, 270, 330, 270, 330, 270, 330, 270, 330, 270, 330];
