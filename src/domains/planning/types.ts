import type { MonthKey } from '../../lib/months';

export type HistoricalSalesRecord = {
  month: MonthKey;
  itemId: string;
  itemName: string;
  actualSalesQty: number;
  stockAvailable: boolean;
  lostSalesQty: number;
  unitPrice: number;
  category: string;
};

export type MonthlyForecastRecord = {
  month: MonthKey;
  forecastedSalesQty: number;
  forecastSource: string;
  confidenceScore: number;
};

/**
 * Policy constants for one item. Numeric fields are null when the source
 * value was missing or not a number; the order policy decides what "absent"
 * means for each of them.
 */
export type ItemParameters = {
  itemId: string;
  itemName: string;
  supplier: string;
  orderLeadTimeDays: number | null;
  minimumOrderQty: number | null;
  orderMultiple: number | null;
  unitCost: number | null;
  shelfLifeDays: number | null;
  safetyStockDays: number | null;
  maxStockCoverMonths: number | null;
  category: string | null;
  segment: string | null;
};

export type CurrentInventory = {
  itemId: string;
  currentStockQty: number;
  inTransitQty: number;
  inTransitArrivalDate: string | null;
  committedQty: number;
};

export type PlanningCatalog = {
  readonly salesHistory: readonly HistoricalSalesRecord[];
  readonly itemParams: ReadonlyMap<string, ItemParameters>;
  readonly currentInventory: ReadonlyMap<string, CurrentInventory>;
  readonly salesForecasts: ReadonlyMap<string, readonly MonthlyForecastRecord[]>;
};

export type PlanParameters = {
  startMonth: MonthKey;
  numMonths: number;
  serviceLevel: number;
  reviewPeriodDays: number;
  includeInTransit: boolean;
};

export type PurchaseForecast = {
  forecastMonth: MonthKey;
  itemId: string;
  itemName: string;
  category: string | null;
  segment: string | null;
  adjustedDemand: number;
  optimizedOrderQty: number;
  effectiveUnitCost: number;
  totalOrderCost: number;
  openingInventoryUnits: number;
  plannedIntakeUnits: number;
  actualIntakeUnits: number;
  forecastedSalesUnits: number;
  actualSalesUnits: number;
  closingInventoryUnits: number;
  futureCoverMonths: number;
  orderByDate: string;
  expectedDeliveryDate: string;
  supplierName: string;
  notes: string[];
};

export type DemandStats = {
  meanDaily: number;
  stdDaily: number;
};
