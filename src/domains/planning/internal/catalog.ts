import type {
  CurrentInventory,
  HistoricalSalesRecord,
  ItemParameters,
  MonthlyForecastRecord,
  PlanningCatalog
} from '../types';

export type CatalogParts = {
  salesHistory: HistoricalSalesRecord[];
  itemParams: ItemParameters[];
  currentInventory: CurrentInventory[];
  salesForecasts: Record<string, MonthlyForecastRecord[]>;
};

/**
 * Keys item parameters and inventory by item id (a later duplicate replaces
 * an earlier one) and freezes the result. The catalog is read-only for the
 * whole planning run.
 */
export function buildCatalog(parts: CatalogParts): PlanningCatalog {
  const itemParams = new Map<string, ItemParameters>();
  for (const params of parts.itemParams) {
    itemParams.set(params.itemId, Object.freeze({ ...params }));
  }

  const currentInventory = new Map<string, CurrentInventory>();
  for (const inventory of parts.currentInventory) {
    currentInventory.set(inventory.itemId, Object.freeze({ ...inventory }));
  }

  const salesForecasts = new Map<string, readonly MonthlyForecastRecord[]>();
  for (const [itemId, records] of Object.entries(parts.salesForecasts)) {
    salesForecasts.set(itemId, Object.freeze(records.map((record) => Object.freeze({ ...record }))));
  }

  return Object.freeze({
    salesHistory: Object.freeze(parts.salesHistory.map((record) => Object.freeze({ ...record }))),
    itemParams,
    currentInventory,
    salesForecasts
  });
}

export function historyForItem(catalog: PlanningCatalog, itemId: string): HistoricalSalesRecord[] {
  return catalog.salesHistory.filter((record) => record.itemId === itemId);
}

export function actualSalesFor(history: readonly HistoricalSalesRecord[], month: string): number {
  let total = 0;
  for (const record of history) {
    if (record.month === month) total += record.actualSalesQty;
  }
  return total;
}

/** Item category from parameters, falling back to the latest history record. */
export function categoryForItem(
  params: ItemParameters,
  history: readonly HistoricalSalesRecord[]
): string | null {
  if (params.category) return params.category;
  let latest: HistoricalSalesRecord | null = null;
  for (const record of history) {
    if (!latest || record.month >= latest.month) latest = record;
  }
  return latest?.category ? latest.category : null;
}
