import { describe, expect, it } from 'vitest';
import {
  makeForecast,
  makeHistory,
  makeInventory,
  makeItemParams,
  makePlanParams,
  STEADY_SALES
} from '../../../testUtils/planningFactories';
import type { CurrentInventory, HistoricalSalesRecord, ItemParameters, MonthlyForecastRecord } from '../types';
import { buildCatalog } from './catalog';
import { buildPurchasePlan, closingInventory, coverMonths } from './rollforward';

function catalogOf(parts: {
  salesHistory?: HistoricalSalesRecord[];
  itemParams: ItemParameters[];
  currentInventory?: CurrentInventory[];
  salesForecasts?: Record<string, MonthlyForecastRecord[]>;
}) {
  return buildCatalog({
    salesHistory: parts.salesHistory ?? [],
    itemParams: parts.itemParams,
    currentInventory: parts.currentInventory ?? [],
    salesForecasts: parts.salesForecasts ?? {}
  });
}

const steadyCatalog = catalogOf({
  salesHistory: makeHistory('SKU1', STEADY_SALES),
  itemParams: [makeItemParams('SKU1')],
  currentInventory: [makeInventory('SKU1')]
});

describe('closingInventory', () => {
  it('rounds half to even and never goes negative', () => {
    expect(closingInventory(10, 5, 0, 12.5)).toBe(2);
    expect(closingInventory(10, 0, 0, 40)).toBe(0);
  });
});

describe('coverMonths', () => {
  it('is zero without expected demand', () => {
    expect(coverMonths(100, 0)).toBe(0);
    expect(coverMonths(150, 300)).toBe(0.5);
  });
});

describe('buildPurchasePlan', () => {
  it('orders 475 units a month for a steady 300-unit seller with no stock', () => {
    const rows = buildPurchasePlan(steadyCatalog, makePlanParams());

    expect(rows.map((row) => row.forecastMonth)).toEqual(['2024-01', '2024-02', '2024-03']);
    expect(rows.map((row) => row.optimizedOrderQty)).toEqual([475, 475, 475]);
    expect(rows.map((row) => row.openingInventoryUnits)).toEqual([0, 175, 350]);
    expect(rows.map((row) => row.closingInventoryUnits)).toEqual([175, 350, 525]);
    expect(rows[2].futureCoverMonths).toBe(1.75);
    expect(rows[0]).toMatchObject({
      itemId: 'SKU1',
      itemName: 'Item SKU1',
      category: null,
      segment: null,
      adjustedDemand: 300,
      forecastedSalesUnits: 300,
      plannedIntakeUnits: 475,
      actualIntakeUnits: 0,
      actualSalesUnits: 0,
      effectiveUnitCost: 2.5,
      totalOrderCost: 1187.5,
      orderByDate: '2024-01-01',
      expectedDeliveryDate: '2024-01-28',
      supplierName: 'Northwind Supply',
      notes: ['Z=1.645', 'L=15d', 'R=30d']
    });
  });

  it('produces numMonths rows per item, ordered by item id', () => {
    const catalog = catalogOf({
      itemParams: [makeItemParams('SKU2'), makeItemParams('SKU1'), makeItemParams('A0')]
    });
    const rows = buildPurchasePlan(catalog, makePlanParams({ startMonth: '2024-11', numMonths: 4 }));

    expect(rows).toHaveLength(12);
    expect(rows.map((row) => row.itemId)).toEqual([
      'A0', 'A0', 'A0', 'A0',
      'SKU1', 'SKU1', 'SKU1', 'SKU1',
      'SKU2', 'SKU2', 'SKU2', 'SKU2'
    ]);
    expect(rows.slice(0, 4).map((row) => row.forecastMonth)).toEqual(['2024-11', '2024-12', '2025-01', '2025-02']);
  });

  it('threads closing stock into the next opening and keeps it non-negative', () => {
    const catalog = catalogOf({
      salesHistory: [...makeHistory('SKU1', STEADY_SALES), ...makeHistory('SKU2', [5, 900, 40, 0, 3])],
      itemParams: [makeItemParams('SKU1'), makeItemParams('SKU2', { minimumOrderQty: 7, orderMultiple: 7 })],
      currentInventory: [makeInventory('SKU1', { currentStockQty: 120 }), makeInventory('SKU2', { currentStockQty: 3 })]
    });
    const rows = buildPurchasePlan(catalog, makePlanParams({ numMonths: 6 }));

    for (const itemId of ['SKU1', 'SKU2']) {
      const itemRows = rows.filter((row) => row.itemId === itemId);
      for (let i = 1; i < itemRows.length; i += 1) {
        expect(itemRows[i].openingInventoryUnits).toBe(itemRows[i - 1].closingInventoryUnits);
      }
    }
    for (const row of rows) {
      expect(row.closingInventoryUnits).toBeGreaterThanOrEqual(0);
      if (row.itemId === 'SKU2' && row.optimizedOrderQty > 0) {
        expect(row.optimizedOrderQty % 7).toBe(0);
      }
    }
  });

  it('is deterministic for the same catalog and parameters', () => {
    const params = makePlanParams({ numMonths: 5 });
    expect(buildPurchasePlan(steadyCatalog, params)).toEqual(buildPurchasePlan(steadyCatalog, params));
  });

  it('defaults items without history, inventory or policy numbers', () => {
    const catalog = catalogOf({
      itemParams: [
        makeItemParams('A0', {
          orderLeadTimeDays: null,
          minimumOrderQty: null,
          orderMultiple: null,
          unitCost: null,
          maxStockCoverMonths: null
        })
      ]
    });
    const rows = buildPurchasePlan(catalog, makePlanParams());

    expect(rows.map((row) => row.optimizedOrderQty)).toEqual([33, 33, 33]);
    expect(rows.map((row) => row.closingInventoryUnits)).toEqual([3, 6, 9]);
    expect(rows[0].adjustedDemand).toBe(30);
    expect(rows[0].totalOrderCost).toBe(0);
    expect(rows[0].notes).toEqual(['Z=1.645', 'L=0d', 'R=30d']);
  });

  it('starts from on-hand plus in-transit stock when in-transit is included', () => {
    const catalog = catalogOf({
      salesHistory: makeHistory('SKU1', STEADY_SALES),
      itemParams: [makeItemParams('SKU1')],
      currentInventory: [makeInventory('SKU1', { currentStockQty: 400, inTransitQty: 100 })]
    });

    const withTransit = buildPurchasePlan(catalog, makePlanParams({ numMonths: 1 }));
    expect(withTransit[0].openingInventoryUnits).toBe(500);
    expect(withTransit[0].optimizedOrderQty).toBe(0);
    expect(withTransit[0].closingInventoryUnits).toBe(200);

    const onHandOnly = buildPurchasePlan(catalog, makePlanParams({ numMonths: 1, includeInTransit: false }));
    expect(onHandOnly[0].openingInventoryUnits).toBe(400);
    expect(onHandOnly[0].optimizedOrderQty).toBe(100);
    expect(onHandOnly[0].closingInventoryUnits).toBe(200);
  });

  it('sizes every month against the stock available at plan start', () => {
    const catalog = catalogOf({
      salesHistory: makeHistory('SKU1', STEADY_SALES),
      itemParams: [makeItemParams('SKU1')],
      currentInventory: [makeInventory('SKU1', { currentStockQty: 500 })]
    });
    const rows = buildPurchasePlan(catalog, makePlanParams());

    expect(rows.map((row) => row.optimizedOrderQty)).toEqual([0, 0, 0]);
    expect(rows.map((row) => row.closingInventoryUnits)).toEqual([200, 0, 0]);
  });

  it('plans against the forecast and reports actual sales for historical months', () => {
    const catalog = catalogOf({
      salesHistory: makeHistory('SKU1', STEADY_SALES, 2023, 'Snacks'),
      itemParams: [makeItemParams('SKU1')],
      salesForecasts: { SKU1: [makeForecast('2023-11', 450, 0.8), makeForecast('2023-12', 120, 0.8)] }
    });
    const rows = buildPurchasePlan(catalog, makePlanParams({ startMonth: '2023-11', numMonths: 2 }));

    expect(rows.map((row) => row.adjustedDemand)).toEqual([450, 200]);
    expect(rows.map((row) => row.actualSalesUnits)).toEqual([270, 330]);
    expect(rows[0].closingInventoryUnits).toBe(25);
    expect(rows[0].category).toBe('Snacks');
  });

  it('prefers the item parameter category over history', () => {
    const catalog = catalogOf({
      salesHistory: makeHistory('SKU1', STEADY_SALES, 2023, 'Snacks'),
      itemParams: [makeItemParams('SKU1', { category: 'Drinks', segment: 'A' })]
    });
    const [row] = buildPurchasePlan(catalog, makePlanParams({ numMonths: 1 }));
    expect(row.category).toBe('Drinks');
    expect(row.segment).toBe('A');
  });
});
