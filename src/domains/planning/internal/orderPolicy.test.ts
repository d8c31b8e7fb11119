import { describe, expect, it } from 'vitest';
import { makeItemParams } from '../../../testUtils/planningFactories';
import {
  capByCoverAndShelfLife,
  computeOrderQuantity,
  leadTimeDays,
  orderUpToLevel,
  reviewHorizonDays,
  roundToOrderConstraints,
  zScoreForServiceLevel
} from './orderPolicy';

describe('zScoreForServiceLevel', () => {
  it('maps the supported service levels', () => {
    expect(zScoreForServiceLevel(0.9)).toBe(1.282);
    expect(zScoreForServiceLevel(0.95)).toBe(1.645);
    expect(zScoreForServiceLevel(0.98)).toBe(2.054);
    expect(zScoreForServiceLevel(0.99)).toBe(2.326);
  });

  it('uses 1.645 for anything else', () => {
    expect(zScoreForServiceLevel(0.97)).toBe(1.645);
  });
});

describe('review horizon', () => {
  it('treats a missing or negative lead time as zero', () => {
    expect(leadTimeDays(makeItemParams('SKU1', { orderLeadTimeDays: null }))).toBe(0);
    expect(leadTimeDays(makeItemParams('SKU1', { orderLeadTimeDays: -4 }))).toBe(0);
    expect(leadTimeDays(makeItemParams('SKU1', { orderLeadTimeDays: 21 }))).toBe(21);
  });

  it('is at least one day', () => {
    expect(reviewHorizonDays(0, 0)).toBe(1);
    expect(reviewHorizonDays(15, 30)).toBe(45);
  });
});

describe('orderUpToLevel', () => {
  it('covers mean demand over the horizon plus safety stock', () => {
    expect(orderUpToLevel({ meanDaily: 10, stdDaily: 1 }, 45, 1.645)).toBeCloseTo(461.035, 3);
  });

  it('grows with the service level', () => {
    const demand = { meanDaily: 10, stdDaily: 2 };
    const levels = [0.9, 0.95, 0.98, 0.99].map((level) => orderUpToLevel(demand, 45, zScoreForServiceLevel(level)));
    expect([...levels].sort((a, b) => a - b)).toEqual(levels);
    expect(levels[3]).toBeGreaterThan(levels[0]);
  });

  it('never orders less at a higher service level for the same stock', () => {
    const params = makeItemParams('SKU1', { maxStockCoverMonths: null });
    const quantities = [0.9, 0.95, 0.98, 0.99].map(
      (serviceLevel) =>
        computeOrderQuantity({
          available: 100,
          params,
          demand: { meanDaily: 10, stdDaily: 2 },
          reviewPeriodDays: 30,
          serviceLevel,
          monthlyExpected: 300
        }).rawQty
    );
    expect([...quantities].sort((a, b) => a - b)).toEqual(quantities);
    expect(quantities[3]).toBeGreaterThan(quantities[0]);
  });
});

describe('capByCoverAndShelfLife', () => {
  it('caps at the stock cover limit', () => {
    expect(capByCoverAndShelfLife(700, makeItemParams('SKU1', { maxStockCoverMonths: 2 }), 300)).toBe(600);
  });

  it('uses the larger of the cover and shelf-life caps', () => {
    const params = makeItemParams('SKU1', { maxStockCoverMonths: 0.5, shelfLifeDays: 30 });
    expect(capByCoverAndShelfLife(1000, params, 300)).toBe(300);
  });

  it('truncates fractional caps', () => {
    const params = makeItemParams('SKU1', { maxStockCoverMonths: null, shelfLifeDays: 45 });
    expect(capByCoverAndShelfLife(1000, params, 101)).toBe(151);
  });

  it('leaves the quantity alone without caps or expected demand', () => {
    const uncapped = makeItemParams('SKU1', { maxStockCoverMonths: null, shelfLifeDays: null });
    expect(capByCoverAndShelfLife(1000, uncapped, 300)).toBe(1000);
    expect(capByCoverAndShelfLife(1000, makeItemParams('SKU1'), 0)).toBe(1000);
  });

  it('ignores non-positive caps', () => {
    const params = makeItemParams('SKU1', { maxStockCoverMonths: 0, shelfLifeDays: -10 });
    expect(capByCoverAndShelfLife(1000, params, 300)).toBe(1000);
  });
});

describe('roundToOrderConstraints', () => {
  it('returns zero for nothing to order', () => {
    expect(roundToOrderConstraints(0, 100, 25)).toBe(0);
  });

  it('rounds up to the order multiple', () => {
    expect(roundToOrderConstraints(462, 100, 25)).toBe(475);
    expect(roundToOrderConstraints(30, 40, 25)).toBe(50);
  });

  it('lifts small orders to the minimum order quantity', () => {
    expect(roundToOrderConstraints(10, 100, 25)).toBe(100);
    expect(roundToOrderConstraints(10, 40, 25)).toBe(40);
  });

  it('treats missing constraints as a multiple of one and no minimum', () => {
    expect(roundToOrderConstraints(7, null, null)).toBe(7);
    expect(roundToOrderConstraints(7, 0, 0)).toBe(7);
  });
});

describe('computeOrderQuantity', () => {
  const params = makeItemParams('SKU1');

  it('orders up to the target level in pack sizes', () => {
    const decision = computeOrderQuantity({
      available: 0,
      params,
      demand: { meanDaily: 10, stdDaily: 1 },
      reviewPeriodDays: 30,
      serviceLevel: 0.95,
      monthlyExpected: 300
    });
    expect(decision).toMatchObject({
      z: 1.645,
      leadTimeDays: 15,
      horizonDays: 45,
      rawQty: 462,
      cappedQty: 462,
      orderQty: 475,
      totalCost: 1187.5
    });
  });

  it('orders nothing when stock already covers the horizon', () => {
    const decision = computeOrderQuantity({
      available: 500,
      params,
      demand: { meanDaily: 10, stdDaily: 1 },
      reviewPeriodDays: 30,
      serviceLevel: 0.95,
      monthlyExpected: 300
    });
    expect(decision.rawQty).toBe(0);
    expect(decision.orderQty).toBe(0);
    expect(decision.totalCost).toBe(0);
  });

  it('costs orders at zero when the unit cost is unknown', () => {
    const decision = computeOrderQuantity({
      available: 0,
      params: makeItemParams('SKU1', { unitCost: null }),
      demand: { meanDaily: 10, stdDaily: 1 },
      reviewPeriodDays: 30,
      serviceLevel: 0.95,
      monthlyExpected: 300
    });
    expect(decision.orderQty).toBe(475);
    expect(decision.totalCost).toBe(0);
  });
});
