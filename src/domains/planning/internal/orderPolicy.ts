import type { DemandStats, ItemParameters } from '../types';

const Z_BY_SERVICE_LEVEL: ReadonlyArray<readonly [number, number]> = [
  [0.9, 1.282],
  [0.95, 1.645],
  [0.98, 2.054],
  [0.99, 2.326]
];
const DEFAULT_Z = 1.645;
const DAYS_PER_MONTH = 30;

export type OrderDecision = {
  z: number;
  leadTimeDays: number;
  horizonDays: number;
  orderUpToLevel: number;
  rawQty: number;
  cappedQty: number;
  orderQty: number;
  totalCost: number;
};

export type OrderPolicyInput = {
  available: number;
  params: ItemParameters;
  demand: DemandStats;
  reviewPeriodDays: number;
  serviceLevel: number;
  monthlyExpected: number;
};

function positiveOrNull(value: number | null): number | null {
  return value !== null && Number.isFinite(value) && value > 0 ? value : null;
}

export function zScoreForServiceLevel(serviceLevel: number): number {
  const entry = Z_BY_SERVICE_LEVEL.find(([level]) => level === serviceLevel);
  return entry ? entry[1] : DEFAULT_Z;
}

export function leadTimeDays(params: ItemParameters): number {
  const lead = params.orderLeadTimeDays;
  return lead !== null && Number.isFinite(lead) ? Math.max(0, lead) : 0;
}

export function reviewHorizonDays(leadDays: number, reviewPeriodDays: number): number {
  return Math.max(1, leadDays + reviewPeriodDays);
}

/** S = d * (L + R) + z * sigma_d * sqrt(L + R) */
export function orderUpToLevel(demand: DemandStats, horizonDays: number, z: number): number {
  return demand.meanDaily * horizonDays + z * demand.stdDaily * Math.sqrt(horizonDays);
}

/**
 * Clamps an order to the stock-cover and shelf-life ceilings. When both
 * apply the larger one wins.
 */
export function capByCoverAndShelfLife(qty: number, params: ItemParameters, monthlyExpected: number): number {
  if (!(monthlyExpected > 0)) {
    return Math.max(0, qty);
  }
  const caps: number[] = [];
  const coverMonths = positiveOrNull(params.maxStockCoverMonths);
  if (coverMonths !== null) {
    caps.push(Math.trunc(coverMonths * monthlyExpected));
  }
  const shelfLifeDays = positiveOrNull(params.shelfLifeDays);
  if (shelfLifeDays !== null) {
    caps.push(Math.trunc((shelfLifeDays / DAYS_PER_MONTH) * monthlyExpected));
  }
  if (caps.length === 0) {
    return Math.max(0, qty);
  }
  return Math.max(0, Math.min(qty, Math.max(...caps)));
}

export function roundToOrderConstraints(
  qty: number,
  minimumOrderQty: number | null,
  orderMultiple: number | null
): number {
  if (qty <= 0) return 0;
  const multiple = Math.max(1, orderMultiple !== null && Number.isFinite(orderMultiple) ? orderMultiple : 1);
  const moq = Math.max(0, minimumOrderQty !== null && Number.isFinite(minimumOrderQty) ? minimumOrderQty : 0);
  const rounded = Math.ceil(qty / multiple) * multiple;
  return Math.max(rounded, moq);
}

export function computeOrderQuantity(input: OrderPolicyInput): OrderDecision {
  const z = zScoreForServiceLevel(input.serviceLevel);
  const lead = leadTimeDays(input.params);
  const horizonDays = reviewHorizonDays(lead, input.reviewPeriodDays);
  const level = orderUpToLevel(input.demand, horizonDays, z);

  // Ordered against stock captured at plan start, not the rolled-forward opening.
  const rawQty = Math.max(0, Math.ceil(level - input.available));
  const cappedQty = capByCoverAndShelfLife(rawQty, input.params, input.monthlyExpected);
  const orderQty = roundToOrderConstraints(cappedQty, input.params.minimumOrderQty, input.params.orderMultiple);
  const unitCost = input.params.unitCost !== null && Number.isFinite(input.params.unitCost) ? input.params.unitCost : 0;

  return {
    z,
    leadTimeDays: lead,
    horizonDays,
    orderUpToLevel: level,
    rawQty,
    cappedQty,
    orderQty,
    totalCost: orderQty * unitCost
  };
}
