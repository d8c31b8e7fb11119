export type {
  CurrentInventory,
  DemandStats,
  HistoricalSalesRecord,
  ItemParameters,
  MonthlyForecastRecord,
  PlanParameters,
  PlanningCatalog,
  PurchaseForecast
} from './types';

export { buildCatalog, type CatalogParts } from './internal/catalog';

export {
  DEFAULT_DEMAND_STATS,
  estimateDailyDemand,
  resolveMonthlyExpected,
  selectForecast
} from './internal/demand';

export {
  capByCoverAndShelfLife,
  computeOrderQuantity,
  orderUpToLevel,
  reviewHorizonDays,
  roundToOrderConstraints,
  zScoreForServiceLevel,
  type OrderDecision,
  type OrderPolicyInput
} from './internal/orderPolicy';

export { buildPurchasePlan, closingInventory, coverMonths } from './internal/rollforward';
