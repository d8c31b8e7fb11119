export type PlanningDefaults = {
  serviceLevel: number;
  reviewPeriodDays: number;
  horizonMonths: number;
  includeInTransit: boolean;
  dataDir: string;
};

function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value === null || value === '') return fallback;
  const parsed = Number(value);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;
  return fallback;
}

export function getPlanningDefaults(env: NodeJS.ProcessEnv = process.env): PlanningDefaults {
  const horizon = Math.trunc(parseNumber(env.PLAN_DEFAULT_HORIZON_MONTHS, 6));
  return {
    serviceLevel: parseNumber(env.PLAN_DEFAULT_SERVICE_LEVEL, 0.95),
    reviewPeriodDays: Math.max(0, Math.trunc(parseNumber(env.PLAN_DEFAULT_REVIEW_PERIOD_DAYS, 30))),
    horizonMonths: Math.min(24, Math.max(1, horizon)),
    includeInTransit: parseBoolean(env.PLAN_INCLUDE_IN_TRANSIT, true),
    dataDir: env.PLAN_DATA_DIR || 'data'
  };
}
