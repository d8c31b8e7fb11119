import { describe, expect, it } from 'vitest';
import { getPlanningDefaults } from './planningDefaults';

describe('getPlanningDefaults', () => {
  it('uses the built-in defaults for an empty environment', () => {
    expect(getPlanningDefaults({})).toEqual({
      serviceLevel: 0.95,
      reviewPeriodDays: 30,
      horizonMonths: 6,
      includeInTransit: true,
      dataDir: 'data'
    });
  });

  it('reads overrides and clamps the horizon', () => {
    const defaults = getPlanningDefaults({
      PLAN_DEFAULT_SERVICE_LEVEL: '0.99',
      PLAN_DEFAULT_REVIEW_PERIOD_DAYS: '14.8',
      PLAN_DEFAULT_HORIZON_MONTHS: '40',
      PLAN_INCLUDE_IN_TRANSIT: 'FALSE',
      PLAN_DATA_DIR: '/srv/plans'
    });
    expect(defaults).toEqual({
      serviceLevel: 0.99,
      reviewPeriodDays: 14,
      horizonMonths: 24,
      includeInTransit: false,
      dataDir: '/srv/plans'
    });
  });

  it('ignores values it cannot parse', () => {
    const defaults = getPlanningDefaults({
      PLAN_DEFAULT_SERVICE_LEVEL: 'high',
      PLAN_DEFAULT_HORIZON_MONTHS: '0',
      PLAN_INCLUDE_IN_TRANSIT: 'maybe'
    });
    expect(defaults.serviceLevel).toBe(0.95);
    expect(defaults.horizonMonths).toBe(1);
    expect(defaults.includeInTransit).toBe(true);
  });
});
