import { describe, expect, it } from 'vitest';
import { addMonths, isMonthKey, monthOf, monthRange } from './months';

describe('months', () => {
  it('validates YYYY-MM keys', () => {
    expect(isMonthKey('2024-01')).toBe(true);
    expect(isMonthKey('2024-13')).toBe(false);
    expect(isMonthKey('2024-1')).toBe(false);
    expect(isMonthKey('2024-00')).toBe(false);
  });

  it('adds months across year boundaries in both directions', () => {
    expect(addMonths('2024-11', 3)).toBe('2025-02');
    expect(addMonths('2024-01', -1)).toBe('2023-12');
    expect(addMonths('2024-06', 0)).toBe('2024-06');
  });

  it('rejects malformed month keys', () => {
    expect(() => addMonths('June', 1)).toThrow('MONTH_KEY_INVALID');
  });

  it('lists consecutive months', () => {
    expect(monthRange('2024-12', 3)).toEqual(['2024-12', '2025-01', '2025-02']);
    expect(monthRange('2024-12', 0)).toEqual([]);
  });

  it('reads the UTC calendar month of a date', () => {
    expect(monthOf(new Date(Date.UTC(2024, 1, 29, 23, 30)))).toBe('2024-02');
  });
});
