const MONTH_PATTERN = /^(\d{4})-(\d{2})$/;

export type MonthKey = string;

export function isMonthKey(value: string): boolean {
  const match = MONTH_PATTERN.exec(value);
  if (!match) return false;
  const month = Number(match[2]);
  return month >= 1 && month <= 12;
}

function parseMonthKey(value: MonthKey): { year: number; month: number } {
  const match = MONTH_PATTERN.exec(value);
  if (!match || !isMonthKey(value)) {
    throw new Error('MONTH_KEY_INVALID');
  }
  return { year: Number(match[1]), month: Number(match[2]) };
}

function formatMonthKey(year: number, month: number): MonthKey {
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}`;
}

/** Calendar arithmetic on "YYYY-MM" keys; `offset` may be negative. */
export function addMonths(start: MonthKey, offset: number): MonthKey {
  const { year, month } = parseMonthKey(start);
  const index = year * 12 + (month - 1) + offset;
  return formatMonthKey(Math.floor(index / 12), (index % 12) + 1);
}

export function monthRange(start: MonthKey, count: number): MonthKey[] {
  const months: MonthKey[] = [];
  for (let i = 0; i < count; i += 1) {
    months.push(addMonths(start, i));
  }
  return months;
}

export function monthOf(date: Date): MonthKey {
  return formatMonthKey(date.getUTCFullYear(), date.getUTCMonth() + 1);
}
