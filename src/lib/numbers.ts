/**
 * Converts common numeric-like inputs into a number.
 *
 * - number => itself (NaN => 0)
 * - string => parseFloat (NaN => 0)
 * - null/undefined => 0
 * - other => Number(value) (NaN => 0)
 */
export function toNumber(value: unknown): number {
  const parsed = toOptionalNumber(value);
  return parsed === null ? 0 : parsed;
}

/**
 * Like `toNumber`, but keeps "absent" distinct from zero: missing, empty,
 * NaN and infinite inputs all come back as null.
 */
export function toOptionalNumber(value: unknown): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string') {
    if (value.trim() === '') return null;
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  if (typeof value === 'boolean') {
    return null;
  }
  const num = Number(value);
  return Number.isFinite(num) ? num : null;
}

/**
 * Rounds to the nearest integer, sending exact halves to the even neighbour
 * (2.5 => 2, 3.5 => 4).
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Rounds to 6 decimal places (inventory quantity precision).
 */
export function roundQuantity(value: number): number {
  return parseFloat(value.toFixed(6));
}
