import { describe, expect, it } from 'vitest';
import { roundHalfEven, roundQuantity, toNumber, toOptionalNumber } from './numbers';

describe('toOptionalNumber', () => {
  it('keeps finite numbers and numeric strings', () => {
    expect(toOptionalNumber(12)).toBe(12);
    expect(toOptionalNumber(' 7.5 ')).toBe(7.5);
  });

  it('treats missing and unusable values as absent', () => {
    expect(toOptionalNumber(undefined)).toBeNull();
    expect(toOptionalNumber(null)).toBeNull();
    expect(toOptionalNumber('')).toBeNull();
    expect(toOptionalNumber('abc')).toBeNull();
    expect(toOptionalNumber(Number.NaN)).toBeNull();
    expect(toOptionalNumber(Number.POSITIVE_INFINITY)).toBeNull();
    expect(toOptionalNumber(true)).toBeNull();
  });
});

describe('toNumber', () => {
  it('maps absent values to zero', () => {
    expect(toNumber(null)).toBe(0);
    expect(toNumber('12.50')).toBe(12.5);
  });
});

describe('roundHalfEven', () => {
  it('sends exact halves to the even neighbour', () => {
    expect(roundHalfEven(2.5)).toBe(2);
    expect(roundHalfEven(3.5)).toBe(4);
    expect(roundHalfEven(0.5)).toBe(0);
  });

  it('rounds other values to the nearest integer', () => {
    expect(roundHalfEven(2.49)).toBe(2);
    expect(roundHalfEven(2.51)).toBe(3);
    expect(roundHalfEven(7)).toBe(7);
  });
});

describe('roundQuantity', () => {
  it('trims floating point noise to six decimals', () => {
    expect(roundQuantity(0.1 + 0.2)).toBe(0.3);
    expect(roundQuantity(1 / 3)).toBe(0.333333);
  });
});
