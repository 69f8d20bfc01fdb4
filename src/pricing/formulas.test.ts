import { describe, it, expect } from 'vitest';
import { liquidationPrice, marginAt, priceFromMargin, roundPrice } from './formulas';
import { InvalidConfigurationError } from './errors';

describe('priceFromMargin', () => {
  it('inverts the margin formula', () => {
    // 15 / (1 - 0.20) = 18.75
    expect(priceFromMargin(15, 20)).toBeCloseTo(18.75, 10);
    // 15 / (1 - 0.40) = 25
    expect(priceFromMargin(15, 40)).toBeCloseTo(25, 10);
  });

  it('returns the cost itself at 0% margin', () => {
    expect(priceFromMargin(12, 0)).toBe(12);
  });

  it('returns 0 for a zero cost', () => {
    expect(priceFromMargin(0, 30)).toBe(0);
  });

  it('rejects a margin of exactly 100%', () => {
    expect(() => priceFromMargin(10, 100)).toThrow(InvalidConfigurationError);
  });

  it('rejects a margin above 100%', () => {
    expect(() => priceFromMargin(10, 150)).toThrow(InvalidConfigurationError);
  });

  it('rejects a non-finite margin', () => {
    expect(() => priceFromMargin(10, Number.NaN)).toThrow(InvalidConfigurationError);
  });
});

describe('liquidationPrice', () => {
  it('undercuts the competitor when that stays above cost markup', () => {
    // max(10 * 1.05, 22 * 0.95) = max(10.5, 20.9)
    expect(liquidationPrice(10, 22)).toBeCloseTo(20.9, 10);
  });

  it('never drops below cost plus 5%', () => {
    // max(20 * 1.05, 15 * 0.95) = max(21, 14.25)
    expect(liquidationPrice(20, 15)).toBeCloseTo(21, 10);
  });

  it('honours custom markup and undercut factors', () => {
    // max(10 * 1.2, 20 * 0.5) = max(12, 10)
    expect(liquidationPrice(10, 20, 1.2, 0.5)).toBeCloseTo(12, 10);
  });
});

describe('roundPrice', () => {
  it('rounds to 2 decimal places', () => {
    expect(roundPrice(24.499999)).toBe(24.5);
    expect(roundPrice(16.666666)).toBe(16.67);
    expect(roundPrice(21)).toBe(21);
  });

  it('is idempotent', () => {
    for (const value of [0, 0.005, 1.005, 13.333333, 20.9, 27.499999, 1234.5678]) {
      const once = roundPrice(value);
      expect(roundPrice(once)).toBe(once);
    }
  });
});

describe('marginAt', () => {
  it('computes gross margin as a fraction', () => {
    // (22 - 15) / 22
    expect(marginAt(22, 15)).toBeCloseTo(0.318181, 5);
  });

  it('returns 0 when price is 0', () => {
    expect(marginAt(0, 5)).toBe(0);
  });
});
