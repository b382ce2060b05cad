import { describe, it, expect } from '@jest/globals';
import { canonicalAmount, compareAmounts, isPositiveAmount } from '../src/amount';

describe('canonicalAmount', () => {
  it('strips trailing fractional zeros', () => {
    expect(canonicalAmount('100.00')).toBe('100');
    expect(canonicalAmount('150.50')).toBe('150.5');
  });

  it('strips leading integer zeros but keeps a single zero', () => {
    expect(canonicalAmount(' 0100.50 ')).toBe('100.5');
    expect(canonicalAmount('0.25')).toBe('0.25');
    expect(canonicalAmount('0.00')).toBe('0');
  });

  it('accepts numbers', () => {
    expect(canonicalAmount(100)).toBe('100');
    expect(canonicalAmount(0.1)).toBe('0.1');
  });

  it('rejects anything that is not a plain decimal', () => {
    expect(canonicalAmount('-5')).toBeNull();
    expect(canonicalAmount('1e3')).toBeNull();
    expect(canonicalAmount('')).toBeNull();
    expect(canonicalAmount('12.')).toBeNull();
    expect(canonicalAmount('abc')).toBeNull();
    expect(canonicalAmount(Number.NaN)).toBeNull();
    expect(canonicalAmount(Number.POSITIVE_INFINITY)).toBeNull();
  });
});

describe('isPositiveAmount', () => {
  it('is false only for zero', () => {
    expect(isPositiveAmount('0')).toBe(false);
    expect(isPositiveAmount('0.01')).toBe(true);
    expect(isPositiveAmount('10')).toBe(true);
  });
});

describe('compareAmounts', () => {
  it('orders by integer part length first', () => {
    expect(compareAmounts('9', '10')).toBe(-1);
    expect(compareAmounts('100', '99.99')).toBe(1);
  });

  it('compares fractions digit by digit', () => {
    expect(compareAmounts('2.05', '2.5')).toBe(-1);
    expect(compareAmounts('1.5', '1.50')).toBe(0);
    expect(compareAmounts('3', '3')).toBe(0);
  });
});
