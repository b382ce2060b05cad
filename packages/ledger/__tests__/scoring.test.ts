import { describe, it, expect } from '@jest/globals';
import {
  calculateCreditScore,
  clampScore,
  DEFAULT_SCORING_CONFIG,
  latePenalty,
  resolveScoringConfig,
} from '../src/scoring';
import { defaultedEvent, lateEvent, onTimeEvent } from './fixtures';

const onTime = (count: number) => Array.from({ length: count }, (_, i) => onTimeEvent(i));

describe('calculateCreditScore', () => {
  it('returns the default score for an empty history', () => {
    expect(calculateCreditScore([])).toBe(70);
  });

  it('adds half a point per on-time payment and floors', () => {
    expect(calculateCreditScore(onTime(1))).toBe(70);
    expect(calculateCreditScore(onTime(5))).toBe(72);
  });

  it('caps the on-time bonus at 30', () => {
    expect(calculateCreditScore([...onTime(70), lateEvent(31)])).toBe(90);
  });

  it.each([
    [1, 68],
    [7, 68],
    [8, 65],
    [30, 65],
    [31, 60],
  ])('penalizes a payment %i days late down to %i', (days, expected) => {
    expect(calculateCreditScore([lateEvent(days)])).toBe(expected);
  });

  it('penalizes defaults by 15 each', () => {
    expect(calculateCreditScore([defaultedEvent(1)])).toBe(55);
    expect(calculateCreditScore([defaultedEvent(1), defaultedEvent(2)])).toBe(40);
  });

  it('clamps to the configured range', () => {
    const defaults = Array.from({ length: 7 }, (_, i) => defaultedEvent(i));
    expect(calculateCreditScore(defaults)).toBe(0);
    expect(calculateCreditScore(onTime(120))).toBe(100);
  });

  it('combines bonuses and penalties', () => {
    // 70 + 10 * 0.5 - 5 - 15 = 55
    expect(calculateCreditScore([...onTime(10), lateEvent(12), defaultedEvent(3)])).toBe(55);
  });

  it('uses the supplied configuration', () => {
    const config = resolveScoringConfig({ defaultScore: 50, defaultedPenalty: 20 });
    expect(calculateCreditScore([], config)).toBe(50);
    expect(calculateCreditScore([defaultedEvent(1), ...onTime(3)], config)).toBe(31);
  });
});

describe('latePenalty', () => {
  it('charges the first tier for zero whole days', () => {
    expect(latePenalty(0)).toBe(2);
  });
});

describe('clampScore', () => {
  it('floors before clamping', () => {
    expect(clampScore(99.9)).toBe(99);
    expect(clampScore(-0.5)).toBe(0);
    expect(clampScore(140)).toBe(100);
  });
});

describe('resolveScoringConfig', () => {
  it('returns the defaults when nothing is overridden', () => {
    expect(resolveScoringConfig()).toEqual(DEFAULT_SCORING_CONFIG);
  });

  it('rejects negative weights', () => {
    expect(() => resolveScoringConfig({ onTimeBonus: -1 })).toThrow('config_invalid_onTimeBonus');
  });

  it('rejects inverted bounds', () => {
    expect(() => resolveScoringConfig({ minScore: 90, maxScore: 10 })).toThrow('config_invalid_score_bounds');
  });

  it('rejects a default outside the bounds', () => {
    expect(() => resolveScoringConfig({ minScore: 80 })).toThrow('config_invalid_default_score');
  });
});
