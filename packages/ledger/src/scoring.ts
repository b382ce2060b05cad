/**
 * Credit scoring engine
 *
 * Pure function from an agent's payer-role events to a bounded integer score:
 *
 * - start from the default score (70)
 * - late 1-7 days: -2, 8-30 days: -5, over 30 days: -10
 * - defaulted: -15 each
 * - on-time: +0.5 each, capped at +30 in total
 * - floor, then clamp to [min, max]
 *
 * No history means the default score, not zero.
 */

import type { PaymentEvent } from './types';

export interface ScoringConfig {
  defaultScore: number;
  minScore: number;
  maxScore: number;
  onTimeBonus: number;
  maxOnTimeBonus: number;
  latePenalty1To7Days: number;
  latePenalty8To30Days: number;
  latePenaltyOver30Days: number;
  defaultedPenalty: number;
}

export const DEFAULT_SCORING_CONFIG: Readonly<ScoringConfig> = Object.freeze({
  defaultScore: 70,
  minScore: 0,
  maxScore: 100,
  onTimeBonus: 0.5,
  maxOnTimeBonus: 30,
  latePenalty1To7Days: 2,
  latePenalty8To30Days: 5,
  latePenaltyOver30Days: 10,
  defaultedPenalty: 15,
});

const SCORING_KEYS = [
  'defaultScore',
  'minScore',
  'maxScore',
  'onTimeBonus',
  'maxOnTimeBonus',
  'latePenalty1To7Days',
  'latePenalty8To30Days',
  'latePenaltyOver30Days',
  'defaultedPenalty',
] as const satisfies readonly (keyof ScoringConfig)[];

/**
 * Merge overrides onto the defaults and reject inconsistent bounds.
 */
export function resolveScoringConfig(overrides: Partial<ScoringConfig> = {}): ScoringConfig {
  const config: ScoringConfig = { ...DEFAULT_SCORING_CONFIG };
  for (const key of SCORING_KEYS) {
    const value = overrides[key];
    if (value !== undefined) {
      config[key] = value;
    }
  }

  for (const key of SCORING_KEYS) {
    if (!Number.isFinite(config[key]) || config[key] < 0) {
      throw new Error(`config_invalid_${key}`);
    }
  }
  if (!Number.isInteger(config.minScore) || !Number.isInteger(config.maxScore)) {
    throw new Error('config_invalid_score_bounds');
  }
  if (config.minScore > config.maxScore) {
    throw new Error('config_invalid_score_bounds');
  }
  if (
    !Number.isInteger(config.defaultScore) ||
    config.defaultScore < config.minScore ||
    config.defaultScore > config.maxScore
  ) {
    throw new Error('config_invalid_default_score');
  }
  return config;
}

/**
 * Tiered penalty for a late payment: <=7 days, <=30 days, >30 days.
 */
export function latePenalty(daysOverdue: number, config: ScoringConfig = DEFAULT_SCORING_CONFIG): number {
  if (daysOverdue <= 7) return config.latePenalty1To7Days;
  if (daysOverdue <= 30) return config.latePenalty8To30Days;
  return config.latePenaltyOver30Days;
}

export function clampScore(raw: number, config: ScoringConfig = DEFAULT_SCORING_CONFIG): number {
  return Math.max(config.minScore, Math.min(config.maxScore, Math.floor(raw)));
}

export function calculateCreditScore(
  events: readonly PaymentEvent[],
  config: ScoringConfig = DEFAULT_SCORING_CONFIG,
): number {
  if (events.length === 0) {
    return config.defaultScore;
  }

  let score = config.defaultScore;
  let onTimeCount = 0;

  for (const event of events) {
    switch (event.status) {
      case 'on_time':
        onTimeCount++;
        break;
      case 'late':
        score -= latePenalty(event.days_overdue, config);
        break;
      case 'defaulted':
        score -= config.defaultedPenalty;
        break;
      default: {
        const unreachable: never = event;
        throw new Error(`Unhandled payment status: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  score += Math.min(onTimeCount * config.onTimeBonus, config.maxOnTimeBonus);
  return clampScore(score, config);
}
