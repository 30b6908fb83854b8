import {
  EXACT_ROUND_WEIGHT,
  EXACT_WEAK_WEIGHT,
  FRACTIONAL_SECONDS_LIMIT,
  FRACTIONAL_WEIGHT,
  RANGE_BASE_WEIGHT,
  ROUNDING_OFFSETS
} from './constants';
import { perWaveScore } from './formula';
import { EngineConfig, EvidenceOptions, PlausibleRange } from './types';

export type ScoreMatch = 'exact' | 'fractional' | 'none';

export function inPlausibleRange(battle: number, range?: PlausibleRange): boolean {
  if (!range) {
    return false;
  }
  return battle >= range.min && battle <= range.max;
}

export function isRoundScore(score: number): boolean {
  const lastDigit = Math.abs(Math.trunc(score)) % 10;
  return lastDigit === 0 || lastDigit === 5;
}

export function matchScore(
  score: number,
  battle: number,
  bonus: number,
  config: Pick<EngineConfig, 'scalingMultiplier'>
): ScoreMatch {
  const wave = perWaveScore(battle);
  const bonusPoints = bonus * 10;

  for (const divisor of [config.scalingMultiplier, 1.0]) {
    const descaled = Math.round(score / divisor);
    for (const offset of ROUNDING_OFFSETS) {
      const diff = descaled + offset - bonusPoints;
      if (diff >= 0 && diff % wave === 0) {
        return 'exact';
      }
    }
  }

  const elapsed = (score - bonusPoints) / wave;
  if (elapsed > 0 && elapsed < FRACTIONAL_SECONDS_LIMIT) {
    return 'fractional';
  }
  return 'none';
}

export function scoreEvidence(
  battle: number,
  bonus: number,
  bossScores: readonly number[],
  options: EvidenceOptions,
  config: Pick<EngineConfig, 'scalingMultiplier'>
): number {
  let weight = inPlausibleRange(battle, options.plausibleRange) ? RANGE_BASE_WEIGHT : 0;

  for (const score of bossScores) {
    const match = matchScore(score, battle, bonus, config);
    if (match === 'exact') {
      weight += options.exclude || isRoundScore(score) ? EXACT_ROUND_WEIGHT : EXACT_WEAK_WEIGHT;
    } else if (match === 'fractional') {
      weight += FRACTIONAL_WEIGHT;
    }
  }

  return weight;
}

export function qualifiesAsCandidate(weight: number, inRange: boolean): boolean {
  return inRange ? weight > RANGE_BASE_WEIGHT : weight > 0;
}
