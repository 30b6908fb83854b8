import { DISTANCE_PENALTY_WEIGHT, ZERO_BONUS_PREFERENCE } from './constants';
import { inPlausibleRange, qualifiesAsCandidate, scoreEvidence } from './evidence';
import { activeBattleStep, battleGrid } from './formula';
import { CandidatePair, ConfirmedHistory, EngineConfig, EvidenceOptions } from './types';

export function rankScore(
  battle: number,
  bonus: number,
  weight: number,
  config: Pick<EngineConfig, 'typicalBattle' | 'preferZeroBonus'>
): number {
  const zeroBonus = config.preferZeroBonus && bonus === 0 ? ZERO_BONUS_PREFERENCE : 0;
  return weight + zeroBonus - DISTANCE_PENALTY_WEIGHT * Math.abs(battle - config.typicalBattle);
}

export function compareCandidates(
  a: CandidatePair,
  b: CandidatePair,
  config: Pick<EngineConfig, 'typicalBattle'>
): number {
  if (a.rankScore !== b.rankScore) {
    return b.rankScore - a.rankScore;
  }
  return Math.abs(a.battle - config.typicalBattle) - Math.abs(b.battle - config.typicalBattle);
}

export function dedupeCandidates(candidates: CandidatePair[]): CandidatePair[] {
  const seen = new Set<string>();
  const unique: CandidatePair[] = [];
  for (const candidate of candidates) {
    const key = `${candidate.battle}|${candidate.bonus}`;
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    unique.push(candidate);
  }
  return unique;
}

function nearestGap(value: number, targets: readonly number[]): number {
  if (targets.length === 0) {
    return 0;
  }
  return Math.min(...targets.map(target => Math.abs(value - target)));
}

export function historyDistance(candidate: CandidatePair, history: ConfirmedHistory): number {
  return nearestGap(candidate.battle, history.battles) + nearestGap(candidate.bonus, history.bonuses) / 1000;
}

export function rerankByHistory(candidates: CandidatePair[], history: ConfirmedHistory): CandidatePair[] {
  if (history.battles.length === 0 && history.bonuses.length === 0) {
    return candidates;
  }
  return [...candidates].sort(
    (a, b) => historyDistance(a, history) - historyDistance(b, history) || b.battle - a.battle
  );
}

export function searchCandidates(
  bossScores: readonly number[],
  options: EvidenceOptions,
  config: Readonly<EngineConfig>,
  history?: ConfirmedHistory
): CandidatePair[] {
  if (bossScores.length === 0) {
    return [];
  }

  const step = activeBattleStep(options.exclude, config);
  const scored: CandidatePair[] = [];

  for (const battle of battleGrid(step, config)) {
    const inRange = inPlausibleRange(battle, options.plausibleRange);
    for (const bonus of config.bonusTiers) {
      const weight = scoreEvidence(battle, bonus, bossScores, options, config);
      if (!qualifiesAsCandidate(weight, inRange)) {
        continue;
      }
      scored.push({ battle, bonus, weight, rankScore: rankScore(battle, bonus, weight, config) });
    }
  }

  // Array.prototype.sort is stable, so full ties keep grid order
  scored.sort((a, b) => compareCandidates(a, b, config));
  const ranked = history ? rerankByHistory(scored, history) : scored;
  return dedupeCandidates(ranked).slice(0, config.candidateLimit);
}
