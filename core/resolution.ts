import { activeBattleStep, formatPairLabel, maxScore, snapBattle } from './formula';
import {
  CandidatePair,
  ConfirmedFields,
  EngineConfig,
  ResolutionInput,
  ResolutionOutcome,
  ResolutionSource
} from './types';

export interface WorkingPair {
  battle: number;
  bonus: number;
}

export interface WorkingSet {
  pairs: WorkingPair[];
  synthetic: boolean;
  conflicting: boolean;
}

function matchesConfirmed(candidate: CandidatePair, confirmed: ConfirmedFields): boolean {
  if (confirmed.battle !== undefined && snapBattle(candidate.battle) !== snapBattle(confirmed.battle)) {
    return false;
  }
  if (confirmed.bonus !== undefined && candidate.bonus !== confirmed.bonus) {
    return false;
  }
  return true;
}

export function buildWorkingSet(
  confirmed: ConfirmedFields,
  candidates: CandidatePair[],
  config: Pick<EngineConfig, 'neutralBattle'>
): WorkingSet {
  if (confirmed.battle !== undefined && confirmed.bonus !== undefined) {
    return { pairs: [{ battle: confirmed.battle, bonus: confirmed.bonus }], synthetic: false, conflicting: false };
  }

  const filtered = candidates
    .filter(candidate => matchesConfirmed(candidate, confirmed))
    .map(({ battle, bonus }) => ({ battle, bonus }));
  if (filtered.length > 0) {
    return { pairs: filtered, synthetic: false, conflicting: false };
  }

  const hasConfirmedPair = confirmed.battle !== undefined || confirmed.bonus !== undefined;
  return {
    pairs: [{ battle: confirmed.battle ?? config.neutralBattle, bonus: confirmed.bonus ?? 0 }],
    synthetic: true,
    conflicting: hasConfirmedPair && candidates.length > 0
  };
}

function describeSource(confirmed: ConfirmedFields, working: WorkingSet): ResolutionSource {
  if (confirmed.battle !== undefined && confirmed.bonus !== undefined) {
    return 'confirmed';
  }
  if (working.synthetic && confirmed.battle === undefined && confirmed.bonus === undefined) {
    return 'neutral';
  }
  return 'inferred';
}

export function resolvePlayer(input: ResolutionInput, config: Readonly<EngineConfig>): ResolutionOutcome {
  const { player, totalScore, confirmed, candidates } = input;
  const notes: string[] = [];
  const working = buildWorkingSet(confirmed, candidates, config);
  const source = describeSource(confirmed, working);

  if (working.conflicting) {
    notes.push(`${player}: confirmed values match none of ${candidates.length} candidates; confirmed values kept`);
  }
  if (source === 'neutral' && input.bossScores.length === 0) {
    notes.push(`${player}: no boss records, using neutral defaults`);
  }

  const extras = confirmed.extraSeconds !== undefined ? [confirmed.extraSeconds] : config.extraSecondsOptions;
  for (const extraSeconds of extras) {
    for (const pair of working.pairs) {
      if (maxScore(pair.battle, pair.bonus, extraSeconds, config) >= totalScore) {
        return {
          parameters: { ...pair, extraSeconds, source, escalated: false, feasible: true },
          notes
        };
      }
    }
  }

  const best = working.pairs[0];
  const extraSeconds = confirmed.extraSeconds ?? 0;

  if (confirmed.battle !== undefined) {
    notes.push(
      `${player}: total ${totalScore} exceeds every ceiling for confirmed battle ${formatPairLabel(best.battle, best.bonus)}`
    );
    return {
      parameters: { ...best, extraSeconds, source, escalated: false, feasible: false },
      notes
    };
  }

  const step = activeBattleStep(confirmed.exclude ?? false, config);
  let battle = best.battle;
  while (maxScore(battle, best.bonus, extraSeconds, config) < totalScore && battle < config.escalationCeiling) {
    battle = Math.min(config.escalationCeiling, snapBattle(battle + step));
  }
  const feasible = maxScore(battle, best.bonus, extraSeconds, config) >= totalScore;
  notes.push(
    `${player}: escalated battle ${best.battle} -> ${battle} to cover total ${totalScore}` +
      (feasible ? '' : ' (ceiling reached)')
  );

  return {
    parameters: { battle, bonus: best.bonus, extraSeconds, source: 'escalated', escalated: true, feasible },
    notes
  };
}
