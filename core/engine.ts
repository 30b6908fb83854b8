import { DEFAULT_ENGINE_CONFIG } from './constants';
import { EngineInputError } from './errors';
import { maxScore, perWaveScore } from './formula';
import { resolvePlayer } from './resolution';
import { searchCandidates } from './search';
import {
  ConfirmedFields,
  ConfirmedHistory,
  ConfirmedOverride,
  EngineConfig,
  EstimateOptions,
  EstimateResult,
  ResolvedPlayerResult,
  ScoreRecord
} from './types';

const CONFIRMED_KEYS = ['battle', 'bonus', 'extraSeconds', 'plausibleRange', 'exclude'] as const;

function assertRecord(record: ScoreRecord, index: number): void {
  if (typeof record.player !== 'string' || record.player.trim().length === 0) {
    throw new EngineInputError('score record has no player', index);
  }
  if (typeof record.date !== 'string') {
    throw new EngineInputError('score record date must be a string', index);
  }
  if (record.category !== 'boss' && record.category !== 'normal') {
    throw new EngineInputError(`unknown category "${String(record.category)}"`, index);
  }
  if (!Number.isInteger(record.score) || record.score < 0) {
    throw new EngineInputError(`score must be a non-negative integer, got ${String(record.score)}`, index);
  }
}

function assertOverride(override: ConfirmedOverride, index: number): void {
  if (typeof override.player !== 'string' || override.player.trim().length === 0) {
    throw new EngineInputError('override has no player', index);
  }
  for (const key of ['battle', 'bonus', 'extraSeconds'] as const) {
    const value = override[key];
    if (value !== undefined && !Number.isFinite(value)) {
      throw new EngineInputError(`override ${key} must be a finite number`, index);
    }
  }
  const range = override.plausibleRange;
  if (range && (!Number.isFinite(range.min) || !Number.isFinite(range.max) || range.min > range.max)) {
    throw new EngineInputError('override plausible range is invalid', index);
  }
}

function applyFields(target: ConfirmedFields, source: ConfirmedOverride): void {
  for (const key of CONFIRMED_KEYS) {
    if (source[key] !== undefined) {
      Object.assign(target, { [key]: source[key] });
    }
  }
}

export function mergeOverrides(overrides: ConfirmedOverride[], player: string, date?: string): ConfirmedFields {
  const merged: ConfirmedFields = {};
  const own = overrides.filter(override => override.player.trim() === player);
  for (const override of own) {
    if (override.date === undefined) {
      applyFields(merged, override);
    }
  }
  if (date !== undefined) {
    for (const override of own) {
      if (override.date === date) {
        applyFields(merged, override);
      }
    }
  }
  return merged;
}

export function confirmedHistory(overrides: ConfirmedOverride[], player: string, date?: string): ConfirmedHistory {
  const history: ConfirmedHistory = { battles: [], bonuses: [] };
  for (const override of overrides) {
    if (override.player.trim() !== player || override.date === undefined || override.date === date) {
      continue;
    }
    if (override.battle !== undefined) {
      history.battles.push(override.battle);
    }
    if (override.bonus !== undefined) {
      history.bonuses.push(override.bonus);
    }
  }
  return history;
}

// history only steers players with nothing confirmed for the estimated date
export function historyFor(confirmed: ConfirmedFields, history: ConfirmedHistory): ConfirmedHistory | undefined {
  return confirmed.battle === undefined && confirmed.bonus === undefined ? history : undefined;
}

export function groupByPlayer(records: ScoreRecord[]): Map<string, ScoreRecord[]> {
  const groups = new Map<string, ScoreRecord[]>();
  for (const record of records) {
    const player = record.player.trim();
    const bucket = groups.get(player) ?? [];
    bucket.push(record);
    groups.set(player, bucket);
  }
  return new Map([...groups.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

export function estimatePlayer(
  player: string,
  records: ScoreRecord[],
  confirmed: ConfirmedFields,
  config: Readonly<EngineConfig> = DEFAULT_ENGINE_CONFIG,
  history?: ConfirmedHistory
): ResolvedPlayerResult {
  const totalScore = records.reduce((sum, record) => sum + record.score, 0);
  const attackCount = records.length;
  const bossScores = records.filter(record => record.category === 'boss').map(record => record.score);

  const candidates = searchCandidates(
    bossScores,
    { exclude: confirmed.exclude ?? false, plausibleRange: confirmed.plausibleRange },
    config,
    history && historyFor(confirmed, history)
  );
  const { parameters, notes } = resolvePlayer({ player, totalScore, bossScores, confirmed, candidates }, config);

  return {
    player,
    attackCount,
    totalScore,
    averageScore: attackCount > 0 ? Math.round(totalScore / attackCount) : 0,
    ...parameters,
    perWaveScore: perWaveScore(parameters.battle),
    maxScore: maxScore(parameters.battle, parameters.bonus, parameters.extraSeconds, config),
    estimable: candidates.length > 0 || confirmed.battle !== undefined || confirmed.bonus !== undefined,
    candidates,
    notes
  };
}

export function estimatePlayers(
  records: ScoreRecord[],
  overrides: ConfirmedOverride[] = [],
  options: EstimateOptions = {},
  config: Readonly<EngineConfig> = DEFAULT_ENGINE_CONFIG
): EstimateResult {
  records.forEach(assertRecord);
  overrides.forEach(assertOverride);

  const scoped = options.date === undefined ? records : records.filter(record => record.date === options.date);
  const results: ResolvedPlayerResult[] = [];
  const notes: string[] = [];

  for (const [player, group] of groupByPlayer(scoped)) {
    const result = estimatePlayer(
      player,
      group,
      mergeOverrides(overrides, player, options.date),
      config,
      confirmedHistory(overrides, player, options.date)
    );
    results.push(result);
    notes.push(...result.notes);
  }

  return { results, notes };
}
