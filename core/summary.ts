import { DEFAULT_ENGINE_CONFIG } from './constants';
import { confirmedHistory, groupByPlayer, historyFor, mergeOverrides } from './engine';
import { formatPairLabel } from './formula';
import { searchCandidates } from './search';
import {
  ConfirmedOverride,
  DateComparisonRow,
  EngineConfig,
  GuildSummary,
  PlayerTotal,
  RemainingPotential,
  ResolvedPlayerResult,
  ScoreRecord
} from './types';

export const DEFAULT_TOP_LIMIT = 15;
export const COMPARISON_PAIR_COUNT = 2;
export const UNRESOLVED_LABEL = 'unresolved';

function isIncluded(result: ResolvedPlayerResult): boolean {
  return result.source !== 'neutral' && result.estimable;
}

export function summarizeGuild(results: ResolvedPlayerResult[]): GuildSummary {
  const included = results.filter(isIncluded);
  const excluded = results.filter(result => !isIncluded(result));
  const includedTotal = included.reduce((sum, result) => sum + result.totalScore, 0);
  const excludedTotal = excluded.reduce((sum, result) => sum + result.totalScore, 0);
  const estimatedMax = included.reduce((sum, result) => sum + result.maxScore, 0);

  return {
    guildTotal: includedTotal + excludedTotal,
    estimatedMax,
    remaining: Math.max(0, estimatedMax - includedTotal),
    includedPlayers: included.map(result => result.player),
    excludedPlayers: excluded.map(result => result.player),
    includedTotal,
    excludedTotal
  };
}

// attacks that scored past the bonus each spent `battle` seconds of the timer
export function remainingAttacks(
  result: ResolvedPlayerResult,
  scores: readonly number[],
  config: Pick<EngineConfig, 'baseSeconds'> = DEFAULT_ENGINE_CONFIG
): number {
  const spent = scores.filter(score => score > result.bonus * 10).length * result.battle;
  const left = Math.max(0, config.baseSeconds + result.extraSeconds - spent);
  return Math.floor(left / result.battle);
}

export function remainingPotential(
  results: ResolvedPlayerResult[],
  records: ScoreRecord[] = [],
  config: Pick<EngineConfig, 'scalingMultiplier' | 'baseSeconds'> = DEFAULT_ENGINE_CONFIG
): RemainingPotential[] {
  const scoresByPlayer = groupByPlayer(records);
  return results
    .filter(isIncluded)
    .map(result => {
      const remainingScore = Math.max(0, result.maxScore - result.totalScore);
      const scores = (scoresByPlayer.get(result.player) ?? []).map(record => record.score);
      return {
        player: result.player,
        battle: result.battle,
        perWaveScore: result.perWaveScore,
        bonus: result.bonus,
        extraSeconds: result.extraSeconds,
        remainingScore,
        remainingSeconds: Math.round(remainingScore / (result.perWaveScore * config.scalingMultiplier)),
        remainingAttacks: remainingAttacks(result, scores, config)
      };
    })
    .sort((a, b) => b.remainingScore - a.remainingScore);
}

export function topBossScorers(records: ScoreRecord[], limit = DEFAULT_TOP_LIMIT): PlayerTotal[] {
  const totals: PlayerTotal[] = [];
  for (const [player, group] of groupByPlayer(records.filter(record => record.category === 'boss'))) {
    totals.push({ player, total: group.reduce((sum, record) => sum + record.score, 0) });
  }
  // groups arrive sorted by player, so equal totals stay alphabetical
  return totals.sort((a, b) => b.total - a.total).slice(0, limit);
}

export function compareAcrossDates(
  records: ScoreRecord[],
  overrides: ConfirmedOverride[] = [],
  config: Readonly<EngineConfig> = DEFAULT_ENGINE_CONFIG
): DateComparisonRow[] {
  const dates = Array.from(new Set(records.map(record => record.date))).sort();
  const rows: DateComparisonRow[] = [];

  for (const [player, group] of groupByPlayer(records)) {
    const byDate: Record<string, string | null> = {};
    for (const date of dates) {
      const sameDay = group.filter(record => record.date === date);
      if (sameDay.length === 0) {
        byDate[date] = null;
        continue;
      }
      const confirmed = mergeOverrides(overrides, player, date);
      if (confirmed.battle !== undefined) {
        byDate[date] = formatPairLabel(confirmed.battle, confirmed.bonus ?? 0);
        continue;
      }
      const candidates = searchCandidates(
        sameDay.filter(record => record.category === 'boss').map(record => record.score),
        { exclude: confirmed.exclude ?? false, plausibleRange: confirmed.plausibleRange },
        config,
        historyFor(confirmed, confirmedHistory(overrides, player, date))
      );
      byDate[date] =
        candidates.length > 0
          ? candidates
              .slice(0, COMPARISON_PAIR_COUNT)
              .map(candidate => formatPairLabel(candidate.battle, candidate.bonus))
              .join(', ')
          : UNRESOLVED_LABEL;
    }
    rows.push({ player, byDate });
  }

  return rows;
}
