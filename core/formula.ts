import { EngineConfig } from './types';

const BATTLE_PRECISION = 1000;

export function snapBattle(battle: number): number {
  return Math.round(battle * BATTLE_PRECISION) / BATTLE_PRECISION;
}

export function perWaveScore(battle: number): number {
  return 1000 + Math.round(battle * 10 * BATTLE_PRECISION) / BATTLE_PRECISION;
}

export function maxScore(
  battle: number,
  bonus: number,
  extraSeconds: number,
  config: Pick<EngineConfig, 'baseSeconds' | 'scalingMultiplier'>
): number {
  const seconds = config.baseSeconds + extraSeconds;
  return Math.trunc((seconds * perWaveScore(battle) + bonus * 10) * config.scalingMultiplier);
}

export function activeBattleStep(exclude: boolean, config: Pick<EngineConfig, 'battleStep' | 'refinedBattleStep'>): number {
  return exclude ? config.refinedBattleStep : config.battleStep;
}

export function battleGrid(step: number, config: Pick<EngineConfig, 'battleMin' | 'battleMax'>): number[] {
  // walk in tenths so 0.1 steps never drift
  const start = Math.round(config.battleMin * 10);
  const end = Math.round(config.battleMax * 10);
  const stride = Math.max(1, Math.round(step * 10));
  const grid: number[] = [];
  for (let tenths = start; tenths <= end; tenths += stride) {
    grid.push(tenths / 10);
  }
  return grid;
}

export function formatBattle(battle: number): string {
  return Number.isInteger(battle) ? String(battle) : String(snapBattle(battle));
}

export function formatPairLabel(battle: number, bonus: number): string {
  return `${formatBattle(battle)}/${bonus}`;
}
