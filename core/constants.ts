import { EngineConfig } from './types';

export const BASE_SECONDS = 1200;
export const SCALING_MULTIPLIER = 1.08;
export const BATTLE_MIN = 6.0;
export const BATTLE_MAX = 250.0;
export const BONUS_TIERS = [0, 500, 1000, 1500, 2000, 2500, 3000] as const;
export const EXTRA_SECONDS_OPTIONS = [0, 20, 60, 120] as const;

// Evidence weights. The values are load-bearing: ranking parity depends on them.
export const RANGE_BASE_WEIGHT = 50.0; // operator-declared range outranks numeric fit
export const EXACT_ROUND_WEIGHT = 10.0; // exact wave hit on a score ending in 0 or 5
export const EXACT_WEAK_WEIGHT = 2.0; // exact wave hit on any other score
export const FRACTIONAL_WEIGHT = 1.0; // partial-time observation
export const ZERO_BONUS_PREFERENCE = 0.5;
export const DISTANCE_PENALTY_WEIGHT = 0.1;

export const ROUNDING_OFFSETS = [-1, 0, 1] as const;
export const FRACTIONAL_SECONDS_LIMIT = 1500;

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = Object.freeze({
  baseSeconds: BASE_SECONDS,
  scalingMultiplier: SCALING_MULTIPLIER,
  battleMin: BATTLE_MIN,
  battleMax: BATTLE_MAX,
  battleStep: 0.5,
  refinedBattleStep: 0.1,
  bonusTiers: Object.freeze([...BONUS_TIERS]),
  extraSecondsOptions: Object.freeze([...EXTRA_SECONDS_OPTIONS]),
  typicalBattle: 120,
  neutralBattle: 120,
  candidateLimit: 20,
  escalationCeiling: 500,
  preferZeroBonus: true
});

/**
 * @deprecated Earlier tier set without the 2000 tier and without the zero-bonus
 * preference. Kept so old result tables can be reproduced.
 */
export const LEGACY_TIERS_CONFIG: Readonly<EngineConfig> = Object.freeze({
  ...DEFAULT_ENGINE_CONFIG,
  bonusTiers: Object.freeze([0, 500, 1000, 1500, 2500, 3000]),
  preferZeroBonus: false
});

export const ENGINE_PRESETS = {
  canonical: DEFAULT_ENGINE_CONFIG,
  legacyTiers: LEGACY_TIERS_CONFIG
} as const;

export type EnginePresetName = keyof typeof ENGINE_PRESETS;
