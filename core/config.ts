import { z } from 'zod';
import { DEFAULT_ENGINE_CONFIG, ENGINE_PRESETS, EnginePresetName } from './constants';
import { ConfigError } from './errors';
import { EngineConfig } from './types';

const nonNegativeInt = z.number().int().nonnegative();

// the battle grid walks in integer tenths
function isWholeTenths(value: number): boolean {
  return Number.isInteger(Math.round(value * 10 * 1e6) / 1e6);
}

const engineConfigSchema = z
  .object({
    baseSeconds: z.number().int().positive(),
    scalingMultiplier: z.number().positive(),
    battleMin: z.number().positive(),
    battleMax: z.number().positive(),
    battleStep: z.number().positive(),
    refinedBattleStep: z.number().positive(),
    bonusTiers: z.array(nonNegativeInt).min(1),
    extraSecondsOptions: z.array(nonNegativeInt).min(1),
    typicalBattle: z.number().positive(),
    neutralBattle: z.number().positive(),
    candidateLimit: z.number().int().positive(),
    escalationCeiling: z.number().positive(),
    preferZeroBonus: z.boolean()
  })
  .superRefine((config, ctx) => {
    for (const key of ['battleMin', 'battleMax', 'battleStep', 'refinedBattleStep'] as const) {
      if (!isWholeTenths(config[key])) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: 'must be a multiple of 0.1' });
      }
    }
    if (config.battleMin > config.battleMax) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['battleMin'], message: 'must not exceed battleMax' });
    }
    if (config.escalationCeiling < config.battleMax) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['escalationCeiling'],
        message: 'must be at least battleMax'
      });
    }
  });

export type EngineConfigInput = Partial<Omit<EngineConfig, 'bonusTiers' | 'extraSecondsOptions'>> & {
  bonusTiers?: number[];
  extraSecondsOptions?: number[];
};

function sortedUnique(values: readonly number[]): number[] {
  return Array.from(new Set(values)).sort((a, b) => a - b);
}

export function createEngineConfig(
  overrides: EngineConfigInput = {},
  base: Readonly<EngineConfig> = DEFAULT_ENGINE_CONFIG
): Readonly<EngineConfig> {
  const parsed = engineConfigSchema.safeParse({
    ...base,
    bonusTiers: [...base.bonusTiers],
    extraSecondsOptions: [...base.extraSecondsOptions],
    ...overrides
  });
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
  }

  return Object.freeze({
    ...parsed.data,
    bonusTiers: Object.freeze(sortedUnique(parsed.data.bonusTiers)),
    extraSecondsOptions: Object.freeze(sortedUnique(parsed.data.extraSecondsOptions))
  });
}

export function getPreset(name: EnginePresetName): Readonly<EngineConfig> {
  return ENGINE_PRESETS[name];
}
