import { z } from 'zod';
import { ConfirmedOverride, EventCategory, Result, ScoreRecord } from './types';

export type RawRow = Record<string, unknown>;

export interface ScoreRowContext {
  category: EventCategory;
  date?: string;
}

const SCORE_ALIASES = {
  player: ['nickname', 'player', '닉네임'],
  date: ['date', '날짜'],
  score: ['score', '점수'],
  subIndex: ['boss_order', 'order']
} as const;

const OVERRIDE_ALIASES = {
  player: ['nickname', 'player', '닉네임'],
  date: ['date', '날짜'],
  bonus: ['add_score', 'confirmed_bonus', '추가점수'],
  extraSeconds: ['add_second', 'confirmed_extra', '추가초', '추가 획득 초'],
  battle: ['battle_score', 'confirmed_battle', '격전지', '격전지점수'],
  rangeMin: ['range_min', 'target_min'],
  rangeMax: ['range_max', 'target_max'],
  exclude: ['exclude', '제외']
} as const;

const TRUTHY = new Set(['1', 'true', 'y', 'yes', 'o']);
const FALSY = new Set(['0', 'false', 'n', 'no', 'x']);

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
}

function toOptionalNumber(value: unknown): unknown {
  if (isBlank(value)) {
    return undefined;
  }
  if (typeof value === 'string') {
    return Number(value.trim().replace(/,/g, ''));
  }
  return value;
}

function toOptionalText(value: unknown): unknown {
  if (isBlank(value)) {
    return undefined;
  }
  return typeof value === 'number' ? String(value) : value;
}

function toOptionalFlag(value: unknown): unknown {
  if (isBlank(value)) {
    return undefined;
  }
  if (typeof value === 'string') {
    const lowered = value.trim().toLowerCase();
    if (TRUTHY.has(lowered)) {
      return true;
    }
    if (FALSY.has(lowered)) {
      return false;
    }
  }
  if (typeof value === 'number') {
    return value !== 0;
  }
  return value;
}

const text = z.string().trim().min(1);

const scoreRowSchema = z.object({
  player: text,
  date: text,
  subIndex: z.string().trim().default(''),
  score: z.number().int().nonnegative()
});

const overrideRowSchema = z
  .object({
    player: text,
    date: text.optional(),
    battle: z.number().finite().optional(),
    bonus: z.number().int().nonnegative().optional(),
    extraSeconds: z.number().int().nonnegative().optional(),
    rangeMin: z.number().finite().optional(),
    rangeMax: z.number().finite().optional(),
    exclude: z.boolean().optional()
  })
  .superRefine((row, ctx) => {
    if ((row.rangeMin === undefined) !== (row.rangeMax === undefined)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['rangeMin'], message: 'range needs both min and max' });
    }
    if (row.rangeMin !== undefined && row.rangeMax !== undefined && row.rangeMin > row.rangeMax) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['rangeMin'], message: 'range min exceeds max' });
    }
  });

function pick(row: RawRow, aliases: readonly string[]): unknown {
  const lowered = new Map<string, unknown>();
  for (const [key, value] of Object.entries(row)) {
    lowered.set(key.trim().toLowerCase(), value);
  }
  for (const alias of aliases) {
    if (lowered.has(alias)) {
      return lowered.get(alias);
    }
  }
  return undefined;
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || 'row'}: ${issue.message}`).join('; ');
}

export function normalizeScoreRow(row: RawRow, context: ScoreRowContext): Result<ScoreRecord> {
  const parsed = scoreRowSchema.safeParse({
    player: toOptionalText(pick(row, SCORE_ALIASES.player)),
    date: toOptionalText(pick(row, SCORE_ALIASES.date)) ?? context.date,
    subIndex: context.category === 'normal' ? 'normal' : toOptionalText(pick(row, SCORE_ALIASES.subIndex)),
    score: toOptionalNumber(pick(row, SCORE_ALIASES.score))
  });
  if (!parsed.success) {
    return { ok: false, error: describeIssues(parsed.error) };
  }
  return { ok: true, value: { ...parsed.data, category: context.category } };
}

export function normalizeScoreRows(rows: RawRow[], context: ScoreRowContext): Result<ScoreRecord>[] {
  return rows.map(row => normalizeScoreRow(row, context));
}

export function normalizeOverrideRow(row: RawRow): Result<ConfirmedOverride> {
  const parsed = overrideRowSchema.safeParse({
    player: toOptionalText(pick(row, OVERRIDE_ALIASES.player)),
    date: toOptionalText(pick(row, OVERRIDE_ALIASES.date)),
    battle: toOptionalNumber(pick(row, OVERRIDE_ALIASES.battle)),
    bonus: toOptionalNumber(pick(row, OVERRIDE_ALIASES.bonus)),
    extraSeconds: toOptionalNumber(pick(row, OVERRIDE_ALIASES.extraSeconds)),
    rangeMin: toOptionalNumber(pick(row, OVERRIDE_ALIASES.rangeMin)),
    rangeMax: toOptionalNumber(pick(row, OVERRIDE_ALIASES.rangeMax)),
    exclude: toOptionalFlag(pick(row, OVERRIDE_ALIASES.exclude))
  });
  if (!parsed.success) {
    return { ok: false, error: describeIssues(parsed.error) };
  }

  const { rangeMin, rangeMax, ...fields } = parsed.data;
  const override: ConfirmedOverride = { player: fields.player };
  if (fields.date !== undefined) {
    override.date = fields.date;
  }
  if (fields.battle !== undefined) {
    override.battle = fields.battle;
  }
  if (fields.bonus !== undefined) {
    override.bonus = fields.bonus;
  }
  if (fields.extraSeconds !== undefined) {
    override.extraSeconds = fields.extraSeconds;
  }
  if (rangeMin !== undefined && rangeMax !== undefined) {
    override.plausibleRange = { min: rangeMin, max: rangeMax };
  }
  if (fields.exclude !== undefined) {
    override.exclude = fields.exclude;
  }
  return { ok: true, value: override };
}

export function normalizeOverrideRows(rows: RawRow[]): Result<ConfirmedOverride>[] {
  return rows.map(normalizeOverrideRow);
}

export function partitionResults<T>(results: Result<T>[]): { values: T[]; errors: string[] } {
  const values: T[] = [];
  const errors: string[] = [];
  results.forEach((result, index) => {
    if (result.ok) {
      values.push(result.value);
    } else {
      errors.push(`row ${index + 1}: ${result.error}`);
    }
  });
  return { values, errors };
}
