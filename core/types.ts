export type EventCategory = 'boss' | 'normal';

export interface ScoreRecord {
  player: string;
  date: string;
  category: EventCategory;
  subIndex: string; // boss order or 'normal'
  score: number;
}

export interface PlausibleRange {
  min: number;
  max: number;
}

export interface ConfirmedOverride {
  player: string;
  date?: string; // absent = applies to every date
  battle?: number;
  bonus?: number;
  extraSeconds?: number;
  plausibleRange?: PlausibleRange;
  exclude?: boolean;
}

export type ConfirmedFields = Omit<ConfirmedOverride, 'player' | 'date'>;

export interface CandidatePair {
  battle: number;
  bonus: number;
  weight: number;
  rankScore: number;
}

// confirmed battle and bonus values a player has on other dates
export interface ConfirmedHistory {
  battles: number[];
  bonuses: number[];
}

export interface EvidenceOptions {
  exclude: boolean;
  plausibleRange?: PlausibleRange;
}

export interface EngineConfig {
  baseSeconds: number;
  scalingMultiplier: number;
  battleMin: number;
  battleMax: number;
  battleStep: number;
  refinedBattleStep: number;
  bonusTiers: readonly number[];
  extraSecondsOptions: readonly number[];
  typicalBattle: number;
  neutralBattle: number;
  candidateLimit: number;
  escalationCeiling: number;
  preferZeroBonus: boolean;
}

export type ResolutionSource = 'confirmed' | 'inferred' | 'escalated' | 'neutral';

export interface ResolvedParameters {
  battle: number;
  bonus: number;
  extraSeconds: number;
  source: ResolutionSource;
  escalated: boolean;
  feasible: boolean;
}

export interface ResolutionInput {
  player: string;
  totalScore: number;
  bossScores: number[];
  confirmed: ConfirmedFields;
  candidates: CandidatePair[];
}

export interface ResolutionOutcome {
  parameters: ResolvedParameters;
  notes: string[];
}

export interface ResolvedPlayerResult extends ResolvedParameters {
  player: string;
  attackCount: number;
  totalScore: number;
  averageScore: number;
  perWaveScore: number;
  maxScore: number;
  estimable: boolean; // backed by boss evidence or a confirmed battle/bonus
  candidates: CandidatePair[];
  notes: string[];
}

export interface EstimateOptions {
  date?: string;
}

export interface EstimateResult {
  results: ResolvedPlayerResult[];
  notes: string[];
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: string };

export interface GuildSummary {
  guildTotal: number;
  estimatedMax: number;
  remaining: number;
  includedPlayers: string[];
  excludedPlayers: string[];
  includedTotal: number;
  excludedTotal: number;
}

export interface RemainingPotential {
  player: string;
  battle: number;
  perWaveScore: number;
  bonus: number;
  extraSeconds: number;
  remainingScore: number;
  remainingSeconds: number;
  remainingAttacks: number;
}

export interface PlayerTotal {
  player: string;
  total: number;
}

export interface DateComparisonRow {
  player: string;
  byDate: Record<string, string | null>;
}
