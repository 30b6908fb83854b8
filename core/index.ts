export * from './types';
export * from './constants';
export * from './errors';
export { createEngineConfig, getPreset } from './config';
export type { EngineConfigInput } from './config';
export { perWaveScore, maxScore, battleGrid, formatPairLabel } from './formula';
export { scoreEvidence, matchScore, qualifiesAsCandidate } from './evidence';
export { searchCandidates, rankScore } from './search';
export { resolvePlayer, buildWorkingSet } from './resolution';
export { estimatePlayer, estimatePlayers, mergeOverrides } from './engine';
export { normalizeScoreRows, normalizeOverrideRows, partitionResults } from './records';
export type { RawRow, ScoreRowContext } from './records';
export { summarizeGuild, remainingPotential, topBossScorers, compareAcrossDates } from './summary';
