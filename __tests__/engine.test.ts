import { confirmedHistory, estimatePlayers, groupByPlayer, mergeOverrides } from '../core/engine';
import { EngineInputError } from '../core/errors';
import { maxScore } from '../core/formula';
import { DEFAULT_ENGINE_CONFIG } from '../core/constants';
import { ConfirmedOverride, ScoreRecord } from '../core/types';

function boss(player: string, score: number, date = '20240105', subIndex = '1'): ScoreRecord {
  return { player, date, category: 'boss', subIndex, score };
}

function normal(player: string, score: number, date = '20240105'): ScoreRecord {
  return { player, date, category: 'normal', subIndex: 'normal', score };
}

const records: ScoreRecord[] = [
  boss('alice', 170640, '20240105', '1'),
  boss('alice', 86400, '20240105', '2'),
  boss('alice', 43200, '20240105', '3'),
  normal('alice', 5000),
  boss(' bob ', 158000),
  normal('carol', 7000),
  boss('alice', 216000, '20240106', '1')
];

describe('estimatePlayers', () => {
  it('returns an empty result for zero records', () => {
    expect(estimatePlayers([])).toEqual({ results: [], notes: [] });
  });

  it('aggregates per trimmed player and resolves each independently', () => {
    const { results, notes } = estimatePlayers(records, [], { date: '20240105' });
    expect(results.map(result => result.player)).toEqual(['alice', 'bob', 'carol']);

    const [alice, bob, carol] = results;
    expect(alice).toMatchObject({
      attackCount: 4,
      totalScore: 305240,
      averageScore: 76310,
      battle: 116,
      bonus: 0,
      extraSeconds: 0,
      perWaveScore: 2160,
      maxScore: 2799360,
      source: 'inferred'
    });
    expect(alice.candidates).toHaveLength(20);
    expect(bob).toMatchObject({ totalScore: 158000, battle: 100, bonus: 0, maxScore: 2592000 });
    expect(carol).toMatchObject({
      attackCount: 1,
      totalScore: 7000,
      battle: 120,
      bonus: 0,
      extraSeconds: 0,
      source: 'neutral',
      candidates: []
    });
    expect(notes).toEqual(['carol: no boss records, using neutral defaults']);
  });

  it('keeps every result at or above its observed total', () => {
    const { results } = estimatePlayers(records);
    for (const result of results) {
      expect(result.maxScore).toBeGreaterThanOrEqual(result.totalScore);
      expect(result.maxScore).toBe(maxScore(result.battle, result.bonus, result.extraSeconds, DEFAULT_ENGINE_CONFIG));
    }
  });

  it('never replaces a confirmed battle', () => {
    const overrides: ConfirmedOverride[] = [{ player: 'alice', battle: 100 }];
    const { results } = estimatePlayers(records, overrides, { date: '20240105' });
    expect(results[0]).toMatchObject({ player: 'alice', battle: 100, bonus: 0, maxScore: 2592000 });
  });

  it('applies date-scoped overrides only to their date', () => {
    const overrides: ConfirmedOverride[] = [{ player: 'alice', date: '20240106', bonus: 3000 }];

    const sixth = estimatePlayers(records, overrides, { date: '20240106' });
    expect(sixth.results).toHaveLength(1);
    expect(sixth.results[0]).toMatchObject({ totalScore: 216000, battle: 120, bonus: 3000, maxScore: 2883600 });

    expect(mergeOverrides(overrides, 'alice', '20240105')).toEqual({});
  });

  it('steers an unconfirmed date toward values confirmed on other dates', () => {
    const overrides: ConfirmedOverride[] = [{ player: 'alice', date: '20240105', battle: 100 }];

    const plain = estimatePlayers(records, [], { date: '20240106' });
    expect(plain.results[0]).toMatchObject({ battle: 116, bonus: 0 });

    const steered = estimatePlayers(records, overrides, { date: '20240106' });
    expect(steered.results[0]).toMatchObject({ battle: 100, bonus: 0, source: 'inferred', maxScore: 2592000 });
  });

  it('marks players without evidence or confirmed values as not estimable', () => {
    const { results } = estimatePlayers(records, [{ player: 'carol', bonus: 500 }], { date: '20240105' });
    expect(results.map(result => result.estimable)).toEqual([true, true, true]);
    expect(estimatePlayers(records, [], { date: '20240105' }).results[2].estimable).toBe(false);
  });

  it('rejects records it cannot interpret', () => {
    expect(() => estimatePlayers([boss('alice', -5)])).toThrow(EngineInputError);
    expect(() => estimatePlayers([boss('alice', 10.5)])).toThrow('score must be a non-negative integer, got 10.5 (record #0)');
    expect(() => estimatePlayers([boss('', 10)])).toThrow('score record has no player (record #0)');
  });

  it('rejects overrides with an inverted range', () => {
    const overrides: ConfirmedOverride[] = [{ player: 'alice', plausibleRange: { min: 80, max: 60 } }];
    expect(() => estimatePlayers(records, overrides)).toThrow(EngineInputError);
  });
});

describe('mergeOverrides', () => {
  const overrides: ConfirmedOverride[] = [
    { player: 'alice', battle: 90, bonus: 0 },
    { player: 'alice', date: '20240105', bonus: 500, extraSeconds: 0 },
    { player: 'bob', battle: 70 }
  ];

  it('layers date-specific fields over global ones', () => {
    expect(mergeOverrides(overrides, 'alice', '20240105')).toEqual({ battle: 90, bonus: 500, extraSeconds: 0 });
  });

  it('uses only global overrides without a date', () => {
    expect(mergeOverrides(overrides, 'alice')).toEqual({ battle: 90, bonus: 0 });
    expect(mergeOverrides(overrides, 'carol')).toEqual({});
  });
});

describe('confirmedHistory', () => {
  const overrides: ConfirmedOverride[] = [
    { player: 'alice', battle: 90 },
    { player: 'alice', date: '20240105', battle: 100, bonus: 500 },
    { player: ' alice ', date: '20240106', bonus: 1000 },
    { player: 'bob', date: '20240105', battle: 70 }
  ];

  it('collects dated values from other dates only', () => {
    expect(confirmedHistory(overrides, 'alice', '20240106')).toEqual({ battles: [100], bonuses: [500] });
    expect(confirmedHistory(overrides, 'alice')).toEqual({ battles: [100], bonuses: [500, 1000] });
    expect(confirmedHistory(overrides, 'carol')).toEqual({ battles: [], bonuses: [] });
  });
});

describe('groupByPlayer', () => {
  it('sorts players and merges whitespace variants', () => {
    const groups = groupByPlayer([boss('zed', 1), boss(' amy', 2), boss('amy ', 3)]);
    expect([...groups.keys()]).toEqual(['amy', 'zed']);
    expect(groups.get('amy')?.map(record => record.score)).toEqual([2, 3]);
  });
});
