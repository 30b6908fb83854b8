import { DEFAULT_ENGINE_CONFIG } from '../core/constants';
import { inPlausibleRange, isRoundScore, matchScore, qualifiesAsCandidate, scoreEvidence } from '../core/evidence';

describe('matchScore', () => {
  it.each([
    // score, battle, bonus, expected
    [158000, 100, 0, 'exact'], // 79 waves at 2000, unscaled
    [15196, 101, 0, 'exact'], // 7 waves at 2010 after the 1.08 scaling
    [5000, 77, 500, 'exact'], // score is the bare bonus
    [15121, 100, 0, 'exact'], // 14001 after scaling, one off 7 waves at 2000
    [158003, 100, 0, 'fractional'],
    [158000, 120, 0, 'fractional'],
    [4000500, 100, 0, 'none'], // implied 2000 seconds
    [1000, 100, 500, 'none'] // below the bonus
  ] as const)('%p at battle %p / bonus %p is %p', (score, battle, bonus, expected) => {
    expect(matchScore(score, battle, bonus, DEFAULT_ENGINE_CONFIG)).toBe(expected);
  });
});

describe('scoreEvidence', () => {
  const noRange = { exclude: false };

  it('weights exact hits on round scores above weak hits', () => {
    expect(scoreEvidence(100, 0, [158000], noRange, DEFAULT_ENGINE_CONFIG)).toBe(10);
    expect(scoreEvidence(101, 0, [15196], noRange, DEFAULT_ENGINE_CONFIG)).toBe(2);
  });

  it('treats every exact hit as strong in exclusion mode', () => {
    expect(scoreEvidence(101, 0, [15196], { exclude: true }, DEFAULT_ENGINE_CONFIG)).toBe(10);
  });

  it('sums per-score weights and the range base weight', () => {
    const options = { exclude: false, plausibleRange: { min: 90, max: 110 } };
    expect(scoreEvidence(100, 0, [158000], options, DEFAULT_ENGINE_CONFIG)).toBe(60);
    expect(scoreEvidence(100, 0, [158000, 158003, 4000500], noRange, DEFAULT_ENGINE_CONFIG)).toBe(11);
    expect(scoreEvidence(120, 0, [158000], options, DEFAULT_ENGINE_CONFIG)).toBe(1);
  });

  it('returns zero with no observations and no range', () => {
    expect(scoreEvidence(120, 0, [], noRange, DEFAULT_ENGINE_CONFIG)).toBe(0);
  });
});

describe('candidate qualification', () => {
  it('requires evidence beyond the base weight inside the range', () => {
    expect(qualifiesAsCandidate(50, true)).toBe(false);
    expect(qualifiesAsCandidate(51, true)).toBe(true);
  });

  it('keeps any positive weight outside the range', () => {
    expect(qualifiesAsCandidate(1, false)).toBe(true);
    expect(qualifiesAsCandidate(0, false)).toBe(false);
  });

  it('checks range bounds inclusively', () => {
    const range = { min: 55, max: 60 };
    expect(inPlausibleRange(55, range)).toBe(true);
    expect(inPlausibleRange(60, range)).toBe(true);
    expect(inPlausibleRange(60.5, range)).toBe(false);
    expect(inPlausibleRange(58, undefined)).toBe(false);
  });

  it('recognises round scores by last digit', () => {
    expect(isRoundScore(3080)).toBe(true);
    expect(isRoundScore(3665)).toBe(true);
    expect(isRoundScore(15196)).toBe(false);
  });
});
