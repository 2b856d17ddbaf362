import { describe, it, expect } from 'vitest';
import type { EloConfig } from './elo.js';
import { computeEloUpdate, expectedScore, kFactorFor, scoresFor } from './elo.js';

const graduated: EloConfig = {
  kTiers: [
    { maxMatches: 5, k: 32 },
    { maxMatches: 15, k: 24 },
  ],
  kFloor: 16,
  confidenceWeighting: false,
};

describe('expectedScore', () => {
  it('should give equal ratings an even chance', () => {
    expect(expectedScore(1500, 1500)).toBe(0.5);
  });

  it('should favour a 400 point lead ten to one', () => {
    expect(expectedScore(1900, 1500)).toBeCloseTo(10 / 11, 10);
    expect(expectedScore(1500, 1900)).toBeCloseTo(1 / 11, 10);
  });
});

describe('kFactorFor', () => {
  it.each([
    [0, 32],
    [4, 32],
    [5, 24],
    [14, 24],
    [15, 16],
    [200, 16],
  ])('should use K for %i matches played = %i', (matchesPlayed, k) => {
    expect(kFactorFor(matchesPlayed, graduated)).toBe(k);
  });

  it('should not depend on the order tiers are listed in', () => {
    const reversed = { kTiers: [...graduated.kTiers].reverse(), kFloor: 16 };
    expect(kFactorFor(3, reversed)).toBe(32);
    expect(kFactorFor(7, reversed)).toBe(24);
  });

  it('should fall back to the floor without tiers', () => {
    expect(kFactorFor(0, { kTiers: [], kFloor: 12 })).toBe(12);
  });
});

describe('scoresFor', () => {
  it('should score draws half each and skip inconclusive outcomes', () => {
    expect(scoresFor('draw')).toEqual([0.5, 0.5]);
    expect(scoresFor('a-wins')).toEqual([1, 0]);
    expect(scoresFor('inconclusive')).toBeNull();
  });
});

describe('computeEloUpdate', () => {
  const fresh = { rating: 1500, matchesPlayed: 0 };

  it('should move equal newcomers by half of K', () => {
    const update = computeEloUpdate(fresh, fresh, 'a-wins', 1, graduated);

    expect(update).toEqual({ deltaA: 16, deltaB: -16, ratingA: 1516, ratingB: 1484 });
  });

  it('should leave equal ratings untouched on a draw', () => {
    const update = computeEloUpdate(fresh, fresh, 'draw', 1, graduated);

    expect(update?.deltaA).toBe(0);
    expect(update?.deltaB).toBe(0);
  });

  it('should apply each side its own K', () => {
    const veteran = { rating: 1500, matchesPlayed: 40 };

    const update = computeEloUpdate(fresh, veteran, 'a-wins', 1, graduated);

    expect(update?.deltaA).toBe(16);
    expect(update?.deltaB).toBe(-8);
  });

  it('should scale K by confidence when weighting is enabled', () => {
    const update = computeEloUpdate(fresh, fresh, 'b-wins', 0.5, {
      ...graduated,
      confidenceWeighting: true,
    });

    expect(update?.deltaA).toBe(-8);
    expect(update?.deltaB).toBe(8);
  });

  it('should return null for an inconclusive match', () => {
    expect(computeEloUpdate(fresh, fresh, 'inconclusive', 1, graduated)).toBeNull();
  });
});

describe('alternating results between equals', () => {
  const configs: [string, EloConfig][] = [
    ['graduated 32/24/16', graduated],
    ['constant 16', { kTiers: [], kFloor: 16, confidenceWeighting: false }],
    ['steep 40 then 10', { kTiers: [{ maxMatches: 3, k: 40 }], kFloor: 10, confidenceWeighting: false }],
    ['wide 64 then 8', { kTiers: [{ maxMatches: 10, k: 64 }], kFloor: 8, confidenceWeighting: false }],
  ];

  function play(config: EloConfig, firstWinner: 'a-wins' | 'b-wins', rounds: number) {
    let a = { rating: 1500, matchesPlayed: 0 };
    let b = { rating: 1500, matchesPlayed: 0 };
    const gapsAfterPairs: number[] = [];
    for (let i = 0; i < rounds; i++) {
      const outcome = (i % 2 === 0) === (firstWinner === 'a-wins') ? 'a-wins' : 'b-wins';
      const update = computeEloUpdate(a, b, outcome, 1, config);
      if (!update) {
        throw new Error('conclusive outcome produced no update');
      }
      a = { rating: update.ratingA, matchesPlayed: a.matchesPlayed + 1 };
      b = { rating: update.ratingB, matchesPlayed: b.matchesPlayed + 1 };
      if (i % 2 === 1) {
        gapsAfterPairs.push(Math.abs(a.rating - b.rating));
      }
    }
    return { a, b, gapsAfterPairs };
  }

  it.each(configs)('should conserve the rating sum (%s)', (_name, config) => {
    const { a, b } = play(config, 'a-wins', 20);

    expect(a.rating + b.rating).toBeCloseTo(3000, 9);
  });

  it.each(configs)('should keep the gap below the largest K after every split pair (%s)', (_name, config) => {
    const maxK = Math.max(config.kFloor, ...config.kTiers.map((t) => t.k));

    const { gapsAfterPairs } = play(config, 'a-wins', 20);

    expect(gapsAfterPairs).toHaveLength(10);
    for (const gap of gapsAfterPairs) {
      expect(gap).toBeLessThan(maxK);
    }
  });

  it.each(configs)('should mirror ratings when the other side wins first (%s)', (_name, config) => {
    const forward = play(config, 'a-wins', 12);
    const mirrored = play(config, 'b-wins', 12);

    expect(mirrored.a.rating).toBeCloseTo(forward.b.rating, 9);
    expect(mirrored.b.rating).toBeCloseTo(forward.a.rating, 9);
  });

  function splitPair(first: 'a-wins' | 'b-wins', matchesPlayed: number) {
    const second = first === 'a-wins' ? 'b-wins' : 'a-wins';
    let a = { rating: 1500, matchesPlayed };
    let b = { rating: 1500, matchesPlayed };
    for (const outcome of [first, second] as const) {
      const update = computeEloUpdate(a, b, outcome, 1, graduated);
      if (!update) {
        throw new Error('conclusive outcome produced no update');
      }
      a = { rating: update.ratingA, matchesPlayed: a.matchesPlayed + 1 };
      b = { rating: update.ratingB, matchesPlayed: b.matchesPlayed + 1 };
    }
    return { a, b };
  }

  it('should bring equals back within a quarter of the opening K across a tier boundary', () => {
    // 4 matches played: the first game uses K 32, the second K 24.
    const winFirst = splitPair('a-wins', 4);
    const loseFirst = splitPair('b-wins', 4);

    expect(winFirst.a.rating).toBeCloseTo(1502.8979, 3);
    expect(winFirst.b.rating).toBeCloseTo(1497.1021, 3);
    expect(Math.abs(winFirst.a.rating - winFirst.b.rating)).toBeLessThan(32 / 4);
    expect(loseFirst.a.rating).toBeCloseTo(winFirst.b.rating, 9);
    expect(loseFirst.b.rating).toBeCloseTo(winFirst.a.rating, 9);
  });

  it('should bring equals back within a quarter of K when both games share a tier', () => {
    const winFirst = splitPair('a-wins', 20);
    const loseFirst = splitPair('b-wins', 20);

    expect(Math.abs(winFirst.a.rating - winFirst.b.rating)).toBeLessThan(16 / 4);
    expect(winFirst.a.rating + winFirst.b.rating).toBeCloseTo(3000, 9);
    expect(loseFirst.a.rating).toBeCloseTo(winFirst.b.rating, 9);
  });
});
