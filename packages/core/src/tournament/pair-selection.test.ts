import { describe, it, expect } from 'vitest';
import type { PairCandidate, PairSelectionConfig, PairSelectionInput } from './pair-selection.js';
import { pairKey, selectPairs } from './pair-selection.js';

const config: PairSelectionConfig = {
  ratingTolerance: 100,
  freshInjectionInterval: 3,
  freshMatchLimit: 1,
};

function candidate(id: string, rating: number, creationSequence: number, matchesPlayed = 0): PairCandidate {
  return { id, rating, matchesPlayed, creationSequence };
}

function input(overrides: Partial<PairSelectionInput>): PairSelectionInput {
  return {
    candidates: [],
    compared: new Set(),
    scheduled: new Set(),
    maxPairs: 2,
    batchIndex: 1,
    topK: 1,
    ...overrides,
  };
}

const four = [
  candidate('a', 1500, 1),
  candidate('b', 1500, 2),
  candidate('c', 1500, 3),
  candidate('d', 1500, 4),
];

describe('pairKey', () => {
  it('should not depend on argument order', () => {
    expect(pairKey('h-2', 'h-1')).toBe('h-1__h-2');
    expect(pairKey('h-1', 'h-2')).toBe('h-1__h-2');
  });
});

describe('selectPairs', () => {
  it('should choose disjoint uncompared pairs', () => {
    const pairs = selectPairs(input({ candidates: four }), config);

    expect(pairs).toEqual([
      { hypothesisA: 'a', hypothesisB: 'b' },
      { hypothesisA: 'c', hypothesisB: 'd' },
    ]);
  });

  it('should skip pairs that were already compared', () => {
    const pairs = selectPairs(input({ candidates: four, compared: new Set(['a__b']) }), config);

    expect(pairs).toEqual([
      { hypothesisA: 'a', hypothesisB: 'c' },
      { hypothesisA: 'b', hypothesisB: 'd' },
    ]);
  });

  it('should skip pairs that already have a compare task scheduled', () => {
    const pairs = selectPairs(
      input({ candidates: four, scheduled: new Set(['a__b', 'c__d']) }),
      config,
    );

    expect(pairs).toEqual([
      { hypothesisA: 'a', hypothesisB: 'c' },
      { hypothesisA: 'b', hypothesisB: 'd' },
    ]);
  });

  it('should prefer hypotheses that have played fewer matches', () => {
    const pairs = selectPairs(
      input({
        candidates: [
          candidate('a', 1500, 1, 6),
          candidate('b', 1500, 2, 6),
          candidate('c', 1500, 3, 0),
          candidate('d', 1500, 4, 1),
        ],
        maxPairs: 1,
      }),
      config,
    );

    expect(pairs).toEqual([{ hypothesisA: 'c', hypothesisB: 'd' }]);
  });

  it('should only pair within the rating tolerance while such pairs exist', () => {
    const pairs = selectPairs(
      input({
        candidates: [candidate('a', 1700, 1), candidate('b', 1500, 2), candidate('c', 1480, 3)],
      }),
      config,
    );

    expect(pairs).toEqual([{ hypothesisA: 'b', hypothesisB: 'c' }]);
  });

  it('should re-match rating-adjacent hypotheses when nothing else qualifies', () => {
    const pairs = selectPairs(
      input({
        candidates: [candidate('a', 1520, 1), candidate('b', 1500, 2), candidate('c', 1490, 3)],
        compared: new Set(['a__b', 'a__c', 'b__c']),
      }),
      config,
    );

    expect(pairs).toEqual([{ hypothesisA: 'a', hypothesisB: 'b' }]);
  });

  it('should pair the newest hypothesis with a top-ranked one on injection batches', () => {
    const pairs = selectPairs(
      input({
        candidates: [candidate('top', 1600, 1), candidate('x', 1500, 2), candidate('y', 1500, 3)],
        batchIndex: 3,
      }),
      { ...config, ratingTolerance: 50 },
    );

    expect(pairs).toEqual([{ hypothesisA: 'top', hypothesisB: 'y' }]);
  });

  it('should return nothing for fewer than two candidates', () => {
    expect(selectPairs(input({ candidates: [candidate('a', 1500, 1)] }), config)).toEqual([]);
  });

  it('should be deterministic for identical input', () => {
    const request = input({ candidates: four, batchIndex: 0, maxPairs: 3 });

    expect(selectPairs(request, config)).toEqual(selectPairs(request, config));
  });
});
