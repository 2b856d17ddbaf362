import type { TournamentConfig } from '@agora/schemas/src/orchestration-config.schema.js';

export interface PairCandidate {
  readonly id: string;
  readonly rating: number;
  readonly matchesPlayed: number;
  readonly creationSequence: number;
}

export interface MatchPair {
  readonly hypothesisA: string;
  readonly hypothesisB: string;
}

export interface PairSelectionInput {
  readonly candidates: readonly PairCandidate[];
  /** Pair keys with at least one conclusive match. */
  readonly compared: ReadonlySet<string>;
  /** Pair keys with a compare task still queued or running. */
  readonly scheduled: ReadonlySet<string>;
  readonly maxPairs: number;
  /** Counts compare batches; every `freshInjectionInterval`-th one links the top to new entrants. */
  readonly batchIndex: number;
  readonly topK: number;
}

export type PairSelectionConfig = Pick<
  TournamentConfig,
  'ratingTolerance' | 'freshInjectionInterval' | 'freshMatchLimit'
>;

export function pairKey(a: string, b: string): string {
  return a < b ? `${a}__${b}` : `${b}__${a}`;
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Rating desc, then earliest creation, then id. */
export function byRank(a: PairCandidate, b: PairCandidate): number {
  if (a.rating !== b.rating) {
    return b.rating - a.rating;
  }
  if (a.creationSequence !== b.creationSequence) {
    return a.creationSequence - b.creationSequence;
  }
  return compareIds(a.id, b.id);
}

function orient(x: PairCandidate, y: PairCandidate): MatchPair {
  const first = x.creationSequence < y.creationSequence ||
    (x.creationSequence === y.creationSequence && x.id < y.id);
  return first
    ? { hypothesisA: x.id, hypothesisB: y.id }
    : { hypothesisA: y.id, hypothesisB: x.id };
}

/**
 * Chooses disjoint pairs for the next compare batch. Pure: the same input
 * always yields the same pairs in the same order.
 *
 * 1. On injection batches, each of the newest hypotheses meets a top-K one.
 * 2. Uncompared pairs within the rating tolerance, fewest matches first.
 * 3. Only when nothing above qualified: rating-adjacent re-matches.
 */
export function selectPairs(input: PairSelectionInput, config: PairSelectionConfig): MatchPair[] {
  const pairs: MatchPair[] = [];
  const used = new Set<string>();
  const ranked = [...input.candidates].sort(byRank);

  const isOpen = (x: PairCandidate, y: PairCandidate): boolean =>
    x.id !== y.id && !used.has(x.id) && !used.has(y.id) && !input.scheduled.has(pairKey(x.id, y.id));

  const take = (x: PairCandidate, y: PairCandidate): void => {
    pairs.push(orient(x, y));
    used.add(x.id);
    used.add(y.id);
  };

  if (input.maxPairs <= 0 || ranked.length < 2) {
    return pairs;
  }

  if (config.freshMatchLimit > 0 && input.batchIndex % config.freshInjectionInterval === 0) {
    const top = ranked.slice(0, input.topK);
    const topIds = new Set(top.map((c) => c.id));
    const newest = [...input.candidates]
      .filter((c) => !topIds.has(c.id))
      .sort((a, b) => b.creationSequence - a.creationSequence || compareIds(a.id, b.id))
      .slice(0, config.freshMatchLimit);

    for (const fresh of newest) {
      if (pairs.length >= input.maxPairs) {
        break;
      }
      const partner =
        top.find((t) => isOpen(t, fresh) && !input.compared.has(pairKey(t.id, fresh.id))) ??
        top.find((t) => isOpen(t, fresh));
      if (partner) {
        take(partner, fresh);
      }
    }
  }

  const eligible: { x: PairCandidate; y: PairCandidate; load: number; gap: number; key: string }[] = [];
  for (let i = 0; i < ranked.length; i++) {
    for (let j = i + 1; j < ranked.length; j++) {
      const x = ranked[i];
      const y = ranked[j];
      const gap = Math.abs(x.rating - y.rating);
      const key = pairKey(x.id, y.id);
      if (gap <= config.ratingTolerance && !input.compared.has(key) && !input.scheduled.has(key)) {
        eligible.push({ x, y, load: x.matchesPlayed + y.matchesPlayed, gap, key });
      }
    }
  }
  eligible.sort((p, q) => p.load - q.load || p.gap - q.gap || compareIds(p.key, q.key));

  for (const { x, y } of eligible) {
    if (pairs.length >= input.maxPairs) {
      break;
    }
    if (isOpen(x, y)) {
      take(x, y);
    }
  }

  if (pairs.length === 0) {
    for (let i = 0; i + 1 < ranked.length && pairs.length < input.maxPairs; i++) {
      const x = ranked[i];
      const y = ranked[i + 1];
      if (isOpen(x, y)) {
        take(x, y);
      }
    }
  }

  return pairs;
}
