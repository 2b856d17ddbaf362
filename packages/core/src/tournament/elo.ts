import type { KTier, TournamentConfig } from '@agora/schemas/src/orchestration-config.schema.js';
import type { MatchOutcome } from '@agora/shared/src/types/tournament.types.js';

export type EloConfig = Pick<TournamentConfig, 'kTiers' | 'kFloor' | 'confidenceWeighting'>;

export interface EloSide {
  readonly rating: number;
  readonly matchesPlayed: number;
}

export interface EloUpdate {
  readonly deltaA: number;
  readonly deltaB: number;
  readonly ratingA: number;
  readonly ratingB: number;
}

/** Probability that A beats B under the logistic model. */
export function expectedScore(ratingA: number, ratingB: number): number {
  return 1 / (1 + Math.pow(10, (ratingB - ratingA) / 400));
}

/**
 * Graduated K: the first tier whose `maxMatches` the hypothesis has not yet
 * reached, or the floor once it has outgrown every tier.
 */
export function kFactorFor(matchesPlayed: number, config: Pick<EloConfig, 'kTiers' | 'kFloor'>): number {
  const tiers: KTier[] = [...config.kTiers].sort((a, b) => a.maxMatches - b.maxMatches);
  for (const tier of tiers) {
    if (matchesPlayed < tier.maxMatches) {
      return tier.k;
    }
  }
  return config.kFloor;
}

/** Observed scores for A and B, or null when the match must not move ratings. */
export function scoresFor(outcome: MatchOutcome): readonly [number, number] | null {
  switch (outcome) {
    case 'a-wins':
      return [1, 0];
    case 'b-wins':
      return [0, 1];
    case 'draw':
      return [0.5, 0.5];
    case 'inconclusive':
      return null;
  }
}

export function computeEloUpdate(
  a: EloSide,
  b: EloSide,
  outcome: MatchOutcome,
  confidence: number,
  config: EloConfig,
): EloUpdate | null {
  const scores = scoresFor(outcome);
  if (!scores) {
    return null;
  }

  const weight = config.confidenceWeighting ? confidence : 1;
  const kA = kFactorFor(a.matchesPlayed, config) * weight;
  const kB = kFactorFor(b.matchesPlayed, config) * weight;
  const expectedA = expectedScore(a.rating, b.rating);
  const expectedB = 1 - expectedA;

  const deltaA = kA * (scores[0] - expectedA);
  const deltaB = kB * (scores[1] - expectedB);

  return {
    deltaA,
    deltaB,
    ratingA: a.rating + deltaA,
    ratingB: b.rating + deltaB,
  };
}
