import type { Match, MatchApplication } from '@agora/shared/src/types/tournament.types.js';
import type { EloConfig } from './elo.js';
import { computeEloUpdate } from './elo.js';

export interface ReplayedRating {
  readonly rating: number;
  readonly matchesPlayed: number;
  readonly wins: number;
  readonly losses: number;
  readonly draws: number;
  readonly lastSequence: number;
  readonly lastMatchId?: string;
}

export function compareApplications(a: MatchApplication, b: MatchApplication): number {
  if (a.sequence !== b.sequence) {
    return a.sequence - b.sequence;
  }
  return a.matchId < b.matchId ? -1 : a.matchId > b.matchId ? 1 : 0;
}

/**
 * Recomputes ratings from scratch. Applications are replayed in
 * (sequence, matchId) order; since a match's sequence always exceeds the last
 * sequence of both its hypotheses, this order agrees with the order in which
 * each hypothesis saw its matches.
 */
export function replayRatings(
  applications: readonly MatchApplication[],
  matches: ReadonlyMap<string, Match>,
  initialRating: number,
  config: EloConfig,
): Map<string, ReplayedRating> {
  const ratings = new Map<string, ReplayedRating>();
  const current = (id: string): ReplayedRating =>
    ratings.get(id) ?? {
      rating: initialRating,
      matchesPlayed: 0,
      wins: 0,
      losses: 0,
      draws: 0,
      lastSequence: 0,
    };

  for (const application of [...applications].sort(compareApplications)) {
    const match = matches.get(application.matchId);
    if (!match) {
      throw new Error(`Match ${application.matchId} has an application but no record`);
    }
    const a = current(match.hypothesisA);
    const b = current(match.hypothesisB);
    const update = computeEloUpdate(a, b, match.outcome, match.confidence, config);
    if (!update) {
      continue;
    }

    ratings.set(match.hypothesisA, {
      rating: update.ratingA,
      matchesPlayed: a.matchesPlayed + 1,
      wins: a.wins + (match.outcome === 'a-wins' ? 1 : 0),
      losses: a.losses + (match.outcome === 'b-wins' ? 1 : 0),
      draws: a.draws + (match.outcome === 'draw' ? 1 : 0),
      lastSequence: application.sequence,
      lastMatchId: match.id,
    });
    ratings.set(match.hypothesisB, {
      rating: update.ratingB,
      matchesPlayed: b.matchesPlayed + 1,
      wins: b.wins + (match.outcome === 'b-wins' ? 1 : 0),
      losses: b.losses + (match.outcome === 'a-wins' ? 1 : 0),
      draws: b.draws + (match.outcome === 'draw' ? 1 : 0),
      lastSequence: application.sequence,
      lastMatchId: match.id,
    });
  }

  return ratings;
}
