import type {
  Match,
  MatchApplication,
  RankedHypothesis,
  Rating,
} from '@agora/shared/src/types/tournament.types.js';
import type { Hypothesis } from '@agora/shared/src/types/hypothesis.types.js';
import { createChildLogger } from '@agora/shared/src/logger.js';
import { InconclusiveMatchError } from '@agora/shared/src/utils/errors.js';
import type { RecordWrite } from '../memory/context-memory.js';
import { recordWrite, scanValues } from '../memory/context-memory.js';
import { Keys, Kinds } from '../memory/record-kinds.js';
import { commitWithRetry, createIfAbsent } from '../memory/versioned-update.js';
import { computeEloUpdate } from './elo.js';
import type { MatchPair, PairCandidate } from './pair-selection.js';
import { byRank, pairKey, selectPairs } from './pair-selection.js';
import { replayRatings } from './rating-replay.js';
import type {
  AuditResult,
  PairRequest,
  RatingDrift,
  RecordMatchInput,
  RecordMatchResult,
  TopRankedOptions,
  TournamentEngine,
  TournamentEngineDeps,
} from './types.js';

const log = createChildLogger('tournament:engine');

export function createTournamentEngine(deps: TournamentEngineDeps): TournamentEngine {
  const { memory, config } = deps;
  const now = deps.now ?? ((): Date => new Date());

  function initialRating(hypothesisId: string): Rating {
    return {
      hypothesisId,
      rating: config.initialRating,
      matchesPlayed: 0,
      wins: 0,
      losses: 0,
      draws: 0,
      lastSequence: 0,
      updatedAt: now().toISOString(),
    };
  }

  async function storeMatch(input: RecordMatchInput): Promise<Match> {
    if (input.hypothesisA === input.hypothesisB) {
      throw new InconclusiveMatchError(`Match ${input.id} pairs ${input.hypothesisA} with itself`);
    }

    const match: Match = {
      id: input.id,
      hypothesisA: input.hypothesisA,
      hypothesisB: input.hypothesisB,
      outcome: input.outcome,
      confidence: input.confidence,
      recordedAt: now().toISOString(),
      ...(input.rationale !== undefined && { rationale: input.rationale }),
      ...(input.transcript !== undefined && { transcriptKey: Keys.matchTranscript(input.id).path }),
      ...(input.taskId !== undefined && { taskId: input.taskId }),
    };

    if (input.transcript !== undefined) {
      await createIfAbsent(memory, Keys.matchTranscript(input.id), {
        matchId: input.id,
        transcript: input.transcript,
      });
    }

    const created = await createIfAbsent(memory, Keys.match(match.id), match);
    if (created) {
      return match;
    }
    const existing = await memory.get(Keys.match(match.id));
    return existing?.value ?? match;
  }

  async function applyMatch(match: Match): Promise<MatchApplication | null> {
    return commitWithRetry(memory, async () => {
      const existing = await memory.get(Keys.matchApplication(match.id));
      if (existing) {
        return null;
      }

      const recordA = await memory.get(Keys.rating(match.hypothesisA));
      const recordB = await memory.get(Keys.rating(match.hypothesisB));
      const a = recordA?.value ?? initialRating(match.hypothesisA);
      const b = recordB?.value ?? initialRating(match.hypothesisB);

      const update = computeEloUpdate(a, b, match.outcome, match.confidence, config);
      if (!update) {
        return null;
      }

      const sequence = Math.max(a.lastSequence, b.lastSequence) + 1;
      const appliedAt = now().toISOString();
      const nextA: Rating = {
        hypothesisId: a.hypothesisId,
        rating: update.ratingA,
        matchesPlayed: a.matchesPlayed + 1,
        wins: a.wins + (match.outcome === 'a-wins' ? 1 : 0),
        losses: a.losses + (match.outcome === 'b-wins' ? 1 : 0),
        draws: a.draws + (match.outcome === 'draw' ? 1 : 0),
        lastSequence: sequence,
        lastMatchId: match.id,
        updatedAt: appliedAt,
      };
      const nextB: Rating = {
        hypothesisId: b.hypothesisId,
        rating: update.ratingB,
        matchesPlayed: b.matchesPlayed + 1,
        wins: b.wins + (match.outcome === 'b-wins' ? 1 : 0),
        losses: b.losses + (match.outcome === 'a-wins' ? 1 : 0),
        draws: b.draws + (match.outcome === 'draw' ? 1 : 0),
        lastSequence: sequence,
        lastMatchId: match.id,
        updatedAt: appliedAt,
      };
      const application: MatchApplication = {
        matchId: match.id,
        hypothesisA: match.hypothesisA,
        hypothesisB: match.hypothesisB,
        sequence,
        deltaA: update.deltaA,
        deltaB: update.deltaB,
        ratingA: update.ratingA,
        ratingB: update.ratingB,
        appliedAt,
      };

      const writes: RecordWrite[] = [
        recordWrite(Keys.rating(a.hypothesisId), nextA, recordA?.version ?? 0),
        recordWrite(Keys.rating(b.hypothesisId), nextB, recordB?.version ?? 0),
        recordWrite(Keys.matchApplication(match.id), application, 0),
      ];
      return { writes, result: application };
    });
  }

  async function ratingsById(): Promise<Map<string, Rating>> {
    const ratings = await scanValues(memory, Kinds.rating);
    return new Map(ratings.map((r) => [r.hypothesisId, r]));
  }

  function toCandidate(hypothesis: Hypothesis, rating: Rating | undefined): PairCandidate {
    return {
      id: hypothesis.id,
      rating: rating?.rating ?? config.initialRating,
      matchesPlayed: rating?.matchesPlayed ?? 0,
      creationSequence: hypothesis.creationSequence,
    };
  }

  return {
    async recordMatch(input: RecordMatchInput): Promise<RecordMatchResult> {
      const match = await storeMatch(input);

      if (match.outcome === 'inconclusive') {
        log.info(
          { matchId: match.id, hypothesisA: match.hypothesisA, hypothesisB: match.hypothesisB },
          'Inconclusive match recorded without rating update',
        );
        return { match, application: null, applied: false };
      }

      const application = await applyMatch(match);
      if (!application) {
        const existing = await memory.get(Keys.matchApplication(match.id));
        return { match, application: existing?.value ?? null, applied: false };
      }

      await memory.appendToTimeline('match-applied', {
        matchId: match.id,
        sequence: application.sequence,
        deltaA: application.deltaA,
        deltaB: application.deltaB,
      });
      log.info(
        {
          matchId: match.id,
          outcome: match.outcome,
          sequence: application.sequence,
          ratingA: application.ratingA,
          ratingB: application.ratingB,
        },
        'Match applied',
      );
      return { match, application, applied: true };
    },

    async getRating(hypothesisId: string): Promise<Rating> {
      const record = await memory.get(Keys.rating(hypothesisId));
      return record?.value ?? initialRating(hypothesisId);
    },

    async topRanked(n: number, options: TopRankedOptions = {}): Promise<readonly RankedHypothesis[]> {
      const hypotheses = await scanValues(memory, Kinds.hypothesis);
      const ratings = await ratingsById();
      const pool = options.includeInactive
        ? hypotheses
        : hypotheses.filter((h) => h.status === 'active');

      return pool
        .map((h) => toCandidate(h, ratings.get(h.id)))
        .sort(byRank)
        .slice(0, Math.max(0, n))
        .map((c) => ({
          hypothesisId: c.id,
          rating: c.rating,
          matchesPlayed: c.matchesPlayed,
          creationSequence: c.creationSequence,
        }));
    },

    async standings(): Promise<readonly Rating[]> {
      const ratings = await scanValues(memory, Kinds.rating);
      return ratings.sort(
        (a, b) =>
          b.rating - a.rating ||
          (a.hypothesisId < b.hypothesisId ? -1 : a.hypothesisId > b.hypothesisId ? 1 : 0),
      );
    },

    async selectPairs(request: PairRequest): Promise<readonly MatchPair[]> {
      const hypotheses = await scanValues(memory, Kinds.hypothesis);
      const ratings = await ratingsById();
      const matches = await scanValues(memory, Kinds.match);

      const compared = new Set(
        matches
          .filter((m) => m.outcome !== 'inconclusive')
          .map((m) => pairKey(m.hypothesisA, m.hypothesisB)),
      );
      const candidates = hypotheses
        .filter((h) => h.status === 'active')
        .map((h) => toCandidate(h, ratings.get(h.id)));

      return selectPairs(
        {
          candidates,
          compared,
          scheduled: request.scheduled ?? new Set<string>(),
          maxPairs: request.maxPairs,
          batchIndex: request.batchIndex,
          topK: request.topK,
        },
        config,
      );
    },

    listMatches(): Promise<readonly Match[]> {
      return scanValues(memory, Kinds.match);
    },

    listApplications(): Promise<readonly MatchApplication[]> {
      return scanValues(memory, Kinds.matchApplication);
    },

    async auditRatings(): Promise<AuditResult> {
      const applications = await scanValues(memory, Kinds.matchApplication);
      const matches = await scanValues(memory, Kinds.match);
      const replayed = replayRatings(
        applications,
        new Map(matches.map((m) => [m.id, m])),
        config.initialRating,
        config,
      );

      const repaired: RatingDrift[] = [];
      for (const [hypothesisId, expected] of replayed) {
        const drift = await commitWithRetry(memory, async () => {
          const record = await memory.get(Keys.rating(hypothesisId));
          const stored = record?.value;
          if (
            stored &&
            stored.rating === expected.rating &&
            stored.matchesPlayed === expected.matchesPlayed &&
            stored.lastSequence === expected.lastSequence
          ) {
            return null;
          }
          const found: RatingDrift = {
            hypothesisId,
            stored: stored?.rating ?? config.initialRating,
            replayed: expected.rating,
          };
          const next: Rating = {
            hypothesisId,
            ...expected,
            updatedAt: now().toISOString(),
          };
          return {
            writes: [recordWrite(Keys.rating(hypothesisId), next, record?.version ?? 0)],
            result: found,
          };
        });
        if (drift) {
          repaired.push(drift);
        }
      }

      if (repaired.length > 0) {
        log.warn({ repaired }, 'Repaired ratings that drifted from match replay');
      }
      return { checked: replayed.size, repaired };
    },
  };
}
