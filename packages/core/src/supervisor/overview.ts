import type {
  MetaReview,
  ResearchOverview,
  SupervisorPhase,
} from '@agora/shared/src/types/session.types.js';
import { scanValues } from '../memory/context-memory.js';
import { Keys, Kinds } from '../memory/record-kinds.js';
import { updateWithRetry } from '../memory/versioned-update.js';
import type { HandlerContext } from '../workers/types.js';

/** Final meta-reviews first, then the most recent. */
export function latestMetaReview(reviews: readonly MetaReview[]): MetaReview | null {
  const sorted = [...reviews].sort(
    (a, b) =>
      Number(b.final) - Number(a.final) ||
      (a.createdAt < b.createdAt ? 1 : a.createdAt > b.createdAt ? -1 : 0) ||
      (a.id < b.id ? 1 : a.id > b.id ? -1 : 0),
  );
  return sorted[0] ?? null;
}

/**
 * Composes the research overview from the latest meta-review and the current
 * ranking. Nothing here goes beyond what memory already holds.
 */
export async function composeOverview(
  ctx: HandlerContext,
  phase: SupervisorPhase,
): Promise<ResearchOverview> {
  const goal = await ctx.goals.requireCurrent();
  const review = latestMetaReview(await scanValues(ctx.memory, Kinds.metaReview));
  const ranked = await ctx.tournament.topRanked(ctx.config.convergence.topK);
  const hypotheses = await Promise.all(ranked.map((r) => ctx.hypotheses.require(r.hypothesisId)));

  return {
    sessionId: ctx.sessionId,
    goalId: goal.id,
    final: review?.final ?? false,
    phase,
    overview: review?.overview ?? null,
    topHypotheses: ranked.map((r, i) => ({
      hypothesisId: r.hypothesisId,
      title: hypotheses[i].content.title,
      rating: r.rating,
      matchesPlayed: r.matchesPlayed,
    })),
    generatedAt: ctx.now().toISOString(),
  };
}

export async function writeOverview(
  ctx: HandlerContext,
  overview: ResearchOverview,
): Promise<void> {
  await updateWithRetry(ctx.memory, Keys.overview(), () => overview);
}

export async function readOverview(ctx: HandlerContext): Promise<ResearchOverview | null> {
  const record = await ctx.memory.get(Keys.overview());
  return record?.value ?? null;
}
