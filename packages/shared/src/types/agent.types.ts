import type { ResearchGoal } from './goal.types.js';
import type {
  EvolutionStrategy,
  Hypothesis,
  HypothesisContent,
  Review,
  ReviewCritique,
  ReviewRecommendation,
  ReviewScores,
} from './hypothesis.types.js';
import type { SimilarityScore } from './proximity.types.js';
import type { ResearchOverviewContent } from './session.types.js';

export const AGENT_TYPES = [
  'generate',
  'reflect',
  'rank-compare',
  'evolve',
  'proximity-score',
  'meta-review',
] as const;

export type AgentType = (typeof AGENT_TYPES)[number];

export interface InvocationContext {
  readonly sessionId: string;
  readonly taskId: string;
  readonly signal: AbortSignal;
  /** Set for the session-closing meta-review. */
  readonly final?: boolean;
}

export interface AgentCapability<I, O> {
  invoke(input: I, context: InvocationContext): Promise<O>;
}

export interface GenerateInput {
  readonly goal: ResearchGoal;
  readonly count: number;
  readonly existingTitles: readonly string[];
  readonly feedback: readonly string[];
}

export interface GenerateOutput {
  readonly hypotheses: readonly HypothesisContent[];
}

export interface ReflectInput {
  readonly goal: ResearchGoal;
  readonly hypothesis: Hypothesis;
  readonly feedback: readonly string[];
}

export interface ReflectOutput {
  readonly critique: ReviewCritique;
  readonly scores: ReviewScores;
  readonly recommendation: ReviewRecommendation;
}

export interface CompareInput {
  readonly goal: ResearchGoal;
  readonly hypothesisA: Hypothesis;
  readonly hypothesisB: Hypothesis;
  readonly reviewsA: readonly Review[];
  readonly reviewsB: readonly Review[];
}

export type CompareWinner = 'a' | 'b' | 'draw' | 'undetermined';

export interface CompareOutput {
  readonly winner: CompareWinner;
  readonly confidence: number;
  readonly rationale: string;
  readonly transcript: string;
}

export interface EvolveInput {
  readonly goal: ResearchGoal;
  readonly parents: readonly Hypothesis[];
  readonly reviews: readonly Review[];
  readonly feedback: readonly string[];
}

export interface EvolvedDraft extends HypothesisContent {
  readonly strategy: EvolutionStrategy;
}

export interface EvolveOutput {
  readonly hypotheses: readonly EvolvedDraft[];
}

export interface ProximityScoreInput {
  readonly hypothesis: Hypothesis;
  readonly candidates: readonly Hypothesis[];
}

export interface ProximityScoreOutput {
  readonly scores: readonly SimilarityScore[];
}

export interface MetaReviewSubject {
  readonly hypothesis: Hypothesis;
  readonly rating: number;
  readonly matchesPlayed: number;
  readonly reviews: readonly Review[];
}

export interface MetaReviewInput {
  readonly goal: ResearchGoal;
  readonly subjects: readonly MetaReviewSubject[];
  readonly final: boolean;
}

export interface MetaReviewOutput {
  readonly overview: ResearchOverviewContent;
}

/**
 * The closed set of agent capabilities a worker can invoke.
 */
export interface AgentRoster {
  readonly generate: AgentCapability<GenerateInput, GenerateOutput>;
  readonly reflect: AgentCapability<ReflectInput, ReflectOutput>;
  readonly 'rank-compare': AgentCapability<CompareInput, CompareOutput>;
  readonly evolve: AgentCapability<EvolveInput, EvolveOutput>;
  readonly 'proximity-score': AgentCapability<ProximityScoreInput, ProximityScoreOutput>;
  readonly 'meta-review': AgentCapability<MetaReviewInput, MetaReviewOutput>;
}
