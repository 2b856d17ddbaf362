import type { ProximityConfig } from '@agora/schemas/src/orchestration-config.schema.js';
import type { Hypothesis } from '@agora/shared/src/types/hypothesis.types.js';
import type {
  ClusterState,
  ProximityEdge,
  SimilarityScore,
} from '@agora/shared/src/types/proximity.types.js';
import type { ContextMemory } from '../memory/context-memory.js';

export interface ProximityGraphDeps {
  readonly memory: ContextMemory;
  readonly config: ProximityConfig;
  readonly now?: () => Date;
}

export interface InsertionPlan {
  readonly hypothesis: Hypothesis;
  /** Bounded set to score against: top-rated hypotheses plus cluster representatives. */
  readonly candidates: readonly Hypothesis[];
}

export interface ApplyScoresResult {
  readonly alreadyIndexed: boolean;
  readonly edges: readonly ProximityEdge[];
  readonly clusterId?: string;
  readonly superseded: readonly string[];
}

/**
 * Similarity structure over hypotheses. Reads are eventually consistent: a
 * hypothesis joins the graph only once its update-proximity task has applied.
 */
export interface ProximityGraph {
  prepareInsertion(hypothesisId: string): Promise<InsertionPlan>;
  /** Idempotent per hypothesis: a second call for an indexed hypothesis changes nothing. */
  applyScores(hypothesisId: string, scores: readonly SimilarityScore[]): Promise<ApplyScoresResult>;
  /** Prunes edges below `threshold` (default: the configured one) and rebuilds clusters. */
  recompute(threshold?: number): Promise<ClusterState>;
  clusterOf(hypothesisId: string): Promise<readonly string[]>;
  nearDuplicatesOf(hypothesisId: string, threshold: number): Promise<readonly SimilarityScore[]>;
  clusters(): Promise<ClusterState>;
  isIndexed(hypothesisId: string): Promise<boolean>;
}
