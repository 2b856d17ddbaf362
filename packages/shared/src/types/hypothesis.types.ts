export type HypothesisStatus = 'active' | 'superseded' | 'rejected';

export type EvolutionStrategy =
  | 'synthesis'
  | 'specialization'
  | 'generalization'
  | 'cross-pollination'
  | 'constraint-relaxation'
  | 'mechanism-elaboration';

export type HypothesisProvenance =
  | { readonly kind: 'generated' }
  | {
      readonly kind: 'evolved';
      readonly parentIds: readonly string[];
      readonly strategy: EvolutionStrategy;
    };

export interface HypothesisContent {
  readonly title: string;
  readonly description: string;
  readonly rationale?: string;
}

export interface Hypothesis {
  readonly id: string;
  readonly goalId: string;
  readonly content: HypothesisContent;
  readonly provenance: HypothesisProvenance;
  readonly createdAt: string;
  readonly creationSequence: number;
  readonly status: HypothesisStatus;
  readonly statusReason?: string;
}

export type ReviewRecommendation = 'accept' | 'revise' | 'reject';

export interface ReviewScores {
  readonly scientificMerit: number;
  readonly novelty: number;
  readonly testability: number;
  readonly impact: number;
  readonly limitations: number;
}

export interface ReviewCritique {
  readonly strengths: readonly string[];
  readonly weaknesses: readonly string[];
  readonly suggestions: readonly string[];
}

export interface Review {
  readonly id: string;
  readonly hypothesisId: string;
  readonly reviewer: string;
  readonly critique: ReviewCritique;
  readonly scores: ReviewScores;
  readonly overallScore: number;
  readonly recommendation: ReviewRecommendation;
  readonly createdAt: string;
}

export type FeedbackAction = 'comment' | 'reject';

export interface Feedback {
  readonly id: string;
  readonly text: string;
  readonly targetHypothesisId?: string;
  readonly action: FeedbackAction;
  readonly goalId: string;
  readonly createdAt: string;
}
