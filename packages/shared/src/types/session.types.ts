export type SupervisorPhase = 'initializing' | 'running' | 'converged' | 'exhausted' | 'terminated';

export type SessionStatus = 'active' | 'converged' | 'exhausted' | 'terminated' | 'failed';

export interface Session {
  readonly id: string;
  readonly goalText: string;
  readonly status: SessionStatus;
  readonly createdAt: Date;
  readonly updatedAt: Date;
  readonly failureReason?: string;
}

export interface PhaseRecord {
  readonly phase: SupervisorPhase;
  readonly reason?: string;
  readonly cycle: number;
  readonly updatedAt: string;
}

export interface ControlRecord {
  readonly stopRequested: boolean;
  readonly goalInvalidated: boolean;
  readonly reason?: string;
  readonly requestedAt?: string;
}

export interface ResearchOverviewContent {
  readonly summary: string;
  readonly themes: readonly string[];
  readonly strengths: readonly string[];
  readonly recommendations: readonly string[];
  readonly hypothesisNotes: readonly {
    readonly hypothesisId: string;
    readonly note: string;
  }[];
}

export interface MetaReview {
  readonly id: string;
  readonly taskId: string;
  readonly final: boolean;
  readonly overview: ResearchOverviewContent;
  readonly coveredHypothesisIds: readonly string[];
  readonly createdAt: string;
}

export interface MetaReviewCoverage {
  readonly hypothesisId: string;
  readonly metaReviewId: string;
  readonly coveredAt: string;
}

export interface ResearchOverview {
  readonly sessionId: string;
  readonly goalId: string;
  readonly final: boolean;
  readonly phase: SupervisorPhase;
  readonly overview: ResearchOverviewContent | null;
  readonly topHypotheses: readonly {
    readonly hypothesisId: string;
    readonly title: string;
    readonly rating: number;
    readonly matchesPlayed: number;
  }[];
  readonly generatedAt: string;
}
