export type MatchOutcome = 'a-wins' | 'b-wins' | 'draw' | 'inconclusive';

export interface Match {
  readonly id: string;
  readonly hypothesisA: string;
  readonly hypothesisB: string;
  readonly outcome: MatchOutcome;
  /** 0..1; how strongly the comparison favoured the outcome. */
  readonly confidence: number;
  readonly rationale?: string;
  readonly transcriptKey?: string;
  readonly taskId?: string;
  readonly recordedAt: string;
}

export interface MatchTranscript {
  readonly matchId: string;
  readonly transcript: string;
}

export interface MatchApplication {
  readonly matchId: string;
  readonly hypothesisA: string;
  readonly hypothesisB: string;
  readonly sequence: number;
  readonly deltaA: number;
  readonly deltaB: number;
  readonly ratingA: number;
  readonly ratingB: number;
  readonly appliedAt: string;
}

export interface Rating {
  readonly hypothesisId: string;
  readonly rating: number;
  readonly matchesPlayed: number;
  readonly wins: number;
  readonly losses: number;
  readonly draws: number;
  readonly lastSequence: number;
  readonly lastMatchId?: string;
  readonly updatedAt: string;
}

export interface RankedHypothesis {
  readonly hypothesisId: string;
  readonly rating: number;
  readonly matchesPlayed: number;
  readonly creationSequence: number;
}
