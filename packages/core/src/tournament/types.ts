import type { TournamentConfig } from '@agora/schemas/src/orchestration-config.schema.js';
import type {
  Match,
  MatchApplication,
  MatchOutcome,
  RankedHypothesis,
  Rating,
} from '@agora/shared/src/types/tournament.types.js';
import type { ContextMemory } from '../memory/context-memory.js';
import type { MatchPair } from './pair-selection.js';

export interface TournamentEngineDeps {
  readonly memory: ContextMemory;
  readonly config: TournamentConfig;
  readonly now?: () => Date;
}

export interface RecordMatchInput {
  readonly id: string;
  readonly hypothesisA: string;
  readonly hypothesisB: string;
  readonly outcome: MatchOutcome;
  readonly confidence: number;
  readonly rationale?: string;
  readonly transcript?: string;
  readonly taskId?: string;
}

export interface RecordMatchResult {
  readonly match: Match;
  readonly application: MatchApplication | null;
  /** False when the match was inconclusive or had already been applied. */
  readonly applied: boolean;
}

export interface TopRankedOptions {
  readonly includeInactive?: boolean;
}

export interface PairRequest {
  readonly maxPairs: number;
  readonly batchIndex: number;
  readonly topK: number;
  /** Pair keys already covered by queued or running compare tasks. */
  readonly scheduled?: ReadonlySet<string>;
}

export interface RatingDrift {
  readonly hypothesisId: string;
  readonly stored: number;
  readonly replayed: number;
}

export interface AuditResult {
  readonly checked: number;
  readonly repaired: readonly RatingDrift[];
}

export interface TournamentEngine {
  /** Idempotent by match id. Conclusive outcomes update both ratings in one commit. */
  recordMatch(input: RecordMatchInput): Promise<RecordMatchResult>;
  getRating(hypothesisId: string): Promise<Rating>;
  topRanked(n: number, options?: TopRankedOptions): Promise<readonly RankedHypothesis[]>;
  standings(): Promise<readonly Rating[]>;
  selectPairs(request: PairRequest): Promise<readonly MatchPair[]>;
  listMatches(): Promise<readonly Match[]>;
  listApplications(): Promise<readonly MatchApplication[]>;
  /**
   * Replays every applied match and rewrites ratings that drifted from the
   * replay. Only safe while no match is being applied, e.g. during recovery.
   */
  auditRatings(): Promise<AuditResult>;
}
