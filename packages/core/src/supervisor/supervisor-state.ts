import { Annotation } from '@langchain/langgraph';
import type { ResearchOverview, SupervisorPhase } from '@agora/shared/src/types/session.types.js';
import type { StatisticsSnapshot } from '@agora/shared/src/types/statistics.types.js';

export const SupervisorGraphAnnotation = Annotation.Root({
  sessionId: Annotation<string>,
  resume: Annotation<boolean>,
  /** Timeline sequence of the checkpoint memory was restored to, when resuming from one. */
  restoredFrom: Annotation<number | undefined>,
  cycle: Annotation<number>,
  phase: Annotation<SupervisorPhase>,
  reason: Annotation<string | undefined>,
  previous: Annotation<StatisticsSnapshot | null>,
  overview: Annotation<ResearchOverview | null>,
});

export type SupervisorGraphState = typeof SupervisorGraphAnnotation.State;
