import type {
  ConvergenceConfig,
  SupervisorConfig,
} from '@agora/schemas/src/orchestration-config.schema.js';
import type { ControlRecord, SupervisorPhase } from '@agora/shared/src/types/session.types.js';
import type { StatisticsSnapshot } from '@agora/shared/src/types/statistics.types.js';

export type TerminalPhase = Extract<SupervisorPhase, 'converged' | 'exhausted' | 'terminated'>;

export interface PhaseDecision {
  readonly phase: TerminalPhase;
  readonly reason: string;
}

export function isConverged(snapshot: StatisticsSnapshot, config: ConvergenceConfig): boolean {
  return (
    snapshot.stableCycles >= config.stableCycles &&
    snapshot.metaReviewCoverage >= 1 &&
    snapshot.hypotheses.total >= config.minHypotheses &&
    snapshot.matches.conclusive >= config.minMatches
  );
}

/**
 * Decides whether the session ends at this cycle boundary. Stop requests win
 * over budget exhaustion, which wins over convergence.
 */
export function decidePhase(
  snapshot: StatisticsSnapshot,
  control: ControlRecord | null,
  config: { readonly convergence: ConvergenceConfig; readonly supervisor: SupervisorConfig },
): PhaseDecision | null {
  if (control?.goalInvalidated) {
    return { phase: 'terminated', reason: control.reason ?? 'research goal was revised' };
  }
  if (control?.stopRequested) {
    return { phase: 'terminated', reason: control.reason ?? 'stop requested' };
  }
  if (snapshot.budget.remaining === 0) {
    return {
      phase: 'exhausted',
      reason: `invocation budget spent (${String(snapshot.budget.used)} of ${String(snapshot.budget.max)})`,
    };
  }
  if (snapshot.cycle >= config.supervisor.maxCycles) {
    return { phase: 'exhausted', reason: `cycle limit of ${String(config.supervisor.maxCycles)} reached` };
  }
  if (isConverged(snapshot, config.convergence)) {
    return {
      phase: 'converged',
      reason: `top ${String(snapshot.topK.length)} stable for ${String(snapshot.stableCycles)} cycles`,
    };
  }
  return null;
}
