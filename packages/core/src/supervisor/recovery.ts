import type { StatisticsSnapshot } from '@agora/shared/src/types/statistics.types.js';
import { createChildLogger } from '@agora/shared/src/logger.js';
import type { ContextMemory } from '../memory/context-memory.js';
import { StatisticsSnapshotSchema } from '../memory/record-kinds.js';
import type { AuditResult, TournamentEngine } from '../tournament/types.js';
import type { RecoveryReport, WorkerPool } from '../workers/worker-pool.js';

const log = createChildLogger('supervisor:recovery');

export interface RecoveredState {
  readonly cycle: number;
  readonly previous: StatisticsSnapshot | null;
  readonly pool: RecoveryReport;
  readonly audit: AuditResult;
}

/**
 * Last statistics snapshot on the timeline between `fromSequence` and
 * `toSequence` (inclusive), or null when there is none.
 */
export async function lastSnapshotBetween(
  memory: ContextMemory,
  fromSequence: number,
  toSequence = Number.POSITIVE_INFINITY,
): Promise<StatisticsSnapshot | null> {
  let last: StatisticsSnapshot | null = null;
  for await (const entry of memory.readTimeline(fromSequence)) {
    if (entry.sequence > toSequence) {
      break;
    }
    if (entry.kind !== 'statistics') {
      continue;
    }
    const parsed = StatisticsSnapshotSchema.safeParse(entry.payload);
    if (parsed.success) {
      last = parsed.data;
    } else {
      log.warn({ sequence: entry.sequence }, 'Skipping malformed statistics entry');
    }
  }
  return last;
}

/**
 * Replays the timeline from the latest checkpoint to find where the last run
 * stopped. With `restoredFrom`, only entries up to that checkpoint count.
 */
export async function recoverSnapshot(
  memory: ContextMemory,
  restoredFrom?: number,
): Promise<StatisticsSnapshot | null> {
  if (restoredFrom !== undefined) {
    return lastSnapshotBetween(memory, 1, restoredFrom);
  }
  const checkpoint = await memory.latestCheckpoint();
  const fromCheckpoint = checkpoint
    ? await lastSnapshotBetween(memory, checkpoint.timelineSequence)
    : null;
  return fromCheckpoint ?? lastSnapshotBetween(memory, 1);
}

export async function recoverSession(deps: {
  readonly memory: ContextMemory;
  readonly pool: WorkerPool;
  readonly tournament: TournamentEngine;
  readonly restoredFrom?: number;
}): Promise<RecoveredState> {
  const previous = await recoverSnapshot(deps.memory, deps.restoredFrom);
  const pool = await deps.pool.recover();
  const audit = await deps.tournament.auditRatings();

  const cycle = previous?.cycle ?? 0;
  log.info(
    {
      cycle,
      requeued: pool.requeued.length,
      applied: pool.applied.length,
      repairedRatings: audit.repaired.length,
    },
    'Session state recovered',
  );
  return { cycle, previous, pool, audit };
}
