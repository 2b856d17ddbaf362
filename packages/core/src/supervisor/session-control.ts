import type { ControlRecord, PhaseRecord, SupervisorPhase } from '@agora/shared/src/types/session.types.js';
import { createChildLogger } from '@agora/shared/src/logger.js';
import { SessionError, VersionConflictError } from '@agora/shared/src/utils/errors.js';
import type { ContextMemory } from '../memory/context-memory.js';
import { Keys } from '../memory/record-kinds.js';
import { updateWithRetry } from '../memory/versioned-update.js';

const log = createChildLogger('supervisor:control');

const IDLE: ControlRecord = { stopRequested: false, goalInvalidated: false };

export const RESUMING = 'resuming';

export async function readControl(memory: ContextMemory): Promise<ControlRecord> {
  const record = await memory.get(Keys.control());
  return record?.value ?? IDLE;
}

async function signal(
  memory: ContextMemory,
  change: (current: ControlRecord) => ControlRecord,
  now: Date,
): Promise<ControlRecord> {
  const result = await updateWithRetry(memory, Keys.control(), (current) =>
    change(current?.value ?? IDLE),
  );
  const control = result?.value ?? IDLE;
  await memory.appendToTimeline('control', { ...control, at: now.toISOString() });
  return control;
}

/** Asks the supervisor to terminate at its next cycle boundary. */
export async function requestStop(
  memory: ContextMemory,
  reason: string,
  now: Date = new Date(),
): Promise<ControlRecord> {
  log.info({ reason }, 'Stop requested');
  return signal(
    memory,
    (current) => ({ ...current, stopRequested: true, reason, requestedAt: now.toISOString() }),
    now,
  );
}

export async function invalidateGoal(
  memory: ContextMemory,
  reason: string,
  now: Date = new Date(),
): Promise<ControlRecord> {
  log.info({ reason }, 'Research goal invalidated');
  return signal(
    memory,
    (current) => ({ ...current, goalInvalidated: true, reason, requestedAt: now.toISOString() }),
    now,
  );
}

/** Resets pending stop and invalidation signals before a resumed run. */
export async function clearControl(memory: ContextMemory, now: Date = new Date()): Promise<void> {
  const current = await memory.get(Keys.control());
  if (!current || (!current.value.stopRequested && !current.value.goalInvalidated)) {
    return;
  }
  await signal(memory, () => IDLE, now);
}

export async function readPhase(memory: ContextMemory): Promise<PhaseRecord | null> {
  const record = await memory.get(Keys.phase());
  return record?.value ?? null;
}

export async function writePhase(
  memory: ContextMemory,
  phase: SupervisorPhase,
  cycle: number,
  now: Date,
  reason?: string,
): Promise<PhaseRecord> {
  const next: PhaseRecord = {
    phase,
    cycle,
    updatedAt: now.toISOString(),
    ...(reason !== undefined && { reason }),
  };
  await updateWithRetry(memory, Keys.phase(), () => next);
  await memory.appendToTimeline('phase-changed', next);
  log.info({ phase, cycle, reason }, 'Supervisor phase changed');
  return next;
}

/**
 * Claims a resume by moving the phase record to initializing with a versioned
 * write. A concurrent claim loses the version race; a claim younger than
 * `staleAfterMs` blocks later ones until the supervisor takes over.
 */
export async function claimResume(
  memory: ContextMemory,
  now: Date,
  staleAfterMs: number,
): Promise<PhaseRecord> {
  const record = await memory.get(Keys.phase());
  const current = record?.value;
  if (
    current?.phase === 'initializing' &&
    current.reason === RESUMING &&
    now.getTime() - Date.parse(current.updatedAt) < staleAfterMs
  ) {
    throw new SessionError('Session is already being resumed');
  }

  const claim: PhaseRecord = {
    phase: 'initializing',
    cycle: current?.cycle ?? 0,
    updatedAt: now.toISOString(),
    reason: RESUMING,
  };
  try {
    await memory.put(Keys.phase(), claim, record?.version ?? 0);
  } catch (error) {
    if (error instanceof VersionConflictError) {
      throw new SessionError('Session is already being resumed');
    }
    throw error;
  }
  await memory.appendToTimeline('phase-changed', claim);
  log.info({ cycle: claim.cycle }, 'Resume claimed');
  return claim;
}
