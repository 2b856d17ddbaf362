import { createChildLogger } from '@agora/shared/src/logger.js';
import { VersionConflictError } from '@agora/shared/src/utils/errors.js';
import type { ContextMemory, RecordKey, RecordWrite, VersionedRecord } from './context-memory.js';

const log = createChildLogger('memory:versioned-update');

const DEFAULT_MAX_ATTEMPTS = 25;

export interface RetryOptions {
  readonly maxAttempts?: number;
}

export interface UpdateResult<T> {
  readonly value: T;
  readonly version: number;
  readonly written: boolean;
}

/**
 * Read-modify-write on a single key. `mutate` sees the latest record (or null)
 * and returns the next value, or null to leave the record as it is. On a
 * version conflict the record is reread and `mutate` runs again.
 */
export async function updateWithRetry<T>(
  memory: ContextMemory,
  key: RecordKey<T>,
  mutate: (current: VersionedRecord<T> | null) => T | null,
  options: RetryOptions = {},
): Promise<UpdateResult<T> | null> {
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  let lastConflict: VersionConflictError | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const current = await memory.get(key);
    const next = mutate(current);
    if (next === null) {
      return current ? { value: current.value, version: current.version, written: false } : null;
    }

    try {
      const version = await memory.put(key, next, current?.version ?? 0);
      return { value: next, version, written: true };
    } catch (error) {
      if (!(error instanceof VersionConflictError)) {
        throw error;
      }
      lastConflict = error;
      log.debug({ key: key.path, attempt }, 'Version conflict, rereading');
    }
  }

  throw lastConflict ?? new Error(`updateWithRetry exhausted attempts for ${key.path}`);
}

/**
 * Multi-key variant: `build` reads whatever it needs and returns the writes
 * to commit atomically, or null when there is nothing to do. Conflicts rerun
 * `build` against fresh reads.
 */
export async function commitWithRetry<R>(
  memory: ContextMemory,
  build: () => Promise<{ readonly writes: readonly RecordWrite[]; readonly result: R } | null>,
  options: RetryOptions = {},
): Promise<R | null> {
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  let lastConflict: VersionConflictError | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const plan = await build();
    if (plan === null) {
      return null;
    }

    try {
      await memory.commit(plan.writes);
      return plan.result;
    } catch (error) {
      if (!(error instanceof VersionConflictError)) {
        throw error;
      }
      lastConflict = error;
      log.debug({ key: error.key, attempt }, 'Commit conflict, rebuilding');
    }
  }

  throw lastConflict ?? new Error('commitWithRetry exhausted attempts');
}

/**
 * Create-only write. Resolves false when the key already exists, which makes
 * replays of the same deterministic id a no-op.
 */
export async function createIfAbsent<T>(
  memory: ContextMemory,
  key: RecordKey<T>,
  value: T,
): Promise<boolean> {
  try {
    await memory.put(key, value, 0);
    return true;
  } catch (error) {
    if (error instanceof VersionConflictError) {
      return false;
    }
    throw error;
  }
}
