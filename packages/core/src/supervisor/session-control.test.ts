import { describe, it, expect } from 'vitest';
import { SessionError } from '@agora/shared/src/utils/errors.js';
import { collect } from '../memory/context-memory.js';
import { createInMemoryContextMemory } from '../memory/in-memory-context-memory.js';
import {
  claimResume,
  clearControl,
  readControl,
  readPhase,
  requestStop,
  writePhase,
} from './session-control.js';

const T0 = new Date('2026-01-01T00:00:00.000Z');

function later(ms: number): Date {
  return new Date(T0.getTime() + ms);
}

describe('session control', () => {
  it('should raise and clear the stop signal', async () => {
    const memory = createInMemoryContextMemory();

    const stopped = await requestStop(memory, 'operator abort', T0);
    expect(stopped).toMatchObject({ stopRequested: true, reason: 'operator abort' });

    await clearControl(memory, T0);
    expect(await readControl(memory)).toEqual({ stopRequested: false, goalInvalidated: false });
  });
});

describe('claimResume', () => {
  it('should move a settled session to initializing', async () => {
    const memory = createInMemoryContextMemory();
    await writePhase(memory, 'terminated', 7, T0, 'stopped by operator');

    const claim = await claimResume(memory, later(10), 1_000);

    expect(claim).toEqual({
      phase: 'initializing',
      cycle: 7,
      updatedAt: '2026-01-01T00:00:00.010Z',
      reason: 'resuming',
    });
    expect(await readPhase(memory)).toEqual(claim);
    const kinds = (await collect(memory.readTimeline())).map((e) => e.kind);
    expect(kinds).toEqual(['phase-changed', 'phase-changed']);
  });

  it('should let exactly one of two concurrent claims through', async () => {
    const memory = createInMemoryContextMemory();
    await writePhase(memory, 'terminated', 3, T0);

    const results = await Promise.allSettled([
      claimResume(memory, later(10), 1_000),
      claimResume(memory, later(10), 1_000),
    ]);

    expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
    const rejected = results.find((r) => r.status === 'rejected');
    expect(rejected?.status === 'rejected' && rejected.reason).toBeInstanceOf(SessionError);
  });

  it('should refuse a second claim while the first is fresh', async () => {
    const memory = createInMemoryContextMemory();
    await claimResume(memory, T0, 1_000);

    await expect(claimResume(memory, later(999), 1_000)).rejects.toThrow(
      'Session is already being resumed',
    );
  });

  it('should take over a claim that went stale', async () => {
    const memory = createInMemoryContextMemory();
    await claimResume(memory, T0, 1_000);

    const claim = await claimResume(memory, later(1_000), 1_000);

    expect(claim.updatedAt).toBe('2026-01-01T00:00:01.000Z');
  });

  it('should not block a resume once the supervisor has rewritten the phase', async () => {
    const memory = createInMemoryContextMemory();
    await claimResume(memory, T0, 1_000);
    await writePhase(memory, 'initializing', 0, later(5));

    const claim = await claimResume(memory, later(10), 1_000);

    expect(claim.reason).toBe('resuming');
  });
});
