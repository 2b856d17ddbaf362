import { describe, it, expect, beforeEach } from 'vitest';
import { OrchestrationConfigSchema } from '@agora/schemas/src/orchestration-config.schema.js';
import type { ContextMemory } from '../memory/context-memory.js';
import { createInMemoryContextMemory } from '../memory/in-memory-context-memory.js';
import { Keys } from '../memory/record-kinds.js';
import { createFakeRoster } from '../testing/fake-roster.js';
import { makeSnapshot } from '../testing/fixtures.js';
import { createSessionRuntime } from './session-runtime.js';
import { lastSnapshotBetween, recoverSession, recoverSnapshot } from './recovery.js';

describe('recoverSnapshot', () => {
  let memory: ContextMemory;
  let firstSequence: number;

  beforeEach(async () => {
    memory = createInMemoryContextMemory();
    firstSequence = await memory.appendToTimeline('statistics', makeSnapshot({ cycle: 1 }));
    await memory.checkpoint('cycle-1');
    await memory.appendToTimeline('statistics', makeSnapshot({ cycle: 2 }));
    await memory.appendToTimeline('statistics', { cycle: 'three' });
  });

  it('should skip malformed entries when reading the last snapshot', async () => {
    expect((await lastSnapshotBetween(memory, 1))?.cycle).toBe(2);
  });

  it('should ignore entries past the upper bound', async () => {
    expect((await lastSnapshotBetween(memory, 1, firstSequence))?.cycle).toBe(1);
  });

  it('should return null when the range holds no snapshot', async () => {
    expect(await lastSnapshotBetween(memory, 10)).toBeNull();
  });

  it('should replay from the latest checkpoint', async () => {
    expect((await recoverSnapshot(memory))?.cycle).toBe(2);
  });

  it('should stop at the restored checkpoint', async () => {
    expect((await recoverSnapshot(memory, firstSequence + 1))?.cycle).toBe(1);
  });

  it('should fall back to the whole timeline when nothing follows the checkpoint', async () => {
    await memory.checkpoint('final');

    expect((await recoverSnapshot(memory))?.cycle).toBe(2);
  });
});

describe('recoverSession', () => {
  it('should requeue interrupted work and repair drifted ratings', async () => {
    const memory = createInMemoryContextMemory();
    await memory.appendToTimeline('statistics', makeSnapshot({ cycle: 4 }));
    const runtime = createSessionRuntime({
      sessionId: 'session-recover',
      memory,
      roster: createFakeRoster(),
      config: OrchestrationConfigSchema.parse({}),
    });
    const { context, queue, pool } = runtime;
    for (const id of ['h-1', 'h-2']) {
      await context.hypotheses.add({
        id,
        goalId: 'goal-v1',
        content: { title: id, description: `About ${id}` },
        provenance: { kind: 'generated' },
      });
    }
    await context.tournament.recordMatch({
      id: 'm-1',
      hypothesisA: 'h-1',
      hypothesisB: 'h-2',
      outcome: 'a-wins',
      confidence: 0.9,
    });
    const stored = await memory.get(Keys.rating('h-1'));
    if (!stored) {
      throw new Error('rating missing');
    }
    await memory.put(Keys.rating('h-1'), { ...stored.value, rating: 1600 }, stored.version);
    await queue.enqueue({ id: 't-3-1', type: 'review', targetIds: ['h-1'], priority: 50 });
    await queue.claimNext('worker-1');

    const recovered = await recoverSession({ memory, pool, tournament: context.tournament });

    expect(recovered.cycle).toBe(4);
    expect(recovered.previous?.cycle).toBe(4);
    expect(recovered.pool).toEqual({ requeued: ['t-3-1'], applied: [] });
    expect(recovered.audit.repaired).toEqual([
      { hypothesisId: 'h-1', stored: 1600, replayed: 1516 },
    ]);
    expect((await context.tournament.getRating('h-1')).rating).toBe(1516);
    const task = await queue.get('t-3-1');
    expect(task?.status).toBe('queued');
    expect(task?.retryCount).toBe(0);
  });

  it('should start from cycle zero without a recorded snapshot', async () => {
    const memory = createInMemoryContextMemory();
    const runtime = createSessionRuntime({
      sessionId: 'session-fresh',
      memory,
      roster: createFakeRoster(),
      config: OrchestrationConfigSchema.parse({}),
    });

    const recovered = await recoverSession({
      memory,
      pool: runtime.pool,
      tournament: runtime.context.tournament,
    });

    expect(recovered.cycle).toBe(0);
    expect(recovered.previous).toBeNull();
    expect(recovered.audit).toEqual({ checked: 0, repaired: [] });
  });
});
