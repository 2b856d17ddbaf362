import { describe, it, expect } from 'vitest';
import { createInMemorySessionRepository } from './in-memory-session.repository.js';

const goalText = 'Identify drug repurposing candidates for acute myeloid leukemia';

describe('createInMemorySessionRepository', () => {
  it('should create an active session with generated id and timestamps', async () => {
    const repo = createInMemorySessionRepository();
    const session = await repo.create({ goalText });

    expect(session.id).toBeDefined();
    expect(session.goalText).toBe(goalText);
    expect(session.status).toBe('active');
    expect(session.createdAt).toBeInstanceOf(Date);
    expect(session.updatedAt).toBeInstanceOf(Date);
  });

  it('should retrieve a session by id', async () => {
    const repo = createInMemorySessionRepository();
    const created = await repo.create({ goalText });

    const loaded = await repo.getById(created.id);
    expect(loaded).toEqual(created);
  });

  it('should return null for nonexistent session', async () => {
    const repo = createInMemorySessionRepository();
    expect(await repo.getById('nonexistent')).toBeNull();
  });

  it('should update status and failure reason', async () => {
    const repo = createInMemorySessionRepository();
    const session = await repo.create({ goalText });

    await repo.update(session.id, { status: 'failed', failureReason: 'memory unavailable' });

    const loaded = await repo.getById(session.id);
    expect(loaded?.status).toBe('failed');
    expect(loaded?.failureReason).toBe('memory unavailable');
  });

  it('should throw when updating a nonexistent session', async () => {
    const repo = createInMemorySessionRepository();
    await expect(repo.update('nonexistent', { status: 'terminated' })).rejects.toThrow(
      'Session not found',
    );
  });

  describe('list', () => {
    it('should return sessions sorted by updatedAt desc', async () => {
      const repo = createInMemorySessionRepository();
      const s1 = await repo.create({ goalText });
      const s2 = await repo.create({ goalText });
      await repo.update(s1.id, { updatedAt: new Date(Date.now() + 60_000) });

      const results = await repo.list();
      expect(results.map((s) => s.id)).toEqual([s1.id, s2.id]);
    });

    it('should filter by status', async () => {
      const repo = createInMemorySessionRepository();
      await repo.create({ goalText });
      const s2 = await repo.create({ goalText });
      await repo.update(s2.id, { status: 'converged' });

      const converged = await repo.list({ status: 'converged' });
      expect(converged).toHaveLength(1);
      expect(converged[0].id).toBe(s2.id);
    });

    it('should respect limit', async () => {
      const repo = createInMemorySessionRepository();
      await repo.create({ goalText });
      await repo.create({ goalText });
      await repo.create({ goalText });

      expect(await repo.list({ limit: 2 })).toHaveLength(2);
    });
  });
});
