import { describe, it, expect, beforeAll } from 'vitest';
import type { OpenAPIHono } from '@hono/zod-openapi';
import { OrchestrationConfigSchema } from '@agora/schemas/src/orchestration-config.schema.js';
import { createInMemoryContextMemory } from '@agora/core/src/memory/in-memory-context-memory.js';
import { createInMemorySessionRepository } from '@agora/core/src/repositories/in-memory-session.repository.js';
import type { ResearchService } from '@agora/core/src/services/research/research-service.js';
import { createResearchService } from '@agora/core/src/services/research/research-service.js';
import { createFakeRoster } from '@agora/core/src/testing/fake-roster.js';
import { createTestApp } from '../test-helpers.js';
import type { AppEnv } from '../types.js';

const CHAMPION = 't-0-1-h1';
const GOAL = 'Explain how biofilms tolerate antibiotics';

function createService(): ResearchService {
  return createResearchService({
    sessions: createInMemorySessionRepository(),
    memoryFor: () => createInMemoryContextMemory(),
    roster: createFakeRoster({ champion: CHAMPION }),
    config: OrchestrationConfigSchema.parse({
      workers: { concurrency: 1, pollIntervalMs: 1, taskTimeoutMs: 1_000, retryLimit: 1 },
      supervisor: { cadenceMs: 0, initialGenerateTasks: 3, seed: 7, maxCycles: 200 },
      convergence: { ratingDelta: 20, stableCycles: 3, topK: 1, minMatches: 20, minHypotheses: 10 },
      population: { maxActiveHypotheses: 12, hypothesesPerGenerateTask: 2 },
    }),
    pace: (pool) => pool.waitForIdle(),
  });
}

function postJson(body: unknown): RequestInit {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  };
}

describe('Session API Routes', () => {
  let service: ResearchService;
  let app: OpenAPIHono<AppEnv>;
  let sessionId: string;

  beforeAll(async () => {
    service = createService();
    app = createTestApp(service);
    const { session } = await service.setGoal(GOAL);
    sessionId = session.id;
    await service.waitForCompletion(sessionId);
  }, 30_000);

  describe('GET /health', () => {
    it('should report the service as healthy', async () => {
      const res = await app.request('/health');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        status: 'ok',
        service: 'agora',
        version: '0.1.0',
        memory: 'memory',
        runningSessions: 0,
      });
    });

    it('should name the configured memory backend', async () => {
      const res = await createTestApp(service, 'firestore').request('/health');

      expect(await res.json()).toMatchObject({ memory: 'firestore' });
    });

    it('should report 503 while the service drains for shutdown', async () => {
      const draining = createService();
      await draining.shutdown();

      const res = await createTestApp(draining).request('/health');

      expect(res.status).toBe(503);
      expect(await res.json()).toMatchObject({ status: 'draining', runningSessions: 0 });
    });

    it('should echo the caller request id', async () => {
      const res = await app.request('/health', { headers: { 'X-Request-Id': 'req-42' } });

      expect(res.headers.get('X-Request-Id')).toBe('req-42');
    });
  });

  describe('POST /sessions', () => {
    it('should start a session for a valid goal', async () => {
      const res = await app.request('/sessions', postJson({ goal: GOAL }));

      expect(res.status).toBe(201);
      const body = (await res.json()) as Record<string, unknown>;
      expect(body).toHaveProperty('status', 'active');
      expect(body).toHaveProperty('goalId', 'goal-v1');

      const id = String(body['sessionId']);
      await service.stop(id);
      await service.waitForCompletion(id);
    });

    it('should return 400 when the goal is missing', async () => {
      const res = await app.request('/sessions', postJson({}));

      expect(res.status).toBe(400);
      const body = (await res.json()) as Record<string, unknown>;
      expect(body).toHaveProperty('code', 'VALIDATION_ERROR');
      expect(body).toHaveProperty('details', ['goal: Required']);
    });

    it('should return 400 when the goal is too short', async () => {
      const res = await app.request('/sessions', postJson({ goal: 'short' }));

      expect(res.status).toBe(400);
      const body = (await res.json()) as Record<string, unknown>;
      expect(body).toHaveProperty('details', ['text: Research goal must be at least 10 characters']);
    });
  });

  describe('GET /sessions/:sessionId', () => {
    it('should return the status, phase and latest statistics', async () => {
      const res = await app.request(`/sessions/${sessionId}`);

      expect(res.status).toBe(200);
      const body = (await res.json()) as {
        status: string;
        running: boolean;
        phase: string;
        goalText: string;
        statistics: { topK: { hypothesisId: string }[]; stableCycles: number };
      };
      expect(body.status).toBe('converged');
      expect(body.running).toBe(false);
      expect(body.phase).toBe('converged');
      expect(body.goalText).toBe(GOAL);
      expect(body.statistics.topK.map((e) => e.hypothesisId)).toEqual([CHAMPION]);
      expect(body.statistics.stableCycles).toBeGreaterThanOrEqual(3);
    });

    it('should return 404 for an unknown session', async () => {
      const res = await app.request('/sessions/missing');

      expect(res.status).toBe(404);
      const body = (await res.json()) as Record<string, unknown>;
      expect(body).toHaveProperty('code', 'NOT_FOUND');
      expect(body).toHaveProperty('error', 'Session not found: missing');
    });
  });

  describe('GET /sessions/:sessionId/overview', () => {
    it('should return the final overview', async () => {
      const res = await app.request(`/sessions/${sessionId}/overview`);

      expect(res.status).toBe(200);
      const body = (await res.json()) as {
        final: boolean;
        overview: { summary: string };
        topHypotheses: { hypothesisId: string }[];
      };
      expect(body.final).toBe(true);
      expect(body.overview.summary).toBe('Final overview of 1 hypotheses');
      expect(body.topHypotheses.map((h) => h.hypothesisId)).toEqual([CHAMPION]);
    });
  });

  describe('GET /sessions/:sessionId/hypotheses', () => {
    it('should list the top-ranked hypotheses up to the limit', async () => {
      const res = await app.request(`/sessions/${sessionId}/hypotheses?limit=1`);

      expect(res.status).toBe(200);
      const body = (await res.json()) as { hypotheses: { hypothesisId: string; title: string }[] };
      expect(body.hypotheses).toHaveLength(1);
      expect(body.hypotheses[0]).toMatchObject({
        hypothesisId: CHAMPION,
        title: 'Candidate t-0-1/1',
      });
    });

    it('should return 400 for a limit below 1', async () => {
      const res = await app.request(`/sessions/${sessionId}/hypotheses?limit=0`);

      expect(res.status).toBe(400);
    });
  });

  describe('GET /sessions/:sessionId/hypotheses/:hypothesisId/cluster', () => {
    it('should return the cluster and near duplicates', async () => {
      const res = await app.request(`/sessions/${sessionId}/hypotheses/${CHAMPION}/cluster`);

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        hypothesisId: CHAMPION,
        memberIds: [CHAMPION],
        nearDuplicates: [],
      });
    });

    it('should return 404 for an unknown hypothesis', async () => {
      const res = await app.request(`/sessions/${sessionId}/hypotheses/h-missing/cluster`);

      expect(res.status).toBe(404);
    });
  });

  describe('GET /sessions/:sessionId/tasks', () => {
    it('should filter tasks by type and status', async () => {
      const res = await app.request(`/sessions/${sessionId}/tasks?type=generate&status=done`);

      expect(res.status).toBe(200);
      const body = (await res.json()) as { tasks: { id: string; type: string; status: string }[] };
      expect(body.tasks.length).toBeGreaterThanOrEqual(3);
      expect(body.tasks.slice(0, 3).map((t) => t.id)).toEqual(['t-0-1', 't-0-2', 't-0-3']);
      expect(body.tasks.every((t) => t.type === 'generate' && t.status === 'done')).toBe(true);
    });

    it('should return 400 for an unknown status', async () => {
      const res = await app.request(`/sessions/${sessionId}/tasks?status=paused`);

      expect(res.status).toBe(400);
    });
  });

  describe('POST /sessions/:sessionId/feedback', () => {
    it('should record a comment on a hypothesis', async () => {
      const res = await app.request(
        `/sessions/${sessionId}/feedback`,
        postJson({ text: 'Consider persister cells', targetHypothesisId: CHAMPION }),
      );

      expect(res.status).toBe(201);
      const body = (await res.json()) as Record<string, unknown>;
      expect(body).toHaveProperty('action', 'comment');
      expect(body).toHaveProperty('goalId', 'goal-v1');
      expect(body).not.toHaveProperty('revisedGoalId');
    });

    it('should return 400 for a reject without a target', async () => {
      const res = await app.request(
        `/sessions/${sessionId}/feedback`,
        postJson({ text: 'Not plausible', action: 'reject' }),
      );

      expect(res.status).toBe(400);
      const body = (await res.json()) as Record<string, unknown>;
      expect(body).toHaveProperty('details', [
        'targetHypothesisId: A reject action needs a target hypothesis',
      ]);
    });
  });

  describe('POST /sessions/:sessionId/stop and /resume', () => {
    it('should stop a running session and refuse to resume it while it runs', async () => {
      const { session } = await service.setGoal(GOAL);

      const resumeRes = await app.request(`/sessions/${session.id}/resume`, { method: 'POST' });
      const stopRes = await app.request(`/sessions/${session.id}/stop`, { method: 'POST' });
      const done = await service.waitForCompletion(session.id);

      expect(resumeRes.status).toBe(409);
      expect(stopRes.status).toBe(202);
      expect(await stopRes.json()).toEqual({
        sessionId: session.id,
        stopRequested: true,
        reason: 'stopped by operator',
      });
      expect(done.status).toBe('terminated');
    });

    it('should pass the stop reason through', async () => {
      const { session } = await service.setGoal(GOAL);

      const res = await app.request(
        `/sessions/${session.id}/stop`,
        postJson({ reason: 'operator abort' }),
      );
      await service.waitForCompletion(session.id);

      expect(await res.json()).toMatchObject({ reason: 'operator abort' });
    });

    it('should return 404 when resuming from an unknown checkpoint', async () => {
      const { session } = await service.setGoal(GOAL);
      await service.stop(session.id);
      await service.waitForCompletion(session.id);

      const res = await app.request(
        `/sessions/${session.id}/resume`,
        postJson({ checkpointId: 'cp-000000009999' }),
      );

      expect(res.status).toBe(404);
      const body = (await res.json()) as Record<string, unknown>;
      expect(body).toHaveProperty('error', 'Checkpoint not found: cp-000000009999');
    });
  });
});
