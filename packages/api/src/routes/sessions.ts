import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { ResearchService } from '@agora/core/src/services/research/research-service.js';
import type { StatisticsSnapshot } from '@agora/shared/src/types/statistics.types.js';
import { SchemaValidationError, toError } from '@agora/shared/src/utils/errors.js';
import { createRouter, type AppEnv } from '../types.js';
import {
  ClusterQuerySchema,
  CreateSessionSchema,
  HypothesisParamsSchema,
  ListHypothesesQuerySchema,
  ListTasksQuerySchema,
  ResumeSessionSchema,
  SessionParamsSchema,
  StopSessionSchema,
  SubmitFeedbackSchema,
} from '../schemas/requests.js';
import {
  ClusterResponseSchema,
  CreateSessionResponseSchema,
  ErrorResponseSchema,
  FeedbackResponseSchema,
  HypothesisListResponseSchema,
  OverviewResponseSchema,
  ResumeSessionResponseSchema,
  SessionDetailResponseSchema,
  StopSessionResponseSchema,
  TaskListResponseSchema,
} from '../schemas/responses.js';
import type { StatisticsSummary } from '../schemas/responses.js';

type JsonContent<T> = {
  'application/json': { schema: T };
};

function json<T>(schema: T): JsonContent<T> {
  return { 'application/json': { schema } };
}

function errorResponse(description: string): {
  description: string;
  content: JsonContent<typeof ErrorResponseSchema>;
} {
  return { description, content: json(ErrorResponseSchema) };
}

const createSessionRoute = createRoute({
  method: 'post',
  path: '/',
  tags: ['Sessions'],
  summary: 'Set a research goal and start a session',
  request: { body: { content: json(CreateSessionSchema), required: true } },
  responses: {
    201: { description: 'Session started', content: json(CreateSessionResponseSchema) },
    400: errorResponse('Invalid research goal'),
  },
});

const getSessionRoute = createRoute({
  method: 'get',
  path: '/{sessionId}',
  tags: ['Sessions'],
  summary: 'Get session status, phase and the latest statistics',
  request: { params: SessionParamsSchema },
  responses: {
    200: { description: 'Session status', content: json(SessionDetailResponseSchema) },
    404: errorResponse('Session not found'),
  },
});

const feedbackRoute = createRoute({
  method: 'post',
  path: '/{sessionId}/feedback',
  tags: ['Sessions'],
  summary: 'Submit scientist feedback',
  request: {
    params: SessionParamsSchema,
    body: { content: json(SubmitFeedbackSchema), required: true },
  },
  responses: {
    201: { description: 'Feedback recorded', content: json(FeedbackResponseSchema) },
    400: errorResponse('Invalid feedback'),
    404: errorResponse('Session or hypothesis not found'),
  },
});

const overviewRoute = createRoute({
  method: 'get',
  path: '/{sessionId}/overview',
  tags: ['Sessions'],
  summary: 'Get the final or an interim research overview',
  request: { params: SessionParamsSchema },
  responses: {
    200: { description: 'Research overview', content: json(OverviewResponseSchema) },
    404: errorResponse('Session not found'),
  },
});

const hypothesesRoute = createRoute({
  method: 'get',
  path: '/{sessionId}/hypotheses',
  tags: ['Hypotheses'],
  summary: 'List the top-ranked hypotheses',
  request: { params: SessionParamsSchema, query: ListHypothesesQuerySchema },
  responses: {
    200: { description: 'Ranked hypotheses', content: json(HypothesisListResponseSchema) },
    404: errorResponse('Session not found'),
  },
});

const clusterRoute = createRoute({
  method: 'get',
  path: '/{sessionId}/hypotheses/{hypothesisId}/cluster',
  tags: ['Hypotheses'],
  summary: 'Get the proximity cluster and near duplicates of a hypothesis',
  request: { params: HypothesisParamsSchema, query: ClusterQuerySchema },
  responses: {
    200: { description: 'Cluster of the hypothesis', content: json(ClusterResponseSchema) },
    404: errorResponse('Session or hypothesis not found'),
  },
});

const tasksRoute = createRoute({
  method: 'get',
  path: '/{sessionId}/tasks',
  tags: ['Tasks'],
  summary: 'List the tasks of a session',
  request: { params: SessionParamsSchema, query: ListTasksQuerySchema },
  responses: {
    200: { description: 'Tasks in enqueue order', content: json(TaskListResponseSchema) },
    404: errorResponse('Session not found'),
  },
});

const stopRoute = createRoute({
  method: 'post',
  path: '/{sessionId}/stop',
  tags: ['Sessions'],
  summary: 'Terminate the session at its next cycle boundary',
  request: {
    params: SessionParamsSchema,
    body: { content: json(StopSessionSchema), required: false },
  },
  responses: {
    202: { description: 'Stop requested', content: json(StopSessionResponseSchema) },
    404: errorResponse('Session not found'),
  },
});

const resumeRoute = createRoute({
  method: 'post',
  path: '/{sessionId}/resume',
  tags: ['Sessions'],
  summary: 'Resume a stopped session, optionally from a checkpoint',
  request: {
    params: SessionParamsSchema,
    body: { content: json(ResumeSessionSchema), required: false },
  },
  responses: {
    202: { description: 'Session resumed', content: json(ResumeSessionResponseSchema) },
    404: errorResponse('Session or checkpoint not found'),
    409: errorResponse('Session is still running'),
  },
});

function summarize(snapshot: StatisticsSnapshot | null): StatisticsSummary | null {
  if (!snapshot) {
    return null;
  }
  return {
    cycle: snapshot.cycle,
    computedAt: snapshot.computedAt,
    hypotheses: snapshot.hypotheses,
    matches: snapshot.matches,
    backlog: snapshot.backlog,
    clusterCount: snapshot.clusterCount,
    topK: snapshot.topK.map((e) => ({ ...e })),
    stableCycles: snapshot.stableCycles,
    metaReviewCoverage: snapshot.metaReviewCoverage,
    budget: snapshot.budget,
  };
}

export function createSessionRoutes(service: ResearchService): OpenAPIHono<AppEnv> {
  const routes = createRouter();

  routes.openapi(createSessionRoute, async (c) => {
    const body = c.req.valid('json');
    const { session, goal } = await service.setGoal(body.goal, body.constraints);
    return c.json({ sessionId: session.id, status: session.status, goalId: goal.id }, 201);
  });

  routes.openapi(getSessionRoute, async (c) => {
    const { sessionId } = c.req.valid('param');
    const { session, running, phase, statistics } = await service.getStatus(sessionId);
    return c.json(
      {
        sessionId: session.id,
        goalText: session.goalText,
        status: session.status,
        running,
        phase: phase?.phase ?? null,
        ...(phase?.reason !== undefined && { phaseReason: phase.reason }),
        cycle: phase?.cycle ?? null,
        ...(session.failureReason !== undefined && { failureReason: session.failureReason }),
        createdAt: session.createdAt.toISOString(),
        updatedAt: session.updatedAt.toISOString(),
        statistics: summarize(statistics),
      },
      200,
    );
  });

  routes.openapi(feedbackRoute, async (c) => {
    const { sessionId } = c.req.valid('param');
    const body = c.req.valid('json');
    const { feedback, goal } = await service.submitFeedback(sessionId, body);
    return c.json(
      {
        feedbackId: feedback.id,
        action: feedback.action,
        goalId: feedback.goalId,
        ...(goal && { revisedGoalId: goal.id }),
      },
      201,
    );
  });

  routes.openapi(overviewRoute, async (c) => {
    const { sessionId } = c.req.valid('param');
    const result = await service.requestOverview(sessionId);
    const { overview } = result;
    return c.json(
      {
        sessionId: result.sessionId,
        goalId: result.goalId,
        final: result.final,
        phase: result.phase,
        overview: overview && {
          summary: overview.summary,
          themes: [...overview.themes],
          strengths: [...overview.strengths],
          recommendations: [...overview.recommendations],
          hypothesisNotes: overview.hypothesisNotes.map((n) => ({ ...n })),
        },
        topHypotheses: result.topHypotheses.map((h) => ({ ...h })),
        generatedAt: result.generatedAt,
      },
      200,
    );
  });

  routes.openapi(hypothesesRoute, async (c) => {
    const { sessionId } = c.req.valid('param');
    const { limit } = c.req.valid('query');
    const ranked = await service.topRanked(sessionId, limit);
    return c.json(
      {
        sessionId,
        hypotheses: ranked.map((r) => ({
          hypothesisId: r.hypothesisId,
          title: r.title,
          description: r.description,
          rating: r.rating,
          matchesPlayed: r.matchesPlayed,
        })),
      },
      200,
    );
  });

  routes.openapi(clusterRoute, async (c) => {
    const { sessionId, hypothesisId } = c.req.valid('param');
    const { threshold } = c.req.valid('query');
    const memberIds = await service.clusterOf(sessionId, hypothesisId);
    const nearDuplicates = await service.nearDuplicatesOf(sessionId, hypothesisId, threshold);
    return c.json(
      {
        hypothesisId,
        memberIds: [...memberIds],
        nearDuplicates: nearDuplicates.map((d) => ({ ...d })),
      },
      200,
    );
  });

  routes.openapi(tasksRoute, async (c) => {
    const { sessionId } = c.req.valid('param');
    const filter = c.req.valid('query');
    const tasks = await service.listTasks(sessionId, {
      ...(filter.status && { status: filter.status }),
      ...(filter.type && { type: filter.type }),
    });
    return c.json(
      {
        sessionId,
        tasks: tasks.map((t) => ({
          id: t.id,
          type: t.type,
          status: t.status,
          targetIds: [...t.targetIds],
          priority: t.priority,
          retryCount: t.retryCount,
          ...(t.applyAttempts !== undefined && { applyAttempts: t.applyAttempts }),
          final: t.final,
          enqueuedAt: t.enqueuedAt,
          ...(t.lastError !== undefined && { lastError: t.lastError }),
        })),
      },
      200,
    );
  });

  routes.openapi(stopRoute, async (c) => {
    const { sessionId } = c.req.valid('param');
    const body = readOptionalJson(await c.req.text(), StopSessionSchema);
    const control = await service.stop(sessionId, body.reason);
    return c.json(
      {
        sessionId,
        stopRequested: control.stopRequested,
        ...(control.reason !== undefined && { reason: control.reason }),
      },
      202,
    );
  });

  routes.openapi(resumeRoute, async (c) => {
    const { sessionId } = c.req.valid('param');
    const body = readOptionalJson(await c.req.text(), ResumeSessionSchema);
    const session = await service.resume(sessionId, {
      ...(body.checkpointId !== undefined && { checkpointId: body.checkpointId }),
    });
    return c.json({ sessionId, status: session.status }, 202);
  });

  return routes;
}

/** Parses an optional JSON body; an empty body reads as `{}`. */
function readOptionalJson<T>(text: string, schema: { parse(data: unknown): T }): T {
  if (text.trim().length === 0) {
    return schema.parse({});
  }
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new SchemaValidationError('Malformed JSON body', [toError(error).message]);
  }
  return schema.parse(data);
}
