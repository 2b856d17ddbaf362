import { z } from 'zod';

const KTierSchema = z.object({
  maxMatches: z.number().int().positive(),
  k: z.number().positive(),
});

const WorkersConfigSchema = z.object({
  concurrency: z.number().int().min(1).default(4),
  pollIntervalMs: z.number().int().min(1).default(50),
  taskTimeoutMs: z.number().int().min(1).default(120_000),
  retryLimit: z.number().int().min(0).default(3),
  applyAttemptLimit: z.number().int().min(1).default(3),
});

const QueueConfigSchema = z
  .object({
    softLimit: z.number().int().min(1).default(20),
    hardLimit: z.number().int().min(1).default(40),
  })
  .refine((q) => q.hardLimit >= q.softLimit, {
    message: 'hardLimit must be greater than or equal to softLimit',
    path: ['hardLimit'],
  });

const SupervisorConfigSchema = z.object({
  cadenceMs: z.number().int().min(0).default(5_000),
  batchSize: z.number().int().min(1).default(6),
  initialGenerateTasks: z.number().int().min(0).default(3),
  seed: z.number().int().default(42),
  checkpointEveryCycles: z.number().int().min(1).default(5),
  maxCycles: z.number().int().min(1).default(500),
  recentMatchWindow: z.number().int().min(1).default(10),
});

const BudgetConfigSchema = z
  .object({
    maxInvocations: z.number().int().min(1).default(500),
    finalReserve: z.number().int().min(0).default(2),
  })
  .refine((b) => b.finalReserve < b.maxInvocations, {
    message: 'finalReserve must be smaller than maxInvocations',
    path: ['finalReserve'],
  });

const ConvergenceConfigSchema = z.object({
  ratingDelta: z.number().positive().default(5),
  stableCycles: z.number().int().min(1).default(3),
  topK: z.number().int().min(1).default(3),
  minMatches: z.number().int().min(0).default(20),
  minHypotheses: z.number().int().min(0).default(10),
});

const TournamentConfigSchema = z.object({
  initialRating: z.number().default(1500),
  kTiers: z
    .array(KTierSchema)
    .default([
      { maxMatches: 5, k: 32 },
      { maxMatches: 15, k: 24 },
    ]),
  kFloor: z.number().positive().default(16),
  ratingTolerance: z.number().positive().default(200),
  freshInjectionInterval: z.number().int().min(1).default(3),
  freshMatchLimit: z.number().int().min(0).default(2),
  confidenceWeighting: z.boolean().default(false),
  rejectOnReviewRecommendation: z.boolean().default(true),
});

const ProximityConfigSchema = z.object({
  similarityThreshold: z.number().min(0).max(1).default(0.8),
  maxCandidates: z.number().int().min(1).default(10),
  topRatedCandidates: z.number().int().min(0).default(3),
  dedupThreshold: z.number().min(0).max(1).optional(),
  recomputeEveryCycles: z.number().int().min(1).default(10),
});

const PopulationConfigSchema = z.object({
  maxActiveHypotheses: z.number().int().min(1).default(30),
  hypothesesPerGenerateTask: z.number().int().min(1).default(1),
  evolveParents: z.number().int().min(1).max(4).default(2),
});

const TaskWeightsSchema = z.object({
  generate: z.number().min(0).default(1),
  review: z.number().min(0).default(1),
  compare: z.number().min(0).default(1.5),
  evolve: z.number().min(0).default(0.5),
  'update-proximity': z.number().min(0).default(1),
  'meta-review': z.number().min(0).default(0.5),
});

export const OrchestrationConfigSchema = z.object({
  $schema: z.string().optional(),
  workers: WorkersConfigSchema.default({}),
  queue: QueueConfigSchema.default({}),
  supervisor: SupervisorConfigSchema.default({}),
  budget: BudgetConfigSchema.default({}),
  convergence: ConvergenceConfigSchema.default({}),
  tournament: TournamentConfigSchema.default({}),
  proximity: ProximityConfigSchema.default({}),
  population: PopulationConfigSchema.default({}),
  weights: TaskWeightsSchema.default({}),
});

export type OrchestrationConfig = z.infer<typeof OrchestrationConfigSchema>;
export type OrchestrationConfigInput = z.input<typeof OrchestrationConfigSchema>;
export type WorkersConfig = OrchestrationConfig['workers'];
export type QueueConfig = OrchestrationConfig['queue'];
export type SupervisorConfig = OrchestrationConfig['supervisor'];
export type BudgetConfig = OrchestrationConfig['budget'];
export type ConvergenceConfig = OrchestrationConfig['convergence'];
export type TournamentConfig = OrchestrationConfig['tournament'];
export type ProximityConfig = OrchestrationConfig['proximity'];
export type PopulationConfig = OrchestrationConfig['population'];
export type TaskWeights = OrchestrationConfig['weights'];
export type KTier = z.infer<typeof KTierSchema>;
