import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { EvolutionStrategySchema } from '../memory/record-kinds.js';

const HypothesisDraftSchema = z.object({
  title: z.string().min(1),
  description: z.string().min(1),
  rationale: z.string().optional(),
});

export const GenerationResultSchema = z.object({
  hypotheses: z.array(HypothesisDraftSchema).min(1),
});

export type GenerationResult = z.infer<typeof GenerationResultSchema>;

export const GenerationResultJsonSchema = zodToJsonSchema(GenerationResultSchema, {
  name: 'GenerationResult',
  $refStrategy: 'none',
});

const ScoreSchema = z.number().min(1).max(10);

export const ReflectionResultSchema = z.object({
  strengths: z.array(z.string()),
  weaknesses: z.array(z.string()),
  suggestions: z.array(z.string()),
  scores: z.object({
    scientificMerit: ScoreSchema,
    novelty: ScoreSchema,
    testability: ScoreSchema,
    impact: ScoreSchema,
    limitations: ScoreSchema,
  }),
  recommendation: z.enum(['accept', 'revise', 'reject']),
});

export type ReflectionResult = z.infer<typeof ReflectionResultSchema>;

export const ReflectionResultJsonSchema = zodToJsonSchema(ReflectionResultSchema, {
  name: 'ReflectionResult',
  $refStrategy: 'none',
});

export const RankingResultSchema = z.object({
  transcript: z.string(),
  rationale: z.string(),
  winner: z.enum(['A', 'B', 'draw', 'undetermined']),
  confidence: z.number().min(0).max(100),
});

export type RankingResult = z.infer<typeof RankingResultSchema>;

export const RankingResultJsonSchema = zodToJsonSchema(RankingResultSchema, {
  name: 'RankingResult',
  $refStrategy: 'none',
});

export const EvolutionResultSchema = z.object({
  hypotheses: z.array(HypothesisDraftSchema.extend({ strategy: EvolutionStrategySchema })).min(1),
});

export type EvolutionResult = z.infer<typeof EvolutionResultSchema>;

export const EvolutionResultJsonSchema = zodToJsonSchema(EvolutionResultSchema, {
  name: 'EvolutionResult',
  $refStrategy: 'none',
});

export const MetaReviewResultSchema = z.object({
  summary: z.string(),
  themes: z.array(z.string()),
  strengths: z.array(z.string()),
  recommendations: z.array(z.string()),
  hypothesisNotes: z.array(z.object({ hypothesisId: z.string(), note: z.string() })),
});

export type MetaReviewResult = z.infer<typeof MetaReviewResultSchema>;

export const MetaReviewResultJsonSchema = zodToJsonSchema(MetaReviewResultSchema, {
  name: 'MetaReviewResult',
  $refStrategy: 'none',
});
