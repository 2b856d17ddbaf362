import { describe, it, expect } from 'vitest';
import { validateFeedback, validateOrchestrationConfig, validateResearchGoal } from './validators.js';
import { SchemaValidationError } from '@agora/shared/src/utils/errors.js';

describe('validateOrchestrationConfig', () => {
  it('should fill every section with defaults from an empty object', () => {
    const config = validateOrchestrationConfig({});

    expect(config.workers.concurrency).toBe(4);
    expect(config.workers.retryLimit).toBe(3);
    expect(config.workers.applyAttemptLimit).toBe(3);
    expect(config.tournament.initialRating).toBe(1500);
    expect(config.tournament.kTiers).toEqual([
      { maxMatches: 5, k: 32 },
      { maxMatches: 15, k: 24 },
    ]);
    expect(config.tournament.kFloor).toBe(16);
    expect(config.convergence.stableCycles).toBe(3);
    expect(config.proximity.dedupThreshold).toBeUndefined();
    expect(config.weights.compare).toBe(1.5);
  });

  it('should keep explicit values next to defaults in the same section', () => {
    const config = validateOrchestrationConfig({ workers: { concurrency: 1 } });

    expect(config.workers.concurrency).toBe(1);
    expect(config.workers.taskTimeoutMs).toBe(120_000);
  });

  it('should reject a hard limit below the soft limit', () => {
    expect(() =>
      validateOrchestrationConfig({ queue: { softLimit: 10, hardLimit: 5 } }),
    ).toThrow(SchemaValidationError);
  });

  it('should reject a final reserve that consumes the whole budget', () => {
    expect(() =>
      validateOrchestrationConfig({ budget: { maxInvocations: 2, finalReserve: 2 } }),
    ).toThrow(SchemaValidationError);
  });

  it('should reject a similarity threshold above 1', () => {
    expect(() =>
      validateOrchestrationConfig({ proximity: { similarityThreshold: 1.5 } }),
    ).toThrow(SchemaValidationError);
  });

  it('should include the path of each invalid field', () => {
    try {
      validateOrchestrationConfig({ workers: { concurrency: 0 } });
      expect.fail('Should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(SchemaValidationError);
      expect((error as SchemaValidationError).validationErrors[0]).toMatch(
        /^workers\.concurrency: /,
      );
    }
  });
});

describe('validateResearchGoal', () => {
  it('should trim the text and default the constraints', () => {
    const goal = validateResearchGoal({ text: '  Explain antibiotic tolerance in biofilms  ' });

    expect(goal.text).toBe('Explain antibiotic tolerance in biofilms');
    expect(goal.constraints).toEqual({ evaluationCriteria: [], preferences: [] });
  });

  it('should reject a goal that is too short', () => {
    expect(() => validateResearchGoal({ text: 'short' })).toThrow(SchemaValidationError);
  });
});

describe('validateFeedback', () => {
  it('should default the action to a comment', () => {
    expect(validateFeedback({ text: 'Consider persister cells' })).toEqual({
      text: 'Consider persister cells',
      action: 'comment',
    });
  });

  it('should require a target hypothesis for a reject action', () => {
    try {
      validateFeedback({ text: 'Not plausible', action: 'reject' });
      expect.fail('Should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(SchemaValidationError);
      expect((error as SchemaValidationError).validationErrors).toEqual([
        'targetHypothesisId: A reject action needs a target hypothesis',
      ]);
    }
  });

  it('should reject a revised goal that is too short', () => {
    expect(() => validateFeedback({ text: 'Narrow it', revisedGoal: { text: 'short' } })).toThrow(
      SchemaValidationError,
    );
  });
});
