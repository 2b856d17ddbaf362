import { describe, it, expect, vi } from 'vitest';
import type { LlmClient } from '../llm/llm-client.js';
import { makeContext, makeGoal, makeHypothesis, makeReview } from '../testing/fixtures.js';
import { createRankingAgent } from './ranking.js';

function mockLlm(content: unknown): LlmClient {
  return { invoke: vi.fn().mockResolvedValue({ content: JSON.stringify(content) }) };
}

const input = {
  goal: makeGoal(),
  hypothesisA: makeHypothesis('h-1'),
  hypothesisB: makeHypothesis('h-2'),
  reviewsA: [makeReview('h-1')],
  reviewsB: [],
};

describe('createRankingAgent', () => {
  it('should normalise the verdict and confidence', async () => {
    const llm = mockLlm({ transcript: 'Debate', rationale: 'A is sharper', winner: 'A', confidence: 75 });

    const result = await createRankingAgent(llm).invoke(input, makeContext());

    expect(result).toEqual({
      winner: 'a',
      confidence: 0.75,
      rationale: 'A is sharper',
      transcript: 'Debate',
    });
  });

  it('should pass an undetermined verdict through', async () => {
    const llm = mockLlm({ transcript: '', rationale: 'Tied', winner: 'undetermined', confidence: 10 });

    const result = await createRankingAgent(llm).invoke(input, makeContext());

    expect(result.winner).toBe('undetermined');
  });

  it('should present both hypotheses with their reviews', async () => {
    const llm = mockLlm({ transcript: '', rationale: '', winner: 'draw', confidence: 50 });

    await createRankingAgent(llm).invoke(input, makeContext());

    const calls = (llm.invoke as ReturnType<typeof vi.fn>).mock.calls as Array<[{ userMessage: string }]>;
    const message = calls[0][0].userMessage;
    expect(message).toContain('[HYPOTHESIS_A]\nTitle: Title h-1');
    expect(message).toContain('[HYPOTHESIS_B]\nTitle: Title h-2');
    expect(message).toContain('overall 6.6 (accept)');
    expect(message).toContain('No reviews yet.');
  });
});
