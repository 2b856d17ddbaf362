import { describe, it, expect, vi } from 'vitest';
import type { LlmClient } from '../llm/llm-client.js';
import { makeContext, makeGoal, makeHypothesis } from '../testing/fixtures.js';
import { createMetaReviewAgent } from './meta-review.js';

describe('createMetaReviewAgent', () => {
  it('should drop notes about hypotheses it was not shown', async () => {
    const llm: LlmClient = {
      invoke: vi.fn().mockResolvedValue({
        content: JSON.stringify({
          summary: 'Summary',
          themes: ['repair'],
          strengths: [],
          recommendations: ['Test h-1'],
          hypothesisNotes: [
            { hypothesisId: 'h-1', note: 'Leading' },
            { hypothesisId: 'h-9', note: 'Unknown' },
          ],
        }),
      }),
    };

    const result = await createMetaReviewAgent(llm).invoke(
      {
        goal: makeGoal(),
        subjects: [{ hypothesis: makeHypothesis('h-1'), rating: 1540.4, matchesPlayed: 6, reviews: [] }],
        final: true,
      },
      makeContext({ final: true }),
    );

    expect(result.overview.hypothesisNotes).toEqual([{ hypothesisId: 'h-1', note: 'Leading' }]);

    const calls = (llm.invoke as ReturnType<typeof vi.fn>).mock.calls as Array<
      [{ systemPrompt: string; userMessage: string }]
    >;
    expect(calls[0][0].systemPrompt).toContain('final overview');
    expect(calls[0][0].userMessage).toContain('Rating: 1540 after 6 matches');
  });
});
