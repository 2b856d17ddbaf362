import type { ResearchGoal } from '@agora/shared/src/types/goal.types.js';
import type { Hypothesis, Review } from '@agora/shared/src/types/hypothesis.types.js';

export function goalSection(goal: ResearchGoal): string {
  const lines = [`[RESEARCH_GOAL]\n${goal.text}`];
  const { evaluationCriteria, preferences, domain } = goal.constraints;
  if (domain) {
    lines.push(`[DOMAIN]\n${domain}`);
  }
  if (evaluationCriteria.length > 0) {
    lines.push(`[EVALUATION_CRITERIA]\n${evaluationCriteria.map((c) => `- ${c}`).join('\n')}`);
  }
  if (preferences.length > 0) {
    lines.push(`[PREFERENCES]\n${preferences.map((p) => `- ${p}`).join('\n')}`);
  }
  return lines.join('\n\n');
}

export function hypothesisSection(tag: string, hypothesis: Hypothesis): string {
  const { title, description, rationale } = hypothesis.content;
  return [
    `[${tag}]`,
    `Title: ${title}`,
    `Id: ${hypothesis.id}`,
    `Description: ${description}`,
    ...(rationale ? [`Rationale: ${rationale}`] : []),
  ].join('\n');
}

export function reviewsSection(reviews: readonly Review[]): string {
  if (reviews.length === 0) {
    return 'No reviews yet.';
  }
  return reviews
    .map(
      (r) =>
        `- overall ${String(r.overallScore)} (${r.recommendation}); strengths: ${r.critique.strengths.join('; ')}; weaknesses: ${r.critique.weaknesses.join('; ')}`,
    )
    .join('\n');
}

export function feedbackSection(feedback: readonly string[]): string {
  if (feedback.length === 0) {
    return '';
  }
  return `\n\n[SCIENTIST_FEEDBACK]\n${feedback.map((f) => `- ${f}`).join('\n')}`;
}
