import type { HypothesisContent } from '@agora/shared/src/types/hypothesis.types.js';

export function buildHypothesisEmbeddingText(content: HypothesisContent): string {
  const parts = [content.title, content.description, content.rationale ?? ''];
  return parts
    .map((p) => p.trim().replace(/\.+$/, ''))
    .filter((p) => p !== '')
    .join('. ');
}
