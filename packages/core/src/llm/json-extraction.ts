type Strategy = (text: string) => { readonly value: unknown } | undefined;

function tryParse(text: string): { readonly value: unknown } | undefined {
  try {
    return { value: JSON.parse(text) };
  } catch {
    return undefined;
  }
}

const FENCE = /```(?:json)?\s*\n?([\s\S]*?)\n?\s*```/;

const CLOSERS: Readonly<Record<string, string>> = { '{': '}', '[': ']' };

/**
 * Scans from the first `{` or `[` to its balanced closer, skipping brackets
 * inside string literals.
 */
function balancedSpan(text: string): string | undefined {
  const start = text.search(/[[{]/);
  if (start === -1) {
    return undefined;
  }
  const open = text[start];
  const close = CLOSERS[open];

  let depth = 0;
  let inString = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (ch === '\\') {
        i++;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }
    if (ch === '"') {
      inString = true;
    } else if (ch === open) {
      depth++;
    } else if (ch === close && --depth === 0) {
      return text.slice(start, i + 1);
    }
  }
  return undefined;
}

const strategies: readonly Strategy[] = [
  (text) => tryParse(text),
  (text) => {
    const fenced = FENCE.exec(text)?.[1];
    return fenced ? tryParse(fenced.trim()) : undefined;
  },
  (text) => {
    const span = balancedSpan(text);
    return span ? tryParse(span) : undefined;
  },
];

/**
 * Pulls a JSON value out of model output that may wrap it in a markdown
 * fence or surrounding prose.
 */
export function extractJson(content: string): unknown {
  const trimmed = content.trim();
  for (const strategy of strategies) {
    const found = strategy(trimmed);
    if (found) {
      return found.value;
    }
  }
  throw new SyntaxError(`Failed to extract JSON from content: ${trimmed.slice(0, 100)}`);
}
