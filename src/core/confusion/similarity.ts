/**
 * Message Similarity
 *
 * Repetition is measured as token-set overlap (Jaccard index) between two
 * messages. Tokens are lower-cased runs of letters, digits and apostrophes,
 * so punctuation and casing do not hide a repeated question.
 */

const TOKEN_PATTERN = /[a-z0-9']+/g;

export function tokenize(text: string): Set<string> {
  return new Set(text.toLowerCase().match(TOKEN_PATTERN) ?? []);
}

/**
 * |a ∩ b| / |a ∪ b|. Two empty sets have similarity 0.
 */
export function jaccardSimilarity(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 && b.size === 0) {
    return 0;
  }

  let shared = 0;
  for (const token of a) {
    if (b.has(token)) {
      shared++;
    }
  }

  return shared / (a.size + b.size - shared);
}

/**
 * Highest similarity between `tokens` and any of `window`, or 0 for an empty window.
 */
export function maxSimilarity(
  tokens: ReadonlySet<string>,
  window: ReadonlyArray<ReadonlySet<string>>
): number {
  let best = 0;
  for (const previous of window) {
    best = Math.max(best, jaccardSimilarity(tokens, previous));
  }
  return best;
}
