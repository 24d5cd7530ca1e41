// Word tokens: letters, digits, combining marks and underscore
const TOKEN_PATTERN = /[\p{L}\p{N}\p{M}_]+/gu;

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN_PATTERN) ?? [];
}

/**
 * Relevance score of a text: for every keyword, how many tokens of the
 * text equal it. Matching is per token, so a keyword containing a space
 * ("hdfc bank") never matches; its single words score on their own when
 * they are keywords too.
 */
export function computeRelevance(text: unknown, keywords: readonly string[]): number {
  if (typeof text !== "string") return 0;

  const counts = new Map<string, number>();
  for (const token of tokenize(text)) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }

  let score = 0;
  for (const keyword of keywords) {
    score += counts.get(keyword.toLowerCase()) ?? 0;
  }
  return score;
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Pre-filter for titles: true when any keyword occurs anywhere in the
 * text, case-insensitively. Substring match, so "bank" also hits "banks".
 */
export function createKeywordFilter(keywords: readonly string[]): (title: string) => boolean {
  if (keywords.length === 0) return () => false;

  const pattern = new RegExp(keywords.map(escapeRegExp).join("|"), "i");
  return (title: string) => pattern.test(title);
}
