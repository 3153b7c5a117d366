/**
 * Topical filter for discovered candidates. A candidate is relevant when its
 * text contains any keyword, ignoring case. An empty keyword list accepts
 * everything.
 */
export function matchKeyword(text: string, keywords: readonly string[]): string | null {
  const lower = text.toLowerCase();
  return keywords.find(k => lower.includes(k.toLowerCase())) ?? null;
}

export function isRelevant(text: string, keywords: readonly string[]): boolean {
  return keywords.length === 0 || matchKeyword(text, keywords) !== null;
}
