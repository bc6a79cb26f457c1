import { tokenize } from './tokenizer'

export interface TokenCount {
  token: string
  count: number
}

/**
 * Count distinct tokens of a text, ranked by descending count.
 *
 * Ties keep first-occurrence order: Map preserves insertion order and
 * Array.prototype.sort is stable, so equal counts never reorder.
 */
export function countTokens(text: string): TokenCount[] {
  const counts = new Map<string, number>()
  for (const token of tokenize(text)) {
    counts.set(token, (counts.get(token) ?? 0) + 1)
  }

  return Array.from(counts, ([token, count]) => ({ token, count })).sort((a, b) => b.count - a.count)
}

/**
 * Top `topK` most frequent distinct tokens of a posting description.
 * Empty text gives an empty list.
 */
export function extractKeywords(text: string, topK: number): string[] {
  if (topK <= 0) return []
  return countTokens(text)
    .slice(0, topK)
    .map((entry) => entry.token)
}
