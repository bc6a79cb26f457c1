import { STOPWORDS } from '../../rules/bullet-selection.rules'

/**
 * Lowercase the text and turn every character that is not a lowercase
 * letter, digit or whitespace into a space. Word boundaries survive.
 */
export function normalizeText(text: string): string {
  return text.toLowerCase().replace(/[^a-z0-9\s]/g, ' ')
}

/**
 * Split text into lexical tokens in left-to-right order, dropping empties
 * and stopwords.
 *
 * Applying it to already normalized text gives the same result:
 * tokenize(normalizeText(x)) equals tokenize(x).
 */
export function tokenize(text: string): string[] {
  return normalizeText(text)
    .split(/\s+/)
    .filter((token) => token.length > 0 && !STOPWORDS.has(token))
}
