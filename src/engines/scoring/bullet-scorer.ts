import type { Bullet } from '../../commands/profile/profile.model'
import { tokenize } from '../keywords/tokenizer'
import { TAG_MATCH_WEIGHT, TOKEN_MATCH_WEIGHT } from '../../rules/bullet-selection.rules'

/**
 * Relevance of one bullet against a keyword set.
 *
 * - each tag found in the set adds TAG_MATCH_WEIGHT
 * - each text token found in the set adds TOKEN_MATCH_WEIGHT
 *
 * Tags are lowercased only. Surrounding whitespace or punctuation on a tag
 * is kept, so "SQL " never matches "sql".
 */
export function scoreBullet(bullet: Bullet, keywords: ReadonlySet<string>): number {
  let score = 0

  for (const tag of bullet.tags) {
    if (keywords.has(tag.toLowerCase())) score += TAG_MATCH_WEIGHT
  }

  for (const token of tokenize(bullet.text)) {
    if (keywords.has(token)) score += TOKEN_MATCH_WEIGHT
  }

  return score
}
