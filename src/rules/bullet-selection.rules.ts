/**
 * BULLET SELECTION CONFIGURATION
 * PURPOSE: LEXICAL RELEVANCE OF RESUME BULLETS TO A JOB POSTING
 *
 * =============================================================================
 * SCORING MODEL
 * =============================================================================
 *
 * Selection is lexical and frequency-based:
 * 1. The posting description is tokenized and the most frequent tokens become
 *    the keyword set
 * 2. Each bullet scores TAG_MATCH_WEIGHT per tag found in the keyword set and
 *    TOKEN_MATCH_WEIGHT per text token found in the keyword set
 * 3. Bullets are capped per experience first, then merged, deduplicated and
 *    capped globally
 *
 * NO SEMANTIC MATCHING - a synonym that never appears in the posting scores 0.
 *
 * =============================================================================
 */

// =============================================================================
// TOKENIZER
// =============================================================================

/**
 * Closed list of English function words dropped by the tokenizer.
 * Changing this list changes every score, so extend it with care.
 */
export const STOPWORDS: ReadonlySet<string> = new Set([
  'a',
  'an',
  'the',
  'and',
  'or',
  'but',
  'if',
  'of',
  'at',
  'by',
  'for',
  'with',
  'about',
  'to',
  'from',
  'in',
  'into',
  'on',
  'as',
  'is',
  'are',
  'was',
  'were',
  'be',
  'been',
  'this',
  'that',
  'these',
  'those',
  'it',
  'its',
  'we',
  'our',
  'you',
  'your',
  'they',
  'their',
  'will',
  'can',
  'not',
  'no',
  'so',
  'than',
  'then',
  'such',
])

// =============================================================================
// SCORING WEIGHTS
// =============================================================================

/**
 * A tag is a label someone attached to the bullet on purpose, so a tag hit
 * outweighs an incidental word overlap.
 */
export const TAG_MATCH_WEIGHT = 3

export const TOKEN_MATCH_WEIGHT = 1

// =============================================================================
// SELECTION LIMITS
// =============================================================================

export const DEFAULT_PER_GROUP_CAP = 3

export const DEFAULT_GLOBAL_CAP = 12

/**
 * Keyword set width used for selection. Wider than the cover letter pass:
 * more candidate tokens give the scorer more signal.
 */
export const SELECTION_KEYWORD_TOP_K = 60

/**
 * Number of bullets taken from the top of each experience when no bullet
 * scores above zero.
 */
export const FALLBACK_BULLETS_PER_GROUP = 2

// =============================================================================
// COVER LETTER
// =============================================================================

/** Narrow keyword pass over the same description. */
export const COVER_LETTER_KEYWORD_TOP_K = 20

/** Keywords interpolated into the cover letter body. */
export const COVER_LETTER_KEYWORD_COUNT = 10
