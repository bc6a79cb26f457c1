import { Injectable } from '@nestjs/common'
import type { Posting } from '../../commands/jobs/jobs.model'
import type { Bullet, Experience, Profile } from '../../commands/profile/profile.model'
import { extractKeywords } from '../keywords/keyword-extractor'
import { scoreBullet } from '../scoring/bullet-scorer'
import {
  DEFAULT_GLOBAL_CAP,
  DEFAULT_PER_GROUP_CAP,
  FALLBACK_BULLETS_PER_GROUP,
  SELECTION_KEYWORD_TOP_K,
} from '../../rules/bullet-selection.rules'
import { LoggerService } from '../../shared/services/logger.service'

/**
 * BULLET SELECTION ENGINE
 *
 * Picks the bullets a tailored resume shows for one posting.
 *
 * Phases:
 * 1. Per-group: every experience keeps its top `perGroupCap` bullets by
 *    score, zero scores included, so each experience reaches the pool
 * 2. Global: the pool is ranked by score; only positive, not yet seen
 *    (company, text) pairs are kept, up to `globalCap`
 * 3. Fallback: when phase 2 keeps nothing, the first two bullets of each
 *    experience in profile order, up to `globalCap`. Picks still carry
 *    their real score, which can be positive when `perGroupCap` is 0
 *
 * All sorts break ties on original position, so output is deterministic.
 * Caps are not validated: a cap of 0 suppresses that phase's output.
 */

// =============================================================================
// TYPES
// =============================================================================

export interface SelectionOptions {
  perGroupCap?: number
  globalCap?: number
  keywordTopK?: number
}

export interface SelectedBullet {
  experience: Experience
  bullet: Bullet
  score: number
}

export interface SelectionResult {
  /** Keyword set used for scoring, most frequent first */
  keywords: string[]
  /** Selected pairs in keep order */
  items: SelectedBullet[]
  /** True when no bullet scored above zero */
  fallback: boolean
}

// =============================================================================
// HELPERS
// =============================================================================

/** Score descending, then input position ascending. */
function rankByScore<T extends { score: number }>(entries: T[]): T[] {
  return entries
    .map((entry, position) => ({ entry, position }))
    .sort((a, b) => b.entry.score - a.entry.score || a.position - b.position)
    .map(({ entry }) => entry)
}

export function bulletIdentity(experience: Experience, bullet: Bullet): string {
  return JSON.stringify([experience.company, bullet.text])
}

// =============================================================================
// ENGINE
// =============================================================================

@Injectable()
export class BulletSelectionEngine {
  constructor(private readonly logger: LoggerService) {}

  select(profile: Profile, posting: Posting, options: SelectionOptions = {}): SelectionResult {
    const perGroupCap = options.perGroupCap ?? DEFAULT_PER_GROUP_CAP
    const globalCap = options.globalCap ?? DEFAULT_GLOBAL_CAP
    const keywordTopK = options.keywordTopK ?? SELECTION_KEYWORD_TOP_K

    const keywords = extractKeywords(posting.description, keywordTopK)
    const keywordSet = new Set(keywords)

    const pool = this.selectPerGroup(profile, keywordSet, perGroupCap)
    let items = this.selectGlobal(pool, globalCap)
    const fallback = items.length === 0
    if (fallback) {
      items = this.selectFallback(profile, keywordSet, globalCap)
    }

    this.logger.logDebug('Bullet selection complete', {
      service: 'BulletSelectionEngine',
      jobId: posting.id,
      keywords,
      poolSize: pool.length,
      fallback,
      picks: items.map((item) => ({ company: item.experience.company, text: item.bullet.text, score: item.score })),
    })

    return { keywords, items, fallback }
  }

  /**
   * Top `cap` bullets of each experience by score, experiences in profile
   * order. Zero-score bullets are kept.
   */
  selectPerGroup(profile: Profile, keywords: ReadonlySet<string>, cap: number): SelectedBullet[] {
    const pool: SelectedBullet[] = []

    for (const experience of profile.experiences) {
      const scored = experience.bullets.map((bullet) => ({
        experience,
        bullet,
        score: scoreBullet(bullet, keywords),
      }))
      pool.push(...rankByScore(scored).slice(0, cap))
    }

    return pool
  }

  /**
   * Positive-score candidates by score, first occurrence of each
   * (company, text) identity, at most `cap`.
   */
  selectGlobal(pool: SelectedBullet[], cap: number): SelectedBullet[] {
    const kept: SelectedBullet[] = []
    const seen = new Set<string>()

    for (const candidate of rankByScore(pool)) {
      if (kept.length >= cap) break
      if (candidate.score <= 0) continue

      const identity = bulletIdentity(candidate.experience, candidate.bullet)
      if (seen.has(identity)) continue

      seen.add(identity)
      kept.push(candidate)
    }

    return kept
  }

  /**
   * First FALLBACK_BULLETS_PER_GROUP bullets of each experience in profile
   * order, at most `cap`. Scores do not affect the choice.
   */
  selectFallback(profile: Profile, keywords: ReadonlySet<string>, cap: number): SelectedBullet[] {
    const kept: SelectedBullet[] = []
    const seen = new Set<string>()

    for (const experience of profile.experiences) {
      for (const bullet of experience.bullets.slice(0, FALLBACK_BULLETS_PER_GROUP)) {
        if (kept.length >= cap) return kept

        const identity = bulletIdentity(experience, bullet)
        if (seen.has(identity)) continue

        seen.add(identity)
        kept.push({ experience, bullet, score: scoreBullet(bullet, keywords) })
      }
    }

    return kept
  }
}
