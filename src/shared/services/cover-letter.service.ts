import { Injectable } from '@nestjs/common'
import type { Posting } from '../../commands/jobs/jobs.model'
import type { Profile } from '../../commands/profile/profile.model'
import { extractKeywords } from '../../engines/keywords/keyword-extractor'
import { COVER_LETTER_KEYWORD_COUNT, COVER_LETTER_KEYWORD_TOP_K } from '../../rules/bullet-selection.rules'

export interface CoverLetter {
  text: string
  keywords: string[]
}

/** "a", "a and b", "a, b and c" */
export function joinWithAnd(items: string[]): string {
  if (items.length <= 1) return items.join('')
  return `${items.slice(0, -1).join(', ')} and ${items[items.length - 1]}`
}

@Injectable()
export class CoverLetterService {
  /**
   * Short templated letter. Keywords come from a narrower extraction pass
   * than the one used for bullet selection.
   */
  compose(profile: Profile, posting: Posting, keywordTopK: number = COVER_LETTER_KEYWORD_TOP_K): CoverLetter {
    const keywords = extractKeywords(posting.description, keywordTopK).slice(0, COVER_LETTER_KEYWORD_COUNT)
    const company = posting.company.trim() || 'Hiring'
    const title = posting.title.trim() || 'open'
    const location = posting.location.trim()

    const paragraphs: string[] = [`Dear ${company} Team,`]

    paragraphs.push(
      location
        ? `I am writing to apply for the ${title} position in ${location}.`
        : `I am writing to apply for the ${title} position.`,
    )

    const summary = profile.summary.trim()
    if (summary) paragraphs.push(summary)

    if (keywords.length > 0) {
      paragraphs.push(`The role's focus on ${joinWithAnd(keywords)} lines up closely with the work I have been doing.`)
    }

    const latest = profile.experiences[0]
    if (latest) {
      paragraphs.push(`Most recently I worked as ${latest.role} at ${latest.company}.`)
    }

    paragraphs.push('Thank you for your time and consideration.')
    paragraphs.push(`Sincerely,\n${profile.name}`)

    return { text: `${paragraphs.join('\n\n')}\n`, keywords }
  }
}
