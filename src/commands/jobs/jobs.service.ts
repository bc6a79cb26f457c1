import { Injectable } from '@nestjs/common'
import { JobsRepo } from './jobs.repo'
import { PostingApplyUrlMissingException, PostingNotFoundException } from './jobs.error'
import type { Posting, PostingFilter } from './jobs.model'
import { BrowserService } from '../../shared/services/browser.service'
import { LoggerService } from '../../shared/services/logger.service'

@Injectable()
export class JobsService {
  constructor(
    private readonly jobsRepo: JobsRepo,
    private readonly browserService: BrowserService,
    private readonly logger: LoggerService,
  ) {}

  async listPostings(source: string, filter: PostingFilter): Promise<Posting[]> {
    const postings = await this.jobsRepo.findAllPostings(source)
    const matches = postings.filter((posting) => this.matchesFilter(posting, filter))

    this.logger.logInfo('Filtered postings', {
      service: 'JobsService',
      source,
      total: postings.length,
      matched: matches.length,
    })

    return matches
  }

  async getPostingById(source: string, jobId: string): Promise<Posting> {
    const postings = await this.jobsRepo.findAllPostings(source)
    const [posting, ...duplicates] = postings.filter((entry) => entry.id === jobId)

    if (!posting) {
      throw PostingNotFoundException(jobId, source)
    }

    // A blank CSV id takes its row number, which can collide with an explicit id
    if (duplicates.length > 0) {
      this.logger.logWarning('Several postings share this id, using the first', {
        service: 'JobsService',
        jobId,
        source,
        matches: duplicates.length + 1,
      })
    }

    return posting
  }

  async openPosting(source: string, jobId: string): Promise<string> {
    const posting = await this.getPostingById(source, jobId)

    if (!posting.applyUrl) {
      throw PostingApplyUrlMissingException(jobId)
    }

    await this.browserService.openUrl(posting.applyUrl)
    return posting.applyUrl
  }

  /**
   * Case-insensitive substring rules:
   * - include: title or description contains at least one term (no terms = pass)
   * - exclude: title and description contain none of the terms
   * - locations: location contains at least one entry (no entries = pass)
   */
  matchesFilter(posting: Posting, filter: PostingFilter): boolean {
    const haystack = `${posting.title}\n${posting.description}`.toLowerCase()
    const location = posting.location.toLowerCase()

    if (filter.include.length > 0 && !filter.include.some((term) => haystack.includes(term.toLowerCase()))) {
      return false
    }

    if (filter.exclude.some((term) => haystack.includes(term.toLowerCase()))) {
      return false
    }

    if (filter.locations.length > 0 && !filter.locations.some((entry) => location.includes(entry.toLowerCase()))) {
      return false
    }

    return true
  }
}
