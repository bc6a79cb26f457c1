/**
 * Job posting commands: filter, open, keywords.
 * Options arrive raw from the CLI parser and are validated here.
 */
import { Injectable } from '@nestjs/common'
import { JobsService } from './jobs.service'
import { FilterOptionsSchema, KeywordsOptionsSchema, OpenOptionsSchema, splitList } from './jobs.model'
import type { Posting } from './jobs.model'
import { countTokens } from '../../engines/keywords/keyword-extractor'
import envConfig from '../../shared/config'

export function formatPostingLine(posting: Posting): string {
  return `${posting.id}  ${posting.title} | ${posting.company} | ${posting.location}`
}

@Injectable()
export class JobsCommand {
  constructor(private readonly jobsService: JobsService) {}

  async filter(rawOptions: unknown): Promise<void> {
    const options = FilterOptionsSchema.parse(rawOptions)
    const postings = await this.jobsService.listPostings(options.jobs ?? envConfig.JOBS_CSV_PATH, {
      locations: splitList(options.locations, ';'),
      include: splitList(options.include, ','),
      exclude: splitList(options.exclude, ','),
    })

    if (postings.length === 0) {
      console.log('No postings match the filter.')
      return
    }

    for (const posting of postings) {
      console.log(formatPostingLine(posting))
    }
  }

  async open(rawOptions: unknown): Promise<void> {
    const options = OpenOptionsSchema.parse(rawOptions)
    const url = await this.jobsService.openPosting(options.jobs ?? envConfig.JOBS_CSV_PATH, options.jobId)
    console.log(`Opened ${url}`)
  }

  async keywords(rawOptions: unknown): Promise<void> {
    const options = KeywordsOptionsSchema.parse(rawOptions)
    const posting = await this.jobsService.getPostingById(options.jobs ?? envConfig.JOBS_CSV_PATH, options.jobId)
    const topK = options.topK ?? envConfig.SELECTION_KEYWORD_TOP_K

    for (const { token, count } of countTokens(posting.description).slice(0, topK)) {
      console.log(`${token}\t${count}`)
    }
  }
}
