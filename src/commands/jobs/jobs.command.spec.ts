import { Test } from '@nestjs/testing'
import { ZodError } from 'zod'
import { JobsCommand, formatPostingLine } from './jobs.command'
import { JobsService } from './jobs.service'
import type { Posting } from './jobs.model'

const POSTING: Posting = {
  id: '42',
  title: 'Data Analyst',
  company: 'Contoso',
  location: 'Remote',
  description: 'SQL and Excel reporting. SQL dashboards.',
  applyUrl: 'https://jobs.example.com/42',
}

describe('JobsCommand', () => {
  let command: JobsCommand
  let log: jest.SpyInstance
  const jobsService = {
    listPostings: jest.fn<Promise<Posting[]>, [string, unknown]>(),
    getPostingById: jest.fn<Promise<Posting>, [string, string]>(),
    openPosting: jest.fn<Promise<string>, [string, string]>(),
  }

  beforeEach(async () => {
    jest.clearAllMocks()
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined)

    const moduleRef = await Test.createTestingModule({
      providers: [JobsCommand, { provide: JobsService, useValue: jobsService }],
    }).compile()

    command = moduleRef.get(JobsCommand)
  })

  afterEach(() => {
    jest.restoreAllMocks()
  })

  it('formats one line per posting', () => {
    expect(formatPostingLine(POSTING)).toBe('42  Data Analyst | Contoso | Remote')
  })

  it('splits filter lists on their separators', async () => {
    jobsService.listPostings.mockResolvedValue([POSTING])

    await command.filter({ jobs: 'jobs.csv', locations: 'Austin; Remote;', include: 'sql, excel', exclude: '' })

    expect(jobsService.listPostings).toHaveBeenCalledWith('jobs.csv', {
      locations: ['Austin', 'Remote'],
      include: ['sql', 'excel'],
      exclude: [],
    })
    expect(log).toHaveBeenCalledWith('42  Data Analyst | Contoso | Remote')
  })

  it('says so when nothing matches', async () => {
    jobsService.listPostings.mockResolvedValue([])

    await command.filter({ jobs: 'jobs.csv' })

    expect(log).toHaveBeenCalledTimes(1)
    expect(log).toHaveBeenCalledWith('No postings match the filter.')
  })

  it('prints the opened URL', async () => {
    jobsService.openPosting.mockResolvedValue('https://jobs.example.com/42')

    await command.open({ jobs: 'jobs.csv', jobId: ' 42 ' })

    expect(jobsService.openPosting).toHaveBeenCalledWith('jobs.csv', '42')
    expect(log).toHaveBeenCalledWith('Opened https://jobs.example.com/42')
  })

  it('prints ranked keyword counts', async () => {
    jobsService.getPostingById.mockResolvedValue(POSTING)

    await command.keywords({ jobs: 'jobs.csv', jobId: '42', topK: '2' })

    expect(log.mock.calls).toEqual([['sql\t2'], ['excel\t1']])
  })

  it('rejects a blank job id', async () => {
    await expect(command.open({ jobs: 'jobs.csv', jobId: '' })).rejects.toBeInstanceOf(ZodError)
    expect(jobsService.openPosting).not.toHaveBeenCalled()
  })
})
