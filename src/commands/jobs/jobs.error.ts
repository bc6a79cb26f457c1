import { NotFoundException, PreconditionFailedException, UnprocessableEntityException } from '@nestjs/common'

// Posting source file missing
export const JobsSourceNotFoundException = (source: string) =>
  new NotFoundException(`Job postings file not found: ${source}`)

// Header lacks one or more required columns
export const JobsMissingColumnsException = (source: string, missing: string[]) =>
  new UnprocessableEntityException(`Job postings file ${source} is missing required columns: ${missing.join(', ')}`)

// Unknown posting id
export const PostingNotFoundException = (jobId: string, source: string) =>
  new NotFoundException(`Job id "${jobId}" not found in ${source}`)

// `open` needs an external reference
export const PostingApplyUrlMissingException = (jobId: string) =>
  new PreconditionFailedException(`Job id "${jobId}" has no apply_url to open`)
