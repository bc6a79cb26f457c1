import { NotFoundException, UnprocessableEntityException } from '@nestjs/common'
import type { ZodIssue } from 'zod'

// Profile file missing
export const ProfileNotFoundException = (source: string) => new NotFoundException(`Profile file not found: ${source}`)

// Not parseable as JSON / YAML
export const ProfileUnreadableException = (source: string, reason: string) =>
  new UnprocessableEntityException(`Profile file ${source} could not be parsed: ${reason}`)

// Parsed, but fails the profile schema
export const ProfileInvalidException = (source: string, issues: ZodIssue[]) =>
  new UnprocessableEntityException(
    `Profile file ${source} is invalid: ${issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')}`,
  )
