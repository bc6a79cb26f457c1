import { z } from 'zod'

// CSV columns

export const REQUIRED_POSTING_COLUMNS = ['id', 'title', 'company', 'location', 'description'] as const
export const OPTIONAL_POSTING_COLUMNS = ['apply_url', 'source'] as const

export type PostingColumn = (typeof REQUIRED_POSTING_COLUMNS)[number] | (typeof OPTIONAL_POSTING_COLUMNS)[number]

// Posting

export interface Posting {
  /** Never empty: a blank CSV id is replaced by the row number */
  id: string
  title: string
  company: string
  location: string
  description: string
  applyUrl?: string
  source?: string
}

// Filter criteria

export interface PostingFilter {
  locations: string[]
  include: string[]
  exclude: string[]
}

/** Splits "a; b;;c" style CLI lists into trimmed, non-empty entries. */
export function splitList(value: string | undefined, separator: string): string[] {
  if (!value) return []
  return value
    .split(separator)
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
}

// CLI options

const JobSourceOptionsSchema = z.object({
  jobs: z.string().optional(),
})

export const FilterOptionsSchema = JobSourceOptionsSchema.extend({
  locations: z.string().optional(),
  include: z.string().optional(),
  exclude: z.string().optional(),
})
export type FilterOptions = z.infer<typeof FilterOptionsSchema>

export const OpenOptionsSchema = JobSourceOptionsSchema.extend({
  jobId: z.string().trim().min(1),
})
export type OpenOptions = z.infer<typeof OpenOptionsSchema>

export const KeywordsOptionsSchema = JobSourceOptionsSchema.extend({
  jobId: z.string().trim().min(1),
  topK: z.coerce.number().int().min(0).optional(),
})
export type KeywordsOptions = z.infer<typeof KeywordsOptionsSchema>
