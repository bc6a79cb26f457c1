import { z } from 'zod'

export const TailorOptionsSchema = z.object({
  jobId: z.string().trim().min(1),
  outDir: z.string().optional(),
  docx: z.boolean().default(false),
  perGroupCap: z.coerce.number().int().min(0).optional(),
  globalCap: z.coerce.number().int().min(0).optional(),
  jobs: z.string().optional(),
  profile: z.string().optional(),
})
export type TailorOptions = z.infer<typeof TailorOptionsSchema>

export interface TailorOutput {
  jobId: string
  resumePath: string
  coverLetterPath: string
  docxPath?: string
  fallback: boolean
  selectedCount: number
}

export function resumeFileName(jobId: string, extension: 'md' | 'docx'): string {
  return `resume_${safeFileSegment(jobId)}.${extension}`
}

export function coverLetterFileName(jobId: string): string {
  return `cover_letter_${safeFileSegment(jobId)}.txt`
}

/** Posting ids come from user CSVs; keep them from escaping the output dir. */
function safeFileSegment(value: string): string {
  return value.replace(/[\/\\<>:"|?*\x00-\x1F]/g, '_')
}
