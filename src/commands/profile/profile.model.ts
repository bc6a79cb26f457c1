import { z } from 'zod'

/** Separates bullet text from its comma-separated tag list in the string form. */
export const TAG_MARKER = '||'

// Bullet

export interface Bullet {
  text: string
  tags: string[]
}

/**
 * "Cut onboarding time by 30% || onboarding, process" →
 * { text: 'Cut onboarding time by 30%', tags: ['onboarding', 'process'] }
 */
export function parseTaggedBullet(raw: string): Bullet {
  const markerIndex = raw.indexOf(TAG_MARKER)
  if (markerIndex === -1) {
    return { text: raw.trim(), tags: [] }
  }

  const tags = raw
    .slice(markerIndex + TAG_MARKER.length)
    .split(',')
    .map((tag) => tag.trim())
    .filter((tag) => tag.length > 0)

  return { text: raw.slice(0, markerIndex).trim(), tags }
}

export const BulletSchema = z.union([
  z.string().transform(parseTaggedBullet),
  z.object({
    text: z.string(),
    tags: z.array(z.string()).default([]),
  }),
])

// Experience

export const ExperienceSchema = z.object({
  role: z.string(),
  company: z.string(),
  start: z.coerce.string().default(''),
  end: z.coerce.string().default(''),
  bullets: z.array(BulletSchema).default([]),
})
export type Experience = z.infer<typeof ExperienceSchema>

// Profile

export const ProfileSchema = z.object({
  name: z.string(),
  contact: z.record(z.string(), z.coerce.string()).default({}),
  summary: z.string().default(''),
  skills: z.array(z.string()).default([]),
  experiences: z.array(ExperienceSchema).default([]),
  education: z.array(z.string()).default([]),
  projects: z.array(z.string()).default([]),
})
export type Profile = z.infer<typeof ProfileSchema>
