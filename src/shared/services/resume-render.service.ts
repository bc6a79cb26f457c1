import { Injectable } from '@nestjs/common'
import type { Experience, Profile } from '../../commands/profile/profile.model'
import type { SelectedBullet } from '../../engines/selection/bullet-selection.engine'

export interface ResumeLayoutExperience {
  role: string
  company: string
  dates: string
  bullets: string[]
}

export interface ResumeLayout {
  name: string
  contactLine: string
  summary: string
  skills: string[]
  experiences: ResumeLayoutExperience[]
  education: string[]
  projects: string[]
}

function escapeHtml(s: string) {
  return String(s ?? '')
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
}

function formatDates(experience: Experience): string {
  const start = experience.start.trim()
  const end = experience.end.trim()
  if (start && end) return `${start} – ${end}`
  return start || end
}

/**
 * ResumeRenderService
 *
 * Turns a selection into a resume layout, then into Markdown (written to
 * disk) or HTML (fed to the DOCX exporter).
 *
 * Experiences appear in the order their first bullet was selected; bullets
 * keep selection order inside each experience.
 */
@Injectable()
export class ResumeRenderService {
  buildLayout(profile: Profile, items: SelectedBullet[]): ResumeLayout {
    const grouped = new Map<Experience, ResumeLayoutExperience>()

    for (const { experience, bullet } of items) {
      let entry = grouped.get(experience)
      if (!entry) {
        entry = {
          role: experience.role,
          company: experience.company,
          dates: formatDates(experience),
          bullets: [],
        }
        grouped.set(experience, entry)
      }
      entry.bullets.push(bullet.text)
    }

    return {
      name: profile.name,
      contactLine: Object.values(profile.contact)
        .map((value) => value.trim())
        .filter((value) => value.length > 0)
        .join(' | '),
      summary: profile.summary.trim(),
      skills: profile.skills,
      experiences: Array.from(grouped.values()),
      education: profile.education,
      projects: profile.projects,
    }
  }

  toMarkdown(layout: ResumeLayout): string {
    const blocks: string[] = []

    blocks.push(layout.contactLine ? `# ${layout.name}\n${layout.contactLine}` : `# ${layout.name}`)

    if (layout.summary) {
      blocks.push(`## Summary\n${layout.summary}`)
    }
    if (layout.skills.length > 0) {
      blocks.push(`## Skills\n${layout.skills.join(', ')}`)
    }
    if (layout.experiences.length > 0) {
      blocks.push('## Experience')
      for (const experience of layout.experiences) {
        const heading = experience.dates
          ? `### ${experience.role} — ${experience.company} (${experience.dates})`
          : `### ${experience.role} — ${experience.company}`
        blocks.push([heading, ...experience.bullets.map((bullet) => `- ${bullet}`)].join('\n'))
      }
    }
    if (layout.education.length > 0) {
      blocks.push(['## Education', ...layout.education.map((line) => `- ${line}`)].join('\n'))
    }
    if (layout.projects.length > 0) {
      blocks.push(['## Projects', ...layout.projects.map((line) => `- ${line}`)].join('\n'))
    }

    return `${blocks.join('\n\n')}\n`
  }

  toHtml(layout: ResumeLayout): string {
    const safe = (s: string) => escapeHtml(s || '')
    const list = (lines: string[]) => `<ul>${lines.map((line) => `<li>${safe(line)}</li>`).join('')}</ul>`
    const parts: string[] = []

    parts.push(`<h1>${safe(layout.name)}</h1>`)
    if (layout.contactLine) parts.push(`<p>${safe(layout.contactLine)}</p>`)
    if (layout.summary) parts.push(`<h2>Summary</h2><p>${safe(layout.summary)}</p>`)
    if (layout.skills.length > 0) parts.push(`<h2>Skills</h2><p>${safe(layout.skills.join(', '))}</p>`)
    if (layout.experiences.length > 0) {
      parts.push('<h2>Experience</h2>')
      for (const experience of layout.experiences) {
        const dates = experience.dates ? ` (${safe(experience.dates)})` : ''
        parts.push(`<h3>${safe(experience.role)} — ${safe(experience.company)}${dates}</h3>`)
        parts.push(list(experience.bullets))
      }
    }
    if (layout.education.length > 0) parts.push(`<h2>Education</h2>${list(layout.education)}`)
    if (layout.projects.length > 0) parts.push(`<h2>Projects</h2>${list(layout.projects)}`)

    return [
      '<!DOCTYPE html>',
      '<html>',
      `<head><meta charset="utf-8"><title>${safe(layout.name)}</title></head>`,
      `<body>${parts.join('')}</body>`,
      '</html>',
    ].join('\n')
  }
}
