import { ProfileSchema, parseTaggedBullet } from './profile.model'

describe('profile model', () => {
  describe('parseTaggedBullet', () => {
    it('returns plain text with no tags when the marker is absent', () => {
      expect(parseTaggedBullet('  Shipped the billing rewrite ')).toEqual({
        text: 'Shipped the billing rewrite',
        tags: [],
      })
    })

    it('splits text from a comma-separated tag list', () => {
      expect(parseTaggedBullet('Cut onboarding time by 30% || onboarding, Process ,, ')).toEqual({
        text: 'Cut onboarding time by 30%',
        tags: ['onboarding', 'Process'],
      })
    })

    it('splits on the first marker only', () => {
      expect(parseTaggedBullet('A || b || c')).toEqual({ text: 'A', tags: ['b || c'] })
    })
  })

  describe('ProfileSchema', () => {
    it('accepts string and structured bullets and fills defaults', () => {
      const profile = ProfileSchema.parse({
        name: 'Pat Example',
        experiences: [
          {
            role: 'Analyst',
            company: 'Acme',
            start: 2019,
            bullets: ['Built reports || excel', { text: 'Automated exports' }, { text: 'Ran audits', tags: ['audit'] }],
          },
        ],
      })

      expect(profile).toEqual({
        name: 'Pat Example',
        contact: {},
        summary: '',
        skills: [],
        experiences: [
          {
            role: 'Analyst',
            company: 'Acme',
            start: '2019',
            end: '',
            bullets: [
              { text: 'Built reports', tags: ['excel'] },
              { text: 'Automated exports', tags: [] },
              { text: 'Ran audits', tags: ['audit'] },
            ],
          },
        ],
        education: [],
        projects: [],
      })
    })

    it('rejects an experience without a company', () => {
      const result = ProfileSchema.safeParse({ name: 'Pat', experiences: [{ role: 'Analyst' }] })

      expect(result.success).toBe(false)
      if (!result.success) {
        expect(result.error.issues.map((issue) => issue.path.join('.'))).toEqual(['experiences.0.company'])
      }
    })
  })
})
