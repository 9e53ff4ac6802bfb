import { describe, expect, it } from 'vitest'
import { SectionExtractor } from './SectionExtractor'

const extractor = new SectionExtractor()

describe('SectionExtractor', () => {
  it('groups lines under their headers', () => {
    const text = [
      'Jane Doe',
      '',
      'Technical Skills:',
      'Python, Docker',
      'Work Experience',
      'Engineer at Acme Corp',
      'Licenses & Certifications',
      'PMP',
    ].join('\n')

    expect(extractor.segmentIntoSections(text)).toEqual({
      header: ['Jane Doe'],
      skills: ['Python, Docker'],
      experience: ['Engineer at Acme Corp'],
      certifications: ['PMP'],
    })
  })

  it('recognises closing sections after certifications', () => {
    expect(extractor.detectHeader('Languages')).toBe('languages')
    expect(extractor.detectHeader('Honors & Awards')).toBe('awards')
    expect(extractor.detectHeader('Achievements:')).toBe('awards')
    expect(extractor.detectHeader('Publications')).toBe('publications')
    expect(extractor.detectHeader('Volunteer Experience')).toBe('volunteer')
    expect(extractor.detectHeader('Hobbies and Interests')).toBe('interests')
  })

  it('only treats short whole lines as headers', () => {
    expect(extractor.detectHeader('Education')).toBe('education')
    expect(extractor.detectHeader('Education and outreach volunteer')).toBeNull()
  })
})
