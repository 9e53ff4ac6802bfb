import { describe, expect, it } from 'vitest'
import { createDefaultRegistry } from '../registry/PatternRegistry'
import { SkillsExtractor } from './SkillsExtractor'

const extractor = new SkillsExtractor(createDefaultRegistry())

describe('SkillsExtractor', () => {
  it('returns canonical names in order of first mention', () => {
    const text = 'Experienced in Python, React Native and machine learning. Used Go and git.'

    expect(extractor.extractSkills(text)).toEqual([
      'Python',
      'React Native',
      'Machine Learning',
      'Go',
      'Git',
    ])
  })

  it('maps aliases to the canonical skill', () => {
    expect(extractor.extractSkills('Deployed on K8s with Postgres')).toEqual([
      'Kubernetes',
      'PostgreSQL',
    ])
  })

  it('keeps case-sensitive skills from matching ordinary words', () => {
    expect(extractor.extractSkills('Ready to go, eager to excel')).toEqual([])
  })

  it('caps the list at ten skills', () => {
    const text = 'Python, Java, Ruby, PHP, Kotlin, Scala, Perl, Docker, Redis, Linux, Jira, Figma'

    expect(extractor.extractSkills(text)).toEqual([
      'Python',
      'Java',
      'Ruby',
      'PHP',
      'Kotlin',
      'Scala',
      'Perl',
      'Docker',
      'Redis',
      'Linux',
    ])
  })

  it('returns an empty list for empty text', () => {
    expect(extractor.extractSkills('')).toEqual([])
  })
})
