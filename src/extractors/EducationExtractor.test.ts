import { describe, expect, it } from 'vitest'
import { createDefaultRegistry } from '../registry/PatternRegistry'
import { EducationLevel } from '../types'
import { EducationExtractor } from './EducationExtractor'

const extractor = new EducationExtractor(createDefaultRegistry())

describe('EducationExtractor', () => {
  it('picks the highest level mentioned', () => {
    const text = "PhD in Physics, 2020\nBachelor's in Mathematics, 2014"

    expect(extractor.extractEducationLevel(text)).toBe(EducationLevel.PhD)
  })

  it('reads spelled-out degrees', () => {
    expect(extractor.extractEducationLevel('Master of Science in Data Engineering')).toBe(
      EducationLevel.Masters
    )
    expect(extractor.extractEducationLevel("Associate's degree in Nursing")).toBe(
      EducationLevel.Associates
    )
  })

  it('accepts abbreviations next to education vocabulary', () => {
    expect(extractor.extractEducationLevel('B.S. Computer Science, State University')).toBe(
      EducationLevel.Bachelors
    )
  })

  it('ignores abbreviations without education context', () => {
    expect(extractor.extractEducationLevel('Tools: MS Office, Jira')).toBe(
      EducationLevel.NotSpecified
    )
    expect(extractor.extractEducationLevel('Certified Scrum Master')).toBe(
      EducationLevel.NotSpecified
    )
  })

  it('falls back to Not Specified', () => {
    expect(extractor.extractEducationLevel('')).toBe(EducationLevel.NotSpecified)
  })
})
