import { describe, expect, it } from 'vitest'
import { createDefaultRegistry } from '../registry/PatternRegistry'
import { ExperienceExtractor } from './ExperienceExtractor'

const extractor = new ExperienceExtractor(createDefaultRegistry(), { currentYear: 2024 })

describe('ExperienceExtractor', () => {
  it('sums work-context ranges', () => {
    const text = [
      'Software Engineer | Company A | 2015 - 2018',
      'Senior Engineer | Company B | 2018 - 2022',
    ].join('\n')

    expect(extractor.extractYearsOfExperience(text)).toBe(7)
  })

  it('never counts education dates', () => {
    const text = "Bachelor's Degree | University XYZ | 2011 - 2015"
    const { ranges, yearsExperience } = extractor.resolveDateRanges(text)

    expect(yearsExperience).toBe(0)
    expect(ranges).toHaveLength(1)
    expect(ranges[0]).toMatchObject({
      context: 'education',
      outcome: 'education-context',
      duration: 0,
    })
  })

  it('excludes ranges without work or education vocabulary', () => {
    const { ranges, yearsExperience } = extractor.resolveDateRanges('Volunteer trip 2010 - 2012')

    expect(yearsExperience).toBe(0)
    expect(ranges[0].context).toBe('ambiguous')
    expect(ranges[0].outcome).toBe('ambiguous-context')
  })

  it('resolves open-ended ranges against the current year', () => {
    const { ranges, yearsExperience } = extractor.resolveDateRanges(
      'Engineer at Acme Inc, Jan 2020 - Present'
    )

    expect(yearsExperience).toBe(4)
    expect(ranges).toEqual([
      {
        kind: 'month-name',
        text: 'Jan 2020 - Present',
        start: 'Jan 2020',
        end: 'Present',
        startYear: 2020,
        endYear: null,
        index: 22,
        context: 'work',
        outcome: 'counted',
        duration: 4,
      },
    ])
  })

  it('accepts "to" between month-name dates', () => {
    expect(extractor.extractYearsOfExperience('Developer, Mar 2016 to Dec 2019')).toBe(3)
  })

  it('reads numeric month/year ranges', () => {
    const { ranges } = extractor.resolveDateRanges('Analyst 06/2017 - 08/2020')

    expect(ranges.map((range) => [range.kind, range.duration])).toEqual([['numeric', 3]])
  })

  it('rejects implausible start years', () => {
    const { ranges, yearsExperience } = extractor.resolveDateRanges('Engineer 1940 - 1945')

    expect(yearsExperience).toBe(0)
    expect(ranges[0].outcome).toBe('implausible-year')
  })

  it('drops ranges that end before they start', () => {
    const { ranges } = extractor.resolveDateRanges('Engineer 2020 - 2018')

    expect(ranges[0].outcome).toBe('non-positive-duration')
  })

  it('clamps the total to fifty years', () => {
    expect(extractor.extractYearsOfExperience('Engineer 1960 - 2020')).toBe(50)
  })

  it('counts overlapping positions separately', () => {
    const text = 'Engineer 2016 - 2020\nConsultant 2018 - 2020'

    expect(extractor.extractYearsOfExperience(text)).toBe(6)
  })

  it('classifies context with education taking precedence', () => {
    const text = 'Teaching assistant at the university while working as a developer'

    expect(extractor.classifyContext(text, 0, 8)).toBe('education')
    expect(extractor.classifyContext('Worked as a developer', 0, 6)).toBe('work')
    expect(extractor.classifyContext('Travelled', 0, 9)).toBe('ambiguous')
  })

  it('returns zero for text without dates', () => {
    expect(extractor.extractYearsOfExperience('')).toBe(0)
  })
})
