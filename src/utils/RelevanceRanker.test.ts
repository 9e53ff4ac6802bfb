import { describe, expect, it } from 'vitest'
import { CandidateRecord, EducationLevel } from '../types'
import { RelevanceRanker, tokenizeQuery } from './RelevanceRanker'

const record = (fields: Partial<CandidateRecord>): CandidateRecord => ({
  name: '',
  email: '',
  phone: '',
  location: '',
  skills: [],
  companies: [],
  jobTitles: [],
  educationLevel: EducationLevel.NotSpecified,
  certifications: [],
  yearsExperience: 0,
  sourceId: '',
  ...fields,
})

const candidateA = record({
  name: 'Alice Smith',
  email: 'alice@example.com',
  skills: ['Python', 'AWS', 'Docker'],
})

const candidateB = record({
  name: 'Python Expert',
  email: 'python@example.com',
  phone: '555-0100',
  skills: ['Python', 'JavaScript', 'React'],
})

describe('tokenizeQuery', () => {
  it('keeps lower-cased words longer than three characters', () => {
    expect(tokenizeQuery('  Python AWS Docker ')).toEqual(['python', 'docker'])
  })
})

describe('RelevanceRanker', () => {
  it('ranks name and email matches above skill-only matches', () => {
    const ranked = new RelevanceRanker().rank([candidateA, candidateB], 'Python AWS')

    expect(ranked.map((entry) => entry.candidate)).toEqual([candidateB, candidateA])
    expect(ranked[0].score).toBe(21.5)
    expect(ranked[1].score).toBeCloseTo(5.6)
  })

  it('caps the completeness bonus at 3.5', () => {
    const full = record({
      name: 'Jane Doe',
      email: 'jane@example.com',
      phone: '555-0100',
      skills: ['Python', 'Java', 'Ruby', 'PHP', 'Kotlin'],
    })

    expect(new RelevanceRanker().completenessBonus(full)).toBe(3.5)
    expect(new RelevanceRanker({ completenessBonusCap: 0 }).completenessBonus(full)).toBe(0)
  })

  it('keeps input order for equal scores', () => {
    const first = record({ name: 'Ann Lee' })
    const second = record({ name: 'Bob Ray' })
    const ranker = new RelevanceRanker()

    expect(ranker.rank([first, second], 'zzzz').map((entry) => entry.candidate)).toEqual([
      first,
      second,
    ])
    expect(ranker.rank([second, first], 'zzzz').map((entry) => entry.candidate)).toEqual([
      second,
      first,
    ])
  })

  it('multiplies skill matches by their weight', () => {
    const ranker = new RelevanceRanker({ skillWeights: { Python: 2 } })

    expect(ranker.score(candidateA, ['python'])).toBeCloseTo(8.6)
  })

  it('does not modify the input collection', () => {
    const candidates = [candidateA, candidateB]

    new RelevanceRanker().rank(candidates, 'Python')

    expect(candidates).toEqual([candidateA, candidateB])
  })

  it('returns an empty ranking for no candidates', () => {
    expect(new RelevanceRanker().rank([], 'Python')).toEqual([])
  })
})
