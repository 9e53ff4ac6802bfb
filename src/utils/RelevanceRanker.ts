import { CandidateRecord, RankedCandidate, RankingOptions } from '../types'

export const RelevanceWeights = {
  nameMatch: 10,
  emailMatch: 5,
  skillMatch: 3,
  completeness: {
    name: 1,
    email: 1,
    phone: 1,
    perSkill: 0.2,
    maxSkills: 5,
  },
  defaultCompletenessCap: 3.5,
} as const

/**
 * Query terms: lower-cased words longer than three characters
 */
export function tokenizeQuery(query: string): string[] {
  return query
    .toLowerCase()
    .split(/\s+/)
    .filter((word) => word.length > 3)
}

/**
 * Ranks candidate records against a free-text query. Independent of the
 * fit score.
 */
export class RelevanceRanker {
  private readonly skillWeights: Map<string, number>
  private readonly completenessCap: number

  constructor(options: RankingOptions = {}) {
    this.skillWeights = new Map(
      Object.entries(options.skillWeights ?? {}).map(([skill, weight]) => [
        skill.toLowerCase(),
        weight,
      ])
    )
    this.completenessCap =
      options.completenessBonusCap ?? RelevanceWeights.defaultCompletenessCap
  }

  /**
   * Score and sort candidates, highest first. Equal scores keep their input
   * order. The input array is copied before scoring, so callers may keep
   * appending to their own collection while a ranking runs.
   */
  rank(
    candidates: readonly CandidateRecord[],
    query: string
  ): RankedCandidate[] {
    const snapshot = [...candidates]
    const terms = tokenizeQuery(query)

    return snapshot
      .map((candidate) => ({ candidate, score: this.score(candidate, terms) }))
      .sort((a, b) => b.score - a.score)
  }

  /**
   * Relevance score of one candidate for already tokenized query terms
   */
  score(candidate: CandidateRecord, terms: readonly string[]): number {
    let score = 0

    const name = candidate.name.toLowerCase()
    if (terms.some((term) => name.includes(term))) {
      score += RelevanceWeights.nameMatch
    }

    const email = candidate.email.toLowerCase()
    if (terms.some((term) => email.includes(term))) {
      score += RelevanceWeights.emailMatch
    }

    const skills = candidate.skills.map((skill) => skill.toLowerCase())
    for (const term of terms) {
      const matched = skills.find((skill) => skill.includes(term))
      if (matched !== undefined) {
        score += RelevanceWeights.skillMatch * (this.skillWeights.get(matched) ?? 1)
      }
    }

    return score + this.completenessBonus(candidate)
  }

  /**
   * Bonus for filled-in contact fields and up to five skills, capped
   */
  completenessBonus(candidate: CandidateRecord): number {
    const { completeness } = RelevanceWeights
    let bonus = 0
    if (candidate.name) bonus += completeness.name
    if (candidate.email) bonus += completeness.email
    if (candidate.phone) bonus += completeness.phone
    bonus +=
      Math.min(candidate.skills.length, completeness.maxSkills) *
      completeness.perSkill
    return Math.min(bonus, this.completenessCap)
  }
}
