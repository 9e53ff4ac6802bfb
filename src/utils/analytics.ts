import { CandidateRecord, EducationLevel, ExperienceLevel } from '../types'
import { experienceLevel } from './filtering'

export interface SkillCount {
  skill: string
  count: number
}

export interface CandidateAnalytics {
  totalCandidates: number
  skills: SkillCount[]
  educationLevels: Record<EducationLevel, number>
  experienceLevels: Record<ExperienceLevel, number>
  withoutExperience: number
  averageYearsExperience: number
  // index = number of filled core fields (name, email, phone, skills)
  completeness: number[]
}

const emptyEducationCounts = (): Record<EducationLevel, number> => ({
  [EducationLevel.PhD]: 0,
  [EducationLevel.Masters]: 0,
  [EducationLevel.Bachelors]: 0,
  [EducationLevel.Associates]: 0,
  [EducationLevel.Diploma]: 0,
  [EducationLevel.NotSpecified]: 0,
})

const emptyExperienceCounts = (): Record<ExperienceLevel, number> => ({
  [ExperienceLevel.Entry]: 0,
  [ExperienceLevel.Mid]: 0,
  [ExperienceLevel.Senior]: 0,
  [ExperienceLevel.Expert]: 0,
})

/**
 * Aggregate statistics over a set of candidate records
 */
export function buildAnalytics(
  records: readonly CandidateRecord[]
): CandidateAnalytics {
  const skillCounts = new Map<string, number>()
  const educationLevels = emptyEducationCounts()
  const experienceLevels = emptyExperienceCounts()
  const completeness = [0, 0, 0, 0, 0]
  let withoutExperience = 0
  let totalYears = 0

  for (const record of records) {
    for (const skill of record.skills) {
      skillCounts.set(skill, (skillCounts.get(skill) ?? 0) + 1)
    }

    educationLevels[record.educationLevel] += 1

    const level = experienceLevel(record.yearsExperience)
    if (level) {
      experienceLevels[level] += 1
      totalYears += record.yearsExperience
    } else {
      withoutExperience += 1
    }

    const filled = [
      record.name,
      record.email,
      record.phone,
      record.skills.length > 0,
    ].filter(Boolean).length
    completeness[filled] += 1
  }

  // Map iteration follows first appearance; sort is stable
  const skills = Array.from(skillCounts, ([skill, count]) => ({ skill, count })).sort(
    (a, b) => b.count - a.count
  )

  const withExperience = records.length - withoutExperience

  return {
    totalCandidates: records.length,
    skills,
    educationLevels,
    experienceLevels,
    withoutExperience,
    averageYearsExperience: withExperience > 0 ? totalYears / withExperience : 0,
    completeness,
  }
}
