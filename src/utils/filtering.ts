import { CandidateRecord, EducationLevel, ExperienceLevel } from '../types'

export interface CandidateFilter {
  name?: string
  skill?: string
  experienceLevel?: ExperienceLevel
  educationLevel?: EducationLevel
}

/**
 * Bucket for a years-of-experience figure. Zero means no experience was
 * detected and has no bucket here; analytics counts it separately.
 */
export const experienceLevel = (years: number): ExperienceLevel | null => {
  if (years <= 0) return null
  if (years <= 2) return ExperienceLevel.Entry
  if (years <= 5) return ExperienceLevel.Mid
  if (years <= 10) return ExperienceLevel.Senior
  return ExperienceLevel.Expert
}

/**
 * Keep the records matching every given criterion. Name and skill match as
 * case-insensitive substrings; order is preserved.
 */
const filterCandidates = (
  records: readonly CandidateRecord[],
  criteria: CandidateFilter
): CandidateRecord[] => {
  const name = criteria.name?.trim().toLowerCase()
  const skill = criteria.skill?.trim().toLowerCase()

  return records.filter((record) => {
    if (name && !record.name.toLowerCase().includes(name)) {
      return false
    }
    if (
      skill &&
      !record.skills.some((candidateSkill) =>
        candidateSkill.toLowerCase().includes(skill)
      )
    ) {
      return false
    }
    // Entry spans 0-2 years, so records without detected experience match it
    if (
      criteria.experienceLevel &&
      (experienceLevel(record.yearsExperience) ?? ExperienceLevel.Entry) !==
        criteria.experienceLevel
    ) {
      return false
    }
    if (criteria.educationLevel && record.educationLevel !== criteria.educationLevel) {
      return false
    }
    return true
  })
}

export { filterCandidates }
