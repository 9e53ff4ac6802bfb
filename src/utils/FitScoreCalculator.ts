import {
  CandidateRecord,
  EducationLevel,
  FitScoreBreakdown,
  FitScoreResult,
} from '../types'

const INVALID_NAME_PATTERNS = [
  /\bCERTIFICATE\b/,
  /\bRESUME\b/,
  /\bCV\b/,
  /\bCURRICULUM\b/,
  /\bVITAE\b/,
  /\bAPPLICATION\b/,
  /\bPAGE \d+\b/,
  /^\d+$/,
]

/**
 * Category caps. They sum to 100.
 */
export const FitScoreWeights = {
  name: 10,
  email: 10,
  phone: 10,
  skills: 20,
  experience: 25,
  education: 15,
  certifications: 10,
} as const

/**
 * Utility class to calculate the 0-100 profile completeness ("fit") score
 * of a candidate record
 */
export class FitScoreCalculator {
  private minFitScore: number

  constructor(options: { minFitScore?: number } = {}) {
    this.minFitScore = options.minFitScore ?? 50
  }

  /**
   * Calculate the fit score of a record. Each category is capped before the
   * categories are summed; no rounding is applied.
   */
  calculate(record: CandidateRecord): FitScoreResult {
    const missingFields: string[] = []

    const breakdown: FitScoreBreakdown = {
      name: FitScoreCalculator.isValidName(record.name) ? FitScoreWeights.name : 0,
      email: record.email ? FitScoreWeights.email : 0,
      phone: record.phone ? FitScoreWeights.phone : 0,
      skills: Math.min(FitScoreWeights.skills, record.skills.length * 2),
      experience: Math.min(
        FitScoreWeights.experience,
        Math.max(0, record.yearsExperience) * 2.5
      ),
      education:
        record.educationLevel !== EducationLevel.NotSpecified
          ? FitScoreWeights.education
          : 0,
      certifications: Math.min(
        FitScoreWeights.certifications,
        record.certifications.length * 2
      ),
    }

    for (const [field, value] of Object.entries(breakdown)) {
      if (value === 0) {
        missingFields.push(field)
      }
    }

    const score =
      breakdown.name +
      breakdown.email +
      breakdown.phone +
      breakdown.skills +
      breakdown.experience +
      breakdown.education +
      breakdown.certifications

    return { score, breakdown, missingFields }
  }

  /**
   * Check if a record scores at least the minimum fit score. Records below
   * it are kept but flagged for manual review.
   */
  meetsThreshold(result: FitScoreResult): boolean {
    return result.score >= this.minFitScore
  }

  getMinFitScore(): number {
    return this.minFitScore
  }

  setMinFitScore(threshold: number): void {
    if (threshold < 0 || threshold > 100) {
      throw new RangeError('Fit score threshold must be between 0 and 100')
    }

    this.minFitScore = threshold
  }

  /**
   * A name counts when it has at least 3 characters and is not a document
   * heading picked up by mistake
   */
  static isValidName(name: string): boolean {
    const trimmed = name.trim()
    if (trimmed.length < 3) {
      return false
    }
    const upper = trimmed.toUpperCase()
    return !INVALID_NAME_PATTERNS.some((pattern) => pattern.test(upper))
  }
}
