export enum EducationLevel {
  PhD = 'PhD',
  Masters = "Master's",
  Bachelors = "Bachelor's",
  Associates = "Associate's",
  Diploma = 'Diploma',
  NotSpecified = 'Not Specified',
}

/**
 * Structured record built once per resume. Immutable after assembly.
 */
export interface CandidateRecord {
  readonly name: string
  readonly email: string
  readonly phone: string
  readonly location: string
  readonly skills: readonly string[]
  readonly companies: readonly string[]
  readonly jobTitles: readonly string[]
  readonly educationLevel: EducationLevel
  readonly certifications: readonly string[]
  readonly yearsExperience: number
  readonly sourceId: string
}

export type DateContext = 'work' | 'education' | 'ambiguous'

export type DateRangeOutcome =
  | 'counted'
  | 'education-context'
  | 'ambiguous-context'
  | 'implausible-year'
  | 'non-positive-duration'

export type DateRangeKind = 'month-name' | 'numeric' | 'year'

export interface ResolvedDateRange {
  kind: DateRangeKind
  text: string
  start: string
  end: string
  startYear: number
  endYear: number | null // null when open-ended (Present/Current/Now)
  index: number
  context: DateContext
  outcome: DateRangeOutcome
  duration: number
}

export interface ExperienceSummary {
  ranges: ResolvedDateRange[]
  yearsExperience: number
}

export interface FitScoreBreakdown {
  name: number
  email: number
  phone: number
  skills: number
  experience: number
  education: number
  certifications: number
}

export interface FitScoreResult {
  score: number
  breakdown: FitScoreBreakdown
  missingFields: string[]
}

export interface RankedCandidate {
  candidate: CandidateRecord
  score: number
}

export interface RankingOptions {
  skillWeights?: Record<string, number>
  completenessBonusCap?: number
}

export interface ProcessorOptions {
  verbose?: boolean
  minFitScore?: number
  currentYear?: number
}

export enum ExperienceLevel {
  Entry = 'Entry',
  Mid = 'Mid',
  Senior = 'Senior',
  Expert = 'Expert',
}
