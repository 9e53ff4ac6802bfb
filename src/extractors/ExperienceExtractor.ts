import { PatternRegistry } from '../registry/PatternRegistry'
import {
  DateContext,
  DateRangeOutcome,
  ExperienceSummary,
  ResolvedDateRange,
} from '../types'
import { Limits } from '../utils/patterns'
import { contextWindow, countKeywords, findAll } from '../utils/text'

const OPEN_END = /^(?:present|current|now)$/i

interface DateRangeMatch {
  kind: ResolvedDateRange['kind']
  text: string
  start: string
  end: string
  index: number
}

/**
 * Experience date resolver.
 *
 * Finds date ranges, classifies each by the keywords around it and sums the
 * ranges that sit in a work context. Education and ambiguous contexts are
 * never counted. Ranges are summed independently, so overlapping positions
 * (two jobs held at once) are counted twice; callers that need
 * overlap-aware totals should merge the `ranges` themselves.
 */
export class ExperienceExtractor {
  private readonly currentYear: number

  constructor(
    private readonly registry: PatternRegistry,
    options: { currentYear?: number } = {}
  ) {
    this.currentYear = options.currentYear ?? new Date().getFullYear()
  }

  /**
   * Total years of work experience, clamped to [0, 50]
   */
  extractYearsOfExperience(text: string): number {
    return this.resolveDateRanges(text).yearsExperience
  }

  /**
   * Every date range found in the text with its classification and outcome
   */
  resolveDateRanges(text: string): ExperienceSummary {
    const ranges = this.discover(text).map((match) => this.resolve(text, match))

    const total = ranges
      .filter((range) => range.outcome === 'counted')
      .reduce((sum, range) => sum + range.duration, 0)

    return {
      ranges,
      yearsExperience: Math.min(Math.max(total, 0), Limits.maxYearsExperience),
    }
  }

  /**
   * Tagged classification of the ~100 characters either side of a match.
   * Education vocabulary wins over work vocabulary.
   */
  classifyContext(text: string, index: number, length: number): DateContext {
    const context = contextWindow(text, index, index + length, Limits.dateContextRadius)
    if (countKeywords(context, this.registry.educationContext) > 0) {
      return 'education'
    }
    if (countKeywords(context, this.registry.workContext) > 0) {
      return 'work'
    }
    return 'ambiguous'
  }

  /**
   * Apply the registry's date patterns, most specific first. A span already
   * claimed by an earlier pattern is not discovered again, so
   * "Jan 2018 - Present" is not also read as "2018 - Present".
   */
  private discover(text: string): DateRangeMatch[] {
    const found: DateRangeMatch[] = []
    for (const { kind, regex } of this.registry.dateRanges) {
      for (const match of findAll(text, regex)) {
        const index = match.index
        const endIndex = index + match[0].length
        const overlaps = found.some(
          (other) => index < other.index + other.text.length && endIndex > other.index
        )
        if (overlaps || match[1] === undefined || match[2] === undefined) {
          continue
        }
        found.push({ kind, text: match[0], start: match[1], end: match[2], index })
      }
    }
    return found.sort((a, b) => a.index - b.index)
  }

  private resolve(text: string, match: DateRangeMatch): ResolvedDateRange {
    const context = this.classifyContext(text, match.index, match.text.length)
    const startYear = this.yearOf(match.start) ?? 0
    const openEnded = OPEN_END.test(match.end.trim())
    const endYear = openEnded ? null : this.yearOf(match.end)
    const duration = (endYear ?? this.currentYear) - startYear

    let outcome: DateRangeOutcome
    if (context === 'education') {
      outcome = 'education-context'
    } else if (context === 'ambiguous') {
      outcome = 'ambiguous-context'
    } else if (
      startYear < Limits.earliestPlausibleYear ||
      startYear > this.currentYear
    ) {
      outcome = 'implausible-year'
    } else if (duration <= 0) {
      outcome = 'non-positive-duration'
    } else {
      outcome = 'counted'
    }

    return {
      kind: match.kind,
      text: match.text,
      start: match.start,
      end: match.end,
      startYear,
      endYear,
      index: match.index,
      context,
      outcome,
      duration: outcome === 'counted' ? duration : 0,
    }
  }

  private yearOf(token: string): number | null {
    const year = token.match(/\d{4}/)
    return year ? parseInt(year[0], 10) : null
  }
}
