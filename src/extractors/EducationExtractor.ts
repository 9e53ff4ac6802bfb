import { PatternRegistry } from '../registry/PatternRegistry'
import { EducationLevel } from '../types'
import { matchRule } from '../utils/ruleMatcher'

/**
 * Class for detecting the highest education level mentioned in a resume
 */
export class EducationExtractor {
  constructor(private readonly registry: PatternRegistry) {}

  /**
   * Highest-ranked level with at least one keyword hit. Levels are tried
   * from the top, so the first hit is the answer.
   */
  extractEducationLevel(text: string): EducationLevel {
    for (const { level, rules } of this.registry.educationLevels) {
      if (rules.some((rule) => matchRule(text, rule) !== null)) {
        return level
      }
    }
    return EducationLevel.NotSpecified
  }
}
