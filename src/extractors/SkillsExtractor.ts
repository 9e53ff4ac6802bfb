import { PatternRegistry } from '../registry/PatternRegistry'
import { Limits } from '../utils/patterns'
import { findAll } from '../utils/text'

/**
 * Class for matching resume text against the canonical skill vocabulary
 */
export class SkillsExtractor {
  constructor(private readonly registry: PatternRegistry) {}

  /**
   * Extract skills in order of first occurrence. Longer terms claim their
   * span first, so "Machine Learning" wins over a shorter overlapping term
   * and "React Native" is not also counted as "React".
   */
  extractSkills(text: string): string[] {
    const claimed: Array<[number, number]> = []
    const firstSeen = new Map<string, number>()

    const overlaps = (start: number, end: number) =>
      claimed.some(([from, to]) => start < to && end > from)

    for (const { skill, regex } of this.registry.skillTerms) {
      for (const match of findAll(text, regex)) {
        const start = match.index
        const end = start + match[0].length
        if (overlaps(start, end)) {
          continue
        }
        claimed.push([start, end])
        const previous = firstSeen.get(skill)
        if (previous === undefined || start < previous) {
          firstSeen.set(skill, start)
        }
      }
    }

    return [...firstSeen.entries()]
      .sort((a, b) => a[1] - b[1])
      .map(([skill]) => skill)
      .slice(0, Limits.skills)
  }
}
