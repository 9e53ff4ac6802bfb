import { PatternRegistry, PatternRule } from '../registry/PatternRegistry'
import { Limits, Patterns } from '../utils/patterns'
import { matchRules, mentionsAnyRule } from '../utils/ruleMatcher'
import { uniqueCaseInsensitive } from '../utils/text'
import { SectionExtractor } from './SectionExtractor'

/**
 * Class for extracting certifications: canonical names from the registry's
 * certification table, then free-form lines from a Certifications section
 */
export class CertificationExtractor {
  private readonly sectionExtractor = new SectionExtractor()

  constructor(private readonly registry: PatternRegistry) {}

  extractCertifications(text: string): string[] {
    const named = matchRules(text, this.registry.certifications).map(
      (hit) => hit.canonical
    )
    const captured = this.registry.certifications.filter((rule) =>
      named.includes(rule.canonical)
    )
    const generic = this.extractFromSection(text, captured)

    // Named hits come first, so they keep their place when the cap applies
    return uniqueCaseInsensitive([...named, ...generic]).slice(
      0,
      Limits.certifications
    )
  }

  /**
   * Lines of a Certifications/Credentials section shaped like
   * "Name – Issuer" or "Name (CODE)" that are not already represented by a
   * captured canonical certification
   */
  extractFromSection(
    text: string,
    captured: readonly PatternRule[] = []
  ): string[] {
    const sections = this.sectionExtractor.segmentIntoSections(text)
    const lines = sections.certifications ?? []
    const found: string[] = []

    for (const rawLine of lines) {
      const line = rawLine.replace(Patterns.bulletPoint, '').trim()
      if (line.length < 3) {
        continue
      }
      if (!Patterns.certificateLine.some((pattern) => pattern.test(line))) {
        continue
      }
      if (mentionsAnyRule(line, captured)) {
        continue
      }
      found.push(line)
    }

    return uniqueCaseInsensitive(found)
  }
}
