import { Patterns } from '../utils/patterns'

const SECTION_NAMES = [
  'certifications',
  'education',
  'experience',
  'skills',
  'projects',
  'summary',
  'references',
  'languages',
  'awards',
  'publications',
  'volunteer',
  'interests',
] as const satisfies ReadonlyArray<keyof typeof Patterns.sections>

export type SectionName = (typeof SECTION_NAMES)[number] | 'header'

export type Sections = Partial<Record<SectionName, string[]>>

/**
 * Class for splitting resume text into sections
 */
export class SectionExtractor {
  /**
   * Split text into sections based on common section headers. Lines before
   * the first header belong to 'header'; header lines themselves are dropped.
   */
  segmentIntoSections(text: string): Sections {
    const lines = text.split('\n')
    let currentSection: SectionName = 'header'
    const sections: Sections = { header: [] }

    for (const line of lines) {
      const trimmedLine = line.trim()
      if (!trimmedLine) {
        continue
      }

      const header = this.detectHeader(trimmedLine)
      if (header) {
        currentSection = header
        sections[currentSection] = sections[currentSection] ?? []
        continue
      }

      const bucket = sections[currentSection] ?? []
      bucket.push(trimmedLine)
      sections[currentSection] = bucket
    }

    return sections
  }

  /**
   * Name of the section a line opens, if it is a header
   */
  detectHeader(line: string): SectionName | null {
    // Section headers are short
    if (line.length >= 50) {
      return null
    }
    for (const sectionName of SECTION_NAMES) {
      if (Patterns.sections[sectionName].test(line)) {
        return sectionName
      }
    }
    return null
  }
}
