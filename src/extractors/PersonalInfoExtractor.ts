import { PatternRegistry } from '../registry/PatternRegistry'
import { Limits, Patterns } from '../utils/patterns'
import {
  containsAnyKeyword,
  contextWindow,
  findAll,
  toTitleCase,
} from '../utils/text'

const YEAR_RANGE =
  /\b(?:19|20)\d{2}\s*[-–—]\s*(?:(?:19|20)\d{2}|present|current|now)\b/gi

/**
 * Class for extracting the header-zone fields of a resume: name, email,
 * phone and location
 */
export class PersonalInfoExtractor {
  constructor(private readonly registry: PatternRegistry) {}

  /**
   * Extract the candidate name from the first lines of the text, falling
   * back to the source filename
   */
  extractName(text: string, sourceFilename: string): string {
    const lines = text.split('\n').slice(0, Limits.nameScanLines)

    for (const rawLine of lines) {
      const line = rawLine.trim().replace(/\s+/g, ' ')
      if (this.isNameLine(line)) {
        return line
      }
    }

    return this.nameFromFilename(sourceFilename)
  }

  /**
   * Clean a filename into a name: drop the extension, resume keywords,
   * digits and punctuation, then title-case what is left
   */
  nameFromFilename(sourceFilename: string): string {
    const base = sourceFilename.replace(/^.*[\\/]/, '').replace(/\.[^.]*$/, '')
    const noise = new Set(this.registry.filenameNoise.map((word) => word.toLowerCase()))

    const words = base
      .replace(/[-_.]+/g, ' ')
      .replace(/[^\p{L}\s']/gu, ' ')
      .split(/\s+/)
      .filter((word) => word && !noise.has(word.toLowerCase()))

    return toTitleCase(words.join(' '))
  }

  extractEmail(text: string): string {
    const match = text.match(Patterns.email)
    if (!match) {
      return ''
    }
    const [local, domain] = match[0].split('@')
    return `${local}@${domain.toLowerCase()}`
  }

  /**
   * First phone-like match across the priority-ordered patterns, skipping
   * anything that is part of a year range
   */
  extractPhone(text: string): string {
    const yearRanges = findAll(text, YEAR_RANGE).map((match) => ({
      start: match.index,
      end: match.index + match[0].length,
    }))

    for (const pattern of Patterns.phone) {
      for (const match of findAll(text, pattern)) {
        const phone = match[0].trim()
        const start = match.index
        const end = start + match[0].length
        if (Patterns.yearLike.test(phone)) {
          continue
        }
        if (yearRanges.some((range) => start < range.end && end > range.start)) {
          continue
        }
        return phone
      }
    }

    return ''
  }

  /**
   * "City, Region" or "City, Country" from the header zone, rejecting
   * technology terms and matches surrounded by technology vocabulary
   */
  extractLocation(text: string): string {
    const header = text.substring(0, Limits.headerZoneChars)
    const { techTerms, techContextPhrases } = this.registry.location
    const techLower = new Set(techTerms.map((term) => term.toLowerCase()))
    const roleWords = new Set(
      [...this.registry.jobTitles.roles, ...this.registry.jobTitles.seniority].map(
        (word) => word.toLowerCase()
      )
    )

    const candidates = Patterns.location
      .flatMap((pattern) => findAll(header, pattern))
      .sort((a, b) => a.index - b.index)

    for (const match of candidates) {
      const city = match[1]
      const region = match[2]
      const tokens = `${city} ${region}`.toLowerCase().split(/\s+/)

      if (techLower.has(city.toLowerCase()) || techLower.has(region.toLowerCase())) {
        continue
      }
      if (tokens.some((token) => roleWords.has(token))) {
        continue
      }

      const context = contextWindow(
        header,
        match.index,
        match.index + match[0].length,
        Limits.locationContextRadius
      )
      if (
        containsAnyKeyword(context, techTerms) ||
        containsAnyKeyword(context, techContextPhrases)
      ) {
        continue
      }

      return `${city}, ${region}`
    }

    return ''
  }

  private isNameLine(line: string): boolean {
    if (line.length < 3 || line.includes('@')) {
      return false
    }

    const tokens = line.split(' ')
    if (tokens.length < 1 || tokens.length > 4) {
      return false
    }
    if (!tokens.every((token) => Patterns.nameToken.test(token))) {
      return false
    }

    const blocklist = new Set(this.registry.nameBlocklist.map((word) => word.toLowerCase()))
    const lower = line.toLowerCase()
    if (blocklist.has(lower)) {
      return false
    }
    return !tokens.some((token) => blocklist.has(token.toLowerCase()))
  }
}
