import { PatternRegistry } from '../registry/PatternRegistry'
import { Limits } from '../utils/patterns'
import {
  containsAnyKeyword,
  containsKeyword,
  contextWindow,
  escapeRegExp,
  findAll,
  hasMatch,
  uniqueCaseInsensitive,
} from '../utils/text'

// A run of capitalized tokens on one line; '&' may stand alone
const NAME = `[A-Z][\\w&.'\\-]*(?:[ \\t]+(?:[A-Z][\\w&.'\\-]*|&))*`

function alternation(words: readonly string[]): string {
  return [...words]
    .sort((a, b) => b.length - a.length)
    .map((word) => escapeRegExp(word).replace(/ /g, '[ \\t-]?'))
    .join('|')
}

/**
 * Class for extracting employers and job titles from resume text
 */
export class EmploymentExtractor {
  private readonly titlePattern: RegExp
  private readonly companyPatterns: RegExp[]
  private readonly excludedWords: Set<string>
  private readonly titleWords: Set<string>
  private readonly skillNames: Set<string>

  constructor(private readonly registry: PatternRegistry) {
    const { seniority, domains, roles } = registry.jobTitles
    this.titlePattern = new RegExp(
      `(?<![A-Za-z])(?:(?:${alternation(seniority)})[ \\t]+)?` +
        `(?:(?:${alternation(domains)})[ \\t]+)?` +
        `(?:${alternation(roles)})(?![A-Za-z])`,
      'gi'
    )

    const suffixes = alternation(registry.companies.suffixes)
    this.companyPatterns = [
      new RegExp(`\\b(?:[Ww]ork(?:ed|ing)|[Ee]mployed)[ \\t]+(?:at|for|with)[ \\t]+(${NAME})`, 'g'),
      new RegExp(`\\b(?:at|At)[ \\t]+(${NAME})`, 'g'),
      new RegExp(`\\b(${NAME}[ \\t]+(?:${suffixes})\\b\\.?)`, 'g'),
    ]

    this.excludedWords = new Set(
      registry.companies.exclusions.map((word) => word.toLowerCase())
    )
    this.titleWords = new Set(
      [...registry.jobTitles.seniority, ...registry.jobTitles.roles].map((word) =>
        word.toLowerCase()
      )
    )
    this.skillNames = new Set(registry.skills.map((skill) => skill.toLowerCase()))
  }

  /**
   * Employer names in order of first mention, deduplicated case-insensitively
   */
  extractCompanies(text: string): string[] {
    const candidates: Array<{ index: number; name: string }> = []

    for (const pattern of this.companyPatterns) {
      for (const match of findAll(text, pattern)) {
        const captured = match[1] ?? ''
        candidates.push({
          index: match.index + match[0].indexOf(captured),
          name: captured,
        })
      }
    }
    candidates.push(...this.companiesFromPipeLines(text))

    const cleaned = candidates
      .sort((a, b) => a.index - b.index)
      .map((candidate) => this.cleanCompany(candidate.name))
      .filter((name) => this.isPlausibleCompany(name))

    return uniqueCaseInsensitive(cleaned).slice(0, Limits.companies)
  }

  /**
   * Qualified job titles ("Senior Software Engineer", "Data Analyst") found
   * near employment vocabulary. Case variants are kept as distinct titles.
   */
  extractJobTitles(text: string): string[] {
    const { exclusions, contextKeywords } = this.registry.jobTitles
    const titles: string[] = []

    for (const match of findAll(text, this.titlePattern)) {
      const title = match[0].trim().replace(/\s+/g, ' ')
      if (title.length < 3 || title.length > 50 || !title.includes(' ')) {
        continue
      }
      if (containsAnyKeyword(title, exclusions)) {
        continue
      }
      const context = contextWindow(
        text,
        match.index,
        match.index + match[0].length,
        Limits.titleContextRadius
      )
      if (!containsAnyKeyword(context, contextKeywords)) {
        continue
      }
      if (!titles.includes(title)) {
        titles.push(title)
      }
      if (titles.length >= Limits.jobTitles) {
        break
      }
    }

    return titles
  }

  /**
   * "Title | Company | 2015 - 2018" lines: the first capitalized, date-free
   * segment after a job title is the employer
   */
  private companiesFromPipeLines(text: string): Array<{ index: number; name: string }> {
    const found: Array<{ index: number; name: string }> = []
    let offset = 0

    for (const line of text.split('\n')) {
      const segments = line.split('|').map((segment) => segment.trim())
      const titleAt = segments.findIndex((segment) => hasMatch(segment, this.titlePattern))
      if (segments.length > 1 && titleAt !== -1) {
        const company = segments
          .slice(titleAt + 1)
          .find((segment) => /^[A-Z]/.test(segment) && !/\d{4}/.test(segment))
        if (company) {
          found.push({ index: offset + line.indexOf(company), name: company })
        }
      }
      offset += line.length + 1
    }

    return found
  }

  private cleanCompany(name: string): string {
    return name
      .replace(/\s*\n.*$/s, '')
      .replace(/\s*[|,\-–—]?\s*(?:\d{1,2}[/-])?\d{4}.*$/, '')
      .replace(/\s*\(.*?\)\s*/g, ' ')
      .replace(/[\s.,;:|\-–—&]+$/, '')
      .replace(/\s+/g, ' ')
      .trim()
  }

  private isPlausibleCompany(name: string): boolean {
    if (name.length < 3 || name.length > 50 || !/^[A-Z]/.test(name)) {
      return false
    }
    const lower = name.toLowerCase()
    if (this.skillNames.has(lower)) {
      return false
    }
    if (containsAnyKeyword(lower, this.registry.companies.institutionKeywords)) {
      return false
    }

    const words = lower.split(' ')
    if (words.some((word) => this.excludedWords.has(word) || this.titleWords.has(word))) {
      return false
    }
    // A bare suffix is not a company
    return !(
      words.length === 1 &&
      this.registry.companies.suffixes.some((suffix) => containsKeyword(lower, suffix))
    )
  }
}
