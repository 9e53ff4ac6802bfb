/**
 * Text helpers shared by the extractors
 */

const keywordPatternCache = new Map<string, RegExp>()

/**
 * Normalize raw extracted text: unify line endings, turn exotic whitespace
 * into plain spaces and drop zero-width characters. Line structure is kept.
 */
export function normalizeText(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .replace(/[\u200b-\u200d\ufeff]/g, '')
    .replace(/[\t\u00a0\u2000-\u200a\u202f\u205f\u3000]/g, ' ')
    .split('\n')
    .map((line) => line.replace(/ +$/, ''))
    .join('\n')
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * Lower-cased slice of text around [start, end), `radius` characters each side
 */
export function contextWindow(
  text: string,
  start: number,
  end: number,
  radius: number
): string {
  const from = Math.max(0, start - radius)
  const to = Math.min(text.length, end + radius)
  return text.substring(from, to).toLowerCase()
}

/**
 * Whole-word, case-insensitive keyword test. Keywords may contain spaces,
 * dots or apostrophes.
 */
export function containsKeyword(text: string, keyword: string): boolean {
  const key = keyword.toLowerCase()
  let pattern = keywordPatternCache.get(key)
  if (!pattern) {
    pattern = new RegExp(
      `(?<![a-z0-9])${escapeRegExp(key)}(?![a-z0-9])`,
      'i'
    )
    keywordPatternCache.set(key, pattern)
  }
  return pattern.test(text)
}

export function containsAnyKeyword(
  text: string,
  keywords: readonly string[]
): boolean {
  return keywords.some((keyword) => containsKeyword(text, keyword))
}

export function countKeywords(
  text: string,
  keywords: readonly string[]
): number {
  return keywords.filter((keyword) => containsKeyword(text, keyword)).length
}

/**
 * Keep the first occurrence of each value, comparing case-insensitively
 */
export function uniqueCaseInsensitive(values: Iterable<string>): string[] {
  const seen = new Set<string>()
  const result: string[] = []
  for (const value of values) {
    const trimmed = value.trim()
    const key = trimmed.toLowerCase()
    if (!trimmed || seen.has(key)) {
      continue
    }
    seen.add(key)
    result.push(trimmed)
  }
  return result
}

export function toTitleCase(value: string): string {
  return value
    .split(/\s+/)
    .filter((word) => word)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ')
}

/**
 * Iterate all matches of a pattern, whatever flags it was compiled with
 */
export function findAll(text: string, pattern: RegExp): RegExpExecArray[] {
  const flags = pattern.flags.includes('g') ? pattern.flags : pattern.flags + 'g'
  const global = new RegExp(pattern.source, flags)
  const matches: RegExpExecArray[] = []
  let match: RegExpExecArray | null
  while ((match = global.exec(text)) !== null) {
    matches.push(match)
    if (match[0].length === 0) {
      global.lastIndex++
    }
  }
  return matches
}

/**
 * Stateless test: shared patterns may carry the `g` flag, whose lastIndex
 * would otherwise leak between calls
 */
export function hasMatch(text: string, pattern: RegExp): boolean {
  return new RegExp(pattern.source, pattern.flags.replace('g', '')).test(text)
}
