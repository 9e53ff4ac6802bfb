import { ContextPattern, PatternRule } from '../registry/PatternRegistry'
import { containsAnyKeyword, findAll } from './text'

export interface RuleHit {
  canonical: string
  index: number
  text: string
}

/**
 * Check the context gates of a single match. Required keywords must appear
 * around the match (not inside it); forbidden keywords are searched in the
 * whole window, match included, so phrases like "ms office" are caught.
 */
function passesContext(
  text: string,
  start: number,
  end: number,
  pattern: ContextPattern,
  window: number
): boolean {
  const from = Math.max(0, start - window)
  const to = Math.min(text.length, end + window)

  if (pattern.forbiddenContext.length > 0) {
    const full = text.substring(from, to).toLowerCase()
    if (containsAnyKeyword(full, pattern.forbiddenContext)) {
      return false
    }
  }

  if (pattern.requiredContext.length > 0) {
    const around = `${text.substring(from, start)} ${text.substring(end, to)}`.toLowerCase()
    if (!containsAnyKeyword(around, pattern.requiredContext)) {
      return false
    }
  }

  return true
}

/**
 * First accepted hit of a rule, or null
 */
export function matchRule(text: string, rule: PatternRule): RuleHit | null {
  let best: RuleHit | null = null
  for (const pattern of rule.patterns) {
    for (const match of findAll(text, pattern.regex)) {
      const end = match.index + match[0].length
      if (!passesContext(text, match.index, end, pattern, rule.contextWindow)) {
        continue
      }
      if (!best || match.index < best.index) {
        best = { canonical: rule.canonical, index: match.index, text: match[0] }
      }
      break
    }
  }
  return best
}

/**
 * Run every rule of a table over the text; hits come back in table order,
 * one per canonical name
 */
export function matchRules(
  text: string,
  rules: readonly PatternRule[]
): RuleHit[] {
  const hits: RuleHit[] = []
  const seen = new Set<string>()
  for (const rule of rules) {
    const key = rule.canonical.toLowerCase()
    if (seen.has(key)) {
      continue
    }
    const hit = matchRule(text, rule)
    if (hit) {
      hits.push(hit)
      seen.add(key)
    }
  }
  return hits
}

/**
 * True if any pattern of any rule occurs in the text, ignoring context gates
 */
export function mentionsAnyRule(
  text: string,
  rules: readonly PatternRule[]
): boolean {
  return rules.some((rule) =>
    rule.patterns.some((pattern) => findAll(text, pattern.regex).length > 0)
  )
}
