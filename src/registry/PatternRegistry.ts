import * as fs from 'fs'
import { DateRangeKind, EducationLevel } from '../types'
import { RegistryError } from '../utils/errors'
import { escapeRegExp } from '../utils/text'
import defaultRegistryData from './default-registry.json'
import { PatternRuleData, RegistryData, registrySchema } from './schema'

export interface ContextPattern {
  regex: RegExp
  requiredContext: readonly string[]
  forbiddenContext: readonly string[]
}

/**
 * One row of a table-driven matcher: a canonical name, the patterns that
 * produce it and the context keywords that gate each hit.
 */
export interface PatternRule {
  canonical: string
  patterns: readonly ContextPattern[]
  contextWindow: number
}

export interface SkillTerm {
  skill: string
  term: string
  regex: RegExp
}

export interface DateRangePattern {
  kind: DateRangeKind
  regex: RegExp
}

export interface EducationLevelRules {
  level: EducationLevel
  rules: readonly PatternRule[]
}

export interface PatternRegistry {
  readonly version: string
  readonly skills: readonly string[]
  /** Every skill name and alias, longest first */
  readonly skillTerms: readonly SkillTerm[]
  readonly certifications: readonly PatternRule[]
  /** Highest rank first */
  readonly educationLevels: readonly EducationLevelRules[]
  readonly workContext: readonly string[]
  readonly educationContext: readonly string[]
  /** Most specific first */
  readonly dateRanges: readonly DateRangePattern[]
  readonly nameBlocklist: readonly string[]
  readonly filenameNoise: readonly string[]
  readonly location: {
    readonly techTerms: readonly string[]
    readonly techContextPhrases: readonly string[]
  }
  readonly companies: {
    readonly suffixes: readonly string[]
    readonly exclusions: readonly string[]
    readonly institutionKeywords: readonly string[]
  }
  readonly jobTitles: {
    readonly seniority: readonly string[]
    readonly domains: readonly string[]
    readonly roles: readonly string[]
    readonly exclusions: readonly string[]
    readonly contextKeywords: readonly string[]
  }
}

export const EDUCATION_RANK: readonly EducationLevel[] = [
  EducationLevel.PhD,
  EducationLevel.Masters,
  EducationLevel.Bachelors,
  EducationLevel.Associates,
  EducationLevel.Diploma,
]

const DATE_KIND_ORDER: readonly DateRangeKind[] = ['month-name', 'numeric', 'year']

const DEFAULT_CONTEXT_WINDOW = 80

function compile(source: string, flags: string, where: string): RegExp {
  try {
    return new RegExp(source, flags)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new RegistryError(`Invalid pattern in ${where}: ${reason}`)
  }
}

function compileRule(
  canonical: string,
  rule: PatternRuleData,
  defaultWindow: number,
  where: string
): PatternRule {
  const flags = rule.caseSensitive ? 'g' : 'gi'
  const patterns = rule.patterns.map((pattern): ContextPattern => {
    if (typeof pattern === 'string') {
      return {
        regex: compile(pattern, flags, where),
        requiredContext: rule.requiredContext ?? [],
        forbiddenContext: rule.forbiddenContext ?? [],
      }
    }
    return {
      regex: compile(pattern.source, flags, where),
      requiredContext: pattern.requiredContext ?? rule.requiredContext ?? [],
      forbiddenContext:
        pattern.forbiddenContext ?? rule.forbiddenContext ?? [],
    }
  })

  return {
    canonical,
    patterns,
    contextWindow: rule.contextWindow ?? defaultWindow,
  }
}

function compileSkillTerms(data: RegistryData): SkillTerm[] {
  const terms: SkillTerm[] = []
  for (const skill of data.skills) {
    const flags = skill.caseSensitive ? 'g' : 'gi'
    for (const term of [skill.name, ...(skill.aliases ?? [])]) {
      terms.push({
        skill: skill.name,
        term,
        regex: compile(
          `(?<![A-Za-z0-9])${escapeRegExp(term)}(?![A-Za-z0-9])`,
          flags,
          `skill "${skill.name}"`
        ),
      })
    }
  }
  // Array#sort is stable, so equal-length terms keep registry order
  return terms.sort((a, b) => b.term.length - a.term.length)
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !(value instanceof RegExp)) {
    for (const child of Object.values(value)) {
      deepFreeze(child)
    }
    Object.freeze(value)
  }
  return value
}

/**
 * Validate raw registry data and compile it into an immutable registry
 */
export function createPatternRegistry(data: unknown): PatternRegistry {
  const parsed = registrySchema.safeParse(data)
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new RegistryError(`Invalid pattern registry: ${issues}`)
  }
  const registry = parsed.data

  const educationLevels = [...registry.educationLevels]
    .sort(
      (a, b) => EDUCATION_RANK.indexOf(a.level) - EDUCATION_RANK.indexOf(b.level)
    )
    .map((entry) => ({
      level: entry.level,
      rules: entry.rules.map((rule) =>
        compileRule(entry.level, rule, DEFAULT_CONTEXT_WINDOW, `education level "${entry.level}"`)
      ),
    }))

  const dateRanges = [...registry.dateRanges]
    .sort(
      (a, b) => DATE_KIND_ORDER.indexOf(a.kind) - DATE_KIND_ORDER.indexOf(b.kind)
    )
    .map((entry) => ({
      kind: entry.kind,
      regex: compile(entry.pattern, 'gi', `date range "${entry.kind}"`),
    }))

  return deepFreeze<PatternRegistry>({
    version: registry.version,
    skills: registry.skills.map((skill) => skill.name),
    skillTerms: compileSkillTerms(registry),
    certifications: registry.certifications.map((entry) =>
      compileRule(
        entry.name,
        entry,
        registry.certificationContextWindow,
        `certification "${entry.name}"`
      )
    ),
    educationLevels,
    workContext: registry.workContext,
    educationContext: registry.educationContext,
    dateRanges,
    nameBlocklist: registry.nameBlocklist,
    filenameNoise: registry.filenameNoise,
    location: registry.location,
    companies: registry.companies,
    jobTitles: registry.jobTitles,
  })
}

/**
 * Load a registry from a JSON file on disk
 */
export function loadPatternRegistry(filePath: string): PatternRegistry {
  let raw: string
  try {
    raw = fs.readFileSync(filePath, 'utf-8')
  } catch (error) {
    throw new RegistryError(`Cannot read pattern registry ${filePath}: ${error}`)
  }

  let data: unknown
  try {
    data = JSON.parse(raw)
  } catch (error) {
    throw new RegistryError(`Pattern registry ${filePath} is not valid JSON: ${error}`)
  }
  return createPatternRegistry(data)
}

/**
 * The registry bundled with the engine
 */
export function createDefaultRegistry(): PatternRegistry {
  return createPatternRegistry(defaultRegistryData)
}
