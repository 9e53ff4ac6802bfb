import { InvalidArgumentError } from 'commander'
import {
  PatternRegistry,
  createDefaultRegistry,
  loadPatternRegistry,
} from '../registry/PatternRegistry'
import { EducationLevel, ExperienceLevel } from '../types'
import { EngineConfig } from '../utils/config'

/**
 * Registry named by CV_REGISTRY_PATH, or the bundled one
 */
export function resolveRegistry(config: EngineConfig): PatternRegistry {
  return config.registryPath
    ? loadPatternRegistry(config.registryPath)
    : createDefaultRegistry()
}

/**
 * Print a command failure and exit with status 1
 */
export function failCommand(doing: string, error: unknown, verbose: boolean): never {
  const message = error instanceof Error ? error.message : String(error)
  console.error(`Error ${doing}: ${message}`)
  if (verbose && error instanceof Error) {
    console.error(`Stack trace: ${error.stack}`)
  }
  process.exit(1)
}

export function parseNumberOption(value: string): number {
  const parsed = Number(value)
  if (!Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`Expected a number, got "${value}"`)
  }
  return parsed
}

/**
 * Collect repeated `skill=weight` options into a weight map
 */
export function collectSkillWeight(
  value: string,
  previous: Record<string, number> = {}
): Record<string, number> {
  const separator = value.lastIndexOf('=')
  const skill = separator > 0 ? value.slice(0, separator).trim() : ''
  const weight = Number(value.slice(separator + 1))
  if (!skill || !Number.isFinite(weight) || weight < 0) {
    throw new InvalidArgumentError(`Skill weights take the form skill=weight, got "${value}"`)
  }
  return { ...previous, [skill]: weight }
}

const EDUCATION_LEVELS: readonly string[] = Object.values(EducationLevel)
const EXPERIENCE_LEVELS: readonly string[] = Object.values(ExperienceLevel)

const isEducationLevel = (value: string): value is EducationLevel =>
  EDUCATION_LEVELS.includes(value)

const isExperienceLevel = (value: string): value is ExperienceLevel =>
  EXPERIENCE_LEVELS.includes(value)

export function parseEducationLevel(value: string): EducationLevel {
  if (!isEducationLevel(value)) {
    throw new InvalidArgumentError(
      `Unknown education level "${value}" (expected one of: ${EDUCATION_LEVELS.join(', ')})`
    )
  }
  return value
}

export function parseExperienceLevel(value: string): ExperienceLevel {
  const normalized = value.charAt(0).toUpperCase() + value.slice(1).toLowerCase()
  if (!isExperienceLevel(normalized)) {
    throw new InvalidArgumentError(
      `Unknown experience level "${value}" (expected one of: ${EXPERIENCE_LEVELS.join(', ')})`
    )
  }
  return normalized
}
