import { ConfigError } from './errors'

export interface EngineConfig {
  registryPath?: string
  minFitScore: number
  completenessBonusCap: number
  verbose: boolean
}

export const DEFAULT_MIN_FIT_SCORE = 50
export const DEFAULT_COMPLETENESS_BONUS_CAP = 3.5

type Env = Record<string, string | undefined>

function readNumber(
  env: Env,
  name: string,
  fallback: number,
  min: number,
  max = Number.POSITIVE_INFINITY
): number {
  const raw = env[name]
  if (raw === undefined || raw.trim() === '') {
    return fallback
  }

  const value = Number(raw)
  if (!Number.isFinite(value) || value < min || value > max) {
    const range = Number.isFinite(max) ? `between ${min} and ${max}` : `>= ${min}`
    throw new ConfigError(`${name} must be a number ${range}, got "${raw}"`)
  }
  return value
}

function readBoolean(env: Env, name: string): boolean {
  const raw = env[name]
  if (raw === undefined || raw.trim() === '') {
    return false
  }

  const normalized = raw.trim().toLowerCase()
  if (normalized === 'true' || normalized === '1') return true
  if (normalized === 'false' || normalized === '0') return false
  throw new ConfigError(`${name} must be true, false, 1 or 0, got "${raw}"`)
}

/**
 * Get engine configuration from environment variables. Call
 * `dotenv.config()` first to pick up a .env file.
 */
export function getEngineConfig(env: Env = process.env): EngineConfig {
  const registryPath = env.CV_REGISTRY_PATH?.trim()

  return {
    registryPath: registryPath ? registryPath : undefined,
    minFitScore: readNumber(env, 'CV_MIN_FIT_SCORE', DEFAULT_MIN_FIT_SCORE, 0, 100),
    completenessBonusCap: readNumber(
      env,
      'CV_COMPLETENESS_BONUS_CAP',
      DEFAULT_COMPLETENESS_BONUS_CAP,
      0
    ),
    verbose: readBoolean(env, 'CV_VERBOSE'),
  }
}
