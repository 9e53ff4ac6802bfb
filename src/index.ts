#!/usr/bin/env node
/**
 * CV Screener CLI - Extract candidate records from resumes, then rank,
 * export and summarize them
 *
 * Usage:
 *   cv-screener process resume.pdf other.txt -o candidates.json
 *   cv-screener rank candidates.json senior python developer
 *   cv-screener create-csv candidates.json -o candidates.csv
 *   cv-screener analytics candidates.json
 */

import { Command } from 'commander'
import * as dotenv from 'dotenv'
import registerAnalyticsCommand from './cli/analytics'
import registerCreateCsvCommand from './cli/createCsv'
import registerProcessCommand from './cli/process'
import registerRankCommand from './cli/rank'

export function createProgram(): Command {
  const program = new Command()

  program
    .name('cv-screener')
    .description('Extract, score and rank candidate records from resumes')
    .version('1.0.0')

  registerProcessCommand(program)
  registerRankCommand(program)
  registerCreateCsvCommand(program)
  registerAnalyticsCommand(program)

  return program
}

if (require.main === module) {
  // Load environment variables
  dotenv.config()

  const program = createProgram()

  // If no arguments or if only the program name is provided, show help
  if (process.argv.length <= 2) {
    program.help()
  }

  program.parseAsync(process.argv).catch((error: unknown) => {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`)
    process.exit(1)
  })
}

export { CandidateProcessor } from './CandidateProcessor'
export type { ProcessedCandidate } from './CandidateProcessor'
export { CandidateCsvGenerator, CSV_HEADERS } from './csvGenerator'
export {
  createDefaultRegistry,
  createPatternRegistry,
  loadPatternRegistry,
} from './registry/PatternRegistry'
export type { PatternRegistry } from './registry/PatternRegistry'
export * from './types'
export { buildAnalytics } from './utils/analytics'
export type { CandidateAnalytics, SkillCount } from './utils/analytics'
export { getEngineConfig } from './utils/config'
export type { EngineConfig } from './utils/config'
export {
  ConfigError,
  InvalidInputError,
  RecordsFileError,
  RegistryError,
  ScreeningError,
} from './utils/errors'
export { filterCandidates, experienceLevel } from './utils/filtering'
export type { CandidateFilter } from './utils/filtering'
export { FitScoreCalculator } from './utils/FitScoreCalculator'
export { resolveInputFiles } from './utils/inputs'
export { loadCandidateRecords, parseCandidateRecords } from './utils/records'
export { RelevanceRanker, tokenizeQuery } from './utils/RelevanceRanker'
