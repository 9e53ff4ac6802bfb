import { Command } from 'commander'
import { EducationLevel, ExperienceLevel } from '../types'
import { getEngineConfig } from '../utils/config'
import { filterCandidates } from '../utils/filtering'
import { loadCandidateRecords } from '../utils/records'
import { RelevanceRanker } from '../utils/RelevanceRanker'
import {
  collectSkillWeight,
  failCommand,
  parseEducationLevel,
  parseExperienceLevel,
  parseNumberOption,
} from './shared'

interface RankCommandOptions {
  skillWeight?: Record<string, number>
  top?: number
  name?: string
  skill?: string
  experience?: ExperienceLevel
  education?: EducationLevel
  verbose?: boolean
}

/**
 * Register the rank command with the CLI program
 * @param program Commander program instance
 */
export default function registerRankCommand(program: Command): void {
  program
    .command('rank')
    .description('Rank candidate records against a search query')
    .argument('<records>', 'JSON file of candidate records')
    .argument('<query...>', 'Search query')
    .option(
      '-w, --skill-weight <skill=weight>',
      'Weight for a skill (repeatable)',
      collectSkillWeight
    )
    .option('-n, --top <number>', 'Only show the best N candidates', parseNumberOption)
    .option('--name <text>', 'Only candidates whose name contains the text')
    .option('--skill <text>', 'Only candidates with a matching skill')
    .option(
      '--experience <level>',
      'Only candidates at this experience level (Entry, Mid, Senior, Expert)',
      parseExperienceLevel
    )
    .option(
      '--education <level>',
      'Only candidates with this education level',
      parseEducationLevel
    )
    .option('-v, --verbose', 'Verbose output')
    .action((recordsPath: string, queryWords: string[], options: RankCommandOptions) => {
      const verbose = options.verbose || false
      try {
        const config = getEngineConfig()
        const records = filterCandidates(loadCandidateRecords(recordsPath), {
          name: options.name,
          skill: options.skill,
          experienceLevel: options.experience,
          educationLevel: options.education,
        })

        const ranker = new RelevanceRanker({
          skillWeights: options.skillWeight,
          completenessBonusCap: config.completenessBonusCap,
        })
        const query = queryWords.join(' ')
        const ranked = ranker.rank(records, query)
        const shown = options.top !== undefined ? ranked.slice(0, options.top) : ranked

        if (verbose) {
          console.log(`Ranking ${records.length} candidate(s) for "${query}"`)
        }
        shown.forEach(({ candidate, score }, position) => {
          const label = candidate.name || candidate.sourceId || '(unnamed)'
          console.log(`${position + 1}. ${label} (${score.toFixed(1)})`)
        })
      } catch (error) {
        failCommand('ranking candidates', error, verbose)
      }
    })
}
