import { Command } from 'commander'
import { buildAnalytics } from '../utils/analytics'
import { loadCandidateRecords } from '../utils/records'
import { failCommand, parseNumberOption } from './shared'

interface AnalyticsCommandOptions {
  json?: boolean
  topSkills: number
  verbose?: boolean
}

/**
 * Register the analytics command with the CLI program
 * @param program Commander program instance
 */
export default function registerAnalyticsCommand(program: Command): void {
  program
    .command('analytics')
    .description('Summarize skills, education and experience across candidates')
    .argument('<records>', 'JSON file of candidate records')
    .option('--json', 'Print the raw analytics as JSON')
    .option('--top-skills <number>', 'Number of skills to list', parseNumberOption, 10)
    .option('-v, --verbose', 'Verbose output')
    .action((recordsPath: string, options: AnalyticsCommandOptions) => {
      const verbose = options.verbose || false
      try {
        const analytics = buildAnalytics(loadCandidateRecords(recordsPath))

        if (options.json) {
          console.log(JSON.stringify(analytics, null, 2))
          return
        }

        console.log(`Candidates: ${analytics.totalCandidates}`)

        console.log('\nTop skills:')
        for (const { skill, count } of analytics.skills.slice(0, options.topSkills)) {
          console.log(`  ${skill}: ${count}`)
        }

        console.log('\nEducation:')
        for (const [level, count] of Object.entries(analytics.educationLevels)) {
          console.log(`  ${level}: ${count}`)
        }

        console.log('\nExperience:')
        for (const [level, count] of Object.entries(analytics.experienceLevels)) {
          console.log(`  ${level}: ${count}`)
        }
        console.log(`  No experience detected: ${analytics.withoutExperience}`)
        console.log(
          `  Average years: ${analytics.averageYearsExperience.toFixed(1)}`
        )

        console.log('\nProfile completeness (name, email, phone, skills):')
        analytics.completeness.forEach((count, filled) => {
          console.log(`  ${filled}/4 fields: ${count}`)
        })
      } catch (error) {
        failCommand('building analytics', error, verbose)
      }
    })
}
