import { Command } from 'commander'
import * as path from 'path'
import { CandidateCsvGenerator } from '../csvGenerator'
import { getEngineConfig } from '../utils/config'
import { FitScoreCalculator } from '../utils/FitScoreCalculator'
import { loadCandidateRecords } from '../utils/records'
import { failCommand } from './shared'

interface CreateCsvCommandOptions {
  output: string
  verbose?: boolean
}

/**
 * Register the create-csv command with the CLI program
 * @param program Commander program instance
 */
export default function registerCreateCsvCommand(program: Command): void {
  program
    .command('create-csv')
    .description('Export candidate records to a CSV file')
    .argument('<records>', 'JSON file of candidate records')
    .option('-o, --output <filename>', 'Output CSV file', 'candidates.csv')
    .option('-v, --verbose', 'Verbose output')
    .action(async (recordsPath: string, options: CreateCsvCommandOptions) => {
      const verbose = options.verbose || false
      try {
        const config = getEngineConfig()
        const records = loadCandidateRecords(recordsPath)
        const outputPath = path.resolve(options.output)

        if (verbose) {
          console.log(`Loaded ${records.length} record(s) from ${recordsPath}`)
        }

        const csvGenerator = new CandidateCsvGenerator(
          new FitScoreCalculator({ minFitScore: config.minFitScore })
        )
        await csvGenerator.writeCsv(records, outputPath)

        console.log(`CSV file written to ${outputPath}`)
      } catch (error) {
        failCommand('generating CSV', error, verbose)
      }
    })
}
