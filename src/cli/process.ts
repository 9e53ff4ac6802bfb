import { Command } from 'commander'
import * as path from 'path'
import { CandidateProcessor } from '../CandidateProcessor'
import { getEngineConfig } from '../utils/config'
import { resolveInputFiles } from '../utils/inputs'
import { failCommand, parseNumberOption, resolveRegistry } from './shared'

interface ProcessCommandOptions {
  output: string
  verbose?: boolean
  minFitScore?: number
}

/**
 * Register the process command with the CLI program
 * @param program Commander program instance
 */
export default function registerProcessCommand(program: Command): void {
  program
    .command('process')
    .description('Extract candidate records from resume files (.txt, .md, .pdf)')
    .argument('<inputs...>', 'Resume files, directories or glob patterns to process')
    .option('-o, --output <file>', 'Output JSON file', 'candidates.json')
    .option('-v, --verbose', 'Verbose output')
    .option(
      '--min-fit-score <number>',
      'Fit score below which a record is flagged for review',
      parseNumberOption
    )
    .action(async (inputs: string[], options: ProcessCommandOptions) => {
      let verbose = options.verbose || false
      try {
        const config = getEngineConfig()
        verbose = verbose || config.verbose

        const files = await resolveInputFiles(inputs)

        const startTime = new Date()
        console.log(`Starting resume processing at ${startTime.toISOString()}`)

        const processor = new CandidateProcessor(resolveRegistry(config), {
          verbose,
          minFitScore: options.minFitScore ?? config.minFitScore,
        })
        const candidates = await processor.processFiles(files)

        processor.saveToJson(candidates, path.resolve(options.output))

        const processingTime = (new Date().getTime() - startTime.getTime()) / 1000
        console.log(
          `Processed ${candidates.length} resume(s) in ${processingTime.toFixed(2)} seconds`
        )
      } catch (error) {
        failCommand('processing resumes', error, verbose)
      }
    })
}
