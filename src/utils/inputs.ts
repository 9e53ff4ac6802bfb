import * as fs from 'fs'
import { glob } from 'glob'
import * as path from 'path'
import { InvalidInputError } from './errors'

const RESUME_FILES = '**/*.{txt,text,md,pdf}'

/**
 * Expand CLI inputs into resume file paths. An input may be a file, a
 * directory (searched recursively for supported extensions) or a glob
 * pattern. Input order is kept and duplicates are dropped.
 */
export async function resolveInputFiles(inputs: string[]): Promise<string[]> {
  const files: string[] = []

  for (const input of inputs) {
    let matches: string[]
    if (fs.existsSync(input) && fs.statSync(input).isDirectory()) {
      matches = await glob(RESUME_FILES, {
        cwd: input,
        absolute: true,
        nodir: true,
        nocase: true,
      })
    } else if (fs.existsSync(input)) {
      matches = [path.resolve(input)]
    } else {
      matches = await glob(input, { absolute: true, nodir: true })
    }

    if (matches.length === 0) {
      throw new InvalidInputError(`No resume files found for "${input}"`)
    }

    for (const match of matches.sort()) {
      if (!files.includes(match)) {
        files.push(match)
      }
    }
  }

  return files
}
