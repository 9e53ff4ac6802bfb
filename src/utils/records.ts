import * as fs from 'fs'
import { z } from 'zod'
import { CandidateRecord } from '../types'
import { candidateRecordSchema } from '../types/schemas'
import { RecordsFileError } from './errors'

// Accepts a bare record array or the output of the process command
const recordsFileSchema = z.union([
  z.array(candidateRecordSchema),
  z.array(z.object({ record: candidateRecordSchema })),
])

/**
 * Parse candidate records from already loaded JSON data
 */
export function parseCandidateRecords(data: unknown): CandidateRecord[] {
  const parsed = recordsFileSchema.safeParse(data)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : ''
    throw new RecordsFileError(
      `Invalid candidate records${where}: ${issue ? issue.message : 'unknown error'}`
    )
  }

  return parsed.data.map((entry) => ('record' in entry ? entry.record : entry))
}

/**
 * Load candidate records from a JSON file
 */
export function loadCandidateRecords(filePath: string): CandidateRecord[] {
  if (!fs.existsSync(filePath)) {
    throw new RecordsFileError(`Records file not found: ${filePath}`)
  }

  let data: unknown
  try {
    data = JSON.parse(fs.readFileSync(filePath, 'utf-8'))
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new RecordsFileError(`Could not read records file ${filePath}: ${reason}`)
  }

  return parseCandidateRecords(data)
}
