import * as fs from 'fs'
import * as path from 'path'
import { CandidateRecord } from './types'
import { FitScoreCalculator } from './utils/FitScoreCalculator'

export const CSV_HEADERS = [
  'name',
  'email',
  'phone',
  'location',
  'skills',
  'companies',
  'job_titles',
  'education_level',
  'certifications',
  'years_experience',
  'fit_score',
  'source_id',
] as const

const LIST_SEPARATOR = '; '

/**
 * CSV Generator class for exporting candidate records, one row per record
 */
export class CandidateCsvGenerator {
  private fitScoreCalculator: FitScoreCalculator

  constructor(fitScoreCalculator: FitScoreCalculator = new FitScoreCalculator()) {
    this.fitScoreCalculator = fitScoreCalculator
  }

  /**
   * Build the CSV document. Rows end with "\n", including the last one.
   */
  toCsv(records: readonly CandidateRecord[]): string {
    const lines = [CSV_HEADERS.join(',')]
    for (const record of records) {
      lines.push(this.createRow(record).map((value) => this.escapeCsvValue(value)).join(','))
    }
    return lines.join('\n') + '\n'
  }

  /**
   * Write the CSV document, creating the parent directory when needed
   */
  async writeCsv(records: readonly CandidateRecord[], outputPath: string): Promise<void> {
    await fs.promises.mkdir(path.dirname(outputPath), { recursive: true })
    await fs.promises.writeFile(outputPath, this.toCsv(records), 'utf-8')
  }

  private createRow(record: CandidateRecord): string[] {
    const { score } = this.fitScoreCalculator.calculate(record)

    return [
      record.name,
      record.email,
      record.phone,
      record.location,
      record.skills.join(LIST_SEPARATOR),
      record.companies.join(LIST_SEPARATOR),
      record.jobTitles.join(LIST_SEPARATOR),
      record.educationLevel,
      record.certifications.join(LIST_SEPARATOR),
      String(record.yearsExperience),
      String(score),
      record.sourceId,
    ]
  }

  /**
   * Escape CSV values that contain commas, quotes, or newlines
   */
  escapeCsvValue(value: string): string {
    if (value.includes(',') || value.includes('"') || /[\r\n]/.test(value)) {
      return `"${value.replace(/"/g, '""')}"`
    }
    return value
  }
}
