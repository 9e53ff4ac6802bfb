import * as fs from 'fs'
import * as path from 'path'
import { CertificationExtractor } from './extractors/CertificationExtractor'
import { EducationExtractor } from './extractors/EducationExtractor'
import { EmploymentExtractor } from './extractors/EmploymentExtractor'
import { ExperienceExtractor } from './extractors/ExperienceExtractor'
import { PersonalInfoExtractor } from './extractors/PersonalInfoExtractor'
import { SkillsExtractor } from './extractors/SkillsExtractor'
import { TextExtractor } from './extractors/TextExtractor'
import { PatternRegistry, createDefaultRegistry } from './registry/PatternRegistry'
import { CandidateRecord, FitScoreResult, ProcessorOptions } from './types'
import { documentInputSchema } from './types/schemas'
import { InvalidInputError } from './utils/errors'
import { FitScoreCalculator } from './utils/FitScoreCalculator'
import { normalizeText } from './utils/text'

export interface ProcessedCandidate {
  record: CandidateRecord
  fitScore: FitScoreResult
  needsReview: boolean
}

/**
 * Assembles candidate records from resume text
 */
export class CandidateProcessor {
  private personalInfoExtractor: PersonalInfoExtractor
  private skillsExtractor: SkillsExtractor
  private experienceExtractor: ExperienceExtractor
  private educationExtractor: EducationExtractor
  private certificationExtractor: CertificationExtractor
  private employmentExtractor: EmploymentExtractor
  private textExtractor: TextExtractor
  private fitScoreCalculator: FitScoreCalculator
  private verbose: boolean

  /**
   * Initialize the processor with a pattern registry (the bundled one by
   * default)
   */
  constructor(
    private readonly registry: PatternRegistry = createDefaultRegistry(),
    options: ProcessorOptions = {}
  ) {
    this.personalInfoExtractor = new PersonalInfoExtractor(registry)
    this.skillsExtractor = new SkillsExtractor(registry)
    this.experienceExtractor = new ExperienceExtractor(registry, {
      currentYear: options.currentYear,
    })
    this.educationExtractor = new EducationExtractor(registry)
    this.certificationExtractor = new CertificationExtractor(registry)
    this.employmentExtractor = new EmploymentExtractor(registry)
    this.textExtractor = new TextExtractor()
    this.fitScoreCalculator = new FitScoreCalculator({
      minFitScore: options.minFitScore,
    })
    this.verbose = options.verbose || false

    if (this.verbose) {
      console.log(`Candidate processor initialized (registry v${registry.version})`)
    }
  }

  /**
   * Build a candidate record from already extracted text
   */
  extractCandidate(text: string, sourceFilename = ''): CandidateRecord {
    return this.processInput({ text, sourceFilename })
  }

  /**
   * Entry point for untyped callers: fails fast with InvalidInputError when
   * the text is not a string
   */
  processInput(input: unknown): CandidateRecord {
    const parsed = documentInputSchema.safeParse(input)
    if (!parsed.success) {
      const reason = parsed.error.issues.map((issue) => issue.message).join('; ')
      throw new InvalidInputError(`Invalid document input: ${reason}`)
    }

    const { sourceFilename } = parsed.data
    const text = normalizeText(parsed.data.text)

    return Object.freeze({
      name: this.personalInfoExtractor.extractName(text, sourceFilename),
      email: this.personalInfoExtractor.extractEmail(text),
      phone: this.personalInfoExtractor.extractPhone(text),
      location: this.personalInfoExtractor.extractLocation(text),
      skills: Object.freeze(this.skillsExtractor.extractSkills(text)),
      companies: Object.freeze(this.employmentExtractor.extractCompanies(text)),
      jobTitles: Object.freeze(this.employmentExtractor.extractJobTitles(text)),
      educationLevel: this.educationExtractor.extractEducationLevel(text),
      certifications: Object.freeze(
        this.certificationExtractor.extractCertifications(text)
      ),
      yearsExperience: this.experienceExtractor.extractYearsOfExperience(text),
      sourceId: sourceFilename,
    })
  }

  /**
   * Build the record and its fit score, logging a summary when verbose
   */
  processText(text: string, sourceFilename = ''): ProcessedCandidate {
    const record = this.extractCandidate(text, sourceFilename)
    const fitScore = this.fitScoreCalculator.calculate(record)
    const needsReview = !this.fitScoreCalculator.meetsThreshold(fitScore)

    if (this.verbose) {
      console.log(`Processed ${sourceFilename || '(unnamed document)'}`)
      console.log(`Fit Score: ${fitScore.score}`)
      if (fitScore.missingFields.length > 0) {
        console.log('Missing Fields:', fitScore.missingFields)
      }
      if (needsReview) {
        console.warn(
          `Warning: fit score below ${this.fitScoreCalculator.getMinFitScore()}, flagged for manual review`
        )
      }
    }

    return { record, fitScore, needsReview }
  }

  /**
   * Read a resume file (text or PDF) and process it
   */
  async processFile(filePath: string): Promise<ProcessedCandidate> {
    const text = await this.textExtractor.extractText(filePath)
    return this.processText(text, path.basename(filePath))
  }

  /**
   * Process several files concurrently; documents are independent, results
   * come back in input order. A file that cannot be read is processed as
   * empty text, so it still yields a (flagged) record.
   */
  async processFiles(filePaths: string[]): Promise<ProcessedCandidate[]> {
    return Promise.all(
      filePaths.map(async (filePath) => {
        try {
          return await this.processFile(filePath)
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error)
          console.warn(`Could not read ${filePath}: ${message}`)
          return this.processText('', path.basename(filePath))
        }
      })
    )
  }

  /**
   * Save processed candidates to a JSON file
   */
  saveToJson(candidates: ProcessedCandidate[], outputPath: string): void {
    try {
      fs.writeFileSync(outputPath, JSON.stringify(candidates, null, 2))
      console.log(`Results saved to ${outputPath}`)

      const flagged = candidates.filter((candidate) => candidate.needsReview)
      if (flagged.length > 0) {
        console.warn(
          `Warning: ${flagged.length} candidate(s) scored below the minimum fit score (${this.fitScoreCalculator.getMinFitScore()})`
        )
      }
    } catch (error) {
      console.error(`Error saving JSON file: ${error}`)
      throw error
    }
  }

  getRegistry(): PatternRegistry {
    return this.registry
  }
}
