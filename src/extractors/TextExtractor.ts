import * as fs from 'fs'
import * as path from 'path'
import { InvalidInputError } from '../utils/errors'

const TEXT_EXTENSIONS = new Set(['.txt', '.text', '.md'])

/**
 * Class for reading resume text from files. Extraction from scanned
 * documents (OCR) is not attempted.
 */
export class TextExtractor {
  /**
   * Read plain text files as UTF-8 and PDFs through pdf-parse
   */
  async extractText(filePath: string): Promise<string> {
    const extension = path.extname(filePath).toLowerCase()

    if (TEXT_EXTENSIONS.has(extension)) {
      return fs.promises.readFile(filePath, 'utf-8')
    }
    if (extension === '.pdf') {
      return this.extractTextFromPDF(filePath)
    }

    throw new InvalidInputError(
      `Unsupported file type "${extension || '(none)'}" for ${filePath}`
    )
  }

  async extractTextFromPDF(pdfPath: string): Promise<string> {
    // pdf-parse runs its bundled self-test when loaded without a parent module
    const { default: pdfParse } = await import('pdf-parse')
    const dataBuffer = await fs.promises.readFile(pdfPath)
    const pdfData = await pdfParse(dataBuffer)

    if (pdfData.text.trim().length < 100) {
      console.warn(
        `Little text extracted from ${path.basename(pdfPath)}; it may be a scanned document`
      )
    }
    return pdfData.text
  }
}
