import { describe, expect, it } from 'vitest'
import { createDefaultRegistry } from '../registry/PatternRegistry'
import { PersonalInfoExtractor } from './PersonalInfoExtractor'

const extractor = new PersonalInfoExtractor(createDefaultRegistry())

const header = [
  'Jane Doe',
  'Senior Software Engineer',
  'Austin, TX',
  'jane.doe@Example.COM | +1-555-123-4567',
].join('\n')

describe('PersonalInfoExtractor', () => {
  describe('extractName', () => {
    it('takes the first name-shaped line', () => {
      expect(extractor.extractName(header, 'whatever.pdf')).toBe('Jane Doe')
    })

    it('skips document headings and falls back to the filename', () => {
      const text = 'RESUME\nSkills: Python, Docker'

      expect(extractor.extractName(text, 'john_smith_resume_2023.pdf')).toBe('John Smith')
    })

    it('returns an empty name when nothing usable is found', () => {
      expect(extractor.extractName('', '')).toBe('')
    })
  })

  describe('nameFromFilename', () => {
    it('drops directories, noise words and digits', () => {
      expect(extractor.nameFromFilename('uploads/CV-maria.lopez-final-2024.docx')).toBe(
        'Maria Lopez'
      )
    })
  })

  describe('extractEmail', () => {
    it('lower-cases the domain only', () => {
      expect(extractor.extractEmail(header)).toBe('jane.doe@example.com')
    })

    it('returns an empty string without an address', () => {
      expect(extractor.extractEmail('no contact details')).toBe('')
    })
  })

  describe('extractPhone', () => {
    it('prefers international numbers', () => {
      expect(extractor.extractPhone(header)).toBe('+1-555-123-4567')
    })

    it('reads domestic formats', () => {
      expect(extractor.extractPhone('Call (512) 555-0142 after 5pm')).toBe('(512) 555-0142')
    })

    it('does not mistake year ranges for phone numbers', () => {
      expect(extractor.extractPhone('Acme Corp 2015 - 2018')).toBe('')
    })
  })

  describe('extractLocation', () => {
    it('reads City, Region from the header', () => {
      expect(extractor.extractLocation(header)).toBe('Austin, TX')
    })

    it('rejects technology lists', () => {
      expect(extractor.extractLocation('Skills\nPython, Java\nReact, Node')).toBe('')
    })

    it('rejects job title lines', () => {
      expect(extractor.extractLocation('Software Engineer, Acme')).toBe('')
    })

    it('accepts City, Country', () => {
      expect(extractor.extractLocation('Jane Doe\nBerlin, Germany')).toBe('Berlin, Germany')
    })
  })
})
