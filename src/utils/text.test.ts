import { describe, expect, it } from 'vitest'
import {
  containsKeyword,
  contextWindow,
  countKeywords,
  escapeRegExp,
  findAll,
  hasMatch,
  normalizeText,
  toTitleCase,
  uniqueCaseInsensitive,
} from './text'

describe('normalizeText', () => {
  it('unifies line endings and strips trailing spaces', () => {
    expect(normalizeText('Jane Doe  \r\nAustin\rTX\t')).toBe('Jane Doe\nAustin\nTX')
  })

  it('drops zero-width characters and maps non-breaking spaces', () => {
    expect(normalizeText('Py\u200bthon\u00a0Developer')).toBe('Python Developer')
  })
})

describe('keyword helpers', () => {
  it('matches whole words only', () => {
    expect(containsKeyword('worked as an engineer', 'engineer')).toBe(true)
    expect(containsKeyword('engineering team', 'engineer')).toBe(false)
  })

  it('matches multi-word keywords and punctuation', () => {
    expect(containsKeyword('used ms office daily', 'ms office')).toBe(true)
    expect(containsKeyword('earned a ph.d in 2019', 'ph.d')).toBe(true)
  })

  it('counts distinct keywords present', () => {
    expect(countKeywords('bachelor degree, state university', ['degree', 'university', 'gpa'])).toBe(2)
  })

  it('slices a lower-cased window around a span', () => {
    expect(contextWindow('ABCDEFGHIJ', 4, 6, 2)).toBe('cdefgh')
    expect(contextWindow('ABCDEFGHIJ', 0, 2, 5)).toBe('abcdefg')
  })

  it('escapes regular expression syntax', () => {
    expect(escapeRegExp('C++ (.NET)')).toBe('C\\+\\+ \\(\\.NET\\)')
  })
})

describe('uniqueCaseInsensitive', () => {
  it('keeps the first spelling and drops empty values', () => {
    expect(uniqueCaseInsensitive(['Acme Corp', ' ', 'ACME CORP', 'Globex Inc '])).toEqual([
      'Acme Corp',
      'Globex Inc',
    ])
  })
})

describe('toTitleCase', () => {
  it('capitalizes each word', () => {
    expect(toTitleCase('john  SMITH')).toBe('John Smith')
  })
})

describe('findAll and hasMatch', () => {
  it('returns every match for non-global patterns', () => {
    expect(findAll('a1 b2 c3', /[a-z]\d/).map((match) => match[0])).toEqual(['a1', 'b2', 'c3'])
  })

  it('does not carry lastIndex between calls on a global pattern', () => {
    const pattern = /engineer/gi
    expect(hasMatch('Engineer', pattern)).toBe(true)
    expect(hasMatch('Engineer', pattern)).toBe(true)
    expect(pattern.lastIndex).toBe(0)
  })
})
