import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { InvalidInputError } from './errors'
import { resolveInputFiles } from './inputs'

describe('resolveInputFiles', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'cv-inputs-')))
    fs.mkdirSync(path.join(tempDir, 'nested'))
    fs.writeFileSync(path.join(tempDir, 'b.txt'), 'b')
    fs.writeFileSync(path.join(tempDir, 'a.md'), 'a')
    fs.writeFileSync(path.join(tempDir, 'notes.docx'), 'x')
    fs.writeFileSync(path.join(tempDir, 'nested', 'c.pdf'), 'c')
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  it('expands a directory into supported files', async () => {
    expect(await resolveInputFiles([tempDir])).toEqual([
      path.join(tempDir, 'a.md'),
      path.join(tempDir, 'b.txt'),
      path.join(tempDir, 'nested', 'c.pdf'),
    ])
  })

  it('keeps explicit files in input order without duplicates', async () => {
    const b = path.join(tempDir, 'b.txt')
    const a = path.join(tempDir, 'a.md')

    expect(await resolveInputFiles([b, a, b])).toEqual([b, a])
  })

  it('expands glob patterns', async () => {
    expect(await resolveInputFiles([path.join(tempDir, '*.txt')])).toEqual([
      path.join(tempDir, 'b.txt'),
    ])
  })

  it('rejects inputs that match nothing', async () => {
    await expect(
      resolveInputFiles([path.join(tempDir, 'missing.txt')])
    ).rejects.toThrow(InvalidInputError)
  })
})
