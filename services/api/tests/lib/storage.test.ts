import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { ZodError } from 'zod'
import { NotFoundError } from '../../src/lib/errors'
import {
  ensureArtifacts,
  fileExists,
  readComparison,
  readExportState,
  readJson,
  writeComparison,
  writeExportState,
  writeJson
} from '../../src/lib/storage'
import { mkComparison } from '../helpers'

const compareId = 'cmp_abcdefabcdefabcdefabcdefabcdefab'

describe('storage', () => {
  let dir = ''

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'storage-'))
    vi.stubEnv('ARTIFACTS_DIR', dir)
  })

  afterEach(async () => {
    vi.unstubAllEnvs()
    await fs.rm(dir, { recursive: true, force: true })
  })

  it('lays out one directory per comparison', async () => {
    const artifacts = await ensureArtifacts(compareId)
    expect(artifacts.dir).toBe(path.join(dir, compareId))
    expect(artifacts.jsonPath).toBe(path.join(dir, compareId, 'compare.json'))
    expect(artifacts.reportPath).toBe(path.join(dir, compareId, 'report.html'))
    expect(artifacts.exportPaths.xlsx).toBe(path.join(dir, compareId, 'comparison.xlsx'))
    expect(await fileExists(artifacts.dir)).toBe(true)
  })

  it('writeJson replaces the file and leaves no temp files', async () => {
    const file = path.join(dir, 'x.json')
    await writeJson(file, { a: 1 })
    await writeJson(file, { a: 2 })
    expect(await readJson(file)).toEqual({ a: 2 })
    expect(await fs.readdir(dir)).toEqual(['x.json'])
  })

  it('round-trips a comparison', async () => {
    const artifacts = await ensureArtifacts(compareId)
    const comparison = mkComparison(compareId)
    await writeComparison(artifacts, comparison)
    expect(await readComparison(artifacts)).toEqual(comparison)
  })

  it('lays export state over the stored comparison without rewriting compare.json', async () => {
    const artifacts = await ensureArtifacts(compareId)
    await writeComparison(artifacts, mkComparison(compareId))
    const before = await fs.readFile(artifacts.jsonPath, 'utf8')

    expect(await readExportState(artifacts, 'csv')).toEqual({ status: 'none', jobId: null, error: null })
    await writeExportState(artifacts, 'csv', { status: 'running', jobId: 'job-9', error: null })

    expect(artifacts.exportStatePaths.csv).toBe(path.join(dir, compareId, 'export.csv.json'))
    expect(await fs.readFile(artifacts.jsonPath, 'utf8')).toBe(before)
    const stored = await readComparison(artifacts)
    expect(stored.exports.csv).toEqual({ status: 'running', jobId: 'job-9', error: null })
    expect(stored.exports.docx).toEqual({ status: 'none', jobId: null, error: null })
  })

  it('readJson gives up on a file that stays malformed', async () => {
    const file = path.join(dir, 'broken.json')
    await fs.writeFile(file, '{"a":', 'utf8')
    await expect(readJson(file)).rejects.toBeInstanceOf(SyntaxError)
  })

  it('reports a missing comparison as not found', async () => {
    await expect(readComparison(await ensureArtifacts(compareId))).rejects.toBeInstanceOf(NotFoundError)
  })

  it('rejects a stored file of the wrong shape', async () => {
    const artifacts = await ensureArtifacts(compareId)
    await writeJson(artifacts.jsonPath, { schemaVersion: '2' })
    await expect(readComparison(artifacts)).rejects.toBeInstanceOf(ZodError)
  })
})
