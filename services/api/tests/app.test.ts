import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import request from 'supertest'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { createApp } from '../src/app'
import { processExportJob } from '../src/lib/exportJob'
import type { ExportJobData, ExportQueue } from '../src/lib/queue'
import { ensureArtifacts, readExportState } from '../src/lib/storage'

const OLD_ACT = 'CHAPTER I\nSection 5 Penalty\n(1) A fine of 100 shall apply.\nSection 6 Repeal\nThe old law is repealed.'
const NEW_ACT = 'CHAPTER I\nSection 5 Penalty\n(1) A fine of 500 shall apply.\nSection 7 Savings\nNothing affects pending cases.'

const makeFakeQueue = () => {
  const enqueued: ExportJobData[] = []
  const queue: ExportQueue = {
    async enqueue(data) {
      enqueued.push(data)
    }
  }
  return { queue, enqueued }
}

describe('app', () => {
  let dir = ''
  let fake = makeFakeQueue()

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'app-'))
    vi.stubEnv('ARTIFACTS_DIR', dir)
    fake = makeFakeQueue()
  })

  afterEach(async () => {
    vi.unstubAllEnvs()
    await fs.rm(dir, { recursive: true, force: true })
  })

  const compare = async () => {
    const app = createApp({ exportQueue: fake.queue })
    const res = await request(app)
      .post('/api/compare')
      .attach('oldFile', Buffer.from(OLD_ACT, 'utf8'), 'old.txt')
      .attach('newFile', Buffer.from(NEW_ACT, 'utf8'), 'new.txt')
    return { app, res }
  }

  it('GET /health', async () => {
    const res = await request(createApp({ exportQueue: fake.queue })).get('/health')
    expect(res.status).toBe(200)
    expect(res.body).toEqual({ status: 'ok' })
  })

  it('POST /api/compare segments, aligns and stores the comparison', async () => {
    const { res } = await compare()
    expect(res.status).toBe(200)
    expect(res.body.compareId).toMatch(/^cmp_[0-9a-f]{32}$/)
    expect(res.body.summary).toEqual({ total: 3, added: 1, removed: 1, modified: 1, unchanged: 0 })
    expect(res.body.units).toEqual({ old: 2, new: 2 })
    expect(res.body.records.map((r: { status: string; matchMethod: string }) => [r.status, r.matchMethod])).toEqual([
      ['Minor edit', 'exact_key'],
      ['Removed', 'unmatched_old'],
      ['Added', 'new_only']
    ])
    expect(res.body.artifacts).toEqual({ reportUrl: `/api/compare/${res.body.compareId}/report` })

    const stored = JSON.parse(await fs.readFile(path.join(dir, res.body.compareId, 'compare.json'), 'utf8'))
    expect(stored.document.old.fileName).toBe('old.txt')
    expect(stored.exports.csv).toEqual({ status: 'none', jobId: null, error: null })
  })

  it('POST /api/compare requires both files', async () => {
    const res = await request(createApp({ exportQueue: fake.queue }))
      .post('/api/compare')
      .attach('oldFile', Buffer.from(OLD_ACT, 'utf8'), 'old.txt')
    expect(res.status).toBe(400)
    expect(res.body.error).toBe('missing files: oldFile and newFile are both required')
  })

  it('POST /api/compare rejects unsupported uploads with 415', async () => {
    const res = await request(createApp({ exportQueue: fake.queue }))
      .post('/api/compare')
      .attach('oldFile', Buffer.from([0xd0, 0xcf, 0x11, 0xe0]), 'old.doc')
      .attach('newFile', Buffer.from(NEW_ACT, 'utf8'), 'new.txt')
    expect(res.status).toBe(415)
    expect(res.body.error).toBe('unsupported file type: old.doc')
  })

  it('serves the stored comparison and report', async () => {
    const { app, res } = await compare()
    const id = res.body.compareId

    const got = await request(app).get(`/api/compare/${id}`)
    expect(got.status).toBe(200)
    expect(got.body.compareId).toBe(id)
    expect(got.body.records).toHaveLength(3)

    const report = await request(app).get(`/api/compare/${id}/report`)
    expect(report.status).toBe(200)
    expect(report.headers['content-type']).toMatch(/^text\/html/)
    expect(report.text).toContain('A fine of <del>100</del> <ins>500</ins> shall apply.')
  })

  it('renders exports on the fly', async () => {
    const { app, res } = await compare()
    const id = res.body.compareId

    const csv = await request(app).get(`/api/compare/${id}/export/csv`)
    expect(csv.status).toBe(200)
    expect(csv.headers['content-type']).toBe('text/csv; charset=utf-8')
    expect(csv.headers['content-disposition']).toBe('attachment; filename="comparison.csv"')
    expect(csv.text.split('\r\n')[2]).toBe(
      'Removed,0,unmatched_old,CHAPTER I,,section_6,,Section 6 Repeal,The old law is repealed.,,,,,,'
    )

    const xlsx = await request(app).get(`/api/compare/${id}/export/xlsx`)
    expect(xlsx.status).toBe(200)
    expect(xlsx.headers['content-type']).toBe('application/vnd.openxmlformats-officedocument.spreadsheetml.sheet')
  })

  it('queues a background export once and serves the built artifact', async () => {
    const { app, res } = await compare()
    const id = res.body.compareId

    const first = await request(app).post(`/api/compare/${id}/export/csv`)
    expect(first.status).toBe(202)
    expect(first.body).toEqual({ compareId: id, format: 'csv', status: 'pending', jobId: `${id}__export_csv`, error: null })

    const again = await request(app).post(`/api/compare/${id}/export/csv`)
    expect(again.status).toBe(202)
    expect(fake.enqueued).toEqual([{ compareId: id, format: 'csv' }])

    await processExportJob({ id: `${id}__export_csv`, data: { compareId: id, format: 'csv' }, attemptsMade: 0, opts: {} })
    const state = await request(app).get(`/api/compare/${id}`)
    expect(state.body.exports.csv).toEqual({ status: 'done', jobId: `${id}__export_csv`, error: null })

    // Served from disk once the job is done.
    await fs.writeFile(path.join(dir, id, 'comparison.csv'), 'built by worker\r\n')
    const csv = await request(app).get(`/api/compare/${id}/export/csv`)
    expect(csv.text).toBe('built by worker\r\n')
  })

  it('records the export as pending before the job is queued', async () => {
    const { res } = await compare()
    const id = res.body.compareId
    const seen: string[] = []
    const app = createApp({
      exportQueue: {
        async enqueue(data) {
          seen.push((await readExportState(await ensureArtifacts(data.compareId), data.format)).status)
        }
      }
    })

    const queued = await request(app).post(`/api/compare/${id}/export/docx`)
    expect(queued.status).toBe(202)
    expect(seen).toEqual(['pending'])
  })

  it('marks the export failed when it cannot be queued, and allows a retry', async () => {
    const { res } = await compare()
    const id = res.body.compareId
    const broken: ExportQueue = {
      async enqueue() {
        throw new Error('queue unavailable')
      }
    }

    const failed = await request(createApp({ exportQueue: broken })).post(`/api/compare/${id}/export/xlsx`)
    expect(failed.status).toBe(500)
    expect(failed.body).toEqual({ error: 'queue unavailable' })

    const app = createApp({ exportQueue: fake.queue })
    const state = await request(app).get(`/api/compare/${id}`)
    expect(state.body.exports.xlsx).toEqual({ status: 'failed', jobId: null, error: 'queue unavailable' })

    const retried = await request(app).post(`/api/compare/${id}/export/xlsx`)
    expect(retried.status).toBe(202)
    expect(fake.enqueued).toEqual([{ compareId: id, format: 'xlsx' }])
  })

  it('validates route parameters with zod', async () => {
    const app = createApp({ exportQueue: fake.queue })
    const badId = await request(app).get('/api/compare/not-an-id')
    expect(badId.status).toBe(400)
    expect(badId.body.error).toBe('invalid request')
    expect(badId.body.issues[0].path).toEqual(['compareId'])

    const badFormat = await request(app).get('/api/compare/cmp_00000000000000000000000000000000/export/pdf')
    expect(badFormat.status).toBe(400)
    expect(badFormat.body.issues[0].path).toEqual(['format'])
  })

  it('answers 404 for unknown comparisons and routes', async () => {
    const app = createApp({ exportQueue: fake.queue })
    const missing = await request(app).get('/api/compare/cmp_00000000000000000000000000000000')
    expect(missing.status).toBe(404)
    expect(missing.body).toEqual({ error: 'comparison cmp_00000000000000000000000000000000 not found' })

    const unknown = await request(app).get('/api/nothing-here')
    expect(unknown.status).toBe(404)
    expect(unknown.body).toEqual({ error: 'not found' })
  })
})
