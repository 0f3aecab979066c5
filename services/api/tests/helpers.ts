import type { ComparisonJsonV1, MatchRecord, Unit } from '../src/lib/types'

export const mkUnit = (patch: Partial<Unit>): Unit => {
  return {
    topic: patch.topic ?? '',
    subtopic: patch.subtopic ?? '',
    sectionRef: patch.sectionRef ?? 'section_1',
    sectionHeading: patch.sectionHeading ?? '',
    subsectionRef: patch.subsectionRef ?? '',
    text: patch.text ?? ''
  }
}

export const penaltyOld = mkUnit({
  topic: 'CHAPTER I',
  sectionRef: 'section_5',
  sectionHeading: 'Section 5 Penalty',
  subsectionRef: '(1)',
  text: 'A fine of 100, or "more".'
})

export const penaltyNew = mkUnit({ ...penaltyOld, text: 'A fine of 500, or "more".' })

export const addedUnit = mkUnit({ sectionRef: 'auto_section_1', text: 'line one\nline two' })

export const sampleRecords: MatchRecord[] = [
  { oldUnit: penaltyOld, newUnit: penaltyNew, status: 'Minor edit', similarity: 96.15384615, matchMethod: 'exact_key' },
  { oldUnit: null, newUnit: addedUnit, status: 'Added', similarity: 0, matchMethod: 'new_only' }
]

export const mkComparison = (compareId: string, records: MatchRecord[] = sampleRecords): ComparisonJsonV1 => {
  return {
    schemaVersion: '1',
    compareId,
    createdAt: '2026-01-01T00:00:00.000Z',
    document: {
      old: { fileName: 'old.txt', mimeType: 'text/plain', sha256: 'a'.repeat(64), units: 1 },
      new: { fileName: 'new.txt', mimeType: 'text/plain', sha256: 'b'.repeat(64), units: 2 }
    },
    summary: { total: 2, added: 1, removed: 0, modified: 1, unchanged: 0 },
    records,
    exports: {
      xlsx: { status: 'none', jobId: null, error: null },
      csv: { status: 'none', jobId: null, error: null },
      docx: { status: 'none', jobId: null, error: null }
    },
    artifacts: { reportUrl: `/api/compare/${compareId}/report` }
  }
}
