import crypto from "node:crypto";
import fs from "node:fs/promises";
import { align, summarize } from "./align";
import { extractText, type UploadedDocument } from "./extract";
import { sha256 } from "./hash";
import { createLogger } from "./logger";
import { renderReportHtml } from "./render";
import { segment } from "./segment";
import { ensureArtifacts, writeComparison } from "./storage";
import type { ComparisonJsonV1, DocumentMeta, ExportJobState, Unit } from "./types";

const log = createLogger("compare");

export const COMPARE_ID_RE = /^cmp_[0-9a-f]{32}$/;

export function newCompareId(): string {
  return `cmp_${crypto.randomUUID().replace(/-/g, "")}`;
}

export function reportUrl(compareId: string): string {
  return `/api/compare/${compareId}/report`;
}

function idleExport(): ExportJobState {
  return { status: "none", jobId: null, error: null };
}

function documentMeta(doc: UploadedDocument, units: readonly Unit[]): DocumentMeta {
  return { fileName: doc.fileName, mimeType: doc.mimeType, sha256: sha256(doc.buffer), units: units.length };
}

/** Extract, segment and align two uploads, then store compare.json and report.html. */
export async function runComparison(params: {
  oldDoc: UploadedDocument;
  newDoc: UploadedDocument;
  compareId?: string;
}): Promise<ComparisonJsonV1> {
  const { oldDoc, newDoc } = params;
  const compareId = params.compareId ?? newCompareId();
  const startedAt = Date.now();

  const [oldText, newText] = await Promise.all([extractText(oldDoc), extractText(newDoc)]);
  const oldUnits = segment(oldText);
  const newUnits = segment(newText);
  const records = align(oldUnits, newUnits);
  const summary = summarize(records);

  const comparison: ComparisonJsonV1 = {
    schemaVersion: "1",
    compareId,
    createdAt: new Date().toISOString(),
    document: {
      old: documentMeta(oldDoc, oldUnits),
      new: documentMeta(newDoc, newUnits)
    },
    summary,
    records,
    exports: { xlsx: idleExport(), csv: idleExport(), docx: idleExport() },
    artifacts: { reportUrl: reportUrl(compareId) }
  };

  const artifacts = await ensureArtifacts(compareId);
  await fs.writeFile(artifacts.reportPath, renderReportHtml({ summary, records }), "utf8");
  await writeComparison(artifacts, comparison);

  log.info(
    { compareId, oldUnits: oldUnits.length, newUnits: newUnits.length, ...summary, ms: Date.now() - startedAt },
    "comparison stored"
  );
  return comparison;
}
