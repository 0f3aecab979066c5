import fs from "node:fs/promises";
import { z } from "zod";
import { COMPARE_ID_RE } from "./compare";
import { EXPORT_FORMATS, renderExport } from "./export";
import { createLogger } from "./logger";
import type { ExportJobData } from "./queue";
import { ensureArtifacts, readComparison, readExportState, writeExportState } from "./storage";
import type { ExportJobState } from "./types";

const log = createLogger("exportJob");

export const exportJobDataSchema: z.ZodType<ExportJobData> = z.object({
  compareId: z.string().regex(COMPARE_ID_RE),
  format: z.enum(EXPORT_FORMATS)
});

/** The parts of a bullmq Job the processor reads. */
export type ExportJobLike = {
  id?: string;
  data: unknown;
  attemptsMade: number;
  opts: { attempts?: number };
};

async function updateExportState(data: ExportJobData, patch: Partial<ExportJobState>): Promise<void> {
  const artifacts = await ensureArtifacts(data.compareId);
  const current = await readExportState(artifacts, data.format);
  await writeExportState(artifacts, data.format, { ...current, ...patch });
}

export async function processExportJob(job: ExportJobLike): Promise<string> {
  const data = exportJobDataSchema.parse(job.data);
  const artifacts = await ensureArtifacts(data.compareId);
  const comparison = await readComparison(artifacts);
  await updateExportState(data, { status: "running", jobId: job.id ?? null, error: null });

  const rendered = await renderExport(data.format, comparison);
  const outPath = artifacts.exportPaths[data.format];
  await fs.writeFile(outPath, rendered.buffer);

  await updateExportState(data, { status: "done", error: null });
  log.info({ compareId: data.compareId, format: data.format, bytes: rendered.buffer.length }, "export written");
  return outPath;
}

/** Records a failed attempt: back to pending while retries remain, failed after the last one. */
export async function recordExportFailure(job: ExportJobLike, err: Error): Promise<void> {
  const parsed = exportJobDataSchema.safeParse(job.data);
  if (!parsed.success) {
    log.error({ jobId: job.id, err }, "export job failed with unreadable data");
    return;
  }
  const attempts = job.opts.attempts ?? 1;
  const willRetry = job.attemptsMade < attempts;
  await updateExportState(parsed.data, {
    status: willRetry ? "pending" : "failed",
    jobId: job.id ?? null,
    error: err.message
  });
  log.warn({ compareId: parsed.data.compareId, format: parsed.data.format, willRetry, err }, "export job failed");
}
