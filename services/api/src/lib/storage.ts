import crypto from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import { z } from "zod";
import { loadConfig } from "./config";
import { NotFoundError } from "./errors";
import { EXPORT_FORMATS } from "./export";
import type { ComparisonJsonV1, ExportFormat, ExportJobState } from "./types";

export type CompareArtifacts = {
  compareId: string;
  dir: string;
  jsonPath: string;
  reportPath: string;
  exportPaths: Record<ExportFormat, string>;
  /** One state file per format; compare.json is not rewritten after creation. */
  exportStatePaths: Record<ExportFormat, string>;
};

export async function ensureArtifacts(compareId: string): Promise<CompareArtifacts> {
  const dir = path.join(loadConfig().artifactsDir, compareId);
  await fs.mkdir(dir, { recursive: true });
  return {
    compareId,
    dir,
    jsonPath: path.join(dir, "compare.json"),
    reportPath: path.join(dir, "report.html"),
    exportPaths: {
      xlsx: path.join(dir, "comparison.xlsx"),
      csv: path.join(dir, "comparison.csv"),
      docx: path.join(dir, "comparison.docx")
    },
    exportStatePaths: {
      xlsx: path.join(dir, "export.xlsx.json"),
      csv: path.join(dir, "export.csv.json"),
      docx: path.join(dir, "export.docx.json")
    }
  };
}

export async function writeJson(filePath: string, data: unknown): Promise<void> {
  const tmpPath = `${filePath}.${crypto.randomUUID()}.tmp`;
  try {
    await fs.writeFile(tmpPath, `${JSON.stringify(data, null, 2)}\n`, "utf8");
    await fs.rename(tmpPath, filePath);
  } catch (e) {
    await fs.rm(tmpPath, { force: true });
    throw e;
  }
}

const READ_RETRY_DELAYS_MS = [25, 50, 100];

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e;
}

function isMissing(e: unknown): boolean {
  return isErrnoException(e) && e.code === "ENOENT";
}

/** Parses a JSON file, retrying a few times while it is missing or half-written. */
export async function readJson(filePath: string): Promise<unknown> {
  for (const delay of READ_RETRY_DELAYS_MS) {
    try {
      return JSON.parse(await fs.readFile(filePath, "utf8"));
    } catch (e) {
      if (!(e instanceof SyntaxError) && !isMissing(e)) throw e;
      await sleep(delay);
    }
  }
  return JSON.parse(await fs.readFile(filePath, "utf8"));
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.stat(filePath);
    return true;
  } catch (e) {
    if (isMissing(e)) return false;
    throw e;
  }
}

const unitSchema = z.object({
  topic: z.string(),
  subtopic: z.string(),
  sectionRef: z.string(),
  sectionHeading: z.string(),
  subsectionRef: z.string(),
  text: z.string()
});

const exportStateSchema = z.object({
  status: z.enum(["none", "pending", "running", "done", "failed"]),
  jobId: z.string().nullable(),
  error: z.string().nullable()
});

const documentMetaSchema = z.object({
  fileName: z.string(),
  mimeType: z.string(),
  sha256: z.string(),
  units: z.number().int().nonnegative()
});

export const comparisonSchema: z.ZodType<ComparisonJsonV1> = z.object({
  schemaVersion: z.literal("1"),
  compareId: z.string(),
  createdAt: z.string(),
  document: z.object({ old: documentMetaSchema, new: documentMetaSchema }),
  summary: z.object({
    total: z.number(),
    added: z.number(),
    removed: z.number(),
    modified: z.number(),
    unchanged: z.number()
  }),
  records: z.array(
    z.object({
      oldUnit: unitSchema.nullable(),
      newUnit: unitSchema.nullable(),
      status: z.enum(["Added", "Removed", "Unchanged", "Minor edit", "Modified", "Substantially modified"]),
      similarity: z.number().min(0).max(100),
      matchMethod: z.enum(["exact_key", "fuzzy_heading", "unmatched_old", "new_only"])
    })
  ),
  exports: z.object({ xlsx: exportStateSchema, csv: exportStateSchema, docx: exportStateSchema }),
  artifacts: z.object({ reportUrl: z.string() })
});

/**
 * Reads compare.json with the current export states laid over it. compare.json itself
 * is written once, when the comparison is created.
 */
export async function readComparison(artifacts: CompareArtifacts): Promise<ComparisonJsonV1> {
  if (!(await fileExists(artifacts.jsonPath))) throw new NotFoundError(`comparison ${artifacts.compareId} not found`);
  const comparison = comparisonSchema.parse(await readJson(artifacts.jsonPath));
  for (const format of EXPORT_FORMATS) {
    const state = await readStoredExportState(artifacts, format);
    if (state) comparison.exports[format] = state;
  }
  return comparison;
}

export async function writeComparison(artifacts: CompareArtifacts, comparison: ComparisonJsonV1): Promise<void> {
  await writeJson(artifacts.jsonPath, comparison);
}

async function readStoredExportState(artifacts: CompareArtifacts, format: ExportFormat): Promise<ExportJobState | null> {
  const statePath = artifacts.exportStatePaths[format];
  if (!(await fileExists(statePath))) return null;
  return exportStateSchema.parse(await readJson(statePath));
}

export async function readExportState(artifacts: CompareArtifacts, format: ExportFormat): Promise<ExportJobState> {
  return (await readStoredExportState(artifacts, format)) ?? { status: "none", jobId: null, error: null };
}

export async function writeExportState(
  artifacts: CompareArtifacts,
  format: ExportFormat,
  state: ExportJobState
): Promise<void> {
  await writeJson(artifacts.exportStatePaths[format], state);
}
