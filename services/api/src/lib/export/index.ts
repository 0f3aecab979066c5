import type { ComparisonJsonV1, ExportFormat } from "../types";
import { renderCsv } from "./csv";
import { renderDocx } from "./docx";
import { renderXlsx } from "./xlsx";

export const EXPORT_FORMATS = ["xlsx", "csv", "docx"] as const satisfies readonly ExportFormat[];

export const CONTENT_TYPES: Record<ExportFormat, string> = {
  xlsx: "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
  csv: "text/csv; charset=utf-8",
  docx: "application/vnd.openxmlformats-officedocument.wordprocessingml.document"
};

export type RenderedExport = {
  buffer: Buffer;
  contentType: string;
  fileName: string;
};

export function exportFileName(format: ExportFormat): string {
  return `comparison.${format}`;
}

export async function renderExport(format: ExportFormat, comparison: ComparisonJsonV1): Promise<RenderedExport> {
  let buffer: Buffer;
  switch (format) {
    case "csv":
      buffer = Buffer.from(renderCsv(comparison.records), "utf8");
      break;
    case "xlsx":
      buffer = await renderXlsx(comparison.records);
      break;
    case "docx":
      buffer = await renderDocx(comparison.summary, comparison.records);
      break;
  }
  return { buffer, contentType: CONTENT_TYPES[format], fileName: exportFileName(format) };
}
