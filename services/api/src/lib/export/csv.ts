import type { MatchRecord } from "../types";
import { EXPORT_COLUMNS, toExportRow } from "./fields";

function csvField(value: string | number): string {
  const s = String(value);
  return /[",\r\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

export function renderCsv(records: readonly MatchRecord[]): string {
  const lines = [EXPORT_COLUMNS.join(",")];
  for (const r of records) {
    const row = toExportRow(r);
    lines.push(EXPORT_COLUMNS.map((col) => csvField(row[col])).join(","));
  }
  return lines.join("\r\n") + "\r\n";
}
