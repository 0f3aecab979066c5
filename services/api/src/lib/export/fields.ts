import type { MatchRecord } from "../types";

export const EXPORT_COLUMNS = [
  "status",
  "similarity",
  "match_method",
  "old_topic",
  "old_subtopic",
  "old_section_ref",
  "old_subsection_ref",
  "old_section_heading",
  "old_text",
  "new_topic",
  "new_subtopic",
  "new_section_ref",
  "new_subsection_ref",
  "new_section_heading",
  "new_text"
] as const;

export type ExportColumn = (typeof EXPORT_COLUMNS)[number];

export type ExportRow = Record<ExportColumn, string | number>;

export function roundSimilarity(similarity: number): number {
  return Math.round(similarity * 100) / 100;
}

export function toExportRow(r: MatchRecord): ExportRow {
  const o = r.oldUnit;
  const n = r.newUnit;
  return {
    status: r.status,
    similarity: roundSimilarity(r.similarity),
    match_method: r.matchMethod,
    old_topic: o?.topic ?? "",
    old_subtopic: o?.subtopic ?? "",
    old_section_ref: o?.sectionRef ?? "",
    old_subsection_ref: o?.subsectionRef ?? "",
    old_section_heading: o?.sectionHeading ?? "",
    old_text: o?.text ?? "",
    new_topic: n?.topic ?? "",
    new_subtopic: n?.subtopic ?? "",
    new_section_ref: n?.sectionRef ?? "",
    new_subsection_ref: n?.subsectionRef ?? "",
    new_section_heading: n?.sectionHeading ?? "",
    new_text: n?.text ?? ""
  };
}

/** "topic > subtopic > section ref > subsection ref", preferring the new side. */
export function recordPath(r: MatchRecord): string {
  const pick = (key: "topic" | "subtopic" | "sectionRef" | "subsectionRef") => r.newUnit?.[key] || r.oldUnit?.[key] || "";
  return [pick("topic"), pick("subtopic"), pick("sectionRef"), pick("subsectionRef")].filter(Boolean).join(" > ");
}
