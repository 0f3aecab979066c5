import { slugify } from "./text";

const SECTION_IN_HEADING_RE = /(section|sec\.)\s+(\d+[A-Za-z-]*)/i;
const DOTTED_NUMERAL_RE = /^\s*(\d+(?:\.\d+)*)/;
const CHAPTER_OR_PART_RE = /^\s*(chapter|part)\s+([ivx]+|\d+)\b/i;

/**
 * Derives a stable section reference from a heading line.
 * Returns "" for an empty heading; callers assign a positional id in that case.
 */
export function makeSectionRef(heading: string): string {
  if (!heading.trim()) return "";

  const section = SECTION_IN_HEADING_RE.exec(heading);
  if (section) return `section_${section[2].toLowerCase()}`;

  const numeral = DOTTED_NUMERAL_RE.exec(heading);
  if (numeral) return `num_${numeral[1]}`;

  const chapter = CHAPTER_OR_PART_RE.exec(heading);
  if (chapter) return `${chapter[1].toLowerCase()}_${chapter[2].toLowerCase()}`;

  return `h_${slugify(heading)}`;
}

export function positionalSectionRef(index: number): string {
  return `auto_section_${index}`;
}
