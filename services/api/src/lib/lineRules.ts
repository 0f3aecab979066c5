export type LineKind = "blank" | "chapter" | "shouty" | "section" | "numericHeading" | "body";

export type LineContext = {
  sectionOpen: boolean;
};

export type LineRule = {
  kind: Exclude<LineKind, "blank" | "body">;
  test: (line: string, ctx: LineContext) => boolean;
};

export const CHAPTER_RE = /^\s*(chapter|part|schedule)\s+([ivx]+|\d+)\b.*$/i;
export const SECTION_RE = /^\s*(section|sec\.)\s+(\d+[A-Za-z-]*)\b(.*)$/i;
export const SHOUTY_RE = /^\s*[A-Z][A-Z \-&.,]{5,}$/;
export const NUMERIC_HEADING_RE = /^\s*(\d+(?:\.\d+)*)\s+[\w()]/;

// Order is priority: the first rule that accepts a line decides its kind.
export const LINE_RULES: readonly LineRule[] = [
  { kind: "chapter", test: (line) => CHAPTER_RE.test(line) },
  { kind: "shouty", test: (line) => SHOUTY_RE.test(line) && !SECTION_RE.test(line) },
  { kind: "section", test: (line) => SECTION_RE.test(line) },
  { kind: "numericHeading", test: (line, ctx) => !ctx.sectionOpen && NUMERIC_HEADING_RE.test(line) }
];

export function classifyLine(raw: string, ctx: LineContext): LineKind {
  const line = raw.trim();
  if (!line) return "blank";
  for (const rule of LINE_RULES) {
    if (rule.test(line, ctx)) return rule.kind;
  }
  return "body";
}

export function sectionNumber(line: string): string | null {
  const m = SECTION_RE.exec(line.trim());
  return m ? m[2].toLowerCase() : null;
}
