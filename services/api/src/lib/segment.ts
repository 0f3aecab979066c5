import { classifyLine, sectionNumber, type LineKind } from "./lineRules";
import { makeSectionRef, positionalSectionRef } from "./sectionRef";
import { splitSubsections } from "./subsections";
import { normalizeText } from "./text";
import type { Unit } from "./types";

type SegmentCtx = {
  topic: string;
  subtopic: string;
  sectionRef: string;
  sectionHeading: string;
  body: string[];
  /** Headingless sections seen so far, per (topic, subtopic) scope. */
  untitledSections: Map<string, number>;
  units: Unit[];
};

type LineHandler = (ctx: SegmentCtx, line: string, raw: string) => void;

const appendRaw: LineHandler = (ctx, _line, raw) => {
  ctx.body.push(raw);
};

const HANDLERS: Record<LineKind, LineHandler> = {
  blank: appendRaw,
  body: appendRaw,
  chapter: (ctx, line) => {
    flushSection(ctx);
    ctx.topic = line;
    ctx.subtopic = "";
  },
  shouty: (ctx, line) => {
    flushSection(ctx);
    ctx.subtopic = line;
  },
  section: (ctx, line) => {
    flushSection(ctx);
    ctx.sectionRef = `section_${sectionNumber(line) ?? ""}`;
    ctx.sectionHeading = line;
  },
  // A numeric heading names the block but does not open a section; its line stays in the body.
  numericHeading: (ctx, line, raw) => {
    flushSection(ctx);
    if (!ctx.subtopic) ctx.subtopic = line;
    ctx.body.push(raw);
  }
};

export function segment(text: string): Unit[] {
  const ctx: SegmentCtx = {
    topic: "",
    subtopic: "",
    sectionRef: "",
    sectionHeading: "",
    body: [],
    untitledSections: new Map(),
    units: []
  };

  for (const raw of normalizeText(text).split("\n")) {
    const kind = classifyLine(raw, { sectionOpen: ctx.sectionHeading.length > 0 });
    HANDLERS[kind](ctx, raw.trim(), raw);
  }
  flushSection(ctx);

  return ctx.units;
}

// Numbered within the enclosing topic and subtopic.
function nextUntitledRef(ctx: SegmentCtx): string {
  const scope = JSON.stringify([ctx.topic, ctx.subtopic]);
  const n = (ctx.untitledSections.get(scope) ?? 0) + 1;
  ctx.untitledSections.set(scope, n);
  return positionalSectionRef(n);
}

function flushSection(ctx: SegmentCtx): void {
  const body = ctx.body.join("\n").trim();
  if (ctx.sectionHeading || body) {
    const sectionRef = ctx.sectionRef || makeSectionRef(ctx.sectionHeading) || nextUntitledRef(ctx);
    const base = {
      topic: ctx.topic,
      subtopic: ctx.subtopic,
      sectionRef,
      sectionHeading: ctx.sectionHeading
    };
    const subsections = splitSubsections(body);
    if (subsections.length === 0) {
      ctx.units.push({ ...base, subsectionRef: "", text: body });
    } else {
      for (const s of subsections) ctx.units.push({ ...base, subsectionRef: s.ref, text: s.text });
    }
  }
  ctx.sectionRef = "";
  ctx.sectionHeading = "";
  ctx.body = [];
}
