import { diffArrays } from "diff";
import { escapeHtml, splitWords } from "./text";

export type InlineDiffOptions = {
  escapeHtml?: boolean;
};

/**
 * Word-level diff of two texts. Deleted words are wrapped in <del>, inserted words in
 * <ins>; a replacement renders the deletion first. Pieces are joined by single spaces.
 */
export function inlineDiff(oldText: string | null, newText: string | null, options?: InlineDiffOptions): string {
  const render = options?.escapeHtml ? escapeHtml : (s: string) => s;
  const out: string[] = [];
  let deleted: string[] = [];
  let inserted: string[] = [];

  const flushChange = () => {
    if (deleted.length > 0) out.push(`<del>${deleted.map(render).join(" ")}</del>`);
    if (inserted.length > 0) out.push(`<ins>${inserted.map(render).join(" ")}</ins>`);
    deleted = [];
    inserted = [];
  };

  for (const part of diffArrays(splitWords(oldText ?? ""), splitWords(newText ?? ""))) {
    if (part.removed) {
      deleted.push(...part.value);
      continue;
    }
    if (part.added) {
      inserted.push(...part.value);
      continue;
    }
    flushChange();
    out.push(...part.value.map(render));
  }
  flushChange();

  return out.join(" ");
}
