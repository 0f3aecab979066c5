import { diffArrays, diffChars } from "diff";
import { splitWords } from "./text";
import type { ChangeStatus } from "./types";

export const MINOR_EDIT_MIN_SCORE = 90;
export const MODIFIED_MIN_SCORE = 65;

/** Combined length above which `lcsLength` diffs words and whitespace runs instead of characters. */
export const CHAR_DIFF_MAX_LENGTH = 10_000;

/**
 * Characters shared by the longest common subsequence of whole words and whitespace runs.
 * Never more than the character LCS.
 */
export function tokenLcsLength(a: string, b: string): number {
  const tokens = (s: string) => s.split(/(\s+)/).filter(Boolean);
  let common = 0;
  for (const part of diffArrays(tokens(a), tokens(b))) {
    if (!part.added && !part.removed) common += part.value.reduce((n, t) => n + t.length, 0);
  }
  return common;
}

/**
 * Length of the longest common character subsequence, read off a minimal character diff.
 * Past `CHAR_DIFF_MAX_LENGTH` the word-level `tokenLcsLength` stands in for it.
 */
export function lcsLength(a: string, b: string): number {
  if (!a || !b) return 0;
  if (a.length + b.length > CHAR_DIFF_MAX_LENGTH) return tokenLcsLength(a, b);
  let common = 0;
  for (const part of diffChars(a, b)) {
    if (!part.added && !part.removed) common += part.value.length;
  }
  return common;
}

function indelDistance(a: string, b: string): number {
  return a.length + b.length - 2 * lcsLength(a, b);
}

function normalizedScore(distance: number, lengthSum: number): number {
  return lengthSum ? 100 - (100 * distance) / lengthSum : 100;
}

/** Indel similarity of two strings, 0..100. */
export function ratio(a: string, b: string): number {
  return normalizedScore(indelDistance(a, b), a.length + b.length);
}

/**
 * Order- and duplicate-insensitive similarity over the whitespace-separated tokens of
 * two strings, 0..100. Case-sensitive; either side without tokens scores 0.
 */
export function tokenSetRatio(a: string, b: string): number {
  const tokensA = new Set(splitWords(a));
  const tokensB = new Set(splitWords(b));
  if (tokensA.size === 0 || tokensB.size === 0) return 0;

  const intersection = [...tokensA].filter((t) => tokensB.has(t));
  const diffAB = [...tokensA].filter((t) => !tokensB.has(t)).sort();
  const diffBA = [...tokensB].filter((t) => !tokensA.has(t)).sort();

  if (intersection.length > 0 && (diffAB.length === 0 || diffBA.length === 0)) return 100;

  const joinedAB = diffAB.join(" ");
  const joinedBA = diffBA.join(" ");
  const sectLen = intersection.join(" ").length;
  const separator = sectLen > 0 ? 1 : 0;
  const sectABLen = sectLen + separator + joinedAB.length;
  const sectBALen = sectLen + separator + joinedBA.length;

  // The shared "sect " prefix adds nothing to the indel distance of the two combined strings.
  const combined = normalizedScore(indelDistance(joinedAB, joinedBA), sectABLen + sectBALen);
  if (sectLen === 0) return combined;

  const sectVsAB = normalizedScore(separator + joinedAB.length, sectLen + sectABLen);
  const sectVsBA = normalizedScore(separator + joinedBA.length, sectLen + sectBALen);
  return Math.max(combined, sectVsAB, sectVsBA);
}

export function classifyScore(score: number): Exclude<ChangeStatus, "Added" | "Removed" | "Unchanged"> {
  if (score >= MINOR_EDIT_MIN_SCORE) return "Minor edit";
  if (score >= MODIFIED_MIN_SCORE) return "Modified";
  return "Substantially modified";
}

export function compareTexts(
  oldText: string | null | undefined,
  newText: string | null | undefined
): { status: ChangeStatus; similarity: number } {
  const a = (oldText ?? "").trim();
  const b = (newText ?? "").trim();
  if (a === b) return { status: "Unchanged", similarity: 100 };
  const score = tokenSetRatio(a, b);
  return { status: classifyScore(score), similarity: score };
}
