import { compareTexts, tokenSetRatio } from "./similarity";
import type { ChangeStatus, ComparisonSummary, MatchMethod, MatchRecord, Unit } from "./types";

export const FUZZY_HEADING_MIN_SCORE = 80;

export function compositeKey(u: Unit): string {
  return JSON.stringify([u.topic, u.subtopic, u.sectionRef, u.subsectionRef]);
}

/**
 * Keys each unit by its composite key plus the occurrence number of that key, so the
 * n-th "(a)" of a section on one side pairs with the n-th "(a)" on the other.
 */
function occurrenceKeys(units: readonly Unit[]): string[] {
  const seen = new Map<string, number>();
  return units.map((u) => {
    const key = compositeKey(u);
    const n = (seen.get(key) ?? 0) + 1;
    seen.set(key, n);
    return `${key}#${n}`;
  });
}

function headingQuery(u: Unit): string {
  return `${u.subtopic} ${u.sectionHeading}`;
}

function makeRecord(
  oldUnit: Unit | null,
  newUnit: Unit | null,
  method: MatchMethod,
  status?: ChangeStatus,
  similarity?: number
): MatchRecord {
  if (status !== undefined && similarity !== undefined) {
    return { oldUnit, newUnit, status, similarity, matchMethod: method };
  }
  const cmp = compareTexts(oldUnit?.text, newUnit?.text);
  return { oldUnit, newUnit, status: cmp.status, similarity: cmp.similarity, matchMethod: method };
}

export function align(oldUnits: readonly Unit[], newUnits: readonly Unit[]): MatchRecord[] {
  const oldKeys = occurrenceKeys(oldUnits);
  const newIndexByKey = new Map(occurrenceKeys(newUnits).map((k, j) => [k, j]));
  const consumed = new Array<boolean>(newUnits.length).fill(false);

  const records: MatchRecord[] = oldUnits.map((ou, i) => {
    const j = newIndexByKey.get(oldKeys[i]);
    if (j === undefined) return makeRecord(ou, null, "unmatched_old", "Removed", 0);
    consumed[j] = true;
    return makeRecord(ou, newUnits[j], "exact_key");
  });

  for (let i = 0; i < records.length; i++) {
    const ou = records[i].oldUnit;
    if (records[i].matchMethod !== "unmatched_old" || !ou) continue;

    const remaining = newUnits.map((_, j) => j).filter((j) => !consumed[j]);
    if (remaining.length === 0) break;

    const sameRef = remaining.filter((j) => newUnits[j].sectionRef === ou.sectionRef);
    const candidates = sameRef.length > 0 ? sameRef : remaining;
    const query = headingQuery(ou);

    let best = -1;
    let bestScore = -1;
    for (const j of candidates) {
      const score = tokenSetRatio(query, headingQuery(newUnits[j]).trim());
      if (score > bestScore) {
        best = j;
        bestScore = score;
      }
    }

    if (best >= 0 && bestScore >= FUZZY_HEADING_MIN_SCORE) {
      records[i] = makeRecord(ou, newUnits[best], "fuzzy_heading");
      consumed[best] = true;
    }
  }

  newUnits.forEach((nu, j) => {
    if (!consumed[j]) records.push(makeRecord(null, nu, "new_only", "Added", 0));
  });

  return records;
}

export function summarize(records: readonly MatchRecord[]): ComparisonSummary {
  const summary: ComparisonSummary = { total: records.length, added: 0, removed: 0, modified: 0, unchanged: 0 };
  for (const r of records) {
    if (r.status === "Added") summary.added++;
    else if (r.status === "Removed") summary.removed++;
    else if (r.status === "Unchanged") summary.unchanged++;
    else summary.modified++;
  }
  return summary;
}
