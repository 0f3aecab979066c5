import { recordPath } from "./export/fields";
import { inlineDiff } from "./inlineDiff";
import { escapeHtml } from "./text";
import type { ChangeStatus, ComparisonSummary, MatchRecord } from "./types";

const STATUS_CLASS: Record<ChangeStatus, string> = {
  Added: "added",
  Removed: "removed",
  Unchanged: "unchanged",
  "Minor edit": "minor",
  Modified: "modified",
  "Substantially modified": "substantial"
};

function panelBody(r: MatchRecord): string {
  if (r.status === "Added") return `<div class="text">${escapeHtml(r.newUnit?.text ?? "")}</div>`;
  if (r.status === "Removed") return `<div class="text">${escapeHtml(r.oldUnit?.text ?? "")}</div>`;
  return `<div class="text">${inlineDiff(r.oldUnit?.text ?? "", r.newUnit?.text ?? "", { escapeHtml: true })}</div>`;
}

function renderPanel(r: MatchRecord): string {
  const path = recordPath(r) || "(untitled)";
  const heading = r.newUnit?.sectionHeading || r.oldUnit?.sectionHeading || "";
  return `<details class="panel status-${STATUS_CLASS[r.status]}">
        <summary><span class="path">${escapeHtml(path)}</span> <span class="status">${escapeHtml(r.status)}</span> <span class="meta">similarity ${r.similarity.toFixed(1)} · ${r.matchMethod}</span></summary>
        ${heading ? `<div class="heading">${escapeHtml(heading)}</div>` : ""}
        ${panelBody(r)}
      </details>`;
}

export function renderReportHtml(params: {
  summary: ComparisonSummary;
  records: readonly MatchRecord[];
  title?: string;
}): string {
  const { summary, records } = params;
  const title = params.title ?? "Act Comparison Report";
  const panels = records.map(renderPanel).join("\n      ");

  return `<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1" />
    <title>${escapeHtml(title)}</title>
    <style>
      body{margin:0 auto;max-width:1100px;padding:24px;background:#fff;color:#000;font-family:ui-sans-serif,system-ui,-apple-system,Segoe UI,Roboto,Helvetica,Arial;line-height:1.5;}
      .summary{display:flex;gap:16px;margin:12px 0 24px;}
      .summary div{border:1px solid #eee;border-radius:8px;padding:8px 12px;}
      .panel{border:1px solid #eee;border-left-width:4px;border-radius:6px;margin:8px 0;padding:6px 12px;}
      .panel summary{cursor:pointer;}
      .panel .status{font-weight:700;}
      .panel .meta{color:#666;font-size:.9em;}
      .panel .heading{font-style:italic;margin:.4em 0;}
      .panel .text{white-space:pre-wrap;overflow-wrap:anywhere;}
      .status-added{border-left-color:#22c55e;background:#f0fff4;}
      .status-removed{border-left-color:#ef4444;background:#fff5f5;}
      .status-unchanged{border-left-color:#d4d4d4;}
      .status-minor{border-left-color:#facc15;}
      .status-modified{border-left-color:#f59e0b;}
      .status-substantial{border-left-color:#c2410c;background:#fff7e6;}
      ins{background:#c6f6d5;text-decoration:none;font-weight:700;}
      del{background:#fed7d7;text-decoration:line-through;font-weight:700;}
      @media print {
        .panel{break-inside:avoid;}
      }
    </style>
  </head>
  <body>
    <h1>${escapeHtml(title)}</h1>
    <section class="summary">
      <div>Total: ${summary.total}</div>
      <div>Added: ${summary.added}</div>
      <div>Removed: ${summary.removed}</div>
      <div>Modified: ${summary.modified}</div>
      <div>Unchanged: ${summary.unchanged}</div>
    </section>
    <article class="panels">
      ${panels}
    </article>
  </body>
</html>`;
}
