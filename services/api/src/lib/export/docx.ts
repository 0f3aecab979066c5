import type { ComparisonSummary, MatchRecord } from "../types";
import { recordPath } from "./fields";
import { buildPart, contentTypes, el, relationships, text, zipPackage, type XmlNode } from "./ooxml";

const NS_W = "http://schemas.openxmlformats.org/wordprocessingml/2006/main";

export const REPORT_TITLE = "Act Comparison Report";
export const REPORT_INTRO =
  "This report summarizes the differences between the Old Act and the New Act, organized by Topic/SubTopic/Section/Subsection.";

type ParagraphOptions = { style?: string; bold?: boolean };

// Line breaks inside one paragraph become <w:br/> so multi-line legal text keeps its shape.
function runs(value: string, bold: boolean): XmlNode[] {
  const rPr = bold ? [el("w:rPr", null, [el("w:b", null)])] : [];
  const children: XmlNode[] = [];
  value.split("\n").forEach((line, i) => {
    if (i > 0) children.push(el("w:br", null));
    children.push(el("w:t", { "xml:space": "preserve" }, [text(line)]));
  });
  return [el("w:r", null, [...rPr, ...children])];
}

function paragraph(value: string, opts: ParagraphOptions = {}): XmlNode {
  const pPr = opts.style ? [el("w:pPr", null, [el("w:pStyle", { "w:val": opts.style })])] : [];
  const body = value ? runs(value, Boolean(opts.bold)) : [];
  return el("w:p", null, [...pPr, ...body]);
}

export function narrativeParagraphs(summary: ComparisonSummary, records: readonly MatchRecord[]): XmlNode[] {
  const out: XmlNode[] = [
    paragraph(REPORT_TITLE, { style: "Title" }),
    paragraph(REPORT_INTRO),
    paragraph("Executive Summary", { style: "Heading1" }),
    paragraph(`Total compared units: ${summary.total}`),
    paragraph(
      `Added: ${summary.added}, Removed: ${summary.removed}, Modified: ${summary.modified}, Unchanged: ${summary.unchanged}`
    ),
    paragraph("Detailed Narrative", { style: "Heading1" })
  ];

  for (const r of records) {
    out.push(paragraph(`${recordPath(r)} - ${r.status} (Similarity: ${Math.round(r.similarity)}%)`, { bold: true }));
    const oldText = r.oldUnit?.text ?? "";
    const newText = r.newUnit?.text ?? "";
    if (r.status === "Added") {
      out.push(paragraph(newText));
    } else if (r.status === "Removed") {
      out.push(paragraph(oldText));
    } else {
      out.push(paragraph("Old:"), paragraph(oldText), paragraph("New:"), paragraph(newText));
    }
    out.push(paragraph(""));
  }
  return out;
}

function documentXml(summary: ComparisonSummary, records: readonly MatchRecord[]): string {
  return buildPart(
    el("w:document", { "xmlns:w": NS_W }, [
      el("w:body", null, [
        ...narrativeParagraphs(summary, records),
        el("w:sectPr", null, [
          el("w:pgSz", { "w:w": "11906", "w:h": "16838" }),
          el("w:pgMar", { "w:top": "1440", "w:right": "1440", "w:bottom": "1440", "w:left": "1440" })
        ])
      ])
    ])
  );
}

function headingStyle(id: string, name: string, sizeHalfPoints: string): XmlNode {
  return el("w:style", { "w:type": "paragraph", "w:styleId": id }, [
    el("w:name", { "w:val": name }),
    el("w:basedOn", { "w:val": "Normal" }),
    el("w:next", { "w:val": "Normal" }),
    el("w:pPr", null, [el("w:spacing", { "w:before": "240", "w:after": "120" })]),
    el("w:rPr", null, [el("w:b", null), el("w:sz", { "w:val": sizeHalfPoints })])
  ]);
}

function stylesXml(): string {
  return buildPart(
    el("w:styles", { "xmlns:w": NS_W }, [
      el("w:style", { "w:type": "paragraph", "w:default": "1", "w:styleId": "Normal" }, [
        el("w:name", { "w:val": "Normal" }),
        el("w:rPr", null, [el("w:sz", { "w:val": "22" })])
      ]),
      headingStyle("Title", "Title", "40"),
      headingStyle("Heading1", "heading 1", "32")
    ])
  );
}

export async function renderDocx(summary: ComparisonSummary, records: readonly MatchRecord[]): Promise<Buffer> {
  return zipPackage({
    "[Content_Types].xml": contentTypes([
      {
        partName: "/word/document.xml",
        contentType: "application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"
      },
      { partName: "/word/styles.xml", contentType: "application/vnd.openxmlformats-officedocument.wordprocessingml.styles+xml" }
    ]),
    "_rels/.rels": relationships([{ id: "rId1", type: "officeDocument", target: "word/document.xml" }]),
    "word/document.xml": documentXml(summary, records),
    "word/_rels/document.xml.rels": relationships([{ id: "rId1", type: "styles", target: "styles.xml" }]),
    "word/styles.xml": stylesXml()
  });
}
