import type { MatchRecord } from "../types";
import { EXPORT_COLUMNS, toExportRow } from "./fields";
import { buildPart, contentTypes, el, relationships, text, zipPackage, type XmlNode } from "./ooxml";

const SHEET_NAME = "Comparison";

const NS_MAIN = "http://schemas.openxmlformats.org/spreadsheetml/2006/main";
const NS_REL = "http://schemas.openxmlformats.org/officeDocument/2006/relationships";

/** 0 -> "A", 25 -> "Z", 26 -> "AA" */
export function columnLetter(index: number): string {
  let n = index + 1;
  let out = "";
  while (n > 0) {
    const rem = (n - 1) % 26;
    out = String.fromCharCode(65 + rem) + out;
    n = Math.floor((n - 1) / 26);
  }
  return out;
}

function cell(ref: string, value: string | number, style?: string): XmlNode {
  const styleAttr: Record<string, string> = style ? { s: style } : {};
  if (typeof value === "number") {
    return el("c", { r: ref, ...styleAttr }, [el("v", null, [text(String(value))])]);
  }
  return el("c", { r: ref, t: "inlineStr", ...styleAttr }, [
    el("is", null, [el("t", { "xml:space": "preserve" }, [text(value)])])
  ]);
}

function sheetXml(records: readonly MatchRecord[]): string {
  const rows: XmlNode[] = [
    el(
      "row",
      { r: "1" },
      EXPORT_COLUMNS.map((col, i) => cell(`${columnLetter(i)}1`, col, "1"))
    )
  ];
  records.forEach((r, idx) => {
    const rowNum = idx + 2;
    const row = toExportRow(r);
    rows.push(
      el(
        "row",
        { r: String(rowNum) },
        EXPORT_COLUMNS.map((col, i) => cell(`${columnLetter(i)}${rowNum}`, row[col]))
      )
    );
  });

  return buildPart(
    el("worksheet", { xmlns: NS_MAIN, "xmlns:r": NS_REL }, [
      el("sheetViews", null, [
        el("sheetView", { workbookViewId: "0" }, [
          el("pane", { ySplit: "1", topLeftCell: "A2", activePane: "bottomLeft", state: "frozen" })
        ])
      ]),
      el("sheetData", null, rows)
    ])
  );
}

function workbookXml(): string {
  return buildPart(
    el("workbook", { xmlns: NS_MAIN, "xmlns:r": NS_REL }, [
      el("sheets", null, [el("sheet", { name: SHEET_NAME, sheetId: "1", "r:id": "rId1" })])
    ])
  );
}

function stylesXml(): string {
  return buildPart(
    el("styleSheet", { xmlns: NS_MAIN }, [
      el("fonts", { count: "2" }, [el("font", null, [el("sz", { val: "11" })]), el("font", null, [el("b", null), el("sz", { val: "11" })])]),
      el("fills", { count: "1" }, [el("fill", null, [el("patternFill", { patternType: "none" })])]),
      el("borders", { count: "1" }, [el("border", null)]),
      el("cellStyleXfs", { count: "1" }, [el("xf", { numFmtId: "0", fontId: "0", fillId: "0", borderId: "0" })]),
      el("cellXfs", { count: "2" }, [
        el("xf", { numFmtId: "0", fontId: "0", fillId: "0", borderId: "0", xfId: "0" }),
        el("xf", { numFmtId: "0", fontId: "1", fillId: "0", borderId: "0", xfId: "0", applyFont: "1" })
      ])
    ])
  );
}

export async function renderXlsx(records: readonly MatchRecord[]): Promise<Buffer> {
  return zipPackage({
    "[Content_Types].xml": contentTypes([
      { partName: "/xl/workbook.xml", contentType: "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet.main+xml" },
      { partName: "/xl/worksheets/sheet1.xml", contentType: "application/vnd.openxmlformats-officedocument.spreadsheetml.worksheet+xml" },
      { partName: "/xl/styles.xml", contentType: "application/vnd.openxmlformats-officedocument.spreadsheetml.styles+xml" }
    ]),
    "_rels/.rels": relationships([{ id: "rId1", type: "officeDocument", target: "xl/workbook.xml" }]),
    "xl/workbook.xml": workbookXml(),
    "xl/_rels/workbook.xml.rels": relationships([
      { id: "rId1", type: "worksheet", target: "worksheets/sheet1.xml" },
      { id: "rId2", type: "styles", target: "styles.xml" }
    ]),
    "xl/styles.xml": stylesXml(),
    "xl/worksheets/sheet1.xml": sheetXml(records)
  });
}
