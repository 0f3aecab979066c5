/**
 * Minimal OOXML package writer.
 *
 * Office files are ZIP archives of XML parts. Parts are described as fast-xml-parser
 * "preserveOrder" nodes and serialized by its builder, which escapes text and attributes.
 */

import JSZip from "jszip";
import { XMLBuilder, type XmlBuilderOptions } from "fast-xml-parser";

/**
 * Structure: { tagName: [...children], ':@': { '@_attrName': 'value' } }
 * Text nodes: { '#text': 'content' }
 */
export interface XmlNode {
  [tagName: string]: XmlNode[] | XmlAttributes | string | undefined;
  ":@"?: XmlAttributes;
  "#text"?: string;
}

export interface XmlAttributes {
  [attrName: string]: string;
}

const BUILDER_OPTIONS: Partial<XmlBuilderOptions> = {
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  textNodeName: "#text",
  preserveOrder: true,
  format: false,
  suppressEmptyNode: false,
  suppressBooleanAttributes: false
};

const builder = new XMLBuilder(BUILDER_OPTIONS);

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n';

// Characters XML 1.0 cannot carry; PDF extraction sometimes leaves them in.
const INVALID_XML_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]/g;

export function el(tag: string, attrs: Record<string, string> | null, children: XmlNode[] = []): XmlNode {
  const node: XmlNode = { [tag]: children };
  if (attrs) {
    const prefixed: XmlAttributes = {};
    for (const [k, v] of Object.entries(attrs)) prefixed[`@_${k}`] = v;
    node[":@"] = prefixed;
  }
  return node;
}

export function text(value: string): XmlNode {
  return { "#text": value.replace(INVALID_XML_CHARS, "") };
}

export function buildPart(root: XmlNode): string {
  return XML_DECLARATION + builder.build([root]);
}

export function contentTypes(overrides: Array<{ partName: string; contentType: string }>): string {
  return buildPart(
    el("Types", { xmlns: "http://schemas.openxmlformats.org/package/2006/content-types" }, [
      el("Default", { Extension: "rels", ContentType: "application/vnd.openxmlformats-package.relationships+xml" }),
      el("Default", { Extension: "xml", ContentType: "application/xml" }),
      ...overrides.map((o) => el("Override", { PartName: o.partName, ContentType: o.contentType }))
    ])
  );
}

export function relationships(rels: Array<{ id: string; type: string; target: string }>): string {
  return buildPart(
    el(
      "Relationships",
      { xmlns: "http://schemas.openxmlformats.org/package/2006/relationships" },
      rels.map((r) =>
        el("Relationship", {
          Id: r.id,
          Type: `http://schemas.openxmlformats.org/officeDocument/2006/relationships/${r.type}`,
          Target: r.target
        })
      )
    )
  );
}

export async function zipPackage(parts: Record<string, string>): Promise<Buffer> {
  const zip = new JSZip();
  for (const [name, content] of Object.entries(parts)) zip.file(name, content);
  return zip.generateAsync({ type: "nodebuffer", compression: "DEFLATE" });
}
