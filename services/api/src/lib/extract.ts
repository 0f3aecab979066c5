import path from "node:path";
import mammoth from "mammoth";
import { ExtractionError, UnsupportedFormatError } from "./errors";
import { createLogger } from "./logger";

const log = createLogger("extract");

const TEXT_EXTENSIONS = new Set([".txt", ".text", ".md"]);

export type UploadedDocument = {
  buffer: Buffer;
  fileName: string;
  mimeType: string;
};

export type DocumentKind = "pdf" | "docx" | "text";

export function detectKind(doc: Pick<UploadedDocument, "fileName" | "mimeType">): DocumentKind | null {
  const mt = doc.mimeType.toLowerCase();
  const ext = path.extname(doc.fileName).toLowerCase();
  if (mt.includes("pdf") || ext === ".pdf") return "pdf";
  if (mt.includes("wordprocessingml") || ext === ".docx") return "docx";
  if (mt.startsWith("text/") || TEXT_EXTENSIONS.has(ext)) return "text";
  return null;
}

async function pdfBufferToText(buffer: Buffer): Promise<string> {
  // Loaded on first use: pdf-parse's index runs a self-test against a bundled sample PDF whenever `module.parent` is unset.
  const { default: pdf } = await import("pdf-parse");
  const data = await pdf(buffer);
  return data.text;
}

async function docxBufferToText(buffer: Buffer): Promise<string> {
  const out = await mammoth.extractRawText({ buffer });
  return out.value;
}

export async function extractText(doc: UploadedDocument): Promise<string> {
  const kind = detectKind(doc);
  if (!kind) throw new UnsupportedFormatError(doc.fileName);
  if (kind === "text") return new TextDecoder("utf-8").decode(doc.buffer);

  let text: string;
  try {
    text = kind === "pdf" ? await pdfBufferToText(doc.buffer) : await docxBufferToText(doc.buffer);
  } catch (e) {
    throw new ExtractionError(doc.fileName, e);
  }
  if (!text.trim()) {
    log.warn({ fileName: doc.fileName, kind }, "no extractable text; scanned pages need OCR first");
  }
  return text;
}
