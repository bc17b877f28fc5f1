import { ExtractionError, UnsupportedFormatError } from "./errors";

export interface TextExtractor {
  /**
   * Turn raw file bytes into plain text. Fails with `UnsupportedFormatError`
   * or `ExtractionError`; callers treat either as a whole-document failure.
   */
  extract(bytes: Uint8Array, declaredType: string): Promise<string>;
}

export type DocumentFormat = "text" | "pdf" | "docx";

const FORMATS: Record<string, DocumentFormat> = {
  "text/plain": "text",
  "text/markdown": "text",
  "text/x-markdown": "text",
  txt: "text",
  md: "text",
  "application/pdf": "pdf",
  pdf: "pdf",
  "application/vnd.openxmlformats-officedocument.wordprocessingml.document": "docx",
  docx: "docx",
};

/** Accepts a MIME type or a file extension, with or without the dot. */
export function detectFormat(declaredType: string): DocumentFormat | null {
  const type = declaredType.trim().toLowerCase().replace(/^\./, "");
  return FORMATS[type] ?? null;
}

function meaningful(text: string): string {
  const normalized = text.replace(/^﻿/, "").replace(/\r\n?/g, "\n");
  if (normalized.trim().length < 10) {
    throw new ExtractionError("no meaningful text could be extracted");
  }
  return normalized;
}

/** UTF-8 text and markdown. */
export class PlainTextExtractor implements TextExtractor {
  async extract(bytes: Uint8Array, declaredType: string): Promise<string> {
    if (detectFormat(declaredType) !== "text") {
      throw new UnsupportedFormatError(declaredType);
    }

    let text: string;
    try {
      text = new TextDecoder("utf-8", { fatal: true }).decode(bytes);
    } catch (err) {
      throw new ExtractionError("document is not valid UTF-8", { cause: err });
    }
    return meaningful(text);
  }
}

/**
 * Text layer of a PDF, one block per page. Scanned pages without a text layer
 * contribute nothing.
 */
export class PdfTextExtractor implements TextExtractor {
  async extract(bytes: Uint8Array, declaredType: string): Promise<string> {
    if (detectFormat(declaredType) !== "pdf") {
      throw new UnsupportedFormatError(declaredType);
    }

    // PDF.js is heavy, load it only when a PDF shows up
    const { getDocument } = await import("pdfjs-dist/legacy/build/pdf.mjs");

    let pages: string[];
    try {
      // PDF.js takes ownership of the buffer it is given
      const doc = await getDocument({
        data: new Uint8Array(bytes),
        isEvalSupported: false,
        useSystemFonts: false,
        disableFontFace: true,
        verbosity: 0,
      }).promise;
      try {
        pages = [];
        for (let pageNumber = 1; pageNumber <= doc.numPages; pageNumber++) {
          const page = await doc.getPage(pageNumber);
          const content = await page.getTextContent();
          let text = "";
          for (const item of content.items) {
            if (!("str" in item)) continue;
            text += item.str + (item.hasEOL ? "\n" : "");
          }
          if (text.trim()) pages.push(text.trim());
        }
      } finally {
        await doc.destroy();
      }
    } catch (err) {
      console.warn("[extraction] pdf could not be parsed", {
        message: err instanceof Error ? err.message : String(err),
      });
      throw new ExtractionError("PDF could not be read", { cause: err });
    }

    console.log("[extraction] pdf", { pagesWithText: pages.length });
    return meaningful(pages.join("\n\n"));
  }
}

/** Paragraph text of a Word (.docx) document; formatting and images are dropped. */
export class DocxTextExtractor implements TextExtractor {
  async extract(bytes: Uint8Array, declaredType: string): Promise<string> {
    if (detectFormat(declaredType) !== "docx") {
      throw new UnsupportedFormatError(declaredType);
    }

    const { extractRawText } = await import("mammoth");
    let raw: string;
    try {
      const result = await extractRawText({ buffer: Buffer.from(bytes) });
      raw = result.value;
    } catch (err) {
      console.warn("[extraction] docx could not be parsed", {
        message: err instanceof Error ? err.message : String(err),
      });
      throw new ExtractionError("Word document could not be read", { cause: err });
    }
    return meaningful(raw.trim());
  }
}

/** Routes each upload to the extractor for its declared type. */
export class DocumentExtractor implements TextExtractor {
  constructor(
    private readonly extractors: Record<DocumentFormat, TextExtractor> = {
      text: new PlainTextExtractor(),
      pdf: new PdfTextExtractor(),
      docx: new DocxTextExtractor(),
    }
  ) {}

  async extract(bytes: Uint8Array, declaredType: string): Promise<string> {
    const format = detectFormat(declaredType);
    if (!format) {
      throw new UnsupportedFormatError(declaredType);
    }
    return this.extractors[format].extract(bytes, declaredType);
  }
}
