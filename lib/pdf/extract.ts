/**
 * PDF Text Extraction
 *
 * Extracts the text layer of each page, in document order, using mupdf.
 * A document whose pages carry no text is a successful extraction with
 * `hasText: false`; only structural problems throw.
 */

import mupdf, { type Document as MupdfDocument } from "mupdf";
import { ExtractionError } from "../pipeline/errors";

// ============================================================================
// Types
// ============================================================================

export interface ExtractedPageText {
  pageNumber: number;
  text: string;
}

export interface PdfMetadata {
  title?: string;
  author?: string;
  subject?: string;
  keywords?: string;
  creator?: string;
  producer?: string;
  creationDate?: string;
  modificationDate?: string;
  format?: string;
}

export interface ExtractedDocument {
  /** Non-empty page texts joined by PAGE_SEPARATOR, in page order */
  rawText: string;
  pageCount: number;
  hasText: boolean;
  pages: ExtractedPageText[];
  pdfMetadata: PdfMetadata;
}

export const PAGE_SEPARATOR = "\n\n";

// The header may be preceded by junk bytes; readers accept it within the first 1024.
const HEADER_SEARCH_BYTES = 1024;
const PDF_HEADER = "%PDF-";

// ============================================================================
// Main extraction function
// ============================================================================

export function extractText(pdfBytes: Uint8Array): ExtractedDocument {
  if (pdfBytes.byteLength === 0) {
    throw new ExtractionError("unreadable", "PDF is empty");
  }
  if (!hasPdfHeader(pdfBytes)) {
    throw new ExtractionError("unreadable", "File is not a PDF (missing %PDF- header)");
  }

  const doc = openPdfFromBuffer(pdfBytes);

  if (doc.needsPassword()) {
    throw new ExtractionError("encrypted", "PDF is password-protected");
  }

  const pageCount = countPages(doc);
  if (pageCount === 0) {
    throw new ExtractionError("unreadable", "PDF has no pages");
  }

  const pages: ExtractedPageText[] = [];
  for (let i = 0; i < pageCount; i++) {
    pages.push({ pageNumber: i + 1, text: extractPageText(doc, i) });
  }

  const rawText = pages
    .map((p) => p.text)
    .filter((t) => t.length > 0)
    .join(PAGE_SEPARATOR);

  return {
    rawText,
    pageCount,
    hasText: rawText.length > 0,
    pages,
    pdfMetadata: extractPdfMetadata(doc),
  };
}

// ============================================================================
// Internal helpers
// ============================================================================

function hasPdfHeader(bytes: Uint8Array): boolean {
  const head = Buffer.from(
    bytes.buffer,
    bytes.byteOffset,
    Math.min(bytes.byteLength, HEADER_SEARCH_BYTES)
  );
  return head.includes(PDF_HEADER, 0, "latin1");
}

function openPdfFromBuffer(bytes: Uint8Array): MupdfDocument {
  // Suppress mupdf stderr warnings (repaired xref tables and the like)
  const origWrite = process.stderr.write;
  process.stderr.write = () => true;
  try {
    return mupdf.Document.openDocument(bytes, "application/pdf");
  } catch (err) {
    throw new ExtractionError(
      "unreadable",
      `PDF could not be parsed: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  } finally {
    process.stderr.write = origWrite;
  }
}

function countPages(doc: MupdfDocument): number {
  try {
    return doc.countPages();
  } catch (err) {
    throw new ExtractionError("unreadable", "PDF page tree is damaged", {
      cause: err,
    });
  }
}

function extractPageText(doc: MupdfDocument, pageIndex: number): string {
  const page = doc.loadPage(pageIndex);
  return page.toStructuredText().asText().trim();
}

const METADATA_KEYS: [keyof PdfMetadata, string][] = [
  ["title", "info:Title"],
  ["author", "info:Author"],
  ["subject", "info:Subject"],
  ["keywords", "info:Keywords"],
  ["creator", "info:Creator"],
  ["producer", "info:Producer"],
  ["creationDate", "info:CreationDate"],
  ["modificationDate", "info:ModDate"],
  ["format", "format"],
];

function extractPdfMetadata(doc: MupdfDocument): PdfMetadata {
  const metadata: PdfMetadata = {};
  for (const [key, mupdfKey] of METADATA_KEYS) {
    const value = doc.getMetaData(mupdfKey);
    if (value) {
      metadata[key] = value;
    }
  }
  return metadata;
}
