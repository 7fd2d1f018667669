// src/pdf/types.ts
// PDF text-layer data model: geometric text items, lines, and the minimal
// PDF.js surface the extractor needs.

import type { BoundingBox, DocumentMetadata } from '../structure/types';

export type PdfTextItem = {
  pageIndex: number;
  str: string;
  // Page units, origin top-left (converted from the PDF.js transform)
  x: number;
  top: number;
  x2: number;
  bottom: number;
  fontSize: number;
};

export type PdfLine = {
  pageIndex: number;
  text: string;
  bbox: BoundingBox;
  fontSize: number;
};

export type PdfPageRaw = {
  pageIndex: number;
  width: number;
  height: number;
  bodyFontSize: number;
  items: PdfTextItem[];
};

export type PdfTextLayerPage = {
  pageIndex: number;
  width: number;
  height: number;
  lines: PdfLine[];
};

export type PdfTextLayer = {
  metadata: DocumentMetadata;
  pages: PdfTextLayerPage[];
};

// ---- Minimal PDF.js-like surface types (avoid importing PDF.js types)
// Small enough that tests can hand in plain objects.

export type PdfTextItemLike = {
  str?: unknown;
  transform?: unknown;
  width?: unknown;
  height?: unknown;
};

export type PdfTextContentLike = {
  items?: unknown;
};

export type PdfPageLike = {
  getViewport: (opts: { scale: number }) => { width: number; height: number };
  getTextContent: () => Promise<PdfTextContentLike>;
};

export type PdfDocLike = {
  numPages: number;
  getPage: (pageNum: number) => Promise<PdfPageLike>;
  // Resolves to PDF.js's `{info}` dictionary (Title, Author, CreationDate, ...).
  getMetadata?: () => Promise<{ info?: unknown }>;
};
