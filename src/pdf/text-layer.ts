// src/pdf/text-layer.ts
// Entry-point: PdfDocLike → metadata plus line-level text per page.

import { extractPdfMetadata, extractPdfPages } from './extract';
import { buildLines } from './lines';
import type { PdfDocLike, PdfTextLayer } from './types';

export async function readPdfTextLayer(pdf: PdfDocLike, opts?: { maxPages?: number }): Promise<PdfTextLayer> {
  const metadata = await extractPdfMetadata(pdf);
  const raw = await extractPdfPages(pdf, opts);
  return {
    metadata,
    pages: raw.map((p) => ({
      pageIndex: p.pageIndex,
      width: p.width,
      height: p.height,
      lines: buildLines(p.pageIndex, p.items, { bodyFontSize: p.bodyFontSize }),
    })),
  };
}
