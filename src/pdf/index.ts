// src/pdf/index.ts
// Public entrypoints for the PDF text layer.

export type { PdfDocLike, PdfLine, PdfPageLike, PdfTextItem, PdfTextLayer, PdfTextLayerPage } from './types';
export { extractPdfMetadata, parsePdfDate } from './extract';
export { buildLines, linesToTextBlocks } from './lines';
export { loadPdfDocument } from './load';
export { readPdfTextLayer } from './text-layer';
