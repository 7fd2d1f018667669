// src/pdf/load.ts
// PDF.js adapter: bytes → PdfDocLike. The only module that imports pdfjs-dist.

import type { PdfDocLike } from './types';

export async function loadPdfDocument(data: Uint8Array): Promise<PdfDocLike> {
  // pdf.js ships ESM only; Node16 module output keeps this import() as is.
  const { getDocument } = await import('pdfjs-dist/legacy/build/pdf.mjs');
  const doc = await getDocument({ data, isEvalSupported: false, useSystemFonts: true }).promise;
  return {
    numPages: doc.numPages,
    getPage: async (pageNum) => {
      const page = await doc.getPage(pageNum);
      return {
        getViewport: (opts) => {
          const vp = page.getViewport(opts);
          return { width: vp.width, height: vp.height };
        },
        getTextContent: () => page.getTextContent(),
      };
    },
    getMetadata: async () => {
      const meta = await doc.getMetadata();
      return { info: meta.info };
    },
  };
}
