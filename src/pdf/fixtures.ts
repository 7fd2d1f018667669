// src/pdf/fixtures.ts
// In-memory PdfDocLike stand-ins for tests.

import type { PdfDocLike, PdfPageLike, PdfTextItemLike } from './types';

export function fakePage(items: unknown[], size = { width: 600, height: 800 }): PdfPageLike {
  return {
    getViewport: () => size,
    getTextContent: async () => ({ items }),
  };
}

// Horizontal text at font size 10; `y` is the PDF baseline (origin bottom-left).
export function textItem(str: string, x: number, y: number, width: number): PdfTextItemLike {
  return { str, transform: [10, 0, 0, 10, x, y], width, height: 10 };
}

export function fakeDoc(pages: Array<PdfPageLike | Error>, info?: Record<string, unknown>): PdfDocLike {
  return {
    numPages: pages.length,
    getPage: async (pageNum) => {
      const page = pages[pageNum - 1];
      if (page instanceof Error) throw page;
      return page;
    },
    ...(info ? { getMetadata: async () => ({ info }) } : {}),
  };
}
