// src/pdf/lines.ts
// Convert raw text items into ordered lines, then into TextBlocks.

import type { TextBlock } from '../structure/types';
import { bboxUnion, median, stableSortBy } from '../structure/utils';
import { estimateLineYTolerance, estimateSpaceThreshold } from './extract';
import type { PdfLine, PdfTextItem } from './types';

function itemBBox(it: PdfTextItem) {
  return { x: it.x, y: it.top, width: Math.max(0, it.x2 - it.x), height: Math.max(0, it.bottom - it.top) };
}

function mergeLineText(itemsSortedX: PdfTextItem[], spaceGap: number): string {
  let out = '';
  let prevX2 = Number.NEGATIVE_INFINITY;

  for (const it of itemsSortedX) {
    const s = it.str.replace(/\s+/g, ' ').trim();
    if (!s) continue;

    const needSpace = out.length > 0 && Number.isFinite(prevX2) && it.x - prevX2 > spaceGap;
    if (needSpace) out += ' ';
    out += s;
    prevX2 = Math.max(prevX2, it.x2);
  }
  return out.trim();
}

export function buildLines(pageIndex: number, items: PdfTextItem[], opts: { bodyFontSize: number }): PdfLine[] {
  if (!items.length) return [];

  const yTol = estimateLineYTolerance(opts.bodyFontSize);
  const spaceGap = estimateSpaceThreshold(opts.bodyFontSize);

  type LineAcc = {
    items: PdfTextItem[];
    yMid: number;
    fontSizes: number[];
  };

  const lines: LineAcc[] = [];
  for (const it of stableSortBy(items, (i) => i.top * 10_000 + i.x)) {
    const yMid = (it.top + it.bottom) / 2;
    // Deterministic placement: first matching line by insertion order.
    const ln = lines.find((l) => Math.abs(l.yMid - yMid) <= yTol);
    if (ln) {
      ln.items.push(it);
      ln.fontSizes.push(it.fontSize);
      ln.yMid = (ln.yMid + yMid) / 2;
    } else {
      lines.push({ items: [it], yMid, fontSizes: [it.fontSize] });
    }
  }

  const out: Array<PdfLine & { yMid: number }> = [];
  for (const ln of lines) {
    const itemsX = stableSortBy(ln.items, (it) => it.x);
    const text = mergeLineText(itemsX, spaceGap);
    if (!text) continue;

    let bb = itemBBox(itemsX[0]);
    for (let i = 1; i < itemsX.length; i++) bb = bboxUnion(bb, itemBBox(itemsX[i]));

    const fonts = ln.fontSizes.filter((n) => Number.isFinite(n) && n > 0).sort((a, b) => a - b);
    out.push({ pageIndex, text, bbox: bb, fontSize: median(fonts), yMid: ln.yMid });
  }

  return out
    .sort((a, b) => a.yMid - b.yMid || a.bbox.x - b.bbox.x)
    .map(({ pageIndex: p, text, bbox, fontSize }) => ({ pageIndex: p, text, bbox, fontSize }));
}

// Born-digital text is exact, so every line carries full confidence.
export function linesToTextBlocks(lines: readonly PdfLine[], scale = { x: 1, y: 1 }): TextBlock[] {
  return lines.map((ln) => ({
    text: ln.text,
    bbox: {
      x: ln.bbox.x * scale.x,
      y: ln.bbox.y * scale.y,
      width: ln.bbox.width * scale.x,
      height: ln.bbox.height * scale.y,
    },
    confidence: 1,
    pageIdx: ln.pageIndex,
  }));
}
