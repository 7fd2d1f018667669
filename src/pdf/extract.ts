// src/pdf/extract.ts
// PDF.js text content → deterministic geometric text items, plus the
// document-information dictionary.

import type { DocumentMetadata } from '../structure/types';
import { isRecord } from '../structure/input';
import { median, stableSortBy } from '../structure/utils';
import type { PdfDocLike, PdfPageLike, PdfPageRaw, PdfTextContentLike, PdfTextItem } from './types';

function asNum(n: unknown, fallback = 0): number {
  const v = Number(n);
  return Number.isFinite(v) ? v : fallback;
}

function parseTransform(t: unknown): [number, number, number, number, number, number] {
  const tr: unknown[] = Array.isArray(t) ? t : [];
  return [asNum(tr[0]), asNum(tr[1]), asNum(tr[2]), asNum(tr[3]), asNum(tr[4]), asNum(tr[5])];
}

export function parsePageTextItems(pageIndex: number, page: PdfPageLike, content: PdfTextContentLike): PdfPageRaw {
  const rawItems: unknown[] = Array.isArray(content.items) ? content.items : [];

  const viewport = page.getViewport({ scale: 1 });
  const pageW = asNum(viewport.width, 1) || 1;
  const pageH = asNum(viewport.height, 1) || 1;

  const parsed: PdfTextItem[] = [];
  const fontSizes: number[] = [];

  for (const it of rawItems) {
    // Marked-content entries carry no `str`.
    if (!isRecord(it)) continue;
    const str = typeof it.str === 'string' ? it.str : '';
    if (!str.trim()) continue;

    const [a, b, c, d, x, y] = parseTransform(it.transform);
    const fontSize = Math.max(Math.hypot(a, b), Math.hypot(c, d), 0);
    if (fontSize > 0) fontSizes.push(fontSize);

    const w = Math.max(0, asNum(it.width, 0));
    const h = Math.max(0, asNum(it.height, 0)) || fontSize;

    // PDF origin is bottom-left with y at the baseline; flip to top-left.
    parsed.push({
      pageIndex,
      str,
      x,
      top: pageH - (y + h),
      x2: x + w,
      bottom: pageH - y,
      fontSize,
    });
  }

  const sortedFonts = fontSizes.sort((p, q) => p - q);

  return {
    pageIndex,
    width: pageW,
    height: pageH,
    bodyFontSize: median(sortedFonts),
    items: stableSortBy(parsed, (p) => p.top * 10_000 + p.x),
  };
}

export async function extractPdfPages(pdf: PdfDocLike, opts?: { maxPages?: number }): Promise<PdfPageRaw[]> {
  const maxPages = opts?.maxPages ?? 2000;
  const totalPages = Math.min(asNum(pdf.numPages, 0), maxPages);
  if (!totalPages) return [];

  const out: PdfPageRaw[] = [];
  for (let pageNum = 1; pageNum <= totalPages; pageNum++) {
    try {
      const page = await pdf.getPage(pageNum);
      const content = await page.getTextContent();
      out.push(parsePageTextItems(pageNum - 1, page, content));
    } catch (err) {
      console.error('[StructureLinker][pdf] failed to extract page', { pageNum, err });
      // Preserve page indexing: emit empty page.
      out.push({ pageIndex: pageNum - 1, width: 0, height: 0, bodyFontSize: 0, items: [] });
    }
  }
  return out;
}

/**
 * `D:20240131120500+01'00'` → `2024-01-31T12:05:00+01:00`. Strings that are
 * not PDF dates are returned trimmed.
 */
export function parsePdfDate(raw: string): string {
  const m = /^D:(\d{4})(\d{2})?(\d{2})?(\d{2})?(\d{2})?(\d{2})?([Zz+-])?(\d{2})?'?(\d{2})?'?$/.exec(raw.trim());
  if (!m) return raw.trim();
  const [, y, mo = '01', d = '01', h = '00', mi = '00', s = '00', tz, tzh = '00', tzm = '00'] = m;
  const zone = !tz ? '' : tz === 'Z' || tz === 'z' ? 'Z' : `${tz}${tzh}:${tzm}`;
  return `${y}-${mo}-${d}T${h}:${mi}:${s}${zone}`;
}

export async function extractPdfMetadata(pdf: PdfDocLike): Promise<DocumentMetadata> {
  const out: DocumentMetadata = { pages: asNum(pdf.numPages, 0) };
  if (!pdf.getMetadata) return out;

  let info: unknown;
  try {
    info = (await pdf.getMetadata()).info;
  } catch (err) {
    console.error('[StructureLinker][pdf] failed to read metadata', { err });
    return out;
  }
  if (!isRecord(info)) return out;
  const dict = info;

  const str = (k: string): string | undefined => {
    const v = dict[k];
    return typeof v === 'string' && v.trim() ? v.trim() : undefined;
  };
  const title = str('Title');
  const author = str('Author');
  const subject = str('Subject');
  const creator = str('Creator');
  const producer = str('Producer');
  const created = str('CreationDate');
  const modified = str('ModDate');
  if (title) out.title = title;
  if (author) out.author = author;
  if (subject) out.subject = subject;
  if (creator) out.creator = creator;
  if (producer) out.producer = producer;
  if (created) out.creationDate = parsePdfDate(created);
  if (modified) out.modificationDate = parsePdfDate(modified);
  return out;
}

// ---- Line-building parameter estimates (page units)

export function estimateSpaceThreshold(bodyFontSize: number): number {
  // Insert a space between adjacent text items when their x-gap exceeds this.
  if (!(bodyFontSize > 0) || !Number.isFinite(bodyFontSize)) return 2.5;
  return Math.min(10, Math.max(1.5, bodyFontSize * 0.33));
}

export function estimateLineYTolerance(bodyFontSize: number): number {
  // Items whose vertical midpoints are this close share a line.
  if (!(bodyFontSize > 0) || !Number.isFinite(bodyFontSize)) return 3.5;
  return Math.min(12, Math.max(2.0, bodyFontSize * 0.45));
}
