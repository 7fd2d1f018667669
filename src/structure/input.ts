// src/structure/input.ts
// Collaborator output (OCR blocks, layout detections, span scores) → typed page input.
//
// Malformed items are skipped and reported, never thrown: one bad detection
// must not cost the rest of the page.

import type {
  BoundingBox,
  DataQualityWarning,
  DocumentInput,
  DocumentMetadata,
  LayoutElement,
  PageInput,
  PageSize,
  RawPageInput,
  TextBlock,
} from './types';
import { bboxIou, bottom, right } from './utils';
import { layoutKindForLabel, type Vocabulary } from './vocabulary';

export type SpanScore = {
  pageIdx: number;
  text: string;
  probability: number;
};

export type SanitisedPage = {
  page: PageInput;
  spanScores: SpanScore[];
  warnings: DataQualityWarning[];
  rawElementCount: number;
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asNum(n: unknown, fallback = 0): number {
  const v = typeof n === 'number' ? n : typeof n === 'string' && n.trim() ? Number(n) : NaN;
  return Number.isFinite(v) ? v : fallback;
}

function finiteOrNull(n: unknown): number | null {
  const v = asNum(n, NaN);
  return Number.isFinite(v) ? v : null;
}

function excerptOf(raw: unknown): string {
  if (!isRecord(raw)) return '';
  const t = raw.text ?? raw.raw_text ?? raw.type;
  return typeof t === 'string' ? t.slice(0, 80) : '';
}

type BBoxParse = { bbox: BoundingBox } | { reason: 'MISSING_GEOMETRY' | 'NEGATIVE_SIZE' };

/**
 * Accepts `{x, y, width, height}` or a corner array `[x0, y0, x1, y1]`.
 */
export function parseBBox(raw: unknown): BBoxParse {
  let x: number | null = null;
  let y: number | null = null;
  let width: number | null = null;
  let height: number | null = null;

  if (Array.isArray(raw) && raw.length === 4) {
    const [x0, y0, x1, y1] = raw.map(finiteOrNull);
    if (x0 !== null && y0 !== null && x1 !== null && y1 !== null) {
      x = x0;
      y = y0;
      width = x1 - x0;
      height = y1 - y0;
    }
  } else if (isRecord(raw)) {
    x = finiteOrNull(raw.x);
    y = finiteOrNull(raw.y);
    width = finiteOrNull(raw.width);
    height = finiteOrNull(raw.height);
  }

  if (x === null || y === null || width === null || height === null) return { reason: 'MISSING_GEOMETRY' };
  if (width < 0 || height < 0) return { reason: 'NEGATIVE_SIZE' };
  return { bbox: { x, y, width, height } };
}

/**
 * `[width, height]` or `{width, height}`; null when absent or not positive.
 */
export function readPageSize(raw: unknown): PageSize | null {
  let w = 0;
  let h = 0;
  if (Array.isArray(raw) && raw.length >= 2) {
    w = asNum(raw[0], 0);
    h = asNum(raw[1], 0);
  } else if (isRecord(raw)) {
    w = asNum(raw.width, 0);
    h = asNum(raw.height, 0);
  }
  return w > 0 && h > 0 ? { width: w, height: h } : null;
}

function parsePageSize(raw: unknown, extents: BoundingBox[]): PageSize {
  const declared = readPageSize(raw);
  if (declared) return declared;
  // Unknown size: the smallest page that holds every detection.
  return {
    width: extents.reduce((m, b) => Math.max(m, right(b)), 0),
    height: extents.reduce((m, b) => Math.max(m, bottom(b)), 0),
  };
}

function normaliseForDuplicate(text: string): string {
  return text.toLowerCase().replace(/\s+/g, ' ').trim();
}

/**
 * Drops near-duplicate OCR blocks (same text, heavy overlap), keeping the
 * most confident one. Earlier blocks win ties.
 */
export function dedupeBlocks(
  blocks: Array<{ block: TextBlock; index: number }>,
  minIou: number
): { kept: Array<{ block: TextBlock; index: number }>; dropped: Array<{ block: TextBlock; index: number }> } {
  const kept: Array<{ block: TextBlock; index: number }> = [];
  const dropped: Array<{ block: TextBlock; index: number }> = [];
  for (const cand of blocks) {
    const key = normaliseForDuplicate(cand.block.text);
    const twinIdx = kept.findIndex(
      (k) => normaliseForDuplicate(k.block.text) === key && bboxIou(k.block.bbox, cand.block.bbox) >= minIou
    );
    if (twinIdx < 0) {
      kept.push(cand);
      continue;
    }
    if (cand.block.confidence > kept[twinIdx].block.confidence) {
      dropped.push(kept[twinIdx]);
      kept[twinIdx] = cand;
    } else {
      dropped.push(cand);
    }
  }
  kept.sort((a, b) => a.index - b.index);
  return { kept, dropped };
}

// `id`, or `id#2`, `id#3`, ... when already taken. Claims the returned id.
function uniqueId(id: string, taken: Set<string>): string {
  let out = id;
  for (let n = 2; taken.has(out); n++) out = `${id}#${n}`;
  taken.add(out);
  return out;
}

// Declared non-negative integer index, else the page's position in the input.
export function pageIndexOf(raw: RawPageInput, position: number): number {
  const idx = asNum(raw.index, NaN);
  return Number.isInteger(idx) && idx >= 0 ? idx : position;
}

export function sanitisePage(
  raw: RawPageInput,
  position: number,
  vocab: Vocabulary,
  opts: { duplicateIou: number; takenIds?: Set<string> }
): SanitisedPage {
  const pageIdx = pageIndexOf(raw, position);
  const warnings: DataQualityWarning[] = [];
  // Shared across the pages of one document so ids stay unique document-wide.
  const takenIds = opts.takenIds ?? new Set<string>();

  const rawBlocks: unknown[] = Array.isArray(raw.blocks) ? raw.blocks : [];
  const parsedBlocks: Array<{ block: TextBlock; index: number }> = [];
  rawBlocks.forEach((rb, index) => {
    const geom = parseBBox(isRecord(rb) ? rb.bbox : undefined);
    if ('reason' in geom) {
      warnings.push({ pageIdx, source: 'text_block', index, reason: geom.reason, excerpt: excerptOf(rb) });
      return;
    }
    const text = isRecord(rb) && typeof rb.text === 'string' ? rb.text : '';
    if (!text.trim()) {
      warnings.push({ pageIdx, source: 'text_block', index, reason: 'MISSING_TEXT', excerpt: '' });
      return;
    }
    const confidence = isRecord(rb) ? asNum(rb.confidence, 0) : 0;
    parsedBlocks.push({ block: { text, bbox: geom.bbox, confidence, pageIdx }, index });
  });

  const { kept, dropped } = dedupeBlocks(parsedBlocks, opts.duplicateIou);
  for (const d of dropped) {
    warnings.push({
      pageIdx,
      source: 'text_block',
      index: d.index,
      reason: 'DUPLICATE_BLOCK',
      excerpt: d.block.text.slice(0, 80),
    });
  }

  const rawLayout: unknown[] = Array.isArray(raw.layout) ? raw.layout : [];
  const elements: LayoutElement[] = [];
  rawLayout.forEach((re, index) => {
    const geom = parseBBox(isRecord(re) ? re.bbox : undefined);
    if (!isRecord(re) || 'reason' in geom) {
      const reason = 'reason' in geom ? geom.reason : 'MISSING_GEOMETRY';
      warnings.push({ pageIdx, source: 'layout_element', index, reason, excerpt: excerptOf(re) });
      return;
    }
    const type = typeof re.type === 'string' ? re.type : 'text';
    const rawText = typeof re.raw_text === 'string' ? re.raw_text : typeof re.text === 'string' ? re.text : undefined;
    const baseId = typeof re.id === 'string' && re.id.trim() ? re.id.trim() : `p${pageIdx}-e${index}`;
    const id = uniqueId(baseId, takenIds);
    if (id !== baseId) {
      warnings.push({ pageIdx, source: 'layout_element', index, reason: 'DUPLICATE_ELEMENT_ID', excerpt: baseId });
    }
    elements.push({
      id,
      type,
      kind: layoutKindForLabel(vocab, type),
      bbox: geom.bbox,
      pageIdx,
      ...(rawText !== undefined ? { rawText } : {}),
      confidence: asNum(re.confidence, 0),
    });
  });

  const spanScores: SpanScore[] = [];
  const rawScores: unknown[] = Array.isArray(raw.span_scores) ? raw.span_scores : [];
  for (const rs of rawScores) {
    if (!isRecord(rs) || typeof rs.text !== 'string') continue;
    const p = finiteOrNull(rs.probability);
    if (p === null) continue;
    spanScores.push({ pageIdx, text: rs.text, probability: Math.max(0, Math.min(1, p)) });
  }

  const blocks = kept.map((k) => k.block);
  const pageSize = parsePageSize(raw.page_size, [...blocks.map((b) => b.bbox), ...elements.map((e) => e.bbox)]);

  return {
    page: { index: pageIdx, pageSize, blocks, elements },
    spanScores,
    warnings,
    rawElementCount: rawLayout.length,
  };
}

function pickString(r: Record<string, unknown>, ...keys: string[]): string | undefined {
  for (const k of keys) {
    const v = r[k];
    if (typeof v === 'string') return v;
  }
  return undefined;
}

/**
 * Top-level collaborator file: `{metadata?, pages: [...]}` or a bare page array.
 * Anything else reads as a document with no pages.
 */
export function parseDocumentInput(raw: unknown): DocumentInput {
  const rawPages: unknown[] = Array.isArray(raw) ? raw : isRecord(raw) && Array.isArray(raw.pages) ? raw.pages : [];
  const pages: RawPageInput[] = rawPages.map((p) =>
    isRecord(p) ? { index: p.index, page_size: p.page_size, blocks: p.blocks, layout: p.layout, span_scores: p.span_scores } : {}
  );
  if (!isRecord(raw) || !isRecord(raw.metadata)) return { pages };

  const m = raw.metadata;
  const metadata: Partial<DocumentMetadata> = {};
  const fields: Array<[keyof Omit<DocumentMetadata, 'pages'>, string[]]> = [
    ['title', ['title']],
    ['author', ['author']],
    ['subject', ['subject']],
    ['creator', ['creator']],
    ['producer', ['producer']],
    ['creationDate', ['creation_date', 'creationDate']],
    ['modificationDate', ['modification_date', 'modificationDate']],
  ];
  for (const [field, keys] of fields) {
    const v = pickString(m, ...keys);
    if (v !== undefined) metadata[field] = v;
  }
  return { metadata, pages };
}
