// src/structure/references.ts
// Reference Extractor: find "Fig. 2.6", "Tables 2 and 3", "Eq. (1.4)" and bare
// "(1.4)" mentions in body text.

import type { LinkerSettings } from '../types';
import type { SpanScore } from './input';
import type {
  BoundingBox,
  CanonicalType,
  LayoutElement,
  PageInput,
  ReferenceMention,
  ReferenceSpanClassifier,
  TextBlock,
} from './types';
import { centerX, centerY, clamp01, containsPoint } from './utils';
import { canonicalTypeForKeyword, normaliseId, type Vocabulary } from './vocabulary';

export type ReferenceMatch = {
  start: number;
  end: number;
  type: CanonicalType;
  declaredId: string;
};

export type ExtractOptions = Pick<LinkerSettings, 'patternConfidence'> & {
  classifier?: ReferenceSpanClassifier;
  // Caption text the Caption Locator already consumed on this page.
  captionBlocks?: ReadonlySet<TextBlock>;
};

// Ranges wider than this keep their endpoints only.
const MAX_RANGE_FILL = 50;

// Ids strictly between `from` and `to` when they differ only in a rising last
// component ("2.1" to "2.4"); null when the pair is not a range.
export function rangeBetween(from: string, to: string): string[] | null {
  const a = from.split('.');
  const b = to.split('.');
  if (a.length !== b.length || a.slice(0, -1).join('.') !== b.slice(0, -1).join('.')) return null;
  const lo = Number(a[a.length - 1]);
  const hi = Number(b[b.length - 1]);
  if (!(hi > lo)) return null;
  if (hi - lo - 1 > MAX_RANGE_FILL) return [];
  const prefix = a.slice(0, -1).map((part) => `${part}.`).join('');
  return Array.from({ length: hi - lo - 1 }, (_, i) => `${prefix}${lo + i + 1}`);
}

type Candidate = ReferenceMatch & { between: string[] };

/**
 * Keyword mentions (with ranges, and list continuations after plural
 * keywords) and bare parenthesised equation numbers. Overlapping matches keep
 * the longest span, the earlier one on equal length. Ids inside a range share
 * the span of its end. Result is in text order.
 */
export function matchReferences(vocab: Vocabulary, text: string): ReferenceMatch[] {
  const found: Candidate[] = [];

  for (const m of text.matchAll(vocab.reference)) {
    const start = m.index ?? 0;
    const type = canonicalTypeForKeyword(vocab, m[1]);
    const rawId = m[2] ?? m[3];
    if (!type || rawId === undefined) continue;
    let end = start + m[0].length;
    let lastId = normaliseId(rawId);
    found.push({ start, end, type, declaredId: lastId, between: [] });

    // "Figs. 1 and 2", "Tables 2, 3": only plural keywords take a list.
    const plural = m[1].toLowerCase().endsWith('s');
    for (;;) {
      const r = vocab.range.exec(text.slice(end));
      const between = r ? rangeBetween(lastId, normaliseId(r[1])) : null;
      let next: RegExpExecArray | null = null;
      if (r && between) next = r;
      else if (plural) next = vocab.continuation.exec(text.slice(end));
      if (!next) break;
      const idEnd = end + next[0].length;
      lastId = normaliseId(next[1]);
      found.push({ start: idEnd - next[1].length, end: idEnd, type, declaredId: lastId, between: next === r ? between ?? [] : [] });
      end = idEnd;
    }
  }

  for (const m of text.matchAll(vocab.bareEquation)) {
    const start = m.index ?? 0;
    found.push({ start, end: start + m[0].length, type: 'equation', declaredId: normaliseId(m[1]), between: [] });
  }

  const byLength = found
    .map((f, order) => ({ f, order }))
    .sort((a, b) => (b.f.end - b.f.start) - (a.f.end - a.f.start) || a.f.start - b.f.start || a.order - b.order);
  const kept: Candidate[] = [];
  for (const { f } of byLength) {
    if (kept.some((k) => f.start < k.end && k.start < f.end)) continue;
    kept.push(f);
  }
  return kept
    .sort((a, b) => a.start - b.start)
    .flatMap(({ between, ...m }) => [...between.map((declaredId) => ({ ...m, declaredId })), m]);
}

// Horizontal text assumed: the span's share of characters maps onto the block width.
export function estimateSpanBBox(block: BoundingBox, textLength: number, start: number, end: number): BoundingBox {
  if (textLength <= 0) return { ...block };
  const charWidth = block.width / textLength;
  return {
    x: block.x + start * charWidth,
    y: block.y,
    width: Math.max(1, (end - start) * charWidth),
    height: block.height,
  };
}

// Blocks that sit inside a caption or title box describe a figure; they do not cite one.
export function isCaptionOrTitleBlock(block: TextBlock, elements: readonly LayoutElement[]): boolean {
  const cx = centerX(block.bbox);
  const cy = centerY(block.bbox);
  return elements.some(
    (el) =>
      el.pageIdx === block.pageIdx &&
      (el.kind === 'caption' || el.kind === 'title') &&
      containsPoint(el.bbox, cx, cy)
  );
}

export function extractReferences(page: PageInput, vocab: Vocabulary, opts: ExtractOptions): ReferenceMention[] {
  const out: ReferenceMention[] = [];
  page.blocks.forEach((block, blockIndex) => {
    if (opts.captionBlocks?.has(block) || isCaptionOrTitleBlock(block, page.elements)) return;
    const text = block.text;
    for (const m of matchReferences(vocab, text)) {
      const spanText = text.slice(m.start, m.end);
      const p = opts.classifier?.({ pageIdx: page.index, blockIndex, start: m.start, end: m.end, text: spanText });
      const factor = p === undefined ? 1 : clamp01(p);
      out.push({
        text: spanText,
        bbox: estimateSpanBBox(block.bbox, text.length, m.start, m.end),
        pageIdx: page.index,
        referenceType: m.type,
        declaredId: m.declaredId,
        matchedFigureId: null,
        matchScore: 0,
        confidence: opts.patternConfidence * factor,
        notMatched: false,
      });
    }
  });
  return out;
}

function scoreKey(pageIdx: number, text: string): string {
  return `${pageIdx}\u0000${text.trim().toLowerCase()}`;
}

/**
 * Classifier backed by precomputed span scores (page + exact span text).
 * Spans without a score get no opinion.
 */
export function createScoreTableClassifier(scores: readonly SpanScore[]): ReferenceSpanClassifier {
  const table = new Map<string, number>();
  for (const s of scores) table.set(scoreKey(s.pageIdx, s.text), s.probability);
  return (span) => table.get(scoreKey(span.pageIdx, span.text));
}
