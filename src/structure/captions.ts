// src/structure/captions.ts
// Caption Locator: read the caption next to each figure-like layout element
// and label the element's record with the declared id and type.

import type { LinkerSettings } from '../types';
import type { BoundingBox, CanonicalType, FigureLikeKind, FigureRecord, LayoutElement, LayoutKind, PageInput, TextBlock } from './types';
import { centerX, centerY, horizontalGap, horizontalOverlap, median, right, verticalGap, verticalOverlap } from './utils';
import { parseCaption, type CaptionMatch, type Vocabulary } from './vocabulary';

export type CaptionPosition = 'below' | 'above' | 'right' | 'inline';

export type CaptionHit = {
  match: CaptionMatch;
  text: string;
  position: CaptionPosition;
  block: TextBlock | null;
};

const FIGURE_LIKE: ReadonlySet<LayoutKind> = new Set<LayoutKind>(['figure', 'table', 'equation', 'algorithm']);

export function isFigureLike(kind: LayoutKind): kind is FigureLikeKind {
  return FIGURE_LIKE.has(kind);
}

export function pageLineHeight(blocks: readonly TextBlock[], fallback: number): number {
  const heights = blocks
    .map((b) => b.bbox.height)
    .filter((h) => Number.isFinite(h) && h > 0)
    .sort((a, b) => a - b);
  return heights.length ? median(heights) : fallback;
}

export function captionSearchDistance(
  blocks: readonly TextBlock[],
  settings: Pick<LinkerSettings, 'captionSearchFactor' | 'fallbackLineHeight'>
): number {
  return settings.captionSearchFactor * pageLineHeight(blocks, settings.fallbackLineHeight);
}

function classifyPosition(el: BoundingBox, b: BoundingBox, maxGap: number): Exclude<CaptionPosition, 'inline'> | null {
  if (horizontalOverlap(el, b)) {
    if (verticalGap(el, b) > maxGap) return null;
    return centerY(b) >= centerY(el) ? 'below' : 'above';
  }
  if (verticalOverlap(el, b) && centerX(b) > right(el) && horizontalGap(el, b) <= maxGap) return 'right';
  return null;
}

const PRIORITY: Record<Exclude<CaptionPosition, 'inline'>, number> = { below: 0, above: 1, right: 2 };

/**
 * Finds the caption for one figure-like element: below, then above, then the
 * same horizontal band to the right, each within `maxGap`. Inside a priority
 * the smallest vertical gap wins, then the smallest horizontal offset. The
 * element's own raw text is tried last.
 */
export function locateCaption(
  element: LayoutElement,
  blocks: readonly TextBlock[],
  maxGap: number,
  vocab: Vocabulary
): CaptionHit | null {
  type Cand = { hit: CaptionHit; priority: number; vGap: number; hOffset: number; order: number };
  const cands: Cand[] = [];

  blocks.forEach((block, order) => {
    if (block.pageIdx !== element.pageIdx) return;
    const position = classifyPosition(element.bbox, block.bbox, maxGap);
    if (!position) return;
    const match = parseCaption(vocab, block.text);
    if (!match) return;
    const hOffset = position === 'right'
      ? horizontalGap(element.bbox, block.bbox)
      : Math.abs(centerX(block.bbox) - centerX(element.bbox));
    cands.push({
      hit: { match, text: block.text.trim(), position, block },
      priority: PRIORITY[position],
      vGap: verticalGap(element.bbox, block.bbox),
      hOffset,
      order,
    });
  });

  cands.sort((a, b) => (a.priority - b.priority) || (a.vGap - b.vGap) || (a.hOffset - b.hOffset) || (a.order - b.order));
  if (cands.length) return cands[0].hit;

  const inline = element.rawText?.trim();
  if (inline) {
    const match = parseCaption(vocab, inline);
    if (match) return { match, text: inline, position: 'inline', block: null };
  }
  return null;
}

/**
 * The single place where caption text overrides the detector: a caption's
 * keyword type replaces whatever type the record carried.
 */
export function applyCaption(record: FigureRecord, caption: CaptionMatch, title: string): void {
  record.figureId = caption.declaredId;
  record.idSource = 'caption';
  record.type = caption.type;
  record.title = title.trim();
}

export function createFigureRecord(element: LayoutElement, type: CanonicalType): FigureRecord {
  return {
    figureId: null,
    idSource: null,
    type,
    bbox: { ...element.bbox },
    pageIdx: element.pageIdx,
    title: null,
    memberElementIds: new Set([element.id]),
    confidence: element.confidence,
    groupingMethod: 'single',
    strategies: new Set(),
    referenceCount: 0,
    sequenceInPage: 0,
  };
}

export type PageCaptions = {
  records: FigureRecord[];
  // Blocks read as a caption; they describe a figure, so they are not scanned for references.
  captionBlocks: Set<TextBlock>;
};

/**
 * One record per figure-like element of the page. Records without a caption
 * keep the detector's type and a null id until fallback numbering.
 */
export function locateCaptionsOnPage(
  page: PageInput,
  settings: Pick<LinkerSettings, 'captionSearchFactor' | 'fallbackLineHeight'>,
  vocab: Vocabulary
): PageCaptions {
  const maxGap = captionSearchDistance(page.blocks, settings);
  const records: FigureRecord[] = [];
  const captionBlocks = new Set<TextBlock>();
  for (const el of page.elements) {
    if (!isFigureLike(el.kind)) continue;
    const record = createFigureRecord(el, el.kind);
    const hit = locateCaption(el, page.blocks, maxGap, vocab);
    if (hit) {
      applyCaption(record, hit.match, hit.text);
      if (hit.block) captionBlocks.add(hit.block);
    }
    records.push(record);
  }
  return { records, captionBlocks };
}

export function locateCaptions(
  page: PageInput,
  settings: Pick<LinkerSettings, 'captionSearchFactor' | 'fallbackLineHeight'>,
  vocab: Vocabulary
): FigureRecord[] {
  return locateCaptionsOnPage(page, settings, vocab).records;
}
