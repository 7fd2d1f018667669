// src/structure/grouping.ts
// Element Grouper: fold scattered detections (image regions, caption boxes,
// sub-panels, equation numbers) into one record per logical figure.
//
// Strategies, in order:
//   1. identifier  document-wide; same caption id + type → one record
//   2. pattern     per page; a caption box names the nearest unlabeled record
//   3. proximity   per page; nearby compatible leftovers join a labeled record
// The sequence repeats until a pass merges nothing, so grouping its own output
// is a no-op.

import type { LinkerSettings } from '../types';
import { applyCaption, pageLineHeight } from './captions';
import type { FigureRecord, GroupingMethod, LayoutElement, TextBlock } from './types';
import { bboxUnion, centerDistance, compareReadingOrder, containsPoint, centerX, centerY, edgeDistance, stableSortBy } from './utils';
import { parseCaption, type CaptionMatch, type Vocabulary } from './vocabulary';

type Strategy = Exclude<GroupingMethod, 'single' | 'multi_strategy'>;

export type LooseElement = {
  element: LayoutElement;
  text: string;
  caption: CaptionMatch | null;
};

export type GroupingContext = {
  elements: readonly LayoutElement[];
  blocksByPage: ReadonlyMap<number, readonly TextBlock[]>;
  settings: Pick<LinkerSettings, 'captionSearchFactor' | 'proximityMergeFactor' | 'fallbackLineHeight'>;
  vocab: Vocabulary;
};

function recordKey(r: FigureRecord): string | null {
  if (r.figureId === null || r.idSource !== 'caption') return null;
  return `${r.type}\u0000${r.figureId}`;
}

function refreshMethod(r: FigureRecord): void {
  if (r.strategies.size === 0) r.groupingMethod = 'single';
  else if (r.strategies.size === 1) r.groupingMethod = Array.from(r.strategies)[0];
  else r.groupingMethod = 'multi_strategy';
}

function absorbRecord(primary: FigureRecord, other: FigureRecord, strategy: Strategy): void {
  for (const id of other.memberElementIds) primary.memberElementIds.add(id);
  // Cross-page continuations keep the primary's page geometry.
  if (other.pageIdx === primary.pageIdx) primary.bbox = bboxUnion(primary.bbox, other.bbox);
  primary.confidence = Math.max(primary.confidence, other.confidence);
  if (primary.title === null) primary.title = other.title;
  for (const s of other.strategies) primary.strategies.add(s);
  primary.strategies.add(strategy);
  refreshMethod(primary);
}

function absorbElement(primary: FigureRecord, el: LayoutElement, strategy: Strategy): void {
  primary.memberElementIds.add(el.id);
  if (el.pageIdx === primary.pageIdx) primary.bbox = bboxUnion(primary.bbox, el.bbox);
  primary.strategies.add(strategy);
  refreshMethod(primary);
}

// Text of a caption box: the detector's own text, else the OCR blocks it covers.
function elementText(el: LayoutElement, blocks: readonly TextBlock[]): string {
  if (el.rawText?.trim()) return el.rawText.trim();
  const inside = blocks.filter((b) => containsPoint(el.bbox, centerX(b.bbox), centerY(b.bbox)));
  return stableSortBy(inside, (b) => b.bbox.y * 10_000 + b.bbox.x)
    .map((b) => b.text.trim())
    .join(' ')
    .trim();
}

function looseElements(records: readonly FigureRecord[], ctx: GroupingContext): LooseElement[] {
  const attached = new Set<string>();
  for (const r of records) for (const id of r.memberElementIds) attached.add(id);
  return ctx.elements
    .filter((el) => !attached.has(el.id) && (el.kind === 'caption' || el.kind === 'equation_number'))
    .map((element) => {
      const text = element.kind === 'caption' ? elementText(element, ctx.blocksByPage.get(element.pageIdx) ?? []) : '';
      return { element, text, caption: text ? parseCaption(ctx.vocab, text) : null };
    })
    .sort((a, b) => compareReadingOrder(a.element, b.element));
}

function nearest<T extends { bbox: FigureRecord['bbox'] }>(
  from: FigureRecord['bbox'],
  cands: readonly T[]
): T | null {
  let best: T | null = null;
  let bestD = Number.POSITIVE_INFINITY;
  // Candidates arrive in reading order, so strict < keeps the earliest on ties.
  for (const c of cands) {
    const d = centerDistance(from, c.bbox);
    if (d < bestD) {
      bestD = d;
      best = c;
    }
  }
  return best;
}

/**
 * Identifier strategy. Records sharing a caption id and type collapse into the
 * earliest one in reading order; matching caption boxes join it as members.
 */
export function mergeByIdentifier(
  records: FigureRecord[],
  loose: LooseElement[]
): { records: FigureRecord[]; merges: number } {
  const primaryByKey = new Map<string, FigureRecord>();
  const out: FigureRecord[] = [];
  let merges = 0;

  for (const r of records.slice().sort(compareReadingOrder)) {
    const key = recordKey(r);
    if (key === null) {
      out.push(r);
      continue;
    }
    const primary = primaryByKey.get(key);
    if (!primary) {
      primaryByKey.set(key, r);
      out.push(r);
      continue;
    }
    absorbRecord(primary, r, 'identifier');
    merges++;
  }

  for (const le of loose) {
    if (!le.caption) continue;
    const primary = primaryByKey.get(`${le.caption.type}\u0000${le.caption.declaredId}`);
    if (!primary || primary.memberElementIds.has(le.element.id)) continue;
    absorbElement(primary, le.element, 'identifier');
    merges++;
  }

  return { records: out, merges };
}

/**
 * Pattern strategy. A caption box names the nearest figure-like record on its
 * page when that record is within caption distance and still unlabeled.
 */
export function mergeByPattern(records: FigureRecord[], loose: LooseElement[], ctx: GroupingContext): number {
  let merges = 0;
  for (const le of loose) {
    if (!le.caption) continue;
    const el = le.element;
    const blocks = ctx.blocksByPage.get(el.pageIdx) ?? [];
    const maxGap = ctx.settings.captionSearchFactor * pageLineHeight(blocks, ctx.settings.fallbackLineHeight);
    const inReach = records.filter((r) => r.pageIdx === el.pageIdx && edgeDistance(r.bbox, el.bbox) <= maxGap);
    const target = nearest(el.bbox, inReach);
    if (!target || target.figureId !== null) continue;
    applyCaption(target, le.caption, le.text);
    absorbElement(target, el, 'pattern');
    merges++;
  }
  return merges;
}

/**
 * Proximity strategy. Unlabeled records and caption-less boxes that overlap or
 * sit within the merge distance of a labeled record of a compatible type are
 * folded into the nearest one. Repeats until nothing moves, since every fold
 * grows its target.
 */
export function mergeByProximity(
  records: FigureRecord[],
  loose: LooseElement[],
  ctx: GroupingContext
): { records: FigureRecord[]; merges: number } {
  let current = records.slice().sort(compareReadingOrder);
  const pending = loose.filter((le) => !le.caption);
  let merges = 0;

  for (;;) {
    let moved = false;

    for (const r of current.slice()) {
      if (r.figureId !== null) continue;
      const dist = proximityDistance(r.pageIdx, ctx);
      const targets = current.filter(
        (t) => t !== r && t.figureId !== null && t.pageIdx === r.pageIdx && t.type === r.type && edgeDistance(t.bbox, r.bbox) <= dist
      );
      const target = nearest(r.bbox, targets);
      if (!target) continue;
      absorbRecord(target, r, 'proximity');
      current = current.filter((c) => c !== r);
      merges++;
      moved = true;
    }

    for (const le of pending.slice()) {
      const el = le.element;
      const dist = proximityDistance(el.pageIdx, ctx);
      const targets = current.filter(
        (t) =>
          t.figureId !== null &&
          t.pageIdx === el.pageIdx &&
          (el.kind === 'caption' || t.type === 'equation') &&
          edgeDistance(t.bbox, el.bbox) <= dist
      );
      const target = nearest(el.bbox, targets);
      if (!target) continue;
      absorbElement(target, el, 'proximity');
      pending.splice(pending.indexOf(le), 1);
      merges++;
      moved = true;
    }

    if (!moved) break;
  }

  return { records: current, merges };
}

function proximityDistance(pageIdx: number, ctx: GroupingContext): number {
  const blocks = ctx.blocksByPage.get(pageIdx) ?? [];
  return ctx.settings.proximityMergeFactor * pageLineHeight(blocks, ctx.settings.fallbackLineHeight);
}

/**
 * Groups every record of the document. Must run after all pages finished
 * caption location: the identifier strategy looks across pages.
 */
export function groupElements(records: FigureRecord[], ctx: GroupingContext): FigureRecord[] {
  let current = records.slice();
  // Each productive pass consumes at least one record or element.
  const maxPasses = records.length + ctx.elements.length + 1;

  for (let pass = 0; pass < maxPasses; pass++) {
    let merges = 0;

    const byId = mergeByIdentifier(current, looseElements(current, ctx));
    current = byId.records;
    merges += byId.merges;

    merges += mergeByPattern(current, looseElements(current, ctx), ctx);

    // A pattern attachment may name an id that already exists elsewhere.
    const reconciled = mergeByIdentifier(current, looseElements(current, ctx));
    current = reconciled.records;
    merges += reconciled.merges;

    const byProximity = mergeByProximity(current, looseElements(current, ctx), ctx);
    current = byProximity.records;
    merges += byProximity.merges;

    if (merges === 0) break;
  }

  return current.sort(compareReadingOrder);
}
