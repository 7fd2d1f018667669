// src/structure/aggregate.ts
// Aggregator: post-barrier numbering of uncaptioned figures, per-page
// sequence numbers, the uniqueness check and document statistics.

import { StructureInvariantError } from './errors';
import type { MappingGraph } from './mapper';
import type {
  CanonicalType,
  DataQualityWarning,
  FigureRecord,
  MappingStatistics,
  ProcessingInfo,
  ReferenceMention,
  TypeStatistics,
} from './types';
import { compareReadingOrder } from './utils';

function idKey(type: CanonicalType, id: string): string {
  return `${type}\u0000${id}`;
}

function rate(part: number, total: number): number {
  return total ? Math.round((part / total) * 10_000) / 10_000 : 0;
}

/**
 * Names every record that still has no id `<type>_unlabeled_<n>`, counting per
 * type in document order and skipping names a caption already took.
 * One sequential pass; call it once, after grouping.
 */
export function assignFallbackIds(figures: readonly FigureRecord[]): void {
  const taken = new Set<string>();
  for (const f of figures) if (f.figureId !== null) taken.add(idKey(f.type, f.figureId));

  const counters = new Map<CanonicalType, number>();
  for (const f of figures.slice().sort(compareReadingOrder)) {
    if (f.figureId !== null) continue;
    let n = counters.get(f.type) ?? 0;
    let id: string;
    do {
      n++;
      id = `${f.type}_unlabeled_${n}`;
    } while (taken.has(idKey(f.type, id)));
    counters.set(f.type, n);
    taken.add(idKey(f.type, id));
    f.figureId = id;
    f.idSource = 'fallback';
  }
}

// 1-based position among records of the same type on the same page.
export function assignSequenceInPage(figures: readonly FigureRecord[]): void {
  const counters = new Map<string, number>();
  for (const f of figures.slice().sort(compareReadingOrder)) {
    const key = `${f.pageIdx}\u0000${f.type}`;
    const n = (counters.get(key) ?? 0) + 1;
    counters.set(key, n);
    f.sequenceInPage = n;
  }
}

export function assertUniqueFigureIds(figures: readonly FigureRecord[]): void {
  const seen = new Set<string>();
  const duplicates: Array<{ type: CanonicalType; figureId: string }> = [];
  for (const f of figures) {
    if (f.figureId === null) continue;
    const key = idKey(f.type, f.figureId);
    if (seen.has(key)) duplicates.push({ type: f.type, figureId: f.figureId });
    seen.add(key);
  }
  if (duplicates.length) throw new StructureInvariantError(duplicates);
}

export function computeMappingStatistics(references: readonly ReferenceMention[], graph: MappingGraph): MappingStatistics {
  const matched = references.filter((r) => r.matchedFigureId !== null).length;
  return {
    totalReferences: references.length,
    matchedReferences: matched,
    matchRate: rate(matched, references.length),
    graph,
  };
}

export function computeTypeStatistics(
  figures: readonly FigureRecord[],
  references: readonly ReferenceMention[]
): TypeStatistics {
  const forType = (type: CanonicalType): TypeStatistics[CanonicalType] => {
    const refs = references.filter((r) => r.referenceType === type);
    const matched = refs.filter((r) => r.matchedFigureId !== null).length;
    return {
      figures: figures.filter((f) => f.type === type).length,
      references: refs.length,
      matched,
      matchRate: rate(matched, refs.length),
    };
  };
  return {
    figure: forType('figure'),
    table: forType('table'),
    equation: forType('equation'),
    algorithm: forType('algorithm'),
    example: forType('example'),
  };
}

export function computeProcessingInfo(args: {
  totalLayoutElements: number;
  warnings: readonly DataQualityWarning[];
  figures: readonly FigureRecord[];
}): ProcessingInfo {
  const { warnings } = args;
  return {
    totalLayoutElements: args.totalLayoutElements,
    skippedElements: warnings.filter((w) => w.source === 'layout_element' && w.reason !== 'DUPLICATE_ELEMENT_ID').length,
    skippedBlocks: warnings.filter((w) => w.source === 'text_block' && w.reason !== 'DUPLICATE_BLOCK').length,
    duplicateBlocks: warnings.filter((w) => w.reason === 'DUPLICATE_BLOCK').length,
    groupedFigures: args.figures.filter((f) => f.memberElementIds.size > 1).length,
  };
}
