// src/structure/mapper.ts
// Structure Mapper: scored reference × figure matching. A reference resolves to
// at most one figure; a figure may collect any number of references.

import type { LinkerSettings, MatchWeights } from '../types';
import type { CanonicalType, FigureRecord, MappingStatistics, ReferenceMention } from './types';

export type MappingGraph = MappingStatistics['graph'];

const EPS = 1e-9;

function round6(n: number): number {
  return Math.round(n * 1e6) / 1e6;
}

function leadingComponent(id: string): string {
  return id.split('.')[0];
}

/**
 * Edge weight for a type-compatible pair. Only caption ids take part in the
 * identifier terms; fallback names say nothing about what the text cites.
 */
export function scoreEdge(
  ref: ReferenceMention,
  fig: FigureRecord,
  onlyOfType: boolean,
  weights: MatchWeights
): number {
  let w = 0;
  const id = fig.idSource === 'caption' ? fig.figureId : null;
  if (id !== null && ref.declaredId !== null) {
    if (id === ref.declaredId) w += weights.idExact;
    else if (leadingComponent(id) === leadingComponent(ref.declaredId)) w += weights.idPrefix;
  }
  if (ref.pageIdx === fig.pageIdx) w += weights.samePage;
  if (onlyOfType) w += weights.singleOfType;
  return round6(w);
}

function isBetter(
  cand: { fig: FigureRecord; weight: number },
  best: { fig: FigureRecord; weight: number } | null,
  refPage: number
): boolean {
  if (!best) return true;
  if (cand.weight > best.weight + EPS) return true;
  if (cand.weight < best.weight - EPS) return false;
  const candSame = cand.fig.pageIdx === refPage;
  const bestSame = best.fig.pageIdx === refPage;
  if (candSame !== bestSame) return candSame;
  return (cand.fig.figureId ?? '') < (best.fig.figureId ?? '');
}

/**
 * Resolves every mention in place and bumps `referenceCount` on the chosen
 * figures. Figures must already carry their final ids.
 */
export function mapReferences(
  references: ReferenceMention[],
  figures: FigureRecord[],
  settings: Pick<LinkerSettings, 'weights' | 'matchThreshold'>
): MappingGraph {
  const byType = new Map<CanonicalType, FigureRecord[]>();
  for (const f of figures) {
    const list = byType.get(f.type) ?? [];
    list.push(f);
    byType.set(f.type, list);
  }

  let edges = 0;
  for (const ref of references) {
    const cands = ref.referenceType ? byType.get(ref.referenceType) ?? [] : [];
    edges += cands.length;

    let best: { fig: FigureRecord; weight: number } | null = null;
    for (const fig of cands) {
      const cand = { fig, weight: scoreEdge(ref, fig, cands.length === 1, settings.weights) };
      if (isBetter(cand, best, ref.pageIdx)) best = cand;
    }

    if (best && best.weight >= settings.matchThreshold - EPS) {
      ref.matchedFigureId = best.fig.figureId;
      ref.matchScore = best.weight;
      ref.notMatched = false;
      best.fig.referenceCount++;
    } else {
      ref.matchedFigureId = null;
      ref.matchScore = best?.weight ?? 0;
      ref.notMatched = true;
    }
  }

  const nodes = references.length + figures.length;
  return {
    referenceNodes: references.length,
    figureNodes: figures.length,
    edges,
    averageDegree: nodes ? round6((2 * edges) / nodes) : 0,
  };
}
