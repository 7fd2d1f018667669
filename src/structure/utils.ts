// src/structure/utils.ts
// Small, deterministic geometry helpers used throughout the linker.

import type { BoundingBox } from './types';

export function clamp01(n: number): number {
  if (!Number.isFinite(n)) return 0;
  if (n <= 0) return 0;
  if (n >= 1) return 1;
  return n;
}

export function right(b: BoundingBox): number {
  return b.x + b.width;
}

export function bottom(b: BoundingBox): number {
  return b.y + b.height;
}

export function centerX(b: BoundingBox): number {
  return b.x + b.width / 2;
}

export function centerY(b: BoundingBox): number {
  return b.y + b.height / 2;
}

export function bboxUnion(a: BoundingBox, b: BoundingBox): BoundingBox {
  const x = Math.min(a.x, b.x);
  const y = Math.min(a.y, b.y);
  return {
    x,
    y,
    width: Math.max(right(a), right(b)) - x,
    height: Math.max(bottom(a), bottom(b)) - y,
  };
}

function bboxArea(b: BoundingBox): number {
  return Math.max(0, b.width) * Math.max(0, b.height);
}

export function bboxIou(a: BoundingBox, b: BoundingBox): number {
  const x0 = Math.max(a.x, b.x);
  const y0 = Math.max(a.y, b.y);
  const x1 = Math.min(right(a), right(b));
  const y1 = Math.min(bottom(a), bottom(b));
  if (x1 <= x0 || y1 <= y0) return 0;
  const inter = (x1 - x0) * (y1 - y0);
  const union = bboxArea(a) + bboxArea(b) - inter;
  return union > 0 ? inter / union : 0;
}

// Gap between the x-ranges (0 when they overlap).
export function horizontalGap(a: BoundingBox, b: BoundingBox): number {
  if (right(a) <= b.x) return b.x - right(a);
  if (right(b) <= a.x) return a.x - right(b);
  return 0;
}

// Gap between the y-ranges (0 when they overlap).
export function verticalGap(a: BoundingBox, b: BoundingBox): number {
  if (bottom(a) <= b.y) return b.y - bottom(a);
  if (bottom(b) <= a.y) return a.y - bottom(b);
  return 0;
}

export function horizontalOverlap(a: BoundingBox, b: BoundingBox): boolean {
  return a.x < right(b) && b.x < right(a);
}

export function verticalOverlap(a: BoundingBox, b: BoundingBox): boolean {
  return a.y < bottom(b) && b.y < bottom(a);
}

// Euclidean gap between the rectangles' edges (0 when they touch or overlap).
export function edgeDistance(a: BoundingBox, b: BoundingBox): number {
  return Math.hypot(horizontalGap(a, b), verticalGap(a, b));
}

export function centerDistance(a: BoundingBox, b: BoundingBox): number {
  return Math.hypot(centerX(a) - centerX(b), centerY(a) - centerY(b));
}

export function containsPoint(b: BoundingBox, x: number, y: number): boolean {
  return x >= b.x && x <= right(b) && y >= b.y && y <= bottom(b);
}

export function median(sortedAsc: number[]): number {
  if (!sortedAsc.length) return 0;
  const n = sortedAsc.length;
  const mid = Math.floor(n / 2);
  return n % 2 ? sortedAsc[mid] : (sortedAsc[mid - 1] + sortedAsc[mid]) / 2;
}

export function stableSortBy<T>(arr: T[], key: (t: T) => number): T[] {
  return arr
    .map((v, i) => ({ v, i, k: key(v) }))
    .sort((a, b) => (a.k - b.k) || (a.i - b.i))
    .map((o) => o.v);
}

// Reading order within a page: top edge, then left edge.
export function compareReadingOrder(a: { pageIdx: number; bbox: BoundingBox }, b: { pageIdx: number; bbox: BoundingBox }): number {
  return (a.pageIdx - b.pageIdx) || (a.bbox.y - b.bbox.y) || (a.bbox.x - b.bbox.x);
}
