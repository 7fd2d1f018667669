import { describe, expect, it } from '@jest/globals';

import type { BoundingBox } from './types';
import {
  bboxIou,
  bboxUnion,
  clamp01,
  compareReadingOrder,
  containsPoint,
  edgeDistance,
  horizontalGap,
  median,
  stableSortBy,
  verticalGap,
} from './utils';

function box(x: number, y: number, width: number, height: number): BoundingBox {
  return { x, y, width, height };
}

describe('box geometry', () => {
  it('unions two boxes', () => {
    expect(bboxUnion(box(0, 0, 10, 10), box(20, 5, 10, 10))).toEqual(box(0, 0, 30, 15));
  });

  it('measures overlap as intersection over union', () => {
    expect(bboxIou(box(0, 0, 10, 10), box(5, 0, 10, 10))).toBeCloseTo(50 / 150);
    expect(bboxIou(box(0, 0, 10, 10), box(10, 0, 10, 10))).toBe(0);
    expect(bboxIou(box(0, 0, 10, 10), box(0, 0, 10, 10))).toBe(1);
  });

  it('measures gaps between edges', () => {
    const a = box(0, 0, 10, 10);
    const b = box(13, 14, 5, 5);
    expect(horizontalGap(a, b)).toBe(3);
    expect(verticalGap(a, b)).toBe(4);
    expect(edgeDistance(a, b)).toBe(5);
    expect(edgeDistance(a, box(5, 5, 10, 10))).toBe(0);
  });

  it('counts points on the border as inside', () => {
    expect(containsPoint(box(0, 0, 10, 10), 10, 10)).toBe(true);
    expect(containsPoint(box(0, 0, 10, 10), 10.5, 5)).toBe(false);
  });
});

describe('ordering helpers', () => {
  it('clamps into [0, 1]', () => {
    expect([clamp01(-1), clamp01(0.4), clamp01(3), clamp01(Number.NaN)]).toEqual([0, 0.4, 1, 0]);
  });

  it('takes the median of sorted values', () => {
    expect(median([])).toBe(0);
    expect(median([1, 2, 9])).toBe(2);
    expect(median([1, 2, 4, 9])).toBe(3);
  });

  it('sorts stably by key', () => {
    expect(stableSortBy(['b1', 'a', 'b2', 'c'], (s) => s.length)).toEqual(['a', 'c', 'b1', 'b2']);
  });

  it('orders by page, then top, then left', () => {
    const items = [
      { pageIdx: 1, bbox: box(0, 0, 1, 1) },
      { pageIdx: 0, bbox: box(50, 10, 1, 1) },
      { pageIdx: 0, bbox: box(0, 10, 1, 1) },
      { pageIdx: 0, bbox: box(90, 0, 1, 1) },
    ];
    expect(items.slice().sort(compareReadingOrder)).toEqual([items[3], items[2], items[1], items[0]]);
  });
});
