import { describe, expect, it } from '@jest/globals';

import { DEFAULT_SETTINGS } from '../types';
import { applyCaption, createFigureRecord } from './captions';
import { groupElements, type GroupingContext } from './grouping';
import { serializeFigure } from './serialize';
import type { CanonicalType, FigureRecord, LayoutElement, LayoutKind } from './types';
import { buildVocabulary } from './vocabulary';

const vocab = buildVocabulary(DEFAULT_SETTINGS);

type Box = [x: number, y: number, width: number, height: number];

function el(id: string, kind: LayoutKind, [x, y, width, height]: Box, pageIdx = 0, rawText?: string): LayoutElement {
  return { id, type: kind, kind, bbox: { x, y, width, height }, pageIdx, confidence: 0.8, ...(rawText ? { rawText } : {}) };
}

function record(element: LayoutElement, type: CanonicalType, label?: string): FigureRecord {
  const r = createFigureRecord(element, type);
  if (label) applyCaption(r, { keyword: type, type, declaredId: label }, `${type} ${label}`);
  return r;
}

// No text blocks: caption reach is 1.5 × 12 = 18, proximity reach 2 × 12 = 24.
function ctx(elements: LayoutElement[]): GroupingContext {
  return { elements, blocksByPage: new Map(), settings: DEFAULT_SETTINGS, vocab };
}

describe('identifier strategy', () => {
  it('merges a figure continued on the next page into the first occurrence', () => {
    const a = el('a', 'figure', [100, 100, 300, 300], 0);
    const b = el('b', 'figure', [50, 50, 200, 200], 1);
    const out = groupElements([record(b, 'figure', '3'), record(a, 'figure', '3')], ctx([a, b]));

    expect(out).toHaveLength(1);
    expect(out[0].pageIdx).toBe(0);
    expect(out[0].bbox).toEqual({ x: 100, y: 100, width: 300, height: 300 });
    expect(Array.from(out[0].memberElementIds).sort()).toEqual(['a', 'b']);
    expect(out[0].groupingMethod).toBe('identifier');
  });

  it('unions the boxes of same-page parts', () => {
    const a = el('a', 'table', [100, 100, 300, 100]);
    const b = el('b', 'table', [100, 300, 300, 100]);
    const out = groupElements([record(a, 'table', '2'), record(b, 'table', '2')], ctx([a, b]));

    expect(out).toHaveLength(1);
    expect(out[0].bbox).toEqual({ x: 100, y: 100, width: 300, height: 300 });
  });

  it('keeps same ids of different types apart', () => {
    const a = el('a', 'table', [100, 100, 300, 100]);
    const b = el('b', 'figure', [100, 300, 300, 100]);
    const out = groupElements([record(a, 'table', '1'), record(b, 'figure', '1')], ctx([a, b]));
    expect(out).toHaveLength(2);
  });

  it('absorbs a caption box that names an existing record', () => {
    const fig = el('fig', 'figure', [100, 100, 300, 300], 0);
    const cap = el('cap', 'caption', [100, 100, 300, 12], 1, 'Figure 5: continued');
    const out = groupElements([record(fig, 'figure', '5')], ctx([fig, cap]));

    expect(out).toHaveLength(1);
    expect(Array.from(out[0].memberElementIds).sort()).toEqual(['cap', 'fig']);
    expect(out[0].bbox).toEqual({ x: 100, y: 100, width: 300, height: 300 });
    expect(out[0].groupingMethod).toBe('identifier');
  });
});

describe('pattern strategy', () => {
  it('labels the nearest unlabeled record from a caption box', () => {
    const fig = el('fig', 'figure', [100, 100, 300, 300]);
    const cap = el('cap', 'caption', [100, 405, 300, 12], 0, 'Figure 4: Caption box');
    const [out] = groupElements([record(fig, 'figure')], ctx([fig, cap]));

    expect(out.figureId).toBe('4');
    expect(out.idSource).toBe('caption');
    expect(out.title).toBe('Figure 4: Caption box');
    expect(out.bbox).toEqual({ x: 100, y: 100, width: 300, height: 317 });
    expect(Array.from(out.memberElementIds).sort()).toEqual(['cap', 'fig']);
    expect(out.groupingMethod).toBe('pattern');
  });

  it('never relabels a record that already has an id', () => {
    const fig = el('fig', 'figure', [100, 100, 300, 300]);
    const cap = el('cap', 'caption', [100, 405, 300, 12], 0, 'Figure 2: stray');
    const [out] = groupElements([record(fig, 'figure', '1')], ctx([fig, cap]));

    expect(out.figureId).toBe('1');
    expect(Array.from(out.memberElementIds)).toEqual(['fig']);
    expect(out.groupingMethod).toBe('single');
  });

  it('ignores caption boxes out of reach', () => {
    const fig = el('fig', 'figure', [100, 100, 300, 300]);
    const cap = el('cap', 'caption', [100, 430, 300, 12], 0, 'Figure 4: far');
    const [out] = groupElements([record(fig, 'figure')], ctx([fig, cap]));
    expect(out.figureId).toBeNull();
  });
});

describe('proximity strategy', () => {
  it('folds an unlabeled sub-panel into the labeled figure next to it', () => {
    const main = el('main', 'figure', [100, 100, 300, 300]);
    const sub = el('sub', 'figure', [100, 410, 300, 50]);
    const out = groupElements([record(main, 'figure', '1'), record(sub, 'figure')], ctx([main, sub]));

    expect(out).toHaveLength(1);
    expect(out[0].bbox).toEqual({ x: 100, y: 100, width: 300, height: 360 });
    expect(out[0].groupingMethod).toBe('proximity');
  });

  it('never merges records of different types', () => {
    const fig = el('fig', 'figure', [100, 100, 300, 300]);
    const tbl = el('tbl', 'table', [100, 405, 300, 50]);
    const out = groupElements([record(fig, 'figure', '1'), record(tbl, 'table')], ctx([fig, tbl]));

    expect(out.map((r) => r.type)).toEqual(['figure', 'table']);
    expect(out[1].figureId).toBeNull();
  });

  it('attaches equation numbers only to equations', () => {
    const eq = el('eq', 'equation', [100, 100, 300, 30]);
    const eqNum = el('n1', 'equation_number', [410, 100, 30, 30]);
    const fig = el('fig', 'figure', [100, 300, 300, 100]);
    const figNum = el('n2', 'equation_number', [410, 300, 30, 30]);
    const out = groupElements(
      [record(eq, 'equation', '1.4'), record(fig, 'figure', '2')],
      ctx([eq, eqNum, fig, figNum])
    );

    expect(Array.from(out[0].memberElementIds).sort()).toEqual(['eq', 'n1']);
    expect(out[0].bbox).toEqual({ x: 100, y: 100, width: 340, height: 30 });
    expect(Array.from(out[1].memberElementIds)).toEqual(['fig']);
  });

  it('folds a caption box without a numbered caption into any type', () => {
    const tbl = el('tbl', 'table', [100, 100, 300, 200]);
    const note = el('note', 'caption', [100, 305, 300, 12], 0, 'Source: survey data');
    const [out] = groupElements([record(tbl, 'table', '2')], ctx([tbl, note]));

    expect(Array.from(out.memberElementIds).sort()).toEqual(['note', 'tbl']);
    expect(out.title).toBe('table 2');
    expect(out.groupingMethod).toBe('proximity');
  });
});

describe('groupElements', () => {
  function scene() {
    const main = el('main', 'figure', [100, 100, 300, 300]);
    const cap = el('cap', 'caption', [100, 405, 300, 12], 0, 'Figure 4: Caption box');
    const side = el('side', 'figure', [410, 100, 100, 300]);
    const eq = el('eq', 'equation', [100, 600, 300, 30]);
    const loose = el('num', 'equation_number', [500, 700, 30, 30]);
    const elements = [main, cap, side, eq, loose];
    return { records: [record(main, 'figure'), record(side, 'figure'), record(eq, 'equation')], context: ctx(elements) };
  }

  it('reports multi_strategy when more than one strategy contributed', () => {
    const { records, context } = scene();
    const out = groupElements(records, context);

    expect(out).toHaveLength(2);
    expect(out[0]).toMatchObject({
      figureId: '4',
      groupingMethod: 'multi_strategy',
      bbox: { x: 100, y: 100, width: 410, height: 317 },
    });
    expect(Array.from(out[0].memberElementIds).sort()).toEqual(['cap', 'main', 'side']);
    expect(out[1]).toMatchObject({ type: 'equation', figureId: null, groupingMethod: 'single' });
  });

  it('is idempotent on its own output', () => {
    const { records, context } = scene();
    const once = groupElements(records, context);
    const snapshot = once.map(serializeFigure);
    const twice = groupElements(once, context);

    expect(twice.map(serializeFigure)).toEqual(snapshot);
  });
});
