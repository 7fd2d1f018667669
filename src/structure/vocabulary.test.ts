import { describe, expect, it } from '@jest/globals';

import { DEFAULT_SETTINGS } from '../types';
import { buildVocabulary, layoutKindForLabel, normaliseId, normaliseLabel, parseCaption } from './vocabulary';

const vocab = buildVocabulary(DEFAULT_SETTINGS);

describe('normaliseId', () => {
  it('strips whitespace around dots and leading zeros', () => {
    expect(normaliseId(' 02 . 06 ')).toBe('2.6');
    expect(normaliseId('1.04')).toBe('1.4');
    expect(normaliseId('0')).toBe('0');
    expect(normaliseId('10.0')).toBe('10.0');
  });
});

describe('normaliseLabel', () => {
  it('lower-cases and joins words with underscores', () => {
    expect(normaliseLabel(' Figure Caption ')).toBe('figure_caption');
    expect(normaliseLabel('isolate-formula')).toBe('isolate_formula');
  });
});

describe('parseCaption', () => {
  it('reads keyword, type and id from the start of the text', () => {
    expect(parseCaption(vocab, 'Figure 2.6: Document structure')).toEqual({
      keyword: 'Figure',
      type: 'figure',
      declaredId: '2.6',
    });
    expect(parseCaption(vocab, 'TABLE 3. Results')).toEqual({ keyword: 'TABLE', type: 'table', declaredId: '3' });
    expect(parseCaption(vocab, 'Fig.4 Overview')).toEqual({ keyword: 'Fig', type: 'figure', declaredId: '4' });
    expect(parseCaption(vocab, 'Algorithm 1')).toEqual({ keyword: 'Algorithm', type: 'algorithm', declaredId: '1' });
  });

  it('accepts the non-Latin keywords', () => {
    expect(parseCaption(vocab, '그림 3. 구조')).toEqual({ keyword: '그림', type: 'figure', declaredId: '3' });
    expect(parseCaption(vocab, '표 2: 결과')).toEqual({ keyword: '표', type: 'table', declaredId: '2' });
  });

  it('rejects text that only mentions a figure later on', () => {
    expect(parseCaption(vocab, 'As shown in Figure 2')).toBeNull();
    expect(parseCaption(vocab, 'Figure shows nothing')).toBeNull();
    expect(parseCaption(vocab, 'Figure 2a: panel')).toBeNull();
  });

  it('picks up keywords added through settings', () => {
    const custom = buildVocabulary({ keywords: { abb: 'figure' }, layoutLabels: {} });
    expect(parseCaption(custom, 'Abb. 7: Aufbau')).toEqual({ keyword: 'Abb', type: 'figure', declaredId: '7' });
    expect(parseCaption(vocab, 'Abb. 7: Aufbau')).toBeNull();
  });
});

describe('layoutKindForLabel', () => {
  it('maps detector labels and passes unknown ones through as text', () => {
    expect(layoutKindForLabel(vocab, 'Figure')).toBe('figure');
    expect(layoutKindForLabel(vocab, 'Figure Caption')).toBe('caption');
    expect(layoutKindForLabel(vocab, 'formula_number')).toBe('equation_number');
    expect(layoutKindForLabel(vocab, 'Doc Title')).toBe('title');
    expect(layoutKindForLabel(vocab, 'stamp')).toBe('text');
  });

  it('honours label overrides', () => {
    const custom = buildVocabulary({ keywords: {}, layoutLabels: { plot: 'figure' } });
    expect(layoutKindForLabel(custom, 'Plot')).toBe('figure');
  });
});
