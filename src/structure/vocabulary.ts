// src/structure/vocabulary.ts
// Keyword and detector-label tables, plus the caption / reference grammars
// built from them. Extending the vocabulary is a settings change, not a code change.

import type { LinkerSettings } from '../types';
import type { CanonicalType, LayoutKind } from './types';

export const DEFAULT_KEYWORDS: Readonly<Record<string, CanonicalType>> = {
  fig: 'figure',
  figs: 'figure',
  figure: 'figure',
  figures: 'figure',
  picture: 'figure',
  image: 'figure',
  chart: 'figure',
  graph: 'figure',
  diagram: 'figure',
  '그림': 'figure',
  tab: 'table',
  table: 'table',
  tables: 'table',
  '표': 'table',
  eq: 'equation',
  eqs: 'equation',
  equation: 'equation',
  equations: 'equation',
  formula: 'equation',
  '식': 'equation',
  '수식': 'equation',
  alg: 'algorithm',
  algo: 'algorithm',
  algorithm: 'algorithm',
  algorithms: 'algorithm',
  '알고리즘': 'algorithm',
  ex: 'example',
  example: 'example',
  examples: 'example',
  '예제': 'example',
};

// Keys are normalised with normaliseLabel().
export const DEFAULT_LAYOUT_LABELS: Readonly<Record<string, LayoutKind>> = {
  figure: 'figure',
  picture: 'figure',
  image: 'figure',
  chart: 'figure',
  graph: 'figure',
  diagram: 'figure',
  table: 'table',
  equation: 'equation',
  formula: 'equation',
  isolate_formula: 'equation',
  display_formula: 'equation',
  formula_number: 'equation_number',
  equation_number: 'equation_number',
  number: 'equation_number',
  algorithm: 'algorithm',
  caption: 'caption',
  figure_caption: 'caption',
  figure_title: 'caption',
  table_caption: 'caption',
  table_title: 'caption',
  chart_title: 'caption',
  title: 'title',
  doc_title: 'title',
  paragraph_title: 'title',
  text: 'text',
};

// Dot-separated integers, tolerating whitespace around the dots ("2 . 6").
const ID_SOURCE = String.raw`\d+(?:\s*\.\s*\d+)*`;
// Equation-numbering convention: one integer or a dotted pair.
const EQUATION_ID_SOURCE = String.raw`\d{1,3}(?:\s*\.\s*\d{1,3})?`;
const NOT_AFTER_WORD = String.raw`(?<![\p{L}\p{N}])`;

export type CaptionMatch = {
  keyword: string;
  type: CanonicalType;
  declaredId: string;
};

export type Vocabulary = {
  keywords: ReadonlyMap<string, CanonicalType>;
  layoutLabels: ReadonlyMap<string, LayoutKind>;
  caption: RegExp;
  // Global regexes: callers must reset lastIndex (matchAll does).
  reference: RegExp;
  continuation: RegExp;
  range: RegExp;
  bareEquation: RegExp;
};

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function normaliseLabel(raw: string): string {
  return raw.trim().toLowerCase().replace(/[\s-]+/g, '_');
}

/**
 * Strips whitespace around the dots and leading zeros of every component:
 * `" 02 . 06 "` becomes `"2.6"`.
 */
export function normaliseId(raw: string): string {
  return raw
    .trim()
    .split(/\s*\.\s*/)
    .map((part) => part.replace(/^0+(?=\d)/, ''))
    .join('.');
}

export function buildVocabulary(settings: Pick<LinkerSettings, 'keywords' | 'layoutLabels'>): Vocabulary {
  const keywords = new Map<string, CanonicalType>();
  for (const [k, t] of Object.entries({ ...DEFAULT_KEYWORDS, ...settings.keywords })) {
    keywords.set(k.trim().toLowerCase(), t);
  }
  const layoutLabels = new Map<string, LayoutKind>();
  for (const [k, kind] of Object.entries({ ...DEFAULT_LAYOUT_LABELS, ...settings.layoutLabels })) {
    layoutLabels.set(normaliseLabel(k), kind);
  }

  // Longest first so "figures" wins over "fig".
  const alternation = Array.from(keywords.keys())
    .filter((k) => k.length > 0)
    .sort((a, b) => b.length - a.length || a.localeCompare(b))
    .map(escapeRegExp)
    .join('|');

  const caption = new RegExp(
    String.raw`^\s*(${alternation})\.?\s*(${ID_SOURCE})(?=\s*[:.]|\s|$)`,
    'iu'
  );
  const reference = new RegExp(
    String.raw`${NOT_AFTER_WORD}(${alternation})\.?\s*(?:\(\s*(${ID_SOURCE})\s*\)|(${ID_SOURCE}))`,
    'giu'
  );
  const continuation = new RegExp(String.raw`^\s*(?:,|&|and)\s*(${ID_SOURCE})`, 'iu');
  const range = new RegExp(String.raw`^\s*[-\u2013]\s*(${ID_SOURCE})`, 'iu');
  const bareEquation = new RegExp(String.raw`\(\s*(${EQUATION_ID_SOURCE})\s*\)`, 'gu');

  return { keywords, layoutLabels, caption, reference, continuation, range, bareEquation };
}

export function canonicalTypeForKeyword(vocab: Vocabulary, keyword: string): CanonicalType | null {
  return vocab.keywords.get(keyword.toLowerCase()) ?? null;
}

// Unknown labels pass through as plain text.
export function layoutKindForLabel(vocab: Vocabulary, label: string): LayoutKind {
  return vocab.layoutLabels.get(normaliseLabel(label)) ?? 'text';
}

/**
 * Matches a caption at the start of `text`: keyword, optional period,
 * numeric id, then a separator (`:`, `.`, whitespace) or end of text.
 */
export function parseCaption(vocab: Vocabulary, text: string): CaptionMatch | null {
  const m = vocab.caption.exec(text);
  if (!m) return null;
  const type = canonicalTypeForKeyword(vocab, m[1]);
  if (!type) return null;
  return { keyword: m[1], type, declaredId: normaliseId(m[2]) };
}
