import type { CanonicalType, LayoutKind } from './structure/types';

export interface MatchWeights {
  /** Declared id equals the figure's caption id. */
  idExact: number;
  /** Ids differ but share their leading dotted component ("2.6" / "2.1"). */
  idPrefix: number;
  samePage: number;
  /** The document holds exactly one figure of the reference's type. */
  singleOfType: number;
}

export interface LinkerSettings {
  // Caption search radius, as a multiple of the page's median line height
  captionSearchFactor: number;
  // Sub-element fold radius for the proximity grouping strategy, same unit
  proximityMergeFactor: number;
  // Line height assumed when a page has no usable text blocks (page units)
  fallbackLineHeight: number;
  matchThreshold: number;
  // Confidence of a pattern match before the classifier factor is applied
  patternConfidence: number;
  // Two blocks with the same text overlapping at least this much are duplicates
  duplicateIou: number;
  weights: MatchWeights;
  /** Extra caption/reference keywords, merged over the built-in table. */
  keywords: Record<string, CanonicalType>;
  /** Extra detector labels, merged over the built-in table. */
  layoutLabels: Record<string, LayoutKind>;
  logWarnings: boolean;
}

export const DEFAULT_SETTINGS: LinkerSettings = {
  captionSearchFactor: 1.5,
  proximityMergeFactor: 2.0,
  fallbackLineHeight: 12,
  matchThreshold: 0.5,
  patternConfidence: 0.7,
  duplicateIou: 0.8,
  weights: {
    idExact: 0.6,
    idPrefix: 0.2,
    samePage: 0.1,
    singleOfType: 0.1,
  },
  keywords: {},
  layoutLabels: {},
  logWarnings: true,
};
