/**
 * SettingsValidator - Validates and sanitizes linker settings
 *
 * PURPOSE
 * ───────
 * Ensures settings read from a settings file (or passed by a caller) are valid
 * and within acceptable ranges. Corrupted or partial settings never abort a run.
 *
 * KEY RESPONSIBILITIES
 * ────────────────────
 * - Validate numeric ranges (factors, threshold, weights)
 * - Keep only keyword / label overrides that name a known type
 * - Apply default values for missing properties
 * - Clamp out-of-range values instead of rejecting them
 *
 * USAGE
 * ─────
 * ```typescript
 * const settings = validateSettings(JSON.parse(raw));
 * const doc = linkDocument(input, { settings });
 * ```
 */

import { DEFAULT_SETTINGS, LinkerSettings, MatchWeights } from '../types';
import { CANONICAL_TYPES } from '../structure/types';
import type { CanonicalType, LayoutKind } from '../structure/types';

/**
 * Validation limits for numeric settings
 */
const LIMITS = {
  captionSearchFactor: { min: 0, max: 20 },
  proximityMergeFactor: { min: 0, max: 20 },
  fallbackLineHeight: { min: 1, max: 500 },
  matchThreshold: { min: 0, max: 1 },
  patternConfidence: { min: 0, max: 1 },
  duplicateIou: { min: 0.1, max: 1 },
  weight: { min: 0, max: 1 },
} as const;

const LAYOUT_KINDS: readonly LayoutKind[] = [
  'figure',
  'table',
  'equation',
  'algorithm',
  'caption',
  'equation_number',
  'title',
  'text',
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Clamps a number between min and max values
 */
function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Validates a number and clamps it to the specified range
 */
function validateNumber(
  value: unknown,
  defaultValue: number,
  min: number,
  max: number
): number {
  if (typeof value !== 'number' || isNaN(value)) {
    return defaultValue;
  }
  return clamp(value, min, max);
}

/**
 * Validates a boolean value
 */
function validateBoolean(value: unknown, defaultValue: boolean): boolean {
  if (typeof value === 'boolean') return value;
  return defaultValue;
}

function validateWeights(value: unknown): MatchWeights {
  const w = isRecord(value) ? value : {};
  const d = DEFAULT_SETTINGS.weights;
  const { min, max } = LIMITS.weight;
  return {
    idExact: validateNumber(w.idExact, d.idExact, min, max),
    idPrefix: validateNumber(w.idPrefix, d.idPrefix, min, max),
    samePage: validateNumber(w.samePage, d.samePage, min, max),
    singleOfType: validateNumber(w.singleOfType, d.singleOfType, min, max),
  };
}

/**
 * Keeps entries whose value is one of `allowed`; keys are lower-cased and trimmed.
 */
function validateTable<T extends string>(value: unknown, allowed: readonly T[]): Record<string, T> {
  const out: Record<string, T> = {};
  if (!isRecord(value)) return out;
  for (const [rawKey, rawVal] of Object.entries(value)) {
    const key = rawKey.trim().toLowerCase();
    if (!key) continue;
    const match = allowed.find((a) => a === rawVal);
    if (match) out[key] = match;
  }
  return out;
}

/**
 * Validates and sanitizes linker settings
 *
 * @param partial - Settings object from a settings file or a caller
 * @returns Fully valid LinkerSettings with defaults applied
 */
export function validateSettings(partial: unknown): LinkerSettings {
  // Handle null/undefined/non-objects by returning defaults
  if (!isRecord(partial)) {
    return { ...DEFAULT_SETTINGS, weights: { ...DEFAULT_SETTINGS.weights } };
  }

  return {
    captionSearchFactor: validateNumber(
      partial.captionSearchFactor,
      DEFAULT_SETTINGS.captionSearchFactor,
      LIMITS.captionSearchFactor.min,
      LIMITS.captionSearchFactor.max
    ),
    proximityMergeFactor: validateNumber(
      partial.proximityMergeFactor,
      DEFAULT_SETTINGS.proximityMergeFactor,
      LIMITS.proximityMergeFactor.min,
      LIMITS.proximityMergeFactor.max
    ),
    fallbackLineHeight: validateNumber(
      partial.fallbackLineHeight,
      DEFAULT_SETTINGS.fallbackLineHeight,
      LIMITS.fallbackLineHeight.min,
      LIMITS.fallbackLineHeight.max
    ),
    matchThreshold: validateNumber(
      partial.matchThreshold,
      DEFAULT_SETTINGS.matchThreshold,
      LIMITS.matchThreshold.min,
      LIMITS.matchThreshold.max
    ),
    patternConfidence: validateNumber(
      partial.patternConfidence,
      DEFAULT_SETTINGS.patternConfidence,
      LIMITS.patternConfidence.min,
      LIMITS.patternConfidence.max
    ),
    duplicateIou: validateNumber(
      partial.duplicateIou,
      DEFAULT_SETTINGS.duplicateIou,
      LIMITS.duplicateIou.min,
      LIMITS.duplicateIou.max
    ),
    weights: validateWeights(partial.weights),

    // Vocabulary overrides
    keywords: validateTable<CanonicalType>(partial.keywords, CANONICAL_TYPES),
    layoutLabels: validateTable<LayoutKind>(partial.layoutLabels, LAYOUT_KINDS),

    logWarnings: validateBoolean(partial.logWarnings, DEFAULT_SETTINGS.logWarnings),
  };
}
