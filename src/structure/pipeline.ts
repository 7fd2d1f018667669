// src/structure/pipeline.ts
// Entry-point: collaborator output for one document → LinkedDocument.
//
// Page-local stages (sanitising, caption location, reference extraction) run
// per page with no shared state. Everything after the barrier is document-wide
// and sequential.

import { validateSettings } from '../services/settings-validator';
import type { LinkerSettings } from '../types';
import {
  assertUniqueFigureIds,
  assignFallbackIds,
  assignSequenceInPage,
  computeMappingStatistics,
  computeProcessingInfo,
  computeTypeStatistics,
} from './aggregate';
import { locateCaptionsOnPage } from './captions';
import { groupElements } from './grouping';
import { sanitisePage, type SpanScore } from './input';
import { mapReferences } from './mapper';
import { createScoreTableClassifier, extractReferences } from './references';
import type {
  DataQualityWarning,
  DocumentInput,
  DocumentMetadata,
  FigureRecord,
  LayoutElement,
  LinkedDocument,
  Page,
  ReferenceMention,
  ReferenceSpanClassifier,
  TextBlock,
} from './types';
import { buildVocabulary } from './vocabulary';

export type LinkOptions = {
  // Partial or untrusted settings; validated and clamped.
  settings?: unknown;
  // Overrides the table built from `span_scores` in the input.
  classifier?: ReferenceSpanClassifier;
};

function logWarnings(warnings: readonly DataQualityWarning[]): void {
  for (const w of warnings) {
    console.warn('[StructureLinker][input] skipped item', {
      page: w.pageIdx,
      source: w.source,
      index: w.index,
      reason: w.reason,
      excerpt: w.excerpt,
    });
  }
}

function buildMetadata(input: DocumentInput, pageCount: number): DocumentMetadata {
  const m = input.metadata ?? {};
  const out: DocumentMetadata = { pages: pageCount };
  if (typeof m.title === 'string') out.title = m.title;
  if (typeof m.author === 'string') out.author = m.author;
  if (typeof m.subject === 'string') out.subject = m.subject;
  if (typeof m.creator === 'string') out.creator = m.creator;
  if (typeof m.producer === 'string') out.producer = m.producer;
  if (typeof m.creationDate === 'string') out.creationDate = m.creationDate;
  if (typeof m.modificationDate === 'string') out.modificationDate = m.modificationDate;
  return out;
}

export function linkDocument(input: DocumentInput, opts: LinkOptions = {}): LinkedDocument {
  const settings: LinkerSettings = validateSettings(opts.settings ?? {});
  const vocab = buildVocabulary(settings);
  const rawPages = Array.isArray(input.pages) ? input.pages : [];

  // ---- page-local
  const takenIds = new Set<string>();
  const sanitised = rawPages.map((raw, position) =>
    sanitisePage(raw, position, vocab, { duplicateIou: settings.duplicateIou, takenIds })
  );
  const warnings = sanitised.flatMap((s) => s.warnings);
  if (settings.logWarnings && warnings.length) logWarnings(warnings);

  const spanScores: SpanScore[] = sanitised.flatMap((s) => s.spanScores);
  const classifier = opts.classifier ?? (spanScores.length ? createScoreTableClassifier(spanScores) : undefined);

  const perPage = sanitised.map(({ page }) => {
    const { records, captionBlocks } = locateCaptionsOnPage(page, settings, vocab);
    return {
      page,
      records,
      references: extractReferences(page, vocab, {
        patternConfidence: settings.patternConfidence,
        classifier,
        captionBlocks,
      }),
    };
  });

  // ---- barrier
  const elements: LayoutElement[] = perPage.flatMap((p) => p.page.elements);
  const blocksByPage = new Map<number, TextBlock[]>();
  for (const { page } of perPage) {
    blocksByPage.set(page.index, [...(blocksByPage.get(page.index) ?? []), ...page.blocks]);
  }

  const figures: FigureRecord[] = groupElements(
    perPage.flatMap((p) => p.records),
    { elements, blocksByPage, settings, vocab }
  );
  assignFallbackIds(figures);
  assignSequenceInPage(figures);
  assertUniqueFigureIds(figures);

  const references: ReferenceMention[] = perPage.flatMap((p) => p.references);
  const graph = mapReferences(references, figures, settings);

  const pages: Page[] = perPage.map(({ page, references: pageRefs }) => ({
    index: page.index,
    pageSize: page.pageSize,
    blocks: page.blocks,
    references: pageRefs,
  }));

  return {
    metadata: buildMetadata(input, pages.length),
    pages,
    figures,
    mappingStatistics: computeMappingStatistics(references, graph),
    typeStatistics: computeTypeStatistics(figures, references),
    processingInfo: computeProcessingInfo({
      totalLayoutElements: sanitised.reduce((n, s) => n + s.rawElementCount, 0),
      warnings,
      figures,
    }),
    warnings,
  };
}
