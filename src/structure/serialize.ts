// src/structure/serialize.ts
// LinkedDocument → the stable snake_case JSON shape consumers read.

import type {
  BoundingBox,
  CanonicalType,
  DataQualityWarning,
  FigureRecord,
  LinkedDocument,
  ReferenceMention,
  TextBlock,
} from './types';

export type SerializedBBox = { x: number; y: number; width: number; height: number };

export type SerializedReference = {
  text: string;
  bbox: SerializedBBox;
  page_idx: number;
  reference_type: CanonicalType | null;
  declared_id: string | null;
  matched_figure_id: string | null;
  match_score: number;
  confidence: number;
  not_matched: boolean;
};

export type SerializedFigure = {
  figure_id: string | null;
  id_source: FigureRecord['idSource'];
  type: CanonicalType;
  bbox: SerializedBBox;
  page_idx: number;
  title: string | null;
  member_element_ids: string[];
  confidence: number;
  grouping_method: FigureRecord['groupingMethod'];
  reference_count: number;
  sequence_in_page: number;
};

export type SerializedDocument = {
  metadata: Record<string, string | number>;
  pages: Array<{
    index: number;
    page_size: { width: number; height: number };
    blocks: Array<{ text: string; bbox: SerializedBBox; confidence: number }>;
    references: SerializedReference[];
  }>;
  figures: SerializedFigure[];
  mapping_statistics: {
    total_references: number;
    matched_references: number;
    match_rate: number;
    graph: { reference_nodes: number; figure_nodes: number; edges: number; average_degree: number };
  };
  type_statistics: Record<CanonicalType, { figures: number; references: number; matched: number; match_rate: number }>;
  processing_info: {
    total_layout_elements: number;
    skipped_elements: number;
    skipped_blocks: number;
    duplicate_blocks: number;
    grouped_figures: number;
  };
  warnings: Array<{ page_idx: number; source: DataQualityWarning['source']; index: number; reason: string; excerpt: string }>;
};

function bbox(b: BoundingBox): SerializedBBox {
  return { x: b.x, y: b.y, width: b.width, height: b.height };
}

function block(b: TextBlock): SerializedDocument['pages'][number]['blocks'][number] {
  return { text: b.text, bbox: bbox(b.bbox), confidence: b.confidence };
}

export function serializeReference(r: ReferenceMention): SerializedReference {
  return {
    text: r.text,
    bbox: bbox(r.bbox),
    page_idx: r.pageIdx,
    reference_type: r.referenceType,
    declared_id: r.declaredId,
    matched_figure_id: r.matchedFigureId,
    match_score: r.matchScore,
    confidence: r.confidence,
    not_matched: r.notMatched,
  };
}

export function serializeFigure(f: FigureRecord): SerializedFigure {
  return {
    figure_id: f.figureId,
    id_source: f.idSource,
    type: f.type,
    bbox: bbox(f.bbox),
    page_idx: f.pageIdx,
    title: f.title,
    member_element_ids: Array.from(f.memberElementIds).sort(),
    confidence: f.confidence,
    grouping_method: f.groupingMethod,
    reference_count: f.referenceCount,
    sequence_in_page: f.sequenceInPage,
  };
}

export function serializeDocument(doc: LinkedDocument): SerializedDocument {
  const m = doc.metadata;
  const metadata: Record<string, string | number> = {};
  if (m.title !== undefined) metadata.title = m.title;
  if (m.author !== undefined) metadata.author = m.author;
  if (m.subject !== undefined) metadata.subject = m.subject;
  if (m.creator !== undefined) metadata.creator = m.creator;
  if (m.producer !== undefined) metadata.producer = m.producer;
  if (m.creationDate !== undefined) metadata.creation_date = m.creationDate;
  if (m.modificationDate !== undefined) metadata.modification_date = m.modificationDate;
  metadata.pages = m.pages;

  const typeStat = (t: CanonicalType): SerializedDocument['type_statistics'][CanonicalType] => {
    const s = doc.typeStatistics[t];
    return { figures: s.figures, references: s.references, matched: s.matched, match_rate: s.matchRate };
  };

  const ms = doc.mappingStatistics;
  const pi = doc.processingInfo;
  return {
    metadata,
    pages: doc.pages.map((p) => ({
      index: p.index,
      page_size: { width: p.pageSize.width, height: p.pageSize.height },
      blocks: p.blocks.map(block),
      references: p.references.map(serializeReference),
    })),
    figures: doc.figures.map(serializeFigure),
    mapping_statistics: {
      total_references: ms.totalReferences,
      matched_references: ms.matchedReferences,
      match_rate: ms.matchRate,
      graph: {
        reference_nodes: ms.graph.referenceNodes,
        figure_nodes: ms.graph.figureNodes,
        edges: ms.graph.edges,
        average_degree: ms.graph.averageDegree,
      },
    },
    type_statistics: {
      figure: typeStat('figure'),
      table: typeStat('table'),
      equation: typeStat('equation'),
      algorithm: typeStat('algorithm'),
      example: typeStat('example'),
    },
    processing_info: {
      total_layout_elements: pi.totalLayoutElements,
      skipped_elements: pi.skippedElements,
      skipped_blocks: pi.skippedBlocks,
      duplicate_blocks: pi.duplicateBlocks,
      grouped_figures: pi.groupedFigures,
    },
    warnings: doc.warnings.map((w) => ({
      page_idx: w.pageIdx,
      source: w.source,
      index: w.index,
      reason: w.reason,
      excerpt: w.excerpt,
    })),
  };
}
