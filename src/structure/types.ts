// src/structure/types.ts
// Data model for the structure linker: collaborator inputs, figure records,
// reference mentions and the linked document.
// Page coordinates throughout: origin top-left, page units (usually pixels).

export type BoundingBox = {
  x: number;
  y: number;
  width: number;
  height: number;
};

export type CanonicalType = 'figure' | 'table' | 'equation' | 'algorithm' | 'example';

export const CANONICAL_TYPES: readonly CanonicalType[] = ['figure', 'table', 'equation', 'algorithm', 'example'];

// Normalised role of a layout detection. Figure-like kinds share their name
// with the canonical type they map to.
export type LayoutKind =
  | 'figure'
  | 'table'
  | 'equation'
  | 'algorithm'
  | 'caption'
  | 'equation_number'
  | 'title'
  | 'text';

export type FigureLikeKind = Extract<LayoutKind, 'figure' | 'table' | 'equation' | 'algorithm'>;

export type TextBlock = {
  readonly text: string;
  readonly bbox: BoundingBox;
  readonly confidence: number;
  readonly pageIdx: number;
};

export type LayoutElement = {
  readonly id: string;
  // Detector label as received (open vocabulary).
  readonly type: string;
  readonly kind: LayoutKind;
  readonly bbox: BoundingBox;
  readonly pageIdx: number;
  readonly rawText?: string;
  readonly confidence: number;
};

export type GroupingMethod = 'single' | 'identifier' | 'pattern' | 'proximity' | 'multi_strategy';

export type FigureIdSource = 'caption' | 'fallback';

export type FigureRecord = {
  figureId: string | null;
  idSource: FigureIdSource | null;
  type: CanonicalType;
  bbox: BoundingBox;
  pageIdx: number;
  title: string | null;
  memberElementIds: Set<string>;
  confidence: number;
  groupingMethod: GroupingMethod;
  // Strategies that merged something into this record (drives groupingMethod).
  strategies: Set<Exclude<GroupingMethod, 'single' | 'multi_strategy'>>;
  referenceCount: number;
  sequenceInPage: number;
};

export type ReferenceMention = {
  text: string;
  bbox: BoundingBox;
  pageIdx: number;
  referenceType: CanonicalType | null;
  declaredId: string | null;
  matchedFigureId: string | null;
  matchScore: number;
  confidence: number;
  notMatched: boolean;
};

export type PageSize = { width: number; height: number };

export type Page = {
  index: number;
  pageSize: PageSize;
  blocks: TextBlock[];
  references: ReferenceMention[];
};

export type DocumentMetadata = {
  title?: string;
  author?: string;
  subject?: string;
  creator?: string;
  producer?: string;
  creationDate?: string;
  modificationDate?: string;
  pages: number;
};

export type MappingStatistics = {
  totalReferences: number;
  matchedReferences: number;
  matchRate: number;
  graph: {
    referenceNodes: number;
    figureNodes: number;
    edges: number;
    averageDegree: number;
  };
};

export type TypeStatistics = Record<
  CanonicalType,
  { figures: number; references: number; matched: number; matchRate: number }
>;

export type ProcessingInfo = {
  totalLayoutElements: number;
  skippedElements: number;
  skippedBlocks: number;
  duplicateBlocks: number;
  groupedFigures: number;
};

export type DataQualityReason =
  | 'MISSING_GEOMETRY'
  | 'NEGATIVE_SIZE'
  | 'MISSING_TEXT'
  | 'DUPLICATE_BLOCK'
  // Element kept under a suffixed id; another element already had its id.
  | 'DUPLICATE_ELEMENT_ID';

// One skipped or collapsed input item (kept for auditing, never fatal).
export type DataQualityWarning = {
  pageIdx: number;
  source: 'text_block' | 'layout_element';
  index: number;
  reason: DataQualityReason;
  excerpt: string;
};

export type LinkedDocument = {
  metadata: DocumentMetadata;
  pages: Page[];
  figures: FigureRecord[];
  mappingStatistics: MappingStatistics;
  typeStatistics: TypeStatistics;
  processingInfo: ProcessingInfo;
  warnings: DataQualityWarning[];
};

// ---- Collaborator input (pre-sanitising). Everything is unknown until checked.

// Wire shape written by the OCR / layout collaborators (snake_case keys).
export type RawPageInput = {
  index?: unknown;
  page_size?: unknown;
  blocks?: unknown;
  layout?: unknown;
  span_scores?: unknown;
};

export type PageInput = {
  index: number;
  pageSize: PageSize;
  blocks: TextBlock[];
  elements: LayoutElement[];
};

export type DocumentInput = {
  metadata?: Partial<DocumentMetadata>;
  pages: RawPageInput[];
};

// A candidate span the reference extractor asks the optional classifier about.
export type ReferenceSpan = {
  pageIdx: number;
  blockIndex: number;
  start: number;
  end: number;
  text: string;
};

// Returns P(span is a reference) in [0,1], or undefined when it has no opinion.
export type ReferenceSpanClassifier = (span: ReferenceSpan) => number | undefined;
