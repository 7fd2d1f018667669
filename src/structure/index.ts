// src/structure/index.ts
// Public entrypoints for the structure linker.

export type * from './types';
export { CANONICAL_TYPES } from './types';

export { linkDocument } from './pipeline';
export type { LinkOptions } from './pipeline';
export { serializeDocument, serializeFigure, serializeReference } from './serialize';
export type { SerializedDocument, SerializedFigure, SerializedReference } from './serialize';
export { StructureInvariantError, SettingsFileError } from './errors';
export { parseDocumentInput } from './input';

// Individual stages, for callers that run pages themselves.
export { locateCaption, locateCaptions, locateCaptionsOnPage, applyCaption } from './captions';
export { groupElements } from './grouping';
export { extractReferences, createScoreTableClassifier } from './references';
export { mapReferences, scoreEdge } from './mapper';
export { assignFallbackIds } from './aggregate';
export { buildVocabulary, normaliseId, DEFAULT_KEYWORDS, DEFAULT_LAYOUT_LABELS } from './vocabulary';
