// src/index.ts
// Library surface: link a document, serialise it, read a PDF text layer.

export { DEFAULT_SETTINGS } from './types';
export type { LinkerSettings, MatchWeights } from './types';
export { validateSettings } from './services/settings-validator';
export { loadSettingsFile } from './settings';

export * from './structure';
export * from './pdf';
