// src/structure/errors.ts

import type { CanonicalType } from './types';

/** A `(type, figureId)` pair appeared on more than one record after grouping. */
export class StructureInvariantError extends Error {
  constructor(
    public duplicates: Array<{ type: CanonicalType; figureId: string }>,
    message = `Duplicate figure ids after grouping: ${duplicates.map((d) => `${d.type}:${d.figureId}`).join(', ')}`
  ) {
    super(message);
    this.name = 'StructureInvariantError';
  }
}

/** A settings or input file could not be read or parsed. */
export class SettingsFileError extends Error {
  constructor(
    public path: string,
    message: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'SettingsFileError';
  }
}
