// src/settings.ts
// File-backed settings and input loading for the command line.

import { readFile } from 'node:fs/promises';

import { validateSettings } from './services/settings-validator';
import { SettingsFileError } from './structure/errors';
import type { LinkerSettings } from './types';

export async function readJsonFile(path: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (err) {
    throw new SettingsFileError(path, `Cannot read ${path}`, err);
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (err) {
    throw new SettingsFileError(path, `Invalid JSON in ${path}`, err);
  }
}

/**
 * Reads a JSON settings file. Unknown keys are ignored and out-of-range
 * values clamped; only an unreadable or unparsable file is an error.
 */
export async function loadSettingsFile(path: string): Promise<LinkerSettings> {
  return validateSettings(await readJsonFile(path));
}
