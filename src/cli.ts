// src/cli.ts
// `structure-linker`: collaborator JSON (+ optional PDF) → linked document JSON.

import { readFile, writeFile } from 'node:fs/promises';

import { linesToTextBlocks } from './pdf/lines';
import { readPdfTextLayer } from './pdf/text-layer';
import type { PdfDocLike, PdfTextLayer } from './pdf/types';
import { loadSettingsFile, readJsonFile } from './settings';
import { SettingsFileError, StructureInvariantError } from './structure/errors';
import { pageIndexOf, parseDocumentInput, readPageSize } from './structure/input';
import { linkDocument } from './structure/pipeline';
import { serializeDocument } from './structure/serialize';
import type { DocumentInput, DocumentMetadata, RawPageInput } from './structure/types';

export const USAGE = `Usage: structure-linker --input <layout.json> [--pdf <file.pdf>] [--settings <settings.json>] [--out <result.json>]

  -i, --input      collaborator output (OCR blocks, layout elements, span scores)
  -p, --pdf        born-digital PDF; fills metadata and missing page text
  -s, --settings   linker settings JSON
  -o, --out        write the result here instead of stdout
  -h, --help       show this help`;

export type CliArgs =
  | { kind: 'run'; input: string; pdf?: string; settings?: string; out?: string }
  | { kind: 'help' }
  | { kind: 'error'; message: string };

const FLAGS: Record<string, 'input' | 'pdf' | 'settings' | 'out'> = {
  '-i': 'input',
  '--input': 'input',
  '-p': 'pdf',
  '--pdf': 'pdf',
  '-s': 'settings',
  '--settings': 'settings',
  '-o': 'out',
  '--out': 'out',
};

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const values: Partial<Record<'input' | 'pdf' | 'settings' | 'out', string>> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '-h' || arg === '--help') return { kind: 'help' };

    const eq = arg.indexOf('=');
    const flag = arg.startsWith('--') && eq > 0 ? arg.slice(0, eq) : arg;
    const key = FLAGS[flag];
    if (!key) return { kind: 'error', message: `Unknown argument: ${arg}` };

    const value = flag !== arg ? arg.slice(eq + 1) : argv[++i];
    if (value === undefined || value === '' || (flag === arg && value.startsWith('-'))) {
      return { kind: 'error', message: `Missing value for ${flag}` };
    }
    values[key] = value;
  }

  if (!values.input) return { kind: 'error', message: 'Missing required --input' };
  return { kind: 'run', ...values, input: values.input };
}

/**
 * Fills what the collaborator file lacks from the PDF text layer: metadata
 * fields it does not set, page sizes, and text blocks for pages that have
 * none. PDF geometry is scaled to the page size the layout was detected at.
 */
export function mergePdfTextLayer(input: DocumentInput, layer: PdfTextLayer): DocumentInput {
  const pages: RawPageInput[] = input.pages.map((p, position) => ({ ...p, index: pageIndexOf(p, position) }));
  const byIndex = new Map<number, RawPageInput>();
  pages.forEach((p, position) => byIndex.set(pageIndexOf(p, position), p));

  for (const pdfPage of layer.pages) {
    if (!(pdfPage.width > 0 && pdfPage.height > 0)) continue;
    let page = byIndex.get(pdfPage.pageIndex);
    if (!page) {
      page = { index: pdfPage.pageIndex };
      pages.push(page);
      byIndex.set(pdfPage.pageIndex, page);
    }

    const declared = readPageSize(page.page_size);
    if (!declared) page.page_size = [pdfPage.width, pdfPage.height];
    const size = declared ?? { width: pdfPage.width, height: pdfPage.height };

    if (Array.isArray(page.blocks) && page.blocks.length) continue;
    const scale = { x: size.width / pdfPage.width, y: size.height / pdfPage.height };
    page.blocks = linesToTextBlocks(pdfPage.lines, scale).map((b) => ({
      text: b.text,
      bbox: { ...b.bbox },
      confidence: b.confidence,
    }));
  }

  pages.sort((a, b) => pageIndexOf(a, 0) - pageIndexOf(b, 0));
  const pdfMeta: Partial<DocumentMetadata> = { ...layer.metadata };
  delete pdfMeta.pages;
  return { metadata: { ...pdfMeta, ...input.metadata }, pages };
}

export type CliDeps = {
  loadPdf: (data: Uint8Array) => Promise<PdfDocLike>;
  stdout: (text: string) => void;
};

export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  const args = parseCliArgs(argv);
  if (args.kind === 'help') {
    deps.stdout(`${USAGE}\n`);
    return 0;
  }
  if (args.kind === 'error') {
    console.error(`[StructureLinker][cli] ${args.message}`);
    console.error(USAGE);
    return 2;
  }

  try {
    const settings = args.settings ? await loadSettingsFile(args.settings) : undefined;
    let input = parseDocumentInput(await readJsonFile(args.input));

    if (args.pdf) {
      let bytes: Uint8Array;
      try {
        bytes = new Uint8Array(await readFile(args.pdf));
      } catch (err) {
        throw new SettingsFileError(args.pdf, `Cannot read ${args.pdf}`, err);
      }
      input = mergePdfTextLayer(input, await readPdfTextLayer(await deps.loadPdf(bytes)));
    }

    const doc = linkDocument(input, { settings });
    const json = `${JSON.stringify(serializeDocument(doc), null, 2)}\n`;
    if (args.out) await writeFile(args.out, json, 'utf8');
    else deps.stdout(json);
    return 0;
  } catch (err) {
    if (err instanceof StructureInvariantError) {
      console.error('[StructureLinker][cli] structure invariant violated', { duplicates: err.duplicates });
      return 1;
    }
    if (err instanceof SettingsFileError) {
      console.error(`[StructureLinker][cli] ${err.message}`, { path: err.path, details: err.details });
      return 1;
    }
    throw err;
  }
}
