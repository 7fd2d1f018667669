import { afterAll, afterEach, beforeAll, describe, expect, it, jest } from '@jest/globals';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { mergePdfTextLayer, parseCliArgs, runCli, USAGE } from './cli';
import { fakeDoc, fakePage, textItem } from './pdf/fixtures';
import type { PdfTextLayer } from './pdf/types';
import type { SerializedDocument } from './structure/serialize';

describe('parseCliArgs', () => {
  it('reads short, long and inline flags', () => {
    expect(parseCliArgs(['-i', 'in.json', '--pdf', 'doc.pdf', '--settings=s.json', '-o', 'out.json'])).toEqual({
      kind: 'run',
      input: 'in.json',
      pdf: 'doc.pdf',
      settings: 's.json',
      out: 'out.json',
    });
  });

  it('stops at the first unknown argument and honours help anywhere', () => {
    expect(parseCliArgs(['--bogus', '-h'])).toEqual({ kind: 'error', message: 'Unknown argument: --bogus' });
    expect(parseCliArgs(['-i', 'in.json', '--help'])).toEqual({ kind: 'help' });
  });

  it('rejects missing values and a missing input', () => {
    expect(parseCliArgs(['--input'])).toEqual({ kind: 'error', message: 'Missing value for --input' });
    expect(parseCliArgs(['-i', '-o', 'x'])).toEqual({ kind: 'error', message: 'Missing value for -i' });
    expect(parseCliArgs(['--out='])).toEqual({ kind: 'error', message: 'Missing value for --out' });
    expect(parseCliArgs(['-o', 'x'])).toEqual({ kind: 'error', message: 'Missing required --input' });
  });
});

describe('mergePdfTextLayer', () => {
  const layer: PdfTextLayer = {
    metadata: { pages: 4, title: 'From the PDF', author: 'A. Writer' },
    pages: [
      { pageIndex: 0, width: 600, height: 800, lines: [] },
      {
        pageIndex: 1,
        width: 600,
        height: 800,
        lines: [{ pageIndex: 1, text: 'Table 2', bbox: { x: 72, y: 90, width: 39, height: 10 }, fontSize: 10 }],
      },
      { pageIndex: 2, width: 600, height: 800, lines: [] },
      { pageIndex: 3, width: 0, height: 0, lines: [] },
    ],
  };

  it('fills sizes, missing pages and missing text, scaled to the layout size', () => {
    const ocr = { text: 'ocr text', bbox: [0, 0, 10, 10], confidence: 0.9 };
    const merged = mergePdfTextLayer(
      {
        metadata: { title: 'From the layout' },
        pages: [
          { index: 1, page_size: [1200, 1600] },
          { index: 0, blocks: [ocr] },
        ],
      },
      layer
    );

    expect(merged.metadata).toEqual({ title: 'From the layout', author: 'A. Writer' });
    expect(merged.pages).toEqual([
      { index: 0, blocks: [ocr], page_size: [600, 800] },
      {
        index: 1,
        page_size: [1200, 1600],
        blocks: [{ text: 'Table 2', bbox: { x: 144, y: 180, width: 78, height: 20 }, confidence: 1 }],
      },
      { index: 2, page_size: [600, 800], blocks: [] },
    ]);
  });

  it('orders pages without a declared index by their position', () => {
    const merged = mergePdfTextLayer({ pages: [{ index: 2 }, {}] }, { metadata: { pages: 0 }, pages: [] });
    expect(merged).toEqual({ metadata: {}, pages: [{ index: 1 }, { index: 2 }] });
  });
});

describe('runCli', () => {
  let dir = '';
  const layout = {
    metadata: { title: 'Layout title' },
    pages: [
      {
        index: 0,
        page_size: [600, 800],
        layout: [
          { type: 'figure', bbox: [100, 100, 400, 400], confidence: 0.9 },
          { type: 'caption', bbox: [95, 405, 200, 425], confidence: 0.8 },
        ],
      },
    ],
  };

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'structure-linker-'));
    await writeFile(join(dir, 'layout.json'), JSON.stringify(layout), 'utf8');
    await writeFile(join(dir, 'strict.json'), JSON.stringify({ matchThreshold: 0.9 }), 'utf8');
    await writeFile(join(dir, 'broken.json'), '{ "matchThreshold": ', 'utf8');
    await writeFile(join(dir, 'doc.pdf'), '%PDF-1.7 placeholder', 'utf8');
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  function deps() {
    const out: string[] = [];
    const pdf = fakeDoc(
      [fakePage([textItem('Figure 1: Overview', 100, 380, 90), textItem('As Fig. 1 shows', 100, 300, 75)])],
      { Title: 'PDF title' }
    );
    const loadPdf = jest.fn(async (_data: Uint8Array) => pdf);
    return { out, loadPdf, stdout: (text: string) => out.push(text) };
  }

  it('prints usage for --help', async () => {
    const d = deps();
    expect(await runCli(['--help'], d)).toBe(0);
    expect(d.out).toEqual([`${USAGE}\n`]);
  });

  it('exits with 2 on a usage error', async () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    expect(await runCli(['--nope'], deps())).toBe(2);
    expect(error).toHaveBeenCalledWith('[StructureLinker][cli] Unknown argument: --nope');
  });

  it('links a layout file with PDF text and prints JSON', async () => {
    const d = deps();
    const code = await runCli(['-i', join(dir, 'layout.json'), '-p', join(dir, 'doc.pdf')], d);

    expect(code).toBe(0);
    expect(d.loadPdf).toHaveBeenCalledTimes(1);
    const result: SerializedDocument = JSON.parse(d.out.join(''));
    expect(result.metadata).toEqual({ title: 'Layout title', pages: 1 });
    expect(result.figures).toHaveLength(1);
    expect(result.figures[0]).toMatchObject({ figure_id: '1', title: 'Figure 1: Overview', reference_count: 1 });
    expect(result.pages[0].references).toHaveLength(1);
    expect(result.pages[0].references[0]).toMatchObject({ text: 'Fig. 1', matched_figure_id: '1', match_score: 0.8 });
  });

  it('applies a settings file and writes to --out', async () => {
    const d = deps();
    const out = join(dir, 'result.json');
    const code = await runCli(['-i', join(dir, 'layout.json'), '-p', join(dir, 'doc.pdf'), '-s', join(dir, 'strict.json'), '-o', out], d);

    expect(code).toBe(0);
    expect(d.out).toEqual([]);
    const result: SerializedDocument = JSON.parse(await readFile(out, 'utf8'));
    expect(result.pages[0].references[0]).toMatchObject({ matched_figure_id: null, not_matched: true, match_score: 0.8 });
  });

  it('exits with 1 when a file cannot be read or parsed', async () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const missing = join(dir, 'missing.json');

    expect(await runCli(['-i', missing], deps())).toBe(1);
    expect(error).toHaveBeenLastCalledWith(`[StructureLinker][cli] Cannot read ${missing}`, expect.objectContaining({ path: missing }));

    const broken = join(dir, 'broken.json');
    expect(await runCli(['-i', join(dir, 'layout.json'), '-s', broken], deps())).toBe(1);
    expect(error).toHaveBeenLastCalledWith(`[StructureLinker][cli] Invalid JSON in ${broken}`, expect.objectContaining({ path: broken }));
  });
});
