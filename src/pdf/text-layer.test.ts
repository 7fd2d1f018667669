import { describe, expect, it } from '@jest/globals';

import { fakeDoc, fakePage, textItem } from './fixtures';
import { readPdfTextLayer } from './text-layer';

describe('readPdfTextLayer', () => {
  it('returns metadata and one line list per page', async () => {
    const doc = fakeDoc(
      [
        fakePage([textItem('Figure', 72, 700, 30), textItem('1', 106, 700, 5), textItem('See Fig. 1.', 72, 600, 55)]),
        fakePage([], { width: 300, height: 400 }),
      ],
      { Title: 'Two pages' }
    );

    const layer = await readPdfTextLayer(doc);

    expect(layer.metadata).toEqual({ pages: 2, title: 'Two pages' });
    expect(layer.pages.map((p) => [p.pageIndex, p.width, p.height])).toEqual([
      [0, 600, 800],
      [1, 300, 400],
    ]);
    expect(layer.pages[0].lines.map((l) => l.text)).toEqual(['Figure 1', 'See Fig. 1.']);
    expect(layer.pages[0].lines[1].bbox).toEqual({ x: 72, y: 190, width: 55, height: 10 });
    expect(layer.pages[1].lines).toEqual([]);
  });
});
