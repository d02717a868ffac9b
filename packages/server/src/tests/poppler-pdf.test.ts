import { describe, it, expect } from 'vitest';
import { parsePdfInfo } from '../pdf/poppler-pdf.js';

describe('parsePdfInfo', () => {
  it('reads per-page sizes and swaps rotated pages', () => {
    const output = [
      'Producer:       test suite',
      'Pages:          3',
      'Page    1 size: 612 x 792 pts (letter)',
      'Page    1 rot:  0',
      'Page    2 size: 612 x 792 pts (letter)',
      'Page    2 rot:  90',
      'Page    3 size: 595.28 x 841.89 pts (A4)',
      'Page    3 rot:  180',
    ].join('\n');

    expect(parsePdfInfo(output)).toEqual({
      pageCount: 3,
      pageSizes: [
        { width: 612, height: 792 },
        { width: 792, height: 612 },
        { width: 595.28, height: 841.89 },
      ],
    });
  });

  it('falls back to the shared page size', () => {
    const output = 'Pages:          2\nPage size:      960 x 540 pts\n';
    expect(parsePdfInfo(output).pageSizes).toEqual([
      { width: 960, height: 540 },
      { width: 960, height: 540 },
    ]);
  });

  it('reports zero pages when pdfinfo gives no count', () => {
    expect(parsePdfInfo('Producer: nothing here')).toEqual({ pageCount: 0, pageSizes: [] });
  });

  it('throws when a page has no size', () => {
    expect(() => parsePdfInfo('Pages: 1\n')).toThrow('pdfinfo reported no size for page 1');
  });
});
