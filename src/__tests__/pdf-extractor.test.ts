import { describe, it, expect, vi, beforeEach } from 'vitest';

const { getDocument } = vi.hoisted(() => ({ getDocument: vi.fn() }));
vi.mock('pdfjs-dist/legacy/build/pdf.mjs', () => ({ getDocument }));

import { assemblePageText, extractPdfPages, toTextFragment } from '../pdf/pdf-extractor.js';
import { ExtractionError } from '../lib/errors.js';

const TOLERANCES = { xTolerance: 2, yTolerance: 3 };

function item(str: string, x: number, y: number, width: number) {
  return { str, transform: [1, 0, 0, 1, x, y], width, height: 10, dir: 'ltr', hasEOL: false };
}

const PAGE_ITEMS = [
  item('Jane', 50, 700, 20),
  item('Doe', 75, 701, 15),
  { type: 'beginMarkedContent' },
  item('Engi', 50, 680, 20),
  item('neer', 70.5, 680, 20),
  item('', 100, 680, 0),
];

describe('toTextFragment', () => {
  it('narrows text items and skips everything else', () => {
    expect(toTextFragment(item('Jane', 50, 700, 20))).toEqual({ str: 'Jane', x: 50, y: 700, width: 20 });
    expect(toTextFragment({ str: 'x' })).toEqual({ str: 'x', x: 0, y: 0, width: 0 });
    expect(toTextFragment({ type: 'endMarkedContent' })).toBeNull();
    expect(toTextFragment(null)).toBeNull();
  });
});

describe('assemblePageText', () => {
  it('orders fragments top to bottom and left to right', () => {
    expect(assemblePageText(PAGE_ITEMS, TOLERANCES)).toBe('Jane Doe\nEngineer');
  });

  it('does not double a space already present at a boundary', () => {
    const items = [item('Jane', 50, 700, 20), item(' Smith', 80, 700, 30)];
    expect(assemblePageText(items, TOLERANCES)).toBe('Jane Smith');
  });

  it('respects the configured tolerances', () => {
    expect(assemblePageText(PAGE_ITEMS, { xTolerance: 10, yTolerance: 0 })).toBe('Doe\nJane\nEngineer');
  });

  it('returns an empty string for a page without text', () => {
    expect(assemblePageText([], TOLERANCES)).toBe('');
  });
});

describe('extractPdfPages', () => {
  beforeEach(() => {
    getDocument.mockReset();
  });

  it('returns one text per page, empty for image-only pages', async () => {
    const destroy = vi.fn(async () => undefined);
    const document = {
      numPages: 2,
      getPage: async (pageNumber: number) => ({
        getTextContent: async () => ({ items: pageNumber === 1 ? PAGE_ITEMS : [] }),
        cleanup: () => true,
      }),
    };
    getDocument.mockImplementation(() => ({ promise: Promise.resolve(document), destroy }));

    const pages = await extractPdfPages(new Uint8Array([1, 2, 3]), TOLERANCES);

    expect(pages).toEqual(['Jane Doe\nEngineer', '']);
    expect(destroy).toHaveBeenCalledTimes(1);
  });

  it('wraps unreadable documents in ExtractionError', async () => {
    const destroy = vi.fn(async () => undefined);
    getDocument.mockImplementation(() => ({ promise: Promise.reject(new Error('Invalid PDF structure.')), destroy }));

    const error = await extractPdfPages(new Uint8Array([1]), TOLERANCES).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ExtractionError);
    expect(error).toHaveProperty('message', 'Failed to read PDF: Invalid PDF structure.');
    expect(destroy).toHaveBeenCalledTimes(1);
  });
});
