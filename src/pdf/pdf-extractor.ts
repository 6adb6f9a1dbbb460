import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { ExtractionError } from '../lib/errors.js';
import logger from '../lib/logger.js';

export interface LayoutTolerances {
  /** Horizontal gap (PDF units) above which two fragments on a line get a space between them. */
  xTolerance: number;
  /** Fragments whose baselines differ by at most this much share a line. */
  yTolerance: number;
}

export interface TextFragment {
  str: string;
  x: number;
  y: number;
  width: number;
}

type TextLine = {
  y: number;
  fragments: TextFragment[];
};

function finiteNumber(value: unknown): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

/** Narrows a pdf.js text-content item; marked-content entries yield null. */
export function toTextFragment(item: unknown): TextFragment | null {
  if (!item || typeof item !== 'object') return null;
  const record = item as Record<string, unknown>;
  if (typeof record.str !== 'string' || record.str.length === 0) return null;

  const transform = Array.isArray(record.transform) ? record.transform : [];
  return {
    str: record.str,
    x: finiteNumber(transform[4]),
    y: finiteNumber(transform[5]),
    width: finiteNumber(record.width),
  };
}

function groupLines(fragments: TextFragment[], yTolerance: number): TextLine[] {
  const sorted = [...fragments].sort((a, b) => b.y - a.y || a.x - b.x);
  const lines: TextLine[] = [];

  for (const fragment of sorted) {
    const current = lines[lines.length - 1];
    if (current && Math.abs(current.y - fragment.y) <= yTolerance) {
      current.fragments.push(fragment);
    } else {
      lines.push({ y: fragment.y, fragments: [fragment] });
    }
  }
  return lines;
}

function composeLine(line: TextLine, xTolerance: number): string {
  const ordered = [...line.fragments].sort((a, b) => a.x - b.x);
  let output = '';
  let previousEnd: number | null = null;

  for (const fragment of ordered) {
    if (previousEnd !== null) {
      const gap = fragment.x - previousEnd;
      const boundaryHasSpace = /\s$/.test(output) || /^\s/.test(fragment.str);
      if (gap > xTolerance && !boundaryHasSpace) output += ' ';
    }
    output += fragment.str;
    previousEnd = fragment.x + fragment.width;
  }
  return output;
}

/**
 * Rebuilds the reading-order text of one page from positioned fragments:
 * top to bottom, left to right, using the tolerances to decide line breaks
 * and word spacing.
 */
export function assemblePageText(items: readonly unknown[], tolerances: LayoutTolerances): string {
  const fragments = items
    .map(toTextFragment)
    .filter((fragment): fragment is TextFragment => fragment !== null);

  return groupLines(fragments, tolerances.yTolerance)
    .map((line) => composeLine(line, tolerances.xTolerance))
    .join('\n');
}

/**
 * Extracts one raw text string per page. Pages without text (scanned images)
 * come back as ''. A document pdf.js cannot open raises ExtractionError.
 */
export async function extractPdfPages(data: Uint8Array, tolerances: LayoutTolerances): Promise<string[]> {
  const task = getDocument({
    data,
    isEvalSupported: false,
    useSystemFonts: false,
    verbosity: 0,
  });

  try {
    const document = await task.promise;
    logger.debug({ pages: document.numPages }, 'Opened PDF document');

    const pages: string[] = [];
    for (let pageNumber = 1; pageNumber <= document.numPages; pageNumber++) {
      const page = await document.getPage(pageNumber);
      const content = await page.getTextContent();
      const text = assemblePageText(content.items, tolerances);
      logger.debug({ page: pageNumber, chars: text.length }, 'Extracted page text');
      pages.push(text);
      page.cleanup();
    }
    return pages;
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    logger.error({ err }, 'Failed to extract text from PDF');
    throw new ExtractionError(`Failed to read PDF: ${reason}`, { cause: err });
  } finally {
    await task.destroy();
  }
}
