/**
 * Text sanitizer for layout-derived PDF text.
 *
 * Turns the per-page strings produced by the PDF extractor into one clean,
 * section-aware document. The passes run in a fixed order; each one relies on
 * the guarantees of the passes before it (for example, header detection
 * expects lines that are already trimmed and free of junk).
 */

import { DEFAULT_SECTION_HEADERS } from '../lib/config.js';

export interface SanitizeOptions {
  /** Lower-cased section names that always count as headers. */
  sectionHeaders?: readonly string[];
  /** Non-empty lines this long or shorter are dropped as page-number/rule artifacts. */
  junkLineMaxLength?: number;
  /** Header candidates must be strictly shorter than this. */
  headerMaxLength?: number;
}

const NON_PRINTABLE = /[^\x20-\x7E\n]/g;
const HYPHEN_BREAK = /(\w)-[ \t]*\n[ \t]*(\w)/g;
const WRAPPED_LINE_END = /\w-$/;
const WRAPPED_LINE_START = /^\w/;
const JUNK_LINE = /^[\W\d\s]+$/;
const SENTENCE_END = /[.,;]$/;
const TRAILING_HEADER_PUNCTUATION = /[\s:-]+$/;

/** Pass 1: printable-ASCII coercion. */
export function coercePrintable(text: string): string {
  return text.replace(/\r\n?/g, '\n').replace(NON_PRINTABLE, ' ');
}

/** Pass 2: rejoin words split across a line wrap ("develop-\nment"). */
export function repairHyphenBreaks(text: string): string {
  return text.replace(HYPHEN_BREAK, '$1$2');
}

/** Pass 3: collapse spaces/tabs per line. Blank lines stay as ''. */
export function collapseHorizontalWhitespace(lines: readonly string[]): string[] {
  return lines.map((line) => line.replace(/[ \t]+/g, ' ').trim());
}

/** Pass 4: drop symbol/digit-only lines and very short lines; keep empty lines. */
export function removeJunkLines(lines: readonly string[], junkLineMaxLength: number): string[] {
  const kept: string[] = [];
  for (const line of lines) {
    if (line === '') {
      kept.push('');
      continue;
    }
    if (JUNK_LINE.test(line)) continue;
    if (line.length <= junkLineMaxLength) continue;
    kept.push(line);
  }
  return kept;
}

/**
 * Pass 4b: rejoin a wrapped word whose halves were separated by a junk line
 * ("develop-", "--", "ment") once that line is gone.
 */
export function rejoinWrappedLines(lines: readonly string[]): string[] {
  const joined: string[] = [];
  for (const line of lines) {
    const previous = joined[joined.length - 1];
    if (previous !== undefined && WRAPPED_LINE_END.test(previous) && WRAPPED_LINE_START.test(line)) {
      joined[joined.length - 1] = previous.slice(0, -1) + line;
      continue;
    }
    joined.push(line);
  }
  return joined;
}

function hasCasedCharacter(line: string): boolean {
  return /[A-Za-z]/.test(line);
}

export function isUpperCaseLine(line: string): boolean {
  return hasCasedCharacter(line) && !/[a-z]/.test(line);
}

/**
 * Title case: every run of letters starts with an upper-case letter and
 * continues in lower case ("Work Experience", "O'Neil Consulting").
 */
export function isTitleCaseLine(line: string): boolean {
  const words = line.match(/[A-Za-z]+/g);
  if (!words) return false;
  return words.every((word) => /^[A-Z][a-z]*$/.test(word));
}

export function isSectionHeader(
  line: string,
  sectionHeaders: ReadonlySet<string>,
  headerMaxLength: number,
): boolean {
  if (line === '' || line.length >= headerMaxLength) return false;
  if (SENTENCE_END.test(line)) return false;

  const lower = line.toLowerCase().trim();
  const stripped = lower.replace(TRAILING_HEADER_PUNCTUATION, '');
  return (
    isUpperCaseLine(line)
    || isTitleCaseLine(line)
    || sectionHeaders.has(stripped)
    || sectionHeaders.has(lower)
  );
}

/** Pass 5: one blank line before every header that follows a non-blank line. */
export function spaceSectionHeaders(
  lines: readonly string[],
  sectionHeaders: ReadonlySet<string>,
  headerMaxLength: number,
): string[] {
  const spaced: string[] = [];
  for (const line of lines) {
    const previous = spaced[spaced.length - 1];
    if (previous !== undefined && previous !== '' && isSectionHeader(line, sectionHeaders, headerMaxLength)) {
      spaced.push('');
    }
    spaced.push(line);
  }
  return spaced;
}

/** Pass 6: flatten runs of blank lines to at most one. */
export function collapseBlankLines(lines: readonly string[]): string[] {
  const collapsed: string[] = [];
  for (const line of lines) {
    if (line === '' && collapsed[collapsed.length - 1] === '') continue;
    collapsed.push(line);
  }
  return collapsed;
}

/**
 * Runs every cleaning pass over the raw page texts and returns the
 * normalized document. Never throws; empty input yields ''.
 */
export function sanitize(rawPages: readonly string[], options: SanitizeOptions = {}): string {
  const sectionHeaders = new Set(
    (options.sectionHeaders ?? DEFAULT_SECTION_HEADERS).map((header) => header.toLowerCase()),
  );
  const junkLineMaxLength = options.junkLineMaxLength ?? 1;
  const headerMaxLength = options.headerMaxLength ?? 60;

  const pages = rawPages.filter((page) => page.length > 0);
  if (pages.length === 0) return '';

  let text = coercePrintable(pages.join('\n'));
  text = repairHyphenBreaks(text);

  let lines = collapseHorizontalWhitespace(text.split('\n'));
  lines = removeJunkLines(lines, junkLineMaxLength);
  lines = rejoinWrappedLines(lines);
  lines = spaceSectionHeaders(lines, sectionHeaders, headerMaxLength);
  lines = collapseBlankLines(lines);

  return lines.join('\n').trim();
}
