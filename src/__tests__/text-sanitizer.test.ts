import { describe, it, expect } from 'vitest';
import {
  coercePrintable,
  isSectionHeader,
  isTitleCaseLine,
  isUpperCaseLine,
  rejoinWrappedLines,
  removeJunkLines,
  repairHyphenBreaks,
  sanitize,
} from '../analysis/text-sanitizer.js';
import { DEFAULT_SECTION_HEADERS } from '../lib/config.js';

const HEADERS = new Set<string>(DEFAULT_SECTION_HEADERS);

const RAW_PAGES = [
  'Jane Doe\nbackend engineer with ten years of practice',
  'SKILLS\nTypeScript, Node and   SQL\n---\n12\nexperience\nled a team of five',
];

const CLEANED = [
  'Jane Doe',
  'backend engineer with ten years of practice',
  '',
  'SKILLS',
  'TypeScript, Node and SQL',
  '',
  'experience',
  'led a team of five',
].join('\n');

describe('coercePrintable', () => {
  it('normalizes CRLF and replaces non-printable characters with spaces', () => {
    expect(coercePrintable('a\r\nb\tcé')).toBe('a\nb c ');
  });
});

describe('repairHyphenBreaks', () => {
  it('joins words split across a line wrap', () => {
    expect(repairHyphenBreaks('develop-\nment')).toBe('development');
  });

  it('keeps hyphens that do not end a line', () => {
    expect(repairHyphenBreaks('data-driven\nteam')).toBe('data-driven\nteam');
  });
});

describe('rejoinWrappedLines', () => {
  it('joins a hyphenated line with the line that now follows it', () => {
    expect(rejoinWrappedLines(['led develop-', 'ment of tools', 'next'])).toEqual(['led development of tools', 'next']);
  });

  it('leaves a hyphen before a blank line or a non-word start alone', () => {
    expect(rejoinWrappedLines(['self-', '', 'taught'])).toEqual(['self-', '', 'taught']);
    expect(rejoinWrappedLines(['range 1-', '(approx)'])).toEqual(['range 1-', '(approx)']);
  });
});

describe('removeJunkLines', () => {
  it('drops symbol, digit and single-character lines but keeps blank ones', () => {
    expect(removeJunkLines(['a', 'ab', '•••', '2024', '', 'ok'], 1)).toEqual(['ab', '', 'ok']);
  });
});

describe('section header detection', () => {
  it('recognizes upper and title case lines', () => {
    expect(isUpperCaseLine('WORK EXPERIENCE')).toBe(true);
    expect(isUpperCaseLine('2024 - 2025')).toBe(false);
    expect(isTitleCaseLine('Work Experience')).toBe(true);
    expect(isTitleCaseLine('Work experience')).toBe(false);
  });

  it('applies the length and punctuation rules', () => {
    expect(isSectionHeader('Work Experience:', HEADERS, 60)).toBe(true);
    expect(isSectionHeader('Summary Of Qualifications.', HEADERS, 60)).toBe(false);
    expect(isSectionHeader('A'.repeat(60), HEADERS, 60)).toBe(false);
  });

  it('matches the configured vocabulary case-insensitively', () => {
    expect(isSectionHeader('professional summary', HEADERS, 60)).toBe(true);
    expect(isSectionHeader('employment history -', HEADERS, 60)).toBe(true);
    expect(isSectionHeader('hobbies and pets', HEADERS, 60)).toBe(false);
  });
});

describe('sanitize', () => {
  it('produces a clean, section-spaced document', () => {
    expect(sanitize(RAW_PAGES)).toBe(CLEANED);
  });

  it('is idempotent', () => {
    expect(sanitize([CLEANED])).toBe(CLEANED);
  });

  it('returns an empty string when every page is empty', () => {
    expect(sanitize([])).toBe('');
    expect(sanitize(['', ''])).toBe('');
  });

  it('never leaves more than one blank line in a row', () => {
    const result = sanitize(['a line here\n\n\n\n\nanother line here']);
    expect(result).toBe('a line here\n\nanother line here');
    expect(result).not.toContain('\n\n\n');
  });

  it('keeps only printable ASCII', () => {
    const result = sanitize(['Résumé — Jane\tDoe']);
    expect(result).toBe('R sum Jane Doe');
    expect(result).toMatch(/^[\x20-\x7E\n]*$/);
  });

  it('rejoins hyphenated line breaks', () => {
    expect(sanitize(['led develop-\nment of tools'])).toBe('led development of tools');
  });

  it('rejoins a break with trailing spaces after the hyphen', () => {
    expect(sanitize(['led develop- \nment of tools'])).toBe('led development of tools');
  });

  it('rejoins a break split by a rule line', () => {
    expect(sanitize(['led develop-\n--\nment of tools'])).toBe('led development of tools');
  });

  it.each([
    ['laid-out pages', RAW_PAGES],
    ['hyphen with trailing space', ['led develop- \nment of tools']],
    ['hyphen across a rule line', ['led develop-\n--\nment of tools']],
    ['hyphen before a blank line', ['self-\n\ntaught engineer']],
  ])('gives the same result when run twice (%s)', (_label, pages) => {
    const once = sanitize(pages);
    expect(sanitize([once])).toBe(once);
  });

  it('uses a custom header vocabulary', () => {
    const result = sanitize(['built tools\nside quests'], { sectionHeaders: ['side quests'] });
    expect(result).toBe('built tools\n\nside quests');
  });
});
