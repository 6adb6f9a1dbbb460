import logger from './logger.js';

/**
 * Building blocks for pulling a JSON value out of LLM output that may carry
 * markdown fences, surrounding prose or small syntax mistakes. Every helper
 * reports failure through its return value; none of them throws.
 */

export type ParseOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; reason: string };

/** Inputs above this size skip the regex-heavy repairs (catastrophic backtracking). */
export const MAX_AGGRESSIVE_REPAIR_CHARS = 50_000;

const CODE_FENCE = /```(?:json5?|javascript|js)?/gi;

/** Removes every ``` fence marker, with or without a language tag. */
export function stripCodeFences(text: string): string {
  if (!text.includes('```')) return text;
  return text.replace(CODE_FENCE, '').trim();
}

export function tryParseJSON(text: string): ParseOutcome<unknown> {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (err) {
    return { ok: false, reason: err instanceof Error ? err.message : String(err) };
  }
}

/**
 * Index of the brace closing the object opened at `start`, or -1 when the
 * object never closes. Braces inside string literals are ignored.
 */
export function findMatchingBrace(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escape = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (escape) { escape = false; continue; }
    if (ch === '\\' && inString) { escape = true; continue; }
    if (ch === '"') { inString = !inString; continue; }
    if (inString) continue;

    if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/** The first complete top-level object in the text, matched by depth. */
export function extractBalancedObject(text: string): string | null {
  const start = text.indexOf('{');
  if (start < 0) return null;
  const end = findMatchingBrace(text, start);
  return end < 0 ? null : text.slice(start, end + 1);
}

/**
 * Everything from the first `{` to the last `}`. Tolerates prose after the
 * object, but a stray `}` later in the text widens the slice past it.
 */
export function extractOuterBraces(text: string): string | null {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  return start >= 0 && end > start ? text.slice(start, end + 1) : null;
}

/** Drops commas that directly precede `]` or `}`. Commas inside strings are kept. */
export function removeTrailingCommas(text: string): string {
  let out = '';
  let inString = false;
  let escape = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (escape) { escape = false; out += ch; continue; }
    if (ch === '\\' && inString) { escape = true; out += ch; continue; }
    if (ch === '"') { inString = !inString; out += ch; continue; }

    if (!inString && ch === ',') {
      let next = i + 1;
      while (next < text.length && /\s/.test(text.charAt(next))) next++;
      const closer = text.charAt(next);
      if (closer === ']' || closer === '}') continue;
    }
    out += ch;
  }
  return out;
}

function escapeRawControlCharsInValues(text: string): string {
  return text
    .replace(/(?<=:\s*"[^"]*)\n/g, '\\n')
    .replace(/(?<=:\s*"[^"]*)\t/g, '\\t');
}

function convertSingleQuotes(text: string): string {
  // Only quotes used as delimiters right after [ { , : and before , ] } :
  return text.replace(
    /(?<=[\[{,:])\s*'([^']*)'\s*(?=[,\]}:])/g,
    (_match, inner: string) => JSON.stringify(inner),
  );
}

function quoteBareKeys(text: string): string {
  return text.replace(/([{,]\s*)([A-Za-z_$][A-Za-z0-9_$]*)\s*:/g, '$1"$2":');
}

/**
 * Progressively repaired variants of `text`, lightest first: trailing commas,
 * then raw control characters and single-quoted strings, then bare keys.
 * Truncated objects are deliberately not closed.
 */
export function repairCandidates(text: string): string[] {
  const candidates: string[] = [];
  const push = (candidate: string) => {
    if (candidate !== text && !candidates.includes(candidate)) candidates.push(candidate);
  };

  const noTrailing = removeTrailingCommas(text);
  push(noTrailing);

  if (noTrailing.length > MAX_AGGRESSIVE_REPAIR_CHARS) {
    logger.warn({ size: noTrailing.length }, 'Skipping aggressive JSON repair on large input');
    return candidates;
  }

  const requoted = convertSingleQuotes(escapeRawControlCharsInValues(noTrailing));
  push(requoted);
  push(quoteBareKeys(requoted));

  return candidates;
}

/** Parses the first repaired variant of `text` that is valid JSON. */
export function parseWithRepairs(text: string): ParseOutcome<unknown> {
  const candidates = repairCandidates(text);
  if (candidates.length === 0) {
    return { ok: false, reason: 'no applicable repair' };
  }
  let lastReason = 'no applicable repair';
  for (const candidate of candidates) {
    const parsed = tryParseJSON(candidate);
    if (parsed.ok) return parsed;
    lastReason = parsed.reason;
  }
  return { ok: false, reason: lastReason };
}
