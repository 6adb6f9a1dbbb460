/**
 * Response recovery: turns whatever the model replied into an AnalysisRecord.
 *
 * Strategies run from strict to permissive, so the first accepted value is the
 * most trustworthy one on offer:
 *
 *   direct         the whole (fence-stripped) reply is the JSON object
 *   brace-matched  first `{` to its depth-matched `}`
 *   first-last     first `{` to last `}`; does not track strings or depth,
 *                  so a stray `}` in trailing prose widens the slice past
 *                  the object
 *   syntax-repair  trailing commas, single quotes, bare keys
 *
 * A value is accepted when it carries all five analysis keys. If none does,
 * the first parsed object that has at least `overall_impression` is coerced
 * and used; failing that, the fallback synthesizer runs on the original reply.
 * `recover` never throws.
 */

import logger from '../lib/logger.js';
import {
  extractBalancedObject,
  extractOuterBraces,
  parseWithRepairs,
  stripCodeFences,
  tryParseJSON,
  type ParseOutcome,
} from '../lib/json-repair.js';
import { synthesize } from './fallback-analysis.js';
import {
  coerceAnalysisRecord,
  hasAllAnalysisKeys,
  hasPrimaryAnalysisKey,
  isPlainObject,
  type RecoveredAnalysis,
  type RecoveryStrategyName,
} from './types.js';

export interface RecoveryStrategy {
  readonly name: RecoveryStrategyName;
  parse(text: string): ParseOutcome<Record<string, unknown>>;
}

function asObject(outcome: ParseOutcome<unknown>): ParseOutcome<Record<string, unknown>> {
  if (!outcome.ok) return outcome;
  if (!isPlainObject(outcome.value)) return { ok: false, reason: 'parsed value is not an object' };
  return { ok: true, value: outcome.value };
}

function parseSlice(slice: string | null, missing: string): ParseOutcome<Record<string, unknown>> {
  if (slice === null) return { ok: false, reason: missing };
  return asObject(tryParseJSON(slice));
}

export const RECOVERY_STRATEGIES: readonly RecoveryStrategy[] = [
  {
    name: 'direct',
    parse: (text) => asObject(tryParseJSON(text.trim())),
  },
  {
    name: 'brace-matched',
    parse: (text) => parseSlice(extractBalancedObject(text), 'no balanced object'),
  },
  {
    name: 'first-last',
    parse: (text) => parseSlice(extractOuterBraces(text), 'no brace pair'),
  },
  {
    name: 'syntax-repair',
    parse: (text) => {
      const candidate = extractBalancedObject(text) ?? extractOuterBraces(text) ?? text.trim();
      return asObject(parseWithRepairs(candidate));
    },
  },
];

export function recover(
  rawResponseText: string,
  strategies: readonly RecoveryStrategy[] = RECOVERY_STRATEGIES,
): RecoveredAnalysis {
  const text = stripCodeFences(rawResponseText);
  let partial: { value: Record<string, unknown>; strategy: RecoveryStrategyName } | null = null;

  for (const strategy of strategies) {
    const outcome = strategy.parse(text);
    if (!outcome.ok) {
      logger.debug({ strategy: strategy.name, reason: outcome.reason }, 'Recovery strategy failed');
      continue;
    }

    if (hasAllAnalysisKeys(outcome.value)) {
      logger.info({ strategy: strategy.name }, 'Recovered analysis from model response');
      return {
        record: coerceAnalysisRecord(outcome.value),
        source: 'model',
        strategy: strategy.name,
      };
    }

    if (!partial && hasPrimaryAnalysisKey(outcome.value)) {
      partial = { value: outcome.value, strategy: strategy.name };
    }
    logger.debug({ strategy: strategy.name }, 'Parsed object is missing required analysis keys');
  }

  if (partial) {
    logger.warn({ strategy: partial.strategy }, 'Model response incomplete; missing fields coerced to empty');
    return {
      record: coerceAnalysisRecord(partial.value),
      source: 'model',
      strategy: partial.strategy,
    };
  }

  logger.warn({ rawSnippet: rawResponseText.slice(0, 300) }, 'Failed to recover model response; using fallback analysis');
  return { record: synthesize(rawResponseText), source: 'fallback', strategy: null };
}
