import { z } from 'zod';

export const REQUIRED_ANALYSIS_KEYS = [
  'overall_impression',
  'strengths',
  'weaknesses',
  'key_skills',
  'recommendations',
] as const;

export type AnalysisKey = (typeof REQUIRED_ANALYSIS_KEYS)[number];

/** The key whose presence marks a parsed object as a usable, if partial, analysis. */
export const PRIMARY_ANALYSIS_KEY: AnalysisKey = 'overall_impression';

export const analysisRecordSchema = z.object({
  overall_impression: z.string(),
  strengths: z.array(z.string()),
  weaknesses: z.array(z.string()),
  key_skills: z.array(z.string()),
  recommendations: z.array(z.string()),
});

export type AnalysisRecord = z.infer<typeof analysisRecordSchema>;

export type RecoveryStrategyName = 'direct' | 'brace-matched' | 'first-last' | 'syntax-repair';

export type AnalysisSource = 'model' | 'fallback';

export interface RecoveredAnalysis {
  record: AnalysisRecord;
  source: AnalysisSource;
  /** Strategy that produced the record; null for fallback results. */
  strategy: RecoveryStrategyName | null;
}

function stringifyValue(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  try {
    return JSON.stringify(value) ?? null;
  } catch {
    return String(value);
  }
}

const listField = z
  .array(z.unknown())
  .catch([])
  .transform((items) =>
    items
      .map(stringifyValue)
      .filter((item): item is string => item !== null && item.length > 0),
  );

const summaryField = z.unknown().transform((value) => stringifyValue(value) ?? '');

const looseAnalysisSchema = z.object({
  overall_impression: summaryField,
  strengths: listField,
  weaknesses: listField,
  key_skills: listField,
  recommendations: listField,
});

/**
 * Coerces any parsed value into the canonical five-field record.
 * Absent or non-array list fields become [], list items and a non-string
 * summary are stringified, and unknown keys are dropped.
 */
export function coerceAnalysisRecord(value: unknown): AnalysisRecord {
  const source = isPlainObject(value) ? value : {};
  const parsed = looseAnalysisSchema.safeParse(source);
  if (parsed.success) return parsed.data;
  return {
    overall_impression: '',
    strengths: [],
    weaknesses: [],
    key_skills: [],
    recommendations: [],
  };
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function hasAllAnalysisKeys(value: Record<string, unknown>): boolean {
  return REQUIRED_ANALYSIS_KEYS.every((key) => Object.prototype.hasOwnProperty.call(value, key));
}

export function hasPrimaryAnalysisKey(value: Record<string, unknown>): boolean {
  return Object.prototype.hasOwnProperty.call(value, PRIMARY_ANALYSIS_KEY);
}
