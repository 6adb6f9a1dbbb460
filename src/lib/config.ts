import { z } from 'zod';
import { parsePositiveInt } from './http-body-guard.js';

export const DEFAULT_STOP_PHRASES = [
  'certificate of',
  'certificate of completion',
  'certificate of achievement',
  'certificate of participation',
  'this is to certify',
  'this certificate is awarded',
  'to whom it may concern',
  'letter of recommendation',
  'letter of reference',
  'reference letter',
  'recommendation letter',
  'dear hiring manager',
] as const;

export const DEFAULT_SECTION_HEADERS = [
  'summary',
  'professional summary',
  'profile',
  'objective',
  'career objective',
  'about me',
  'education',
  'experience',
  'work experience',
  'professional experience',
  'employment history',
  'skills',
  'technical skills',
  'core competencies',
  'certifications',
  'certificates',
  'licenses',
  'projects',
  'awards',
  'honors',
  'achievements',
  'publications',
  'languages',
  'interests',
  'volunteer experience',
  'activities',
  'references',
  'contact',
  'training',
  'courses',
] as const;

const generationSchema = z.object({
  temperature: z.number().min(0).max(2),
  topP: z.number().gt(0).max(1),
  maxOutputTokens: z.number().int().positive(),
  contextWindowSize: z.number().int().positive(),
  requestTimeoutSeconds: z.number().positive(),
});

export type GenerationOptions = z.infer<typeof generationSchema>;

const appConfigSchema = z.object({
  server: z.object({
    port: z.number().int().positive().max(65_535),
    maxUploadBytes: z.number().int().positive(),
    maxJsonBodyBytes: z.number().int().positive(),
  }),
  files: z.object({
    allowedExtensions: z.array(z.string().startsWith('.')).min(1),
    maxFileBytes: z.number().int().positive(),
  }),
  ollama: z.object({
    baseUrl: z.string().url(),
    model: z.string().min(1),
  }),
  generation: generationSchema,
  extraction: z.object({
    maxWords: z.number().int().positive(),
    stopPhrases: z.array(z.string().min(1)).transform((phrases) => phrases.map((p) => p.toLowerCase())),
    sectionHeaders: z.array(z.string().min(1)).transform((headers) => headers.map((h) => h.toLowerCase())),
    junkLineMaxLength: z.number().int().min(0),
    headerMaxLength: z.number().int().positive(),
  }),
  pdf: z.object({
    xTolerance: z.number().min(0),
    yTolerance: z.number().min(0),
  }),
  retry: z.object({
    maxAttempts: z.number().int().positive().max(10),
  }),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type AppConfigInput = z.input<typeof appConfigSchema>;

export type ExtractionConfig = AppConfig['extraction'];

type Env = Record<string, string | undefined>;

function parseNonNegativeFloat(raw: string | undefined, fallback: number): number {
  const parsed = Number.parseFloat(raw ?? '');
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

const TEN_MB = 10 * 1024 * 1024;

function defaultsFromEnv(env: Env): AppConfigInput {
  return {
    server: {
      port: parsePositiveInt(env.PORT, 3001),
      maxUploadBytes: parsePositiveInt(env.MAX_UPLOAD_BYTES, TEN_MB),
      maxJsonBodyBytes: parsePositiveInt(env.MAX_JSON_BODY_BYTES, 200_000),
    },
    files: {
      allowedExtensions: ['.pdf'],
      maxFileBytes: parsePositiveInt(env.MAX_FILE_BYTES, TEN_MB),
    },
    ollama: {
      baseUrl: (env.OLLAMA_BASE_URL ?? 'http://localhost:11434').replace(/\/$/, ''),
      model: env.OLLAMA_MODEL ?? 'llama3.1:8b',
    },
    generation: {
      // Low temperature keeps the JSON shape stable between runs
      temperature: parseNonNegativeFloat(env.AI_TEMPERATURE, 0.3),
      topP: parseNonNegativeFloat(env.AI_TOP_P, 0.9),
      maxOutputTokens: parsePositiveInt(env.AI_NUM_PREDICT, 1024),
      contextWindowSize: parsePositiveInt(env.AI_NUM_CTX, 4096),
      requestTimeoutSeconds: parseNonNegativeFloat(env.AI_TIMEOUT_SECONDS, 120),
    },
    extraction: {
      maxWords: parsePositiveInt(env.RESUME_MAX_WORDS, 1200),
      stopPhrases: [...DEFAULT_STOP_PHRASES],
      sectionHeaders: [...DEFAULT_SECTION_HEADERS],
      junkLineMaxLength: 1,
      headerMaxLength: 60,
    },
    pdf: {
      xTolerance: parseNonNegativeFloat(env.PDF_X_TOLERANCE, 2),
      yTolerance: parseNonNegativeFloat(env.PDF_Y_TOLERANCE, 3),
    },
    retry: {
      maxAttempts: parsePositiveInt(env.AI_MAX_ATTEMPTS, 1),
    },
  };
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

type Overrides = {
  [K in keyof AppConfigInput]?: Partial<AppConfigInput[K]>;
};

/**
 * Builds the immutable configuration every component receives.
 * Environment values fill the defaults; `overrides` win over both.
 */
export function loadConfig(env: Env = process.env, overrides: Overrides = {}): AppConfig {
  const base = defaultsFromEnv(env);
  const merged: AppConfigInput = {
    server: { ...base.server, ...overrides.server },
    files: { ...base.files, ...overrides.files },
    ollama: { ...base.ollama, ...overrides.ollama },
    generation: { ...base.generation, ...overrides.generation },
    extraction: { ...base.extraction, ...overrides.extraction },
    pdf: { ...base.pdf, ...overrides.pdf },
    retry: { ...base.retry, ...overrides.retry },
  };

  const parsed = appConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }
  return deepFreeze(parsed.data);
}
