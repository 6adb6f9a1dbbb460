/**
 * Resume analysis pipeline: sanitized text → resume core → prompt → model →
 * recovered (or fallback) AnalysisRecord.
 *
 * Input, transport and envelope failures propagate as AnalysisError
 * subclasses. A reply that cannot be parsed does not: it comes back as a
 * fallback result with `source: 'fallback'`.
 */

import { randomUUID } from 'node:crypto';
import type { AppConfig, GenerationOptions } from '../lib/config.js';
import { InputError } from '../lib/errors.js';
import { createAnalysisLogger, type Logger } from '../lib/logger.js';
import type { ModelClient } from '../lib/ollama-client.js';
import { buildPrompt } from './prompt-builder.js';
import { countWords, extractCore } from './resume-section-extractor.js';
import { recover } from './response-recovery.js';
import type { RecoveredAnalysis } from './types.js';

export interface AnalyzeOptions {
  /** Overrides the configured word ceiling for this call. */
  maxWords?: number;
  signal?: AbortSignal;
  analysisId?: string;
}

export interface ResumeAnalysis extends RecoveredAnalysis {
  analysisId: string;
  model: string;
  stats: {
    input_words: number;
    core_words: number;
  };
}

export interface ResumeAnalyzerDeps {
  config: Pick<AppConfig, 'extraction' | 'generation'>;
  client: ModelClient;
}

export class ResumeAnalyzer {
  private readonly extraction: AppConfig['extraction'];
  private readonly generation: GenerationOptions;
  private readonly client: ModelClient;

  constructor(deps: ResumeAnalyzerDeps) {
    this.extraction = deps.config.extraction;
    this.generation = deps.config.generation;
    this.client = deps.client;
  }

  async analyze(text: string, options: AnalyzeOptions = {}): Promise<ResumeAnalysis> {
    const analysisId = options.analysisId ?? randomUUID();
    const log: Logger = createAnalysisLogger(analysisId, { model: this.client.model });

    if (!text || !text.trim()) {
      log.error('No text provided for analysis');
      throw new InputError('No resume text provided for analysis.');
    }

    const maxWords = options.maxWords ?? this.extraction.maxWords;
    const core = extractCore(text, maxWords, this.extraction.stopPhrases);
    if (!core) {
      log.error('Resume core is empty after removing non-resume content');
      throw new InputError('No usable resume content found: the document starts with non-resume material.');
    }

    const stats = { input_words: countWords(text), core_words: countWords(core) };
    log.info({ ...stats, maxWords }, 'Starting resume analysis');

    const reply = await this.client.generate(buildPrompt(core), this.generation, options.signal);
    const recovered = recover(reply.text);

    if (recovered.source === 'fallback') {
      log.warn('Model reply could not be parsed; returning fallback analysis');
    } else {
      log.info({ strategy: recovered.strategy }, 'Resume analysis completed');
    }

    return { ...recovered, analysisId, model: this.client.model, stats };
  }
}
