/**
 * End-to-end scan of one resume PDF: file checks, security scan, text
 * extraction, sanitization, keyword statistics and the model analysis.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import type { AppConfig } from '../lib/config.js';
import { InputError } from '../lib/errors.js';
import logger from '../lib/logger.js';
import { withRetry } from '../lib/retry.js';
import { extractPdfPages } from '../pdf/pdf-extractor.js';
import {
  checkFileSize,
  checkSize,
  hasPdfSignature,
  isPdfFile,
  scanSuspiciousElements,
  flaggedElements,
  type SuspiciousElementCounts,
} from '../pdf/pdf-validation.js';
import { analyzeKeywords, type KeywordStats } from './keyword-analysis.js';
import type { AnalyzeOptions, ResumeAnalysis, ResumeAnalyzer } from './resume-analyzer.js';
import { sanitize } from './text-sanitizer.js';

export interface ResumeScanDeps {
  config: Pick<AppConfig, 'files' | 'extraction' | 'pdf' | 'retry'>;
  analyzer: Pick<ResumeAnalyzer, 'analyze'>;
}

export interface ResumeScanOptions extends AnalyzeOptions {
  /** Delay before the first retry; doubles on each further attempt. */
  retryBaseDelayMs?: number;
}

export interface ExtractedResume {
  fileName: string;
  sizeBytes: number;
  suspiciousElements: SuspiciousElementCounts;
  text: string;
  keywords: KeywordStats;
  /** True when the PDF holds no extractable text (scanned images). No analysis is run. */
  imageOnly: boolean;
}

export interface ResumeScanResult extends ExtractedResume {
  analysis: ResumeAnalysis | null;
}

/** Checks, scans and extracts an in-memory PDF without calling the model. */
export async function extractResumeBytes(
  bytes: Uint8Array,
  fileName: string,
  config: ResumeScanDeps['config'],
): Promise<ExtractedResume> {
  const size = checkSize(bytes.byteLength, config.files.maxFileBytes);
  if (!size.ok) throw new InputError(size.error);
  if (!hasPdfSignature(bytes)) {
    throw new InputError('Invalid file: not a PDF document.');
  }

  const suspiciousElements = scanSuspiciousElements(bytes);
  const found = flaggedElements(suspiciousElements);
  if (Object.keys(found).length > 0) {
    logger.warn({ fileName, found }, 'Suspicious elements detected');
  }

  // pdf.js takes ownership of the buffer it is given
  const pages = await extractPdfPages(new Uint8Array(bytes), config.pdf);
  const text = sanitize(pages, config.extraction);
  if (!text) {
    logger.warn({ fileName, pages: pages.length }, 'No text could be extracted; PDF may contain only images');
  }

  return {
    fileName,
    sizeBytes: bytes.byteLength,
    suspiciousElements,
    text,
    keywords: analyzeKeywords(text),
    imageOnly: !text,
  };
}

/** Checks, scans and extracts a PDF on disk without calling the model. */
export async function extractResumeFile(
  filePath: string,
  config: ResumeScanDeps['config'],
): Promise<ExtractedResume> {
  if (!(await isPdfFile(filePath, config.files.allowedExtensions))) {
    throw new InputError(`Invalid file: ${path.basename(filePath)} is not a PDF document.`);
  }

  const size = await checkFileSize(filePath, config.files.maxFileBytes);
  if (!size.ok) throw new InputError(size.error);

  const bytes = await readFile(filePath);
  logger.info({ filePath, bytes: bytes.byteLength }, 'Scanning resume');
  return extractResumeBytes(bytes, path.basename(filePath), config);
}

/** Runs the model analysis on extracted text, retrying transient failures. */
export async function analyzeExtractedResume(
  extracted: ExtractedResume,
  deps: ResumeScanDeps,
  options: ResumeScanOptions = {},
): Promise<ResumeScanResult> {
  if (extracted.imageOnly) return { ...extracted, analysis: null };

  const analysis = await withRetry(() => deps.analyzer.analyze(extracted.text, options), {
    maxAttempts: deps.config.retry.maxAttempts,
    baseDelay: options.retryBaseDelayMs,
    onRetry: (attempt, error) => {
      logger.warn({ fileName: extracted.fileName, attempt, error: error.message }, 'Retrying resume analysis');
    },
  });

  return { ...extracted, analysis };
}

/** Scans an in-memory PDF, e.g. an HTTP upload. */
export async function scanResumeBytes(
  bytes: Uint8Array,
  fileName: string,
  deps: ResumeScanDeps,
  options: ResumeScanOptions = {},
): Promise<ResumeScanResult> {
  return analyzeExtractedResume(await extractResumeBytes(bytes, fileName, deps.config), deps, options);
}

/** Scans a PDF on disk after the extension, signature and size checks. */
export async function scanResumeFile(
  filePath: string,
  deps: ResumeScanDeps,
  options: ResumeScanOptions = {},
): Promise<ResumeScanResult> {
  return analyzeExtractedResume(await extractResumeFile(filePath, deps.config), deps, options);
}
