import { Hono, type Context } from 'hono';
import { z } from 'zod';
import type { AppConfig } from '../lib/config.js';
import { AnalysisError } from '../lib/errors.js';
import { parseJsonBodyWithLimit, rejectOversizedBody } from '../lib/http-body-guard.js';
import logger from '../lib/logger.js';
import { withRetry } from '../lib/retry.js';
import { describeIssues, validateBody } from '../lib/validate.js';
import type { ResumeAnalysis, ResumeAnalyzer } from '../analysis/resume-analyzer.js';
import { scanResumeBytes } from '../analysis/resume-scan.js';
import { sanitize } from '../analysis/text-sanitizer.js';

const analyzeTextSchema = z.object({
  text: z.string().max(500_000),
  max_words: z.number().int().positive().max(20_000).optional(),
});

export interface AnalyzeRouteDeps {
  config: Pick<AppConfig, 'server' | 'files' | 'extraction' | 'pdf' | 'retry'>;
  analyzer: Pick<ResumeAnalyzer, 'analyze'>;
  /** Delay before the first retry of a transient model failure. */
  retryBaseDelayMs?: number;
}

type ErrorStatus = 400 | 413 | 415 | 422 | 500 | 502 | 503;

export function statusForError(err: AnalysisError): ErrorStatus {
  switch (err.code) {
    case 'INPUT_ERROR':
      return 400;
    case 'EXTRACTION_ERROR':
      return 422;
    case 'SERVICE_UNAVAILABLE':
      return 503;
    case 'PROTOCOL_ERROR':
    case 'EMPTY_RESPONSE':
      return 502;
  }
}

function errorResponse(c: Context, err: unknown): Response {
  const requestId = c.get('requestId');
  if (err instanceof AnalysisError) {
    const status = statusForError(err);
    logger.warn({ requestId, code: err.code, status, error: err.message }, 'Analysis request failed');
    return c.json({ error: err.message, code: err.code, request_id: requestId }, status);
  }
  logger.error({ err, requestId }, 'Unexpected analysis failure');
  return c.json({ error: 'Internal server error', request_id: requestId }, 500);
}

export function serializeAnalysis(analysis: ResumeAnalysis) {
  return {
    analysis_id: analysis.analysisId,
    model: analysis.model,
    source: analysis.source,
    strategy: analysis.strategy,
    result: analysis.record,
    stats: analysis.stats,
  };
}

export function createAnalyzeRoutes(deps: AnalyzeRouteDeps): Hono {
  const { config, analyzer } = deps;
  const routes = new Hono();

  const retryOptions = {
    maxAttempts: config.retry.maxAttempts,
    baseDelay: deps.retryBaseDelayMs,
    onRetry: (attempt: number, error: Error) => {
      logger.warn({ attempt, error: error.message }, 'Retrying resume analysis');
    },
  };

  // POST /analyze/text — Analyze already-extracted resume text
  routes.post('/text', async (c) => {
    const parsedBody = await parseJsonBodyWithLimit(c, config.server.maxJsonBodyBytes);
    if (!parsedBody.ok) return parsedBody.response;

    const validated = validateBody(analyzeTextSchema, parsedBody.data);
    if (!validated.success) {
      return c.json({ error: `Invalid request: ${describeIssues(validated.issues)}`, code: 'INPUT_ERROR' }, 400);
    }

    const { max_words: maxWords } = validated.data;
    const text = sanitize([validated.data.text], config.extraction);
    try {
      const analysis = await withRetry(
        () => analyzer.analyze(text, { maxWords, analysisId: c.get('requestId'), signal: c.req.raw.signal }),
        retryOptions,
      );
      return c.json(serializeAnalysis(analysis));
    } catch (err) {
      return errorResponse(c, err);
    }
  });

  // POST /analyze/pdf — Multipart upload with a `file` field
  routes.post('/pdf', async (c) => {
    const oversized = rejectOversizedBody(c, config.server.maxUploadBytes);
    if (oversized) return oversized;

    const contentType = c.req.header('content-type')?.toLowerCase() ?? '';
    if (!contentType.includes('multipart/form-data')) {
      return c.json({ error: 'Unsupported content type. Use multipart/form-data.', code: 'INPUT_ERROR' }, 415);
    }

    let upload: File;
    try {
      const body = await c.req.parseBody();
      const field = body['file'];
      if (!field || typeof field === 'string' || Array.isArray(field)) {
        return c.json({ error: 'Missing PDF upload in the "file" field', code: 'INPUT_ERROR' }, 400);
      }
      upload = field;
    } catch (err) {
      logger.warn({ err }, 'Failed to parse multipart body');
      return c.json({ error: 'Malformed multipart body', code: 'INPUT_ERROR' }, 400);
    }

    if (upload.size > config.server.maxUploadBytes) {
      return c.json({ error: `Request too large (max ${config.server.maxUploadBytes} bytes)`, code: 'INPUT_ERROR' }, 413);
    }

    try {
      const bytes = new Uint8Array(await upload.arrayBuffer());
      const fileName = upload.name || 'upload.pdf';
      const scan = await scanResumeBytes(bytes, fileName, { config, analyzer }, {
        analysisId: c.get('requestId'),
        signal: c.req.raw.signal,
        retryBaseDelayMs: deps.retryBaseDelayMs,
      });

      return c.json({
        file_name: scan.fileName,
        size_bytes: scan.sizeBytes,
        suspicious_elements: scan.suspiciousElements,
        keywords: scan.keywords,
        image_only: scan.imageOnly,
        analysis: scan.analysis ? serializeAnalysis(scan.analysis) : null,
      });
    } catch (err) {
      return errorResponse(c, err);
    }
  });

  return routes;
}
