import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { requestIdMiddleware } from './middleware/request-id.js';
import { createAnalyzeRoutes } from './routes/analyze.js';
import { ResumeAnalyzer } from './analysis/resume-analyzer.js';
import { loadConfig, type AppConfig } from './lib/config.js';
import { OllamaClient, type ModelClient } from './lib/ollama-client.js';
import logger from './lib/logger.js';

export interface AppDeps {
  config: AppConfig;
  client: ModelClient;
  retryBaseDelayMs?: number;
}

let shuttingDown = false;

export function createApp(deps: AppDeps): Hono {
  const { config, client } = deps;
  const analyzer = new ResumeAnalyzer({ config, client });
  const app = new Hono();

  app.use('*', requestIdMiddleware);

  app.use('*', async (c, next) => {
    if (shuttingDown && c.req.path !== '/health') {
      return c.json({ error: 'Server is restarting. Please retry shortly.' }, 503);
    }
    await next();
    c.header('X-Content-Type-Options', 'nosniff');
  });

  app.get('/health', (c) => {
    c.header('Cache-Control', 'no-store');
    return c.json({
      status: shuttingDown ? 'draining' : 'ok',
      model: client.model,
      inference_url: config.ollama.baseUrl,
      timestamp: new Date().toISOString(),
    });
  });

  app.route('/api/analyze', createAnalyzeRoutes({ config, analyzer, retryBaseDelayMs: deps.retryBaseDelayMs }));

  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  app.onError((err, c) => {
    const requestId = c.get('requestId');
    logger.error({ err, requestId }, 'Unhandled error');
    return c.json({ error: 'Internal server error', request_id: requestId }, 500);
  });

  return app;
}

let server: ReturnType<typeof serve> | null = null;

function shutdown(signal: string) {
  if (shuttingDown) return;
  if (!server) return;
  shuttingDown = true;
  logger.info({ signal }, 'Graceful shutdown initiated');

  // Stop accepting new connections; in-flight analyses finish first
  server.close(() => {
    logger.info('HTTP server closed');
    process.exit(0);
  });

  // Force exit if connections don't drain
  setTimeout(() => {
    logger.warn('Forcing exit after shutdown timeout');
    process.exit(1);
  }, 10_000).unref();
}

export function startServer(config: AppConfig = loadConfig()) {
  if (server) return server;

  const client = new OllamaClient({ baseUrl: config.ollama.baseUrl, model: config.ollama.model });
  const app = createApp({ config, client });
  const { port } = config.server;

  logger.info({ port, model: client.model, inferenceUrl: config.ollama.baseUrl }, 'Resume scan server starting');
  server = serve({ fetch: app.fetch, port });
  logger.info({ port }, `Server running at http://localhost:${port}`);

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled promise rejection');
    shutdown('UNHANDLED_REJECTION');
  });
  process.on('uncaughtException', (err) => {
    logger.error({ err }, 'Uncaught exception');
    shutdown('UNCAUGHT_EXCEPTION');
  });

  return server;
}

function isMainModule(): boolean {
  const current = fileURLToPath(import.meta.url);
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(current);
}

if (isMainModule()) {
  startServer();
}

export { ResumeAnalyzer } from './analysis/resume-analyzer.js';
export {
  analyzeExtractedResume,
  extractResumeBytes,
  extractResumeFile,
  scanResumeBytes,
  scanResumeFile,
} from './analysis/resume-scan.js';
export { sanitize } from './analysis/text-sanitizer.js';
export { extractCore } from './analysis/resume-section-extractor.js';
export { buildPrompt } from './analysis/prompt-builder.js';
export { recover } from './analysis/response-recovery.js';
export { synthesize } from './analysis/fallback-analysis.js';
export { extractPdfPages } from './pdf/pdf-extractor.js';
export { OllamaClient } from './lib/ollama-client.js';
export { loadConfig } from './lib/config.js';
export * from './lib/errors.js';
export type { AnalysisRecord, RecoveredAnalysis } from './analysis/types.js';
