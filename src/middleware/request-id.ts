import { randomUUID } from 'node:crypto';
import type { Context, Next } from 'hono';
import logger from '../lib/logger.js';

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
  }
}

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]+$/;

/** Accepts a caller-supplied X-Request-ID when it is short and safe to log; otherwise mints one. */
export function resolveRequestId(raw: string | undefined): string {
  if (raw) {
    const candidate = raw.trim().slice(0, 64);
    if (REQUEST_ID_PATTERN.test(candidate)) return candidate;
  }
  return randomUUID();
}

export async function requestIdMiddleware(c: Context, next: Next) {
  const requestId = resolveRequestId(c.req.header('X-Request-ID'));
  const startedAt = Date.now();
  c.set('requestId', requestId);
  c.header('X-Request-ID', requestId);

  await next();

  logger.info(
    { requestId, method: c.req.method, path: c.req.path, status: c.res.status, durationMs: Date.now() - startedAt },
    'Request completed',
  );
}
