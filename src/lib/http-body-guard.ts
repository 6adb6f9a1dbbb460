import type { Context } from 'hono';

export function parsePositiveInt(raw: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(raw ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function tooLarge(c: Context, maxBytes: number): Response {
  return c.json({ error: `Request too large (max ${maxBytes} bytes)`, code: 'INPUT_ERROR' }, 413);
}

/**
 * Rejects a request whose declared Content-Length exceeds `maxBytes`.
 * A missing or malformed header is left to the streaming check.
 */
export function rejectOversizedBody(c: Context, maxBytes: number): Response | null {
  const contentLength = c.req.header('content-length');
  if (!contentLength) return null;
  const parsed = Number.parseInt(contentLength, 10);
  if (!Number.isFinite(parsed) || parsed < 0) return null;
  if (parsed <= maxBytes) return null;
  return tooLarge(c, maxBytes);
}

export type JsonBodyParseResult =
  | { ok: true; data: unknown }
  | { ok: false; response: Response };

type BodyReadResult =
  | { ok: true; raw: string }
  | { ok: false; response: Response };

async function readUtf8BodyWithLimit(c: Context, maxBytes: number): Promise<BodyReadResult> {
  const req = c.req.raw;
  if (req.bodyUsed) {
    return { ok: false, response: c.json({ error: 'Request body is not readable', code: 'INPUT_ERROR' }, 400) };
  }

  const stream = req.body;
  if (!stream) return { ok: true, raw: '' };

  const reader = stream.getReader();
  const chunks: Uint8Array[] = [];
  let totalBytes = 0;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      if (!value) continue;

      totalBytes += value.byteLength;
      if (totalBytes > maxBytes) {
        await reader.cancel().catch(() => undefined);
        return { ok: false, response: tooLarge(c, maxBytes) };
      }
      chunks.push(value);
    }
  } catch {
    return { ok: false, response: c.json({ error: 'Failed to read request body', code: 'INPUT_ERROR' }, 400) };
  }

  return { ok: true, raw: Buffer.concat(chunks).toString('utf8') };
}

/**
 * Parse a JSON body with a byte-size guard that holds even when
 * Content-Length is absent or wrong. Malformed JSON is a 400.
 */
export async function parseJsonBodyWithLimit(c: Context, maxBytes: number): Promise<JsonBodyParseResult> {
  const upfront = rejectOversizedBody(c, maxBytes);
  if (upfront) return { ok: false, response: upfront };

  const contentType = c.req.header('content-type')?.toLowerCase() ?? '';
  if (contentType && !contentType.includes('application/json')) {
    return {
      ok: false,
      response: c.json({ error: 'Unsupported content type. Use application/json.', code: 'INPUT_ERROR' }, 415),
    };
  }

  const read = await readUtf8BodyWithLimit(c, maxBytes);
  if (!read.ok) return read;

  if (!read.raw.trim()) return { ok: true, data: {} };
  try {
    return { ok: true, data: JSON.parse(read.raw) };
  } catch {
    return { ok: false, response: c.json({ error: 'Request body is not valid JSON', code: 'INPUT_ERROR' }, 400) };
  }
}
