import { z } from 'zod';
import type { GenerationOptions } from './config.js';
import { EmptyResponseError, ProtocolError, ServiceUnavailableError } from './errors.js';
import logger from './logger.js';

// ─── Shared interfaces ───────────────────────────────────────────────

export interface GenerateResult {
  /** The model's raw text output (the envelope's `response`), trimmed. */
  text: string;
  envelope: OllamaEnvelope;
}

export interface ModelClient {
  readonly model: string;
  generate(prompt: string, options: GenerationOptions, signal?: AbortSignal): Promise<GenerateResult>;
}

// ─── Wire format ─────────────────────────────────────────────────────

const ollamaEnvelopeSchema = z
  .object({
    response: z.string(),
    model: z.string().optional(),
    done: z.boolean().optional(),
    total_duration: z.number().optional(),
    prompt_eval_count: z.number().optional(),
    eval_count: z.number().optional(),
  })
  .passthrough();

export type OllamaEnvelope = z.infer<typeof ollamaEnvelopeSchema>;

export interface OllamaGenerateRequest {
  model: string;
  prompt: string;
  stream: false;
  options: {
    temperature: number;
    top_p: number;
    num_predict: number;
    num_ctx: number;
  };
}

export function buildGenerateRequest(
  model: string,
  prompt: string,
  options: GenerationOptions,
): OllamaGenerateRequest {
  return {
    model,
    prompt,
    stream: false,
    options: {
      temperature: options.temperature,
      top_p: options.topP,
      num_predict: options.maxOutputTokens,
      num_ctx: options.contextWindowSize,
    },
  };
}

// ─── Abort handling ──────────────────────────────────────────────────

class RequestTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`);
    this.name = 'RequestTimeoutError';
  }
}

function createCombinedAbortSignal(
  callerSignal: AbortSignal | undefined,
  timeoutMs: number,
): { signal: AbortSignal; cleanup: () => void } {
  const controller = new AbortController();
  const timeout = setTimeout(() => {
    controller.abort(new RequestTimeoutError(timeoutMs));
  }, timeoutMs);
  timeout.unref?.();

  const onCallerAbort = () => {
    if (!controller.signal.aborted) controller.abort(callerSignal?.reason);
  };

  if (callerSignal) {
    if (callerSignal.aborted) {
      onCallerAbort();
    } else {
      callerSignal.addEventListener('abort', onCallerAbort, { once: true });
    }
  }

  const cleanup = () => {
    clearTimeout(timeout);
    callerSignal?.removeEventListener('abort', onCallerAbort);
  };

  return { signal: controller.signal, cleanup };
}

// ─── Ollama client ───────────────────────────────────────────────────

export interface OllamaClientConfig {
  baseUrl: string;
  model: string;
  fetch?: typeof fetch;
}

/**
 * Client for a local Ollama-compatible `/api/generate` endpoint.
 * One non-streaming POST per call, never retried here.
 */
export class OllamaClient implements ModelClient {
  readonly model: string;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(config: OllamaClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
    this.model = config.model;
    this.fetchImpl = config.fetch ?? fetch;
  }

  get endpoint(): string {
    return `${this.baseUrl}/api/generate`;
  }

  async generate(prompt: string, options: GenerationOptions, signal?: AbortSignal): Promise<GenerateResult> {
    const body = buildGenerateRequest(this.model, prompt, options);
    const timeoutMs = Math.round(options.requestTimeoutSeconds * 1000);
    const { signal: combinedSignal, cleanup } = createCombinedAbortSignal(signal, timeoutMs);

    logger.debug({ endpoint: this.endpoint, model: this.model, promptChars: prompt.length }, 'Sending generate request');

    const { status, raw } = await this.post(body, combinedSignal)
      .catch((err: unknown) => {
        throw this.translateTransportError(err, combinedSignal, timeoutMs);
      })
      .finally(cleanup);

    if (status < 200 || status >= 300) {
      logger.error({ status }, 'Inference service returned an error status');
      throw new ProtocolError(`Inference service error ${status}: ${describeErrorBody(raw)}`, { status });
    }

    const envelope = parseEnvelope(raw, status);
    const text = envelope.response.trim();
    if (!text) {
      logger.error({ model: this.model }, 'Inference service returned empty response');
      throw new EmptyResponseError();
    }

    logger.debug(
      { chars: text.length, evalCount: envelope.eval_count, totalDuration: envelope.total_duration },
      'Received model response',
    );
    return { text, envelope };
  }

  private async post(body: OllamaGenerateRequest, signal: AbortSignal): Promise<{ status: number; raw: string }> {
    const response = await this.fetchImpl(this.endpoint, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      signal,
    });
    return { status: response.status, raw: await response.text() };
  }

  private translateTransportError(err: unknown, signal: AbortSignal, timeoutMs: number): Error {
    if (signal.aborted && signal.reason instanceof RequestTimeoutError) {
      logger.error({ timeoutMs }, 'Inference request timed out');
      return new ServiceUnavailableError(
        `Inference service did not answer within ${timeoutMs / 1000}s. `
        + 'Make sure Ollama is running (run: ollama serve) and the model is loaded, then try again.',
        { cause: err, timedOut: true },
      );
    }

    if (signal.aborted) {
      return err instanceof Error ? err : new Error(String(err));
    }

    logger.error({ err, endpoint: this.endpoint }, 'Failed to connect to inference service');
    return new ServiceUnavailableError(
      `Could not connect to the inference service at ${this.baseUrl}. `
      + 'Make sure Ollama is running (run: ollama serve) and try again.',
      { cause: err },
    );
  }
}

function describeErrorBody(raw: string): string {
  const parsed = z.object({ error: z.string() }).safeParse(safeJson(raw));
  if (parsed.success) return parsed.data.error;
  return raw.slice(0, 200) || 'no body';
}

function safeJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

function parseEnvelope(raw: string, status: number): OllamaEnvelope {
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (err) {
    logger.error({ rawSnippet: raw.slice(0, 200) }, 'Inference response is not JSON');
    throw new ProtocolError('Unexpected response from inference service: body is not JSON', { cause: err, status });
  }

  const parsed = ollamaEnvelopeSchema.safeParse(decoded);
  if (!parsed.success) {
    logger.error({ issues: parsed.error.issues }, 'Inference response envelope is malformed');
    throw new ProtocolError('Unexpected response from inference service: missing "response" text', {
      cause: parsed.error,
      status,
    });
  }
  return parsed.data;
}
