export type AnalysisErrorCode =
  | 'INPUT_ERROR'
  | 'EXTRACTION_ERROR'
  | 'SERVICE_UNAVAILABLE'
  | 'PROTOCOL_ERROR'
  | 'EMPTY_RESPONSE';

/**
 * Base class for every failure the analysis core surfaces to its callers.
 * Unparseable model output is not one of them: that is absorbed by the fallback.
 */
export class AnalysisError extends Error {
  readonly code: AnalysisErrorCode;

  constructor(code: AnalysisErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Rejected before any network call: empty text, empty resume core, bad upload. */
export class InputError extends AnalysisError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INPUT_ERROR', message, options);
  }
}

/** The PDF could not be read at all. An image-only PDF is not an ExtractionError. */
export class ExtractionError extends AnalysisError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('EXTRACTION_ERROR', message, options);
  }
}

export class ServiceUnavailableError extends AnalysisError {
  readonly timedOut: boolean;

  constructor(message: string, options?: { cause?: unknown; timedOut?: boolean }) {
    super('SERVICE_UNAVAILABLE', message, options);
    this.timedOut = options?.timedOut ?? false;
  }
}

export class ProtocolError extends AnalysisError {
  readonly status: number | null;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super('PROTOCOL_ERROR', message, options);
    this.status = options?.status ?? null;
  }
}

export class EmptyResponseError extends AnalysisError {
  constructor(message = 'Inference service returned an empty response. Try running the analysis again.') {
    super('EMPTY_RESPONSE', message);
  }
}

export function isAnalysisError(error: unknown): error is AnalysisError {
  return error instanceof AnalysisError;
}
