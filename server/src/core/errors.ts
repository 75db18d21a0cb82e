export type PipelineErrorCode =
  | 'EMPTY_INPUT'
  | 'UNSUPPORTED_FORMAT'
  | 'TRANSLATION_FAILED'
  | 'JOB_TIMEOUT'
  | 'JOB_CANCELLED'
  | 'NOT_FOUND'
  | 'NOT_READY';

export type ErrorCode = PipelineErrorCode | 'INTERNAL_ERROR';

export interface ErrorInfo {
  code: ErrorCode;
  message: string;
}

export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;
}

export class EmptyInputError extends PipelineError {
  readonly code = 'EMPTY_INPUT';

  constructor(message = 'Le document est vide') {
    super(message);
    this.name = 'EmptyInputError';
  }
}

export class UnsupportedFormatError extends PipelineError {
  readonly code = 'UNSUPPORTED_FORMAT';

  constructor(message: string) {
    super(message);
    this.name = 'UnsupportedFormatError';
  }
}

export interface TranslationErrorOptions {
  retryable?: boolean;
  statusCode?: number;
  segmentIndex?: number;
  attempts?: number;
  circuitOpen?: boolean;
  retryAfterMs?: number;
  cause?: unknown;
}

export class TranslationError extends PipelineError {
  readonly code = 'TRANSLATION_FAILED';
  readonly retryable: boolean;
  readonly statusCode?: number;
  readonly segmentIndex?: number;
  readonly attempts?: number;
  // Rejet par le circuit breaker : la requête n'a pas atteint le service
  readonly circuitOpen: boolean;
  readonly retryAfterMs?: number;

  constructor(message: string, options: TranslationErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'TranslationError';
    this.retryable = options.retryable ?? true;
    this.statusCode = options.statusCode;
    this.segmentIndex = options.segmentIndex;
    this.attempts = options.attempts;
    this.circuitOpen = options.circuitOpen ?? false;
    this.retryAfterMs = options.retryAfterMs;
  }

  get rateLimited(): boolean {
    return this.statusCode === 429;
  }
}

export class JobTimeoutError extends PipelineError {
  readonly code = 'JOB_TIMEOUT';

  constructor(jobId: string, stallTimeoutMs: number) {
    super(`Job ${jobId} sans progression depuis ${stallTimeoutMs} ms`);
    this.name = 'JobTimeoutError';
  }
}

export class JobCancelledError extends PipelineError {
  readonly code = 'JOB_CANCELLED';

  constructor(jobId: string) {
    super(`Job ${jobId} annulé`);
    this.name = 'JobCancelledError';
  }
}

export class NotFoundError extends PipelineError {
  readonly code = 'NOT_FOUND';

  constructor(jobId: string) {
    super(`Job de traduction introuvable: ${jobId}`);
    this.name = 'NotFoundError';
  }
}

export class NotReadyError extends PipelineError {
  readonly code = 'NOT_READY';

  constructor(jobId: string, status: string) {
    super(`La traduction du job ${jobId} n'est pas terminée (statut: ${status})`);
    this.name = 'NotReadyError';
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

export function toErrorInfo(error: unknown): ErrorInfo {
  if (isPipelineError(error)) {
    return { code: error.code, message: error.message };
  }
  return {
    code: 'INTERNAL_ERROR',
    message: error instanceof Error ? error.message : String(error)
  };
}
