export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'PROVIDER_ERROR'
  | 'NO_PROVIDER_AVAILABLE'
  | 'EXTRACTION_ERROR'
  | 'REASSEMBLY_ERROR'
  | 'JOB_CONFLICT'
  | 'JOB_CANCELLED'
  | 'INTERNAL_ERROR';

export interface ErrorPayload {
  code: ErrorCode;
  message: string;
  retryable: boolean;
}

export class TranslationError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly retryable: boolean = false
  ) {
    super(message);
    this.name = 'TranslationError';
  }

  toPayload(): ErrorPayload {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
    };
  }
}

export class ValidationError extends TranslationError {
  constructor(message: string) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
  }
}

export class ProviderError extends TranslationError {
  constructor(
    public readonly providerId: string,
    public readonly cause: unknown
  ) {
    super('PROVIDER_ERROR', `${providerId} translation failed: ${errorMessage(cause)}`, true);
    this.name = 'ProviderError';
  }
}

export class NoProviderAvailableError extends TranslationError {
  constructor(message = 'No translation provider is available') {
    super('NO_PROVIDER_AVAILABLE', message);
    this.name = 'NoProviderAvailableError';
  }
}

export class ExtractionError extends TranslationError {
  constructor(message: string) {
    super('EXTRACTION_ERROR', message);
    this.name = 'ExtractionError';
  }
}

export class ReassemblyError extends TranslationError {
  constructor(message: string) {
    super('REASSEMBLY_ERROR', message);
    this.name = 'ReassemblyError';
  }
}

export class JobConflictError extends TranslationError {
  constructor(message: string) {
    super('JOB_CONFLICT', message);
    this.name = 'JobConflictError';
  }
}

export class JobCancelledError extends TranslationError {
  constructor() {
    super('JOB_CANCELLED', 'Job cancelled');
    this.name = 'JobCancelledError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function normalizeError(err: unknown): ErrorPayload {
  if (err instanceof TranslationError) {
    return err.toPayload();
  }
  return {
    code: 'INTERNAL_ERROR',
    message: errorMessage(err),
    retryable: false,
  };
}
