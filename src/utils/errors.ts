/**
 * Error taxonomy for a pipeline run. Config and keyword errors abort the run;
 * generation and publish errors only fail the task they occurred in.
 */
export class AppError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends AppError {}

export class KeywordFileError extends AppError {}

export class GenerationError extends AppError {}

export type PublishErrorKind =
  | 'auth'
  | 'validation'
  | 'server'
  | 'timeout'
  | 'network'
  | 'invalid_response';

export class PublishError extends AppError {
  readonly kind: PublishErrorKind;
  readonly status?: number;

  constructor(kind: PublishErrorKind, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.kind = kind;
    this.status = options.status;
  }

  get retryable(): boolean {
    return this.kind === 'server' || this.kind === 'timeout' || this.kind === 'network';
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
