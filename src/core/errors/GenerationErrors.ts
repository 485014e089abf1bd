/**
 * Error taxonomy for the generation pipeline.
 *
 * Per-job errors (submission, polling, remote failure, timeout) are recorded on
 * the job and never abort a batch. AuthError and ConfigurationError are raised
 * before any job is submitted and abort the run.
 */

export type GenerationErrorCode =
  | 'AUTH'
  | 'SUBMISSION'
  | 'TRANSIENT_POLL'
  | 'JOB_FAILED'
  | 'TIMEOUT'
  | 'CANCELLED'
  | 'EMPTY_ARCHIVE'
  | 'CONFIGURATION'
  | 'UNKNOWN';

export class GenerationError extends Error {
  readonly code: GenerationErrorCode;

  constructor(code: GenerationErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * The remote service refused or never received a generation request
 */
export class SubmissionError extends GenerationError {
  constructor(message: string, options?: ErrorOptions, code: GenerationErrorCode = 'SUBMISSION') {
    super(code, message, options);
  }
}

/**
 * Missing, invalid or revoked API key
 */
export class AuthError extends SubmissionError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options, 'AUTH');
  }
}

export class TransientPollError extends GenerationError {
  readonly status?: number;

  constructor(message: string, options?: ErrorOptions & { status?: number }) {
    super('TRANSIENT_POLL', message, options);
    this.status = options?.status;
  }
}

export class JobFailedError extends GenerationError {
  constructor(message: string, options?: ErrorOptions) {
    super('JOB_FAILED', message, options);
  }
}

export class TimeoutError extends GenerationError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super('TIMEOUT', message);
    this.timeoutMs = timeoutMs;
  }
}

export class CancelledError extends GenerationError {
  constructor(message = 'Operation cancelled') {
    super('CANCELLED', message);
  }
}

export class EmptyArchiveError extends GenerationError {
  constructor(message = 'No images were generated successfully; nothing to package') {
    super('EMPTY_ARCHIVE', message);
  }
}

/**
 * Malformed run settings (image count, reference images, script file)
 */
export class ConfigurationError extends GenerationError {
  constructor(message: string) {
    super('CONFIGURATION', message);
  }
}

export function errorCodeOf(error: unknown): GenerationErrorCode {
  return error instanceof GenerationError ? error.code : 'UNKNOWN';
}

export function errorMessageOf(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
