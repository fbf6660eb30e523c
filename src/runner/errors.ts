/**
 * Shared error envelope for all CLI commands.
 *
 * Every error that reaches the user goes through this envelope so CLI
 * output, structured logs and run summaries always have the same shape.
 */

import { redactString } from './redact.js';

// ---- Exit codes ------------------------------------------------------
export const EXIT_SUCCESS = 0;
export const EXIT_BUILD_FAILED = 1;
export const EXIT_VALIDATION = 2;
export const EXIT_DEPENDENCY = 3;
export const EXIT_BUG = 4;
export const EXIT_CANCELLED = 130;

// ---- Error classes ---------------------------------------------------

/** A configuration value outside its allowed set, or empty when required. */
export class ConfigValidationError extends Error {
  constructor(public readonly issues: readonly string[]) {
    super(issues.length > 0 ? issues.join('; ') : 'Invalid build configuration');
    this.name = 'ConfigValidationError';
  }
}

/** The log directory, log file or shell could not be created, written or started. */
export class EnvironmentError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EnvironmentError';
  }
}

export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class BuildCancelledError extends Error {
  constructor(public readonly completedSteps: number) {
    super(`Build cancelled after ${completedSteps} completed step(s)`);
    this.name = 'BuildCancelledError';
  }
}

// ---- Error envelope --------------------------------------------------

export interface RunnerErrorEnvelope {
  code: ErrorCode;
  message: string;
  userMessage: string;
  retryable: boolean;
  cause?: string;
  context?: Record<string, unknown>;
}

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'IO_ERROR'
  | 'COMMAND_FAILED'
  | 'CANCELLED'
  | 'INTERNAL_ERROR';

const CODE_TO_EXIT: Record<ErrorCode, number> = {
  VALIDATION_ERROR: EXIT_VALIDATION,
  NOT_FOUND: EXIT_VALIDATION,
  IO_ERROR: EXIT_DEPENDENCY,
  COMMAND_FAILED: EXIT_BUILD_FAILED,
  CANCELLED: EXIT_CANCELLED,
  INTERNAL_ERROR: EXIT_BUG,
};

const NON_RETRYABLE = new Set<ErrorCode>([
  'VALIDATION_ERROR',
  'NOT_FOUND',
  'INTERNAL_ERROR',
]);

export function exitCodeFor(code: ErrorCode): number {
  return CODE_TO_EXIT[code];
}

export function createErrorEnvelope(
  code: ErrorCode,
  message: string,
  opts: { cause?: unknown; context?: Record<string, unknown> } = {},
): RunnerErrorEnvelope {
  const causeMsg = opts.cause instanceof Error
    ? opts.cause.message
    : opts.cause != null
      ? String(opts.cause)
      : undefined;

  return {
    code,
    message,
    userMessage: redactString(message),
    retryable: !NON_RETRYABLE.has(code),
    cause: causeMsg ? redactString(causeMsg) : undefined,
    context: opts.context,
  };
}

/** fs and child_process failures carry an errno code and the failing syscall. */
function isSystemError(err: unknown): err is Error & { code: string; syscall: string } {
  return err instanceof Error
    && 'code' in err && typeof err.code === 'string'
    && 'syscall' in err && typeof err.syscall === 'string';
}

/**
 * Wrap an unknown thrown value into a RunnerErrorEnvelope, keeping the
 * code of the known error classes.
 */
export function wrapError(err: unknown): RunnerErrorEnvelope {
  if (err instanceof ConfigValidationError) {
    return createErrorEnvelope('VALIDATION_ERROR', err.message, {
      context: { issues: [...err.issues] },
    });
  }
  if (err instanceof NotFoundError) {
    return createErrorEnvelope('NOT_FOUND', err.message);
  }
  if (err instanceof EnvironmentError) {
    return createErrorEnvelope('IO_ERROR', err.message, { cause: err.cause });
  }
  if (err instanceof BuildCancelledError) {
    return createErrorEnvelope('CANCELLED', err.message, {
      context: { completed_steps: err.completedSteps },
    });
  }
  if (isSystemError(err)) {
    return createErrorEnvelope('IO_ERROR', err.message, { cause: err, context: { errno: err.code } });
  }
  if (err instanceof Error) {
    return createErrorEnvelope('INTERNAL_ERROR', err.message, { cause: err });
  }
  return createErrorEnvelope('INTERNAL_ERROR', String(err));
}
