/**
 * Runner infrastructure shared across all CLI commands.
 *
 * Re-exports the standard building blocks every command needs:
 * structured logging, run summaries, error envelopes and redaction.
 */

// Artifacts
export {
  generateRunId,
  writeRunSummary,
  SUMMARY_FILE_NAME,
  EVENTS_FILE_NAME,
  type RunSummary,
} from './artifacts.js';

// Logger
export {
  createLogger,
  type StructuredLogger,
  type LoggerOptions,
  type LogEntry,
  type LogLevel,
} from './logger.js';

// Errors
export {
  ConfigValidationError,
  EnvironmentError,
  NotFoundError,
  BuildCancelledError,
  createErrorEnvelope,
  wrapError,
  exitCodeFor,
  EXIT_SUCCESS,
  EXIT_BUILD_FAILED,
  EXIT_VALIDATION,
  EXIT_DEPENDENCY,
  EXIT_BUG,
  EXIT_CANCELLED,
  type RunnerErrorEnvelope,
  type ErrorCode,
} from './errors.js';

// Redaction
export {
  redact,
  redactString,
  REDACT_DENYLIST_KEYS,
} from './redact.js';
