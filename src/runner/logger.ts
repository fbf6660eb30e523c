/**
 * Structured JSON-lines logger for CLI commands and the build runner.
 *
 * Every line written to `events.jsonl` is one LogEntry. Data payloads
 * are redacted before they are buffered or written.
 */

import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { redact } from './redact.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  module: string;
  action: string;
  message: string;
  run_id?: string;
  data?: Record<string, unknown>;
}

export interface StructuredLogger {
  debug(action: string, message: string, data?: Record<string, unknown>): void;
  info(action: string, message: string, data?: Record<string, unknown>): void;
  warn(action: string, message: string, data?: Record<string, unknown>): void;
  error(action: string, message: string, data?: Record<string, unknown>): void;
  fatal(action: string, message: string, data?: Record<string, unknown>): void;
  /** Return all entries collected so far (for summary output). */
  entries(): readonly LogEntry[];
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

export interface LoggerOptions {
  module: string;
  filePath?: string;
  minLevel?: LogLevel;
  json?: boolean;
  runId?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function createLogger(opts: LoggerOptions): StructuredLogger {
  const buffer: LogEntry[] = [];
  const minPriority = LEVEL_PRIORITY[opts.minLevel ?? 'info'];

  if (opts.filePath) {
    mkdirSync(dirname(opts.filePath), { recursive: true });
  }

  function emit(level: LogLevel, action: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_PRIORITY[level] < minPriority) return;

    const redacted = data ? redact(data) : undefined;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      module: opts.module,
      action,
      message,
      ...(opts.runId && { run_id: opts.runId }),
      ...(isRecord(redacted) && { data: redacted }),
    };

    buffer.push(entry);

    const line = JSON.stringify(entry);

    if (opts.filePath) {
      appendFileSync(opts.filePath, line + '\n', 'utf-8');
    }

    // Human-facing output stays on stdout; structured lines go to stderr
    if (opts.json || level === 'error' || level === 'fatal') {
      process.stderr.write(line + '\n');
    }
  }

  return {
    debug: (action, message, data) => emit('debug', action, message, data),
    info: (action, message, data) => emit('info', action, message, data),
    warn: (action, message, data) => emit('warn', action, message, data),
    error: (action, message, data) => emit('error', action, message, data),
    fatal: (action, message, data) => emit('fatal', action, message, data),
    entries: (): readonly LogEntry[] => buffer,
  };
}
