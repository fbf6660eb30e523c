/**
 * Run summary artifacts.
 *
 * Every CLI build leaves its artifacts side by side in the log directory:
 *   <logDir>/build.log
 *   <logDir>/events.jsonl
 *   <logDir>/summary.json
 */

import { mkdirSync, writeFileSync } from 'fs';
import { join, resolve } from 'path';
import { randomUUID } from 'crypto';
import { redact } from './redact.js';
import type { BuildFailure, ExecutionMode } from '../contracts/index.js';
import type { RunnerErrorEnvelope } from './errors.js';

export const SUMMARY_FILE_NAME = 'summary.json';
export const EVENTS_FILE_NAME = 'events.jsonl';

export interface RunSummary {
  run_id: string;
  command: string;
  started_at: string;
  finished_at: string;
  mode: ExecutionMode;
  success: boolean;
  exit_code: number;
  command_count: number;
  log_path: string;
  failure?: BuildFailure;
  error?: RunnerErrorEnvelope;
}

/**
 * Generate a run-ID from the current timestamp + randomness.
 * Format: YYYYMMDD-HHmmss-<short-uuid>
 */
export function generateRunId(now: Date = new Date()): string {
  const pad = (n: number, w = 2): string => String(n).padStart(w, '0');
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  const short = randomUUID().slice(0, 8);
  return `${date}-${time}-${short}`;
}

/**
 * Write `summary.json` into `dir` and return the summary as written.
 */
export function writeRunSummary(
  dir: string,
  opts: Omit<RunSummary, 'finished_at'> & { finishedAt?: string },
): RunSummary {
  const { finishedAt, ...rest } = opts;
  const summary: RunSummary = {
    ...rest,
    finished_at: finishedAt ?? new Date().toISOString(),
  };

  const target = resolve(dir);
  mkdirSync(target, { recursive: true });
  writeFileSync(join(target, SUMMARY_FILE_NAME), JSON.stringify(redact(summary), null, 2), 'utf-8');
  return summary;
}
