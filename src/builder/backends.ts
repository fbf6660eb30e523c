/**
 * Execution backends
 *
 * The runner owns sequencing; a backend only knows how to reset the
 * build log and carry out one command. Both report progress through
 * the same line sink so callers see the same protocol either way.
 */

import { appendFile, writeFile } from 'fs/promises';
import { setTimeout as delay } from 'timers/promises';
import type { ExecutionMode } from '../contracts/index.js';
import { EnvironmentError } from '../runner/errors.js';
import type { CommandLauncher } from './shell.js';

export type LineSink = (line: string) => void;

export const SIMULATION_HEADER = 'Simulated build run.';
export const DEFAULT_STEP_DELAY_MS = 100;

export interface StepContext {
  /** 1-based position in the sequence. */
  index: number;
  total: number;
  command: string;
  logPath: string;
  signal?: AbortSignal;
}

export interface ExecutionBackend {
  readonly mode: ExecutionMode;
  resetLog(logPath: string): Promise<void>;
  /** Resolves to the command's exit status. */
  runStep(step: StepContext, sink: LineSink): Promise<number>;
}

async function writeLog(logPath: string, content: string, append: boolean): Promise<void> {
  try {
    if (append) {
      await appendFile(logPath, content, 'utf-8');
    } else {
      await writeFile(logPath, content, 'utf-8');
    }
  } catch (err) {
    throw new EnvironmentError(`Cannot write build log: ${logPath}`, { cause: err });
  }
}

export function appendLogLine(logPath: string, line: string): Promise<void> {
  return writeLog(logPath, line + '\n', true);
}

export class SimulatedBackend implements ExecutionBackend {
  readonly mode = 'simulated' as const;

  constructor(private readonly stepDelayMs: number = DEFAULT_STEP_DELAY_MS) {}

  resetLog(logPath: string): Promise<void> {
    return writeLog(logPath, SIMULATION_HEADER + '\n', false);
  }

  async runStep(step: StepContext, sink: LineSink): Promise<number> {
    const line = `[${step.index}/${step.total}] ${step.command}`;
    await appendLogLine(step.logPath, line);
    sink(line);
    await delay(this.stepDelayMs, undefined, { signal: step.signal });
    return 0;
  }
}

export interface RealBackendOptions {
  launcher: CommandLauncher;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export class RealBackend implements ExecutionBackend {
  readonly mode = 'real' as const;

  constructor(private readonly options: RealBackendOptions) {}

  resetLog(logPath: string): Promise<void> {
    return writeLog(logPath, '', false);
  }

  async runStep(step: StepContext, sink: LineSink): Promise<number> {
    sink(`[${step.index}/${step.total}] $ ${step.command}`);

    const launched = this.options.launcher(step.command, {
      cwd: this.options.cwd,
      env: this.options.env,
      signal: step.signal,
    });

    try {
      for await (const line of launched.lines) {
        sink(line);
        await appendLogLine(step.logPath, line);
      }
    } catch (err) {
      launched.kill();
      throw err;
    }

    const outcome = await launched.outcome;
    if (outcome.kind === 'error') {
      throw new EnvironmentError(`Failed to start command ${step.index}/${step.total}`, {
        cause: outcome.error,
      });
    }
    return outcome.code;
  }
}
