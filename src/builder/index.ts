/**
 * ISO build runner
 *
 * Executes the rendered command sequence one command at a time, either
 * for real or simulated, streaming every line to a sink and keeping
 * `<logDir>/build.log` for the run. The first failing command ends the
 * run with `success: false`; only environment failures and
 * cancellation reject.
 */

import { mkdirSync } from 'fs';
import { join } from 'path';
import type { BuildFailure, BuildResult } from '../contracts/index.js';
import type { BuildConfig } from '../config/index.js';
import { saveConfigFile } from '../config/file.js';
import { renderCommandSequence } from '../render/index.js';
import { BuildCancelledError, EnvironmentError } from '../runner/errors.js';
import type { StructuredLogger } from '../runner/logger.js';
import {
  RealBackend,
  SimulatedBackend,
  type ExecutionBackend,
  type LineSink,
} from './backends.js';
import { launchShellCommand, type CommandLauncher } from './shell.js';

export const BUILD_LOG_NAME = 'build.log';

export interface IsoBuildRunnerOptions {
  /** Defaults to `<workdir>/logs`. */
  logDir?: string;
  logger?: StructuredLogger;
  /** Pause after each simulated step. */
  stepDelayMs?: number;
  launcher?: CommandLauncher;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface RunOptions {
  signal?: AbortSignal;
}

export class IsoBuildRunner {
  readonly logDir: string;
  readonly logPath: string;

  constructor(
    readonly config: BuildConfig,
    private readonly options: IsoBuildRunnerOptions = {},
  ) {
    this.logDir = options.logDir ?? join(config.workdir, 'logs');
    this.logPath = join(this.logDir, BUILD_LOG_NAME);

    try {
      mkdirSync(this.logDir, { recursive: true });
    } catch (err) {
      throw new EnvironmentError(`Cannot create log directory: ${this.logDir}`, { cause: err });
    }
  }

  async run(sink: LineSink, opts: RunOptions = {}): Promise<BuildResult> {
    const { signal } = opts;
    const log = this.options.logger;
    const commands = renderCommandSequence(this.config);
    const backend = this.createBackend();
    const total = commands.length;

    log?.info('build.start', `Starting ${backend.mode} build of ${total} command(s)`, {
      mode: backend.mode,
      architecture: this.config.architecture,
      mirror: this.config.mirror,
      log_path: this.logPath,
    });

    await backend.resetLog(this.logPath);

    let completed = 0;
    for (const [offset, command] of commands.entries()) {
      const index = offset + 1;
      if (signal?.aborted) throw this.cancelled(completed);

      log?.info('build.step', `Step ${index}/${total}`, { index, command });

      let exitCode: number;
      try {
        exitCode = await backend.runStep({ index, total, command, logPath: this.logPath, signal }, sink);
      } catch (err) {
        if (signal?.aborted) throw this.cancelled(completed);
        throw err;
      }
      // a command killed by the abort is not a command failure
      if (signal?.aborted) throw this.cancelled(completed);

      if (exitCode !== 0) {
        sink(`Command failed with exit code ${exitCode}`);
        const failure: BuildFailure = { index, command, exitCode };
        log?.error('build.step.failed', `Command ${index}/${total} exited with ${exitCode}`, { ...failure });
        return this.result(commands, backend, false, failure);
      }
      completed += 1;
    }

    log?.info('build.complete', `Build finished: ${completed}/${total} command(s) succeeded`, {
      mode: backend.mode,
    });
    return this.result(commands, backend, true);
  }

  /**
   * Write the full configuration as indented JSON to `destination`,
   * replacing any existing file.
   */
  exportConfig(destination: string): string {
    try {
      return saveConfigFile(this.config, destination);
    } catch (err) {
      throw new EnvironmentError(`Cannot write config export: ${destination}`, { cause: err });
    }
  }

  private createBackend(): ExecutionBackend {
    if (this.config.simulate) {
      return new SimulatedBackend(this.options.stepDelayMs);
    }
    return new RealBackend({
      launcher: this.options.launcher ?? launchShellCommand,
      cwd: this.options.cwd,
      env: this.options.env,
    });
  }

  private cancelled(completed: number): BuildCancelledError {
    this.options.logger?.warn('build.cancelled', `Build cancelled after ${completed} step(s)`);
    return new BuildCancelledError(completed);
  }

  private result(
    commands: readonly string[],
    backend: ExecutionBackend,
    success: boolean,
    failure?: BuildFailure,
  ): BuildResult {
    return Object.freeze({
      commands: Object.freeze([...commands]),
      logPath: this.logPath,
      success,
      mode: backend.mode,
      ...(failure && { failure: Object.freeze(failure) }),
    });
  }
}

export {
  RealBackend,
  SimulatedBackend,
  SIMULATION_HEADER,
  DEFAULT_STEP_DELAY_MS,
  type ExecutionBackend,
  type LineSink,
  type StepContext,
} from './backends.js';
export {
  launchShellCommand,
  DEFAULT_SHELL,
  type CommandLauncher,
  type LaunchedCommand,
  type LaunchOptions,
  type LaunchOutcome,
} from './shell.js';
