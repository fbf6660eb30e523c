/**
 * Shell process launcher
 *
 * Hands a command string verbatim to a shell, merges stdout and stderr
 * into one stream and exposes it line by line.
 */

import { spawn } from 'child_process';
import { constants } from 'os';
import { createInterface } from 'readline';
import { PassThrough } from 'stream';

export const DEFAULT_SHELL = '/bin/sh';

export type LaunchOutcome =
  | { kind: 'exited'; code: number }
  | { kind: 'error'; error: Error };

export interface LaunchOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  shell?: string;
  /** Aborting sends SIGTERM to the shell and everything it started. */
  signal?: AbortSignal;
}

export interface LaunchedCommand {
  /** Merged output, one line per item, without line terminators. */
  readonly lines: AsyncIterable<string>;
  /** Settles once the process is gone; never rejects. */
  readonly outcome: Promise<LaunchOutcome>;
  /** SIGTERM to the command's whole process group. */
  kill(): void;
}

export type CommandLauncher = (command: string, options: LaunchOptions) => LaunchedCommand;

function exitCodeFromSignal(signal: NodeJS.Signals | null): number {
  return signal ? 128 + constants.signals[signal] : 1;
}

function isMissingProcess(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ESRCH';
}

export const launchShellCommand: CommandLauncher = (command, options) => {
  // own process group, so pipelines and chroot scripts can be signalled as one
  const child = spawn(command, {
    shell: options.shell ?? DEFAULT_SHELL,
    cwd: options.cwd,
    env: options.env ?? process.env,
    detached: true,
    stdio: ['ignore', 'pipe', 'pipe'],
  });

  let settled = false;
  const killGroup = (): void => {
    if (settled || child.pid === undefined) return;
    try {
      process.kill(-child.pid, 'SIGTERM');
    } catch (err) {
      if (!isMissingProcess(err)) throw err;
    }
  };

  const merged = new PassThrough();
  let openStreams = 2;
  const release = (): void => {
    openStreams -= 1;
    if (openStreams === 0) merged.end();
  };

  for (const stream of [child.stdout, child.stderr]) {
    stream.once('close', release);
    stream.pipe(merged, { end: false });
  }

  const { signal } = options;
  const onAbort = (): void => killGroup();
  const outcome = new Promise<LaunchOutcome>((resolve) => {
    const finish = (result: LaunchOutcome): void => {
      settled = true;
      signal?.removeEventListener('abort', onAbort);
      resolve(result);
    };
    child.once('error', (error) => {
      // a process that failed to start must still end the line stream
      child.stdout.destroy();
      child.stderr.destroy();
      finish({ kind: 'error', error });
    });
    child.once('close', (code, exitSignal) => {
      finish({ kind: 'exited', code: code ?? exitCodeFromSignal(exitSignal) });
    });
  });

  if (signal?.aborted) {
    killGroup();
  } else {
    signal?.addEventListener('abort', onAbort, { once: true });
  }

  return {
    lines: createInterface({ input: merged, crlfDelay: Infinity }),
    outcome,
    kill: killGroup,
  };
};
