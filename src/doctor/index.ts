/**
 * Host prerequisite checks
 *
 * Checks:
 *  1. Node.js version >= 20
 *  2. Host tools the rendered commands call (sh, sudo, debootstrap, ...)
 *  3. Foreign-architecture builds have qemu user emulation available
 *  4. Working directory parent exists
 *
 * Missing tools fail a real build but only warn for a simulated one.
 */

import { spawnSync } from 'child_process';
import { existsSync } from 'fs';
import { dirname, resolve } from 'path';
import type { Architecture } from '../contracts/index.js';
import type { BuildConfig } from '../config/index.js';
import { DEFAULT_SHELL } from '../builder/shell.js';

export type CheckStatus = 'pass' | 'warn' | 'fail';

export interface CheckResult {
  name: string;
  status: CheckStatus;
  message: string;
  remediation?: string;
}

export interface DoctorReport {
  ok: boolean;
  checks: CheckResult[];
}

export interface HostTool {
  tool: string;
  /** Debian package providing the tool. */
  package: string;
}

export const REQUIRED_TOOLS: readonly HostTool[] = [
  { tool: 'sh', package: 'dash' },
  { tool: 'sudo', package: 'sudo' },
  { tool: 'debootstrap', package: 'debootstrap' },
  { tool: 'chroot', package: 'coreutils' },
  { tool: 'lb', package: 'live-build' },
  { tool: 'xorriso', package: 'xorriso' },
  { tool: 'mksquashfs', package: 'squashfs-tools' },
];

const HOST_ARCHITECTURES: Partial<Record<string, Architecture>> = {
  x64: 'amd64',
  arm64: 'arm64',
  arm: 'armhf',
  ia32: 'i386',
  ppc64: 'ppc64el',
  s390x: 's390x',
};

export type ToolProbe = (tool: string) => boolean;

export interface DoctorOptions {
  probe?: ToolProbe;
  nodeVersion?: string;
  hostArch?: string;
  pathExists?: (path: string) => boolean;
}

/**
 * True when `tool` resolves on the current PATH.
 */
export function probeTool(tool: string): boolean {
  const result = spawnSync(DEFAULT_SHELL, ['-c', `command -v ${tool}`], {
    encoding: 'utf-8',
    timeout: 10_000,
  });
  return result.status === 0;
}

export function hostArchitecture(nodeArch: string = process.arch): Architecture | undefined {
  return HOST_ARCHITECTURES[nodeArch];
}

export function runDoctor(config: BuildConfig, opts: DoctorOptions = {}): DoctorReport {
  const probe = opts.probe ?? probeTool;
  const pathExists = opts.pathExists ?? existsSync;
  const checks: CheckResult[] = [];
  const missingStatus: CheckStatus = config.simulate ? 'warn' : 'fail';

  // ---- 1. Node.js version ----
  const nodeVersion = opts.nodeVersion ?? process.version;
  const nodeMajor = parseInt(nodeVersion.replace(/^v/, '').split('.')[0] ?? '', 10);
  if (nodeMajor >= 20) {
    checks.push({ name: 'Node.js version', status: 'pass', message: `${nodeVersion} (>= 20 required)` });
  } else {
    checks.push({
      name: 'Node.js version',
      status: 'fail',
      message: `${nodeVersion}, minimum is v20.0.0`,
      remediation: 'Install Node.js >= 20',
    });
  }

  // ---- 2. Host tools ----
  for (const { tool, package: pkg } of REQUIRED_TOOLS) {
    if (probe(tool)) {
      checks.push({ name: `tool: ${tool}`, status: 'pass', message: 'found on PATH' });
    } else {
      checks.push({
        name: `tool: ${tool}`,
        status: missingStatus,
        message: 'not found on PATH',
        remediation: `Run: sudo apt-get install ${pkg}`,
      });
    }
  }

  // ---- 3. Foreign architecture ----
  const host = hostArchitecture(opts.hostArch);
  if (host === config.architecture) {
    checks.push({ name: 'architecture', status: 'pass', message: `native ${host} build` });
  } else if (probe(`qemu-${qemuSuffix(config.architecture)}-static`)) {
    checks.push({
      name: 'architecture',
      status: 'pass',
      message: `foreign ${config.architecture} build with qemu user emulation`,
    });
  } else {
    checks.push({
      name: 'architecture',
      status: 'warn',
      message: `${config.architecture} differs from host ${host ?? 'unknown'} and no qemu emulator was found`,
      remediation: 'Run: sudo apt-get install qemu-user-static binfmt-support',
    });
  }

  // ---- 4. Working directory ----
  const workdirParent = dirname(resolve(config.workdir));
  if (pathExists(workdirParent)) {
    checks.push({ name: 'workdir', status: 'pass', message: `${resolve(config.workdir)}` });
  } else {
    checks.push({
      name: 'workdir',
      status: 'warn',
      message: `parent directory ${workdirParent} does not exist; it will be created`,
    });
  }

  return { ok: checks.every((c) => c.status !== 'fail'), checks };
}

function qemuSuffix(architecture: Architecture): string {
  switch (architecture) {
    case 'amd64':
      return 'x86_64';
    case 'arm64':
      return 'aarch64';
    case 'armhf':
      return 'arm';
    case 'i386':
      return 'i386';
    case 'ppc64el':
      return 'ppc64le';
    case 's390x':
      return 's390x';
  }
}
