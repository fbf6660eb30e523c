/**
 * Command sequence rendering
 *
 * Turns a validated BuildConfig into the ordered shell commands that
 * bootstrap a sid root filesystem and build a hybrid live ISO from it.
 * Rendering is pure: no I/O, and equal configurations always render
 * equal sequences.
 */

import type { Architecture, BuildStepId } from '../contracts/index.js';
import type { BuildConfig } from '../config/index.js';

export const TARGET_SUITE = 'sid';
export const OUTPUT_ISO_NAME = 'sid-custom.iso';

const BASE_TOOLS = ['tasksel', 'systemd-sysv'];
const IMAGE_TOOLS = ['live-build', 'squashfs-tools', 'xorriso'];

const KERNEL_PACKAGES: Record<Architecture, string> = {
  amd64: 'linux-image-amd64',
  arm64: 'linux-image-arm64',
  armhf: 'linux-image-armmp',
  i386: 'linux-image-686-pae',
  ppc64el: 'linux-image-powerpc64le',
  s390x: 'linux-image-s390x',
};

export interface BuildStep {
  id: BuildStepId;
  description: string;
  command: string;
}

const SAFE_SHELL_WORD = /^[A-Za-z0-9_@%+=:,./-]+$/;

/**
 * Quote a value for a POSIX shell. Values made only of safe characters
 * are returned unchanged.
 */
export function shellQuote(value: string): string {
  if (SAFE_SHELL_WORD.test(value)) return value;
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function kernelPackageFor(architecture: Architecture): string {
  return KERNEL_PACKAGES[architecture];
}

/** Name of the image live-build leaves in its working directory. */
export function liveImageName(architecture: Architecture): string {
  return `live-image-${architecture}.hybrid.iso`;
}

function joinPath(base: string, ...segments: string[]): string {
  return [base.replace(/\/+$/, ''), ...segments].join('/');
}

function chrootScript(config: BuildConfig): string {
  const packages = [
    kernelPackageFor(config.architecture),
    ...IMAGE_TOOLS,
    ...config.firmwarePackages,
  ].map(shellQuote);

  return [
    'apt-get update',
    `apt-get install -y --no-install-recommends ${BASE_TOOLS.join(' ')}`,
    'tasksel install standard',
    `apt-get install -y ${packages.join(' ')}`,
  ].join(' && ');
}

function imageConfigCommand(config: BuildConfig): string {
  const parts = [
    `sudo lb config -d ${TARGET_SUITE}`,
    `--architectures ${config.architecture}`,
    '--binary-images iso-hybrid',
    `--archive-areas ${shellQuote(config.components.join(' '))}`,
    `--bootappend-live ${shellQuote(`boot=live components quiet username=${config.username}`)}`,
  ];
  if (config.enableSecureBoot) {
    parts.push('--uefi-secure-boot on');
  }
  return parts.join(' ');
}

function packageConfigCommand(config: BuildConfig): string {
  return ['sudo lb config', ...config.packageSelection.toFlags().map(shellQuote)].join(' ');
}

/**
 * Render the build as ordered steps. The package step is present only
 * when the package selection carries packages or tasks.
 */
export function renderBuildSteps(config: BuildConfig): BuildStep[] {
  const workdir = config.workdir;
  const chroot = joinPath(workdir, 'chroot');

  const steps: BuildStep[] = [
    {
      id: 'prepare-workdir',
      description: 'Create the working directory tree',
      command: `mkdir -p ${shellQuote(joinPath(workdir, 'work'))}`,
    },
    {
      id: 'bootstrap-rootfs',
      description: `Bootstrap a ${config.variant} ${config.architecture} root filesystem`,
      command: [
        'sudo debootstrap',
        `--arch=${config.architecture}`,
        `--variant=${config.variant}`,
        TARGET_SUITE,
        shellQuote(chroot),
        shellQuote(config.mirror),
      ].join(' '),
    },
    {
      id: 'write-hostname',
      description: 'Write the hostname into the root filesystem',
      command: `echo ${shellQuote(config.hostname)} | sudo tee ${shellQuote(joinPath(chroot, 'etc', 'hostname'))}`,
    },
    {
      id: 'install-base',
      description: 'Install base packages, kernel and live-build inside the chroot',
      command: `sudo chroot ${shellQuote(chroot)} /bin/bash -c ${shellQuote(chrootScript(config))}`,
    },
    {
      id: 'configure-image',
      description: 'Configure the live image build',
      command: imageConfigCommand(config),
    },
  ];

  if (!config.packageSelection.isEmpty()) {
    steps.push({
      id: 'configure-packages',
      description: 'Add extra packages and tasks to the image',
      command: packageConfigCommand(config),
    });
  }

  steps.push(
    {
      id: 'build-image',
      description: 'Build the hybrid ISO image',
      command: 'sudo lb build',
    },
    {
      id: 'copy-artifact',
      description: `Copy the image to ${OUTPUT_ISO_NAME}`,
      command: `sudo cp ${liveImageName(config.architecture)} ${shellQuote(joinPath(workdir, OUTPUT_ISO_NAME))}`,
    },
  );

  return steps.filter((step) => step.command.trim().length > 0);
}

export function renderCommandSequence(config: BuildConfig): string[] {
  return renderBuildSteps(config).map((step) => step.command);
}

/**
 * Render the sequence as a standalone POSIX shell script.
 */
export function renderScript(config: BuildConfig): string {
  const lines = ['#!/bin/sh', 'set -e', ''];
  for (const step of renderBuildSteps(config)) {
    lines.push(`# ${step.id}: ${step.description}`, step.command);
  }
  return lines.join('\n') + '\n';
}
