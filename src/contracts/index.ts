/**
 * Core contracts and Zod schemas for liveiso-builder
 *
 * The serialized configuration record uses snake_case keys so exported
 * files stay stable across releases. All paths are plain strings.
 */

import { z } from 'zod';

// ============================================================================
// Supported sets
// ============================================================================

export const SUPPORTED_ARCHITECTURES = [
  'amd64',
  'arm64',
  'armhf',
  'i386',
  'ppc64el',
  's390x',
] as const;

export const SUPPORTED_VARIANTS = ['minbase', 'standard', 'buildd'] as const;

export const ArchitectureSchema = z.enum(SUPPORTED_ARCHITECTURES, {
  errorMap: (_issue, ctx) => ({ message: `Unsupported architecture: ${String(ctx.data)}` }),
});

export const VariantSchema = z.enum(SUPPORTED_VARIANTS, {
  errorMap: (_issue, ctx) => ({ message: `Unsupported variant: ${String(ctx.data)}` }),
});

export type Architecture = z.infer<typeof ArchitectureSchema>;
export type Variant = z.infer<typeof VariantSchema>;

// ============================================================================
// Configuration record
// ============================================================================

export const PackageSelectionRecordSchema = z.object({
  packages: z.array(z.string()).default([]),
  tasks: z.array(z.string()).default([]),
});

export type PackageSelectionRecord = z.infer<typeof PackageSelectionRecordSchema>;

export const BuildConfigRecordSchema = z.object({
  architecture: ArchitectureSchema,
  mirror: z.string().min(1, 'A Debian mirror must be provided'),
  components: z.array(z.string()).min(1, 'At least one repository component must be selected'),
  variant: VariantSchema,
  hostname: z.string().min(1, 'Hostname cannot be empty'),
  username: z.string().min(1, 'Username cannot be empty'),
  enable_secure_boot: z.boolean(),
  firmware_packages: z.array(z.string()),
  package_selection: PackageSelectionRecordSchema,
  workdir: z.string().min(1, 'Working directory cannot be empty'),
  simulate: z.boolean(),
});

export type BuildConfigRecord = z.infer<typeof BuildConfigRecordSchema>;

// ============================================================================
// Build steps and results
// ============================================================================

export const BuildStepIdSchema = z.enum([
  'prepare-workdir',
  'bootstrap-rootfs',
  'write-hostname',
  'install-base',
  'configure-image',
  'configure-packages',
  'build-image',
  'copy-artifact',
]);

export type BuildStepId = z.infer<typeof BuildStepIdSchema>;

export const ExecutionModeSchema = z.enum(['simulated', 'real']);
export type ExecutionMode = z.infer<typeof ExecutionModeSchema>;

export const BuildFailureSchema = z.object({
  index: z.number().int().min(1),
  command: z.string(),
  exitCode: z.number().int(),
});

export type BuildFailure = z.infer<typeof BuildFailureSchema>;

export interface BuildResult {
  readonly commands: readonly string[];
  readonly logPath: string;
  readonly success: boolean;
  readonly mode: ExecutionMode;
  readonly failure?: BuildFailure;
}
