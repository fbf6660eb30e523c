/**
 * Build configuration value objects
 *
 * A BuildConfig is never observably invalid: every way of obtaining one
 * (create, fromRecord, withUpdates, withLists) goes through the record
 * schema and throws ConfigValidationError instead of returning an
 * invalid instance. Instances are frozen; edits return new instances.
 */

import type {
  Architecture,
  BuildConfigRecord,
  PackageSelectionRecord,
  Variant,
} from '../contracts/index.js';
import { BuildConfigRecordSchema, PackageSelectionRecordSchema } from '../contracts/index.js';
import { ConfigValidationError } from '../runner/errors.js';
import type { ZodIssue } from 'zod';

/**
 * Split comma separated text, trimming tokens and dropping empty ones.
 */
export function splitCsv(text: string): string[] {
  return text
    .split(',')
    .map((token) => token.trim())
    .filter((token) => token.length > 0);
}

// ============================================================================
// PackageSelection
// ============================================================================

/**
 * Extra packages and tasksel tasks to install into the image.
 */
export class PackageSelection {
  readonly packages: readonly string[];
  readonly tasks: readonly string[];

  constructor(packages: readonly string[] = [], tasks: readonly string[] = []) {
    this.packages = Object.freeze([...packages]);
    this.tasks = Object.freeze([...tasks]);
    Object.freeze(this);
  }

  static fromCsv(packageCsv = '', taskCsv = ''): PackageSelection {
    return new PackageSelection(splitCsv(packageCsv), splitCsv(taskCsv));
  }

  static fromRecord(record: unknown): PackageSelection {
    const parsed = PackageSelectionRecordSchema.safeParse(record);
    if (!parsed.success) {
      throw new ConfigValidationError(parsed.error.errors.map(formatIssue));
    }
    return new PackageSelection(parsed.data.packages, parsed.data.tasks);
  }

  isEmpty(): boolean {
    return this.packages.length === 0 && this.tasks.length === 0;
  }

  /**
   * Render the selection as live-build flags, one argv token per flag.
   */
  toFlags(): string[] {
    const flags: string[] = [];
    if (this.packages.length > 0) {
      flags.push(`--include=${this.packages.join(' ')}`);
    }
    for (const task of this.tasks) {
      flags.push(`--tasksel=${task}`);
    }
    return flags;
  }

  withPackages(packages: readonly string[]): PackageSelection {
    return new PackageSelection(packages, this.tasks);
  }

  withTasks(tasks: readonly string[]): PackageSelection {
    return new PackageSelection(this.packages, tasks);
  }

  toRecord(): PackageSelectionRecord {
    return { packages: [...this.packages], tasks: [...this.tasks] };
  }

  equals(other: PackageSelection): boolean {
    return sameList(this.packages, other.packages) && sameList(this.tasks, other.tasks);
  }
}

// ============================================================================
// BuildConfig
// ============================================================================

export interface BuildConfigFields {
  readonly architecture: Architecture;
  readonly mirror: string;
  readonly components: readonly string[];
  readonly variant: Variant;
  readonly hostname: string;
  readonly username: string;
  readonly enableSecureBoot: boolean;
  readonly firmwarePackages: readonly string[];
  readonly packageSelection: PackageSelection;
  readonly workdir: string;
  readonly simulate: boolean;
}

/**
 * Field edits arrive from user input, so the enum fields are plain text
 * until validation accepts them.
 */
export type BuildConfigUpdate = Partial<Omit<BuildConfigFields, 'architecture' | 'variant'>> & {
  readonly architecture?: string;
  readonly variant?: string;
};

type BuildConfigInput = Omit<BuildConfigFields, 'architecture' | 'variant'> & {
  readonly architecture: string;
  readonly variant: string;
};

export const DEFAULT_BUILD_CONFIG: BuildConfigFields = {
  architecture: 'amd64',
  mirror: 'http://deb.debian.org/debian',
  components: Object.freeze(['main', 'contrib', 'non-free-firmware']),
  variant: 'standard',
  hostname: 'sid-builder',
  username: 'sid',
  enableSecureBoot: true,
  firmwarePackages: Object.freeze(['firmware-linux']),
  packageSelection: new PackageSelection(),
  workdir: './sid-build',
  simulate: true,
};

export class BuildConfig implements BuildConfigFields {
  readonly architecture: Architecture;
  readonly mirror: string;
  readonly components: readonly string[];
  readonly variant: Variant;
  readonly hostname: string;
  readonly username: string;
  readonly enableSecureBoot: boolean;
  readonly firmwarePackages: readonly string[];
  readonly packageSelection: PackageSelection;
  readonly workdir: string;
  readonly simulate: boolean;

  private constructor(record: BuildConfigRecord) {
    this.architecture = record.architecture;
    this.mirror = record.mirror;
    this.components = Object.freeze([...record.components]);
    this.variant = record.variant;
    this.hostname = record.hostname;
    this.username = record.username;
    this.enableSecureBoot = record.enable_secure_boot;
    this.firmwarePackages = Object.freeze([...record.firmware_packages]);
    this.packageSelection = new PackageSelection(
      record.package_selection.packages,
      record.package_selection.tasks,
    );
    this.workdir = record.workdir;
    this.simulate = record.simulate;
    Object.freeze(this);
  }

  static create(fields: BuildConfigUpdate = {}): BuildConfig {
    return BuildConfig.fromInput({ ...DEFAULT_BUILD_CONFIG, ...fields });
  }

  static defaults(): BuildConfig {
    return BuildConfig.create();
  }

  /**
   * Validate a plain record (as produced by `toRecord` or read from a
   * config file). Keys missing from the record take their defaults.
   */
  static fromRecord(data: unknown): BuildConfig {
    const input = isPlainObject(data) ? { ...toRecord(DEFAULT_BUILD_CONFIG), ...data } : data;
    return BuildConfig.parse(input);
  }

  private static fromInput(input: BuildConfigInput): BuildConfig {
    return BuildConfig.parse(toRecord(input));
  }

  private static parse(input: unknown): BuildConfig {
    const result = BuildConfigRecordSchema.safeParse(input);
    if (!result.success) {
      throw new ConfigValidationError(result.error.errors.map(formatIssue));
    }
    return new BuildConfig(result.data);
  }

  withUpdates(fields: BuildConfigUpdate): BuildConfig {
    return BuildConfig.fromInput({ ...this.fields(), ...fields });
  }

  /**
   * Replace the repository components and/or firmware packages; an
   * omitted list is kept as it is.
   */
  withLists(lists: { components?: readonly string[]; firmwarePackages?: readonly string[] }): BuildConfig {
    return this.withUpdates({
      components: lists.components ?? this.components,
      firmwarePackages: lists.firmwarePackages ?? this.firmwarePackages,
    });
  }

  componentsCsv(): string {
    return this.components.join(', ');
  }

  firmwareCsv(): string {
    return this.firmwarePackages.join(', ');
  }

  fields(): BuildConfigFields {
    return {
      architecture: this.architecture,
      mirror: this.mirror,
      components: this.components,
      variant: this.variant,
      hostname: this.hostname,
      username: this.username,
      enableSecureBoot: this.enableSecureBoot,
      firmwarePackages: this.firmwarePackages,
      packageSelection: this.packageSelection,
      workdir: this.workdir,
      simulate: this.simulate,
    };
  }

  toRecord(): BuildConfigRecord {
    return {
      ...toRecord(this),
      architecture: this.architecture,
      variant: this.variant,
    };
  }

  equals(other: BuildConfig): boolean {
    return JSON.stringify(this.toRecord()) === JSON.stringify(other.toRecord());
  }
}

// ============================================================================
// Helpers
// ============================================================================

function toRecord(input: BuildConfigInput): Omit<BuildConfigRecord, 'architecture' | 'variant'> & {
  architecture: string;
  variant: string;
} {
  return {
    architecture: input.architecture,
    mirror: input.mirror,
    components: [...input.components],
    variant: input.variant,
    hostname: input.hostname,
    username: input.username,
    enable_secure_boot: input.enableSecureBoot,
    firmware_packages: [...input.firmwarePackages],
    package_selection: input.packageSelection.toRecord(),
    workdir: input.workdir,
    simulate: input.simulate,
  };
}

function formatIssue(issue: ZodIssue): string {
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function sameList(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((item, i) => item === b[i]);
}
