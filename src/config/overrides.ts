/**
 * Command-line overrides on top of a file or default configuration.
 */

import { BuildConfig, splitCsv } from './index.js';
import { loadConfigFile } from './file.js';

/** Raw option values as commander hands them over. */
export interface ConfigOverrides {
  config?: string;
  arch?: string;
  variant?: string;
  mirror?: string;
  components?: string;
  hostname?: string;
  username?: string;
  firmware?: string;
  packages?: string;
  tasks?: string;
  workdir?: string;
  secureBoot?: boolean;
  simulate?: boolean;
}

/**
 * Apply every override that was given; the result is validated as one
 * edit, so `base` is returned untouched on failure.
 */
export function applyOverrides(base: BuildConfig, overrides: ConfigOverrides): BuildConfig {
  let selection = base.packageSelection;
  if (overrides.packages !== undefined) selection = selection.withPackages(splitCsv(overrides.packages));
  if (overrides.tasks !== undefined) selection = selection.withTasks(splitCsv(overrides.tasks));

  return base.withUpdates({
    ...(overrides.arch !== undefined && { architecture: overrides.arch }),
    ...(overrides.variant !== undefined && { variant: overrides.variant }),
    ...(overrides.mirror !== undefined && { mirror: overrides.mirror }),
    ...(overrides.components !== undefined && { components: splitCsv(overrides.components) }),
    ...(overrides.hostname !== undefined && { hostname: overrides.hostname }),
    ...(overrides.username !== undefined && { username: overrides.username }),
    ...(overrides.firmware !== undefined && { firmwarePackages: splitCsv(overrides.firmware) }),
    ...(overrides.workdir !== undefined && { workdir: overrides.workdir }),
    ...(overrides.secureBoot !== undefined && { enableSecureBoot: overrides.secureBoot }),
    ...(overrides.simulate !== undefined && { simulate: overrides.simulate }),
    packageSelection: selection,
  });
}

export function resolveConfig(overrides: ConfigOverrides): BuildConfig {
  const base = overrides.config ? loadConfigFile(overrides.config) : BuildConfig.defaults();
  return applyOverrides(base, overrides);
}
