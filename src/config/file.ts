/**
 * Config file loading and saving.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { BuildConfig } from './index.js';
import { ConfigValidationError, NotFoundError } from '../runner/errors.js';

const MAX_CONFIG_BYTES = 1024 * 1024;

/**
 * Parse JSON with a size limit, returning an error message instead of
 * throwing.
 */
export function safeJsonParse(
  input: string,
  maxSize = MAX_CONFIG_BYTES,
): { success: true; data: unknown } | { success: false; error: string } {
  if (input.length > maxSize) {
    return { success: false, error: `Input exceeds maximum size of ${maxSize} bytes` };
  }

  try {
    const data: unknown = JSON.parse(input);
    return { success: true, data };
  } catch (err) {
    const message = err instanceof Error ? err.message : 'Invalid JSON';
    return { success: false, error: `JSON parse error: ${message}` };
  }
}

export function serializeConfig(config: BuildConfig): string {
  return JSON.stringify(config.toRecord(), null, 2) + '\n';
}

export function loadConfigFile(configPath: string): BuildConfig {
  const resolved = resolve(configPath);
  if (!existsSync(resolved)) {
    throw new NotFoundError(`Config file not found: ${resolved}`);
  }

  const parsed = safeJsonParse(readFileSync(resolved, 'utf-8'));
  if (!parsed.success) {
    throw new ConfigValidationError([`${resolved}: ${parsed.error}`]);
  }

  return BuildConfig.fromRecord(parsed.data);
}

/**
 * Write the configuration record as indented JSON, replacing any
 * existing file. Returns the path as given.
 */
export function saveConfigFile(config: BuildConfig, destination: string): string {
  mkdirSync(dirname(resolve(destination)), { recursive: true });
  writeFileSync(destination, serializeConfig(config), 'utf-8');
  return destination;
}
