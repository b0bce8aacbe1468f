/**
 * The full precedence chain: defaults, then the file, then the environment.
 *
 * @packageDocumentation
 */

import { applyEnvOverrides, type EnvRecord } from './env.js';
import { getDefaultConfig, loadConfigFile } from './parser.js';
import type { Config } from './types.js';
import { assertConfigValid } from './validator.js';

export interface ResolveConfigOptions {
  /** species-thermo.toml to read; defaults only when absent. */
  readonly filePath?: string;
  /** Defaults to process.env. */
  readonly env?: EnvRecord;
}

/**
 * Builds and validates the effective configuration.
 *
 * @throws ConfigParseError, EnvCoercionError or ConfigValidationError.
 */
export async function resolveConfig(options: ResolveConfigOptions = {}): Promise<Config> {
  const base = options.filePath === undefined ? getDefaultConfig() : await loadConfigFile(options.filePath);
  const config = applyEnvOverrides(base, options.env ?? process.env);
  assertConfigValid(config);
  return config;
}
