/**
 * Configuration module for species-thermo.toml parsing and validation.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

export {
  ConfigParseError,
  getDefaultConfig,
  loadConfigFile,
  mergeConfigTables,
  parseConfig,
} from './parser.js';
export type {
  BatchConfig,
  Config,
  ConfigTables,
  FitConfig,
  LoggingConfig,
  RotorConfig,
  TemperatureConfig,
} from './types.js';
export {
  DEFAULT_BATCH,
  DEFAULT_CONFIG,
  DEFAULT_FIT,
  DEFAULT_LOGGING,
  DEFAULT_ROTORS,
  DEFAULT_TEMPERATURE,
} from './defaults.js';
export { ConfigValidationError, validateConfig, assertConfigValid } from './validator.js';
export type { ValidationError, ValidationResult } from './validator.js';
export {
  EnvCoercionError,
  readEnvOverrides,
  applyEnvOverrides,
  getEnvVarDocumentation,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
export { resolveConfig, type ResolveConfigOptions } from './resolve.js';
