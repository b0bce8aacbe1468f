/**
 * TOML configuration parser for species-thermo.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { safeReadFile } from '../utils/safe-fs.js';
import { DEFAULT_CONFIG } from './defaults.js';
import type {
  BatchConfig,
  Config,
  ConfigTables,
  FitConfig,
  LoggingConfig,
  RotorConfig,
  TemperatureConfig,
} from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

type Table = Readonly<Record<string, unknown>>;

function isTable(value: unknown): value is Table {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Returns the named section table, or `undefined` when it is absent.
 *
 * @throws ConfigParseError if the key holds something other than a table.
 */
function section(tables: ConfigTables, name: string): Table | undefined {
  const value = tables[name];
  if (value === undefined) {
    return undefined;
  }
  if (!isTable(value)) {
    throw new ConfigParseError(`Invalid type for '${name}': expected a table`);
  }
  return value;
}

/**
 * Reads a numeric field, falling back when absent.
 *
 * @throws ConfigParseError if the value is not a number.
 */
function numberField(raw: Table | undefined, path: string, field: string, fallback: number): number {
  if (raw === undefined || !(field in raw)) {
    return fallback;
  }
  const value = raw[field];
  if (typeof value !== 'number') {
    throw new ConfigParseError(`Invalid type for '${path}.${field}': expected number, got ${typeof value}`);
  }
  return value;
}

/**
 * Reads a boolean field, falling back when absent.
 *
 * @throws ConfigParseError if the value is not a boolean.
 */
function booleanField(raw: Table | undefined, path: string, field: string, fallback: boolean): boolean {
  if (raw === undefined || !(field in raw)) {
    return fallback;
  }
  const value = raw[field];
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(`Invalid type for '${path}.${field}': expected boolean, got ${typeof value}`);
  }
  return value;
}

function parseTemperature(raw: Table | undefined, base: TemperatureConfig): TemperatureConfig {
  return {
    t_min: numberField(raw, 'temperature', 't_min', base.t_min),
    t_max: numberField(raw, 'temperature', 't_max', base.t_max),
    reference: numberField(raw, 'temperature', 'reference', base.reference),
  };
}

function parseFit(raw: Table | undefined, base: FitConfig): FitConfig {
  return {
    t_mid: numberField(raw, 'fit', 't_mid', base.t_mid),
    search_t_mid: booleanField(raw, 'fit', 'search_t_mid', base.search_t_mid),
    samples_per_range: numberField(raw, 'fit', 'samples_per_range', base.samples_per_range),
    residual_tolerance: numberField(raw, 'fit', 'residual_tolerance', base.residual_tolerance),
    continuity_tolerance: numberField(raw, 'fit', 'continuity_tolerance', base.continuity_tolerance),
    tie_tolerance: numberField(raw, 'fit', 'tie_tolerance', base.tie_tolerance),
    candidate_count: numberField(raw, 'fit', 'candidate_count', base.candidate_count),
    max_iterations: numberField(raw, 'fit', 'max_iterations', base.max_iterations),
    t_mid_tolerance: numberField(raw, 'fit', 't_mid_tolerance', base.t_mid_tolerance),
  };
}

function parseRotors(raw: Table | undefined, base: RotorConfig): RotorConfig {
  return {
    max_basis: numberField(raw, 'rotors', 'max_basis', base.max_basis),
    quadrature_points: numberField(raw, 'rotors', 'quadrature_points', base.quadrature_points),
    max_jacobi_sweeps: numberField(raw, 'rotors', 'max_jacobi_sweeps', base.max_jacobi_sweeps),
  };
}

function parseBatch(raw: Table | undefined, base: BatchConfig): BatchConfig {
  return { concurrency: numberField(raw, 'batch', 'concurrency', base.concurrency) };
}

function parseLogging(raw: Table | undefined, base: LoggingConfig): LoggingConfig {
  return { debug: booleanField(raw, 'logging', 'debug', base.debug) };
}

/**
 * Layers raw section tables over a base configuration. Fields missing from
 * the tables keep their base value; unknown sections and fields are ignored.
 *
 * @param tables - Section name to table, as TOML yields them.
 * @param base - Values for everything the tables leave out.
 * @throws ConfigParseError for a field of the wrong type.
 */
export function mergeConfigTables(tables: ConfigTables, base: Config = DEFAULT_CONFIG): Config {
  return {
    temperature: parseTemperature(section(tables, 'temperature'), base.temperature),
    fit: parseFit(section(tables, 'fit'), base.fit),
    rotors: parseRotors(section(tables, 'rotors'), base.rotors),
    batch: parseBatch(section(tables, 'batch'), base.batch),
    logging: parseLogging(section(tables, 'logging'), base.logging),
  };
}

/**
 * Parses a TOML string into a typed Config object.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @returns Configuration object with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or invalid field types.
 *
 * @example
 * ```typescript
 * import { parseConfig } from './config/parser.js';
 *
 * const config = parseConfig(`
 * [fit]
 * search_t_mid = true
 * `);
 * console.log(config.fit.search_t_mid); // true
 * console.log(config.fit.t_mid); // 1000
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: ConfigTables;
  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const tomlError = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${tomlError.message}`, tomlError);
  }
  return mergeConfigTables(parsed);
}

/**
 * Reads and parses a configuration file.
 *
 * @param filePath - Path to species-thermo.toml.
 * @throws ConfigParseError if the file cannot be read or parsed.
 */
export async function loadConfigFile(filePath: string): Promise<Config> {
  let content: string;
  try {
    content = await safeReadFile(filePath);
  } catch (error) {
    const readError = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Cannot read configuration file '${filePath}': ${readError.message}`, readError);
  }
  return parseConfig(content);
}

/**
 * Returns a copy of the default configuration.
 */
export function getDefaultConfig(): Config {
  return mergeConfigTables({});
}
