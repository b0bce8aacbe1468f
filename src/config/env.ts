/**
 * Environment variable overrides for configuration.
 *
 * SPECIES_THERMO_<SECTION>_<FIELD> overrides config.<section>.<field>.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import { mergeConfigTables } from './parser.js';
import type { Config, ConfigTables } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

interface EnvMapping {
  readonly section: keyof Config;
  readonly field: string;
  readonly type: 'number' | 'boolean';
  readonly description: string;
}

const ENV_VAR_MAPPINGS: Readonly<Record<string, EnvMapping>> = {
  SPECIES_THERMO_DEBUG: {
    section: 'logging',
    field: 'debug',
    type: 'boolean',
    description: 'Emit debug log lines (shortcut for SPECIES_THERMO_LOGGING_DEBUG)',
  },
  SPECIES_THERMO_LOGGING_DEBUG: {
    section: 'logging',
    field: 'debug',
    type: 'boolean',
    description: 'Emit debug log lines',
  },

  SPECIES_THERMO_TEMPERATURE_T_MIN: {
    section: 'temperature',
    field: 't_min',
    type: 'number',
    description: 'Lower end of the fitted range, K',
  },
  SPECIES_THERMO_TEMPERATURE_T_MAX: {
    section: 'temperature',
    field: 't_max',
    type: 'number',
    description: 'Upper end of the fitted range, K',
  },
  SPECIES_THERMO_TEMPERATURE_REFERENCE: {
    section: 'temperature',
    field: 'reference',
    type: 'number',
    description: 'Temperature where H and S are matched exactly, K',
  },

  SPECIES_THERMO_FIT_T_MID: {
    section: 'fit',
    field: 't_mid',
    type: 'number',
    description: 'Joining temperature of the two polynomials, K',
  },
  SPECIES_THERMO_FIT_SEARCH_T_MID: {
    section: 'fit',
    field: 'search_t_mid',
    type: 'boolean',
    description: 'Search for the joining temperature with the smallest residual',
  },
  SPECIES_THERMO_FIT_SAMPLES_PER_RANGE: {
    section: 'fit',
    field: 'samples_per_range',
    type: 'number',
    description: 'Fitting samples per polynomial range',
  },
  SPECIES_THERMO_FIT_RESIDUAL_TOLERANCE: {
    section: 'fit',
    field: 'residual_tolerance',
    type: 'number',
    description: 'Largest accepted RMS residual of Cp/R',
  },
  SPECIES_THERMO_FIT_CONTINUITY_TOLERANCE: {
    section: 'fit',
    field: 'continuity_tolerance',
    type: 'number',
    description: 'Largest accepted jump of Cp/R, H/RT or S/R at the joining temperature',
  },
  SPECIES_THERMO_FIT_TIE_TOLERANCE: {
    section: 'fit',
    field: 'tie_tolerance',
    type: 'number',
    description: 'Relative residual difference under which search candidates tie',
  },
  SPECIES_THERMO_FIT_CANDIDATE_COUNT: {
    section: 'fit',
    field: 'candidate_count',
    type: 'number',
    description: 'Joining temperatures tried by the coarse search',
  },
  SPECIES_THERMO_FIT_MAX_ITERATIONS: {
    section: 'fit',
    field: 'max_iterations',
    type: 'number',
    description: 'Iteration limit of the search refinement',
  },
  SPECIES_THERMO_FIT_T_MID_TOLERANCE: {
    section: 'fit',
    field: 't_mid_tolerance',
    type: 'number',
    description: 'Bracket width at which the search refinement stops, K',
  },

  SPECIES_THERMO_ROTORS_MAX_BASIS: {
    section: 'rotors',
    field: 'max_basis',
    type: 'number',
    description: 'Largest Fourier basis of the quantum hindered rotor',
  },
  SPECIES_THERMO_ROTORS_QUADRATURE_POINTS: {
    section: 'rotors',
    field: 'quadrature_points',
    type: 'number',
    description: 'Quadrature points of the classical rotor integral',
  },
  SPECIES_THERMO_ROTORS_MAX_JACOBI_SWEEPS: {
    section: 'rotors',
    field: 'max_jacobi_sweeps',
    type: 'number',
    description: 'Sweep limit of the rotor eigenvalue solver',
  },

  SPECIES_THERMO_BATCH_CONCURRENCY: {
    section: 'batch',
    field: 'concurrency',
    type: 'number',
    description: 'Species evaluated at once by a batch run',
  },
};

/**
 * Coerces a string value to a number.
 *
 * @throws EnvCoercionError if the value is empty or not a number.
 */
function coerceToNumber(value: string, envVar: string): number {
  const trimmed = value.trim();

  if (trimmed === '') {
    throw new EnvCoercionError(envVar, value, 'number', `Empty value for '${envVar}'`);
  }

  const num = Number(trimmed);

  if (Number.isNaN(num)) {
    throw new EnvCoercionError(envVar, value, 'number');
  }

  return num;
}

/**
 * Coerces a string value to a boolean.
 *
 * Accepts 'true', '1', 'yes', 'on' and 'false', '0', 'no', 'off',
 * case-insensitive.
 *
 * @throws EnvCoercionError if the value is none of those.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Section tables with values from environment variables. */
  overrides: ConfigTables;
  /** List of environment variables that were applied. */
  appliedVars: string[];
  /** List of any coercion errors encountered. */
  errors: EnvCoercionError[];
}

/**
 * Reads SPECIES_THERMO_* variables into section tables.
 *
 * With `collectErrors`, coercion failures are returned instead of thrown.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @throws EnvCoercionError unless `collectErrors` is set.
 *
 * @example
 * ```typescript
 * const result = readEnvOverrides({ SPECIES_THERMO_BATCH_CONCURRENCY: '8' });
 * console.log(result.overrides); // { batch: { concurrency: 8 } }
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = process.env,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const sections = new Map<string, Record<string, number | boolean>>();
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      const coerced =
        mapping.type === 'number' ? coerceToNumber(value, envVar) : coerceToBoolean(value, envVar);
      const table = sections.get(mapping.section) ?? {};
      table[mapping.field] = coerced;
      sections.set(mapping.section, table);
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides: Object.fromEntries(sections), appliedVars, errors };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * @param config - The base configuration to override.
 * @param env - The environment object to read from (defaults to process.env).
 * @returns The configuration with environment overrides applied.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = process.env): Config {
  const { overrides } = readEnvOverrides(env);
  return mergeConfigTables(overrides, config);
}

/**
 * Gets documentation for all supported environment variables.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  return Object.fromEntries(
    Object.entries(ENV_VAR_MAPPINGS).map(([envVar, mapping]) => [
      envVar,
      { description: mapping.description, type: mapping.type },
    ])
  );
}
