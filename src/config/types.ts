/**
 * Configuration types for species-thermo.toml parsing.
 *
 * Field names follow the TOML keys.
 *
 * @packageDocumentation
 */

/**
 * Temperature range of the thermo grid and the NASA model, K.
 */
export interface TemperatureConfig {
  /** Lower end of the fitted range. */
  t_min: number;
  /** Upper end of the fitted range. */
  t_max: number;
  /** Temperature where H and S are matched exactly (default: 298.15). */
  reference: number;
}

/**
 * NASA polynomial fitting.
 */
export interface FitConfig {
  /** Joining temperature when no search is made, K. */
  t_mid: number;
  /** Whether to search for the Tmid with the smallest residual. */
  search_t_mid: boolean;
  /** Samples per polynomial range. */
  samples_per_range: number;
  /** Largest accepted RMS of the dimensionless deviations. */
  residual_tolerance: number;
  /** Largest accepted jump of Cp/R, H/RT or S/R at Tmid. */
  continuity_tolerance: number;
  /** Residual difference under which Tmid candidates count as tied. */
  tie_tolerance: number;
  /** Tmid candidates of the search grid. */
  candidate_count: number;
  /** Iteration budget of the Tmid refinement. */
  max_iterations: number;
  /** Bracket width at which the Tmid refinement stops, K. */
  t_mid_tolerance: number;
}

/**
 * Numerical settings for hindered rotors.
 */
export interface RotorConfig {
  /** Largest |m| of the quantum rotor basis. */
  max_basis: number;
  /** Grid size of classical configuration integrals. */
  quadrature_points: number;
  /** Sweep budget of the eigenvalue solver. */
  max_jacobi_sweeps: number;
}

/**
 * Batch processing.
 */
export interface BatchConfig {
  /** Species processed at the same time. */
  concurrency: number;
}

/**
 * Log output.
 */
export interface LoggingConfig {
  /** Whether debug entries are written. */
  debug: boolean;
}

/**
 * Complete configuration object parsed from species-thermo.toml.
 */
export interface Config {
  temperature: TemperatureConfig;
  fit: FitConfig;
  rotors: RotorConfig;
  batch: BatchConfig;
  logging: LoggingConfig;
}

/**
 * Raw section tables as read from TOML or the environment, before typing.
 */
export type ConfigTables = Readonly<Record<string, unknown>>;
