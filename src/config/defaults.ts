/**
 * Default configuration values for species-thermo.toml.
 *
 * @packageDocumentation
 */

import type { BatchConfig, Config, FitConfig, LoggingConfig, RotorConfig, TemperatureConfig } from './types.js';

/**
 * Default fitted range: 10–3000 K, referenced at 298.15 K.
 */
export const DEFAULT_TEMPERATURE: TemperatureConfig = {
  t_min: 10,
  t_max: 3000,
  reference: 298.15,
};

export const DEFAULT_FIT: FitConfig = {
  t_mid: 1000,
  search_t_mid: false,
  samples_per_range: 40,
  residual_tolerance: 0.1,
  continuity_tolerance: 1e-6,
  tie_tolerance: 1e-4,
  candidate_count: 25,
  max_iterations: 60,
  t_mid_tolerance: 0.1,
};

export const DEFAULT_ROTORS: RotorConfig = {
  max_basis: 120,
  quadrature_points: 720,
  max_jacobi_sweeps: 60,
};

export const DEFAULT_BATCH: BatchConfig = {
  concurrency: 4,
};

/**
 * Default logging configuration (debug off).
 */
export const DEFAULT_LOGGING: LoggingConfig = {
  debug: false,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  temperature: DEFAULT_TEMPERATURE,
  fit: DEFAULT_FIT,
  rotors: DEFAULT_ROTORS,
  batch: DEFAULT_BATCH,
  logging: DEFAULT_LOGGING,
};
