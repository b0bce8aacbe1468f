/**
 * Pipeline and batch settings from a parsed configuration.
 *
 * @packageDocumentation
 */

import type { Config } from '../config/index.js';
import { Logger } from '../utils/logger.js';
import type { BatchOptions } from './types.js';

/**
 * Maps the snake_case configuration onto the options the fitter, the rotor
 * evaluator and the batch runner take. Without a logger, one writing to
 * stderr is created with the configured debug setting.
 */
export function pipelineOptionsFromConfig(config: Config, logger?: Logger): BatchOptions {
  const { temperature, fit, rotors } = config;
  return {
    fit: {
      Tmin: temperature.t_min,
      Tmax: temperature.t_max,
      Tmid: fit.t_mid,
      searchTmid: fit.search_t_mid,
      samplesPerRange: fit.samples_per_range,
      residualTolerance: fit.residual_tolerance,
      continuityTolerance: fit.continuity_tolerance,
      tieTolerance: fit.tie_tolerance,
      candidateCount: fit.candidate_count,
      maxIterations: fit.max_iterations,
      tmidTolerance: fit.t_mid_tolerance,
      referenceTemperature: temperature.reference,
    },
    rotors: {
      maxBasis: rotors.max_basis,
      quadraturePoints: rotors.quadrature_points,
      maxJacobiSweeps: rotors.max_jacobi_sweeps,
      basisTemperature: temperature.t_max,
    },
    concurrency: config.batch.concurrency,
    logger: logger ?? new Logger({ component: 'species-thermo', debugMode: config.logging.debug }),
  };
}
