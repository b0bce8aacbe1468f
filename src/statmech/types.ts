/**
 * Partition-function evaluation types.
 *
 * @packageDocumentation
 */

/**
 * Natural log of a partition function and its analytic temperature
 * derivatives at constant volume (T in K).
 */
export interface PartitionTerms {
  readonly lnQ: number;
  readonly dlnQdT: number;
  readonly d2lnQdT2: number;
}

/**
 * Numerical settings for hindered rotors.
 */
export interface RotorOptions {
  /** Largest |m| of the Fourier basis for quantum rotors. */
  readonly maxBasis: number;
  /** Uniform grid size for classical configuration integrals of Fourier potentials. */
  readonly quadraturePoints: number;
  /** Sweep budget of the Jacobi eigenvalue solver. */
  readonly maxJacobiSweeps: number;
  /**
   * Lowest temperature (K) the quantum basis is sized for; set to the top of
   * the temperature range so one set of levels serves the whole range.
   */
  readonly basisTemperature: number;
}

export const DEFAULT_ROTOR_OPTIONS: RotorOptions = {
  maxBasis: 120,
  quadraturePoints: 720,
  maxJacobiSweeps: 60,
  basisTemperature: 3000,
};

export const ZERO_TERMS: PartitionTerms = { lnQ: 0, dlnQdT: 0, d2lnQdT2: 0 };

/**
 * Sum of log terms, i.e. the terms of the product of partition functions.
 */
export function addTerms(a: PartitionTerms, b: PartitionTerms): PartitionTerms {
  return {
    lnQ: a.lnQ + b.lnQ,
    dlnQdT: a.dlnQdT + b.dlnQdT,
    d2lnQdT2: a.d2lnQdT2 + b.d2lnQdT2,
  };
}
