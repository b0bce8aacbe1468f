/**
 * NASA seven-coefficient polynomial types.
 *
 * @packageDocumentation
 */

import type { ScalarQuantity } from '../units/index.js';

/**
 * Seven coefficients `a1..a7` valid on `[Tmin, Tmax]`:
 *
 * - `Cp/R = a1 + a2 T + a3 T² + a4 T³ + a5 T⁴`
 * - `H/RT = a1 + a2 T/2 + a3 T²/3 + a4 T³/4 + a5 T⁴/5 + a6/T`
 * - `S/R = a1 ln T + a2 T + a3 T²/2 + a4 T³/3 + a5 T⁴/4 + a7`
 */
export interface NASAPolynomial {
  readonly coeffs: readonly number[];
  readonly Tmin: ScalarQuantity;
  readonly Tmax: ScalarQuantity;
}

/**
 * Two polynomials joined at Tmid.
 */
export interface NASAModel {
  /** Low-temperature polynomial first, then high. */
  readonly polynomials: readonly [NASAPolynomial, NASAPolynomial];
  readonly Tmin: ScalarQuantity;
  readonly Tmax: ScalarQuantity;
  readonly E0: ScalarQuantity;
  readonly Cp0: ScalarQuantity;
  readonly CpInf: ScalarQuantity;
}

/**
 * Target functions of temperature (K), in J/(mol·K), J/mol and J/(mol·K).
 */
export interface ThermoFunctions {
  Cp(temperature: number): number;
  H(temperature: number): number;
  S(temperature: number): number;
}

/**
 * Fitter settings. Temperatures are K.
 */
export interface NASAFitOptions {
  readonly Tmin: number;
  readonly Tmax: number;
  /** Joining temperature used when `searchTmid` is false. */
  readonly Tmid: number;
  readonly searchTmid: boolean;
  /** Uniform samples per range, endpoints included. */
  readonly samplesPerRange: number;
  /** Largest accepted RMS of the dimensionless deviations. */
  readonly residualTolerance: number;
  /** Largest accepted |ΔCp/R|, |ΔH/RT|, |ΔS/R| at Tmid. */
  readonly continuityTolerance: number;
  /** Candidates within this residual of the best are tie-broken toward the range midpoint. */
  readonly tieTolerance: number;
  readonly candidateCount: number;
  /** Budget of the golden-section refinement. */
  readonly maxIterations: number;
  /** Bracket width at which the refinement stops, K. */
  readonly tmidTolerance: number;
  /** Temperature where H and S are matched exactly. */
  readonly referenceTemperature: number;
}

export const DEFAULT_FIT_OPTIONS: NASAFitOptions = {
  Tmin: 10,
  Tmax: 3000,
  Tmid: 1000,
  searchTmid: false,
  samplesPerRange: 40,
  residualTolerance: 0.1,
  continuityTolerance: 1e-6,
  tieTolerance: 1e-4,
  candidateCount: 25,
  maxIterations: 60,
  tmidTolerance: 0.1,
  referenceTemperature: 298.15,
};

/**
 * Values copied onto the model unchanged.
 */
export interface ModelLimits {
  readonly E0: ScalarQuantity;
  readonly Cp0: ScalarQuantity;
  readonly CpInf: ScalarQuantity;
}

/**
 * Largest absolute deviation of each dimensionless function over the samples.
 */
export interface FitDeviation {
  readonly Cp: number;
  readonly H: number;
  readonly S: number;
}

export interface NASAFitResult {
  readonly model: NASAModel;
  readonly Tmid: number;
  /** RMS of `ΔCp/R`, `ΔH/RT`, `ΔS/R` over all samples. */
  readonly residual: number;
  readonly maxDeviation: FitDeviation;
  /** Dimensionless jumps of Cp, H and S at Tmid. */
  readonly discontinuity: FitDeviation;
}
