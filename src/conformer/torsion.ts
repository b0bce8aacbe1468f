/**
 * Torsional potential helpers shared by the partition-function evaluator and
 * the hindered-rotor to harmonic-oscillator substitution.
 *
 * Energies are J/mol and angles radians.
 *
 * @packageDocumentation
 */

import { scalar, type ScalarQuantity } from '../units/index.js';
import { NA, c } from '../units/constants.js';
import { invalidParameter } from './modes.js';
import type { HinderedRotor } from './types.js';

/**
 * Fourier potential in J/mol: cosine terms, sine terms and their offset.
 */
export interface FourierTerms {
  readonly cosines: readonly number[];
  readonly sines: readonly number[];
}

/**
 * Returns the rotor's potential as Fourier terms, k = 1..K, in J/mol.
 * A cosine potential `V0/2 (1 − cos σφ)` has the single term `A_σ = −V0/2`.
 */
export function fourierTerms(rotor: HinderedRotor): FourierTerms {
  const potential = rotor.potential;
  if (potential.kind === 'fourier') {
    const [cosines = [], sines = []] = potential.coefficients.si();
    return { cosines, sines };
  }
  const cosines = new Array<number>(rotor.symmetry).fill(0);
  cosines[rotor.symmetry - 1] = -potential.barrier.si() / 2;
  return { cosines, sines: new Array<number>(rotor.symmetry).fill(0) };
}

/**
 * Evaluates `V(φ)` in J/mol; `V(0) = 0`.
 */
export function potentialAt(terms: FourierTerms, phi: number): number {
  let v = 0;
  terms.cosines.forEach((a, index) => {
    const k = index + 1;
    v += a * (Math.cos(k * phi) - 1) + (terms.sines[index] ?? 0) * Math.sin(k * phi);
  });
  return v;
}

/**
 * Curvature `V''(0)` in J/(mol·rad²).
 */
export function potentialCurvature(rotor: HinderedRotor): number {
  const potential = rotor.potential;
  if (potential.kind === 'cosine') {
    return (potential.barrier.si() * rotor.symmetry * rotor.symmetry) / 2;
  }
  const { cosines } = fourierTerms(rotor);
  return -cosines.reduce((sum, a, index) => sum + (index + 1) * (index + 1) * a, 0);
}

/**
 * Highest point of the potential over a full turn, J/mol.
 *
 * @param samples - Grid size used for Fourier potentials.
 */
export function potentialMaximum(rotor: HinderedRotor, samples = 360): number {
  const potential = rotor.potential;
  if (potential.kind === 'cosine') {
    return potential.barrier.si();
  }
  const terms = fourierTerms(rotor);
  let max = 0;
  for (let i = 0; i < samples; i++) {
    max = Math.max(max, potentialAt(terms, (2 * Math.PI * i) / samples));
  }
  return max;
}

/**
 * Harmonic torsional frequency in cm^-1: the rotor's own `frequency` when
 * given, otherwise `√(V''(0)/I) / 2πc`.
 *
 * @throws {ThermoEngineError} `INVALID_MODE_PARAMETER` when the potential has
 * no positive curvature at φ = 0 and no frequency is given.
 */
export function torsionalFrequency(rotor: HinderedRotor, field = 'hindered-rotor'): ScalarQuantity {
  if (rotor.frequency !== undefined) {
    return rotor.frequency.convert('cm^-1');
  }
  const curvature = potentialCurvature(rotor);
  if (!(curvature > 0)) {
    throw invalidParameter(
      `${field}.potential`,
      'has no positive curvature at its minimum; give a frequency',
      curvature
    );
  }
  const omega = Math.sqrt(curvature / NA / rotor.inertia.si());
  return scalar(omega / (2 * Math.PI * c * 100), 'cm^-1');
}
