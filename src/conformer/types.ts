/**
 * Conformer and degree-of-freedom types.
 *
 * @packageDocumentation
 */

import type { ArrayQuantity, MatrixQuantity, ScalarQuantity } from '../units/index.js';

/**
 * Ideal-gas translation of the whole molecule.
 */
export interface Translation {
  readonly kind: 'translation';
  /** Molecular mass. */
  readonly mass: ScalarQuantity;
  /** Quantum translation is not supported; kept so records can ask for it. */
  readonly quantum: boolean;
}

/**
 * Rigid rotation of a nonlinear molecule (three principal moments).
 */
export interface NonlinearRotor {
  readonly kind: 'nonlinear-rotor';
  readonly inertia: ArrayQuantity;
  readonly symmetry: number;
  readonly quantum: boolean;
}

/**
 * Rigid rotation of a linear molecule.
 */
export interface LinearRotor {
  readonly kind: 'linear-rotor';
  readonly inertia: ScalarQuantity;
  readonly symmetry: number;
  readonly quantum: boolean;
}

/**
 * Set of independent harmonic vibrations.
 */
export interface HarmonicOscillator {
  readonly kind: 'harmonic-oscillator';
  /** Wavenumbers (inverse length). */
  readonly frequencies: ArrayQuantity;
  /** `false` selects the classical oscillator `q = kT/hν`. */
  readonly quantum: boolean;
}

/**
 * Torsional potential as a Fourier series,
 * `V(φ) = Σ_k (A_k cos kφ + B_k sin kφ) − Σ_k A_k`, k = 1..K.
 * Row 0 holds A, row 1 holds B (energy units).
 */
export interface FourierPotential {
  readonly kind: 'fourier';
  readonly coefficients: MatrixQuantity;
}

/**
 * Torsional potential `V(φ) = V0/2 · (1 − cos σφ)`.
 */
export interface CosinePotential {
  readonly kind: 'cosine';
  readonly barrier: ScalarQuantity;
}

export type TorsionalPotential = FourierPotential | CosinePotential;

/**
 * How a hindered rotor's partition function is computed.
 *
 * - `quantum`: exact 1-D Schrödinger energy levels
 * - `semiclassical`: configuration integral with the Pitzer–Gwinn correction
 * - `classical`: configuration integral alone
 */
export type RotorTreatment = 'quantum' | 'semiclassical' | 'classical';

/**
 * One-dimensional hindered internal rotation.
 */
export interface HinderedRotor {
  readonly kind: 'hindered-rotor';
  /** Reduced moment of inertia. */
  readonly inertia: ScalarQuantity;
  readonly symmetry: number;
  readonly potential: TorsionalPotential;
  /** Harmonic torsional frequency; derived from the potential when absent. */
  readonly frequency?: ScalarQuantity;
  readonly treatment: RotorTreatment;
}

/**
 * A molecular degree of freedom, discriminated on `kind`.
 */
export type Mode = Translation | NonlinearRotor | LinearRotor | HarmonicOscillator | HinderedRotor;

export type ModeKind = Mode['kind'];

/**
 * Atom positions with their masses and atomic numbers, index-aligned.
 */
export interface Geometry {
  /** One [x, y, z] row per atom. */
  readonly coordinates: MatrixQuantity;
  readonly mass: ArrayQuantity;
  /** Atomic numbers (dimensionless). */
  readonly number: ArrayQuantity;
}

/**
 * A molecular conformation and its degrees of freedom.
 */
export interface Conformer {
  /** Ground-state energy including zero-point energy. */
  readonly E0: ScalarQuantity;
  readonly modes: readonly Mode[];
  readonly spinMultiplicity: number;
  readonly opticalIsomers: number;
  readonly geometry?: Geometry;
}
