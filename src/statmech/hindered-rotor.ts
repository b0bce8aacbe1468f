/**
 * One-dimensional hindered internal rotation.
 *
 * @packageDocumentation
 */

import { NA, R, c, h, hbar, kB } from '../units/constants.js';
import {
  fourierTerms,
  invalidParameter,
  potentialAt,
  potentialMaximum,
  torsionalFrequency,
  type FourierTerms,
  type HinderedRotor,
} from '../conformer/index.js';
import { besselI0Scaled, besselI1Scaled } from './bessel.js';
import { boltzmannMoments, termsFromMoments } from './boltzmann.js';
import { symmetricEigenvalues } from './eigen.js';
import { addTerms, type PartitionTerms, type RotorOptions } from './types.js';

/** Smallest |m| of the quantum basis. */
const MIN_BASIS = 8;

/** Energy window above the barrier the basis must resolve, in units of RT. */
const BASIS_WINDOW_RT = 40;

const levelCache = new WeakMap<HinderedRotor, Map<string, readonly number[]>>();

/** Rotational constant `ħ²/2I`, J/mol. */
function rotationalConstant(rotor: HinderedRotor): number {
  return ((hbar * hbar) / (2 * rotor.inertia.si())) * NA;
}

/** ln of the free-rotor prefactor `√(2π I kT)/h` and its derivatives. */
function kineticTerms(rotor: HinderedRotor, temperature: number): PartitionTerms {
  return {
    lnQ: Math.log(Math.sqrt(2 * Math.PI * rotor.inertia.si() * kB * temperature) / h) - Math.log(rotor.symmetry),
    dlnQdT: 0.5 / temperature,
    d2lnQdT2: -0.5 / (temperature * temperature),
  };
}

/**
 * Configuration integral `∫ e^{−V/RT} dφ` for `V0/2 (1 − cos σφ)`:
 * `2π e^{−y} I0(y)` with `y = V0/2RT`.
 */
function cosineIntegralTerms(barrier: number, temperature: number): PartitionTerms {
  const y = barrier / (2 * R * temperature);
  if (y === 0) {
    return { lnQ: Math.log(2 * Math.PI), dlnQdT: 0, d2lnQdT2: 0 };
  }
  const i0 = besselI0Scaled(y);
  const ratio = besselI1Scaled(y) / i0;
  const g1 = ratio - 1;
  const g2 = 1 - ratio / y - ratio * ratio;
  const dy = -y / temperature;
  const d2y = (2 * y) / (temperature * temperature);
  return {
    lnQ: Math.log(2 * Math.PI) + Math.log(i0),
    dlnQdT: g1 * dy,
    d2lnQdT2: g2 * dy * dy + g1 * d2y,
  };
}

/**
 * Configuration integral by the rectangle rule on a uniform periodic grid,
 * exact for trigonometric integrands of degree below the grid size.
 */
function quadratureIntegralTerms(terms: FourierTerms, points: number, temperature: number): PartitionTerms {
  const energies: number[] = [];
  for (let i = 0; i < points; i++) {
    energies.push(potentialAt(terms, (2 * Math.PI * i) / points));
  }
  const moments = boltzmannMoments(energies, temperature);
  const integral = termsFromMoments(moments, temperature);
  return { ...integral, lnQ: integral.lnQ + Math.log((2 * Math.PI) / points) };
}

/**
 * ln of the Pitzer–Gwinn factor `x/(1 − e^{−x})`, `x = hcν̃/kT`.
 */
function pitzerGwinnTerms(wavenumber: number, temperature: number): PartitionTerms {
  const x = (h * c * 100 * wavenumber) / (kB * temperature);
  const em = Math.exp(-x);
  const f1 = 1 / x - em / (1 - em);
  const f2 = -1 / (x * x) + em / ((1 - em) * (1 - em));
  const dx = -x / temperature;
  const d2x = (2 * x) / (temperature * temperature);
  return {
    lnQ: Math.log(x) - Math.log1p(-em),
    dlnQdT: f1 * dx,
    d2lnQdT2: f2 * dx * dx + f1 * d2x,
  };
}

function classicalTerms(rotor: HinderedRotor, temperature: number, options: RotorOptions): PartitionTerms {
  const potential = rotor.potential;
  const integral =
    potential.kind === 'cosine'
      ? cosineIntegralTerms(potential.barrier.si(), temperature)
      : quadratureIntegralTerms(fourierTerms(rotor), options.quadraturePoints, temperature);
  return addTerms(kineticTerms(rotor, temperature), integral);
}

/**
 * Size of the Fourier basis: enough plane waves to resolve levels up to the
 * barrier plus a window of thermal energy at `temperature`, or at
 * `options.basisTemperature` when that is higher.
 *
 * @throws {ThermoEngineError} `INVALID_MODE_PARAMETER` when the size needed
 * exceeds `options.maxBasis`.
 */
export function basisSize(
  rotor: HinderedRotor,
  options: RotorOptions,
  temperature = options.basisTemperature,
  field = 'hindered-rotor'
): number {
  const sizedFor = Math.max(temperature, options.basisTemperature);
  const reach = potentialMaximum(rotor) + BASIS_WINDOW_RT * R * sizedFor;
  const m = Math.max(Math.ceil(Math.sqrt(reach / rotationalConstant(rotor))), MIN_BASIS);
  if (m > options.maxBasis) {
    throw invalidParameter(
      `${field}.inertia`,
      `quantum basis needs |m| up to ${String(m)} at ${String(sizedFor)} K, above maxBasis ${String(options.maxBasis)}`,
      rotor.inertia.value
    );
  }
  return m;
}

/**
 * Energy levels (J/mol, ascending) of `−ħ²/2I d²/dφ² + V(φ)` in the
 * orthonormal basis `{1/√2π, cos mφ/√π, sin mφ/√π}`, m = 1..M, with M from
 * {@link basisSize}. Cached per rotor object, basis size and sweep budget.
 */
export function torsionalLevels(
  rotor: HinderedRotor,
  options: RotorOptions,
  temperature = options.basisTemperature,
  field = 'hindered-rotor'
): readonly number[] {
  const m = basisSize(rotor, options, temperature, field);
  const key = `${String(m)}:${String(options.maxJacobiSweeps)}`;
  let byOptions = levelCache.get(rotor);
  const cached = byOptions?.get(key);
  if (cached !== undefined) {
    return cached;
  }

  const terms = fourierTerms(rotor);
  const size = 2 * m + 1;
  const points = 4 * m + 2 * terms.cosines.length + 4;

  // basis[i * points + k] is basis function i at grid angle k.
  const basis = new Float64Array(size * points);
  const potential = new Float64Array(points);
  for (let k = 0; k < points; k++) {
    const phi = (2 * Math.PI * k) / points;
    potential[k] = potentialAt(terms, phi);
    basis[k] = 1 / Math.sqrt(2 * Math.PI);
    for (let order = 1; order <= m; order++) {
      basis[(2 * order - 1) * points + k] = Math.cos(order * phi) / Math.sqrt(Math.PI);
      basis[2 * order * points + k] = Math.sin(order * phi) / Math.sqrt(Math.PI);
    }
  }

  const weight = (2 * Math.PI) / points;
  const b = rotationalConstant(rotor);
  const data = new Float64Array(size * size);
  for (let i = 0; i < size; i++) {
    for (let j = i; j < size; j++) {
      let element = 0;
      for (let k = 0; k < points; k++) {
        element += (basis[i * points + k] ?? 0) * (potential[k] ?? 0) * (basis[j * points + k] ?? 0);
      }
      element *= weight;
      if (i === j) {
        const order = Math.ceil(i / 2);
        element += b * order * order;
      }
      data[i * size + j] = element;
      data[j * size + i] = element;
    }
  }

  const levels = Object.freeze(symmetricEigenvalues({ size, data }, options.maxJacobiSweeps));
  if (byOptions === undefined) {
    byOptions = new Map();
    levelCache.set(rotor, byOptions);
  }
  byOptions.set(key, levels);
  return levels;
}

function quantumTerms(rotor: HinderedRotor, temperature: number, options: RotorOptions, field: string): PartitionTerms {
  const levels = torsionalLevels(rotor, options, temperature, field);
  const ground = levels[0] ?? 0;
  const moments = boltzmannMoments(
    levels.map((level) => level - ground),
    temperature
  );
  const terms = termsFromMoments(moments, temperature);
  return { ...terms, lnQ: terms.lnQ - Math.log(rotor.symmetry) };
}

/**
 * Partition terms of a hindered rotor under its own treatment.
 *
 * @param field - Path reported when the torsional frequency cannot be derived.
 */
export function hinderedRotorTerms(
  rotor: HinderedRotor,
  temperature: number,
  options: RotorOptions,
  field = 'hindered-rotor'
): PartitionTerms {
  switch (rotor.treatment) {
    case 'quantum':
      return quantumTerms(rotor, temperature, options, field);
    case 'classical':
      return classicalTerms(rotor, temperature, options);
    case 'semiclassical':
      return addTerms(
        classicalTerms(rotor, temperature, options),
        pitzerGwinnTerms(torsionalFrequency(rotor, field).value, temperature)
      );
  }
}
