/**
 * Mode validation.
 *
 * @packageDocumentation
 */

import { ThermoEngineError } from '../errors/index.js';
import type { ArrayQuantity, ScalarQuantity } from '../units/index.js';
import type { HinderedRotor, Mode } from './types.js';

/**
 * Builds an `INVALID_MODE_PARAMETER` error for `field`.
 */
export function invalidParameter(field: string, message: string, value: unknown): ThermoEngineError {
  return new ThermoEngineError(`${field}: ${message}`, 'INVALID_MODE_PARAMETER', {
    details: { field, value },
  });
}

/**
 * Builds an `UNSUPPORTED_MODE` error for a value outside the {@link Mode} union.
 */
export function unsupportedMode(mode: never, field: string): ThermoEngineError {
  const kind: unknown = typeof mode === 'object' && mode !== null ? Reflect.get(mode, 'kind') : mode;
  return new ThermoEngineError(`${field}: unsupported mode kind "${String(kind)}"`, 'UNSUPPORTED_MODE', {
    details: { field, kind },
  });
}

export function requireSymmetry(field: string, symmetry: number): void {
  if (!Number.isInteger(symmetry) || symmetry < 1) {
    throw invalidParameter(field, 'symmetry number must be a positive integer', symmetry);
  }
}

function requirePositiveScalar(field: string, quantity: ScalarQuantity): void {
  if (!Number.isFinite(quantity.value) || quantity.value <= 0) {
    throw invalidParameter(field, 'must be positive and finite', quantity.value);
  }
}

function requirePositiveArray(field: string, quantity: ArrayQuantity): void {
  quantity.value.forEach((value, index) => {
    if (!Number.isFinite(value) || value <= 0) {
      throw invalidParameter(`${field}[${String(index)}]`, 'must be positive and finite', value);
    }
  });
}

function validateHinderedRotor(rotor: HinderedRotor, field: string): void {
  rotor.inertia.requireDimension(`${field}.inertia`, 'moment_of_inertia');
  requirePositiveScalar(`${field}.inertia`, rotor.inertia);
  requireSymmetry(`${field}.symmetry`, rotor.symmetry);

  const potential = rotor.potential;
  if (potential.kind === 'fourier') {
    const coefficients = potential.coefficients;
    coefficients.requireDimension(`${field}.fourier`, 'energy');
    const [cosines, sines] = coefficients.value;
    if (
      coefficients.rows !== 2 ||
      cosines === undefined ||
      sines === undefined ||
      cosines.length === 0 ||
      cosines.length !== sines.length
    ) {
      throw invalidParameter(
        `${field}.fourier`,
        'must hold two equal-length, non-empty rows of cosine and sine coefficients',
        coefficients.value
      );
    }
    if (![...cosines, ...sines].every(Number.isFinite)) {
      throw invalidParameter(`${field}.fourier`, 'coefficients must be finite', coefficients.value);
    }
  } else {
    potential.barrier.requireDimension(`${field}.barrier`, 'energy');
    if (!Number.isFinite(potential.barrier.value) || potential.barrier.value < 0) {
      throw invalidParameter(`${field}.barrier`, 'must be non-negative and finite', potential.barrier.value);
    }
  }

  if (rotor.frequency !== undefined) {
    rotor.frequency.requireDimension(`${field}.frequency`, 'inverse_length');
    requirePositiveScalar(`${field}.frequency`, rotor.frequency);
  }
}

/**
 * Checks a mode's parameters.
 *
 * @param mode - Mode to check.
 * @param field - Path reported in errors, e.g. `modes[2]`.
 * @throws {ThermoEngineError} `INVALID_MODE_PARAMETER`, `UNIT_MISMATCH` or
 * `UNSUPPORTED_MODE` (unknown kind).
 */
export function validateMode(mode: Mode, field: string): void {
  switch (mode.kind) {
    case 'translation':
      mode.mass.requireDimension(`${field}.mass`, 'mass');
      requirePositiveScalar(`${field}.mass`, mode.mass);
      return;
    case 'nonlinear-rotor':
      mode.inertia.requireDimension(`${field}.inertia`, 'moment_of_inertia');
      if (mode.inertia.length !== 3) {
        throw invalidParameter(`${field}.inertia`, 'needs three principal moments', mode.inertia.value);
      }
      requirePositiveArray(`${field}.inertia`, mode.inertia);
      requireSymmetry(`${field}.symmetry`, mode.symmetry);
      return;
    case 'linear-rotor':
      mode.inertia.requireDimension(`${field}.inertia`, 'moment_of_inertia');
      requirePositiveScalar(`${field}.inertia`, mode.inertia);
      requireSymmetry(`${field}.symmetry`, mode.symmetry);
      return;
    case 'harmonic-oscillator':
      mode.frequencies.requireDimension(`${field}.frequencies`, 'inverse_length');
      if (mode.frequencies.length === 0) {
        throw invalidParameter(`${field}.frequencies`, 'needs at least one frequency', []);
      }
      requirePositiveArray(`${field}.frequencies`, mode.frequencies);
      return;
    case 'hindered-rotor':
      validateHinderedRotor(mode, field);
      return;
    default:
      throw unsupportedMode(mode, field);
  }
}
