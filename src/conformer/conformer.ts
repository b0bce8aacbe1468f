/**
 * Conformer construction and derived properties.
 *
 * @packageDocumentation
 */

import { ThermoEngineError } from '../errors/index.js';
import { array, scalar, type ScalarQuantity } from '../units/index.js';
import { R } from '../units/constants.js';
import { hillFormula } from './elements.js';
import { invalidParameter, validateMode } from './modes.js';
import { torsionalFrequency } from './torsion.js';
import type { Conformer, Geometry, HarmonicOscillator, Mode } from './types.js';

function requirePositiveInteger(field: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw invalidParameter(field, 'must be a positive integer', value);
  }
}

function malformed(field: string, message: string): ThermoEngineError {
  return new ThermoEngineError(`${field}: ${message}`, 'MALFORMED_RECORD', { details: { field } });
}

function validateGeometry(geometry: Geometry): void {
  geometry.coordinates.requireDimension('conformer.coordinates', 'length');
  geometry.mass.requireDimension('conformer.mass', 'mass');
  geometry.number.requireDimension('conformer.number', 'dimensionless');

  const atoms = geometry.coordinates.rows;
  if (geometry.mass.length !== atoms || geometry.number.length !== atoms) {
    throw malformed(
      'conformer',
      `coordinates (${String(atoms)}), mass (${String(geometry.mass.length)}) and number ` +
        `(${String(geometry.number.length)}) must have equal length`
    );
  }
  geometry.coordinates.value.forEach((row, index) => {
    if (row.length !== 3) {
      throw malformed(`conformer.coordinates[${String(index)}]`, 'must have three components');
    }
  });
  geometry.number.value.forEach((z, index) => {
    if (!Number.isInteger(z) || z < 1) {
      throw malformed(`conformer.number[${String(index)}]`, 'must be a positive integer');
    }
  });
}

function countKinds(modes: readonly Mode[]): Map<Mode['kind'], number> {
  const counts = new Map<Mode['kind'], number>();
  for (const mode of modes) {
    counts.set(mode.kind, (counts.get(mode.kind) ?? 0) + 1);
  }
  return counts;
}

/**
 * Validates a conformer and returns a frozen copy.
 *
 * @throws {ThermoEngineError} `INVALID_MODE_PARAMETER`, `UNIT_MISMATCH`,
 * `UNSUPPORTED_MODE` or `MALFORMED_RECORD`.
 */
export function createConformer(init: Conformer): Conformer {
  init.E0.requireDimension('conformer.E0', 'energy');
  if (!Number.isFinite(init.E0.value)) {
    throw invalidParameter('conformer.E0', 'must be finite', init.E0.value);
  }
  requirePositiveInteger('conformer.spinMultiplicity', init.spinMultiplicity);
  requirePositiveInteger('conformer.opticalIsomers', init.opticalIsomers);

  init.modes.forEach((mode, index) => {
    validateMode(mode, `conformer.modes[${String(index)}]`);
  });

  const counts = countKinds(init.modes);
  const rigidRotors = (counts.get('nonlinear-rotor') ?? 0) + (counts.get('linear-rotor') ?? 0);
  if ((counts.get('translation') ?? 0) > 1 || rigidRotors > 1) {
    throw new ThermoEngineError(
      'A conformer takes at most one translation and one rigid rotor',
      'UNSUPPORTED_MODE',
      { details: { field: 'conformer.modes', kinds: [...counts.keys()] } }
    );
  }

  if (init.geometry !== undefined) {
    validateGeometry(init.geometry);
  }

  return Object.freeze({
    E0: init.E0,
    modes: Object.freeze([...init.modes]),
    spinMultiplicity: init.spinMultiplicity,
    opticalIsomers: init.opticalIsomers,
    ...(init.geometry === undefined ? {} : { geometry: Object.freeze({ ...init.geometry }) }),
  });
}

/**
 * Returns a conformer whose harmonic-oscillator frequencies are multiplied by
 * `factor`. Hindered-rotor frequencies are left as they are.
 */
export function scaleFrequencies(conformer: Conformer, factor: number): Conformer {
  if (!Number.isFinite(factor) || factor <= 0) {
    throw invalidParameter('frequency_scale_factor', 'must be positive and finite', factor);
  }
  if (factor === 1) {
    return conformer;
  }
  return createConformer({
    ...conformer,
    modes: conformer.modes.map((mode) =>
      mode.kind === 'harmonic-oscillator' ? { ...mode, frequencies: mode.frequencies.scale(factor) } : mode
    ),
  });
}

/**
 * Returns a conformer where each hindered rotor is replaced by a quantum
 * harmonic oscillator at its torsional frequency.
 */
export function replaceHinderedRotors(conformer: Conformer): Conformer {
  if (!conformer.modes.some((mode) => mode.kind === 'hindered-rotor')) {
    return conformer;
  }
  return createConformer({
    ...conformer,
    modes: conformer.modes.map((mode, index): Mode => {
      if (mode.kind !== 'hindered-rotor') {
        return mode;
      }
      const oscillator: HarmonicOscillator = {
        kind: 'harmonic-oscillator',
        frequencies: array([torsionalFrequency(mode, `conformer.modes[${String(index)}]`).value], 'cm^-1'),
        quantum: true,
      };
      return oscillator;
    }),
  });
}

/**
 * Whether the rigid rotor of the conformer is linear.
 */
export function isLinear(conformer: Conformer): boolean {
  return conformer.modes.some((mode) => mode.kind === 'linear-rotor');
}

/**
 * Hill-order formula, or `undefined` without geometry.
 */
export function molecularFormula(conformer: Conformer): string | undefined {
  return conformer.geometry === undefined ? undefined : hillFormula(conformer.geometry.number.value);
}

/**
 * Heat capacity limits in J/(mol·K).
 *
 * `Cp0` is translation plus rigid rotation (2.5R, 3.5R linear, 4R
 * nonlinear); `CpInf` adds R per vibration and R/2 per hindered rotor.
 */
export function heatCapacityLimits(conformer: Conformer): { Cp0: ScalarQuantity; CpInf: ScalarQuantity } {
  let cp0 = 2.5;
  let internal = 0;
  for (const mode of conformer.modes) {
    switch (mode.kind) {
      case 'linear-rotor':
        cp0 += 1;
        break;
      case 'nonlinear-rotor':
        cp0 += 1.5;
        break;
      case 'harmonic-oscillator':
        internal += mode.frequencies.length;
        break;
      case 'hindered-rotor':
        internal += 0.5;
        break;
      case 'translation':
        break;
    }
  }
  return {
    Cp0: scalar(cp0 * R, 'J/(mol*K)'),
    CpInf: scalar((cp0 + internal) * R, 'J/(mol*K)'),
  };
}
