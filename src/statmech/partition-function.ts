/**
 * Partition-function evaluation over a conformer's modes.
 *
 * @packageDocumentation
 */

import { ThermoEngineError } from '../errors/index.js';
import { invalidParameter, unsupportedMode, type Conformer, type Mode } from '../conformer/index.js';
import { harmonicOscillatorTerms } from './harmonic-oscillator.js';
import { hinderedRotorTerms } from './hindered-rotor.js';
import { linearRotorTerms, nonlinearRotorTerms } from './rigid-rotor.js';
import { translationTerms } from './translation.js';
import { addTerms, DEFAULT_ROTOR_OPTIONS, ZERO_TERMS, type PartitionTerms, type RotorOptions } from './types.js';

/**
 * @throws {ThermoEngineError} `INVALID_MODE_PARAMETER` unless T is finite and positive.
 */
export function requireTemperature(temperature: number): void {
  if (!Number.isFinite(temperature) || temperature <= 0) {
    throw invalidParameter('temperature', 'must be positive and finite', temperature);
  }
}

function quantumUnsupported(field: string, kind: Mode['kind']): ThermoEngineError {
  return new ThermoEngineError(`${field}: quantum ${kind} is not supported`, 'UNSUPPORTED_MODE', {
    details: { field, kind },
  });
}

/**
 * Partition terms of a single mode.
 *
 * @param field - Path of the mode, reported in errors.
 * @throws {ThermoEngineError} `INVALID_MODE_PARAMETER`, `UNSUPPORTED_MODE` or
 * `FIT_DID_NOT_CONVERGE` (quantum rotor eigenvalues).
 */
export function evaluateMode(
  mode: Mode,
  temperature: number,
  options: RotorOptions = DEFAULT_ROTOR_OPTIONS,
  field = 'mode'
): PartitionTerms {
  requireTemperature(temperature);
  switch (mode.kind) {
    case 'translation':
      if (mode.quantum) {
        throw quantumUnsupported(field, mode.kind);
      }
      return translationTerms(mode, temperature);
    case 'nonlinear-rotor':
      if (mode.quantum) {
        throw quantumUnsupported(field, mode.kind);
      }
      return nonlinearRotorTerms(mode, temperature);
    case 'linear-rotor':
      if (mode.quantum) {
        throw quantumUnsupported(field, mode.kind);
      }
      return linearRotorTerms(mode, temperature);
    case 'harmonic-oscillator':
      return harmonicOscillatorTerms(mode, temperature);
    case 'hindered-rotor':
      return hinderedRotorTerms(mode, temperature, options, field);
    default:
      throw unsupportedMode(mode, field);
  }
}

/**
 * Partition terms of the whole conformer: the log of the product of its
 * modes' partition functions. Electronic and optical-isomer degeneracies are
 * left to the caller.
 */
export function evaluateConformer(
  conformer: Conformer,
  temperature: number,
  options: RotorOptions = DEFAULT_ROTOR_OPTIONS
): PartitionTerms {
  requireTemperature(temperature);
  return conformer.modes.reduce(
    (total, mode, index) =>
      addTerms(total, evaluateMode(mode, temperature, options, `conformer.modes[${String(index)}]`)),
    ZERO_TERMS
  );
}
