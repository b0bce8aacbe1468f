/**
 * Ideal-gas thermodynamic functions from partition functions.
 *
 * @packageDocumentation
 */

import { ThermoEngineError } from '../errors/index.js';
import { scalar, type ScalarQuantity } from '../units/index.js';
import { R } from '../units/constants.js';
import type { Conformer } from '../conformer/index.js';
import { DEFAULT_ROTOR_OPTIONS, evaluateConformer, type RotorOptions } from '../statmech/index.js';

/**
 * Thermodynamic functions at one temperature.
 */
export interface ThermoPoint {
  readonly temperature: ScalarQuantity;
  /** Heat capacity at constant pressure. */
  readonly Cp: ScalarQuantity;
  /** Enthalpy, including E0. */
  readonly H: ScalarQuantity;
  readonly S: ScalarQuantity;
  /** Gibbs energy `H − TS`. */
  readonly G: ScalarQuantity;
}

/**
 * Cp, H and S in J/mol and J/(mol·K), for callers that iterate.
 */
export interface ThermoValues {
  readonly Cp: number;
  readonly H: number;
  readonly S: number;
}

/**
 * Computes Cp, H and S in SI units.
 *
 * `Cv/R = T² d²lnQ/dT² + 2T dlnQ/dT`, `Cp = Cv + R`,
 * `H = E0 + RT² dlnQ/dT + RT`,
 * `S = R (lnQ + T dlnQ/dT) + R + R ln(g_spin · n_optical)`.
 *
 * @throws {ThermoEngineError} `NON_PHYSICAL_RESULT` for a negative Cp or a
 * non-finite value.
 */
export function thermoValues(
  conformer: Conformer,
  temperature: number,
  options: RotorOptions = DEFAULT_ROTOR_OPTIONS
): ThermoValues {
  const terms = evaluateConformer(conformer, temperature, options);
  const t = temperature;
  const cv = R * (t * t * terms.d2lnQdT2 + 2 * t * terms.dlnQdT);
  const values: ThermoValues = {
    Cp: cv + R,
    H: conformer.E0.si() + R * t * t * terms.dlnQdT + R * t,
    S: R * (terms.lnQ + t * terms.dlnQdT) + R + R * Math.log(conformer.spinMultiplicity * conformer.opticalIsomers),
  };

  if (!Number.isFinite(values.Cp) || !Number.isFinite(values.H) || !Number.isFinite(values.S) || values.Cp < 0) {
    throw new ThermoEngineError(`Non-physical thermodynamic result at ${String(t)} K`, 'NON_PHYSICAL_RESULT', {
      details: { temperature: t, Cp: values.Cp, H: values.H, S: values.S },
    });
  }
  return values;
}

/**
 * Thermodynamic functions at one temperature.
 */
export function thermo(
  conformer: Conformer,
  temperature: ScalarQuantity | number,
  options: RotorOptions = DEFAULT_ROTOR_OPTIONS
): ThermoPoint {
  const t = typeof temperature === 'number' ? temperature : temperature.requireDimension('temperature', 'temperature').si();
  const values = thermoValues(conformer, t, options);
  return {
    temperature: scalar(t, 'K'),
    Cp: scalar(values.Cp, 'J/(mol*K)'),
    H: scalar(values.H, 'J/mol'),
    S: scalar(values.S, 'J/(mol*K)'),
    G: scalar(values.H - t * values.S, 'J/mol'),
  };
}

/**
 * Thermodynamic functions on a temperature grid (K).
 */
export function thermoTable(
  conformer: Conformer,
  temperatures: readonly number[],
  options: RotorOptions = DEFAULT_ROTOR_OPTIONS
): ThermoPoint[] {
  return temperatures.map((t) => thermo(conformer, t, options));
}

/**
 * Cp(T), H(T) and S(T) of a conformer in SI units, evaluating the partition
 * function once per temperature.
 */
export function thermoFunctions(
  conformer: Conformer,
  options: RotorOptions = DEFAULT_ROTOR_OPTIONS
): { Cp(t: number): number; H(t: number): number; S(t: number): number } {
  const cache = new Map<number, ThermoValues>();
  const at = (t: number): ThermoValues => {
    let values = cache.get(t);
    if (values === undefined) {
      values = thermoValues(conformer, t, options);
      cache.set(t, values);
    }
    return values;
  };
  return {
    Cp: (t) => at(t).Cp,
    H: (t) => at(t).H,
    S: (t) => at(t).S,
  };
}
