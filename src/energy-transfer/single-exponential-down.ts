/**
 * Single-exponential-down collisional energy transfer.
 *
 * @packageDocumentation
 */

import { ThermoEngineError } from '../errors/index.js';
import { scalar, type ScalarQuantity } from '../units/index.js';

/**
 * Parameters of `⟨ΔE_down⟩(T) = alpha0 · (T / T0)^n`.
 */
export interface SingleExponentialDownParams {
  readonly alpha0: ScalarQuantity;
  readonly T0: ScalarQuantity;
  readonly n: number;
}

function invalid(field: string, message: string, value: unknown): ThermoEngineError {
  return new ThermoEngineError(`${field}: ${message}`, 'INVALID_MODE_PARAMETER', { details: { field, value } });
}

/**
 * Average energy removed per deactivating collision. Used by downstream
 * pressure-dependent kinetics; takes no part in the thermo fit.
 */
export class SingleExponentialDown {
  readonly alpha0: ScalarQuantity;
  readonly T0: ScalarQuantity;
  readonly n: number;

  /**
   * @throws {ThermoEngineError} `UNIT_MISMATCH` when alpha0 is not an energy
   * or T0 not a temperature; `INVALID_MODE_PARAMETER` when either is not
   * positive or n is not finite.
   */
  constructor(params: SingleExponentialDownParams) {
    this.alpha0 = params.alpha0.requireDimension('energy_transfer_model.alpha0', 'energy');
    this.T0 = params.T0.requireDimension('energy_transfer_model.T0', 'temperature');
    if (!(this.alpha0.value > 0)) {
      throw invalid('energy_transfer_model.alpha0', 'must be positive', this.alpha0.value);
    }
    if (!(this.T0.value > 0)) {
      throw invalid('energy_transfer_model.T0', 'must be positive', this.T0.value);
    }
    if (!Number.isFinite(params.n)) {
      throw invalid('energy_transfer_model.n', 'must be finite', params.n);
    }
    this.n = params.n;
    Object.freeze(this);
  }

  /**
   * `⟨ΔE_down⟩` at a temperature, in the units of alpha0.
   *
   * @throws {ThermoEngineError} `INVALID_MODE_PARAMETER` for T ≤ 0.
   */
  averageDownwardEnergy(temperature: ScalarQuantity | number): ScalarQuantity {
    const t =
      typeof temperature === 'number'
        ? temperature
        : temperature.requireDimension('temperature', 'temperature').to('K');
    if (!(t > 0) || !Number.isFinite(t)) {
      throw invalid('temperature', 'must be a positive number of kelvin', t);
    }
    return scalar(this.alpha0.value * Math.pow(t / this.T0.to('K'), this.n), this.alpha0.units);
  }
}
