/**
 * Evaluation of NASA polynomials and models.
 *
 * @packageDocumentation
 */

import { ThermoEngineError } from '../errors/index.js';
import { scalar, type ScalarQuantity } from '../units/index.js';
import { R } from '../units/constants.js';
import type { NASAModel, NASAPolynomial } from './types.js';

function coefficient(poly: NASAPolynomial, index: number): number {
  return poly.coeffs[index] ?? 0;
}

/** `Cp/R` of one polynomial. */
export function polynomialCpOverR(poly: NASAPolynomial, t: number): number {
  const c = (i: number): number => coefficient(poly, i);
  return c(0) + t * (c(1) + t * (c(2) + t * (c(3) + t * c(4))));
}

/** `H/RT` of one polynomial. */
export function polynomialHOverRT(poly: NASAPolynomial, t: number): number {
  const c = (i: number): number => coefficient(poly, i);
  return c(0) + t * (c(1) / 2 + t * (c(2) / 3 + t * (c(3) / 4 + t * (c(4) / 5)))) + c(5) / t;
}

/** `S/R` of one polynomial. */
export function polynomialSOverR(poly: NASAPolynomial, t: number): number {
  const c = (i: number): number => coefficient(poly, i);
  return c(0) * Math.log(t) + t * (c(1) + t * (c(2) / 2 + t * (c(3) / 3 + t * (c(4) / 4)))) + c(6);
}

/** Joining temperature of a model, K. */
export function modelTmid(model: NASAModel): number {
  return model.polynomials[0].Tmax.to('K');
}

/**
 * Polynomial covering `t`: the low one up to and including Tmid.
 *
 * @throws {ThermoEngineError} `INVALID_FIT_CONFIGURATION` outside `[Tmin, Tmax]`.
 */
export function selectPolynomial(model: NASAModel, t: number): NASAPolynomial {
  const tmin = model.Tmin.to('K');
  const tmax = model.Tmax.to('K');
  if (!(t >= tmin && t <= tmax)) {
    throw new ThermoEngineError(
      `Temperature ${String(t)} K is outside the model range [${String(tmin)}, ${String(tmax)}] K`,
      'INVALID_FIT_CONFIGURATION',
      { details: { temperature: t, Tmin: tmin, Tmax: tmax } }
    );
  }
  return t <= modelTmid(model) ? model.polynomials[0] : model.polynomials[1];
}

function kelvin(temperature: ScalarQuantity | number): number {
  return typeof temperature === 'number' ? temperature : temperature.requireDimension('temperature', 'temperature').to('K');
}

/** Heat capacity of a model. */
export function nasaHeatCapacity(model: NASAModel, temperature: ScalarQuantity | number): ScalarQuantity {
  const t = kelvin(temperature);
  return scalar(R * polynomialCpOverR(selectPolynomial(model, t), t), 'J/(mol*K)');
}

/** Enthalpy of a model. */
export function nasaEnthalpy(model: NASAModel, temperature: ScalarQuantity | number): ScalarQuantity {
  const t = kelvin(temperature);
  return scalar(R * t * polynomialHOverRT(selectPolynomial(model, t), t), 'J/mol');
}

/** Entropy of a model. */
export function nasaEntropy(model: NASAModel, temperature: ScalarQuantity | number): ScalarQuantity {
  const t = kelvin(temperature);
  return scalar(R * polynomialSOverR(selectPolynomial(model, t), t), 'J/(mol*K)');
}

/** Gibbs energy `H − TS` of a model. */
export function nasaGibbsEnergy(model: NASAModel, temperature: ScalarQuantity | number): ScalarQuantity {
  const t = kelvin(temperature);
  return scalar(nasaEnthalpy(model, t).value - t * nasaEntropy(model, t).value, 'J/mol');
}
