/**
 * NASA polynomial models: fitting, evaluation and CHEMKIN text.
 *
 * @packageDocumentation
 */

export type {
  FitDeviation,
  ModelLimits,
  NASAFitOptions,
  NASAFitResult,
  NASAModel,
  NASAPolynomial,
  ThermoFunctions,
} from './types.js';
export { DEFAULT_FIT_OPTIONS } from './types.js';
export { fitNASA, validateFitOptions } from './fitter.js';
export {
  modelTmid,
  nasaEnthalpy,
  nasaEntropy,
  nasaGibbsEnergy,
  nasaHeatCapacity,
  polynomialCpOverR,
  polynomialHOverRT,
  polynomialSOverR,
  selectPolynomial,
} from './polynomial.js';
export { formatChemkinThermo, parseChemkinThermo } from './chemkin.js';
export type { ChemkinEntry } from './chemkin.js';
export { solveLinearSystem } from './linear-algebra.js';
