/**
 * Statistical-mechanics partition functions.
 *
 * @packageDocumentation
 */

export type { PartitionTerms, RotorOptions } from './types.js';
export { DEFAULT_ROTOR_OPTIONS, ZERO_TERMS, addTerms } from './types.js';
export { evaluateMode, evaluateConformer, requireTemperature } from './partition-function.js';
export { torsionalLevels, basisSize } from './hindered-rotor.js';
export { boltzmannMoments, termsFromMoments } from './boltzmann.js';
export type { BoltzmannMoments } from './boltzmann.js';
export { symmetricEigenvalues } from './eigen.js';
export type { SymmetricMatrix } from './eigen.js';
