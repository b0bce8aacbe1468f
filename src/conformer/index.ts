/**
 * Conformers, their modes and derived molecular properties.
 *
 * @packageDocumentation
 */

export type {
  Conformer,
  CosinePotential,
  FourierPotential,
  Geometry,
  HarmonicOscillator,
  HinderedRotor,
  LinearRotor,
  Mode,
  ModeKind,
  NonlinearRotor,
  RotorTreatment,
  TorsionalPotential,
  Translation,
} from './types.js';
export { validateMode, invalidParameter, unsupportedMode } from './modes.js';
export {
  fourierTerms,
  potentialAt,
  potentialCurvature,
  potentialMaximum,
  torsionalFrequency,
} from './torsion.js';
export type { FourierTerms } from './torsion.js';
export {
  createConformer,
  scaleFrequencies,
  replaceHinderedRotors,
  isLinear,
  molecularFormula,
  heatCapacityLimits,
} from './conformer.js';
export { elementSymbol, elementCounts, hillFormula, standardMolecularWeight } from './elements.js';
