/**
 * Units, dimensions, physical constants and unit-tagged quantities.
 *
 * @packageDocumentation
 */

export * as constants from './constants.js';
export { lookupUnit, isKnownUnit, conversionFactor, SI_UNITS } from './units.js';
export type { Dimension, UnitDefinition } from './units.js';
export {
  ScalarQuantity,
  ArrayQuantity,
  MatrixQuantity,
  scalar,
  array,
  matrix,
} from './quantity.js';
export type { Quantity } from './quantity.js';
