/**
 * Heat capacity, enthalpy, entropy and Gibbs energy of a conformer.
 *
 * @packageDocumentation
 */

export { thermo, thermoTable, thermoValues, thermoFunctions } from './thermo.js';
export type { ThermoPoint, ThermoValues } from './thermo.js';
