/**
 * Engine error taxonomy.
 *
 * @packageDocumentation
 */

export { ThermoEngineError, THERMO_ERROR_CODES, isThermoEngineError } from './errors.js';
export type { ThermoErrorCode } from './errors.js';
