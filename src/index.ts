/**
 * species-thermo
 *
 * Thermodynamic properties of chemical species from statistical mechanics,
 * fitted to NASA polynomials and written as YAML species records.
 *
 * @packageDocumentation
 */

/**
 * Library version string.
 */
export const VERSION = '0.1.0';

export * from './units/index.js';
export * from './errors/index.js';
export * from './conformer/index.js';
export * from './statmech/index.js';
export * from './thermo/index.js';
export * from './nasa/index.js';
export * from './energy-transfer/index.js';
export * from './species/index.js';
export * from './config/index.js';
export { Logger, silentLogger, type LogEntry, type LoggerOptions, type LogLevel } from './utils/logger.js';
