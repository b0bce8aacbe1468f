/**
 * Collisional energy transfer models.
 *
 * @packageDocumentation
 */

export { SingleExponentialDown } from './single-exponential-down.js';
export type { SingleExponentialDownParams } from './single-exponential-down.js';
