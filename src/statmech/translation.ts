/**
 * Ideal-gas translation at the standard-state volume kT/P°.
 *
 * @packageDocumentation
 */

import { P_STANDARD, h, kB } from '../units/constants.js';
import type { Translation } from '../conformer/index.js';
import type { PartitionTerms } from './types.js';

/**
 * `q = (2π m kT / h²)^{3/2} · V` with `V = kT/P°`. The derivatives are taken
 * at constant volume, so `V` does not contribute to them.
 */
export function translationTerms(mode: Translation, temperature: number): PartitionTerms {
  const mass = mode.mass.si();
  return {
    lnQ:
      1.5 * Math.log((2 * Math.PI * mass * kB * temperature) / (h * h)) +
      Math.log((kB * temperature) / P_STANDARD),
    dlnQdT: 1.5 / temperature,
    d2lnQdT2: -1.5 / (temperature * temperature),
  };
}
