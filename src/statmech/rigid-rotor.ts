/**
 * Classical rigid rotors.
 *
 * @packageDocumentation
 */

import { h, kB } from '../units/constants.js';
import type { LinearRotor, NonlinearRotor } from '../conformer/index.js';
import type { PartitionTerms } from './types.js';

function lnRotationalFactor(inertia: number, temperature: number): number {
  return Math.log((8 * Math.PI * Math.PI * inertia * kB * temperature) / (h * h));
}

/**
 * `q = (√π/σ) Π_i (8π² I_i kT / h²)^{1/2}`; Cv = 3R/2.
 */
export function nonlinearRotorTerms(mode: NonlinearRotor, temperature: number): PartitionTerms {
  const lnProduct = mode.inertia.si().reduce((sum, inertia) => sum + 0.5 * lnRotationalFactor(inertia, temperature), 0);
  return {
    lnQ: 0.5 * Math.log(Math.PI) - Math.log(mode.symmetry) + lnProduct,
    dlnQdT: 1.5 / temperature,
    d2lnQdT2: -1.5 / (temperature * temperature),
  };
}

/**
 * `q = 8π² I kT / (σ h²)`; Cv = R.
 */
export function linearRotorTerms(mode: LinearRotor, temperature: number): PartitionTerms {
  return {
    lnQ: lnRotationalFactor(mode.inertia.si(), temperature) - Math.log(mode.symmetry),
    dlnQdT: 1 / temperature,
    d2lnQdT2: -1 / (temperature * temperature),
  };
}
