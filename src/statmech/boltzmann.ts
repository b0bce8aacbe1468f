/**
 * Boltzmann sums over a set of molar energies.
 *
 * @packageDocumentation
 */

import { R } from '../units/constants.js';
import type { PartitionTerms } from './types.js';

/**
 * `ln Σ e^{−E_i/RT}` with the mean and variance of E under those weights.
 */
export interface BoltzmannMoments {
  readonly lnSum: number;
  readonly mean: number;
  readonly variance: number;
}

/**
 * Computes the moments with exponents shifted by the lowest energy so no
 * term overflows.
 *
 * @param energies - Molar energies, J/mol; at least one.
 * @param temperature - K.
 */
export function boltzmannMoments(energies: readonly number[], temperature: number): BoltzmannMoments {
  const rt = R * temperature;
  const lowest = Math.min(...energies);
  let sum = 0;
  let first = 0;
  let second = 0;
  for (const energy of energies) {
    const shifted = energy - lowest;
    const weight = Math.exp(-shifted / rt);
    sum += weight;
    first += weight * shifted;
    second += weight * shifted * shifted;
  }
  const shiftedMean = first / sum;
  return {
    lnSum: Math.log(sum) - lowest / rt,
    mean: shiftedMean + lowest,
    variance: Math.max(0, second / sum - shiftedMean * shiftedMean),
  };
}

/**
 * Partition terms of `Q = e^{lnSum}` from its moments:
 * `dlnQ/dT = ⟨E⟩/RT²` and `d²lnQ/dT² = var(E)/R²T⁴ − 2⟨E⟩/RT³`.
 */
export function termsFromMoments(moments: BoltzmannMoments, temperature: number): PartitionTerms {
  const t2 = temperature * temperature;
  return {
    lnQ: moments.lnSum,
    dlnQdT: moments.mean / (R * t2),
    d2lnQdT2: moments.variance / (R * R * t2 * t2) - (2 * moments.mean) / (R * t2 * temperature),
  };
}
