/**
 * Harmonic vibrations, energies measured from the zero-point level.
 *
 * @packageDocumentation
 */

import { c, h, kB } from '../units/constants.js';
import type { HarmonicOscillator } from '../conformer/index.js';
import type { PartitionTerms } from './types.js';

/**
 * Quantum: `q = Π 1/(1 − e^{−x})`; classical: `q = Π 1/x`; `x = hcν̃/kT`.
 */
export function harmonicOscillatorTerms(mode: HarmonicOscillator, temperature: number): PartitionTerms {
  const t2 = temperature * temperature;
  let lnQ = 0;
  let dlnQdT = 0;
  let d2lnQdT2 = 0;

  for (const wavenumber of mode.frequencies.to('cm^-1')) {
    const theta = (h * c * 100 * wavenumber) / kB;
    const x = theta / temperature;
    if (!mode.quantum) {
      lnQ -= Math.log(x);
      dlnQdT += 1 / temperature;
      d2lnQdT2 -= 1 / t2;
      continue;
    }
    const em = Math.exp(-x);
    const occupancy = em / (1 - em);
    const first = (theta / t2) * occupancy;
    lnQ -= Math.log1p(-em);
    dlnQdT += first;
    d2lnQdT2 += (-2 * first) / temperature + (x * x * em) / (t2 * (1 - em) * (1 - em));
  }

  return { lnQ, dlnQdT, d2lnQdT2 };
}
