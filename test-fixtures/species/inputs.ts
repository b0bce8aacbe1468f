/**
 * Species inputs and serialized records shared by the species tests.
 */

import { readFileSync } from 'node:fs';
import { array } from '../../src/units/index.js';
import type { Mode } from '../../src/conformer/index.js';
import type { SpeciesInput } from '../../src/species/index.js';
import { N2H4_FREQUENCIES, n2h4Conformer } from './conformers.js';

/** The serialized hydrazine record. */
export const N2H4_YAML = readFileSync(new URL('./n2h4.yml', import.meta.url), 'utf-8');

export const N2H4_SCALE_FACTOR = 0.97;

/**
 * Hydrazine as it leaves the frequency calculation: oscillator frequencies
 * are unscaled, so scaling them reproduces {@link N2H4_FREQUENCIES}.
 */
export function n2h4Input(overrides: Partial<SpeciesInput> = {}): SpeciesInput {
  const conformer = n2h4Conformer();
  const modes = conformer.modes.map(
    (mode): Mode =>
      mode.kind === 'harmonic-oscillator'
        ? { ...mode, frequencies: array(N2H4_FREQUENCIES.map((f) => f / N2H4_SCALE_FACTOR), 'cm^-1') }
        : mode
  );
  return {
    label: 'N2H4',
    smiles: 'NN',
    inchi: 'InChI=1S/H4N2/c1-2/h1-2H2',
    conformer: { ...conformer, modes },
    frequencyScaleFactor: N2H4_SCALE_FACTOR,
    useHinderedRotors: true,
    ...overrides,
  };
}
