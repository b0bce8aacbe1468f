/**
 * Conformers shared by the engine's tests.
 */

import { array, matrix, scalar } from '../../src/units/index.js';
import type { Conformer, HinderedRotor, Mode } from '../../src/conformer/index.js';

/** E0 of the hydrazine conformer, kJ/mol. */
export const N2H4_E0 = 89.66936378637556;

export const N2H4_FREQUENCIES = [
  804.702684789345, 944.3708351977593, 1119.46984675033, 1272.463775026473, 1302.3239030062555,
  1630.6811051177392, 1642.2431546205037, 3409.856964259825, 3418.213837435375, 3510.5084760011173,
  3514.9269546169958,
];

export function n2h4Torsion(treatment: HinderedRotor['treatment'] = 'semiclassical'): HinderedRotor {
  return {
    kind: 'hindered-rotor',
    inertia: scalar(0.8646202553741763, 'amu*angstrom^2'),
    symmetry: 1,
    potential: {
      kind: 'fourier',
      coefficients: matrix(
        [
          [0.16222862758185147, -12.202719567707382, -0.5684005641621309, -0.1593956207311421, 0.48039067463325136],
          [-7.938290746826625, -1.6277540956505094, 3.258060880870518, 0.6270040035271297, -0.25036265237321],
        ],
        'kJ/mol'
      ),
    },
    frequency: scalar(380.0250313439182, 'cm^-1'),
    treatment,
  };
}

/**
 * Hydrazine with already-scaled vibrational frequencies.
 */
export function n2h4Conformer(rotor: HinderedRotor = n2h4Torsion()): Conformer {
  const modes: Mode[] = [
    { kind: 'translation', mass: scalar(32.03746, 'amu'), quantum: false },
    {
      kind: 'nonlinear-rotor',
      inertia: array([3.44830480556223, 20.50117361907408, 20.513920517329836], 'amu*angstrom^2'),
      symmetry: 2,
      quantum: false,
    },
    { kind: 'harmonic-oscillator', frequencies: array(N2H4_FREQUENCIES, 'cm^-1'), quantum: true },
    rotor,
  ];
  return {
    E0: scalar(N2H4_E0, 'kJ/mol'),
    modes,
    spinMultiplicity: 1,
    opticalIsomers: 1,
    geometry: {
      coordinates: matrix(
        [
          [0.7033634988, 0.0974820728, -0.073047392],
          [-0.7033634988, -0.0974820728, -0.073047392],
          [1.0539960456, 0.3871635195, 0.8315583036],
          [-1.0539960456, -0.3871635195, 0.8315583036],
          [1.1434808787, -0.7765990298, -0.3202265599],
          [-1.1434808787, 0.7765990298, -0.3202265599],
        ],
        'angstroms'
      ),
      mass: array(
        [14.00307400443, 14.00307400443, 1.00782503224, 1.00782503224, 1.00782503224, 1.00782503224],
        'amu'
      ),
      number: array([7, 7, 1, 1, 1, 1], ''),
    },
  };
}

/**
 * A single-atom gas of the given mass (amu).
 */
export function atomConformer(massAmu: number): Conformer {
  return {
    E0: scalar(0, 'kJ/mol'),
    modes: [{ kind: 'translation', mass: scalar(massAmu, 'amu'), quantum: false }],
    spinMultiplicity: 1,
    opticalIsomers: 1,
  };
}

/**
 * A diatomic-like linear molecule with one vibration.
 */
export function linearConformer(frequency = 2000): Conformer {
  return {
    E0: scalar(0, 'kJ/mol'),
    modes: [
      { kind: 'translation', mass: scalar(28.0, 'amu'), quantum: false },
      { kind: 'linear-rotor', inertia: scalar(8.5, 'amu*angstrom^2'), symmetry: 2, quantum: false },
      { kind: 'harmonic-oscillator', frequencies: array([frequency], 'cm^-1'), quantum: true },
    ],
    spinMultiplicity: 1,
    opticalIsomers: 1,
  };
}
