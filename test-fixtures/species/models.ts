/**
 * NASA models shared by the engine's tests.
 */

import { scalar } from '../../src/units/index.js';
import type { NASAModel, NASAPolynomial } from '../../src/nasa/index.js';

export const N2H4_TMID = 518.1161610086507;

export const N2H4_LOW = [
  4.043896387044359, -0.003847847505293266, 5.734172331592045e-5, -9.576726837706191e-8, 5.368559651207141e-11,
  10772.128561212636, 4.860999168368832,
];

export const N2H4_HIGH = [
  2.0762613566635815, 0.015045027956297745, -8.073330938084796e-6, 2.1943872302302012e-9, -2.3712185653252193e-13,
  10926.329674899871, 12.580329942484507,
];

function poly(coeffs: readonly number[], tmin: number, tmax: number): NASAPolynomial {
  return { coeffs, Tmin: scalar(tmin, 'K'), Tmax: scalar(tmax, 'K') };
}

/**
 * The two-range hydrazine model, 10–3000 K.
 */
export function n2h4Model(): NASAModel {
  return {
    polynomials: [poly(N2H4_LOW, 10, N2H4_TMID), poly(N2H4_HIGH, N2H4_TMID, 3000)],
    Tmin: scalar(10, 'K'),
    Tmax: scalar(3000, 'K'),
    E0: scalar(89.56383542984594, 'kJ/mol'),
    Cp0: scalar(33.257888, 'J/(mol*K)'),
    CpInf: scalar(128.874316, 'J/(mol*K)'),
  };
}

export const N2H4_CHEMKIN =
  'N2H4                    H   4N   2          G    10.000  3000.000  518.12      1\n' +
  ' 2.07626136E+00 1.50450280E-02-8.07333094E-06 2.19438723E-09-2.37121857E-13    2\n' +
  ' 1.09263297E+04 1.25803299E+01 4.04389639E+00-3.84784751E-03 5.73417233E-05    3\n' +
  '-9.57672684E-08 5.36855965E-11 1.07721286E+04 4.86099917E+00                   4\n';
