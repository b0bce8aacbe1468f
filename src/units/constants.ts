/**
 * Physical constants (CODATA 2006), SI units.
 *
 * @packageDocumentation
 */

/** Gas constant, J/(mol·K). */
export const R = 8.314472;

/** Boltzmann constant, J/K. */
export const kB = 1.3806504e-23;

/** Planck constant, J·s. */
export const h = 6.62606896e-34;

/** Reduced Planck constant, J·s. */
export const hbar = h / (2 * Math.PI);

/** Avogadro constant, 1/mol. */
export const NA = 6.02214179e23;

/** Speed of light in vacuum, m/s. */
export const c = 299792458;

/** Atomic mass unit, kg. */
export const amu = 1.660538782e-27;

/** Bohr radius, m. */
export const bohr = 5.2917720859e-11;

/** Thermochemical calorie, J. */
export const cal = 4.184;

/** Standard-state pressure (1 bar), Pa. */
export const P_STANDARD = 1e5;
