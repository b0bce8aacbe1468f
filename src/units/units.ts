/**
 * Unit registry: every accepted unit string, its dimension and its factor
 * to the SI unit of that dimension.
 *
 * @packageDocumentation
 */

import { LookupTable } from '../utils/lookup-table.js';
import { ThermoEngineError } from '../errors/index.js';
import { amu, bohr, cal } from './constants.js';

/**
 * Physical dimension a unit belongs to.
 *
 * Energies and heat capacities are molar.
 */
export type Dimension =
  | 'energy'
  | 'mass'
  | 'molar_mass'
  | 'length'
  | 'temperature'
  | 'inverse_length'
  | 'moment_of_inertia'
  | 'heat_capacity'
  | 'pressure'
  | 'time'
  | 'dimensionless';

/**
 * A registered unit.
 */
export interface UnitDefinition {
  readonly symbol: string;
  readonly dimension: Dimension;
  /** Multiply a value in this unit by `toSI` to get the SI value. */
  readonly toSI: number;
}

/** SI unit symbol of each dimension. */
export const SI_UNITS: Readonly<Record<Dimension, string>> = {
  energy: 'J/mol',
  mass: 'kg',
  molar_mass: 'kg/mol',
  length: 'm',
  temperature: 'K',
  inverse_length: 'm^-1',
  moment_of_inertia: 'kg*m^2',
  heat_capacity: 'J/(mol*K)',
  pressure: 'Pa',
  time: 's',
  dimensionless: '',
};

const UNIT_TABLE: ReadonlyArray<readonly [string, Dimension, number]> = [
  ['J/mol', 'energy', 1],
  ['kJ/mol', 'energy', 1e3],
  ['cal/mol', 'energy', cal],
  ['kcal/mol', 'energy', cal * 1e3],
  ['kg', 'mass', 1],
  ['g', 'mass', 1e-3],
  ['amu', 'mass', amu],
  ['kg/mol', 'molar_mass', 1],
  ['g/mol', 'molar_mass', 1e-3],
  ['m', 'length', 1],
  ['cm', 'length', 1e-2],
  ['angstrom', 'length', 1e-10],
  ['angstroms', 'length', 1e-10],
  ['bohr', 'length', bohr],
  ['K', 'temperature', 1],
  ['m^-1', 'inverse_length', 1],
  ['cm^-1', 'inverse_length', 1e2],
  ['kg*m^2', 'moment_of_inertia', 1],
  ['amu*angstrom^2', 'moment_of_inertia', amu * 1e-20],
  ['J/(mol*K)', 'heat_capacity', 1],
  ['J/mol*K', 'heat_capacity', 1],
  ['cal/(mol*K)', 'heat_capacity', cal],
  ['cal/mol*K', 'heat_capacity', cal],
  ['kcal/(mol*K)', 'heat_capacity', cal * 1e3],
  ['Pa', 'pressure', 1],
  ['bar', 'pressure', 1e5],
  ['atm', 'pressure', 101325],
  ['s', 'time', 1],
  ['ms', 'time', 1e-3],
  ['us', 'time', 1e-6],
  ['ns', 'time', 1e-9],
  ['', 'dimensionless', 1],
];

const UNITS = new LookupTable(
  UNIT_TABLE.map(([symbol, dimension, toSI]): [string, UnitDefinition] => [
    symbol,
    { symbol, dimension, toSI },
  ])
);

/**
 * Looks up a unit symbol.
 *
 * @throws {ThermoEngineError} `UNIT_MISMATCH` if the symbol is not registered.
 */
export function lookupUnit(symbol: string): UnitDefinition {
  return UNITS.require(
    symbol,
    () =>
      new ThermoEngineError(`Unknown unit "${symbol}"`, 'UNIT_MISMATCH', {
        details: { units: symbol },
      })
  );
}

/**
 * Whether a unit symbol is registered.
 */
export function isKnownUnit(symbol: string): boolean {
  return UNITS.has(symbol);
}

/**
 * Factor converting a value in `from` to a value in `to`.
 *
 * @throws {ThermoEngineError} `UNIT_MISMATCH` if the units are unknown or of
 * different dimensions.
 */
export function conversionFactor(from: string, to: string): number {
  const source = lookupUnit(from);
  const target = lookupUnit(to);
  if (source.dimension !== target.dimension) {
    throw new ThermoEngineError(
      `Cannot convert ${source.dimension} "${from}" to ${target.dimension} "${to}"`,
      'UNIT_MISMATCH',
      { details: { from, to, fromDimension: source.dimension, toDimension: target.dimension } }
    );
  }
  return source.toSI / target.toSI;
}
