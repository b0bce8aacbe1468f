/**
 * Element symbols and standard atomic weights by atomic number, for
 * formulas, molecular weights and xyz output.
 *
 * @packageDocumentation
 */

import { LookupTable } from '../utils/lookup-table.js';
import { ThermoEngineError } from '../errors/index.js';

interface ElementData {
  readonly symbol: string;
  /** Standard atomic weight, amu. */
  readonly weight: number;
}

const ELEMENTS = new LookupTable<number, ElementData>(
  (
    [
      [1, 'H', 1.00794],
      [2, 'He', 4.002602],
      [3, 'Li', 6.941],
      [4, 'Be', 9.012182],
      [5, 'B', 10.811],
      [6, 'C', 12.0107],
      [7, 'N', 14.0067],
      [8, 'O', 15.9994],
      [9, 'F', 18.9984032],
      [10, 'Ne', 20.1797],
      [11, 'Na', 22.98976928],
      [12, 'Mg', 24.305],
      [13, 'Al', 26.9815386],
      [14, 'Si', 28.0855],
      [15, 'P', 30.973762],
      [16, 'S', 32.065],
      [17, 'Cl', 35.453],
      [18, 'Ar', 39.948],
      [35, 'Br', 79.904],
      [53, 'I', 126.90447],
    ] as const
  ).map(([z, symbol, weight]): [number, ElementData] => [z, { symbol, weight }])
);

function element(z: number): ElementData {
  return ELEMENTS.require(
    z,
    () =>
      new ThermoEngineError(`Unknown atomic number ${String(z)}`, 'MALFORMED_RECORD', {
        details: { atomicNumber: z },
      })
  );
}

/**
 * Symbol of the element with atomic number `z`.
 *
 * @throws {ThermoEngineError} `MALFORMED_RECORD` for an unknown atomic number.
 */
export function elementSymbol(z: number): string {
  return element(z).symbol;
}

/**
 * Molecular weight in amu from standard (isotope-averaged) atomic weights.
 *
 * @throws {ThermoEngineError} `MALFORMED_RECORD` for an unknown atomic number.
 */
export function standardMolecularWeight(atomicNumbers: readonly number[]): number {
  return atomicNumbers.reduce((sum, z) => sum + element(z).weight, 0);
}

/**
 * Element counts in Hill order: C, then H, then the rest alphabetically.
 * Without carbon every element, H included, is alphabetical.
 */
export function elementCounts(atomicNumbers: readonly number[]): [string, number][] {
  const counts = new Map<string, number>();
  for (const z of atomicNumbers) {
    const symbol = elementSymbol(z);
    counts.set(symbol, (counts.get(symbol) ?? 0) + 1);
  }
  const hasCarbon = counts.has('C');
  const rank = (symbol: string): number => {
    if (!hasCarbon) {
      return 2;
    }
    if (symbol === 'C') {
      return 0;
    }
    if (symbol === 'H') {
      return 1;
    }
    return 2;
  };
  return [...counts.entries()].sort(
    ([a], [b]) => rank(a) - rank(b) || (a < b ? -1 : a > b ? 1 : 0)
  );
}

/**
 * Hill-order formula, e.g. `CH4O` or `H4N2`.
 */
export function hillFormula(atomicNumbers: readonly number[]): string {
  return elementCounts(atomicNumbers)
    .map(([symbol, count]) => (count === 1 ? symbol : `${symbol}${String(count)}`))
    .join('');
}
