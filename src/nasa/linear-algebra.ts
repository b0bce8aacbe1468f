/**
 * Dense linear solve for the fitter's small KKT systems.
 *
 * @packageDocumentation
 */

import { ThermoEngineError } from '../errors/index.js';

/**
 * Solves `A x = b` by Gaussian elimination with partial pivoting.
 * Neither argument is modified.
 *
 * @throws {ThermoEngineError} `INVALID_FIT_CONFIGURATION` for a singular system.
 */
export function solveLinearSystem(matrix: readonly (readonly number[])[], rhs: readonly number[]): number[] {
  const n = rhs.length;
  const a = matrix.map((row) => [...row]);
  const b = [...rhs];
  const entry = (i: number, j: number): number => a[i]?.[j] ?? 0;

  for (let col = 0; col < n; col++) {
    let pivot = col;
    for (let row = col + 1; row < n; row++) {
      if (Math.abs(entry(row, col)) > Math.abs(entry(pivot, col))) {
        pivot = row;
      }
    }
    const pivotValue = entry(pivot, col);
    if (pivotValue === 0 || !Number.isFinite(pivotValue)) {
      throw new ThermoEngineError('Least-squares system is singular', 'INVALID_FIT_CONFIGURATION', {
        details: { column: col, size: n },
      });
    }
    if (pivot !== col) {
      const rowA = a[col] ?? [];
      a[col] = a[pivot] ?? [];
      a[pivot] = rowA;
      const valueB = b[col] ?? 0;
      b[col] = b[pivot] ?? 0;
      b[pivot] = valueB;
    }

    const pivotRow = a[col] ?? [];
    for (let row = col + 1; row < n; row++) {
      const target = a[row] ?? [];
      const factor = (target[col] ?? 0) / pivotValue;
      if (factor === 0) {
        continue;
      }
      for (let j = col; j < n; j++) {
        target[j] = (target[j] ?? 0) - factor * (pivotRow[j] ?? 0);
      }
      b[row] = (b[row] ?? 0) - factor * (b[col] ?? 0);
    }
  }

  const x = new Array<number>(n).fill(0);
  for (let i = n - 1; i >= 0; i--) {
    let sum = b[i] ?? 0;
    for (let j = i + 1; j < n; j++) {
      sum -= entry(i, j) * (x[j] ?? 0);
    }
    x[i] = sum / entry(i, i);
  }
  return x;
}
