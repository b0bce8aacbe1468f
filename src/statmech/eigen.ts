/**
 * Eigenvalues of a real symmetric matrix by the cyclic Jacobi method.
 *
 * @packageDocumentation
 */

import { ThermoEngineError } from '../errors/index.js';

/**
 * Dense symmetric matrix in row-major order.
 */
export interface SymmetricMatrix {
  readonly size: number;
  readonly data: Float64Array;
}

function offDiagonalNorm(a: Float64Array, n: number): number {
  let off = 0;
  for (let i = 0; i < n; i++) {
    for (let j = i + 1; j < n; j++) {
      off += Math.abs(a[i * n + j] ?? 0);
    }
  }
  return off;
}

function diagonalNorm(a: Float64Array, n: number): number {
  let sum = 0;
  for (let i = 0; i < n; i++) {
    sum += Math.abs(a[i * n + i] ?? 0);
  }
  return sum;
}

function rotate(a: Float64Array, n: number, p: number, q: number): void {
  const apq = a[p * n + q] ?? 0;
  if (apq === 0) {
    return;
  }
  const theta = ((a[q * n + q] ?? 0) - (a[p * n + p] ?? 0)) / (2 * apq);
  const t = (theta >= 0 ? 1 : -1) / (Math.abs(theta) + Math.hypot(theta, 1));
  const cos = 1 / Math.sqrt(t * t + 1);
  const sin = t * cos;
  const tau = sin / (1 + cos);
  const shift = t * apq;

  a[p * n + p] = (a[p * n + p] ?? 0) - shift;
  a[q * n + q] = (a[q * n + q] ?? 0) + shift;
  a[p * n + q] = 0;
  a[q * n + p] = 0;

  for (let r = 0; r < n; r++) {
    if (r === p || r === q) {
      continue;
    }
    const arp = a[r * n + p] ?? 0;
    const arq = a[r * n + q] ?? 0;
    const nextRp = arp - sin * (arq + arp * tau);
    const nextRq = arq + sin * (arp - arq * tau);
    a[r * n + p] = nextRp;
    a[p * n + r] = nextRp;
    a[r * n + q] = nextRq;
    a[q * n + r] = nextRq;
  }
}

/**
 * Returns the eigenvalues in ascending order. The input is not modified.
 *
 * @param matrix - Symmetric matrix; only symmetry of `data` is assumed.
 * @param maxSweeps - Sweep budget.
 * @param tolerance - Converged once the off-diagonal norm falls below
 * `tolerance` times the diagonal norm.
 * @throws {ThermoEngineError} `FIT_DID_NOT_CONVERGE` when the budget runs out.
 */
export function symmetricEigenvalues(matrix: SymmetricMatrix, maxSweeps: number, tolerance = 1e-14): number[] {
  const n = matrix.size;
  const a = Float64Array.from(matrix.data);

  for (let sweep = 0; sweep <= maxSweeps; sweep++) {
    const off = offDiagonalNorm(a, n);
    if (off === 0 || off <= tolerance * diagonalNorm(a, n)) {
      const eigenvalues: number[] = [];
      for (let i = 0; i < n; i++) {
        eigenvalues.push(a[i * n + i] ?? 0);
      }
      return eigenvalues.sort((x, y) => x - y);
    }
    if (sweep === maxSweeps) {
      break;
    }
    for (let p = 0; p < n - 1; p++) {
      for (let q = p + 1; q < n; q++) {
        rotate(a, n, p, q);
      }
    }
  }

  throw new ThermoEngineError(
    `Jacobi eigenvalue iteration did not converge within ${String(maxSweeps)} sweeps`,
    'FIT_DID_NOT_CONVERGE',
    { details: { size: n, maxSweeps, offDiagonal: offDiagonalNorm(a, n) } }
  );
}
