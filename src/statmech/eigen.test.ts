import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { symmetricEigenvalues } from './eigen.js';
import { boltzmannMoments, termsFromMoments } from './boltzmann.js';
import { besselI0Scaled, besselI1Scaled } from './bessel.js';
import { isThermoEngineError } from '../errors/index.js';

const R = 8.314472;

describe('symmetricEigenvalues', () => {
  it('should diagonalize a 2x2 matrix', () => {
    const values = symmetricEigenvalues({ size: 2, data: Float64Array.from([2, 1, 1, 2]) }, 10);
    expect(values[0]).toBeCloseTo(1, 12);
    expect(values[1]).toBeCloseTo(3, 12);
  });

  it('should return a diagonal matrix without sweeping', () => {
    expect(symmetricEigenvalues({ size: 3, data: Float64Array.from([5, 0, 0, 0, -1, 0, 0, 0, 2]) }, 0)).toEqual([
      -1, 2, 5,
    ]);
  });

  it('should not modify its input', () => {
    const data = Float64Array.from([2, 1, 1, 2]);
    symmetricEigenvalues({ size: 2, data }, 10);
    expect([...data]).toEqual([2, 1, 1, 2]);
  });

  it('should report an exhausted sweep budget', () => {
    let caught: unknown;
    try {
      symmetricEigenvalues({ size: 2, data: Float64Array.from([2, 1, 1, 2]) }, 0);
    } catch (error) {
      caught = error;
    }
    expect(isThermoEngineError(caught, 'FIT_DID_NOT_CONVERGE')).toBe(true);
  });

  it('should preserve the trace (property-based)', () => {
    fc.assert(
      fc.property(
        fc.array(fc.double({ min: -100, max: 100, noNaN: true }), { minLength: 10, maxLength: 10 }),
        (entries) => {
          const n = 4;
          const data = new Float64Array(n * n);
          let k = 0;
          let trace = 0;
          for (let i = 0; i < n; i++) {
            for (let j = i; j < n; j++) {
              const value = entries[k++] ?? 0;
              data[i * n + j] = value;
              data[j * n + i] = value;
              if (i === j) {
                trace += value;
              }
            }
          }
          const values = symmetricEigenvalues({ size: n, data }, 60);
          expect(values.reduce((sum, v) => sum + v, 0)).toBeCloseTo(trace, 8);
          for (let i = 1; i < n; i++) {
            expect(values[i]).toBeGreaterThanOrEqual(values[i - 1] ?? -Infinity);
          }
        }
      )
    );
  });
});

describe('boltzmannMoments', () => {
  it('should weight two levels', () => {
    const gap = R * 300 * Math.log(2);
    const moments = boltzmannMoments([0, gap], 300);
    expect(moments.lnSum).toBeCloseTo(Math.log(1.5), 12);
    expect(moments.mean).toBeCloseTo(gap / 3, 9);
    expect(moments.variance / ((2 * gap * gap) / 9)).toBeCloseTo(1, 9);
  });

  it('should not overflow for deep negative energies', () => {
    const moments = boltzmannMoments([-1e7, -1e7 + 1], 10);
    expect(Number.isFinite(moments.lnSum)).toBe(true);
    expect(moments.lnSum).toBeGreaterThan(1e7 / (R * 10));
  });

  it('should give a single level no heat capacity', () => {
    const terms = termsFromMoments(boltzmannMoments([0], 500), 500);
    expect(terms.lnQ).toBeCloseTo(0, 15);
    expect(terms.dlnQdT).toBeCloseTo(0, 15);
    expect(terms.d2lnQdT2).toBeCloseTo(0, 15);
  });
});

describe('scaled Bessel functions', () => {
  it('should match reference values', () => {
    // I0(1) = 1.2660658778, I1(1) = 0.5651591040, I0(10) = 2815.716628
    expect(besselI0Scaled(1) * Math.E).toBeCloseTo(1.2660658778, 6);
    expect(besselI1Scaled(1) * Math.E).toBeCloseTo(0.565159104, 6);
    expect(besselI0Scaled(10) * Math.exp(10)).toBeCloseTo(2815.716628, 1);
    expect(besselI0Scaled(0)).toBe(1);
    expect(besselI1Scaled(-1)).toBe(-besselI1Scaled(1));
  });

  it('should stay finite for large arguments', () => {
    expect(besselI0Scaled(1e6)).toBeCloseTo(1 / Math.sqrt(2 * Math.PI * 1e6), 8);
  });
});
