import { describe, it, expect } from 'vitest';
import { scalar } from '../units/index.js';
import { R } from '../units/constants.js';
import { isThermoEngineError, ThermoEngineError } from '../errors/index.js';
import { Logger } from '../utils/logger.js';
import { thermoFunctions, thermoValues } from '../thermo/index.js';
import { fitNASA, validateFitOptions } from './fitter.js';
import { nasaEnthalpy, nasaEntropy, polynomialCpOverR, polynomialHOverRT, polynomialSOverR } from './polynomial.js';
import { DEFAULT_FIT_OPTIONS, type ModelLimits, type NASAPolynomial, type ThermoFunctions } from './types.js';
import { n2h4Conformer } from '../../test-fixtures/species/conformers.js';

const LIMITS: ModelLimits = {
  E0: scalar(0, 'kJ/mol'),
  Cp0: scalar(3.5 * R, 'J/(mol*K)'),
  CpInf: scalar(4.5 * R, 'J/(mol*K)'),
};

const EXACT: NASAPolynomial = {
  coeffs: [3.5, 1e-3, -2e-7, 0, 0, -1000, 5],
  Tmin: scalar(10, 'K'),
  Tmax: scalar(3000, 'K'),
};

const exactFunctions: ThermoFunctions = {
  Cp: (t) => R * polynomialCpOverR(EXACT, t),
  H: (t) => R * t * polynomialHOverRT(EXACT, t),
  S: (t) => R * polynomialSOverR(EXACT, t),
};

function thrown(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('fitNASA', () => {
  it('should recover a function that is itself a NASA polynomial', () => {
    const result = fitNASA(exactFunctions, DEFAULT_FIT_OPTIONS, LIMITS);
    expect(result.residual).toBeLessThan(1e-8);
    expect(result.Tmid).toBe(1000);
    for (const poly of result.model.polynomials) {
      expect(poly.coeffs[0]).toBeCloseTo(3.5, 6);
      expect(poly.coeffs[1]).toBeCloseTo(1e-3, 9);
      expect(poly.coeffs[5]).toBeCloseTo(-1000, 2);
      expect(poly.coeffs[6]).toBeCloseTo(5, 5);
    }
  });

  it('should fit hydrazine with a fixed Tmid', () => {
    const conformer = n2h4Conformer();
    const result = fitNASA(thermoFunctions(conformer), DEFAULT_FIT_OPTIONS, LIMITS);
    expect(result.residual).toBeLessThan(0.1);
    expect(result.discontinuity.Cp).toBeLessThan(1e-6);
    expect(result.discontinuity.H).toBeLessThan(1e-6);
    expect(result.discontinuity.S).toBeLessThan(1e-6);

    const { model } = result;
    expect(model.polynomials[0].Tmax.value).toBe(1000);
    expect(model.polynomials[1].Tmin.value).toBe(1000);
    expect(model.E0).toBe(LIMITS.E0);

    const exact = thermoValues(conformer, 298.15);
    expect(nasaEnthalpy(model, 298.15).value).toBeCloseTo(exact.H, 4);
    expect(nasaEntropy(model, 298.15).value).toBeCloseTo(exact.S, 6);
  });

  it('should give the same model for the same input', () => {
    const first = fitNASA(thermoFunctions(n2h4Conformer()), DEFAULT_FIT_OPTIONS, LIMITS);
    const second = fitNASA(thermoFunctions(n2h4Conformer()), DEFAULT_FIT_OPTIONS, LIMITS);
    expect(second.model.polynomials[0].coeffs).toEqual(first.model.polynomials[0].coeffs);
    expect(second.model.polynomials[1].coeffs).toEqual(first.model.polynomials[1].coeffs);
    expect(second.residual).toBe(first.residual);
  });

  it('should report a poor fit with the result attached', () => {
    const error = thrown(() =>
      fitNASA(thermoFunctions(n2h4Conformer()), { ...DEFAULT_FIT_OPTIONS, residualTolerance: 1e-9 }, LIMITS)
    );
    expect(isThermoEngineError(error, 'POOR_FIT_QUALITY')).toBe(true);
    const result = error instanceof ThermoEngineError ? error.details.result : undefined;
    expect(result).toMatchObject({ Tmid: 1000 });
  });

  it('should log the selected Tmid', () => {
    const lines: string[] = [];
    const logger = new Logger({ component: 'NASAFitter', write: (line) => lines.push(line) });
    fitNASA(exactFunctions, DEFAULT_FIT_OPTIONS, LIMITS, logger);
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({
      level: 'info',
      component: 'NASAFitter',
      event: 'tmid_selected',
      data: { tmid: 1000, searched: false },
    });
  });

  describe('Tmid search', () => {
    it('should choose a Tmid strictly inside the range', () => {
      const result = fitNASA(
        thermoFunctions(n2h4Conformer()),
        { ...DEFAULT_FIT_OPTIONS, searchTmid: true },
        LIMITS
      );
      expect(result.Tmid).toBeGreaterThan(10);
      expect(result.Tmid).toBeLessThan(3000);
      expect(result.residual).toBeLessThan(0.1);
      expect(result.model.polynomials[0].Tmax.value).toBe(result.Tmid);
    });

    it('should break ties toward the middle of the range', () => {
      const lines: string[] = [];
      const logger = new Logger({ component: 'NASAFitter', debugMode: true, write: (line) => lines.push(line) });
      const result = fitNASA(exactFunctions, { ...DEFAULT_FIT_OPTIONS, searchTmid: true }, LIMITS, logger);
      // candidates sit 115 K apart with 1505 K in the middle
      expect(Math.abs(result.Tmid - 1505)).toBeLessThanOrEqual(115);
      const candidates = lines.map((line): unknown => JSON.parse(line)).filter((entry) =>
        typeof entry === 'object' && entry !== null && Reflect.get(entry, 'event') === 'tmid_candidate'
      );
      expect(candidates).toHaveLength(25);
    });

    it('should give up when the refinement runs out of iterations', () => {
      const error = thrown(() =>
        fitNASA(exactFunctions, { ...DEFAULT_FIT_OPTIONS, searchTmid: true, maxIterations: 1 }, LIMITS)
      );
      expect(isThermoEngineError(error, 'FIT_DID_NOT_CONVERGE')).toBe(true);
    });
  });
});

describe('validateFitOptions', () => {
  it.each([
    ['Tmid at Tmin', { Tmid: 10 }],
    ['Tmid at Tmax', { Tmid: 3000 }],
    ['Tmin above Tmax', { Tmin: 3000, Tmax: 10 }],
    ['non-positive Tmin', { Tmin: 0 }],
    ['too few samples', { samplesPerRange: 3 }],
    ['fractional samples', { samplesPerRange: 10.5 }],
    ['no candidates', { candidateCount: 0 }],
    ['zero Tmid tolerance', { tmidTolerance: 0 }],
  ])('should reject %s', (_name, override) => {
    const error = thrown(() => validateFitOptions({ ...DEFAULT_FIT_OPTIONS, ...override }));
    expect(isThermoEngineError(error, 'INVALID_FIT_CONFIGURATION')).toBe(true);
  });

  it('should ignore Tmid when it is searched for', () => {
    expect(() => validateFitOptions({ ...DEFAULT_FIT_OPTIONS, Tmid: 0, searchTmid: true })).not.toThrow();
  });
});
