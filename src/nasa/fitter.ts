/**
 * Two-range NASA polynomial fitting.
 *
 * @packageDocumentation
 */

import { ThermoEngineError } from '../errors/index.js';
import { scalar } from '../units/index.js';
import { R } from '../units/constants.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { solveLinearSystem } from './linear-algebra.js';
import { polynomialCpOverR, polynomialHOverRT, polynomialSOverR } from './polynomial.js';
import type {
  FitDeviation,
  ModelLimits,
  NASAFitOptions,
  NASAFitResult,
  NASAModel,
  NASAPolynomial,
  ThermoFunctions,
} from './types.js';

const COEFFS = 7;
const GOLDEN = (Math.sqrt(5) - 1) / 2;

interface Sample {
  readonly t: number;
  readonly cp: number;
  readonly h: number;
  readonly s: number;
}

/**
 * Design rows of `Cp/R`, `H/RT`, `S/R` in coefficients scaled by
 * `τ = T/1000` (`a_k = b_k / 1000^{k−1}` for k ≤ 5, `a6 = 1000 b6`).
 */
function designRows(t: number): [number[], number[], number[]] {
  const tau = t / 1000;
  const tau2 = tau * tau;
  const tau3 = tau2 * tau;
  const tau4 = tau3 * tau;
  return [
    [1, tau, tau2, tau3, tau4, 0, 0],
    [1, tau / 2, tau2 / 3, tau3 / 4, tau4 / 5, 1 / tau, 0],
    [Math.log(t), tau, tau2 / 2, tau3 / 3, tau4 / 4, 0, 1],
  ];
}

function unscale(b: readonly number[]): number[] {
  const c = (i: number): number => b[i] ?? 0;
  return [c(0), c(1) / 1e3, c(2) / 1e6, c(3) / 1e9, c(4) / 1e12, c(5) * 1e3, c(6)];
}

function sampleGrid(from: number, to: number, count: number): number[] {
  const grid: number[] = [];
  for (let i = 0; i < count; i++) {
    grid.push(i === count - 1 ? to : from + ((to - from) * i) / (count - 1));
  }
  return grid;
}

function polynomial(coeffs: readonly number[], tmin: number, tmax: number): NASAPolynomial {
  return Object.freeze({
    coeffs: Object.freeze([...coeffs]),
    Tmin: scalar(tmin, 'K'),
    Tmax: scalar(tmax, 'K'),
  });
}

/**
 * Fits both polynomials for a fixed Tmid: joint least squares with Cp
 * continuity as a Lagrange constraint, then exact H and S at the reference
 * temperature and H and S continuity at Tmid via a6 and a7.
 */
class FitProblem {
  private readonly cache = new Map<number, Sample>();

  constructor(
    private readonly functions: ThermoFunctions,
    private readonly options: NASAFitOptions,
    private readonly limits: ModelLimits
  ) {}

  sample(t: number): Sample {
    const cached = this.cache.get(t);
    if (cached !== undefined) {
      return cached;
    }
    const sample: Sample = {
      t,
      cp: this.functions.Cp(t) / R,
      h: this.functions.H(t) / (R * t),
      s: this.functions.S(t) / R,
    };
    this.cache.set(t, sample);
    return sample;
  }

  fit(tmid: number): NASAFitResult {
    const { Tmin, Tmax, samplesPerRange } = this.options;
    const ranges: [number, number][] = [
      [Tmin, tmid],
      [tmid, Tmax],
    ];
    const unknowns = 2 * COEFFS;
    const size = unknowns + 1;
    const normal: number[][] = Array.from({ length: size }, () => new Array<number>(size).fill(0));
    const rhs = new Array<number>(size).fill(0);

    ranges.forEach(([from, to], range) => {
      const offset = range * COEFFS;
      for (const t of sampleGrid(from, to, samplesPerRange)) {
        const sample = this.sample(t);
        const targets = [sample.cp, sample.h, sample.s];
        designRows(t).forEach((row, k) => {
          const y = targets[k] ?? 0;
          for (let i = 0; i < COEFFS; i++) {
            const ri = row[i] ?? 0;
            const normalRow = normal[offset + i] ?? [];
            rhs[offset + i] = (rhs[offset + i] ?? 0) + 2 * ri * y;
            for (let j = 0; j < COEFFS; j++) {
              normalRow[offset + j] = (normalRow[offset + j] ?? 0) + 2 * ri * (row[j] ?? 0);
            }
          }
        });
      }
    });

    // Cp(low, Tmid) − Cp(high, Tmid) = 0
    const [cpRow] = designRows(tmid);
    const constraintRow = normal[unknowns] ?? [];
    for (let i = 0; i < 5; i++) {
      const value = cpRow[i] ?? 0;
      constraintRow[i] = value;
      constraintRow[COEFFS + i] = -value;
      const lowRow = normal[i] ?? [];
      const highRow = normal[COEFFS + i] ?? [];
      lowRow[unknowns] = value;
      highRow[unknowns] = -value;
    }

    const solution = solveLinearSystem(normal, rhs);
    const low = unscale(solution.slice(0, COEFFS));
    const high = unscale(solution.slice(COEFFS, unknowns));
    this.anchor(low, high, tmid);

    const model = this.model(low, high, tmid);
    return this.assess(model, tmid, ranges);
  }

  private anchor(low: number[], high: number[], tmid: number): void {
    const { Tmin, Tmax, referenceTemperature } = this.options;
    const reference = referenceTemperature >= Tmin && referenceTemperature <= Tmax ? referenceTemperature : Tmin;
    const [anchored, other] = reference <= tmid ? [low, high] : [high, low];

    const target = this.sample(reference);
    const anchoredPoly = polynomial(anchored, Tmin, Tmax);
    anchored[5] = (anchored[5] ?? 0) + (target.h - polynomialHOverRT(anchoredPoly, reference)) * reference;
    anchored[6] = (anchored[6] ?? 0) + (target.s - polynomialSOverR(anchoredPoly, reference));

    const fixedPoly = polynomial(anchored, Tmin, Tmax);
    const otherPoly = polynomial(other, Tmin, Tmax);
    other[5] = (other[5] ?? 0) + (polynomialHOverRT(fixedPoly, tmid) - polynomialHOverRT(otherPoly, tmid)) * tmid;
    other[6] = (other[6] ?? 0) + (polynomialSOverR(fixedPoly, tmid) - polynomialSOverR(otherPoly, tmid));
  }

  private model(low: readonly number[], high: readonly number[], tmid: number): NASAModel {
    const { Tmin, Tmax } = this.options;
    return Object.freeze({
      polynomials: Object.freeze([polynomial(low, Tmin, tmid), polynomial(high, tmid, Tmax)] as const),
      Tmin: scalar(Tmin, 'K'),
      Tmax: scalar(Tmax, 'K'),
      E0: this.limits.E0,
      Cp0: this.limits.Cp0,
      CpInf: this.limits.CpInf,
    });
  }

  private assess(model: NASAModel, tmid: number, ranges: readonly [number, number][]): NASAFitResult {
    let squares = 0;
    let count = 0;
    const max = { Cp: 0, H: 0, S: 0 };
    ranges.forEach(([from, to], range) => {
      const poly = model.polynomials[range === 0 ? 0 : 1];
      for (const t of sampleGrid(from, to, this.options.samplesPerRange)) {
        const sample = this.sample(t);
        const dCp = polynomialCpOverR(poly, t) - sample.cp;
        const dH = polynomialHOverRT(poly, t) - sample.h;
        const dS = polynomialSOverR(poly, t) - sample.s;
        squares += dCp * dCp + dH * dH + dS * dS;
        count += 3;
        max.Cp = Math.max(max.Cp, Math.abs(dCp));
        max.H = Math.max(max.H, Math.abs(dH));
        max.S = Math.max(max.S, Math.abs(dS));
      }
    });

    const [low, high] = model.polynomials;
    const discontinuity: FitDeviation = {
      Cp: Math.abs(polynomialCpOverR(low, tmid) - polynomialCpOverR(high, tmid)),
      H: Math.abs(polynomialHOverRT(low, tmid) - polynomialHOverRT(high, tmid)),
      S: Math.abs(polynomialSOverR(low, tmid) - polynomialSOverR(high, tmid)),
    };

    return Object.freeze({
      model,
      Tmid: tmid,
      residual: Math.sqrt(squares / count),
      maxDeviation: max,
      discontinuity,
    });
  }
}

function invalidConfiguration(message: string, details: Record<string, unknown>): ThermoEngineError {
  return new ThermoEngineError(message, 'INVALID_FIT_CONFIGURATION', { details });
}

/**
 * @throws {ThermoEngineError} `INVALID_FIT_CONFIGURATION`.
 */
export function validateFitOptions(options: NASAFitOptions): void {
  const { Tmin, Tmax, Tmid } = options;
  if (!Number.isFinite(Tmin) || !Number.isFinite(Tmax) || Tmin <= 0 || Tmin >= Tmax) {
    throw invalidConfiguration(`Need 0 < Tmin < Tmax, got [${String(Tmin)}, ${String(Tmax)}] K`, { Tmin, Tmax });
  }
  if (!options.searchTmid && !(Tmid > Tmin && Tmid < Tmax)) {
    throw invalidConfiguration(`Tmid ${String(Tmid)} K must lie strictly inside (${String(Tmin)}, ${String(Tmax)}) K`, {
      Tmin,
      Tmid,
      Tmax,
    });
  }
  if (!Number.isInteger(options.samplesPerRange) || options.samplesPerRange < 4) {
    throw invalidConfiguration('samplesPerRange must be an integer of at least 4', {
      samplesPerRange: options.samplesPerRange,
    });
  }
  if (!Number.isInteger(options.candidateCount) || options.candidateCount < 1) {
    throw invalidConfiguration('candidateCount must be a positive integer', { candidateCount: options.candidateCount });
  }
  if (!(options.tmidTolerance > 0)) {
    throw invalidConfiguration('tmidTolerance must be positive', { tmidTolerance: options.tmidTolerance });
  }
}

/**
 * Golden-section minimum of the residual on `[lower, upper]`.
 */
function refineTmid(
  problem: FitProblem,
  lower: number,
  upper: number,
  options: NASAFitOptions
): NASAFitResult {
  let a = lower;
  let b = upper;
  let x1 = b - GOLDEN * (b - a);
  let x2 = a + GOLDEN * (b - a);
  let f1 = problem.fit(x1);
  let f2 = problem.fit(x2);
  let iterations = 0;

  while (b - a > options.tmidTolerance) {
    if (iterations >= options.maxIterations) {
      throw new ThermoEngineError(
        `Tmid refinement did not converge within ${String(options.maxIterations)} iterations`,
        'FIT_DID_NOT_CONVERGE',
        { details: { lower: a, upper: b, maxIterations: options.maxIterations } }
      );
    }
    iterations++;
    if (f1.residual <= f2.residual) {
      b = x2;
      x2 = x1;
      f2 = f1;
      x1 = b - GOLDEN * (b - a);
      f1 = problem.fit(x1);
    } else {
      a = x1;
      x1 = x2;
      f1 = f2;
      x2 = a + GOLDEN * (b - a);
      f2 = problem.fit(x2);
    }
  }
  return f1.residual <= f2.residual ? f1 : f2;
}

function searchTmid(problem: FitProblem, options: NASAFitOptions, logger: Logger): NASAFitResult {
  const { Tmin, Tmax, candidateCount, tieTolerance } = options;
  const width = (Tmax - Tmin) / (candidateCount + 1);
  const candidates: NASAFitResult[] = [];
  for (let i = 1; i <= candidateCount; i++) {
    const result = problem.fit(Tmin + width * i);
    logger.debug('tmid_candidate', { tmid: result.Tmid, residual: result.residual });
    candidates.push(result);
  }

  const best = Math.min(...candidates.map((candidate) => candidate.residual));
  const midpoint = (Tmin + Tmax) / 2;
  let chosenIndex = 0;
  let chosenDistance = Number.POSITIVE_INFINITY;
  candidates.forEach((candidate, index) => {
    const distance = Math.abs(candidate.Tmid - midpoint);
    if (candidate.residual <= best + tieTolerance && distance < chosenDistance) {
      chosenIndex = index;
      chosenDistance = distance;
    }
  });
  const chosen = candidates[chosenIndex];
  if (chosen === undefined) {
    throw invalidConfiguration('No Tmid candidates', { candidateCount });
  }

  const refined = refineTmid(problem, chosen.Tmid - width, chosen.Tmid + width, options);
  return refined.residual < chosen.residual ? refined : chosen;
}

/**
 * Fits a two-range NASA model to Cp, H and S.
 *
 * @param functions - Target thermodynamic functions.
 * @param options - Fit settings; see {@link NASAFitOptions}.
 * @param limits - E0, Cp0 and CpInf carried onto the model.
 * @throws {ThermoEngineError} `INVALID_FIT_CONFIGURATION`,
 * `FIT_DID_NOT_CONVERGE`, or `POOR_FIT_QUALITY` (with the result under
 * `details.result`).
 */
export function fitNASA(
  functions: ThermoFunctions,
  options: NASAFitOptions,
  limits: ModelLimits,
  logger: Logger = silentLogger
): NASAFitResult {
  validateFitOptions(options);
  const problem = new FitProblem(functions, options, limits);
  const result = options.searchTmid ? searchTmid(problem, options, logger) : problem.fit(options.Tmid);

  logger.info('tmid_selected', {
    tmid: result.Tmid,
    residual: result.residual,
    searched: options.searchTmid,
  });

  if (!(result.residual <= options.residualTolerance)) {
    throw new ThermoEngineError(
      `NASA fit residual ${result.residual.toPrecision(4)} exceeds ${String(options.residualTolerance)}`,
      'POOR_FIT_QUALITY',
      { details: { residual: result.residual, tolerance: options.residualTolerance, result } }
    );
  }
  const jump = Math.max(result.discontinuity.Cp, result.discontinuity.H, result.discontinuity.S);
  if (jump > options.continuityTolerance) {
    throw new ThermoEngineError(
      `NASA model is discontinuous at Tmid (${jump.toExponential(2)})`,
      'POOR_FIT_QUALITY',
      { details: { discontinuity: result.discontinuity, tolerance: options.continuityTolerance, result } }
    );
  }
  return result;
}
