import { describe, expect, it } from 'vitest';
import { isThermoEngineError } from '../errors/index.js';
import { DEFAULT_FIT_OPTIONS, nasaEnthalpy, nasaEntropy } from '../nasa/index.js';
import { DEFAULT_ROTOR_OPTIONS } from '../statmech/index.js';
import { Logger } from '../utils/logger.js';
import { N2H4_FREQUENCIES } from '../../test-fixtures/species/conformers.js';
import { N2H4_SCALE_FACTOR, N2H4_YAML, n2h4Input } from '../../test-fixtures/species/inputs.js';
import { buildSpeciesRecord, evaluateRecordThermo, formatRecordDatetime, refitSpeciesRecord } from './pipeline.js';
import { parseSpeciesRecord } from './record-codec.js';
import type { PipelineOptions } from './types.js';

const FIXED_NOW = new Date(Date.UTC(2024, 0, 5, 7, 3, 59));

function options(logger?: Logger): PipelineOptions {
  return {
    fit: DEFAULT_FIT_OPTIONS,
    rotors: DEFAULT_ROTOR_OPTIONS,
    now: () => FIXED_NOW,
    ...(logger === undefined ? {} : { logger }),
  };
}

function capture(): { logger: Logger; entries: unknown[] } {
  const entries: unknown[] = [];
  const logger = new Logger({
    component: 'test',
    write: (line) => {
      entries.push(JSON.parse(line));
    },
  });
  return { logger, entries };
}

describe('formatRecordDatetime', () => {
  it('should write UTC minutes', () => {
    expect(formatRecordDatetime(FIXED_NOW)).toBe('2024-01-05 07:03');
    expect(formatRecordDatetime(new Date(Date.UTC(1999, 11, 31, 23, 59)))).toBe('1999-12-31 23:59');
  });
});

describe('buildSpeciesRecord', () => {
  it('should reproduce the stored hydrazine values', () => {
    const record = buildSpeciesRecord(n2h4Input(), options());
    expect(Math.abs(nasaEnthalpy(record.thermo, 298.15).to('kcal/mol') - 24.14)).toBeLessThan(0.1);
    expect(Math.abs(nasaEntropy(record.thermo, 298.15).to('cal/(mol*K)') - 56.75)).toBeLessThan(0.25);
  });

  it('should store the scaled conformer and derived identity', () => {
    const record = buildSpeciesRecord(n2h4Input(), options());
    const oscillator = record.conformer.modes.find((mode) => mode.kind === 'harmonic-oscillator');
    const frequencies = oscillator?.kind === 'harmonic-oscillator' ? oscillator.frequencies.to('cm^-1') : [];
    expect(frequencies).toHaveLength(N2H4_FREQUENCIES.length);
    frequencies.forEach((frequency, index) => {
      expect(frequency).toBeCloseTo(N2H4_FREQUENCIES[index] ?? Number.NaN, 9);
    });
    expect(record.formula).toBe('H4N2');
    expect(record.molecularWeight?.to('amu')).toBeCloseTo(2 * 14.0067 + 4 * 1.00794, 9);
    expect(Math.abs((record.molecularWeight?.to('amu') ?? 0) - 32.04524366207737)).toBeLessThan(1e-3);
    expect(record.datetime).toBe('2024-01-05 07:03');
    expect(record.frequencyScaleFactor).toBe(0.97);
    expect(record.useBondCorrections).toBe(false);
    expect(record.isTransitionState).toBe(false);
    expect(record.thermo.E0.to('kJ/mol')).toBe(record.conformer.E0.to('kJ/mol'));
    expect(Object.isFrozen(record)).toBe(true);
  });

  it('should evaluate torsions as oscillators when hindered rotors are off', () => {
    const record = buildSpeciesRecord(n2h4Input({ useHinderedRotors: false }), options());
    expect(record.conformer.modes.map((mode) => mode.kind)).toEqual([
      'translation',
      'nonlinear-rotor',
      'harmonic-oscillator',
      'harmonic-oscillator',
    ]);
    const torsion = record.conformer.modes[3];
    const [standIn] = torsion?.kind === 'harmonic-oscillator' ? torsion.frequencies.to('cm^-1') : [];
    expect(standIn).toBeCloseTo(380.0250313439182 * N2H4_SCALE_FACTOR, 9);
  });

  it('should reject an empty label', () => {
    try {
      buildSpeciesRecord(n2h4Input({ label: '  ' }), options());
      expect.unreachable();
    } catch (error) {
      expect(isThermoEngineError(error, 'MALFORMED_RECORD')).toBe(true);
    }
  });

  it('should reject a non-positive scale factor', () => {
    try {
      buildSpeciesRecord(n2h4Input({ frequencyScaleFactor: -1 }), options());
      expect.unreachable();
    } catch (error) {
      expect(isThermoEngineError(error, 'INVALID_MODE_PARAMETER')).toBe(true);
    }
  });

  it('should log the start and the fit', () => {
    const { logger, entries } = capture();
    buildSpeciesRecord(n2h4Input(), options(logger));
    expect(entries).toMatchObject([
      { level: 'info', component: 'SpeciesPipeline', event: 'species_started', data: { label: 'N2H4' } },
      { level: 'info', component: 'NASAFitter', event: 'tmid_selected' },
      { level: 'info', component: 'SpeciesPipeline', event: 'species_fitted', data: { label: 'N2H4', tmid: 1000 } },
    ]);
  });
});

describe('refitSpeciesRecord', () => {
  it('should fit the stored conformer again without rescaling it', () => {
    const stored = parseSpeciesRecord(N2H4_YAML);
    const refitted = refitSpeciesRecord(stored, options());
    expect(refitted.conformer).toBe(stored.conformer);
    expect(refitted.label).toBe('N2H4');
    expect(refitted.energyTransfer).toBe(stored.energyTransfer);
    expect(refitted.datetime).toBe('2024-01-05 07:03');
    expect(refitted.thermo.polynomials[0].Tmax.to('K')).toBe(1000);
    expect(nasaEnthalpy(refitted.thermo, 298.15).to('kcal/mol')).toBeCloseTo(24.1435, 3);
  });
});

describe('evaluateRecordThermo', () => {
  it('should agree with the record model at the reference temperature', () => {
    const record = buildSpeciesRecord(n2h4Input(), options());
    const point = evaluateRecordThermo(record, 298.15);
    expect(point.H.to('kJ/mol')).toBeCloseTo(nasaEnthalpy(record.thermo, 298.15).to('kJ/mol'), 6);
    expect(point.S.to('J/(mol*K)')).toBeCloseTo(nasaEntropy(record.thermo, 298.15).to('J/(mol*K)'), 6);
  });
});
