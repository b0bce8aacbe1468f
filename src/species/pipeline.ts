/**
 * Conformer → partition functions → thermo → NASA fit → species record.
 *
 * @packageDocumentation
 */

import {
  createConformer,
  heatCapacityLimits,
  molecularFormula,
  replaceHinderedRotors,
  scaleFrequencies,
  standardMolecularWeight,
  type Conformer,
} from '../conformer/index.js';
import { ThermoEngineError } from '../errors/index.js';
import { fitNASA, type NASAModel } from '../nasa/index.js';
import { DEFAULT_ROTOR_OPTIONS, type RotorOptions } from '../statmech/index.js';
import { thermo, thermoFunctions, type ThermoPoint } from '../thermo/index.js';
import { scalar, type ScalarQuantity } from '../units/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type { PipelineOptions, SpeciesInput, SpeciesRecord } from './types.js';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * `YYYY-MM-DD HH:mm` in UTC.
 */
export function formatRecordDatetime(date: Date): string {
  return (
    `${String(date.getUTCFullYear())}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}`
  );
}

function geometryWeight(conformer: Conformer): ScalarQuantity | undefined {
  if (conformer.geometry === undefined) {
    return undefined;
  }
  return scalar(standardMolecularWeight(conformer.geometry.number.value), 'amu');
}

function fitConformer(label: string, conformer: Conformer, options: PipelineOptions, logger: Logger): NASAModel {
  const fitLogger = (options.logger ?? silentLogger).child('NASAFitter');
  const rotors = {
    ...options.rotors,
    basisTemperature: Math.max(options.rotors.basisTemperature, options.fit.Tmax),
  };
  const result = fitNASA(
    thermoFunctions(conformer, rotors),
    options.fit,
    { E0: conformer.E0, ...heatCapacityLimits(conformer) },
    fitLogger
  );
  logger.info('species_fitted', {
    label,
    tmid: result.Tmid,
    residual: result.residual,
  });
  return result.model;
}

/**
 * Computes a species record from spectroscopic input.
 *
 * When hindered rotors are disabled each one is evaluated as an oscillator
 * at its torsional frequency; every oscillator frequency, stand-ins
 * included, is then multiplied by the scale factor. The stored conformer is
 * the one evaluated.
 *
 * @throws {ThermoEngineError} any engine code; see {@link fitNASA}.
 */
export function buildSpeciesRecord(input: SpeciesInput, options: PipelineOptions): SpeciesRecord {
  const logger = (options.logger ?? silentLogger).child('SpeciesPipeline');
  if (input.label.trim() === '') {
    throw new ThermoEngineError('Species label must not be empty', 'MALFORMED_RECORD', {
      details: { field: 'label' },
    });
  }
  logger.info('species_started', { label: input.label });

  // Rotor stand-ins are scaled with the other oscillators.
  const validated = createConformer(input.conformer);
  const conformer = scaleFrequencies(
    input.useHinderedRotors ? validated : replaceHinderedRotors(validated),
    input.frequencyScaleFactor
  );
  const model = fitConformer(input.label, conformer, options, logger);
  const formula = molecularFormula(conformer);
  const molecularWeight = input.molecularWeight?.requireDimension('molecular_weight', 'mass') ?? geometryWeight(conformer);

  return Object.freeze({
    label: input.label,
    ...(input.smiles === undefined ? {} : { smiles: input.smiles }),
    ...(input.inchi === undefined ? {} : { inchi: input.inchi }),
    ...(input.inchiKey === undefined ? {} : { inchiKey: input.inchiKey }),
    ...(input.adjacencyList === undefined ? {} : { adjacencyList: input.adjacencyList }),
    ...(formula === undefined ? {} : { formula }),
    ...(molecularWeight === undefined ? {} : { molecularWeight }),
    frequencyScaleFactor: input.frequencyScaleFactor,
    useHinderedRotors: input.useHinderedRotors,
    useBondCorrections: input.useBondCorrections ?? false,
    isTransitionState: input.isTransitionState ?? false,
    conformer,
    thermo: model,
    ...(input.energyTransfer === undefined ? {} : { energyTransfer: input.energyTransfer }),
    datetime: formatRecordDatetime((options.now ?? ((): Date => new Date()))()),
  });
}

/**
 * Fits a fresh NASA model to a record's stored conformer, which is already
 * scaled; everything else is carried over.
 */
export function refitSpeciesRecord(record: SpeciesRecord, options: PipelineOptions): SpeciesRecord {
  const logger = (options.logger ?? silentLogger).child('SpeciesPipeline');
  logger.info('species_started', { label: record.label, refit: true });
  const model = fitConformer(record.label, record.conformer, options, logger);
  return Object.freeze({
    ...record,
    thermo: model,
    datetime: formatRecordDatetime((options.now ?? ((): Date => new Date()))()),
  });
}

/**
 * Thermodynamic functions of a record's stored conformer at one temperature,
 * for checking a record against its own model.
 */
export function evaluateRecordThermo(
  record: SpeciesRecord,
  temperature: ScalarQuantity | number,
  rotors: RotorOptions = DEFAULT_ROTOR_OPTIONS
): ThermoPoint {
  return thermo(record.conformer, temperature, rotors);
}
