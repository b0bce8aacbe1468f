/**
 * YAML species records.
 *
 * Numbers are written in their shortest round-trip form, so a record read
 * back carries the same bits in every quantity and coefficient.
 * `thermo_data`, `chemkin_thermo_string` and `xyz` are renderings: they are
 * regenerated on every write and never read as a source of truth.
 *
 * @packageDocumentation
 */

import * as yaml from 'js-yaml';
import {
  createConformer,
  elementCounts,
  elementSymbol,
  invalidParameter,
  hillFormula,
  type Conformer,
  type Geometry,
  type HinderedRotor,
  type Mode,
  type RotorTreatment,
} from '../conformer/index.js';
import { SingleExponentialDown } from '../energy-transfer/index.js';
import { ThermoEngineError } from '../errors/index.js';
import { formatChemkinThermo, type NASAModel, type NASAPolynomial } from '../nasa/index.js';
import {
  array,
  isKnownUnit,
  matrix,
  scalar,
  type ArrayQuantity,
  type Dimension,
  type MatrixQuantity,
  type ScalarQuantity,
} from '../units/index.js';
import { c, h } from '../units/constants.js';
import {
  validateRawMode,
  validateRawRecord,
  type RawArray,
  type RawConformer,
  type RawEnergyTransfer,
  type RawHinderedRotor,
  type RawMatrix,
  type RawMode,
  type RawNASA,
  type RawPolynomial,
  type RawScalar,
  type RawSpeciesRecord,
  type RawThermoData,
} from './schema.js';
import { renderThermoData } from './thermo-data.js';
import type { SpeciesRecord, ThermoDataTable } from './types.js';

const CHEMKIN_MAX_ELEMENTS = 5;
const CP_TABLE_KEY = 'Cp (cal/mol*K)';

function malformed(field: string, message: string): ThermoEngineError {
  return new ThermoEngineError(`${field}: ${message}`, 'MALFORMED_RECORD', { details: { field } });
}

// decoding

function unitsOf(raw: { readonly units?: string }, field: string): string {
  const units = raw.units ?? '';
  if (!isKnownUnit(units)) {
    throw new ThermoEngineError(`${field}: unknown unit "${units}"`, 'UNIT_MISMATCH', {
      details: { field, units },
    });
  }
  return units;
}

function decodeScalar(raw: RawScalar, field: string, dimension: Dimension): ScalarQuantity {
  return scalar(raw.value, unitsOf(raw, field)).requireDimension(field, dimension);
}

function decodeArray(raw: RawArray, field: string, dimension: Dimension): ArrayQuantity {
  return array(raw.value, unitsOf(raw, field)).requireDimension(field, dimension);
}

function decodeMatrix(raw: RawMatrix, field: string, dimension: Dimension): MatrixQuantity {
  return matrix(raw.value, unitsOf(raw, field)).requireDimension(field, dimension);
}

function rotorTreatment(raw: RawHinderedRotor, field: string): RotorTreatment {
  if (raw.quantum === true) {
    if (raw.semiclassical === true) {
      throw malformed(field, 'quantum and semiclassical are mutually exclusive');
    }
    return 'quantum';
  }
  return raw.semiclassical === false ? 'classical' : 'semiclassical';
}

function decodeHinderedRotor(raw: RawHinderedRotor, field: string): HinderedRotor {
  const base = {
    kind: 'hindered-rotor' as const,
    inertia: decodeScalar(raw.inertia, `${field}.inertia`, 'moment_of_inertia'),
    symmetry: raw.symmetry,
    treatment: rotorTreatment(raw, field),
    ...(raw.frequency === undefined ? {} : { frequency: scalar(raw.frequency, 'cm^-1') }),
  };
  if (raw.fourier !== undefined && raw.barrier === undefined) {
    return {
      ...base,
      potential: { kind: 'fourier', coefficients: decodeMatrix(raw.fourier, `${field}.fourier`, 'energy') },
    };
  }
  if (raw.barrier !== undefined && raw.fourier === undefined) {
    return {
      ...base,
      potential: { kind: 'cosine', barrier: decodeScalar(raw.barrier, `${field}.barrier`, 'energy') },
    };
  }
  throw malformed(field, 'a hindered rotor needs exactly one of fourier or barrier');
}

function decodeMode(raw: RawMode, field: string): Mode {
  switch (raw.class) {
    case 'IdealGasTranslation':
      return { kind: 'translation', mass: decodeScalar(raw.mass, `${field}.mass`, 'mass'), quantum: raw.quantum ?? false };
    case 'NonlinearRotor':
      return {
        kind: 'nonlinear-rotor',
        inertia: decodeArray(raw.inertia, `${field}.inertia`, 'moment_of_inertia'),
        symmetry: raw.symmetry,
        quantum: raw.quantum ?? false,
      };
    case 'LinearRotor':
      return {
        kind: 'linear-rotor',
        inertia: decodeScalar(raw.inertia, `${field}.inertia`, 'moment_of_inertia'),
        symmetry: raw.symmetry,
        quantum: raw.quantum ?? false,
      };
    case 'HarmonicOscillator':
      return {
        kind: 'harmonic-oscillator',
        frequencies: decodeArray(raw.frequencies, `${field}.frequencies`, 'inverse_length'),
        quantum: raw.quantum ?? true,
      };
    case 'HinderedRotor':
      return decodeHinderedRotor(raw, field);
  }
}

function decodeGeometry(raw: RawConformer): Geometry | undefined {
  const { coordinates, mass, number } = raw;
  if (coordinates === undefined && mass === undefined && number === undefined) {
    return undefined;
  }
  if (coordinates === undefined || mass === undefined || number === undefined) {
    throw malformed('conformer', 'coordinates, mass and number must be given together');
  }
  return {
    coordinates: decodeMatrix(coordinates, 'conformer.coordinates', 'length'),
    mass: decodeArray(mass, 'conformer.mass', 'mass'),
    number: decodeArray(number, 'conformer.number', 'dimensionless'),
  };
}

function decodeConformer(raw: RawConformer): Conformer {
  const modes = raw.modes.map((entry, index) => {
    const field = `conformer.modes[${String(index)}]`;
    return decodeMode(validateRawMode(entry, field), field);
  });
  const geometry = decodeGeometry(raw);
  return createConformer({
    E0: decodeScalar(raw.E0, 'conformer.E0', 'energy'),
    modes,
    spinMultiplicity: raw.spinMultiplicity,
    opticalIsomers: raw.opticalIsomers,
    ...(geometry === undefined ? {} : { geometry }),
  });
}

function decodePolynomial(raw: RawPolynomial, field: string): NASAPolynomial {
  return Object.freeze({
    coeffs: Object.freeze([...raw.coeffs]),
    Tmin: decodeScalar(raw.Tmin, `${field}.Tmin`, 'temperature'),
    Tmax: decodeScalar(raw.Tmax, `${field}.Tmax`, 'temperature'),
  });
}

function sameTemperature(a: ScalarQuantity, b: ScalarQuantity): boolean {
  const x = a.to('K');
  const y = b.to('K');
  return Math.abs(x - y) <= 1e-9 * Math.max(Math.abs(x), Math.abs(y));
}

function decodeNASA(raw: RawNASA): NASAModel {
  const low = decodePolynomial(raw.polynomials.polynomial1, 'thermo.polynomials.polynomial1');
  const high = decodePolynomial(raw.polynomials.polynomial2, 'thermo.polynomials.polynomial2');
  const Tmin = decodeScalar(raw.Tmin, 'thermo.Tmin', 'temperature');
  const Tmax = decodeScalar(raw.Tmax, 'thermo.Tmax', 'temperature');

  if (!sameTemperature(low.Tmin, Tmin) || !sameTemperature(low.Tmax, high.Tmin) || !sameTemperature(high.Tmax, Tmax)) {
    throw malformed('thermo.polynomials', 'polynomial ranges must cover [Tmin, Tmid] and [Tmid, Tmax]');
  }
  const tmid = low.Tmax.to('K');
  if (!(Tmin.to('K') < tmid && tmid < Tmax.to('K'))) {
    throw new ThermoEngineError(
      `thermo: Tmid ${String(tmid)} K must lie strictly inside (${String(Tmin.to('K'))}, ${String(Tmax.to('K'))}) K`,
      'INVALID_FIT_CONFIGURATION',
      { details: { Tmin: Tmin.to('K'), Tmid: tmid, Tmax: Tmax.to('K') } }
    );
  }

  return Object.freeze({
    polynomials: Object.freeze([low, high] as const),
    Tmin,
    Tmax,
    E0: decodeScalar(raw.E0, 'thermo.E0', 'energy'),
    Cp0: decodeScalar(raw.Cp0, 'thermo.Cp0', 'heat_capacity'),
    CpInf: decodeScalar(raw.CpInf, 'thermo.CpInf', 'heat_capacity'),
  });
}

function decodeEnergyTransfer(raw: RawEnergyTransfer): SingleExponentialDown {
  return new SingleExponentialDown({
    alpha0: decodeScalar(raw.alpha0, 'energy_transfer_model.alpha0', 'energy'),
    T0: decodeScalar(raw.T0, 'energy_transfer_model.T0', 'temperature'),
    n: raw.n,
  });
}

function loadDocument(text: string): RawSpeciesRecord {
  let data: unknown;
  try {
    data = yaml.load(text, { schema: yaml.CORE_SCHEMA });
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ThermoEngineError(`Species record is not valid YAML: ${cause.message}`, 'MALFORMED_RECORD', { cause });
  }
  return validateRawRecord(data);
}

/**
 * Reads a species record.
 *
 * @throws {ThermoEngineError} `MALFORMED_RECORD` for structural problems,
 * `UNIT_MISMATCH` for units of the wrong dimension, `UNSUPPORTED_MODE` for
 * an unknown mode class, `INVALID_MODE_PARAMETER` for bad mode values.
 */
export function parseSpeciesRecord(text: string): SpeciesRecord {
  const raw = loadDocument(text);
  if (!Number.isFinite(raw.frequency_scale_factor) || raw.frequency_scale_factor <= 0) {
    throw invalidParameter('frequency_scale_factor', 'must be positive and finite', raw.frequency_scale_factor);
  }

  const conformer = decodeConformer(raw.conformer);
  const thermo = decodeNASA(raw.thermo);
  const formula = conformer.geometry === undefined ? undefined : hillFormula(conformer.geometry.number.value);

  return Object.freeze({
    label: raw.label,
    ...(raw.smiles === undefined ? {} : { smiles: raw.smiles }),
    ...(raw.inchi === undefined ? {} : { inchi: raw.inchi }),
    ...(raw.inchi_key === undefined ? {} : { inchiKey: raw.inchi_key }),
    ...(raw.adjacency_list === undefined ? {} : { adjacencyList: raw.adjacency_list }),
    ...(formula === undefined ? {} : { formula }),
    ...(raw.molecular_weight === undefined
      ? {}
      : { molecularWeight: decodeScalar(raw.molecular_weight, 'molecular_weight', 'mass') }),
    frequencyScaleFactor: raw.frequency_scale_factor,
    useHinderedRotors: raw.use_hindered_rotors,
    useBondCorrections: raw.use_bond_corrections ?? false,
    isTransitionState: raw.is_ts ?? false,
    conformer,
    thermo,
    ...(raw.energy_transfer_model === undefined
      ? {}
      : { energyTransfer: decodeEnergyTransfer(raw.energy_transfer_model) }),
    datetime: raw.datetime,
  });
}

function decodeThermoData(raw: RawThermoData): ThermoDataTable {
  return {
    Cp: raw[CP_TABLE_KEY] ?? {},
    ...(raw.H298 === undefined ? {} : { H298: raw.H298 }),
    ...(raw.S298 === undefined ? {} : { S298: raw.S298 }),
  };
}

/**
 * The `thermo_data` table a record declares, for {@link auditThermoData}.
 * The record must be structurally valid.
 */
export function readThermoData(text: string): ThermoDataTable | undefined {
  const raw = loadDocument(text);
  return raw.thermo_data === undefined ? undefined : decodeThermoData(raw.thermo_data);
}

// encoding

function encodeScalar(quantity: ScalarQuantity): RawScalar {
  return { class: 'ScalarQuantity', units: quantity.units, value: quantity.value };
}

function encodeArray(quantity: ArrayQuantity): RawArray {
  return quantity.units === ''
    ? { class: 'ArrayQuantity', value: quantity.value }
    : { class: 'ArrayQuantity', units: quantity.units, value: quantity.value };
}

function encodeMatrix(quantity: MatrixQuantity): RawMatrix {
  return { class: 'ArrayQuantity', units: quantity.units, value: quantity.value };
}

/** `B = h / (8π² c I)` in cm^-1. */
function rotationalConstant(inertiaSI: number): number {
  return h / (8 * Math.PI * Math.PI * c * inertiaSI) / 100;
}

function encodeMode(mode: Mode): RawMode {
  switch (mode.kind) {
    case 'translation':
      return { class: 'IdealGasTranslation', mass: encodeScalar(mode.mass), quantum: mode.quantum };
    case 'nonlinear-rotor':
      return {
        class: 'NonlinearRotor',
        inertia: encodeArray(mode.inertia),
        symmetry: mode.symmetry,
        quantum: mode.quantum,
        rotationalConstant: encodeArray(array(mode.inertia.si().map(rotationalConstant), 'cm^-1')),
      };
    case 'linear-rotor':
      return {
        class: 'LinearRotor',
        inertia: encodeScalar(mode.inertia),
        symmetry: mode.symmetry,
        quantum: mode.quantum,
        rotationalConstant: encodeScalar(scalar(rotationalConstant(mode.inertia.si()), 'cm^-1')),
      };
    case 'harmonic-oscillator':
      return { class: 'HarmonicOscillator', frequencies: encodeArray(mode.frequencies), quantum: mode.quantum };
    case 'hindered-rotor':
      return {
        class: 'HinderedRotor',
        inertia: encodeScalar(mode.inertia),
        symmetry: mode.symmetry,
        ...(mode.potential.kind === 'fourier'
          ? { fourier: encodeMatrix(mode.potential.coefficients) }
          : { barrier: encodeScalar(mode.potential.barrier) }),
        ...(mode.frequency === undefined ? {} : { frequency: mode.frequency.to('cm^-1') }),
        quantum: mode.treatment === 'quantum',
        semiclassical: mode.treatment === 'semiclassical',
        rotationalConstant: encodeScalar(scalar(rotationalConstant(mode.inertia.si()), 'cm^-1')),
      };
  }
}

function encodeConformer(conformer: Conformer): RawConformer {
  const { geometry } = conformer;
  return {
    class: 'Conformer',
    E0: encodeScalar(conformer.E0),
    modes: conformer.modes.map(encodeMode),
    spinMultiplicity: conformer.spinMultiplicity,
    opticalIsomers: conformer.opticalIsomers,
    ...(geometry === undefined
      ? {}
      : {
          coordinates: encodeMatrix(geometry.coordinates),
          mass: encodeArray(geometry.mass),
          number: encodeArray(geometry.number),
        }),
  };
}

function encodePolynomial(polynomial: NASAPolynomial): RawPolynomial {
  return {
    class: 'NASAPolynomial',
    coeffs: polynomial.coeffs,
    Tmin: encodeScalar(polynomial.Tmin),
    Tmax: encodeScalar(polynomial.Tmax),
  };
}

function encodeNASA(model: NASAModel): RawNASA {
  return {
    class: 'NASA',
    polynomials: {
      polynomial1: encodePolynomial(model.polynomials[0]),
      polynomial2: encodePolynomial(model.polynomials[1]),
    },
    Tmin: encodeScalar(model.Tmin),
    Tmax: encodeScalar(model.Tmax),
    E0: encodeScalar(model.E0),
    Cp0: encodeScalar(model.Cp0),
    CpInf: encodeScalar(model.CpInf),
  };
}

function encodeThermoData(table: ThermoDataTable): RawThermoData {
  return {
    [CP_TABLE_KEY]: table.Cp,
    ...(table.H298 === undefined ? {} : { H298: table.H298 }),
    ...(table.S298 === undefined ? {} : { S298: table.S298 }),
  };
}

/**
 * XYZ block with coordinates in metres, whatever units the geometry is held
 * in; stored records carry `xyz` in SI.
 */
export function renderXyz(label: string, geometry: Geometry): string {
  const rows = geometry.coordinates.si();
  const lines = rows.map((row, index) => {
    const symbol = elementSymbol(geometry.number.value[index] ?? 0);
    return [symbol, ...row.map(String)].join(' ');
  });
  return [String(rows.length), label, ...lines].join('\n');
}

function chemkinEntry(record: SpeciesRecord): string | undefined {
  const { geometry } = record.conformer;
  if (geometry === undefined) {
    return undefined;
  }
  const elements = elementCounts(geometry.number.value);
  return elements.length > CHEMKIN_MAX_ELEMENTS ? undefined : formatChemkinThermo(record.label, elements, record.thermo);
}

/**
 * Writes a species record as YAML with sorted keys.
 */
export function serializeSpeciesRecord(record: SpeciesRecord): string {
  const { geometry } = record.conformer;
  const chemkin = chemkinEntry(record);
  const document: RawSpeciesRecord = {
    label: record.label,
    ...(record.smiles === undefined ? {} : { smiles: record.smiles }),
    ...(record.inchi === undefined ? {} : { inchi: record.inchi }),
    ...(record.inchiKey === undefined ? {} : { inchi_key: record.inchiKey }),
    ...(record.adjacencyList === undefined ? {} : { adjacency_list: record.adjacencyList }),
    ...(record.molecularWeight === undefined ? {} : { molecular_weight: encodeScalar(record.molecularWeight) }),
    frequency_scale_factor: record.frequencyScaleFactor,
    use_hindered_rotors: record.useHinderedRotors,
    use_bond_corrections: record.useBondCorrections,
    is_ts: record.isTransitionState,
    datetime: record.datetime,
    conformer: encodeConformer(record.conformer),
    ...(record.energyTransfer === undefined
      ? {}
      : {
          energy_transfer_model: {
            class: 'SingleExponentialDown',
            alpha0: encodeScalar(record.energyTransfer.alpha0),
            T0: encodeScalar(record.energyTransfer.T0),
            n: record.energyTransfer.n,
          },
        }),
    thermo: encodeNASA(record.thermo),
    thermo_data: encodeThermoData(renderThermoData(record.thermo)),
    ...(chemkin === undefined ? {} : { chemkin_thermo_string: chemkin }),
    ...(geometry === undefined ? {} : { xyz: renderXyz(record.label, geometry) }),
  };
  return yaml.dump(document, {
    indent: 2,
    lineWidth: -1,
    noRefs: true,
    sortKeys: true,
    schema: yaml.CORE_SCHEMA,
  });
}
