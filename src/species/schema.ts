/**
 * JSON schemas of the species record format and the raw shapes they admit.
 *
 * The top-level schema checks structure only down to each mode's `class`;
 * modes are checked against the schema of their class so that an unknown
 * class is reported as an unsupported mode rather than a malformed record.
 *
 * @packageDocumentation
 */

import _Ajv, { type ErrorObject, type SchemaObject, type ValidateFunction } from 'ajv';
import { ThermoEngineError } from '../errors/index.js';

const Ajv = _Ajv.default;

export interface RawScalar {
  readonly class?: 'ScalarQuantity';
  readonly units?: string;
  readonly value: number;
}

export interface RawArray {
  readonly class?: 'ArrayQuantity';
  readonly units?: string;
  readonly value: readonly number[];
}

export interface RawMatrix {
  readonly class?: 'ArrayQuantity';
  readonly units?: string;
  readonly value: readonly (readonly number[])[];
}

export interface RawTranslation {
  readonly class: 'IdealGasTranslation';
  readonly mass: RawScalar;
  readonly quantum?: boolean;
}

export interface RawNonlinearRotor {
  readonly class: 'NonlinearRotor';
  readonly inertia: RawArray;
  readonly symmetry: number;
  readonly quantum?: boolean;
  readonly rotationalConstant?: RawArray;
}

export interface RawLinearRotor {
  readonly class: 'LinearRotor';
  readonly inertia: RawScalar;
  readonly symmetry: number;
  readonly quantum?: boolean;
  readonly rotationalConstant?: RawScalar;
}

export interface RawHarmonicOscillator {
  readonly class: 'HarmonicOscillator';
  readonly frequencies: RawArray;
  readonly quantum?: boolean;
}

export interface RawHinderedRotor {
  readonly class: 'HinderedRotor';
  readonly inertia: RawScalar;
  readonly symmetry: number;
  readonly fourier?: RawMatrix;
  readonly barrier?: RawScalar;
  /** cm^-1 */
  readonly frequency?: number;
  readonly quantum?: boolean;
  readonly semiclassical?: boolean;
  readonly rotationalConstant?: RawScalar;
}

export type RawMode =
  | RawTranslation
  | RawNonlinearRotor
  | RawLinearRotor
  | RawHarmonicOscillator
  | RawHinderedRotor;

export interface RawConformer {
  readonly class?: 'Conformer';
  readonly E0: RawScalar;
  /** Each entry is checked separately; see {@link validateRawMode}. */
  readonly modes: readonly { readonly class: string }[];
  readonly spinMultiplicity: number;
  readonly opticalIsomers: number;
  readonly coordinates?: RawMatrix;
  readonly mass?: RawArray;
  readonly number?: RawArray;
}

export interface RawPolynomial {
  readonly class?: 'NASAPolynomial';
  readonly coeffs: readonly number[];
  readonly Tmin: RawScalar;
  readonly Tmax: RawScalar;
}

export interface RawNASA {
  readonly class?: 'NASA';
  readonly polynomials: {
    readonly polynomial1: RawPolynomial;
    readonly polynomial2: RawPolynomial;
  };
  readonly Tmin: RawScalar;
  readonly Tmax: RawScalar;
  readonly E0: RawScalar;
  readonly Cp0: RawScalar;
  readonly CpInf: RawScalar;
}

export interface RawEnergyTransfer {
  readonly class?: 'SingleExponentialDown';
  readonly alpha0: RawScalar;
  readonly T0: RawScalar;
  readonly n: number;
}

export interface RawThermoData {
  readonly 'Cp (cal/mol*K)'?: Readonly<Record<string, string>>;
  readonly H298?: string;
  readonly S298?: string;
}

export interface RawSpeciesRecord {
  readonly label: string;
  readonly smiles?: string;
  readonly inchi?: string;
  readonly inchi_key?: string;
  readonly adjacency_list?: string;
  readonly molecular_weight?: RawScalar;
  readonly frequency_scale_factor: number;
  readonly use_hindered_rotors: boolean;
  readonly use_bond_corrections?: boolean;
  readonly is_ts?: boolean;
  readonly datetime: string;
  readonly conformer: RawConformer;
  readonly energy_transfer_model?: RawEnergyTransfer;
  readonly thermo: RawNASA;
  readonly thermo_data?: RawThermoData;
  readonly chemkin_thermo_string?: string;
  readonly xyz?: string;
}

const scalarQuantity = {
  type: 'object',
  required: ['value'],
  properties: {
    class: { const: 'ScalarQuantity' },
    units: { type: 'string' },
    value: { type: 'number' },
  },
  additionalProperties: false,
} as const;

const arrayQuantity = {
  type: 'object',
  required: ['value'],
  properties: {
    class: { const: 'ArrayQuantity' },
    units: { type: 'string' },
    value: { type: 'array', items: { type: 'number' } },
  },
  additionalProperties: false,
} as const;

const matrixQuantity = {
  type: 'object',
  required: ['value'],
  properties: {
    class: { const: 'ArrayQuantity' },
    units: { type: 'string' },
    value: { type: 'array', items: { type: 'array', items: { type: 'number' } } },
  },
  additionalProperties: false,
} as const;

const polynomial = {
  type: 'object',
  required: ['coeffs', 'Tmin', 'Tmax'],
  properties: {
    class: { const: 'NASAPolynomial' },
    coeffs: { type: 'array', items: { type: 'number' }, minItems: 7, maxItems: 7 },
    Tmin: scalarQuantity,
    Tmax: scalarQuantity,
  },
  additionalProperties: false,
} as const;

const recordSchema = {
  type: 'object',
  required: ['label', 'frequency_scale_factor', 'use_hindered_rotors', 'datetime', 'conformer', 'thermo'],
  properties: {
    label: { type: 'string', minLength: 1 },
    smiles: { type: 'string' },
    inchi: { type: 'string' },
    inchi_key: { type: 'string' },
    adjacency_list: { type: 'string' },
    molecular_weight: scalarQuantity,
    frequency_scale_factor: { type: 'number' },
    use_hindered_rotors: { type: 'boolean' },
    use_bond_corrections: { type: 'boolean' },
    is_ts: { type: 'boolean' },
    datetime: { type: 'string' },
    conformer: {
      type: 'object',
      required: ['E0', 'modes', 'spinMultiplicity', 'opticalIsomers'],
      properties: {
        class: { const: 'Conformer' },
        E0: scalarQuantity,
        modes: {
          type: 'array',
          items: { type: 'object', required: ['class'], properties: { class: { type: 'string' } } },
        },
        spinMultiplicity: { type: 'number' },
        opticalIsomers: { type: 'number' },
        coordinates: matrixQuantity,
        mass: arrayQuantity,
        number: arrayQuantity,
      },
      additionalProperties: false,
    },
    energy_transfer_model: {
      type: 'object',
      required: ['alpha0', 'T0', 'n'],
      properties: {
        class: { const: 'SingleExponentialDown' },
        alpha0: scalarQuantity,
        T0: scalarQuantity,
        n: { type: 'number' },
      },
      additionalProperties: false,
    },
    thermo: {
      type: 'object',
      required: ['polynomials', 'Tmin', 'Tmax', 'E0', 'Cp0', 'CpInf'],
      properties: {
        class: { const: 'NASA' },
        polynomials: {
          type: 'object',
          required: ['polynomial1', 'polynomial2'],
          properties: { polynomial1: polynomial, polynomial2: polynomial },
          additionalProperties: false,
        },
        Tmin: scalarQuantity,
        Tmax: scalarQuantity,
        E0: scalarQuantity,
        Cp0: scalarQuantity,
        CpInf: scalarQuantity,
      },
      additionalProperties: false,
    },
    thermo_data: {
      type: 'object',
      properties: {
        'Cp (cal/mol*K)': { type: 'object', additionalProperties: { type: 'string' } },
        H298: { type: 'string' },
        S298: { type: 'string' },
      },
    },
    chemkin_thermo_string: { type: 'string' },
    xyz: { type: 'string' },
  },
} as const;

function modeSchema(
  className: string,
  required: readonly string[],
  properties: Readonly<Record<string, unknown>>
): SchemaObject {
  return {
    type: 'object',
    required: ['class', ...required],
    properties: { class: { const: className }, quantum: { type: 'boolean' }, ...properties },
    additionalProperties: false,
  };
}

const modeSchemas: Readonly<Record<RawMode['class'], SchemaObject>> = {
  IdealGasTranslation: modeSchema('IdealGasTranslation', ['mass'], { mass: scalarQuantity }),
  NonlinearRotor: modeSchema('NonlinearRotor', ['inertia', 'symmetry'], {
    inertia: arrayQuantity,
    symmetry: { type: 'number' },
    rotationalConstant: arrayQuantity,
  }),
  LinearRotor: modeSchema('LinearRotor', ['inertia', 'symmetry'], {
    inertia: scalarQuantity,
    symmetry: { type: 'number' },
    rotationalConstant: scalarQuantity,
  }),
  HarmonicOscillator: modeSchema('HarmonicOscillator', ['frequencies'], { frequencies: arrayQuantity }),
  HinderedRotor: modeSchema('HinderedRotor', ['inertia', 'symmetry'], {
    inertia: scalarQuantity,
    symmetry: { type: 'number' },
    fourier: matrixQuantity,
    barrier: scalarQuantity,
    frequency: { type: 'number' },
    semiclassical: { type: 'boolean' },
    rotationalConstant: scalarQuantity,
  }),
};

const ajv = new Ajv({ allErrors: true });
const validateRecordStructure: ValidateFunction<RawSpeciesRecord> = ajv.compile<RawSpeciesRecord>(recordSchema);
const modeValidators = new Map<string, ValidateFunction<RawMode>>(
  Object.entries(modeSchemas).map(([className, schema]) => [className, ajv.compile<RawMode>(schema)])
);

function describeErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map((e) => `${e.instancePath === '' ? '/' : e.instancePath}: ${e.message ?? 'invalid'}`);
}

/**
 * Checks the structure of a loaded record document.
 *
 * @throws {ThermoEngineError} `MALFORMED_RECORD` listing every violation.
 */
export function validateRawRecord(data: unknown): RawSpeciesRecord {
  if (!validateRecordStructure(data)) {
    const errors = describeErrors(validateRecordStructure.errors);
    throw new ThermoEngineError(`Malformed species record: ${errors.join('; ')}`, 'MALFORMED_RECORD', {
      details: { errors },
    });
  }
  return data;
}

/**
 * Checks one entry of `conformer.modes` against the schema of its class.
 *
 * @throws {ThermoEngineError} `UNSUPPORTED_MODE` for an unknown class,
 * `MALFORMED_RECORD` for a malformed mode.
 */
export function validateRawMode(data: { readonly class: string }, field: string): RawMode {
  const validate = modeValidators.get(data.class);
  if (validate === undefined) {
    throw new ThermoEngineError(`${field}: unsupported mode class "${data.class}"`, 'UNSUPPORTED_MODE', {
      details: { field, class: data.class },
    });
  }
  if (!validate(data)) {
    const errors = describeErrors(validate.errors).map((error) => `${field}${error}`);
    throw new ThermoEngineError(`Malformed mode: ${errors.join('; ')}`, 'MALFORMED_RECORD', {
      details: { field, errors },
    });
  }
  return data;
}
