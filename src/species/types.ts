/**
 * Species records and the inputs they are built from.
 *
 * @packageDocumentation
 */

import type { Conformer } from '../conformer/index.js';
import type { SingleExponentialDown } from '../energy-transfer/index.js';
import type { NASAFitOptions, NASAModel } from '../nasa/index.js';
import type { RotorOptions } from '../statmech/index.js';
import type { ScalarQuantity } from '../units/index.js';
import type { Logger } from '../utils/logger.js';

/**
 * Structural identity of a species. Only `label` is required.
 */
export interface SpeciesIdentity {
  readonly label: string;
  readonly smiles?: string;
  readonly inchi?: string;
  readonly inchiKey?: string;
  /** Connectivity as an adjacency list; carried, never evaluated. */
  readonly adjacencyList?: string;
}

/**
 * Everything needed to compute a species record.
 */
export interface SpeciesInput extends SpeciesIdentity {
  /** Conformer with unscaled harmonic frequencies. */
  readonly conformer: Conformer;
  readonly frequencyScaleFactor: number;
  /** When false, hindered rotors are evaluated as harmonic oscillators. */
  readonly useHinderedRotors: boolean;
  readonly useBondCorrections?: boolean;
  readonly isTransitionState?: boolean;
  /** Defaults to the sum of the geometry's atom masses. */
  readonly molecularWeight?: ScalarQuantity;
  readonly energyTransfer?: SingleExponentialDown;
}

/**
 * A completed calculation. Frozen.
 */
export interface SpeciesRecord extends SpeciesIdentity {
  /** Hill formula, when the conformer has geometry. */
  readonly formula?: string;
  readonly molecularWeight?: ScalarQuantity;
  readonly frequencyScaleFactor: number;
  readonly useHinderedRotors: boolean;
  readonly useBondCorrections: boolean;
  readonly isTransitionState: boolean;
  /** The conformer as evaluated: frequencies scaled, rotors replaced if disabled. */
  readonly conformer: Conformer;
  readonly thermo: NASAModel;
  readonly energyTransfer?: SingleExponentialDown;
  /** UTC, `YYYY-MM-DD HH:mm`. */
  readonly datetime: string;
}

/**
 * Settings of one pipeline run.
 */
export interface PipelineOptions {
  readonly fit: NASAFitOptions;
  readonly rotors: RotorOptions;
  readonly logger?: Logger;
  /** Clock for the record's timestamp. */
  readonly now?: () => Date;
}

/**
 * One species of a batch: either computed from input, or refitted from a
 * serialized record.
 */
export type BatchEntry =
  | { readonly source: 'input'; readonly input: SpeciesInput }
  | { readonly source: 'record'; readonly label: string; readonly yaml: string };

export interface BatchOptions extends PipelineOptions {
  /** Species processed at the same time. */
  readonly concurrency: number;
}

/**
 * A species that did not produce a record.
 */
export interface BatchFailure {
  readonly label: string;
  /** Engine error code, or `UNEXPECTED` for anything else thrown. */
  readonly code: string;
  readonly message: string;
  readonly fatal: boolean;
}

export interface BatchResult {
  /** Successful records, in input order. */
  readonly records: readonly SpeciesRecord[];
  readonly failures: readonly BatchFailure[];
}

/**
 * The human-readable `thermo_data` table. Values are display strings.
 */
export interface ThermoDataTable {
  /** Keyed like `'300 K'`, in cal/(mol·K). */
  readonly Cp: Readonly<Record<string, string>>;
  /** e.g. `'24.14 kcal/mol'`. */
  readonly H298?: string;
  /** e.g. `'56.75 cal/mol*K'`. */
  readonly S298?: string;
}

/**
 * A declared `thermo_data` value that differs from the model.
 */
export interface ThermoDataDiscrepancy {
  /** `'Cp 300 K'`, `'H298'` or `'S298'`. */
  readonly key: string;
  readonly declared: number;
  readonly computed: number;
  readonly units: string;
}
