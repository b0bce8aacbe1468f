/**
 * The `thermo_data` table: a rendering of a NASA model at standard points.
 *
 * @packageDocumentation
 */

import { ThermoEngineError } from '../errors/index.js';
import { nasaEnthalpy, nasaEntropy, nasaHeatCapacity, type NASAModel } from '../nasa/index.js';
import { conversionFactor } from '../units/index.js';
import type { SpeciesRecord, ThermoDataDiscrepancy, ThermoDataTable } from './types.js';

/** Temperatures (K) of the Cp column. */
export const THERMO_DATA_TEMPERATURES: readonly number[] = [300, 400, 500, 600, 800, 1000, 1500, 2000, 2400];

const STANDARD_TEMPERATURE = 298.15;
const CP_UNITS = 'cal/mol*K';
const H_UNITS = 'kcal/mol';
const S_UNITS = 'cal/mol*K';

/**
 * Largest accepted differences, in cal/(mol·K) for Cp and S298 and kcal/mol
 * for H298.
 */
export interface AuditTolerances {
  readonly Cp: number;
  readonly H298: number;
  readonly S298: number;
}

export const DEFAULT_AUDIT_TOLERANCES: AuditTolerances = { Cp: 0.25, H298: 0.1, S298: 0.25 };

function inRange(model: NASAModel, t: number): boolean {
  return t >= model.Tmin.to('K') && t <= model.Tmax.to('K');
}

/**
 * Renders the table from a model. Points outside the model's range are left
 * out.
 */
export function renderThermoData(model: NASAModel): ThermoDataTable {
  const Cp: Record<string, string> = {};
  for (const t of THERMO_DATA_TEMPERATURES) {
    if (inRange(model, t)) {
      Cp[`${String(t)} K`] = nasaHeatCapacity(model, t).to(CP_UNITS).toFixed(2);
    }
  }
  if (!inRange(model, STANDARD_TEMPERATURE)) {
    return { Cp };
  }
  return {
    Cp,
    H298: `${nasaEnthalpy(model, STANDARD_TEMPERATURE).to(H_UNITS).toFixed(2)} ${H_UNITS}`,
    S298: `${nasaEntropy(model, STANDARD_TEMPERATURE).to(S_UNITS).toFixed(2)} ${S_UNITS}`,
  };
}

function unreadable(key: string, text: string): ThermoEngineError {
  return new ThermoEngineError(`thermo_data.${key}: cannot read "${text}"`, 'MALFORMED_RECORD', {
    details: { field: `thermo_data.${key}`, value: text },
  });
}

/** `'24.14 kcal/mol'` → `[24.14, 'kcal/mol']`. */
function readValue(key: string, text: string): [number, string] {
  const match = /^\s*(\S+)\s+(\S+)\s*$/.exec(text);
  const value = Number(match?.[1]);
  const units = match?.[2];
  if (units === undefined || !Number.isFinite(value)) {
    throw unreadable(key, text);
  }
  return [value, units];
}

function readNumber(key: string, text: string): number {
  const value = Number(text.trim());
  if (text.trim() === '' || !Number.isFinite(value)) {
    throw unreadable(key, text);
  }
  return value;
}

/**
 * Compares a declared table with the record's model.
 *
 * @returns One entry per value further from the model than the tolerance,
 * with both values in the declared units.
 * @throws {ThermoEngineError} `MALFORMED_RECORD` for unreadable entries,
 * `UNIT_MISMATCH` for unknown units, `INVALID_FIT_CONFIGURATION` for
 * temperatures outside the model.
 */
export function auditThermoData(
  record: SpeciesRecord,
  declared: ThermoDataTable,
  tolerances: AuditTolerances = DEFAULT_AUDIT_TOLERANCES
): ThermoDataDiscrepancy[] {
  const model = record.thermo;
  const discrepancies: ThermoDataDiscrepancy[] = [];
  const check = (key: string, value: number, computed: number, units: string, tolerance: number): void => {
    if (Math.abs(value - computed) > tolerance) {
      discrepancies.push({ key, declared: value, computed, units });
    }
  };

  for (const [label, text] of Object.entries(declared.Cp)) {
    const t = readNumber(`Cp.${label}`, label.replace(/\s*K\s*$/, ''));
    const value = readNumber(`Cp.${label}`, text);
    check(`Cp ${label}`, value, nasaHeatCapacity(model, t).to(CP_UNITS), CP_UNITS, tolerances.Cp);
  }
  if (declared.H298 !== undefined) {
    const [value, units] = readValue('H298', declared.H298);
    const computed = nasaEnthalpy(model, STANDARD_TEMPERATURE).to(units);
    check('H298', value, computed, units, tolerances.H298 * conversionFactor(H_UNITS, units));
  }
  if (declared.S298 !== undefined) {
    const [value, units] = readValue('S298', declared.S298);
    const computed = nasaEntropy(model, STANDARD_TEMPERATURE).to(units);
    check('S298', value, computed, units, tolerances.S298 * conversionFactor(S_UNITS, units));
  }
  return discrepancies;
}
