/**
 * Species records: pipeline, YAML codec and batch runner.
 *
 * @packageDocumentation
 */

export type {
  BatchEntry,
  BatchFailure,
  BatchOptions,
  BatchResult,
  PipelineOptions,
  SpeciesIdentity,
  SpeciesInput,
  SpeciesRecord,
  ThermoDataDiscrepancy,
  ThermoDataTable,
} from './types.js';
export { buildSpeciesRecord, evaluateRecordThermo, formatRecordDatetime, refitSpeciesRecord } from './pipeline.js';
export { parseSpeciesRecord, readThermoData, renderXyz, serializeSpeciesRecord } from './record-codec.js';
export {
  auditThermoData,
  DEFAULT_AUDIT_TOLERANCES,
  renderThermoData,
  THERMO_DATA_TEMPERATURES,
  type AuditTolerances,
} from './thermo-data.js';
export { runSpeciesBatch } from './batch.js';
export { pipelineOptionsFromConfig } from './options.js';
