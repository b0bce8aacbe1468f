/**
 * Batch processing of many species with per-species failure isolation.
 *
 * @packageDocumentation
 */

import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { isThermoEngineError } from '../errors/index.js';
import { silentLogger } from '../utils/logger.js';
import { buildSpeciesRecord, refitSpeciesRecord } from './pipeline.js';
import { parseSpeciesRecord } from './record-codec.js';
import type { BatchEntry, BatchFailure, BatchOptions, BatchResult, SpeciesRecord } from './types.js';

type Outcome = { readonly ok: true; readonly record: SpeciesRecord } | { readonly ok: false; readonly failure: BatchFailure };

function entryLabel(entry: BatchEntry): string {
  return entry.source === 'input' ? entry.input.label : entry.label;
}

function toFailure(label: string, error: unknown): BatchFailure {
  if (isThermoEngineError(error)) {
    return { label, code: error.code, message: error.message, fatal: error.fatal };
  }
  return {
    label,
    code: 'UNEXPECTED',
    message: error instanceof Error ? error.message : String(error),
    fatal: true,
  };
}

function processEntry(entry: BatchEntry, options: BatchOptions): SpeciesRecord {
  if (entry.source === 'input') {
    return buildSpeciesRecord(entry.input, options);
  }
  return refitSpeciesRecord(parseSpeciesRecord(entry.yaml), options);
}

/**
 * Runs the pipeline for every entry, `concurrency` at a time. A failing
 * species is reported under `failures` and never stops the others.
 *
 * @throws {RangeError} if `concurrency` is not a positive integer.
 */
export async function runSpeciesBatch(entries: readonly BatchEntry[], options: BatchOptions): Promise<BatchResult> {
  if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${String(options.concurrency)}`);
  }
  const logger = (options.logger ?? silentLogger).child('SpeciesBatch');
  logger.info('batch_started', { species: entries.length, concurrency: options.concurrency });

  const outcomes = new Array<Outcome | undefined>(entries.length).fill(undefined);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < entries.length) {
      const index = next;
      next += 1;
      const entry = entries[index];
      if (entry === undefined) {
        continue;
      }
      // Fitting is synchronous; let other work run between species.
      await yieldToEventLoop();
      const label = entryLabel(entry);
      try {
        const record = processEntry(entry, options);
        outcomes[index] = { ok: true, record };
        logger.info('species_completed', { label, tmid: record.thermo.polynomials[0].Tmax.to('K') });
      } catch (error) {
        const failure = toFailure(label, error);
        outcomes[index] = { ok: false, failure };
        logger.warn('species_failed', { label, code: failure.code, message: failure.message, fatal: failure.fatal });
      }
    }
  };

  await Promise.all(Array.from({ length: Math.min(options.concurrency, entries.length) }, () => worker()));

  const records: SpeciesRecord[] = [];
  const failures: BatchFailure[] = [];
  for (const outcome of outcomes) {
    if (outcome === undefined) {
      continue;
    }
    if (outcome.ok) {
      records.push(outcome.record);
    } else {
      failures.push(outcome.failure);
    }
  }
  logger.info('batch_completed', { records: records.length, failures: failures.length });
  return { records, failures };
}
