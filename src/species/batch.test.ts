import { describe, expect, it } from 'vitest';
import { DEFAULT_FIT_OPTIONS } from '../nasa/index.js';
import { DEFAULT_ROTOR_OPTIONS } from '../statmech/index.js';
import { array } from '../units/index.js';
import { Logger } from '../utils/logger.js';
import { n2h4Conformer } from '../../test-fixtures/species/conformers.js';
import { N2H4_YAML, n2h4Input } from '../../test-fixtures/species/inputs.js';
import { runSpeciesBatch } from './batch.js';
import type { BatchEntry, BatchOptions } from './types.js';

function batchOptions(concurrency: number, logger?: Logger): BatchOptions {
  return {
    fit: DEFAULT_FIT_OPTIONS,
    rotors: DEFAULT_ROTOR_OPTIONS,
    concurrency,
    now: () => new Date(Date.UTC(2024, 5, 1, 12, 0)),
    ...(logger === undefined ? {} : { logger }),
  };
}

const negativeFrequency: BatchEntry = {
  source: 'input',
  input: n2h4Input({
    label: 'bad-frequency',
    conformer: {
      ...n2h4Conformer(),
      modes: [{ kind: 'harmonic-oscillator', frequencies: array([-500], 'cm^-1'), quantum: true }],
    },
  }),
};

const ENTRIES: readonly BatchEntry[] = [
  { source: 'input', input: n2h4Input() },
  { source: 'record', label: 'broken', yaml: 'label: [' },
  { source: 'record', label: 'N2H4-stored', yaml: N2H4_YAML },
  negativeFrequency,
];

describe('runSpeciesBatch', () => {
  it('should keep going past failing species and keep input order', async () => {
    const result = await runSpeciesBatch(ENTRIES, batchOptions(2));
    expect(result.records.map((record) => record.label)).toEqual(['N2H4', 'N2H4']);
    expect(result.records[1]?.frequencyScaleFactor).toBe(0.97);
    expect(result.failures).toEqual([
      expect.objectContaining({ label: 'broken', code: 'MALFORMED_RECORD', fatal: true }),
      expect.objectContaining({ label: 'bad-frequency', code: 'INVALID_MODE_PARAMETER', fatal: false }),
    ]);
  });

  it('should give the same result at any concurrency', async () => {
    const serial = await runSpeciesBatch(ENTRIES, batchOptions(1));
    const parallel = await runSpeciesBatch(ENTRIES, batchOptions(8));
    expect(parallel.failures).toEqual(serial.failures);
    expect(parallel.records.map((record) => record.thermo)).toEqual(serial.records.map((record) => record.thermo));
  });

  it('should handle an empty batch', async () => {
    await expect(runSpeciesBatch([], batchOptions(4))).resolves.toEqual({ records: [], failures: [] });
  });

  it('should reject a concurrency that is not a positive integer', async () => {
    await expect(runSpeciesBatch(ENTRIES, batchOptions(0))).rejects.toThrow(RangeError);
    await expect(runSpeciesBatch(ENTRIES, batchOptions(1.5))).rejects.toThrow(
      'concurrency must be a positive integer, got 1.5'
    );
  });

  it('should log each outcome and a summary', async () => {
    const entries: unknown[] = [];
    const logger = new Logger({
      component: 'test',
      write: (line) => {
        entries.push(JSON.parse(line));
      },
    });
    await runSpeciesBatch(ENTRIES.slice(0, 2), batchOptions(1, logger));
    const batchLines = entries.filter(
      (entry) => typeof entry === 'object' && entry !== null && 'component' in entry && entry.component === 'SpeciesBatch'
    );
    expect(batchLines).toMatchObject([
      { level: 'info', event: 'batch_started', data: { species: 2, concurrency: 1 } },
      { level: 'info', event: 'species_completed', data: { label: 'N2H4', tmid: 1000 } },
      { level: 'warn', event: 'species_failed', data: { label: 'broken', code: 'MALFORMED_RECORD', fatal: true } },
      { level: 'info', event: 'batch_completed', data: { records: 1, failures: 1 } },
    ]);
  });
});
