import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fc from 'fast-check';
import { Logger, silentLogger } from './logger.js';

describe('Logger', () => {
  let capturedOutput: string[] = [];

  const capture = (line: string): void => {
    capturedOutput.push(line);
  };

  beforeEach(() => {
    capturedOutput = [];
  });

  function getOutput(index: number): string {
    const output = capturedOutput[index];
    if (output === undefined) {
      throw new Error(`Expected output at index ${String(index)} but got undefined`);
    }
    return output;
  }

  function parseLine(line: string): Record<string, unknown> {
    const value: unknown = JSON.parse(line.trim());
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      throw new Error(`Expected a JSON object, got ${line}`);
    }
    return Object.fromEntries(Object.entries(value));
  }

  function parseOutput(index: number): Record<string, unknown> {
    return parseLine(getOutput(index));
  }

  describe('safe JSON.stringify', () => {
    it('should handle circular references without throwing', () => {
      const logger = new Logger({ component: 'TestLogger', write: capture });

      const circularObj: Record<string, unknown> = { name: 'test' };
      circularObj.self = circularObj;

      expect(() => {
        logger.info('circular_test', circularObj);
      }).not.toThrow();

      expect(capturedOutput.length).toBe(1);
      const parsed = parseOutput(0);

      expect(parsed.level).toBe('info');
      expect(parsed.component).toBe('TestLogger');
      expect(parsed.event).toBe('circular_test');
      expect(typeof parsed.serializationError).toBe('string');
      expect(parsed.originalData).toBe('[unserializable]');
    });

    it('should handle BigInt values without throwing', () => {
      const logger = new Logger({ component: 'TestLogger', write: capture });

      logger.info('bigint_test', { value: BigInt(9007199254740991) });

      const parsed = parseOutput(0);
      expect(parsed.event).toBe('bigint_test');
      expect(parsed.originalData).toBe('[unserializable]');
    });

    it('should output a single JSON line even when serialization fails', () => {
      const logger = new Logger({ component: 'TestLogger', write: capture });

      const circularObj: Record<string, unknown> = {};
      circularObj.ref = circularObj;
      logger.error('error_with_circular', circularObj);

      const output = getOutput(0);
      expect(output.endsWith('\n')).toBe(true);
      expect(output.trim().split('\n').length).toBe(1);
    });

    it('should handle arbitrary values without throwing (property-based)', () => {
      const logger = new Logger({ component: 'PropertyTest', write: capture });

      fc.assert(
        fc.property(fc.dictionary(fc.string(), fc.anything()), (arbitraryData) => {
          capturedOutput = [];

          logger.info('fuzz_test', arbitraryData);

          expect(capturedOutput.length).toBe(1);
          const parsed = parseLine(getOutput(0));
          expect(parsed.level).toBe('info');
          expect(parsed.component).toBe('PropertyTest');
          expect(parsed.event).toBe('fuzz_test');
          if (parsed.serializationError !== undefined) {
            expect(parsed.originalData).toBe('[unserializable]');
          }
        }),
        { numRuns: 50 }
      );
    });
  });

  describe('normal logging', () => {
    it('should log info messages with the injected timestamp', () => {
      const logger = new Logger({
        component: 'SpeciesPipeline',
        write: capture,
        now: () => new Date('2024-03-14T19:31:00.000Z'),
      });

      logger.info('species_started', { label: 'N2H4' });

      expect(getOutput(0)).toBe(
        '{"timestamp":"2024-03-14T19:31:00.000Z","level":"info","component":"SpeciesPipeline",' +
          '"event":"species_started","data":{"label":"N2H4"}}\n'
      );
    });

    it('should omit data when none is given', () => {
      const logger = new Logger({ component: 'TestLogger', write: capture });
      logger.warn('no_data');
      expect(parseOutput(0)).not.toHaveProperty('data');
    });

    it('should not log debug messages when debugMode is false', () => {
      const logger = new Logger({ component: 'TestLogger', debugMode: false, write: capture });
      logger.debug('debug_event', { key: 'value' });
      expect(capturedOutput.length).toBe(0);
    });

    it('should log debug messages when debugMode is true', () => {
      const logger = new Logger({ component: 'TestLogger', debugMode: true, write: capture });
      logger.debug('debug_event', { key: 'value' });
      expect(parseOutput(0).level).toBe('debug');
    });

    it('should log error messages correctly', () => {
      const logger = new Logger({ component: 'TestLogger', write: capture });
      logger.error('error_event', { code: 'POOR_FIT_QUALITY' });

      const parsed = parseOutput(0);
      expect(parsed.level).toBe('error');
      expect(parsed.data).toEqual({ code: 'POOR_FIT_QUALITY' });
    });
  });

  describe('child', () => {
    it('should share sink and debug setting under a new component name', () => {
      const parent = new Logger({ component: 'SpeciesBatch', debugMode: true, write: capture });
      const child = parent.child('NASAFitter');

      child.debug('candidate_evaluated');

      const parsed = parseOutput(0);
      expect(parsed.component).toBe('NASAFitter');
      expect(parsed.level).toBe('debug');
    });
  });

  describe('default sink', () => {
    beforeEach(() => {
      vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array): boolean => {
        capturedOutput.push(typeof chunk === 'string' ? chunk : new TextDecoder().decode(chunk));
        return true;
      });
    });

    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('should write to stderr when no sink is given', () => {
      new Logger({ component: 'TestLogger' }).info('to_stderr');
      expect(parseOutput(0).event).toBe('to_stderr');
    });

    it('should write nothing through the silent logger', () => {
      silentLogger.error('dropped');
      expect(capturedOutput.length).toBe(0);
    });
  });
});
