import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { fileURLToPath } from 'node:url';
import {
  ConfigParseError,
  DEFAULT_CONFIG,
  getDefaultConfig,
  loadConfigFile,
  mergeConfigTables,
  parseConfig,
} from './index.js';

const fixturePath = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

describe('Config Parser', () => {
  describe('parseConfig', () => {
    describe('valid TOML parsing', () => {
      it('should parse empty TOML to default config', () => {
        expect(parseConfig('')).toEqual(DEFAULT_CONFIG);
      });

      it('should parse complete valid configuration', () => {
        const toml = `
[temperature]
t_min = 50.0
t_max = 2500.0
reference = 300.0

[fit]
t_mid = 900.0
search_t_mid = true
samples_per_range = 30
residual_tolerance = 0.05
continuity_tolerance = 1e-7
tie_tolerance = 1e-3
candidate_count = 11
max_iterations = 40
t_mid_tolerance = 0.5

[rotors]
max_basis = 80
quadrature_points = 360
max_jacobi_sweeps = 30

[batch]
concurrency = 8

[logging]
debug = true
`;
        expect(parseConfig(toml)).toEqual({
          temperature: { t_min: 50, t_max: 2500, reference: 300 },
          fit: {
            t_mid: 900,
            search_t_mid: true,
            samples_per_range: 30,
            residual_tolerance: 0.05,
            continuity_tolerance: 1e-7,
            tie_tolerance: 1e-3,
            candidate_count: 11,
            max_iterations: 40,
            t_mid_tolerance: 0.5,
          },
          rotors: { max_basis: 80, quadrature_points: 360, max_jacobi_sweeps: 30 },
          batch: { concurrency: 8 },
          logging: { debug: true },
        });
      });

      it('should apply defaults for missing fields within a section', () => {
        const config = parseConfig(`
[fit]
search_t_mid = true
`);
        expect(config.fit.search_t_mid).toBe(true);
        expect(config.fit.t_mid).toBe(1000);
        expect(config.fit.samples_per_range).toBe(40);
        expect(config.temperature).toEqual(DEFAULT_CONFIG.temperature);
      });

      it('should accept integer values for float fields', () => {
        const config = parseConfig(`
[temperature]
t_min = 20
`);
        expect(config.temperature.t_min).toBe(20);
      });

      it('should ignore unknown sections and fields', () => {
        const config = parseConfig(`
[output]
format = "yaml"

[batch]
concurrency = 2
retries = 3
`);
        expect(config.batch).toEqual({ concurrency: 2 });
        expect(Object.keys(config)).toEqual(['temperature', 'fit', 'rotors', 'batch', 'logging']);
      });
    });

    describe('invalid input', () => {
      it('should throw ConfigParseError for invalid TOML syntax', () => {
        expect(() => parseConfig('[fit\nt_mid = 1000')).toThrow(ConfigParseError);
        expect(() => parseConfig('[fit\nt_mid = 1000')).toThrow(/Invalid TOML syntax/);
      });

      it('should keep the TOML error as cause', () => {
        try {
          parseConfig('t_min = = 3');
          expect.unreachable();
        } catch (error) {
          expect(error).toBeInstanceOf(ConfigParseError);
          if (error instanceof ConfigParseError) {
            expect(error.cause).toBeInstanceOf(Error);
          }
        }
      });

      it('should report the field path for a string where a number belongs', () => {
        expect(() =>
          parseConfig(`
[fit]
t_mid = "1000"
`)
        ).toThrow("Invalid type for 'fit.t_mid': expected number, got string");
      });

      it('should report the field path for a number where a boolean belongs', () => {
        expect(() =>
          parseConfig(`
[logging]
debug = 1
`)
        ).toThrow("Invalid type for 'logging.debug': expected boolean, got number");
      });

      it('should reject a section that is not a table', () => {
        expect(() => parseConfig('batch = 4')).toThrow("Invalid type for 'batch': expected a table");
      });
    });
  });

  describe('mergeConfigTables', () => {
    it('should layer tables over the given base', () => {
      const base = parseConfig(`
[batch]
concurrency = 6
`);
      const merged = mergeConfigTables({ logging: { debug: true } }, base);
      expect(merged.batch.concurrency).toBe(6);
      expect(merged.logging.debug).toBe(true);
    });

    it('should not modify the base', () => {
      mergeConfigTables({ fit: { t_mid: 700 } });
      expect(DEFAULT_CONFIG.fit.t_mid).toBe(1000);
    });
  });

  describe('loadConfigFile', () => {
    it('should read the search fixture', async () => {
      const config = await loadConfigFile(fixturePath('../../test-fixtures/config/search.toml'));
      expect(config.fit.search_t_mid).toBe(true);
      expect(config.fit.residual_tolerance).toBe(0.05);
      expect(config.fit.candidate_count).toBe(31);
      expect(config.batch.concurrency).toBe(2);
      expect(config.rotors).toEqual(DEFAULT_CONFIG.rotors);
    });

    it('should match the defaults with the shipped configuration file', async () => {
      const config = await loadConfigFile(fixturePath('../../species-thermo.toml'));
      expect(config).toEqual(DEFAULT_CONFIG);
    });

    it('should wrap read failures in ConfigParseError', async () => {
      await expect(loadConfigFile(fixturePath('../../test-fixtures/config/missing.toml'))).rejects.toThrow(
        /Cannot read configuration file/
      );
    });
  });

  describe('getDefaultConfig', () => {
    it('should equal DEFAULT_CONFIG without sharing it', () => {
      const config = getDefaultConfig();
      expect(config).toEqual(DEFAULT_CONFIG);
      expect(config).not.toBe(DEFAULT_CONFIG);
      expect(config.fit).not.toBe(DEFAULT_CONFIG.fit);
    });
  });

  describe('property: numbers survive a TOML round trip', () => {
    it('should read back any positive concurrency', () => {
      fc.assert(
        fc.property(fc.integer({ min: 1, max: 10_000 }), (concurrency) => {
          const config = parseConfig(`[batch]\nconcurrency = ${String(concurrency)}\n`);
          return config.batch.concurrency === concurrency;
        })
      );
    });
  });
});
