import { describe, expect, it } from 'vitest';
import {
  applyEnvOverrides,
  DEFAULT_CONFIG,
  EnvCoercionError,
  getEnvVarDocumentation,
  parseConfig,
  readEnvOverrides,
} from './index.js';

describe('Environment Variable Overrides', () => {
  describe('readEnvOverrides', () => {
    it('should map SPECIES_THERMO_<SECTION>_<FIELD> to the section table', () => {
      const result = readEnvOverrides({
        SPECIES_THERMO_FIT_T_MID: '1100',
        SPECIES_THERMO_FIT_SEARCH_T_MID: 'true',
        SPECIES_THERMO_BATCH_CONCURRENCY: '8',
      });
      expect(result.overrides).toEqual({
        fit: { t_mid: 1100, search_t_mid: true },
        batch: { concurrency: 8 },
      });
      expect(result.appliedVars).toEqual([
        'SPECIES_THERMO_FIT_T_MID',
        'SPECIES_THERMO_FIT_SEARCH_T_MID',
        'SPECIES_THERMO_BATCH_CONCURRENCY',
      ]);
      expect(result.errors).toEqual([]);
    });

    it('should ignore unset, empty and unrelated variables', () => {
      const result = readEnvOverrides({
        SPECIES_THERMO_FIT_T_MID: '',
        SPECIES_THERMO_UNKNOWN: '3',
        HOME: '/tmp',
      });
      expect(result.overrides).toEqual({});
      expect(result.appliedVars).toEqual([]);
    });

    it('should support the SPECIES_THERMO_DEBUG shortcut', () => {
      expect(readEnvOverrides({ SPECIES_THERMO_DEBUG: 'yes' }).overrides).toEqual({ logging: { debug: true } });
    });

    it('should let the full variable win over the shortcut', () => {
      const result = readEnvOverrides({ SPECIES_THERMO_DEBUG: 'on', SPECIES_THERMO_LOGGING_DEBUG: 'off' });
      expect(result.overrides).toEqual({ logging: { debug: false } });
    });

    describe('type coercion', () => {
      it('should coerce numbers with whitespace and exponents', () => {
        const result = readEnvOverrides({
          SPECIES_THERMO_FIT_CONTINUITY_TOLERANCE: ' 1e-8 ',
          SPECIES_THERMO_TEMPERATURE_T_MIN: '-5',
        });
        expect(result.overrides).toEqual({
          fit: { continuity_tolerance: 1e-8 },
          temperature: { t_min: -5 },
        });
      });

      for (const value of ['true', 'TRUE', '1', 'yes', 'on']) {
        it(`should coerce '${value}' to true`, () => {
          expect(readEnvOverrides({ SPECIES_THERMO_LOGGING_DEBUG: value }).overrides).toEqual({
            logging: { debug: true },
          });
        });
      }

      for (const value of ['false', 'False', '0', 'no', 'off']) {
        it(`should coerce '${value}' to false`, () => {
          expect(readEnvOverrides({ SPECIES_THERMO_LOGGING_DEBUG: value }).overrides).toEqual({
            logging: { debug: false },
          });
        });
      }
    });

    describe('invalid values', () => {
      it('should throw EnvCoercionError for a non-numeric value', () => {
        expect(() => readEnvOverrides({ SPECIES_THERMO_BATCH_CONCURRENCY: 'many' })).toThrow(EnvCoercionError);
        expect(() => readEnvOverrides({ SPECIES_THERMO_BATCH_CONCURRENCY: 'many' })).toThrow(
          "Cannot coerce environment variable 'SPECIES_THERMO_BATCH_CONCURRENCY' value 'many' to number"
        );
      });

      it('should throw for a whitespace-only number', () => {
        expect(() => readEnvOverrides({ SPECIES_THERMO_FIT_T_MID: '   ' })).toThrow(
          "Empty value for 'SPECIES_THERMO_FIT_T_MID'"
        );
      });

      it('should throw for an unknown boolean spelling', () => {
        expect(() => readEnvOverrides({ SPECIES_THERMO_DEBUG: 'maybe' })).toThrow(/Expected one of: true, 1, yes, on/);
      });

      it('should collect errors when collectErrors is set', () => {
        const result = readEnvOverrides(
          { SPECIES_THERMO_DEBUG: 'maybe', SPECIES_THERMO_BATCH_CONCURRENCY: '3' },
          { collectErrors: true }
        );
        expect(result.overrides).toEqual({ batch: { concurrency: 3 } });
        expect(result.errors).toHaveLength(1);
        expect(result.errors[0]?.envVar).toBe('SPECIES_THERMO_DEBUG');
        expect(result.errors[0]?.expectedType).toBe('boolean');
      });
    });
  });

  describe('applyEnvOverrides', () => {
    it('should give env precedence over the config file', () => {
      const fromFile = parseConfig('[batch]\nconcurrency = 2\n[fit]\nt_mid = 900.0\n');
      const config = applyEnvOverrides(fromFile, { SPECIES_THERMO_BATCH_CONCURRENCY: '6' });
      expect(config.batch.concurrency).toBe(6);
      expect(config.fit.t_mid).toBe(900);
      expect(config.rotors).toEqual(DEFAULT_CONFIG.rotors);
    });

    it('should return an equal config when nothing is set', () => {
      expect(applyEnvOverrides(DEFAULT_CONFIG, {})).toEqual(DEFAULT_CONFIG);
    });
  });

  describe('getEnvVarDocumentation', () => {
    it('should document every variable with its type', () => {
      const docs = getEnvVarDocumentation();
      expect(docs.SPECIES_THERMO_BATCH_CONCURRENCY).toEqual({
        description: 'Species evaluated at once by a batch run',
        type: 'number',
      });
      expect(docs.SPECIES_THERMO_DEBUG?.type).toBe('boolean');
      expect(Object.keys(docs)).toHaveLength(18);
    });

    it('should document only variables that readEnvOverrides applies', () => {
      for (const [envVar, doc] of Object.entries(getEnvVarDocumentation())) {
        const value = doc.type === 'number' ? '1' : 'true';
        expect(readEnvOverrides({ [envVar]: value }).appliedVars).toEqual([envVar]);
      }
    });
  });

  describe('EnvCoercionError', () => {
    it('should store envVar, rawValue and expectedType', () => {
      const error = new EnvCoercionError('SPECIES_THERMO_FIT_T_MID', 'abc', 'number');
      expect(error.name).toBe('EnvCoercionError');
      expect(error.envVar).toBe('SPECIES_THERMO_FIT_T_MID');
      expect(error.rawValue).toBe('abc');
      expect(error.expectedType).toBe('number');
    });

    it('should use a custom message when provided', () => {
      expect(new EnvCoercionError('X', 'y', 'number', 'custom').message).toBe('custom');
    });
  });
});
