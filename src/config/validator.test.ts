import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { ConfigValidationError, validateConfig, assertConfigValid } from './validator.js';
import { DEFAULT_CONFIG, mergeConfigTables, parseConfig } from './index.js';

const fields = (toml: string): string[] => validateConfig(parseConfig(toml)).errors.map((e) => e.field);

describe('Config Validator', () => {
  describe('validateConfig', () => {
    it('should accept the default configuration', () => {
      expect(validateConfig(DEFAULT_CONFIG)).toEqual({ valid: true, errors: [] });
    });

    describe('temperature range', () => {
      it('should reject a non-positive t_min', () => {
        expect(fields('[temperature]\nt_min = 0.0\n')).toEqual(['temperature.t_min']);
      });

      it('should reject t_max not above t_min', () => {
        const result = validateConfig(parseConfig('[temperature]\nt_min = 500.0\nt_max = 500.0\n[fit]\nsearch_t_mid = true\n'));
        expect(result.valid).toBe(false);
        expect(result.errors).toEqual([
          {
            field: 'temperature.t_max',
            value: 500,
            message: "'temperature.t_max' must exceed t_min (500), got 500",
          },
        ]);
      });

      it('should reject a non-positive reference temperature', () => {
        expect(fields('[temperature]\nreference = -1.0\n')).toEqual(['temperature.reference']);
      });
    });

    describe('t_mid placement', () => {
      it('should reject t_mid on the range boundary', () => {
        expect(fields('[fit]\nt_mid = 3000.0\n')).toEqual(['fit.t_mid']);
        expect(fields('[fit]\nt_mid = 10.0\n')).toEqual(['fit.t_mid']);
      });

      it('should accept any t_mid when searching', () => {
        expect(fields('[fit]\nt_mid = 0.0\nsearch_t_mid = true\n')).toEqual([]);
      });
    });

    describe('integer settings', () => {
      it('should reject fewer than four samples per range', () => {
        expect(fields('[fit]\nsamples_per_range = 3\n')).toEqual(['fit.samples_per_range']);
      });

      it('should reject fractional counts', () => {
        expect(fields('[fit]\ncandidate_count = 2.5\nmax_iterations = 0\n')).toEqual([
          'fit.candidate_count',
          'fit.max_iterations',
        ]);
      });

      it('should reject a zero rotor basis and concurrency', () => {
        expect(fields('[rotors]\nmax_basis = 0\n[batch]\nconcurrency = 0\n')).toEqual([
          'rotors.max_basis',
          'batch.concurrency',
        ]);
      });

      it('should name the bound in the message', () => {
        const [error] = validateConfig(parseConfig('[batch]\nconcurrency = -2\n')).errors;
        expect(error?.message).toBe("'batch.concurrency' must be an integer of at least 1, got -2");
      });
    });

    describe('tolerances', () => {
      it('should reject non-positive tolerances', () => {
        expect(
          fields('[fit]\nresidual_tolerance = 0.0\ncontinuity_tolerance = -1e-6\ntie_tolerance = 0.0\nt_mid_tolerance = 0.0\n')
        ).toEqual(['fit.residual_tolerance', 'fit.continuity_tolerance', 'fit.tie_tolerance', 'fit.t_mid_tolerance']);
      });
    });
  });

  describe('assertConfigValid', () => {
    it('should not throw for the defaults', () => {
      expect(() => {
        assertConfigValid(DEFAULT_CONFIG);
      }).not.toThrow();
    });

    it('should throw ConfigValidationError listing every failure', () => {
      const config = mergeConfigTables({ batch: { concurrency: 0 }, rotors: { quadrature_points: 0 } });
      try {
        assertConfigValid(config);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigValidationError);
        if (error instanceof ConfigValidationError) {
          expect(error.name).toBe('ConfigValidationError');
          expect(error.errors.map((e) => e.field)).toEqual(['rotors.quadrature_points', 'batch.concurrency']);
          expect(error.message).toContain('failed with 2 error(s)');
          expect(error.message).toContain('  - batch.concurrency: ');
        }
      }
    });
  });

  describe('property: any t_mid strictly inside the range is valid', () => {
    it('should accept every interior t_mid', () => {
      fc.assert(
        fc.property(fc.double({ min: 10.001, max: 2999.999, noNaN: true }), (tMid) => {
          return validateConfig(mergeConfigTables({ fit: { t_mid: tMid } })).valid;
        })
      );
    });
  });
});
