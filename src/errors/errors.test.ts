import { describe, expect, it } from 'vitest';
import { THERMO_ERROR_CODES, ThermoEngineError, isThermoEngineError } from './index.js';

describe('ThermoEngineError', () => {
  it('should carry code, details and cause', () => {
    const cause = new Error('root');
    const error = new ThermoEngineError('bad frequency', 'INVALID_MODE_PARAMETER', {
      details: { field: 'modes[2].frequencies[0]', value: -5 },
      cause,
    });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ThermoEngineError');
    expect(error.message).toBe('bad frequency');
    expect(error.code).toBe('INVALID_MODE_PARAMETER');
    expect(error.details).toEqual({ field: 'modes[2].frequencies[0]', value: -5 });
    expect(error.cause).toBe(cause);
  });

  it('should default details to an empty object', () => {
    const error = new ThermoEngineError('x', 'UNIT_MISMATCH');
    expect(error.details).toEqual({});
    expect(error.cause).toBeUndefined();
  });

  it('should mark only malformed records as fatal', () => {
    const fatal = THERMO_ERROR_CODES.filter((code) => new ThermoEngineError('x', code).fatal);
    expect(fatal).toEqual(['MALFORMED_RECORD']);
  });

  describe('isThermoEngineError', () => {
    it('should narrow by class', () => {
      expect(isThermoEngineError(new ThermoEngineError('x', 'POOR_FIT_QUALITY'))).toBe(true);
      expect(isThermoEngineError(new Error('x'))).toBe(false);
      expect(isThermoEngineError('POOR_FIT_QUALITY')).toBe(false);
    });

    it('should narrow by code when given', () => {
      const error = new ThermoEngineError('x', 'POOR_FIT_QUALITY');
      expect(isThermoEngineError(error, 'POOR_FIT_QUALITY')).toBe(true);
      expect(isThermoEngineError(error, 'FIT_DID_NOT_CONVERGE')).toBe(false);
    });
  });
});
