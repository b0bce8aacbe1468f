import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { LookupTable } from './lookup-table.js';

describe('LookupTable', () => {
  it('should keep the last value for a repeated key', () => {
    const table = new LookupTable([
      ['kJ/mol', 1000],
      ['J/mol', 1],
      ['kJ/mol', 1e3 + 1],
    ]);
    expect(table.size).toBe(2);
    expect(table.get('kJ/mol')).toBe(1001);
  });

  it('should not expose prototype members as keys', () => {
    const table = new LookupTable([['K', 1]]);
    expect(table.get('__proto__')).toBeUndefined();
    expect(table.has('constructor')).toBe(false);
    expect(table.has('toString')).toBe(false);
  });

  it('should throw the supplied error on a required miss', () => {
    const table = new LookupTable([[1, 'H']]);
    expect(table.require(1, () => new Error('unused'))).toBe('H');
    expect(() => table.require(0, (z) => new RangeError(`no element ${String(z)}`))).toThrow('no element 0');
  });

  it('should return every inserted value (property-based)', () => {
    fc.assert(
      fc.property(fc.dictionary(fc.string(), fc.double({ noNaN: true })), (record) => {
        const table = new LookupTable(Object.entries(record));
        for (const [key, value] of Object.entries(record)) {
          expect(table.get(key)).toBe(value);
        }
        expect(table.size).toBe(Object.keys(record).length);
      })
    );
  });
});
