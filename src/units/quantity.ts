/**
 * Unit-tagged values.
 *
 * A quantity never hands out a bare number without naming the unit it is
 * wanted in (`to`) or asking for SI (`si`), so every computation states its
 * units at the point of use.
 *
 * @packageDocumentation
 */

import { ThermoEngineError } from '../errors/index.js';
import { lookupUnit, SI_UNITS, type Dimension, type UnitDefinition } from './units.js';

function convertNumber(value: number, source: UnitDefinition, target: UnitDefinition): number {
  if (source.symbol === target.symbol || source.toSI === target.toSI) {
    return value;
  }
  return (value * source.toSI) / target.toSI;
}

function resolvePair(from: string, to: string): [UnitDefinition, UnitDefinition] {
  const source = lookupUnit(from);
  const target = lookupUnit(to);
  if (source.dimension !== target.dimension) {
    throw new ThermoEngineError(
      `Cannot convert ${source.dimension} "${from}" to ${target.dimension} "${to}"`,
      'UNIT_MISMATCH',
      { details: { from, to, fromDimension: source.dimension, toDimension: target.dimension } }
    );
  }
  return [source, target];
}

abstract class BaseQuantity {
  readonly units: string;
  readonly dimension: Dimension;

  protected constructor(units: string) {
    this.units = units;
    this.dimension = lookupUnit(units).dimension;
  }

  /**
   * Asserts the quantity's dimension.
   *
   * @param field - Field path reported on failure, e.g. `conformer.E0`.
   * @param dimension - Expected dimension.
   * @returns This quantity, for chaining.
   * @throws {ThermoEngineError} `UNIT_MISMATCH`.
   */
  requireDimension(field: string, dimension: Dimension): this {
    if (this.dimension !== dimension) {
      throw new ThermoEngineError(
        `${field} must be ${dimension}, got "${this.units}" (${this.dimension})`,
        'UNIT_MISMATCH',
        { details: { field, expected: dimension, actual: this.dimension, units: this.units } }
      );
    }
    return this;
  }

  protected assertSameDimension(other: BaseQuantity, operation: string): void {
    if (other.dimension !== this.dimension) {
      throw new ThermoEngineError(
        `Cannot ${operation} ${other.dimension} "${other.units}" and ${this.dimension} "${this.units}"`,
        'UNIT_MISMATCH',
        { details: { left: this.units, right: other.units } }
      );
    }
  }
}

/**
 * A single value with units.
 */
export class ScalarQuantity extends BaseQuantity {
  readonly value: number;

  constructor(value: number, units: string) {
    super(units);
    this.value = value;
    Object.freeze(this);
  }

  /** Value in the given units. */
  to(units: string): number {
    const [source, target] = resolvePair(this.units, units);
    return convertNumber(this.value, source, target);
  }

  /** Value in the SI unit of this dimension. */
  si(): number {
    return this.to(SI_UNITS[this.dimension]);
  }

  /** Same quantity expressed in other units. */
  convert(units: string): ScalarQuantity {
    return new ScalarQuantity(this.to(units), units);
  }

  /** Sum, in this quantity's units. */
  add(other: ScalarQuantity): ScalarQuantity {
    this.assertSameDimension(other, 'add');
    return new ScalarQuantity(this.value + other.to(this.units), this.units);
  }

  /** Difference, in this quantity's units. */
  subtract(other: ScalarQuantity): ScalarQuantity {
    this.assertSameDimension(other, 'subtract');
    return new ScalarQuantity(this.value - other.to(this.units), this.units);
  }

  scale(factor: number): ScalarQuantity {
    return new ScalarQuantity(this.value * factor, this.units);
  }

  /** Sign of `this - other`. */
  compare(other: ScalarQuantity): -1 | 0 | 1 {
    this.assertSameDimension(other, 'compare');
    const difference = this.si() - other.si();
    return difference < 0 ? -1 : difference > 0 ? 1 : 0;
  }
}

/**
 * A one-dimensional array of values sharing units.
 */
export class ArrayQuantity extends BaseQuantity {
  readonly value: readonly number[];

  constructor(value: readonly number[], units: string) {
    super(units);
    this.value = Object.freeze([...value]);
    Object.freeze(this);
  }

  get length(): number {
    return this.value.length;
  }

  to(units: string): number[] {
    const [source, target] = resolvePair(this.units, units);
    return this.value.map((v) => convertNumber(v, source, target));
  }

  si(): number[] {
    return this.to(SI_UNITS[this.dimension]);
  }

  convert(units: string): ArrayQuantity {
    return new ArrayQuantity(this.to(units), units);
  }

  /** Element `index` as a scalar quantity. */
  at(index: number): ScalarQuantity {
    const value = this.value[index];
    if (value === undefined) {
      throw new RangeError(`Index ${String(index)} out of range for length ${String(this.length)}`);
    }
    return new ScalarQuantity(value, this.units);
  }

  scale(factor: number): ArrayQuantity {
    return new ArrayQuantity(
      this.value.map((v) => v * factor),
      this.units
    );
  }
}

/**
 * Rows of values sharing units (geometry, Fourier coefficients). Rows may
 * differ in length; the shape survives every conversion.
 */
export class MatrixQuantity extends BaseQuantity {
  readonly value: readonly (readonly number[])[];

  constructor(value: readonly (readonly number[])[], units: string) {
    super(units);
    this.value = Object.freeze(value.map((row) => Object.freeze([...row])));
    Object.freeze(this);
  }

  get rows(): number {
    return this.value.length;
  }

  to(units: string): number[][] {
    const [source, target] = resolvePair(this.units, units);
    return this.value.map((row) => row.map((v) => convertNumber(v, source, target)));
  }

  si(): number[][] {
    return this.to(SI_UNITS[this.dimension]);
  }

  convert(units: string): MatrixQuantity {
    return new MatrixQuantity(this.to(units), units);
  }

  /** Row `index` as an array quantity. */
  row(index: number): ArrayQuantity {
    const row = this.value[index];
    if (row === undefined) {
      throw new RangeError(`Row ${String(index)} out of range for ${String(this.rows)} rows`);
    }
    return new ArrayQuantity(row, this.units);
  }
}

/**
 * Any quantity shape.
 */
export type Quantity = ScalarQuantity | ArrayQuantity | MatrixQuantity;

/** Shorthand for `new ScalarQuantity(value, units)`. */
export function scalar(value: number, units: string): ScalarQuantity {
  return new ScalarQuantity(value, units);
}

/** Shorthand for `new ArrayQuantity(value, units)`. */
export function array(value: readonly number[], units: string): ArrayQuantity {
  return new ArrayQuantity(value, units);
}

/** Shorthand for `new MatrixQuantity(value, units)`. */
export function matrix(value: readonly (readonly number[])[], units: string): MatrixQuantity {
  return new MatrixQuantity(value, units);
}
