/**
 * CHEMKIN thermo entries: four fixed-column lines per species.
 *
 * @packageDocumentation
 */

import { ThermoEngineError } from '../errors/index.js';
import { modelTmid } from './polynomial.js';
import type { NASAModel } from './types.js';

const NAME_WIDTH = 24;
const ELEMENT_SLOTS = 4;

/**
 * A parsed entry. Coefficients carry the eight significant digits of the
 * text.
 */
export interface ChemkinEntry {
  readonly label: string;
  readonly elements: readonly (readonly [string, number])[];
  readonly phase: string;
  readonly Tmin: number;
  readonly Tmax: number;
  readonly Tmid: number;
  readonly low: readonly number[];
  readonly high: readonly number[];
}

/** `%15.8E`. */
function formatCoefficient(value: number): string {
  const [mantissa = '', exponent = '0'] = value.toExponential(8).split('e');
  const power = Number(exponent);
  const sign = power < 0 ? '-' : '+';
  return `${mantissa}E${sign}${String(Math.abs(power)).padStart(2, '0')}`.padStart(15);
}

function formatElement(symbol: string, count: number): string {
  return symbol.padEnd(2) + String(count).padStart(3);
}

function numberedLine(body: string, line: number): string {
  return body.padEnd(79) + String(line);
}

/**
 * Renders a model as a CHEMKIN thermo entry, each line ending in a newline.
 * Labels longer than 24 characters are truncated; a fifth element goes in
 * columns 74–78.
 *
 * @param elements - Element counts, e.g. from `elementCounts`.
 */
export function formatChemkinThermo(
  label: string,
  elements: readonly (readonly [string, number])[],
  model: NASAModel
): string {
  if (elements.length > ELEMENT_SLOTS + 1) {
    throw new ThermoEngineError(
      `CHEMKIN entries hold at most ${String(ELEMENT_SLOTS + 1)} elements, got ${String(elements.length)}`,
      'MALFORMED_RECORD',
      { details: { label, elements: elements.map(([symbol]) => symbol) } }
    );
  }
  const slots = elements
    .slice(0, ELEMENT_SLOTS)
    .map(([symbol, count]) => formatElement(symbol, count))
    .join('')
    .padEnd(5 * ELEMENT_SLOTS);
  const extra = elements[ELEMENT_SLOTS];
  const first =
    label.slice(0, NAME_WIDTH).padEnd(NAME_WIDTH) +
    slots +
    'G' +
    model.Tmin.to('K').toFixed(3).padStart(10) +
    model.Tmax.to('K').toFixed(3).padStart(10) +
    modelTmid(model).toFixed(2).padStart(8) +
    (extra === undefined ? '' : formatElement(extra[0], extra[1]));

  const [low, high] = model.polynomials;
  const a = (index: number): string => formatCoefficient(low.coeffs[index] ?? 0);
  const b = (index: number): string => formatCoefficient(high.coeffs[index] ?? 0);

  return [
    numberedLine(first, 1),
    numberedLine(b(0) + b(1) + b(2) + b(3) + b(4), 2),
    numberedLine(b(5) + b(6) + a(0) + a(1) + a(2), 3),
    numberedLine(a(3) + a(4) + a(5) + a(6), 4),
  ]
    .map((line) => line + '\n')
    .join('');
}

function malformed(message: string, line: number): ThermoEngineError {
  return new ThermoEngineError(`CHEMKIN entry, line ${String(line)}: ${message}`, 'MALFORMED_RECORD', {
    details: { line },
  });
}

function parseNumber(text: string, line: number, what: string): number {
  const value = Number(text.trim());
  if (text.trim() === '' || !Number.isFinite(value)) {
    throw malformed(`${what} "${text.trim()}" is not a number`, line);
  }
  return value;
}

function parseElements(text: string): [string, number][] {
  const elements: [string, number][] = [];
  for (let offset = 0; offset + 5 <= text.length; offset += 5) {
    const symbol = text.slice(offset, offset + 2).trim();
    const count = Number(text.slice(offset + 2, offset + 5).trim());
    if (symbol !== '' && Number.isInteger(count) && count > 0) {
      elements.push([symbol, count]);
    }
  }
  return elements;
}

/**
 * Reads the first four lines of a CHEMKIN thermo entry.
 *
 * @throws {ThermoEngineError} `MALFORMED_RECORD`.
 */
export function parseChemkinThermo(text: string): ChemkinEntry {
  const lines = text.split(/\r?\n/).filter((line) => line.trim() !== '');
  if (lines.length < 4) {
    throw malformed(`expected 4 lines, got ${String(lines.length)}`, lines.length + 1);
  }
  const [first = '', ...rest] = lines;
  if (first.length < 73) {
    throw malformed('header line is shorter than 73 columns', 1);
  }

  const coefficients: number[] = [];
  rest.slice(0, 3).forEach((line, index) => {
    const fields = index === 2 ? 4 : 5;
    for (let field = 0; field < fields; field++) {
      coefficients.push(parseNumber(line.slice(field * 15, field * 15 + 15), index + 2, 'coefficient'));
    }
  });

  const high = coefficients.slice(0, 7);
  const low = coefficients.slice(7, 14);
  const extra = first.length >= 78 ? parseElements(first.slice(73, 78)) : [];

  return {
    label: first.slice(0, NAME_WIDTH).trim(),
    elements: [...parseElements(first.slice(24, 44)), ...extra],
    phase: first.slice(44, 45),
    Tmin: parseNumber(first.slice(45, 55), 1, 'Tmin'),
    Tmax: parseNumber(first.slice(55, 65), 1, 'Tmax'),
    Tmid: parseNumber(first.slice(65, 73), 1, 'Tmid'),
    low,
    high,
  };
}
