/**
 * Semantic validation for configuration values.
 *
 * Type checks happen in the parser; this module checks ranges and the
 * relations between fields (t_min below t_max, t_mid inside the range).
 *
 * @packageDocumentation
 */

import type { Config } from './types.js';

/**
 * Error class for semantic validation errors.
 */
export class ConfigValidationError extends Error {
  /** Array of validation failure details. */
  public readonly errors: ValidationError[];

  /**
   * Creates a new ConfigValidationError.
   *
   * @param message - Summary error message.
   * @param errors - Array of specific validation errors.
   */
  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

/**
 * Individual validation error details.
 */
export interface ValidationError {
  /** The field path that failed validation. */
  field: string;
  /** The invalid value that was provided. */
  value: unknown;
  /** Human-readable description of the validation failure. */
  message: string;
}

/**
 * Result of a validation operation.
 */
export interface ValidationResult {
  /** Whether validation passed. */
  valid: boolean;
  /** Array of validation errors (empty if valid). */
  errors: ValidationError[];
}

function validatePositiveNumber(value: number, fieldPath: string, errors: ValidationError[]): void {
  if (!Number.isFinite(value) || value <= 0) {
    errors.push({
      field: fieldPath,
      value,
      message: `'${fieldPath}' must be a positive number, got ${String(value)}`,
    });
  }
}

function validateIntegerAtLeast(value: number, fieldPath: string, min: number, errors: ValidationError[]): void {
  if (!Number.isInteger(value) || value < min) {
    errors.push({
      field: fieldPath,
      value,
      message: `'${fieldPath}' must be an integer of at least ${String(min)}, got ${String(value)}`,
    });
  }
}

function validateTemperatures(config: Config, errors: ValidationError[]): void {
  const { t_min, t_max, reference } = config.temperature;
  validatePositiveNumber(t_min, 'temperature.t_min', errors);
  validatePositiveNumber(reference, 'temperature.reference', errors);
  if (!Number.isFinite(t_max) || t_max <= t_min) {
    errors.push({
      field: 'temperature.t_max',
      value: t_max,
      message: `'temperature.t_max' must exceed t_min (${String(t_min)}), got ${String(t_max)}`,
    });
  }
}

function validateFit(config: Config, errors: ValidationError[]): void {
  const { fit, temperature } = config;
  // With a search the configured t_mid is only a starting hint.
  if (!fit.search_t_mid && !(fit.t_mid > temperature.t_min && fit.t_mid < temperature.t_max)) {
    errors.push({
      field: 'fit.t_mid',
      value: fit.t_mid,
      message: `'fit.t_mid' must lie strictly between ${String(temperature.t_min)} and ${String(temperature.t_max)}, got ${String(fit.t_mid)}`,
    });
  }
  validateIntegerAtLeast(fit.samples_per_range, 'fit.samples_per_range', 4, errors);
  validateIntegerAtLeast(fit.candidate_count, 'fit.candidate_count', 1, errors);
  validateIntegerAtLeast(fit.max_iterations, 'fit.max_iterations', 1, errors);
  validatePositiveNumber(fit.residual_tolerance, 'fit.residual_tolerance', errors);
  validatePositiveNumber(fit.continuity_tolerance, 'fit.continuity_tolerance', errors);
  validatePositiveNumber(fit.tie_tolerance, 'fit.tie_tolerance', errors);
  validatePositiveNumber(fit.t_mid_tolerance, 'fit.t_mid_tolerance', errors);
}

/**
 * Validates configuration semantically.
 *
 * @param config - The parsed configuration to validate.
 * @returns Validation result with any errors.
 *
 * @example
 * ```typescript
 * import { parseConfig } from './parser.js';
 * import { validateConfig } from './validator.js';
 *
 * const result = validateConfig(parseConfig(tomlContent));
 * if (!result.valid) {
 *   for (const error of result.errors) {
 *     console.error(`${error.field}: ${error.message}`);
 *   }
 * }
 * ```
 */
export function validateConfig(config: Config): ValidationResult {
  const errors: ValidationError[] = [];

  validateTemperatures(config, errors);
  validateFit(config, errors);
  validateIntegerAtLeast(config.rotors.max_basis, 'rotors.max_basis', 1, errors);
  validateIntegerAtLeast(config.rotors.quadrature_points, 'rotors.quadrature_points', 1, errors);
  validateIntegerAtLeast(config.rotors.max_jacobi_sweeps, 'rotors.max_jacobi_sweeps', 1, errors);
  validateIntegerAtLeast(config.batch.concurrency, 'batch.concurrency', 1, errors);

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Validates configuration and throws if invalid.
 *
 * @throws ConfigValidationError if validation fails.
 */
export function assertConfigValid(config: Config): void {
  const result = validateConfig(config);

  if (!result.valid) {
    const errorMessages = result.errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    throw new ConfigValidationError(
      `Configuration validation failed with ${String(result.errors.length)} error(s):\n${errorMessages}`,
      result.errors
    );
  }
}
