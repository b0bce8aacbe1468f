/**
 * Error taxonomy for the thermodynamic-property engine.
 *
 * Every failure raised while building a species' conformer, evaluating its
 * partition functions, fitting its NASA model or decoding its record is a
 * {@link ThermoEngineError}. The `code` identifies the failure class; batch
 * processing reports it per species.
 *
 * @packageDocumentation
 */

/**
 * Error codes for engine failures.
 *
 * - `INVALID_MODE_PARAMETER`: non-positive frequency, inertia, mass or symmetry number
 * - `UNSUPPORTED_MODE`: a mode variant the evaluator cannot combine
 * - `NON_PHYSICAL_RESULT`: a derived Cp/H/S violates a physical bound
 * - `POOR_FIT_QUALITY`: NASA fit residual or discontinuity above tolerance
 * - `FIT_DID_NOT_CONVERGE`: an iteration budget was exhausted
 * - `UNIT_MISMATCH`: dimensional inconsistency in a Quantity operation
 * - `INVALID_FIT_CONFIGURATION`: temperature range or Tmid out of bounds
 * - `MALFORMED_RECORD`: a structurally invalid species record
 */
export type ThermoErrorCode =
  | 'INVALID_MODE_PARAMETER'
  | 'UNSUPPORTED_MODE'
  | 'NON_PHYSICAL_RESULT'
  | 'POOR_FIT_QUALITY'
  | 'FIT_DID_NOT_CONVERGE'
  | 'UNIT_MISMATCH'
  | 'INVALID_FIT_CONFIGURATION'
  | 'MALFORMED_RECORD';

/**
 * All error codes, in declaration order.
 */
export const THERMO_ERROR_CODES: readonly ThermoErrorCode[] = [
  'INVALID_MODE_PARAMETER',
  'UNSUPPORTED_MODE',
  'NON_PHYSICAL_RESULT',
  'POOR_FIT_QUALITY',
  'FIT_DID_NOT_CONVERGE',
  'UNIT_MISMATCH',
  'INVALID_FIT_CONFIGURATION',
  'MALFORMED_RECORD',
];

/**
 * Codes that end processing of the species they occur in.
 * Every other code leaves the caller free to retry with different options.
 */
const FATAL_CODES: ReadonlySet<ThermoErrorCode> = new Set<ThermoErrorCode>(['MALFORMED_RECORD']);

/**
 * Error class for engine operations.
 */
export class ThermoEngineError extends Error {
  /** The error code for programmatic handling. */
  public readonly code: ThermoErrorCode;
  /** Structured context: field paths, offending values, fit results. */
  public readonly details: Readonly<Record<string, unknown>>;
  /** The underlying cause if available. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new ThermoEngineError.
   *
   * @param message - Human-readable error message.
   * @param code - The error code.
   * @param options - Additional error options.
   */
  constructor(
    message: string,
    code: ThermoErrorCode,
    options?: { details?: Record<string, unknown>; cause?: Error }
  ) {
    super(message);
    this.name = 'ThermoEngineError';
    this.code = code;
    this.details = options?.details ?? {};
    this.cause = options?.cause;
  }

  /**
   * Whether this failure ends processing of the species it occurred in.
   */
  get fatal(): boolean {
    return FATAL_CODES.has(this.code);
  }
}

/**
 * Type guard for engine errors, optionally narrowed to one code.
 *
 * @param error - Value caught from a `catch` clause.
 * @param code - Optional code the error must carry.
 * @returns Whether `error` is a ThermoEngineError (with that code).
 */
export function isThermoEngineError(
  error: unknown,
  code?: ThermoErrorCode
): error is ThermoEngineError {
  if (!(error instanceof ThermoEngineError)) {
    return false;
  }
  return code === undefined || error.code === code;
}
