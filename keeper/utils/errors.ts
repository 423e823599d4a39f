/**
 * Hard-failure taxonomy for the sizing engine
 *
 * ============================================================
 * TWO KINDS OF "NO":
 * ============================================================
 * - SizingError (thrown): the engine CANNOT answer.
 *   Inputs are malformed, stale or arithmetically impossible.
 *   The keeper retries only the codes a fresh snapshot can clear
 *   (see isRetryable); bad policy fails the cycle at once.
 * - Reject decision (returned): the engine answered "don't proceed".
 *   See engine/profitability.ts. Never thrown, never retried.
 * ============================================================
 */

/**
 * Arithmetic failures: an invariant on caller-supplied numbers broke
 */
export type ArithmeticErrorCode = 'ArithmeticOverflow' | 'DivisionByZero' | 'InvalidAmount';

/**
 * Input-validity failures: missing price, bad policy value, unhealthy position
 */
export type InputErrorCode =
  | 'ZeroPrice'
  | 'InvalidSlippage'
  | 'InvalidFee'
  | 'InvalidDecimals'
  | 'Undercollateralized'
  | 'InvalidLeverageConfig'
  | 'InvalidSwapRequest'
  | 'QuoteExpired';

export type SizingErrorCode = ArithmeticErrorCode | InputErrorCode;

export type SizingErrorCategory = 'arithmetic' | 'input';

const ARITHMETIC_CODES: ReadonlySet<SizingErrorCode> = new Set<SizingErrorCode>([
  'ArithmeticOverflow',
  'DivisionByZero',
  'InvalidAmount',
]);

/**
 * Values attached to an error for logging (amounts, bps, asset ids)
 */
export type SizingErrorContext = Record<string, bigint | number | string | boolean>;

export class SizingError extends Error {
  readonly code: SizingErrorCode;
  readonly category: SizingErrorCategory;
  readonly context: SizingErrorContext;

  constructor(code: SizingErrorCode, message: string, context: SizingErrorContext = {}) {
    super(`${code}: ${message}`);
    this.name = 'SizingError';
    this.code = code;
    this.category = ARITHMETIC_CODES.has(code) ? 'arithmetic' : 'input';
    this.context = context;
  }
}

export function isSizingError(error: unknown): error is SizingError {
  return error instanceof SizingError;
}

/** Codes caused by market or vault state that the next snapshot may not repeat */
const SNAPSHOT_CODES: ReadonlySet<SizingErrorCode> = new Set<SizingErrorCode>([
  'ZeroPrice',
  'QuoteExpired',
  'Undercollateralized',
]);

/**
 * Whether a fresh snapshot could make the failure go away
 *
 * Anything that is not a SizingError came from reading the snapshot
 * (RPC, indexer) and is retried.
 */
export function isRetryable(error: unknown): boolean {
  if (!isSizingError(error)) return true;
  return SNAPSHOT_CODES.has(error.code);
}

/**
 * Message for logs regardless of what was thrown
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
