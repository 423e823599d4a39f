/**
 * Fixed-Point Math with Explicit Rounding
 *
 * ============================================================
 * WHAT THIS MODULE DOES:
 * ============================================================
 * - Integer-only mulDiv with a caller-chosen rounding direction
 * - Rescales amounts between decimal bases
 * - Ray (1e27), wad (1e18) and basis-point helpers, each with a
 *   roundUp flag instead of the implicit half-up of the usual libraries
 *
 * ============================================================
 * NUMERIC MODEL:
 * ============================================================
 * Every operand is a uint256. bigint never overflows on its own, so the
 * uint256 limits are enforced explicitly: an operand or result above
 * MAX_UINT256 throws ArithmeticOverflow, exactly where the contracts
 * would revert. The a*b product is held in full (the 512-bit
 * intermediate of the on-chain mulDiv), so only the final quotient is
 * range-checked.
 *
 * Rounding:
 *   roundUp = true  → toward +∞ (amounts the vault accepts, fees)
 *   roundUp = false → toward 0  (amounts the vault pays out)
 * ============================================================
 */

import { SizingError } from '../utils/errors.js';
import { BPS_DENOMINATOR, MAX_DECIMALS, MAX_UINT256, RAY, WAD } from '../utils/units.js';

// ============================================================
// Guards
// ============================================================

/**
 * Assert a value is a valid uint256
 */
export function assertUint256(value: bigint, name: string): void {
  if (value < 0n) {
    throw new SizingError('InvalidAmount', `${name} must not be negative`, { [name]: value });
  }
  if (value > MAX_UINT256) {
    throw new SizingError('ArithmeticOverflow', `${name} exceeds uint256`, { [name]: value });
  }
}

export function assertDecimals(decimals: number, name: string): void {
  if (!Number.isInteger(decimals) || decimals < 0 || decimals > MAX_DECIMALS) {
    throw new SizingError('InvalidDecimals', `${name} must be an integer in [0, ${MAX_DECIMALS}]`, {
      [name]: decimals,
    });
  }
}

// ============================================================
// Core
// ============================================================

/**
 * Ceiling division for non-negative bigint: ceil(a / b)
 */
export function ceilDiv(a: bigint, b: bigint): bigint {
  if (b === 0n) throw new SizingError('DivisionByZero', 'ceilDiv denominator is zero');
  if (a === 0n) return 0n;
  return (a - 1n) / b + 1n;
}

/**
 * a * b / denominator with explicit rounding
 *
 * Mirrors Math.mulDiv(a, b, denominator, rounding): reverts on a zero
 * denominator and on a result that does not fit a uint256.
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint, roundUp: boolean): bigint {
  assertUint256(a, 'a');
  assertUint256(b, 'b');
  assertUint256(denominator, 'denominator');
  if (denominator === 0n) {
    throw new SizingError('DivisionByZero', 'mulDiv denominator is zero', { a, b });
  }

  const product = a * b;
  const result = roundUp ? ceilDiv(product, denominator) : product / denominator;

  if (result > MAX_UINT256) {
    throw new SizingError('ArithmeticOverflow', 'mulDiv result exceeds uint256', { a, b, denominator });
  }
  return result;
}

/**
 * Rescale an amount between two decimal bases
 *
 * Scaling up multiplies by 10^diff (exact, overflow-checked).
 * Scaling down divides by 10^diff and loses precision; rounding
 * defaults to floor.
 */
export function scaleDecimals(
  amount: bigint,
  fromDecimals: number,
  toDecimals: number,
  roundUp: boolean = false
): bigint {
  assertUint256(amount, 'amount');
  assertDecimals(fromDecimals, 'fromDecimals');
  assertDecimals(toDecimals, 'toDecimals');

  if (fromDecimals === toDecimals) return amount;

  if (toDecimals > fromDecimals) {
    const scaled = amount * 10n ** BigInt(toDecimals - fromDecimals);
    if (scaled > MAX_UINT256) {
      throw new SizingError('ArithmeticOverflow', 'scaled amount exceeds uint256', {
        amount,
        fromDecimals,
        toDecimals,
      });
    }
    return scaled;
  }

  const factor = 10n ** BigInt(fromDecimals - toDecimals);
  return roundUp ? ceilDiv(amount, factor) : amount / factor;
}

// ============================================================
// Percentages, wad and ray
// ============================================================

/**
 * value * bps / 10000
 */
export function percentMul(value: bigint, bps: bigint, roundUp: boolean): bigint {
  return mulDiv(value, bps, BPS_DENOMINATOR, roundUp);
}

/** a * b / RAY */
export function rayMul(a: bigint, b: bigint, roundUp: boolean): bigint {
  return mulDiv(a, b, RAY, roundUp);
}

/** a * RAY / b */
export function rayDiv(a: bigint, b: bigint, roundUp: boolean): bigint {
  return mulDiv(a, RAY, b, roundUp);
}

/** a * b / WAD */
export function wadMul(a: bigint, b: bigint, roundUp: boolean): bigint {
  return mulDiv(a, b, WAD, roundUp);
}

/** a * WAD / b */
export function wadDiv(a: bigint, b: bigint, roundUp: boolean): bigint {
  return mulDiv(a, WAD, b, roundUp);
}
