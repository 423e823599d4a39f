/**
 * Swap Sizer - bounds and validation for venue swaps
 *
 * ============================================================
 * WHAT THIS MODULE DOES:
 * ============================================================
 * - Computes the oracle-derived ceiling for an exact-output swap
 *   (amountInMaximum) and the floor for an exact-input swap
 *   (amountOutMinimum)
 * - Validates a swap request before it is sized
 * - Validates what a venue actually did against those bounds
 *
 * ============================================================
 * DIRECTIONALITY (the bug this module exists to prevent):
 * ============================================================
 * Exact-output:  received >= expectedOutput   (output is a FLOOR)
 *                spent    <= maxInput         (input is a CEILING)
 * Exact-input:   spent    <= amountIn         (input is a CEILING)
 *                received >= minOutput        (output is a FLOOR)
 *
 * Bounds come from oracle prices + slippage ONLY. A venue quote or a
 * realized amount is never trusted to set its own bound.
 *
 * ============================================================
 * SURPLUS:
 * ============================================================
 * A venue may deliver more than requested. That is valid; the surplus
 * is reported, not moved. Whether it is swept to a receiver or kept is
 * the caller's policy.
 * ============================================================
 */

import type { Asset, SwapBounds, SwapRequest, SwapResult, SwapValidation } from '../config/types.js';
import { SizingError } from '../utils/errors.js';
import { assertUint256 } from '../math/fixedPoint.js';
import { assertSlippage, convert, withSlippageBuffer, withSlippageDiscount } from '../oracle/priceConverter.js';
import { logger } from '../utils/logger.js';

// ============================================================
// BOUNDS
// ============================================================

/**
 * Maximum input for an exact-output swap
 *
 * convert(output → input, round up) then add the slippage buffer.
 * This is the amountInMaximum passed to the venue.
 */
export function maxInputForExactOutput(
  outputAmount: bigint,
  inputAsset: Asset,
  outputAsset: Asset,
  slippageBps: number
): bigint {
  const fairInput = convert(outputAmount, outputAsset, inputAsset, true);
  return withSlippageBuffer(fairInput, slippageBps);
}

/**
 * Minimum output for an exact-input swap
 *
 * convert(input → output, round down) then remove the slippage buffer.
 */
export function minOutputForExactInput(
  inputAmount: bigint,
  inputAsset: Asset,
  outputAsset: Asset,
  slippageBps: number
): bigint {
  const fairOutput = convert(inputAmount, inputAsset, outputAsset, false);
  return withSlippageDiscount(fairOutput, slippageBps);
}

// ============================================================
// REQUEST VALIDATION
// ============================================================

/**
 * Check a request is well formed and its quote is still live
 *
 * @param request - Swap to size
 * @param now - Current unix seconds; the deadline is only checked when given
 */
export function validateSwapRequest(request: SwapRequest, now?: number): void {
  const hasIn = request.amountIn !== undefined;
  const hasOut = request.amountOut !== undefined;

  if (hasIn === hasOut) {
    throw new SizingError('InvalidSwapRequest', 'exactly one of amountIn / amountOut must be set', {
      hasAmountIn: hasIn,
      hasAmountOut: hasOut,
    });
  }

  if (request.amountIn !== undefined) assertUint256(request.amountIn, 'amountIn');
  if (request.amountOut !== undefined) assertUint256(request.amountOut, 'amountOut');

  assertSlippage(request.slippageBps);

  if (now !== undefined && request.deadline !== undefined && now > request.deadline) {
    throw new SizingError('QuoteExpired', 'quote deadline has passed', {
      deadline: request.deadline,
      now,
    });
  }
}

/**
 * Oracle bounds for either swap mode
 */
export function sizeSwap(request: SwapRequest, now?: number): SwapBounds {
  validateSwapRequest(request, now);

  const { inputAsset, outputAsset, slippageBps, amountIn, amountOut } = request;

  if (amountOut !== undefined) {
    const maxAmountIn = maxInputForExactOutput(amountOut, inputAsset, outputAsset, slippageBps);
    logger.swap.debug('Sized exact-output swap', { amountOut, maxAmountIn, slippageBps });
    return { mode: 'exactOutput', amountOut, maxAmountIn };
  }

  if (amountIn !== undefined) {
    const minAmountOut = minOutputForExactInput(amountIn, inputAsset, outputAsset, slippageBps);
    logger.swap.debug('Sized exact-input swap', { amountIn, minAmountOut, slippageBps });
    return { mode: 'exactInput', amountIn, minAmountOut };
  }

  throw new SizingError('InvalidSwapRequest', 'no swap amount set');
}

// ============================================================
// RESULT VALIDATION
// ============================================================

/**
 * Validate an exact-output swap result
 *
 * Fails when the venue delivered less than required or spent more than
 * the ceiling. Output is checked first.
 */
export function validateSwapResult(result: SwapResult, expectedOutput: bigint, maxInput: bigint): SwapValidation {
  if (result.amountReceived < expectedOutput) {
    return {
      ok: false,
      error: { code: 'InsufficientOutput', expected: expectedOutput, actual: result.amountReceived },
    };
  }

  if (result.amountSpent > maxInput) {
    return {
      ok: false,
      error: { code: 'ExcessiveInput', max: maxInput, actual: result.amountSpent },
    };
  }

  return { ok: true, surplus: result.amountReceived - expectedOutput };
}

/**
 * Validate an exact-input swap result
 */
export function validateExactInputResult(result: SwapResult, amountIn: bigint, minOutput: bigint): SwapValidation {
  if (result.amountReceived < minOutput) {
    return {
      ok: false,
      error: { code: 'InsufficientOutput', expected: minOutput, actual: result.amountReceived },
    };
  }

  if (result.amountSpent > amountIn) {
    return {
      ok: false,
      error: { code: 'ExcessiveInput', max: amountIn, actual: result.amountSpent },
    };
  }

  return { ok: true, surplus: result.amountReceived - minOutput };
}
