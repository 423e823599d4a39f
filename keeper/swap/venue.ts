/**
 * Swap Venue capability
 *
 * ============================================================
 * WHAT THIS MODULE DOES:
 * ============================================================
 * - Defines the interface a swap venue (Odos router, a DEX aggregator,
 *   an in-process fake) implements to take part in a cycle: quote an
 *   exact-output swap, then execute the accepted quote
 * - Checks a venue quote against the oracle-derived ceiling
 *
 * ============================================================
 * WHAT THIS MODULE DOES NOT DO:
 * ============================================================
 * - Does NOT talk to any venue (implementations live with the caller)
 * - Does NOT decide when to execute: the tick hands execution to the
 *   submit callback, which runs it inside the flash-loan transaction
 * - Does NOT derive bounds from quotes: the bound always comes from
 *   swap/sizer.ts, the quote is only checked against it
 * ============================================================
 */

import type { Asset, SwapResult } from '../config/types.js';

// ============================================================
// TYPES
// ============================================================

/**
 * Parameters for an exact-output quote or execution
 */
export interface ExactOutputParams {
  inputAsset: Asset;
  outputAsset: Asset;
  /** Output the venue must deliver */
  amountOut: bigint;
  /** Oracle ceiling (amountInMaximum) */
  maxAmountIn: bigint;
}

/**
 * A venue's offer for an exact-output swap
 */
export interface SwapQuote {
  /** Which venue produced this quote */
  venue: string;
  /** Input the venue asks for */
  amountIn: bigint;
  /** Output the venue promises */
  amountOut: bigint;
  /** Venue-specific calldata for the transaction layer */
  calldata?: string;
  /** Unix seconds after which the quote is stale */
  deadline?: number;
}

/**
 * A swap venue, one implementation per aggregator / router
 */
export interface SwapVenue {
  /** Human-readable venue name */
  readonly name: string;

  /**
   * Quote an exact-output swap
   *
   * @returns Quote, or null when the venue has no route
   */
  quoteExactOutput(params: ExactOutputParams): Promise<SwapQuote | null>;

  /**
   * Execute a quote previously returned for the same params
   *
   * Must spend at most params.maxAmountIn and deliver at least
   * params.amountOut; the result is validated by the caller either way.
   */
  executeExactOutput(params: ExactOutputParams, quote: SwapQuote): Promise<SwapResult>;
}

export type QuoteCheck =
  | { ok: true; headroom: bigint }
  | { ok: false; reason: 'ExceedsMaxInput' | 'ShortOutput'; quote: SwapQuote };

// ============================================================
// QUOTE CHECKS
// ============================================================

/**
 * Check a quote fits inside the oracle bound
 *
 * headroom = maxAmountIn - quote.amountIn, what slippage can still eat
 * before execution fails.
 */
export function checkQuote(quote: SwapQuote, params: ExactOutputParams): QuoteCheck {
  if (quote.amountOut < params.amountOut) {
    return { ok: false, reason: 'ShortOutput', quote };
  }
  if (quote.amountIn > params.maxAmountIn) {
    return { ok: false, reason: 'ExceedsMaxInput', quote };
  }
  return { ok: true, headroom: params.maxAmountIn - quote.amountIn };
}
