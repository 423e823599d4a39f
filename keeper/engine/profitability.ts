/**
 * Profitability Engine - sizing decision for flash-funded operations
 *
 * ============================================================
 * WHAT THIS MODULE DOES:
 * ============================================================
 * - Pure, synchronous, no I/O: same inputs, same decision
 * - Sizes a flash-loan-funded leveraged operation (compound, leveraged
 *   deposit) against a dLOOP vault
 * - Returns PROCEED with the amounts to request, or REJECT with a reason
 *
 * ============================================================
 * THE BREAK-EVEN INEQUALITY:
 * ============================================================
 *
 *   K + Z - protocolFee(Z)  >=  X + flashFee(X)
 *
 *   X = flash principal (= maxSwapInput, the worst-case swap cost)
 *   K = debt the vault lends back against the new collateral
 *   Z = rewards claimed during the operation
 *
 * netProfit = K + Z - X - flashFee - protocolFee, all in the flash
 * asset's units. Proceeds round down, costs round up.
 *
 * ============================================================
 * REJECT vs THROW:
 * ============================================================
 * - Reject (returned): OutOfBounds, BelowThreshold, NegativeMargin,
 *   ZeroPrincipal. "The answer is no." Skip this cycle.
 * - SizingError (thrown): ZeroPrice, Undercollateralized, overflow...
 *   "No answer possible." Never swallowed here, never turned into a
 *   decision. A pricing failure can never produce PROCEED.
 * ============================================================
 */

import type {
  FeePolicy,
  LeverageConfig,
  LeverageOperation,
  MarginLegs,
  SizingBreakdown,
  SizingDecision,
  SwapRequest,
  VaultPosition,
} from '../config/types.js';
import { SizingError } from '../utils/errors.js';
import { assertUint256, percentMul } from '../math/fixedPoint.js';
import { convert } from '../oracle/priceConverter.js';
import {
  currentLeverageBps,
  isWithinBounds,
  leveragedDepositAmount,
  validateLeverageConfig,
} from '../dloop/leverage.js';
import { maxInputForExactOutput, validateSwapRequest } from '../swap/sizer.js';
import { BPS_DENOMINATOR, ONE_HUNDRED_PERCENT_BPS, formatLeverage } from '../utils/units.js';
import { logger } from '../utils/logger.js';

// ============================================================
// VALIDATION
// ============================================================

function assertFeeBps(value: number, name: string): void {
  if (!Number.isInteger(value) || value < 0 || value >= ONE_HUNDRED_PERCENT_BPS) {
    throw new SizingError('InvalidFee', `${name} must be an integer in [0, ${ONE_HUNDRED_PERCENT_BPS})`, {
      [name]: value,
    });
  }
}

/**
 * Fees are fractions of a whole; the profit threshold only needs to be
 * a non-negative integer
 */
export function validateFeePolicy(fees: FeePolicy): void {
  assertFeeBps(fees.flashFeeBps, 'flashFeeBps');
  assertFeeBps(fees.protocolFeeBps, 'protocolFeeBps');
  if (!Number.isInteger(fees.minProfitBps) || fees.minProfitBps < 0) {
    throw new SizingError('InvalidFee', 'minProfitBps must be a non-negative integer', {
      minProfitBps: fees.minProfitBps,
    });
  }
}

// ============================================================
// MARGIN
// ============================================================

/**
 * Steps 4-7 of an evaluation: fees, net profit and the verdict
 *
 * Usable on its own when the caller already knows the principal and the
 * proceeds (e.g. a compounder that reads previewMint on-chain).
 *
 * @param legs - Principal and proceeds, in flash asset units
 * @param fees - Flash fee, protocol fee and profit threshold
 * @param breakdown - Amounts already computed upstream, carried into the decision
 */
export function evaluateMargin(
  legs: MarginLegs,
  fees: FeePolicy,
  breakdown: SizingBreakdown = {}
): SizingDecision {
  validateFeePolicy(fees);

  const { flashPrincipal, maxSwapInput, borrowedProceeds, rewardProceeds } = legs;
  assertUint256(flashPrincipal, 'flashPrincipal');
  assertUint256(maxSwapInput, 'maxSwapInput');
  assertUint256(borrowedProceeds, 'borrowedProceeds');
  assertUint256(rewardProceeds, 'rewardProceeds');

  if (flashPrincipal === 0n) {
    return { action: 'reject', reason: 'ZeroPrincipal', breakdown: { ...breakdown, flashPrincipal } };
  }

  // Fees always round in the lender's / treasury's favour
  const flashFee = percentMul(flashPrincipal, BigInt(fees.flashFeeBps), true);
  const protocolFee = percentMul(rewardProceeds, BigInt(fees.protocolFeeBps), true);

  const netProfit = borrowedProceeds + rewardProceeds - flashPrincipal - flashFee - protocolFee;

  const full: SizingBreakdown = {
    ...breakdown,
    flashPrincipal,
    maxSwapInput,
    flashFee,
    borrowedProceeds,
    rewardProceeds,
    protocolFee,
    netProfit,
  };

  if (netProfit < 0n) {
    return { action: 'reject', reason: 'NegativeMargin', breakdown: full };
  }

  // Zero margin only passes when the caller opted in and asked for no minimum
  if (netProfit === 0n && !(fees.acceptBreakEven === true && fees.minProfitBps === 0)) {
    return { action: 'reject', reason: 'BelowThreshold', breakdown: full };
  }

  // netProfit / principal >= minProfitBps / 10000, cross-multiplied to stay exact
  if (netProfit * BPS_DENOMINATOR < BigInt(fees.minProfitBps) * flashPrincipal) {
    return { action: 'reject', reason: 'BelowThreshold', breakdown: full };
  }

  return {
    action: 'proceed',
    flashPrincipal,
    maxSwapInput,
    expectedNetProfit: netProfit,
    breakdown: full,
  };
}

// ============================================================
// EVALUATE
// ============================================================

/**
 * Size a flash-funded leveraged operation and decide whether it is worth
 * executing
 *
 * The request is an exact-output swap from the flash asset (input) into
 * vault collateral (output). request.amountOut is the unlevered
 * collateral the operation targets; the vault needs it at target
 * leverage.
 *
 * 1. Leverage must be within [lower, upper]            → OutOfBounds
 *    (skipped for an empty vault)
 * 2. Required collateral = amountOut × target, minus own collateral
 * 3. maxSwapInput from oracle prices + slippage
 * 4. Principal = maxSwapInput                          → ZeroPrincipal
 * 5. Proceeds: vault borrow (K) + rewards (Z)
 * 6-7. Net profit and threshold                        → see evaluateMargin
 */
export function evaluate(
  position: VaultPosition,
  config: LeverageConfig,
  request: SwapRequest,
  fees: FeePolicy,
  operation: LeverageOperation = {}
): SizingDecision {
  validateLeverageConfig(config);
  validateSwapRequest(request, operation.now);
  validateFeePolicy(fees);

  const equity = request.amountOut;
  if (equity === undefined) {
    throw new SizingError('InvalidSwapRequest', 'evaluate sizes exact-output swaps only');
  }

  const { inputAsset, outputAsset, slippageBps } = request;

  // Step 1: leverage gate (mirrors the vault's isTooImbalanced check).
  // An empty vault reads 0 and is never too imbalanced: the first deposit sets the leverage.
  const leverage = currentLeverageBps(position.collateral, position.debt);
  const breakdown: SizingBreakdown = { currentLeverageBps: leverage };

  if (leverage !== 0n && !isWithinBounds(leverage, BigInt(config.lowerBoundBps), BigInt(config.upperBoundBps))) {
    logger.engine.debug('Leverage out of bounds', {
      leverage: formatLeverage(leverage),
      lower: config.lowerBoundBps,
      upper: config.upperBoundBps,
    });
    return { action: 'reject', reason: 'OutOfBounds', breakdown };
  }

  // Step 2: collateral the vault must receive, less what the caller brings
  const ownCollateral = operation.ownCollateral ?? 0n;
  assertUint256(ownCollateral, 'ownCollateral');

  const requiredCollateral = leveragedDepositAmount(equity, config.targetLeverageBps);
  const swapOutput = requiredCollateral > ownCollateral ? requiredCollateral - ownCollateral : 0n;
  breakdown.requiredCollateral = requiredCollateral;
  breakdown.swapOutput = swapOutput;

  if (swapOutput === 0n) {
    return { action: 'reject', reason: 'ZeroPrincipal', breakdown: { ...breakdown, flashPrincipal: 0n } };
  }

  // Step 3-4: the oracle ceiling is what must be borrowed
  const maxSwapInput = maxInputForExactOutput(swapOutput, inputAsset, outputAsset, slippageBps);

  // Step 5: proceeds in flash asset units, rounded down
  const borrowedProceeds = convert(requiredCollateral - equity, outputAsset, inputAsset, false);

  let rewardProceeds = 0n;
  for (const reward of operation.rewards ?? []) {
    assertUint256(reward.amount, 'reward');
    rewardProceeds += convert(reward.amount, reward.asset, inputAsset, false);
  }

  // Step 6-7
  const decision = evaluateMargin(
    { flashPrincipal: maxSwapInput, maxSwapInput, borrowedProceeds, rewardProceeds },
    fees,
    breakdown
  );

  logger.engine.debug('Evaluation complete', {
    action: decision.action,
    reason: decision.action === 'reject' ? decision.reason : undefined,
    leverage: formatLeverage(leverage),
    ...decision.breakdown,
  });

  return decision;
}
