/**
 * dLOOP Leverage Calculator
 *
 * ============================================================
 * WHAT THIS MODULE DOES:
 * ============================================================
 * - Pure math functions (no blockchain calls)
 * - Reads the current leverage of a vault position
 * - Sizes leveraged deposits and redeems against the target leverage
 * - Computes the rebalance subsidy and the exact amounts that bring a
 *   position back to target
 *
 * ============================================================
 * THE FORMULA:
 * ============================================================
 * Leverage (bps):
 *
 *   L = C × 10000 / (C - D)
 *
 * Rebalancing with subsidy k and target T (as ratios):
 *
 *   increase: supply x, borrow x(1+k)   x = (T(C-D) - C) / (1 + T·k)
 *   decrease: repay y, withdraw y(1+k)  y = (C - T(C-D)) / (1 + k - T·k)
 *
 * Both land exactly on T before rounding.
 * ============================================================
 *
 * CRITICAL SAFETY:
 * - debt >= collateral > 0 is Undercollateralized, never a leverage number
 * - An empty vault reads 0: nothing to rebalance, first deposits allowed
 * - Callers must refuse operations outside [lowerBound, upperBound]
 */

import type { LeverageConfig, VaultPosition } from '../config/types.js';
import { SizingError } from '../utils/errors.js';
import { assertUint256, mulDiv, percentMul } from '../math/fixedPoint.js';
import { BPS_DENOMINATOR, ONE_HUNDRED_PERCENT_BPS } from '../utils/units.js';

// ============================================================
// TYPES
// ============================================================

/**
 * Amounts that move a position to target leverage, in the position's
 * base unit
 */
export type RebalancePlan =
  | { direction: 'none'; subsidyBps: number }
  | {
      direction: 'increase';
      subsidyBps: number;
      /** Collateral the rebalancer supplies */
      collateralIn: bigint;
      /** Debt the vault lends the rebalancer */
      debtOut: bigint;
    }
  | {
      direction: 'decrease';
      subsidyBps: number;
      /** Debt the rebalancer repays */
      debtIn: bigint;
      /** Collateral the vault releases */
      collateralOut: bigint;
    };

/**
 * Both legs of a leveraged redeem
 */
export interface RedeemLegs {
  /** Collateral leaving the vault */
  collateralRemoved: bigint;
  /** Debt that must be repaid first (same unit as collateral) */
  debtToRepay: bigint;
}

// ============================================================
// VALIDATION
// ============================================================

function isBps(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

/**
 * Check 10000 <= lower <= target <= upper and 0 <= subsidy < 10000
 */
export function validateLeverageConfig(config: LeverageConfig): void {
  const { targetLeverageBps, lowerBoundBps, upperBoundBps, maxSubsidyBps, minDeviationBps } = config;

  const ordered =
    isBps(lowerBoundBps) &&
    isBps(targetLeverageBps) &&
    isBps(upperBoundBps) &&
    ONE_HUNDRED_PERCENT_BPS <= lowerBoundBps &&
    lowerBoundBps <= targetLeverageBps &&
    targetLeverageBps <= upperBoundBps;

  if (!ordered) {
    throw new SizingError('InvalidLeverageConfig', 'expected 10000 <= lower <= target <= upper', {
      lowerBoundBps,
      targetLeverageBps,
      upperBoundBps,
    });
  }

  if (!isBps(maxSubsidyBps) || maxSubsidyBps >= ONE_HUNDRED_PERCENT_BPS) {
    throw new SizingError('InvalidLeverageConfig', 'maxSubsidyBps must be in [0, 10000)', { maxSubsidyBps });
  }

  if (!isBps(minDeviationBps)) {
    throw new SizingError('InvalidLeverageConfig', 'minDeviationBps must be a non-negative integer', {
      minDeviationBps,
    });
  }
}

// ============================================================
// LEVERAGE
// ============================================================

/**
 * Current leverage in bps: collateral × 10000 / (collateral - debt)
 *
 * 10000 = 1.00x (no debt). Floors, like the on-chain getter.
 * An empty vault (no collateral, no debt) reads 0.
 */
export function currentLeverageBps(collateral: bigint, debt: bigint): bigint {
  assertUint256(collateral, 'collateral');
  assertUint256(debt, 'debt');

  if (collateral === 0n && debt === 0n) {
    return 0n;
  }

  if (debt >= collateral) {
    throw new SizingError('Undercollateralized', 'debt must be below collateral', { collateral, debt });
  }

  return mulDiv(collateral, BPS_DENOMINATOR, collateral - debt, false);
}

/**
 * Total collateral the vault must hold after a leveraged deposit of
 * `depositAmount` own funds: deposit × target / 10000
 *
 * Rounded up: this is what the vault receives.
 */
export function leveragedDepositAmount(depositAmount: bigint, targetLeverageBps: number): bigint {
  return percentMul(depositAmount, BigInt(targetLeverageBps), true);
}

/**
 * Collateral removed to withdraw `assetsToWithdraw` net:
 * assets × target / 10000
 *
 * Rounded down: this is what the vault pays out.
 */
export function collateralToRemoveForRedeem(assetsToWithdraw: bigint, targetLeverageBps: number): bigint {
  return percentMul(assetsToWithdraw, BigInt(targetLeverageBps), false);
}

/**
 * Collateral removed and debt repaid for a leveraged redeem
 *
 * The repaid debt is the difference between what leaves the vault and
 * what the redeemer keeps.
 */
export function redeemLegs(assetsToWithdraw: bigint, targetLeverageBps: number): RedeemLegs {
  const collateralRemoved = collateralToRemoveForRedeem(assetsToWithdraw, targetLeverageBps);
  const debtToRepay = collateralRemoved > assetsToWithdraw ? collateralRemoved - assetsToWithdraw : 0n;
  return { collateralRemoved, debtToRepay };
}

/**
 * Pure range check: lower <= current <= upper
 */
export function isWithinBounds(current: bigint, lowerBps: bigint, upperBps: bigint): boolean {
  return current >= lowerBps && current <= upperBps;
}

// ============================================================
// REBALANCE
// ============================================================

/**
 * Subsidy offered to rebalancers, proportional to the distance from
 * target: |current - target| × 10000 / target, capped at maxSubsidyBps
 *
 * Nothing is paid while |current - target| is below minDeviationBps.
 */
export function currentSubsidyBps(leverageBps: bigint, config: LeverageConfig): number {
  const target = BigInt(config.targetLeverageBps);
  const deviation = leverageBps > target ? leverageBps - target : target - leverageBps;
  if (deviation < BigInt(config.minDeviationBps)) {
    return 0;
  }
  const raw = mulDiv(deviation, BPS_DENOMINATOR, target, false);
  const cap = BigInt(config.maxSubsidyBps);
  return Number(raw < cap ? raw : cap);
}

/**
 * Amounts that bring a position exactly to target leverage
 *
 * Amounts the vault receives round up, amounts it pays out round down.
 */
export function rebalanceToTarget(position: VaultPosition, config: LeverageConfig): RebalancePlan {
  validateLeverageConfig(config);

  const { collateral, debt } = position;
  const leverage = currentLeverageBps(collateral, debt);
  if (leverage === 0n) {
    return { direction: 'none', subsidyBps: 0 };
  }

  const subsidyBps = currentSubsidyBps(leverage, config);

  const one = BPS_DENOMINATOR;
  const target = BigInt(config.targetLeverageBps);
  const subsidy = BigInt(subsidyBps);
  const equity = collateral - debt;

  // The reading floors, so anything within one bps above target counts as on target
  if (leverage === target) {
    return { direction: 'none', subsidyBps };
  }

  if (leverage < target) {
    // T(C-D) - C, scaled by 10000
    const shortfall = target * equity - one * collateral;
    const collateralIn = mulDiv(shortfall, one, one * one + target * subsidy, true);
    const debtOut = percentMul(collateralIn, one + subsidy, false);
    return { direction: 'increase', subsidyBps, collateralIn, debtOut };
  }

  // C - T(C-D), scaled by 10000
  const excess = one * collateral - target * equity;

  // 1 + k - T·k, scaled by 10000²; non-positive when the subsidy cannot converge
  const denominator = one * one + subsidy * one - target * subsidy;
  if (denominator <= 0n) {
    throw new SizingError('InvalidLeverageConfig', 'subsidy too large to reach target by deleveraging', {
      subsidyBps,
      targetLeverageBps: config.targetLeverageBps,
    });
  }

  const debtIn = mulDiv(excess, one, denominator, true);
  const collateralOut = percentMul(debtIn, one + subsidy, false);
  return { direction: 'decrease', subsidyBps, debtIn, collateralOut };
}
