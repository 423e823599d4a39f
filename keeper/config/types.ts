/**
 * Core type definitions for the sizing engine
 *
 * All amounts are raw integers (bigint) in the asset's smallest unit.
 * All ratios are basis points (number), 10000 = 100%.
 *
 * ENGINE INVARIANTS:
 * - Inputs are snapshots supplied fresh by the caller; nothing is cached
 * - The engine never mutates an input
 * - Rounding always favours the vault / flash lender
 */

// ============================================================
// MARKET INPUTS
// ============================================================

/**
 * An asset as seen by one computation
 */
export interface Asset {
  /** Token address or handle; addresses compare checksum-insensitively */
  id: string;
  /** Symbol for logs only */
  symbol?: string;
  /** Token decimals (0-255, typically 6 or 18) */
  decimals: number;
  /** Oracle price, 8 decimals (USD). Zero means "price unavailable" */
  price: bigint;
}

/**
 * Vault leverage bounds
 *
 * Leverage is expressed in bps: 10000 = 1.00x, 30000 = 3.00x.
 * Immutable for the lifetime of a vault.
 */
export interface LeverageConfig {
  targetLeverageBps: number;
  lowerBoundBps: number;
  upperBoundBps: number;
  /** Cap on the rebalance subsidy paid by the vault */
  maxSubsidyBps: number;
  /** Leverage deviation from target (bps) below which no subsidy is paid */
  minDeviationBps: number;
}

/**
 * Snapshot of a vault's position, both values in the same base unit
 */
export interface VaultPosition {
  collateral: bigint;
  debt: bigint;
}

// ============================================================
// SWAPS
// ============================================================

/**
 * A swap to size. Exactly one of amountIn / amountOut is set.
 */
export interface SwapRequest {
  inputAsset: Asset;
  outputAsset: Asset;
  /** Exact-input amount (input asset units) */
  amountIn?: bigint;
  /** Exact-output amount (output asset units) */
  amountOut?: bigint;
  /** Slippage tolerance, must be < 10000 */
  slippageBps: number;
  /** Quote deadline, unix seconds */
  deadline?: number;
}

/**
 * What a venue actually did. Produced externally, validated here.
 */
export interface SwapResult {
  amountSpent: bigint;
  amountReceived: bigint;
}

/**
 * Oracle-derived bounds for a swap request
 */
export type SwapBounds =
  | { mode: 'exactOutput'; amountOut: bigint; maxAmountIn: bigint }
  | { mode: 'exactInput'; amountIn: bigint; minAmountOut: bigint };

export type SwapValidationError =
  | { code: 'InsufficientOutput'; expected: bigint; actual: bigint }
  | { code: 'ExcessiveInput'; max: bigint; actual: bigint };

/**
 * Outcome of checking a realized swap against its bound
 *
 * surplus = output received beyond what was required. The engine only
 * reports it; sweeping or keeping it is the caller's decision.
 */
export type SwapValidation =
  | { ok: true; surplus: bigint }
  | { ok: false; error: SwapValidationError };

// ============================================================
// PROFITABILITY
// ============================================================

/**
 * Fee and threshold policy for one evaluation
 */
export interface FeePolicy {
  /** Flash lender fee on principal (e.g. 9 = 0.09%) */
  flashFeeBps: number;
  /** Treasury cut of claimed rewards */
  protocolFeeBps: number;
  /** Minimum net profit relative to principal */
  minProfitBps: number;
  /** Accept exactly zero margin when minProfitBps is 0 (default: reject) */
  acceptBreakEven?: boolean;
}

/**
 * A reward paid out during the operation (subject to protocol fee)
 */
export interface RewardClaim {
  asset: Asset;
  amount: bigint;
}

/**
 * Proceeds side of a leveraged operation
 */
export interface LeverageOperation {
  /** Collateral the caller supplies itself; reduces the amount to buy */
  ownCollateral?: bigint;
  /** Rewards claimed as part of the operation */
  rewards?: RewardClaim[];
  /** Clock for the quote deadline check, unix seconds */
  now?: number;
}

/**
 * Legs of a flash-funded operation, all in the flash asset's units
 */
export interface MarginLegs {
  /** Amount borrowed from the flash lender */
  flashPrincipal: bigint;
  /** Ceiling passed to the swap venue */
  maxSwapInput: bigint;
  /** Debt the vault lends back (K) */
  borrowedProceeds: bigint;
  /** Rewards before protocol fee (Z) */
  rewardProceeds: bigint;
}

export type RejectReason = 'OutOfBounds' | 'BelowThreshold' | 'NegativeMargin' | 'ZeroPrincipal';

/**
 * Every intermediate amount of an evaluation, for logs and notifications
 */
export interface SizingBreakdown {
  currentLeverageBps?: bigint;
  requiredCollateral?: bigint;
  swapOutput?: bigint;
  flashPrincipal?: bigint;
  maxSwapInput?: bigint;
  flashFee?: bigint;
  borrowedProceeds?: bigint;
  rewardProceeds?: bigint;
  protocolFee?: bigint;
  netProfit?: bigint;
}

export interface ProceedDecision {
  action: 'proceed';
  flashPrincipal: bigint;
  maxSwapInput: bigint;
  expectedNetProfit: bigint;
  breakdown: SizingBreakdown;
}

export interface RejectDecision {
  action: 'reject';
  reason: RejectReason;
  breakdown: SizingBreakdown;
}

/**
 * The engine's answer. A value with no lifecycle beyond the call.
 */
export type SizingDecision = ProceedDecision | RejectDecision;

// ============================================================
// KEEPER RUNTIME
// ============================================================

/**
 * Policy and timing loaded from the environment
 */
export interface RuntimeConfig {
  slippageBps: number;
  minProfitBps: number;
  flashFeeBps: number;
  treasuryFeeBps: number;
  acceptBreakEven: boolean;
  pollIntervalMs: number;
  maxRetries: number;
  retryDelayMs: number;
}
