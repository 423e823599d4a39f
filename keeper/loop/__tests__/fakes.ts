import type { Asset, RuntimeConfig, SwapResult } from '../../config/types.js';
import { DEFAULT_RUNTIME_CONFIG } from '../../config/defaults.js';
import type { ErrorNotice, Notifier, RejectNotice, SuccessNotice } from '../../notify/notifier.js';
import type { ExactOutputParams, SwapQuote, SwapVenue } from '../../swap/venue.js';
import type { MarketSnapshot, SnapshotSource } from '../tick.js';

export const E18 = 10n ** 18n;

export const DUSD: Asset = { id: 'dUSD', symbol: 'dUSD', decimals: 18, price: 100_000_000n };
export const SFRX: Asset = { id: 'sfrxUSD', symbol: 'sfrxUSD', decimals: 18, price: 100_000_000n };

/**
 * 3x position, 100 sfrxUSD of equity to compound, 110 dUSD of rewards.
 * With RUNTIME below this sizes to a 300 dUSD principal and a
 * 4.23 dUSD net profit.
 */
export const SNAPSHOT: MarketSnapshot = {
  position: { collateral: 300n * E18, debt: 200n * E18 },
  config: { targetLeverageBps: 30_000, lowerBoundBps: 25_000, upperBoundBps: 35_000, maxSubsidyBps: 500, minDeviationBps: 0 },
  inputAsset: DUSD,
  outputAsset: SFRX,
  equity: 100n * E18,
  operation: { rewards: [{ asset: DUSD, amount: 110n * E18 }] },
};

export const RUNTIME: RuntimeConfig = {
  ...DEFAULT_RUNTIME_CONFIG,
  slippageBps: 0,
  maxRetries: 2,
  retryDelayMs: 0,
};

/**
 * Serves snapshots in order; an Error entry is thrown instead. The last
 * entry repeats.
 */
export class FakeSource implements SnapshotSource {
  reads = 0;

  constructor(
    private readonly entries: Array<MarketSnapshot | Error>,
    private readonly onRead?: () => void
  ) {}

  async read(): Promise<MarketSnapshot> {
    const entry = this.entries[Math.min(this.reads, this.entries.length - 1)];
    this.reads++;
    this.onRead?.();
    if (entry === undefined) throw new Error('no snapshot configured');
    if (entry instanceof Error) throw entry;
    return entry;
  }
}

/**
 * Quotes through `respond`; executions settle at the quoted input and
 * the required output unless `settle` says otherwise
 */
export class FakeVenue implements SwapVenue {
  readonly name = 'fake';
  readonly requests: ExactOutputParams[] = [];
  readonly executions: Array<{ params: ExactOutputParams; quote: SwapQuote }> = [];

  constructor(
    private readonly respond: (params: ExactOutputParams) => SwapQuote | null,
    private readonly settle: (params: ExactOutputParams, quote: SwapQuote) => SwapResult = (params, quote) => ({
      amountSpent: quote.amountIn,
      amountReceived: params.amountOut,
    })
  ) {}

  async quoteExactOutput(params: ExactOutputParams): Promise<SwapQuote | null> {
    this.requests.push(params);
    return this.respond(params);
  }

  async executeExactOutput(params: ExactOutputParams, quote: SwapQuote): Promise<SwapResult> {
    this.executions.push({ params, quote });
    return this.settle(params, quote);
  }
}

export class RecordingNotifier implements Notifier {
  readonly successes: SuccessNotice[] = [];
  readonly rejects: RejectNotice[] = [];
  readonly errors: ErrorNotice[] = [];

  async notifySuccess(notice: SuccessNotice): Promise<void> {
    this.successes.push(notice);
  }

  async notifyReject(notice: RejectNotice): Promise<void> {
    this.rejects.push(notice);
  }

  async notifyError(notice: ErrorNotice): Promise<void> {
    this.errors.push(notice);
  }
}

/** Quotes exactly the oracle ceiling minus `discount` */
export function quoteUnder(discount: bigint): (params: ExactOutputParams) => SwapQuote {
  return (params) => ({ venue: 'fake', amountIn: params.maxAmountIn - discount, amountOut: params.amountOut });
}
