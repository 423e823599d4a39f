import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { tick, type SubmitFn, type TickContext } from '../tick.js';
import {
  DUSD,
  E18,
  FakeSource,
  FakeVenue,
  RUNTIME,
  RecordingNotifier,
  SFRX,
  SNAPSHOT,
  quoteUnder,
} from './fakes.js';

const OUT_OF_BOUNDS = { ...SNAPSHOT, position: { collateral: 400n * E18, debt: 200n * E18 } };
const UNPRICED = { ...SNAPSHOT, outputAsset: { ...SFRX, price: 0n } };
const EMPTY_VAULT = { ...SNAPSHOT, position: { collateral: 0n, debt: 0n } };

function context(overrides: Partial<TickContext> = {}): TickContext {
  return {
    source: new FakeSource([SNAPSHOT]),
    venue: new FakeVenue(quoteUnder(E18)),
    notifier: new RecordingNotifier(),
    runtime: RUNTIME,
    ...overrides,
  };
}

describe('tick', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('submits a profitable operation and reports the surplus', async () => {
    const notifier = new RecordingNotifier();
    const submit = vi.fn<SubmitFn>(async ({ swap, quote }) => ({
      result: { amountSpent: quote.amountIn, amountReceived: swap.amountOut + 5n },
      reference: '0xabc',
    }));

    const result = await tick(context({ notifier, submit }));

    expect(result).toMatchObject({ outcome: 'executed', attempts: 1, surplus: 5n });
    expect(submit).toHaveBeenCalledTimes(1);
    expect(submit.mock.calls[0]?.[0].swap).toEqual({
      inputAsset: DUSD,
      outputAsset: SFRX,
      amountOut: 300n * E18,
      maxAmountIn: 300n * E18,
    });
    expect(notifier.successes).toEqual([
      {
        flashPrincipal: 300n * E18,
        expectedNetProfit: 4_230_000_000_000_000_000n,
        surplus: 5n,
        reference: '0xabc',
      },
    ]);
    expect(notifier.errors).toEqual([]);
  });

  it('runs the swap on the venue from inside submit', async () => {
    const venue = new FakeVenue(quoteUnder(E18), (params, quote) => ({
      amountSpent: quote.amountIn,
      amountReceived: params.amountOut + 5n,
    }));
    const submit = vi.fn<SubmitFn>(async ({ executeSwap }) => ({ result: await executeSwap(), reference: '0xabc' }));

    const result = await tick(context({ venue, submit }));

    expect(result).toMatchObject({ outcome: 'executed', attempts: 1, surplus: 5n });
    expect(venue.executions).toHaveLength(1);
    expect(venue.executions[0]?.quote).toEqual({ venue: 'fake', amountIn: 299n * E18, amountOut: 300n * E18 });
    expect(venue.executions[0]?.params.maxAmountIn).toBe(300n * E18);
  });

  it('validates what the venue execution delivered', async () => {
    const notifier = new RecordingNotifier();
    const venue = new FakeVenue(quoteUnder(0n), (params) => ({
      amountSpent: params.maxAmountIn + 1n,
      amountReceived: params.amountOut,
    }));
    const submit = vi.fn<SubmitFn>(async ({ executeSwap }) => ({ result: await executeSwap() }));

    const result = await tick(context({ venue, notifier, submit }));

    expect(result).toMatchObject({
      outcome: 'failed',
      error: 'spent 300000000000000000001, allowed at most 300000000000000000000',
    });
    expect(notifier.errors[0]?.stage).toBe('validate');
  });

  it('sizes the first deposit into an empty vault without retrying', async () => {
    const source = new FakeSource([EMPTY_VAULT]);
    const notifier = new RecordingNotifier();

    const result = await tick(context({ source, notifier }));

    expect(result).toMatchObject({ outcome: 'dry_run', attempts: 1 });
    expect(result.decision?.breakdown.currentLeverageBps).toBe(0n);
    expect(source.reads).toBe(1);
    expect(notifier.errors).toEqual([]);
  });

  it('stops before submitting in dry-run mode', async () => {
    const venue = new FakeVenue(quoteUnder(0n));

    const result = await tick(context({ venue }));

    expect(result.outcome).toBe('dry_run');
    expect(venue.requests).toHaveLength(1);
  });

  it('reports a rejection once and does not retry it', async () => {
    const source = new FakeSource([OUT_OF_BOUNDS]);
    const notifier = new RecordingNotifier();

    const result = await tick(context({ source, notifier }));

    expect(result).toMatchObject({ outcome: 'rejected', attempts: 1, rejectReason: 'OutOfBounds' });
    expect(source.reads).toBe(1);
    expect(notifier.rejects).toEqual([{ reason: 'OutOfBounds', breakdown: { currentLeverageBps: 20_000n } }]);
  });

  it('retries read failures and missing prices with a fresh snapshot', async () => {
    const source = new FakeSource([new Error('rpc unavailable'), UNPRICED, SNAPSHOT]);
    const notifier = new RecordingNotifier();

    const result = await tick(context({ source, notifier }));

    expect(result).toMatchObject({ outcome: 'dry_run', attempts: 3 });
    expect(source.reads).toBe(3);
    expect(notifier.errors).toEqual([]);
  });

  it('gives up after maxRetries and notifies the last failure', async () => {
    const source = new FakeSource([UNPRICED]);
    const notifier = new RecordingNotifier();

    const result = await tick(context({ source, notifier }));

    expect(result).toEqual({ outcome: 'failed', attempts: 3, error: 'ZeroPrice: no oracle price for sfrxUSD' });
    expect(source.reads).toBe(3);
    expect(notifier.errors).toEqual([
      { stage: 'evaluate', message: 'ZeroPrice: no oracle price for sfrxUSD', code: 'ZeroPrice', attempts: 3 },
    ]);
  });

  it('fails at once on a fee policy no snapshot can fix', async () => {
    const source = new FakeSource([SNAPSHOT]);
    const notifier = new RecordingNotifier();
    const runtime = { ...RUNTIME, flashFeeBps: 10_000 };

    const result = await tick(context({ source, notifier, runtime }));

    expect(result).toEqual({
      outcome: 'failed',
      attempts: 1,
      error: 'InvalidFee: flashFeeBps must be an integer in [0, 10000)',
    });
    expect(source.reads).toBe(1);
    expect(notifier.errors).toEqual([
      {
        stage: 'evaluate',
        message: 'InvalidFee: flashFeeBps must be an integer in [0, 10000)',
        code: 'InvalidFee',
        attempts: 1,
      },
    ]);
  });

  it('fails at once on an invalid leverage config', async () => {
    const source = new FakeSource([{ ...SNAPSHOT, config: { ...SNAPSHOT.config, lowerBoundBps: 31_000 } }]);

    const result = await tick(context({ source }));

    expect(result).toMatchObject({ outcome: 'failed', attempts: 1 });
    expect(result.error?.startsWith('InvalidLeverageConfig:')).toBe(true);
    expect(source.reads).toBe(1);
  });

  it('refuses a quote above the oracle ceiling', async () => {
    const submit = vi.fn<SubmitFn>();
    const venue = new FakeVenue((params) => ({ venue: 'fake', amountIn: params.maxAmountIn + 1n, amountOut: params.amountOut }));

    const result = await tick(context({ venue, submit }));

    expect(result).toMatchObject({ outcome: 'quote_rejected', error: 'fake quote ExceedsMaxInput' });
    expect(submit).not.toHaveBeenCalled();
  });

  it('skips when the venue has no route', async () => {
    const notifier = new RecordingNotifier();
    const venue = new FakeVenue(() => null);

    const result = await tick(context({ venue, notifier }));

    expect(result).toMatchObject({ outcome: 'no_quote', error: 'fake returned no route' });
    expect(notifier.errors).toEqual([]);
  });

  it('fails when the executed swap delivers less than required', async () => {
    const notifier = new RecordingNotifier();
    const submit = vi.fn<SubmitFn>(async ({ swap, quote }) => ({
      result: { amountSpent: quote.amountIn, amountReceived: swap.amountOut - 1n },
    }));

    const result = await tick(context({ notifier, submit }));

    expect(result).toMatchObject({
      outcome: 'failed',
      error: 'received 299999999999999999999, expected at least 300000000000000000000',
    });
    expect(notifier.errors).toEqual([
      {
        stage: 'validate',
        message: 'received 299999999999999999999, expected at least 300000000000000000000',
        code: 'InsufficientOutput',
        attempts: 1,
      },
    ]);
    expect(notifier.successes).toEqual([]);
  });

  it('does not retry a failed submit', async () => {
    const notifier = new RecordingNotifier();
    const submit = vi.fn<SubmitFn>(async () => {
      throw new Error('execution reverted');
    });

    const result = await tick(context({ notifier, submit }));

    expect(result).toMatchObject({ outcome: 'failed', attempts: 1, error: 'execution reverted' });
    expect(submit).toHaveBeenCalledTimes(1);
    expect(notifier.errors).toEqual([{ stage: 'submit', message: 'execution reverted', attempts: 1 }]);
  });

  it('passes the clock through to the deadline check', async () => {
    const source = new FakeSource([{ ...SNAPSHOT, deadline: 1_000 }]);

    const result = await tick(context({ source, now: () => 1_001 }));

    expect(result).toEqual({ outcome: 'failed', attempts: 3, error: 'QuoteExpired: quote deadline has passed' });
  });
});
