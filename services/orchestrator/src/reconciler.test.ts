import { describe, expect, it } from 'vitest';
import { noOpenPosition, NO_OPEN_TRADES } from './predicates';
import { OutcomeReconciler } from './reconciler';
import { createVenues, FakeClock } from './testing/fakes';
import { VenueLeases } from './venueLease';

const OPTIONS = { timeoutMs: 60_000, intervalMs: 2_000 };
const SOL = 'SOL/USDT:USDT';

function setup() {
  const clock = new FakeClock();
  const venues = createVenues({ clock });
  const reconciler = new OutcomeReconciler({ long: venues.long, short: venues.short }, clock);
  const leases = new VenueLeases(clock.now);
  return { clock, venues, reconciler, leases };
}

describe('OutcomeReconciler', () => {
  it('polls 30 times and times out at 60s when the condition never holds', async () => {
    const { clock, venues, reconciler, leases } = setup();
    venues.short.open(SOL, true);
    const lease = leases.tryAcquire(['short'], 'plan-a').get('short');

    const result = await reconciler.awaitCompletion(lease, noOpenPosition([SOL]), OPTIONS);

    expect(result).toEqual({ venue: 'short', status: 'timed_out', polls: 30, elapsedMs: 60_000, lastError: undefined });
    const pollTimes = venues.short.calls('status').map((call) => call.at);
    expect(pollTimes).toHaveLength(30);
    expect(pollTimes[0]).toBe(0);
    expect(pollTimes[29]).toBe(58_000);
    expect(clock.now()).toBe(60_000);
  });

  it('completes on the first poll when the condition already holds', async () => {
    const { clock, reconciler, leases } = setup();
    const lease = leases.tryAcquire(['long'], 'plan-a').get('long');

    const result = await reconciler.awaitCompletion(lease, NO_OPEN_TRADES, OPTIONS);

    expect(result).toEqual({ venue: 'long', status: 'completed', polls: 1, elapsedMs: 0 });
    expect(clock.sleeps).toEqual([]);
  });

  it('retries after a failed poll', async () => {
    const { venues, reconciler, leases } = setup();
    venues.long.fail('status', new Error('connection reset'), 2);
    const lease = leases.tryAcquire(['long'], 'plan-a').get('long');

    const result = await reconciler.awaitCompletion(lease, NO_OPEN_TRADES, OPTIONS);

    expect(result.status).toBe('completed');
    expect(result.polls).toBe(3);
    expect(result.elapsedMs).toBe(4_000);
  });

  it('reports the last poll error on timeout', async () => {
    const { venues, reconciler, leases } = setup();
    venues.long.fail('status', new Error('connection reset'), Infinity);
    const lease = leases.tryAcquire(['long'], 'plan-a').get('long');

    const result = await reconciler.awaitCompletion(lease, NO_OPEN_TRADES, { timeoutMs: 10_000, intervalMs: 2_000 });

    expect(result).toEqual({ venue: 'long', status: 'timed_out', polls: 5, elapsedMs: 10_000, lastError: 'connection reset' });
  });

  it('ends as superseded when a preempting plan takes the venue', async () => {
    const { venues, reconciler, leases } = setup();
    const held = venues.short.hold('status');
    const lease = leases.tryAcquire(['short'], 'plan-a').get('short');

    const pending = reconciler.awaitCompletion(lease, NO_OPEN_TRADES, OPTIONS);
    expect(reconciler.isReconciling('short')).toBe(true);
    const preempt = leases.acquire(['short'], 'flat-1', { preempt: true });

    const result = await pending;
    expect(result.status).toBe('failed');
    expect(result.status === 'failed' && result.error.code).toBe('Superseded');
    expect(reconciler.isReconciling('short')).toBe(false);

    lease.release();
    await preempt;
    held.release();
    expect(leases.holderOf('short')).toBe('flat-1');
  });

  it('allows a single reconciliation per venue', async () => {
    const { venues, reconciler, leases } = setup();
    const held = venues.long.hold('status');
    const lease = leases.tryAcquire(['long'], 'plan-a').get('long');

    const first = reconciler.awaitCompletion(lease, NO_OPEN_TRADES, OPTIONS);
    await expect(reconciler.awaitCompletion(lease, NO_OPEN_TRADES, OPTIONS)).rejects.toMatchObject({ code: 'InstanceBusy' });

    held.release();
    await expect(first).resolves.toMatchObject({ status: 'completed', polls: 1 });
  });

  it('refuses to poll on a released lease', async () => {
    const { venues, reconciler, leases } = setup();
    const lease = leases.tryAcquire(['long'], 'plan-a').get('long');
    lease.release();

    const result = await reconciler.awaitCompletion(lease, NO_OPEN_TRADES, OPTIONS);

    expect(result.status === 'failed' && result.error.code).toBe('Superseded');
    expect(venues.long.calls('status')).toHaveLength(0);
  });
});
