import { describe, expect, it, vi } from 'vitest';
import { InstanceDispatcher, StepOutcome } from './dispatcher';
import { OrchestratorEventBus } from './eventBus';
import { buildEntryPlan, buildFlatPlan } from './plan';
import { OutcomeReconciler } from './reconciler';
import { createVenues, FakeClock, FakeVenueOptions } from './testing/fakes';
import { VenueLeases } from './venueLease';

const SOL = 'SOL/USDT:USDT';
const DOGE = 'DOGE/USDT:USDT';
const PAIRS = [SOL, DOGE];

function setup(options: Omit<FakeVenueOptions, 'log' | 'clock'> = {}) {
  const clock = new FakeClock();
  const venues = createVenues({ ...options, clock });
  const clients = { long: venues.long, short: venues.short };
  const leases = new VenueLeases(clock.now);
  const bus = new OrchestratorEventBus();
  const dispatcher = new InstanceDispatcher({
    clients,
    leases,
    reconciler: new OutcomeReconciler(clients, clock),
    reconcile: { timeoutMs: 60_000, intervalMs: 2_000 },
    clock,
    bus
  });
  return { clock, venues, leases, bus, dispatcher };
}

const goLong = (stakeAmount = 500, delayMs = 100) => buildEntryPlan({ side: 'long', pairs: PAIRS, stakeAmount, delayMs });

describe('InstanceDispatcher', () => {
  it('confirms the opposite venue flat before any entry on the target', async () => {
    const { clock, venues, leases, dispatcher } = setup();
    venues.short.open(SOL, true);
    venues.short.open(DOGE, true);

    const result = await dispatcher.execute(goLong());

    expect(result.status).toBe('completed');
    expect(venues.log.map((call) => `${call.venue}:${call.op}`)).toEqual([
      'short:status',
      'short:forceExit',
      'short:status',
      'short:forceExit',
      'short:status',
      'long:forceEnter',
      'long:forceEnter',
      'long:status'
    ]);
    expect(venues.long.calls('forceEnter').map((call) => [call.pair, call.stakeAmount])).toEqual([
      [SOL, 500],
      [DOGE, 500]
    ]);
    expect(venues.short.trades).toEqual([]);
    expect(venues.long.trades.map((trade) => [trade.pair, trade.isShort])).toEqual([
      [SOL, false],
      [DOGE, false]
    ]);
    expect(result.venues.short?.status).toBe('completed');
    expect(result.venues.long?.status).toBe('completed');
    expect(Array.from(result.steps.values()).map((step) => step.status)).toEqual(['ok', 'ok', 'ok', 'ok']);
    expect(clock.sleeps).toEqual([100, 100]);
    expect(leases.isHeld('long') || leases.isHeld('short')).toBe(false);
  });

  it('skips the entry stage when flattening fails and leaves the target untouched', async () => {
    const { venues, leases, dispatcher } = setup();
    venues.short.open(SOL, true);
    venues.short.fail('forceExit', new Error('HTTP 502'));

    const result = await dispatcher.execute(goLong());

    expect(result.status).toBe('partial');
    expect(result.venues.short?.status).toBe('failed');
    expect(result.venues.short?.error?.code).toBe('InstanceUnreachable');
    expect(result.venues.long?.status).toBe('skipped');
    const steps = Array.from(result.steps.values());
    expect(steps.map((step) => [step.venue, step.status])).toEqual([
      ['short', 'failed'],
      ['short', 'skipped'],
      ['long', 'skipped'],
      ['long', 'skipped']
    ]);
    const skipped = steps.filter((step): step is Extract<StepOutcome, { status: 'skipped' }> => step.status === 'skipped');
    expect(skipped.map((step) => step.reason)).toEqual(['venue_failed', 'prerequisite_failed', 'prerequisite_failed']);
    expect(venues.long.calls()).toEqual([]);
    expect(leases.isHeld('long') || leases.isHeld('short')).toBe(false);
  });

  it('rejects a second plan on a busy venue before making any call', async () => {
    const { venues, dispatcher } = setup();
    venues.short.open(SOL, true);
    const held = venues.short.hold('forceExit');

    const first = dispatcher.execute(goLong());
    await vi.waitFor(() => expect(venues.short.calls('forceExit')).toHaveLength(1));
    const callsBefore = venues.log.length;
    await expect(dispatcher.execute(goLong())).rejects.toMatchObject({ code: 'InstanceBusy' });
    expect(venues.log.length).toBe(callsBefore);

    held.release();
    await expect(first).resolves.toMatchObject({ status: 'completed' });
  });

  it('flat exits everything on both venues', async () => {
    const { venues, dispatcher } = setup();
    venues.long.open(SOL, false);
    venues.long.open(DOGE, false);
    venues.short.open('BTC/USDT:USDT', true);

    const result = await dispatcher.execute(buildFlatPlan(0));

    expect(result.status).toBe('completed');
    expect(result.venues.long?.status).toBe('completed');
    expect(result.venues.short?.status).toBe('completed');
    expect(venues.long.trades).toEqual([]);
    expect(venues.short.trades).toEqual([]);
    expect(venues.log.filter((call) => call.op === 'forceExit').map((call) => [call.venue, call.tradeId])).toEqual([
      ['long', 'all'],
      ['short', 'all']
    ]);
  });

  it('a failing venue does not stop the other one', async () => {
    const { venues, dispatcher } = setup();
    venues.long.open(SOL, false);
    venues.short.open(DOGE, true);
    venues.long.fail('forceExit', new Error('HTTP 500'));

    const result = await dispatcher.execute(buildFlatPlan(0));

    expect(result.status).toBe('partial');
    expect(result.venues.long?.error?.code).toBe('InstanceUnreachable');
    expect(result.venues.short?.status).toBe('completed');
    expect(venues.short.trades).toEqual([]);
    expect(venues.long.pairs()).toEqual([SOL]);
  });

  it('flat supersedes an in-flight entry plan and then runs', async () => {
    const { venues, leases, dispatcher } = setup();
    venues.short.open(SOL, true);
    const held = venues.short.hold('forceExit');

    const entry = dispatcher.execute(goLong());
    await vi.waitFor(() => expect(venues.short.calls('forceExit')).toHaveLength(1));
    const flat = dispatcher.execute(buildFlatPlan(0));

    const entryResult = await entry;
    expect(entryResult.status).toBe('partial');
    expect(entryResult.venues.short?.error?.code).toBe('Superseded');
    expect(entryResult.venues.long?.status).toBe('skipped');
    expect(venues.long.calls('forceEnter')).toEqual([]);

    held.release();
    const flatResult = await flat;
    expect(flatResult.status).toBe('completed');
    expect(venues.short.trades).toEqual([]);
    expect(leases.isHeld('long') || leases.isHeld('short')).toBe(false);
  });

  it('reports a checkpoint that never holds as a reconciliation timeout', async () => {
    const { venues, dispatcher } = setup({ closesOnExit: false });
    venues.short.open(SOL, true);

    const result = await dispatcher.execute(buildEntryPlan({ side: 'long', pairs: [SOL], stakeAmount: 100, delayMs: 0 }));

    expect(result.status).toBe('partial');
    expect(result.venues.short).toMatchObject({ status: 'timed_out', polls: 30 });
    expect(result.venues.short?.error?.code).toBe('ReconciliationTimeout');
    expect(result.venues.short?.error?.message).toBe('short did not reach "no open position on SOL/USDT:USDT" within 60s');
    expect(venues.long.calls('forceEnter')).toEqual([]);
  });

  it('publishes step and plan events', async () => {
    const { venues, bus, dispatcher } = setup();
    venues.long.open(SOL, false);
    const steps: StepOutcome[] = [];
    const plans: string[] = [];
    bus.onStep((outcome) => steps.push(outcome));
    bus.onPlan((plan, result) => plans.push(`${plan.command}:${result.status}`));

    await dispatcher.execute(buildFlatPlan(0));

    expect(steps.map((step) => `${step.venue}:${step.action}:${step.status}`).sort()).toEqual([
      'long:exit_all:ok',
      'short:exit_all:ok'
    ]);
    expect(plans).toEqual(['flat:completed']);
  });
});
