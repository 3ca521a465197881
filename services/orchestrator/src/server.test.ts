import { afterEach, describe, expect, it } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { ArmGate } from './armGate';
import { BasketStore } from './basketStore';
import { buildServer } from './server';
import { StakeSetting } from './stake';
import { FakeClock } from './testing/fakes';
import { VenueLeases } from './venueLease';

describe('health server', () => {
  let app: FastifyInstance | undefined;

  afterEach(async () => {
    await app?.close();
    app = undefined;
  });

  it('reports arm state, leases and basket size', async () => {
    const clock = new FakeClock(Date.UTC(2026, 0, 1));
    const gate = new ArmGate({ requireArm: true, ttlMinutes: 15, mode: 'single_shot' });
    gate.requestArm(1, clock.now());
    const leases = new VenueLeases(clock.now);
    leases.tryAcquire(['short'], 'go_long-1234');
    app = await buildServer({
      gate,
      basket: new BasketStore(['SOL/USDT:USDT', 'DOGE/USDT:USDT']),
      stake: new StakeSetting(250),
      leases,
      reconciler: { isReconciling: (venue) => venue === 'short' },
      clock
    });

    const res = await app.inject({ method: 'GET', url: '/healthz' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      status: 'ok',
      transport: { state: 'idle', detail: 'not configured' },
      arm: { required: true, mode: 'armed', expiresAt: '2026-01-01T00:15:00.000Z' },
      leases: { short: { holder: 'go_long-1234', since: Date.UTC(2026, 0, 1), superseded: false } },
      reconciling: ['short'],
      basketSize: 2,
      stake: 250
    });
  });

  it('is degraded while the chat transport is failing', async () => {
    app = await buildServer({
      gate: new ArmGate({ requireArm: false, ttlMinutes: 15, mode: 'single_shot' }),
      basket: new BasketStore(),
      stake: new StakeSetting(1),
      leases: new VenueLeases(),
      transport: { status: () => ({ state: 'error', detail: 'getUpdates: Unauthorized' }) }
    });
    const res = await app.inject({ method: 'GET', url: '/healthz' });
    expect(res.json()).toMatchObject({ status: 'degraded', arm: { required: false, mode: 'disarmed' } });
  });

  it('serves prometheus metrics', async () => {
    app = await buildServer({
      gate: new ArmGate({ requireArm: true, ttlMinutes: 15, mode: 'single_shot' }),
      basket: new BasketStore(),
      stake: new StakeSetting(1),
      leases: new VenueLeases()
    });
    const res = await app.inject({ method: 'GET', url: '/metrics' });
    expect(res.statusCode).toBe(200);
    expect(res.headers['content-type']).toContain('text/plain');
    expect(res.body).toContain('process_cpu_user_seconds_total');
  });
});
