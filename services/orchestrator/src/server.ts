import Fastify, { FastifyInstance } from 'fastify';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import { getRegistry } from '@venuepilot/metrics';
import { VENUES } from '@venuepilot/shared';
import { Clock, systemClock } from '@venuepilot/util';
import type { ArmGate } from './armGate';
import type { AutoToggle } from './autoToggle';
import type { BasketStore } from './basketStore';
import type { OutcomeReconciler } from './reconciler';
import type { StakeSetting } from './stake';
import type { TransportStatus } from './telegram';
import type { VenueLeases } from './venueLease';

export type ServerDeps = {
  gate: ArmGate;
  basket: BasketStore;
  stake: StakeSetting;
  leases: VenueLeases;
  reconciler?: Pick<OutcomeReconciler, 'isReconciling'>;
  autoToggle?: Pick<AutoToggle, 'snapshot'>;
  transport?: { status(): TransportStatus };
  clock?: Clock;
};

export async function buildServer(deps: ServerDeps): Promise<FastifyInstance> {
  const clock = deps.clock ?? systemClock;
  const app = Fastify({ logger: false });

  await app.register(helmet, { global: true });
  await app.register(rateLimit, {
    max: 300,
    timeWindow: '1 minute'
  });

  app.get('/healthz', async () => {
    const now = clock.now();
    const transport = deps.transport?.status();
    const arm = deps.gate.snapshot(now);
    return {
      status: transport?.state === 'error' ? 'degraded' : 'ok',
      transport: transport ?? { state: 'idle', detail: 'not configured' },
      arm: {
        required: deps.gate.required,
        mode: arm.mode,
        expiresAt: arm.mode === 'armed' ? new Date(arm.expiresAt).toISOString() : undefined
      },
      leases: deps.leases.snapshot(),
      reconciling: VENUES.filter((venue) => deps.reconciler?.isReconciling(venue) ?? false),
      basketSize: deps.basket.size(),
      stake: deps.stake.get(),
      auto: deps.autoToggle?.snapshot()
    };
  });

  app.get('/metrics', async (_, reply) => {
    const registry = getRegistry();
    reply.header('Content-Type', registry.contentType);
    return registry.metrics();
  });

  return app;
}
