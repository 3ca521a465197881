import 'dotenv/config';
import type { FastifyInstance } from 'fastify';
import {
  buildInstanceTargets,
  loadConfig,
  loadWatchlist,
  OrchestratorConfig,
  resolveWatchlistPath,
  saveWatchlist
} from '@venuepilot/config';
import { createLogger } from '@venuepilot/logger';
import { openStore } from '@venuepilot/persistence';
import { isOrchestratorError, VenueName } from '@venuepilot/shared';
import { normalizeBaseUrl } from '@venuepilot/util';
import { ArmGate } from './armGate';
import { AutoToggle } from './autoToggle';
import { BasketStore } from './basketStore';
import { InstanceDispatcher } from './dispatcher';
import { OrchestratorEventBus } from './eventBus';
import { FreqtradeClient, VenueClient } from './freqtrade';
import { OutcomeReconciler } from './reconciler';
import { CommandRouter } from './router';
import { buildServer } from './server';
import { StakeSetting } from './stake';
import { TelegramTransport } from './telegram';
import { VenueLeases } from './venueLease';

const logger = createLogger('orchestrator');

const EXTERNAL_STATUS_TIMEOUT_MS = 15_000;

function createVenueClients(config: OrchestratorConfig): Readonly<Record<VenueName, VenueClient>> {
  const targets = buildInstanceTargets(config);
  const options = { timeoutMs: config.defaults.request_timeout_ms };
  return {
    long: new FreqtradeClient(targets.long, options),
    short: new FreqtradeClient(targets.short, options)
  };
}

function createExternalSource(config: OrchestratorConfig): VenueClient | null {
  const ext = config.external_status;
  if (!ext.url) {
    return null;
  }
  return new FreqtradeClient(
    {
      name: 'external',
      baseUrl: normalizeBaseUrl(ext.url),
      credentials: ext.user && ext.pass ? { username: ext.user, password: ext.pass } : undefined
    },
    { timeoutMs: EXTERNAL_STATUS_TIMEOUT_MS }
  );
}

async function bootstrap(): Promise<void> {
  let config: OrchestratorConfig;
  let pairs: string[];
  const watchlistPath = resolveWatchlistPath();
  try {
    config = loadConfig();
    pairs = loadWatchlist(watchlistPath);
  } catch (err) {
    if (isOrchestratorError(err, 'ConfigInvalid')) {
      logger.fatal({ err, detail: err.detail }, 'configuration invalid; refusing to start');
      process.exitCode = 1;
      return;
    }
    throw err;
  }

  const defaults = config.defaults;
  const clients = createVenueClients(config);
  const leases = new VenueLeases();
  const reconciler = new OutcomeReconciler(clients);
  const store = openStore(config.persistence.sqlitePath);
  const bus = new OrchestratorEventBus();
  bus.onStep((outcome) => logger.debug(outcome, 'plan step'));
  bus.onPlan((plan, result) =>
    store.recordAudit({
      ts: result.finishedAt,
      kind: 'plan',
      actor: plan.command,
      outcome: result.status,
      detail: {
        planId: plan.id,
        venues: Object.fromEntries(Object.entries(result.venues).map(([venue, conclusion]) => [venue, conclusion?.status]))
      }
    })
  );
  const dispatcher = new InstanceDispatcher({
    clients,
    leases,
    reconciler,
    reconcile: { timeoutMs: defaults.poll_timeout_sec * 1000, intervalMs: defaults.poll_interval_sec * 1000 },
    bus
  });
  const basket = new BasketStore(pairs, (next) => saveWatchlist(next, watchlistPath));
  const stake = new StakeSetting(defaults.stake);
  const gate = new ArmGate({
    requireArm: config.telegram.require_arm,
    ttlMinutes: config.telegram.arm_ttl_minutes,
    mode: config.telegram.arm_mode
  });
  const transport = new TelegramTransport({
    token: config.telegram.token,
    chatId: config.telegram.chat_id,
    topicId: config.telegram.topic_id,
    pollTimeoutSec: config.telegram.poll_timeout_sec
  });

  const source = createExternalSource(config);
  const autoToggle = source
    ? new AutoToggle(
        { source, dispatcher, store, notifier: transport },
        {
          threshold: config.external_status.threshold,
          reversal: config.external_status.reversal,
          intervalMs: config.external_status.interval_sec * 1000,
          delayMs: defaults.delay_ms,
          enabledByDefault: config.external_status.enabled
        }
      )
    : undefined;

  const router = new CommandRouter({
    admins: config.telegram.admins,
    gate,
    basket,
    stake,
    dispatcher,
    clients,
    leases,
    delayMs: defaults.delay_ms,
    autoToggle,
    audit: (event) => store.recordAudit(event)
  });

  logger.info(
    {
      chatId: config.telegram.chat_id,
      topicId: config.telegram.topic_id,
      admins: config.telegram.admins.length,
      requireArm: gate.required,
      longUrl: config.freqtrade.long.base_url,
      shortUrl: config.freqtrade.short.base_url,
      basket: basket.size(),
      stake: stake.get(),
      auto: Boolean(autoToggle)
    },
    'orchestrator configured'
  );

  let app: FastifyInstance | null = null;
  if (config.server.enabled) {
    app = await buildServer({ gate, basket, stake, leases, reconciler, autoToggle, transport });
    const address = await app.listen({ port: config.server.port, host: config.server.host });
    logger.info({ address }, 'health server listening');
  }

  transport.start(async (message) => {
    const outcome = await router.handle(message);
    if (outcome) {
      await transport.send(outcome.reply);
    }
  });
  autoToggle?.start();

  let stopping = false;
  async function shutdown(reason: string): Promise<void> {
    if (stopping) return;
    stopping = true;
    logger.warn({ reason }, 'orchestrator shutting down');
    await transport.stop();
    await autoToggle?.stop();
    if (app) {
      try {
        await app.close();
      } catch (err) {
        logger.error({ err }, 'failed to close fastify');
      }
    }
    store.close();
  }

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

bootstrap().catch((err) => {
  logger.error({ err }, 'orchestrator failed to start');
  process.exitCode = 1;
});
