import { createLogger } from '@venuepilot/logger';
import type { AuditEvent, AutoToggleState, AutoToggleTracking } from '@venuepilot/persistence';
import { isOrchestratorError, OpenTrade, TradeSide } from '@venuepilot/shared';
import { Clock, systemClock } from '@venuepilot/util';
import type { DispatchResult, InstanceDispatcher } from './dispatcher';
import type { VenueClient } from './freqtrade';
import { autoToggleSwitches } from './metrics';
import type { NotificationSink } from './notifier';
import { buildSwitchPlan } from './plan';

const logger = createLogger('orchestrator.auto');

export type ToggleRules = {
  threshold: number;
  reversal: number;
};

export type ToggleDecision = {
  /** State after baseline initialisation and peak tracking, before any switch. */
  tracked: AutoToggleState;
  delta: number;
  initialized: boolean;
  peakUpdated: boolean;
  switchTo?: TradeSide;
};

/** Open-trade PnL: `profit_abs` where reported, else `stake_amount * profit_pct / 100`. */
export function computeOpenPnl(trades: readonly OpenTrade[]): number {
  let total = 0;
  for (const trade of trades) {
    if (trade.profitAbs !== undefined) {
      total += trade.profitAbs;
    } else if (trade.profitPct !== undefined) {
      total += (trade.stakeAmount * trade.profitPct) / 100;
    }
  }
  return total;
}

export function decideToggle(state: AutoToggleState, pnl: number, rules: ToggleRules): ToggleDecision {
  if (state.baseline === null) {
    return {
      tracked: { ...state, baseline: pnl, peak: pnl, direction: 'none' },
      delta: 0,
      initialized: true,
      peakUpdated: false
    };
  }
  const baseline = state.baseline;
  const delta = pnl - baseline;
  let peak = state.peak;
  let peakUpdated = false;
  if (state.direction === 'long' && pnl > baseline && (peak === null || pnl > peak)) {
    peak = pnl;
    peakUpdated = true;
  } else if (state.direction === 'short' && pnl < baseline && (peak === null || pnl < peak)) {
    peak = pnl;
    peakUpdated = true;
  }
  const tracked: AutoToggleState = { ...state, peak };

  let switchTo: TradeSide | undefined;
  if (state.direction !== 'none' && peak !== null) {
    if (state.direction === 'long' && pnl <= peak - rules.reversal) {
      switchTo = 'short';
    } else if (state.direction === 'short' && pnl >= peak + rules.reversal) {
      switchTo = 'long';
    }
  } else if (delta <= -rules.threshold) {
    switchTo = 'long';
  } else if (delta >= rules.threshold) {
    switchTo = 'short';
  }
  return { tracked, delta, initialized: false, peakUpdated, switchTo };
}

/** Baseline and peak restart from the switching reading. */
export function afterSwitch(state: AutoToggleState, pnl: number, direction: TradeSide): AutoToggleState {
  return { ...state, baseline: pnl, peak: pnl, direction };
}

export type AutoToggleStore = {
  loadAutoToggleState(fallback?: AutoToggleState): AutoToggleState;
  saveAutoToggleState(state: AutoToggleTracking, now?: number): void;
  saveAutoToggleEnabled(enabled: boolean, now?: number): void;
  recordAudit(event: AuditEvent): void;
};

export type AutoToggleOptions = ToggleRules & {
  intervalMs: number;
  delayMs: number;
  enabledByDefault: boolean;
};

export type AutoToggleDeps = {
  source: VenueClient;
  dispatcher: InstanceDispatcher;
  store: AutoToggleStore;
  notifier: NotificationSink;
  clock?: Clock;
};

export type TickOutcome =
  | { kind: 'disabled' }
  | { kind: 'fetch_failed'; error: string }
  | { kind: 'initialized'; pnl: number }
  | { kind: 'holding'; pnl: number; peakUpdated: boolean }
  | { kind: 'switched'; pnl: number; direction: TradeSide; result: DispatchResult }
  | { kind: 'busy'; pnl: number; direction: TradeSide };

export interface AutoToggleControl {
  setEnabled(enabled: boolean): void;
  describe(): string;
}

function fmt(value: number | null): string {
  return value === null ? '-' : value.toFixed(2);
}

export class AutoToggle implements AutoToggleControl {
  private readonly clock: Clock;
  private state: AutoToggleState;
  private controller?: AbortController;
  private loop?: Promise<void>;
  private lastPnl: number | null = null;

  constructor(
    private readonly deps: AutoToggleDeps,
    private readonly options: AutoToggleOptions
  ) {
    this.clock = deps.clock ?? systemClock;
    this.state = deps.store.loadAutoToggleState({
      baseline: null,
      peak: null,
      direction: 'none',
      enabled: options.enabledByDefault
    });
  }

  snapshot(): AutoToggleState {
    return { ...this.state };
  }

  setEnabled(enabled: boolean): void {
    this.state = { ...this.state, enabled };
    this.deps.store.saveAutoToggleEnabled(enabled, this.clock.now());
    logger.info({ enabled }, 'auto toggle switched');
  }

  describe(): string {
    const { enabled, direction, baseline, peak } = this.state;
    return `${enabled ? 'on' : 'off'}, direction ${direction}, baseline ${fmt(baseline)}, peak ${fmt(peak)}, last pnl ${fmt(this.lastPnl)}`;
  }

  start(): void {
    if (this.loop) return;
    const controller = new AbortController();
    this.controller = controller;
    logger.info({ intervalMs: this.options.intervalMs }, 'auto toggle started');
    this.loop = this.run(controller.signal);
  }

  async stop(): Promise<void> {
    this.controller?.abort();
    const loop = this.loop;
    this.loop = undefined;
    this.controller = undefined;
    if (loop) {
      await loop;
    }
  }

  async tick(): Promise<TickOutcome> {
    if (!this.state.enabled) {
      return { kind: 'disabled' };
    }
    let trades: OpenTrade[];
    try {
      trades = await this.deps.source.status();
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      logger.warn({ err }, 'external status fetch failed');
      return { kind: 'fetch_failed', error };
    }
    const pnl = computeOpenPnl(trades);
    this.lastPnl = pnl;
    const decision = decideToggle(this.state, pnl, this.options);
    this.persist(decision.tracked);

    if (decision.initialized) {
      logger.info({ pnl }, 'auto baseline initialised');
      return { kind: 'initialized', pnl };
    }
    if (decision.peakUpdated) {
      logger.info({ pnl, direction: this.state.direction }, 'auto peak updated');
      await this.notify(`auto: new peak ${pnl.toFixed(2)} (${this.state.direction})`);
    }
    logger.debug(
      { pnl, baseline: decision.tracked.baseline, peak: decision.tracked.peak, direction: this.state.direction, next: decision.switchTo },
      'auto tick'
    );
    const direction = decision.switchTo;
    if (!direction) {
      return { kind: 'holding', pnl, peakUpdated: decision.peakUpdated };
    }

    let result: DispatchResult;
    try {
      result = await this.deps.dispatcher.execute(buildSwitchPlan(direction, this.options.delayMs));
    } catch (err) {
      if (isOrchestratorError(err, 'InstanceBusy')) {
        logger.warn({ direction, err }, 'venue busy; auto switch deferred to next tick');
        return { kind: 'busy', pnl, direction };
      }
      throw err;
    }
    const previous = decision.tracked.baseline;
    this.persist(afterSwitch(decision.tracked, pnl, direction));
    autoToggleSwitches.inc({ direction });
    this.deps.store.recordAudit({
      ts: this.clock.now(),
      kind: 'auto_switch',
      actor: 'auto',
      outcome: result.status === 'completed' ? 'ok' : 'PartialExecution',
      detail: { direction, pnl, baseline: previous, delta: decision.delta, planId: result.planId }
    });
    const sign = decision.delta >= 0 ? '+' : '';
    await this.notify(
      [
        `auto switch -> ${direction} (${result.status})`,
        `baseline ${fmt(previous)} -> ${pnl.toFixed(2)} (delta ${sign}${decision.delta.toFixed(2)})`,
        `long: ${direction === 'long' ? 'start' : 'stop'}, short: ${direction === 'short' ? 'start' : 'stop'}`
      ].join('\n')
    );
    return { kind: 'switched', pnl, direction, result };
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.tick();
      } catch (err) {
        logger.error({ err }, 'auto toggle tick failed');
      }
      try {
        await this.clock.sleep(this.options.intervalMs, signal);
      } catch {
        break;
      }
    }
    logger.info('auto toggle stopped');
  }

  private persist(next: AutoToggleState): void {
    this.state = next;
    const { baseline, peak, direction } = next;
    this.deps.store.saveAutoToggleState({ baseline, peak, direction }, this.clock.now());
  }

  private async notify(text: string): Promise<void> {
    try {
      await this.deps.notifier.send(text);
    } catch (err) {
      logger.warn({ err }, 'auto toggle notification failed');
    }
  }
}
